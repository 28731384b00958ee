import { mkdir, chmod, stat } from 'node:fs/promises'
import { extract as tarExtract } from 'tar'

export type ExtractOptions = {
  archivePath: string
  destination: string
  stripComponents?: number
  filter?: (path: string) => boolean
}

export async function extractTarGz(options: ExtractOptions): Promise<void> {
  const { archivePath, destination, stripComponents = 1, filter } = options

  await mkdir(destination, { recursive: true })

  await tarExtract({
    file: archivePath,
    cwd: destination,
    strip: stripComponents,
    filter: filter ? (path) => filter(path) : undefined,
  })
}

/**
 * Add the execute bits to a file, keeping the rest of its mode.
 */
export async function makeExecutable(filePath: string): Promise<number> {
  const { mode } = await stat(filePath)
  const executableMode = (mode & 0o7777) | 0o111
  await chmod(filePath, executableMode)
  return executableMode
}

export function isTarGz(filename: string): boolean {
  return filename.endsWith('.tar.gz') || filename.endsWith('.tgz')
}
