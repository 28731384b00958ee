import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { mkdtemp, rm } from 'node:fs/promises'

export type TempDirOptions = {
  prefix?: string
  root?: string
}

export async function createTempDir(options: TempDirOptions = {}): Promise<string> {
  const { prefix = 'buildtools-', root = tmpdir() } = options
  return mkdtemp(join(root, prefix))
}

export async function removeDir(dirPath: string): Promise<void> {
  await rm(dirPath, { recursive: true, force: true })
}

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or throws.
 */
export async function withTempDir<T>(
  fn: (dirPath: string) => Promise<T>,
  options: TempDirOptions = {},
): Promise<T> {
  const dirPath = await createTempDir(options)
  try {
    return await fn(dirPath)
  } finally {
    await removeDir(dirPath)
  }
}
