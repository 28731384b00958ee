import { createWriteStream } from 'node:fs'
import { mkdir, unlink } from 'node:fs/promises'
import { dirname } from 'node:path'
import { Readable, Transform } from 'node:stream'
import { pipeline } from 'node:stream/promises'

export type DownloadOptions = {
  url: string
  destination: string
  userAgent?: string
  fetch?: typeof fetch
  onProgress?: (downloaded: number, total: number) => void
}

export type DownloadResult = {
  path: string
  size: number
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined
}

// Leaves alone a destination that never became a file of ours.
async function removePartial(filePath: string): Promise<void> {
  try {
    await unlink(filePath)
  } catch (error) {
    const code = errorCode(error)
    if (code !== 'ENOENT' && code !== 'EISDIR' && code !== 'EPERM') throw error
  }
}

/**
 * Stream a URL to disk. The body goes through a counting transform so
 * progress is reported per chunk, and write errors or a body that fails
 * midway reject with the partial file removed.
 */
export async function downloadFile(
  options: DownloadOptions,
): Promise<DownloadResult> {
  const {
    url,
    destination,
    userAgent = 'buildtools-installer/0.1.0',
    fetch: fetchImpl = fetch,
    onProgress,
  } = options

  await mkdir(dirname(destination), { recursive: true })

  const response = await fetchImpl(url, {
    headers: {
      'User-Agent': userAgent,
    },
    redirect: 'follow',
  })

  if (!response.ok) {
    throw new Error(
      `Failed to download ${url}: ${response.status} ${response.statusText}`,
    )
  }

  if (!response.body) {
    throw new Error(`No response body received from ${url}`)
  }

  const total = Number(response.headers.get('content-length')) || 0
  let downloaded = 0

  const counter = new Transform({
    transform(chunk: Uint8Array, _encoding, callback) {
      downloaded += chunk.length
      onProgress?.(downloaded, total)
      callback(null, chunk)
    },
  })

  try {
    await pipeline(
      Readable.fromWeb(response.body),
      counter,
      createWriteStream(destination),
    )
  } catch (error) {
    await removePartial(destination)
    throw error
  }

  return {
    path: destination,
    size: downloaded,
  }
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B'
  const k = 1024
  const sizes = ['B', 'KB', 'MB', 'GB']
  const i = Math.min(
    Math.floor(Math.log(bytes) / Math.log(k)),
    sizes.length - 1,
  )
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`
}

export function createProgressLogger(
  options: { prefix?: string; write?: (text: string) => void } = {},
): (downloaded: number, total: number) => void {
  const { prefix = '', write = (text) => process.stdout.write(text) } =
    options
  let lastPercent = -1

  return (downloaded: number, total: number) => {
    const percent = total > 0 ? Math.round((downloaded / total) * 100) : 0

    if (percent !== lastPercent) {
      lastPercent = percent
      const downloadedStr = formatBytes(downloaded)
      const totalStr = total > 0 ? formatBytes(total) : 'unknown'
      write(`\r${prefix}Downloading... ${percent}% (${downloadedStr}/${totalStr})`)
    }
  }
}
