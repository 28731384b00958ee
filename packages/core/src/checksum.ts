/**
 * Checksum manifest parsing and file hashing.
 */

import { createHash } from 'node:crypto'
import { createReadStream } from 'node:fs'
import { readFile } from 'node:fs/promises'

export type ChecksumAlgorithm = 'sha256' | 'md5'

export type ChecksumEntry = {
  checksum: string
  path: string | null
  filename: string
}

export type LineRange = {
  beginLine?: number
  endLine?: number
}

/**
 * Manifest suffixes published next to a download, in the order they are tried.
 */
export const CHECKSUM_SUFFIXES: ReadonlyArray<{
  suffix: string
  algorithm: ChecksumAlgorithm
}> = [
  { suffix: 'sha256sum', algorithm: 'sha256' },
  { suffix: 'md5sum', algorithm: 'md5' },
]

// Format: "hash  [dir/]filename" or "hash *[dir/]filename" (binary mode)
const CHECKSUM_LINE = /^(?<checksum>[0-9a-f]+)\s+\*?(?<path>.*\/)?(?<filename>.+)$/

export function parseChecksumLine(line: string): ChecksumEntry | null {
  const match = CHECKSUM_LINE.exec(line.replace(/\r$/, ''))
  const groups = match?.groups
  if (!groups?.['checksum'] || !groups['filename']) {
    return null
  }

  return {
    checksum: groups['checksum'],
    path: groups['path'] ?? null,
    filename: groups['filename'],
  }
}

/**
 * Returns the first parseable entry of a manifest, or null when none parses.
 */
export function parseChecksumManifest(content: string): ChecksumEntry | null {
  for (const line of content.split('\n')) {
    if (line.trim() === '') continue
    const entry = parseChecksumLine(line)
    if (entry) return entry
  }
  return null
}

export async function hashFile(
  filePath: string,
  algorithm: ChecksumAlgorithm = 'sha256',
): Promise<string> {
  const hash = createHash(algorithm)
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk)
  }
  return hash.digest('hex')
}

export function hashContent(
  content: string | Uint8Array,
  algorithm: ChecksumAlgorithm = 'sha256',
): string {
  return createHash(algorithm).update(content).digest('hex')
}

/**
 * Hash a file, or only the 1-based inclusive line range of it when one is given.
 */
export async function hashFileLines(
  filePath: string,
  algorithm: ChecksumAlgorithm,
  range: LineRange = {},
): Promise<string> {
  if (range.beginLine === undefined && range.endLine === undefined) {
    return hashFile(filePath, algorithm)
  }

  const content = await readFile(filePath, 'utf-8')
  const lines = content.split(/(?<=\n)/)
  const begin = Math.max((range.beginLine ?? 1) - 1, 0)
  const end = range.endLine ?? lines.length
  return hashContent(lines.slice(begin, end).join(''), algorithm)
}
