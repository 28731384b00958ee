import assert from 'node:assert/strict'
import { createHash } from 'node:crypto'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import {
  hashContent,
  hashFile,
  hashFileLines,
  parseChecksumLine,
  parseChecksumManifest,
} from '../src/checksum.js'

describe('parseChecksumLine', () => {
  it('splits the directory from the filename', () => {
    assert.deepStrictEqual(parseChecksumLine('0a1b2c  releases/buildtools/bundle.sh'), {
      checksum: '0a1b2c',
      path: 'releases/buildtools/',
      filename: 'bundle.sh',
    })
  })

  it('accepts binary-mode entries without a directory', () => {
    assert.deepStrictEqual(parseChecksumLine('ff00 *bundle.sh\r'), {
      checksum: 'ff00',
      path: null,
      filename: 'bundle.sh',
    })
  })

  it('rejects lines that do not start with a hex digest', () => {
    assert.equal(parseChecksumLine('not a checksum line'), null)
    assert.equal(parseChecksumLine('abc123'), null)
  })
})

describe('parseChecksumManifest', () => {
  it('returns the first parseable entry', () => {
    const entry = parseChecksumManifest('\n\nbeef  a.sh\ncafe  b.sh\n')
    assert.equal(entry?.checksum, 'beef')
    assert.equal(entry?.filename, 'a.sh')
  })

  it('returns null for an empty manifest', () => {
    assert.equal(parseChecksumManifest('\n  \n'), null)
  })
})

describe('hashing', () => {
  let dir: string

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'checksum-test-'))
  })

  after(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('hashes a file with sha256 by default', async () => {
    const filePath = join(dir, 'bundle.sh')
    await writeFile(filePath, 'hello buildtools\n')

    const expected = createHash('sha256').update('hello buildtools\n').digest('hex')
    assert.equal(await hashFile(filePath), expected)
    assert.equal(hashContent('hello buildtools\n'), expected)
  })

  it('hashes a file with md5', async () => {
    const filePath = join(dir, 'license.txt')
    await writeFile(filePath, 'license text\n')

    const expected = createHash('md5').update('license text\n').digest('hex')
    assert.equal(await hashFile(filePath, 'md5'), expected)
  })

  it('hashes only the selected line range', async () => {
    const filePath = join(dir, 'lines.txt')
    await writeFile(filePath, 'a\nb\nc\nd\n')

    const expected = createHash('md5').update('b\nc\n').digest('hex')
    assert.equal(await hashFileLines(filePath, 'md5', { beginLine: 2, endLine: 3 }), expected)
  })

  it('hashes the whole file when no range is given', async () => {
    const filePath = join(dir, 'whole.txt')
    await writeFile(filePath, 'x\ny\n')

    assert.equal(await hashFileLines(filePath, 'md5'), hashContent('x\ny\n', 'md5'))
  })
})
