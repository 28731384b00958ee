import assert from 'node:assert/strict'
import { createHash } from 'node:crypto'
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import { Logger } from '@buildtools/core'
import { create } from 'tar'
import { describeRecipe, main, reportVerification } from '../src/cli.js'
import { sampleRecipe } from './fixtures.js'

function captureLogger() {
  const stdout: string[] = []
  const stderr: string[] = []
  const logger = new Logger({
    color: false,
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
  })
  return { logger, stdout, stderr }
}

describe('describeRecipe', () => {
  it('prints identity, license, source and variants', () => {
    const { logger, stdout } = captureLogger()

    describeRecipe(sampleRecipe(), logger)

    assert.deepStrictEqual(stdout, [
      'python3-pylibfdt 1.7.2: Python Library for the Device Tree Compiler',
      '  license:  GPL-2.0-only | BSD-2-Clause (GPL-2.0-only, BSD-2-Clause)',
      '  source:   https://files.pythonhosted.org/packages/source/p/pylibfdt/pylibfdt-1.7.2.tar.gz',
      '  depends:  python3-setuptools-scm-native, swig-native',
      '  variants: python3-pylibfdt, python3-pylibfdt-native, nativesdk-python3-pylibfdt',
    ])
  })
})

describe('reportVerification', () => {
  it('prints one line per check', () => {
    const { logger, stdout, stderr } = captureLogger()

    reportVerification(
      {
        recipe: 'python3-pylibfdt',
        archive: 'pylibfdt-1.7.2.tar.gz',
        ok: false,
        checks: [
          { subject: 'pylibfdt-1.7.2.tar.gz', algorithm: 'sha256', expected: 'aa', actual: 'aa', status: 'ok' },
          { subject: 'GPL', algorithm: 'md5', expected: 'bb', actual: 'cc', status: 'mismatch' },
          { subject: 'COPYING', algorithm: 'md5', expected: 'dd', actual: null, status: 'missing' },
          { subject: 'demo-0.1.tar.gz', algorithm: 'sha256', expected: null, actual: 'ee', status: 'unpinned' },
        ],
      },
      logger,
    )

    assert.deepStrictEqual(stdout, [
      '✓ sha256 pylibfdt-1.7.2.tar.gz',
      '⚠ sha256 demo-0.1.tar.gz: no checksum pinned, archive digest is ee',
    ])
    assert.deepStrictEqual(stderr, [
      '✗ md5 GPL: expected bb, got cc',
      '✗ md5 COPYING: file not found',
    ])
  })
})

describe('main', () => {
  let dir: string
  let archivePath: string

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'recipe-cli-test-'))
    const sourceDir = join(dir, 'src', 'demo-0.1')
    await mkdir(sourceDir, { recursive: true })
    await writeFile(join(sourceDir, 'LICENSE'), 'demo license\n')

    archivePath = join(dir, 'demo-0.1.tar.gz')
    await create({ gzip: true, file: archivePath, cwd: join(dir, 'src') }, ['demo-0.1'])

    const sha256 = createHash('sha256').update(await readFile(archivePath)).digest('hex')
    const md5 = createHash('md5').update('demo license\n').digest('hex')
    await writeFile(
      join(dir, 'python3-demo.json'),
      JSON.stringify(
        sampleRecipe({
          name: 'python3-demo',
          version: '0.1',
          license: 'MIT',
          licenseFiles: [{ file: 'LICENSE', md5 }],
          source: { pypi: 'demo', sha256 },
        }),
      ),
    )
    await writeFile(join(dir, 'python3-stale.json'), JSON.stringify(
      sampleRecipe({
        name: 'python3-stale',
        version: '0.1',
        license: 'MIT',
        licenseFiles: [{ file: 'LICENSE', md5 }],
        source: { pypi: 'demo', sha256: '0'.repeat(64) },
      }),
    ))
  })

  after(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('exits 0 when a local archive matches the recipe', async () => {
    assert.equal(await main(['python3-demo', '--recipes-dir', dir, '--archive', archivePath]), 0)
  })

  it('exits 1 when a checksum differs', async () => {
    assert.equal(await main(['python3-stale', '--recipes-dir', dir, '--archive', archivePath]), 1)
  })

  it('exits 1 for an unknown recipe', async () => {
    assert.equal(await main(['python3-unknown', '--recipes-dir', dir, '--archive', archivePath]), 1)
  })
})
