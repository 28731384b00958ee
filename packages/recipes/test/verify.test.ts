import assert from 'node:assert/strict'
import { createHash } from 'node:crypto'
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import { create } from 'tar'
import { RecipeError } from '../src/recipe.js'
import type { Recipe } from '../src/types.js'
import { verifyRecipeSources } from '../src/verify.js'
import { sampleRecipe } from './fixtures.js'

const GPL_TEXT = 'GNU GENERAL PUBLIC LICENSE\nVersion 2\nplaceholder text\n'
const BSD_TEXT = 'BSD 2-Clause License\nplaceholder text\n'

function digest(algorithm: 'sha256' | 'md5', content: string | Buffer): string {
  return createHash(algorithm).update(content).digest('hex')
}

describe('verifyRecipeSources', () => {
  let dir: string
  let tempRoot: string
  let archivePath: string
  let archiveSha256: string

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'verify-test-'))
    tempRoot = join(dir, 'tmp')
    await mkdir(tempRoot)

    const sourceDir = join(dir, 'src', 'pylibfdt-1.7.2')
    await mkdir(sourceDir, { recursive: true })
    await writeFile(join(sourceDir, 'GPL'), GPL_TEXT)
    await writeFile(join(sourceDir, 'BSD-2-Clause'), BSD_TEXT)
    await writeFile(join(sourceDir, 'setup.py'), 'from setuptools import setup\n')

    archivePath = join(dir, 'pylibfdt-1.7.2.tar.gz')
    await create({ gzip: true, file: archivePath, cwd: join(dir, 'src') }, ['pylibfdt-1.7.2'])

    archiveSha256 = digest('sha256', await readFile(archivePath))
  })

  after(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  function recipe(overrides: Partial<Recipe> = {}): Recipe {
    return sampleRecipe({
      source: { pypi: 'pylibfdt', sha256: archiveSha256 },
      licenseFiles: [
        { file: 'GPL', md5: digest('md5', GPL_TEXT) },
        { file: 'BSD-2-Clause', md5: digest('md5', BSD_TEXT) },
      ],
      ...overrides,
    })
  }

  it('passes when the archive and license files match', async () => {
    const report = await verifyRecipeSources(recipe(), archivePath, { tempRoot })

    assert.equal(report.ok, true)
    assert.equal(report.recipe, 'python3-pylibfdt')
    assert.deepStrictEqual(
      report.checks.map((check) => [check.subject, check.algorithm, check.status]),
      [
        [archivePath, 'sha256', 'ok'],
        ['GPL', 'md5', 'ok'],
        ['BSD-2-Clause', 'md5', 'ok'],
      ],
    )
    assert.deepStrictEqual(await readdir(tempRoot), [])
  })

  it('reports a license file whose text changed', async () => {
    const wrong = digest('md5', 'some other license\n')
    const report = await verifyRecipeSources(
      recipe({ licenseFiles: [{ file: 'GPL', md5: wrong }] }),
      archivePath,
      { tempRoot },
    )

    assert.equal(report.ok, false)
    assert.deepStrictEqual(report.checks[1], {
      subject: 'GPL',
      algorithm: 'md5',
      expected: wrong,
      actual: digest('md5', GPL_TEXT),
      status: 'mismatch',
    })
  })

  it('checks only the declared line range', async () => {
    const report = await verifyRecipeSources(
      recipe({
        licenseFiles: [{ file: 'GPL', md5: digest('md5', 'Version 2\n'), beginLine: 2, endLine: 2 }],
      }),
      archivePath,
      { tempRoot },
    )

    assert.equal(report.ok, true)
  })

  it('reports a license file missing from the archive', async () => {
    const report = await verifyRecipeSources(
      recipe({ licenseFiles: [{ file: 'COPYING', md5: 'f'.repeat(32) }] }),
      archivePath,
      { tempRoot },
    )

    assert.equal(report.ok, false)
    assert.equal(report.checks[1]?.status, 'missing')
    assert.equal(report.checks[1]?.actual, null)
  })

  it('reports an archive checksum mismatch', async () => {
    const report = await verifyRecipeSources(
      recipe({ source: { pypi: 'pylibfdt', sha256: '0'.repeat(64) } }),
      archivePath,
      { tempRoot },
    )

    assert.equal(report.ok, false)
    assert.equal(report.checks[0]?.status, 'mismatch')
    assert.equal(report.checks[0]?.actual, archiveSha256)
    assert.equal(report.checks[1]?.status, 'ok')
  })

  it('never passes an archive the recipe has no digest for', async () => {
    const report = await verifyRecipeSources(
      recipe({ source: { pypi: 'pylibfdt' } }),
      archivePath,
      { tempRoot },
    )

    assert.equal(report.ok, false)
    assert.deepStrictEqual(report.checks[0], {
      subject: archivePath,
      algorithm: 'sha256',
      expected: null,
      actual: archiveSha256,
      status: 'unpinned',
    })
    assert.equal(report.checks[1]?.status, 'ok')
  })

  it('reports a missing archive without unpacking', async () => {
    const missing = join(dir, 'absent-1.0.tar.gz')
    const report = await verifyRecipeSources(recipe(), missing, { tempRoot })

    assert.equal(report.ok, false)
    assert.deepStrictEqual(report.checks, [
      { subject: missing, algorithm: 'sha256', expected: archiveSha256, actual: null, status: 'missing' },
    ])
  })

  it('rejects archives that are not gzip tarballs', async () => {
    await assert.rejects(
      verifyRecipeSources(recipe(), join(dir, 'pylibfdt-1.7.2.zip')),
      RecipeError,
    )
  })
})
