import { access } from 'node:fs/promises'
import { join } from 'node:path'
import {
  extractTarGz,
  hashFile,
  hashFileLines,
  isTarGz,
  withTempDir,
  type Logger,
} from '@buildtools/core'
import { RecipeError } from './recipe.js'
import type { Recipe, SourceCheck, VerificationReport } from './types.js'

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

function compare(
  subject: string,
  algorithm: SourceCheck['algorithm'],
  expected: string | undefined,
  actual: string | null,
): SourceCheck {
  let status: SourceCheck['status']
  if (actual === null) status = 'missing'
  else if (expected === undefined) status = 'unpinned'
  else status = actual === expected ? 'ok' : 'mismatch'

  return { subject, algorithm, expected: expected ?? null, actual, status }
}

/**
 * Check a source archive against the recipe: the archive's sha256, then the
 * md5 of every declared license file inside it. Mismatches are reported,
 * not thrown. A recipe without a pinned sha256 never passes; its report
 * carries the archive digest to pin.
 */
export async function verifyRecipeSources(
  recipe: Recipe,
  archivePath: string,
  options: { logger?: Logger; tempRoot?: string } = {},
): Promise<VerificationReport> {
  const { logger } = options

  if (!isTarGz(archivePath)) {
    throw new RecipeError(`Source archive ${archivePath} is not a .tar.gz archive`)
  }

  const checks: SourceCheck[] = []

  const archiveHash = (await exists(archivePath))
    ? await hashFile(archivePath, 'sha256')
    : null
  checks.push(compare(archivePath, 'sha256', recipe.source.sha256, archiveHash))

  if (archiveHash !== null) {
    await withTempDir(
      async (sourceDir) => {
        logger?.debug(`Unpacking ${archivePath} into ${sourceDir}`)
        await extractTarGz({ archivePath, destination: sourceDir })

        for (const licenseFile of recipe.licenseFiles) {
          const filePath = join(sourceDir, licenseFile.file)
          const actual = (await exists(filePath))
            ? await hashFileLines(filePath, 'md5', licenseFile)
            : null
          checks.push(compare(licenseFile.file, 'md5', licenseFile.md5, actual))
        }
      },
      { prefix: `${recipe.name}-`, root: options.tempRoot },
    )
  }

  return {
    recipe: recipe.name,
    archive: archivePath,
    checks,
    ok: checks.length > 0 && checks.every((check) => check.status === 'ok'),
  }
}
