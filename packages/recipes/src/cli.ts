import { join } from 'node:path'
import { Command } from 'commander'
import {
  createLogger,
  downloadFile,
  withTempDir,
  type Logger,
} from '@buildtools/core'
import { licenseIds } from './license.js'
import { pypiSourceUrl, recipeVariants, sourceArchiveName } from './pypi.js'
import { loadRecipe, RECIPES_DIR } from './recipe.js'
import type { Recipe, VerificationReport } from './types.js'
import { verifyRecipeSources } from './verify.js'

type CheckFlags = {
  archive?: string
  recipesDir: string
  debug?: boolean
}

export function createProgram(): Command {
  return new Command()
    .name('recipe-check')
    .description('Show a package recipe and verify its source archive and license checksums')
    .argument('<recipe>', 'recipe name, e.g. python3-pylibfdt')
    .option('--archive <path>', 'verify a local source archive instead of downloading it')
    .option('--recipes-dir <dir>', 'directory holding recipe manifests', RECIPES_DIR)
    .option('-D, --debug', 'print debug output')
}

export function describeRecipe(recipe: Recipe, logger: Logger): void {
  logger.info(`${recipe.name} ${recipe.version}: ${recipe.summary}`)
  logger.info(`  license:  ${recipe.license} (${licenseIds(recipe.license).join(', ')})`)
  logger.info(`  source:   ${pypiSourceUrl(recipe)}`)
  logger.info(`  depends:  ${recipe.depends.join(', ') || '(none)'}`)
  logger.info(`  variants: ${recipeVariants(recipe).join(', ')}`)
}

export function reportVerification(report: VerificationReport, logger: Logger): void {
  for (const check of report.checks) {
    const label = `${check.algorithm} ${check.subject}`
    if (check.status === 'ok') {
      logger.success(label)
    } else if (check.status === 'missing') {
      logger.error(`${label}: file not found`)
    } else if (check.status === 'unpinned') {
      logger.warn(`${label}: no checksum pinned, archive digest is ${check.actual ?? ''}`)
    } else {
      logger.error(`${label}: expected ${check.expected}, got ${check.actual ?? ''}`)
    }
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const logger = createLogger()

  try {
    const program = createProgram()
    program.parse(argv, { from: 'user' })
    const [name] = program.args
    const flags = program.opts<CheckFlags>()
    if (flags.debug) logger.setLevel('debug')
    if (!name) {
      logger.error('Missing recipe name')
      return 1
    }

    const recipe = await loadRecipe(name, flags.recipesDir)
    describeRecipe(recipe, logger)

    const verify = (archivePath: string) =>
      verifyRecipeSources(recipe, archivePath, { logger })

    let report: VerificationReport
    if (flags.archive) {
      logger.step(`Verifying ${flags.archive}`)
      report = await verify(flags.archive)
    } else {
      report = await withTempDir(async (dir) => {
        const url = pypiSourceUrl(recipe)
        logger.step(`Fetching ${url}`)
        const { path } = await downloadFile({
          url,
          destination: join(dir, sourceArchiveName(recipe)),
        })
        return verify(path)
      })
    }

    reportVerification(report, logger)
    return report.ok ? 0 : 1
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error))
    return 1
  }
}
