import { readFile } from 'node:fs/promises'
import { basename, join, resolve, sep } from 'node:path'
import {
  CHECKSUM_SUFFIXES,
  formatBytes,
  hashFile,
  makeExecutable,
  parseChecksumManifest,
  withTempDir,
  type ChecksumAlgorithm,
  type CommandResult,
  type CommandRunner,
  type DownloadOptions,
  type DownloadResult,
  type Logger,
} from '@buildtools/core'
import { readEnvironmentSetup } from './environment.js'
import {
  describeError,
  fail,
  ok,
  type BuildtoolsError,
  type StageResult,
} from './errors.js'
import {
  DEFAULT_INSTALL_ROOT,
  environmentSetupScript,
  smokeTestTool,
  type InstallerOptions,
} from './options.js'
import { resolveTarget, type ResolvedTarget } from './resolve.js'

export type InstallerDeps = {
  logger: Logger
  download: (options: DownloadOptions) => Promise<DownloadResult>
  run: CommandRunner
  // Parent of the per-run working directory; defaults to the OS temp dir
  tempRoot?: string
}

export type ChecksumManifest = {
  url: string
  path: string
  algorithm: ChecksumAlgorithm
}

export type FetchedFiles = {
  bundlePath: string
  manifest: ChecksumManifest | null
}

export const SUCCESS_MESSAGE =
  'Installation successful. Remember to source the environment setup script now and in any new session.'

function report(logger: Logger, error: BuildtoolsError): number {
  logger.error(error.message)
  return error.exitCode
}

function isInside(filePath: string, dirPath: string): boolean {
  const dir = dirPath.replace(/\/+$/, '')
  return filePath === dir || filePath.startsWith(`${dir}${sep}`)
}

export async function fetchStage(
  target: ResolvedTarget,
  options: InstallerOptions,
  workDir: string,
  deps: InstallerDeps,
): Promise<StageResult<FetchedFiles>> {
  const { logger } = deps

  logger.step('Fetching buildtools installer')
  const bundlePath = join(workDir, basename(target.filename))
  try {
    const result = await deps.download({ url: target.url, destination: bundlePath })
    logger.debug(`Downloaded ${formatBytes(result.size)} to ${result.path}`)
  } catch (error) {
    logger.debug(describeError(error))
    return fail('transport', `Could not download file from ${target.url}`, {
      cause: error,
    })
  }

  if (!options.check) {
    return ok({ bundlePath, manifest: null })
  }

  logger.step('Fetching buildtools installer checksum')
  let checksumUrl = target.url
  for (const { suffix, algorithm } of CHECKSUM_SUFFIXES) {
    checksumUrl = `${target.url}.${suffix}`
    const path = `${bundlePath}.${suffix}`
    try {
      await deps.download({ url: checksumUrl, destination: path })
      return ok({ bundlePath, manifest: { url: checksumUrl, path, algorithm } })
    } catch (error) {
      logger.debug(`No ${suffix} manifest: ${describeError(error)}`)
    }
  }

  return fail('transport', `Could not download file from ${checksumUrl}`)
}

/**
 * Resolves to whether the bundle hash matched. A hash mismatch only fails the
 * stage under `failOnChecksumMismatch`; a filename mismatch always does.
 */
export async function verifyStage(
  fetched: FetchedFiles,
  expectedFilename: string,
  options: InstallerOptions,
  logger: Logger,
): Promise<StageResult<boolean>> {
  const { manifest, bundlePath } = fetched
  if (!manifest) {
    return ok(false)
  }

  const entry = parseChecksumManifest(await readFile(manifest.path, 'utf-8'))
  if (!entry) {
    return fail('integrity', `Could not parse checksum manifest from ${manifest.url}`)
  }

  logger.debug(`checksum: ${entry.checksum}`)
  logger.debug(`path: ${entry.path ?? ''}`)
  logger.debug(`filename: ${entry.filename}`)

  if (entry.filename !== basename(expectedFilename)) {
    return fail('integrity', 'Filename does not match name in checksum')
  }

  const actual = await hashFile(bundlePath, manifest.algorithm)
  if (actual === entry.checksum) {
    logger.success('Checksum success')
    return ok(true)
  }

  const mismatch = `Checksum ${entry.checksum} expected. Actual checksum is ${actual}.`
  if (options.failOnChecksumMismatch) {
    return fail('integrity', mismatch)
  }
  logger.error(mismatch)
  return ok(false)
}

export async function installStage(
  bundlePath: string,
  options: InstallerOptions,
  deps: InstallerDeps,
): Promise<StageResult<string>> {
  const { logger } = deps

  logger.step('Making installer executable')
  const mode = await makeExecutable(bundlePath)
  logger.debug(`${bundlePath} mode ${mode.toString(8)}`)

  const installDir = options.directory
    ? resolve(options.directory)
    : `${DEFAULT_INSTALL_ROOT}/${options.installerVersion}`
  const args = options.directory ? ['-d', installDir, '-y'] : ['-y']

  logger.step(`Installing buildtools into ${installDir}`)
  try {
    const result = await deps.run(bundlePath, args)
    if (result.exitCode !== 0) {
      return fail('install', 'Could not run buildtools installer', {
        exitCode: result.exitCode,
      })
    }
  } catch (error) {
    logger.debug(describeError(error))
    return fail('install', 'Could not run buildtools installer', { cause: error })
  }

  return ok(installDir)
}

function selectTool(
  options: InstallerOptions,
  bundlePath: string,
  logger: Logger,
): string {
  if (options.variant === 'extended' && !basename(bundlePath).includes('extended')) {
    logger.info(
      "Ignoring --with-extended-buildtools as filename does not contain 'extended'",
    )
    return smokeTestTool('standard')
  }
  return smokeTestTool(options.variant)
}

/**
 * Source the bundle's environment-setup script in a subshell and check that
 * the expected tool resolves from inside the install directory.
 */
export async function smokeTestStage(
  installDir: string,
  bundlePath: string,
  options: InstallerOptions,
  deps: InstallerDeps,
): Promise<StageResult<string>> {
  const { logger } = deps

  logger.step('Setting up the environment')
  const scriptPath = environmentSetupScript(installDir, options.arch)
  try {
    for (const { name, value } of await readEnvironmentSetup(scriptPath)) {
      logger.debug(`${name}=${value}`)
    }
  } catch (error) {
    return fail('verification', `Could not read environment setup script ${scriptPath}`, {
      cause: error,
    })
  }

  logger.step('Testing installation')
  const tool = selectTool(options, bundlePath, logger)
  logger.debug(`install_dir: ${installDir}`)
  logger.debug(`tool: ${tool}`)

  let result: CommandResult
  try {
    result = await deps.run(
      'sh',
      ['-c', '. "$1" >/dev/null && command -v "$2"', 'sh', scriptPath, tool],
      { capture: true },
    )
  } catch (error) {
    return fail('verification', 'Something went wrong: installation failed', {
      cause: error,
    })
  }

  const resolved = result.stdout.trim()
  logger.debug(`command -v ${tool}: ${resolved}`)

  if (!isInside(resolved, installDir)) {
    const notFound = `Something went wrong: ${tool} not found in ${installDir}`
    if (result.exitCode === 0) {
      return fail('verification', notFound)
    }
    logger.error(notFound)
  }

  if (result.exitCode !== 0) {
    return fail('verification', 'Something went wrong: installation failed', {
      exitCode: result.exitCode,
    })
  }

  return ok(resolved)
}

/**
 * resolve -> fetch -> verify -> install -> test. Returns the exit code; the
 * working directory is removed on every path out.
 */
export async function runInstaller(
  options: InstallerOptions,
  deps: InstallerDeps,
): Promise<number> {
  const { logger } = deps

  const target = resolveTarget(options, logger)
  if (!target.ok) {
    return report(logger, target.error)
  }
  logger.debug(`Buildtools URL: ${target.value.url}`)

  return withTempDir(
    async (workDir) => {
      logger.debug(`Working directory: ${workDir}`)

      const fetched = await fetchStage(target.value, options, workDir, deps)
      if (!fetched.ok) return report(logger, fetched.error)

      const verified = await verifyStage(
        fetched.value,
        target.value.filename,
        options,
        logger,
      )
      if (!verified.ok) return report(logger, verified.error)

      const installed = await installStage(fetched.value.bundlePath, options, deps)
      if (!installed.ok) return report(logger, installed.error)

      const tested = await smokeTestStage(
        installed.value,
        fetched.value.bundlePath,
        options,
        deps,
      )
      if (!tested.ok) return report(logger, tested.error)

      logger.success(SUCCESS_MESSAGE)
      return 0
    },
    { prefix: 'buildtools-', root: deps.tempRoot },
  )
}
