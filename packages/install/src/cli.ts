import { readFileSync } from 'node:fs'
import { Command, Option } from 'commander'
import {
  createLogger,
  createProgressLogger,
  detectArch,
  downloadFile,
  runCommand,
  type Arch,
  type LogLevel,
} from '@buildtools/core'
import { describeError } from './errors.js'
import {
  DEFAULT_BUILD_DATE,
  DEFAULT_INSTALLER_VERSION,
  DEFAULT_RELEASE,
  getDefaultBaseUrl,
  type BuildtoolsVariant,
  type InstallerOptions,
} from './options.js'
import { runInstaller, type InstallerDeps } from './pipeline.js'

type CliFlags = {
  url?: string
  filename?: string
  directory?: string
  release: string
  installerVersion: string
  baseUrl: string
  buildDate?: string
  withExtendedBuildtools?: boolean
  withoutExtendedBuildtools?: boolean
  makeOnly?: boolean
  check?: boolean
  failOnChecksumMismatch?: boolean
  debug?: boolean
  quiet?: boolean
}

export type ParsedArgs = {
  options: InstallerOptions
  logLevel: LogLevel
}

export function getVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf-8'),
  )
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version
  }
  return '0.0.0'
}

export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  return new Command()
    .name('install-buildtools')
    .description('Download, verify and install a prebuilt buildtools bundle')
    .version(getVersion())
    .option('--url <url>', 'URL the installer is fetched from (used with --filename)')
    .option('--filename <name>', 'filename of the installer at --url')
    .option('-d, --directory <dir>', 'directory to install buildtools into')
    .option('-r, --release <release>', 'release the installer belongs to', DEFAULT_RELEASE)
    .option(
      '--installer-version <version>',
      'version of the buildtools installer',
      DEFAULT_INSTALLER_VERSION,
    )
    .option('--base-url <url>', 'base URL of the release server', getDefaultBaseUrl(env))
    .option(
      '--build-date <date>',
      'build date of a milestone installer (YYYYMMDD)',
      DEFAULT_BUILD_DATE,
    )
    .addOption(
      new Option(
        '--with-extended-buildtools',
        'fetch the extended bundle, with a compiler toolchain (default)',
      ).conflicts(['withoutExtendedBuildtools', 'makeOnly']),
    )
    .addOption(
      new Option('--without-extended-buildtools', 'fetch the standard bundle').conflicts(
        'makeOnly',
      ),
    )
    .option('--make-only', 'fetch the make-only bundle')
    .option('-c, --check', 'validate the installer checksum (default)')
    .option('-n, --no-check', 'skip checksum validation')
    .option(
      '--fail-on-checksum-mismatch',
      'stop before installing when the checksum does not match',
    )
    .addOption(new Option('-D, --debug', 'print debug output').conflicts('quiet'))
    .option('-q, --quiet', 'print only errors')
}

function selectVariant(flags: CliFlags): BuildtoolsVariant {
  if (flags.makeOnly) return 'make'
  if (flags.withoutExtendedBuildtools) return 'standard'
  return 'extended'
}

export function parseInstallerArgs(
  argv: string[],
  context: { arch: Arch; env?: NodeJS.ProcessEnv; program?: Command },
): ParsedArgs {
  const program = context.program ?? createProgram(context.env)
  program.parse(argv, { from: 'user' })
  const flags = program.opts<CliFlags>()

  return {
    options: {
      url: flags.url,
      filename: flags.filename,
      directory: flags.directory,
      release: flags.release,
      installerVersion: flags.installerVersion,
      baseUrl: flags.baseUrl,
      buildDate: flags.buildDate,
      variant: selectVariant(flags),
      check: flags.check !== false,
      failOnChecksumMismatch: flags.failOnChecksumMismatch === true,
      arch: context.arch,
    },
    logLevel: flags.debug ? 'debug' : flags.quiet ? 'error' : 'info',
  }
}

/**
 * Wrap `downloadFile` with the installer's user agent and, on a terminal,
 * a progress line. The line is always ended so the next message starts on
 * its own line, even when the download fails.
 */
export function createBundleDownloader(options: {
  showProgress: boolean
  download?: typeof downloadFile
  write?: (text: string) => void
}): InstallerDeps['download'] {
  const {
    showProgress,
    download = downloadFile,
    write = (text) => process.stdout.write(text),
  } = options

  return async (downloadOptions) => {
    try {
      return await download({
        ...downloadOptions,
        userAgent: `install-buildtools/${getVersion()}`,
        onProgress: showProgress ? createProgressLogger({ prefix: '  ', write }) : undefined,
      })
    } finally {
      if (showProgress) write('\n')
    }
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const logger = createLogger()

  try {
    const { options, logLevel } = parseInstallerArgs(argv, { arch: detectArch() })
    logger.setLevel(logLevel)

    return await runInstaller(options, {
      logger,
      run: runCommand,
      download: createBundleDownloader({
        showProgress: logLevel !== 'error' && process.stdout.isTTY === true,
      }),
    })
  } catch (error) {
    logger.error(describeError(error))
    return 1
  }
}
