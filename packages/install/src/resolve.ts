import type { Logger } from '@buildtools/core'
import { fail, ok, type StageResult } from './errors.js'
import type { BuildtoolsVariant, InstallerOptions } from './options.js'

export type ResolvedTarget = {
  url: string
  filename: string
  milestone: boolean
}

// e.g. "yocto-3.2_M3": distro "yocto-", version "3.2", milestone "M3"
const MILESTONE_RELEASE =
  /^(?<distro>[a-zA-Z-]+)(?<version>[0-9.]+)_(?<milestone>M[1-9])$/

export function parseMilestone(
  release: string,
): { distro: string; version: string; milestone: string } | null {
  const groups = MILESTONE_RELEASE.exec(release)?.groups
  if (!groups?.['distro'] || !groups['version'] || !groups['milestone']) {
    return null
  }
  return {
    distro: groups['distro'],
    version: groups['version'],
    milestone: groups['milestone'],
  }
}

export function buildtoolsFilename(options: {
  arch: string
  variant: BuildtoolsVariant
  installerVersion: string
  buildDate?: string
}): string {
  const { arch, variant, installerVersion, buildDate } = options
  const flavor =
    variant === 'extended' ? '-extended' : variant === 'make' ? '-make' : ''
  const suffix = buildDate ? `${installerVersion}-${buildDate}` : installerVersion
  return `${arch}-buildtools${flavor}-nativesdk-standalone-${suffix}.sh`
}

export function joinUrl(base: string, filename: string): string {
  return base.endsWith('/') ? `${base}${filename}` : `${base}/${filename}`
}

/**
 * Work out where the bundle lives. An explicit --url/--filename pair always
 * wins over the release-derived location.
 */
export function resolveTarget(
  options: InstallerOptions,
  logger?: Logger,
): StageResult<ResolvedTarget> {
  const { url, filename } = options

  if (url && filename) {
    logger?.debug(
      '--url and --filename detected. Ignoring --base-url, --release and --installer-version',
    )
    return ok({ url: joinUrl(url, filename), filename, milestone: false })
  }

  if (url || filename) {
    logger?.warn(
      `${url ? '--url' : '--filename'} is ignored unless --url and --filename are both given`,
    )
  }

  const baseUrl = options.baseUrl.replace(/\/+$/, '')
  const milestone = parseMilestone(options.release)

  if (milestone) {
    logger?.debug(
      `Milestone release ${milestone.distro}${milestone.version} ${milestone.milestone}`,
    )
    if (!options.buildDate) {
      return fail('config', 'Milestone installers require --build-date')
    }

    const milestoneFilename = buildtoolsFilename({
      arch: options.arch,
      variant: options.variant,
      installerVersion: options.installerVersion,
      buildDate: options.buildDate,
    })
    return ok({
      url: `${baseUrl}/milestones/${options.release}/buildtools/${encodeURIComponent(milestoneFilename)}`,
      filename: milestoneFilename,
      milestone: true,
    })
  }

  const releaseFilename = buildtoolsFilename({
    arch: options.arch,
    variant: options.variant,
    installerVersion: options.installerVersion,
  })
  return ok({
    url: `${baseUrl}/${options.release}/buildtools/${encodeURIComponent(releaseFilename)}`,
    filename: releaseFilename,
    milestone: false,
  })
}
