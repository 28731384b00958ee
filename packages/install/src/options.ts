import type { Arch } from '@buildtools/core'

export const DEFAULT_BASE_URL = 'http://downloads.yoctoproject.org/releases/yocto'
export const DEFAULT_RELEASE = 'yocto-3.2_M3'
export const DEFAULT_INSTALLER_VERSION = '3.1+snapshot'
export const DEFAULT_BUILD_DATE = '20200923'

export const DEFAULT_INSTALL_ROOT = '/opt/poky'

export type BuildtoolsVariant = 'extended' | 'standard' | 'make'

export type InstallerOptions = {
  url?: string
  filename?: string
  directory?: string
  release: string
  installerVersion: string
  baseUrl: string
  buildDate?: string
  variant: BuildtoolsVariant
  check: boolean
  failOnChecksumMismatch: boolean
  arch: Arch
}

export function getDefaultBaseUrl(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env['BUILDTOOLS_BASE_URL']
  return fromEnv && fromEnv.trim() !== '' ? fromEnv.trim() : DEFAULT_BASE_URL
}

export function defaultInstallerOptions(
  arch: Arch,
  env: NodeJS.ProcessEnv = process.env,
): InstallerOptions {
  return {
    release: DEFAULT_RELEASE,
    installerVersion: DEFAULT_INSTALLER_VERSION,
    baseUrl: getDefaultBaseUrl(env),
    buildDate: DEFAULT_BUILD_DATE,
    variant: 'extended',
    check: true,
    failOnChecksumMismatch: false,
    arch,
  }
}

/**
 * Tool looked up after installation to prove the bundle's environment works.
 */
export function smokeTestTool(variant: BuildtoolsVariant): string {
  switch (variant) {
    case 'extended':
      return 'gcc'
    case 'make':
      return 'make'
    case 'standard':
      return 'tar'
  }
}

export function environmentSetupScript(installDir: string, arch: Arch): string {
  return `${installDir.replace(/\/+$/, '')}/environment-setup-${arch}-pokysdk-linux`
}
