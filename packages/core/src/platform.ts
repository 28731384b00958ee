export type Arch = 'x86_64' | 'aarch64'

export const SUPPORTED_ARCHES: Arch[] = ['x86_64', 'aarch64']

const NODE_ARCH_MAP: Partial<Record<NodeJS.Architecture, Arch>> = {
  x64: 'x86_64',
  arm64: 'aarch64',
}

export function detectArch(
  platform: NodeJS.Platform = process.platform,
  arch: NodeJS.Architecture = process.arch,
): Arch {
  const mapped = NODE_ARCH_MAP[arch]
  if (platform === 'linux' && mapped) return mapped

  throw new Error(
    `Unsupported platform: ${platform}-${arch}. ` +
      `Buildtools bundles are published for linux on: ${SUPPORTED_ARCHES.join(', ')}`,
  )
}
