export type BuildClass = 'native' | 'nativesdk'

export type LicenseFile = {
  // Path relative to the unpacked source directory
  file: string
  md5: string
  beginLine?: number
  endLine?: number
}

export type RecipeSource = {
  pypi: string
  // Unset until the published sdist digest has been recorded
  sha256?: string
}

export type Recipe = {
  name: string
  version: string
  summary: string
  description?: string
  homepage?: string
  section?: string
  license: string
  licenseFiles: LicenseFile[]
  source: RecipeSource
  inherits: string[]
  depends: string[]
  classExtend: BuildClass[]
}

export type CheckStatus = 'ok' | 'mismatch' | 'missing' | 'unpinned'

export type SourceCheck = {
  subject: string
  algorithm: 'sha256' | 'md5'
  expected: string | null
  actual: string | null
  status: CheckStatus
}

export type VerificationReport = {
  recipe: string
  archive: string
  checks: SourceCheck[]
  ok: boolean
}
