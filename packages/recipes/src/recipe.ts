import { readFile } from 'node:fs/promises'
import { join, dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { BuildClass, LicenseFile, Recipe } from './types.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
export const RECIPES_DIR = join(__dirname, '..', 'recipes')

const BUILD_CLASSES: BuildClass[] = ['native', 'nativesdk']

export class RecipeError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message)
    this.name = 'RecipeError'
    this.issues = issues
  }
}

type Fields = Record<string, unknown>

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isBuildClass(value: unknown): value is BuildClass {
  return typeof value === 'string' && (BUILD_CLASSES as string[]).includes(value)
}

function requireString(fields: Fields, key: string, issues: string[], prefix = ''): string {
  const value = fields[key]
  if (typeof value !== 'string' || value.trim() === '') {
    issues.push(`${prefix}${key} must be a non-empty string`)
    return ''
  }
  return value
}

function optionalString(fields: Fields, key: string, issues: string[]): string | undefined {
  const value = fields[key]
  if (value === undefined) return undefined
  if (typeof value !== 'string') {
    issues.push(`${key} must be a string`)
    return undefined
  }
  return value
}

function requireHex(
  fields: Fields,
  key: string,
  length: number,
  issues: string[],
  prefix: string,
): string {
  const value = requireString(fields, key, issues, prefix)
  if (value && !new RegExp(`^[0-9a-f]{${length}}$`).test(value)) {
    issues.push(`${prefix}${key} must be ${length} lowercase hex characters`)
  }
  return value
}

function stringList(fields: Fields, key: string, issues: string[]): string[] {
  const value = fields[key]
  if (value === undefined) return []
  if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
    issues.push(`${key} must be a list of strings`)
    return []
  }
  return value
}

function optionalLine(
  fields: Fields,
  key: string,
  issues: string[],
  prefix: string,
): number | undefined {
  const value = fields[key]
  if (value === undefined) return undefined
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    issues.push(`${prefix}${key} must be a positive integer`)
    return undefined
  }
  return value
}

function parseLicenseFiles(value: unknown, issues: string[]): LicenseFile[] {
  if (!Array.isArray(value) || value.length === 0) {
    issues.push('licenseFiles must be a non-empty list')
    return []
  }

  return value.flatMap((entry: unknown, index): LicenseFile[] => {
    const prefix = `licenseFiles[${index}].`
    if (!isFields(entry)) {
      issues.push(`licenseFiles[${index}] must be an object`)
      return []
    }
    const licenseFile: LicenseFile = {
      file: requireString(entry, 'file', issues, prefix),
      md5: requireHex(entry, 'md5', 32, issues, prefix),
    }
    const beginLine = optionalLine(entry, 'beginLine', issues, prefix)
    const endLine = optionalLine(entry, 'endLine', issues, prefix)
    if (beginLine !== undefined) licenseFile.beginLine = beginLine
    if (endLine !== undefined) licenseFile.endLine = endLine
    if (beginLine !== undefined && endLine !== undefined && endLine < beginLine) {
      issues.push(`${prefix}endLine must not be before beginLine`)
    }
    return [licenseFile]
  })
}

/**
 * Validate a decoded recipe manifest. Every problem is collected before
 * throwing, so one run reports all of them.
 */
export function parseRecipe(value: unknown): Recipe {
  if (!isFields(value)) {
    throw new RecipeError('Recipe manifest must be a JSON object')
  }

  const issues: string[] = []

  const source = value['source']
  let pypi = ''
  let sha256: string | undefined
  if (isFields(source)) {
    pypi = requireString(source, 'pypi', issues, 'source.')
    if (source['sha256'] !== undefined) {
      sha256 = requireHex(source, 'sha256', 64, issues, 'source.')
    }
  } else {
    issues.push('source must be an object with a pypi name')
  }

  const classExtend = value['classExtend'] ?? []
  if (!Array.isArray(classExtend) || !classExtend.every(isBuildClass)) {
    issues.push(`classExtend must only contain ${BUILD_CLASSES.join(', ')}`)
  }

  const recipe: Recipe = {
    name: requireString(value, 'name', issues),
    version: requireString(value, 'version', issues),
    summary: requireString(value, 'summary', issues),
    description: optionalString(value, 'description', issues),
    homepage: optionalString(value, 'homepage', issues),
    section: optionalString(value, 'section', issues),
    license: requireString(value, 'license', issues),
    licenseFiles: parseLicenseFiles(value['licenseFiles'], issues),
    source: sha256 === undefined ? { pypi } : { pypi, sha256 },
    inherits: stringList(value, 'inherits', issues),
    depends: stringList(value, 'depends', issues),
    classExtend: Array.isArray(classExtend) ? classExtend.filter(isBuildClass) : [],
  }

  if (issues.length > 0) {
    const name = typeof value['name'] === 'string' ? value['name'] : 'recipe'
    throw new RecipeError(`Invalid recipe ${name}`, issues)
  }

  return recipe
}

export async function loadRecipe(
  name: string,
  recipesDir: string = RECIPES_DIR,
): Promise<Recipe> {
  const manifestPath = join(recipesDir, `${name}.json`)

  let content: string
  try {
    content = await readFile(manifestPath, 'utf-8')
  } catch (error) {
    throw new RecipeError(`Recipe ${name} not found in ${recipesDir}`, [
      error instanceof Error ? error.message : String(error),
    ])
  }

  let decoded: unknown
  try {
    decoded = JSON.parse(content)
  } catch (error) {
    throw new RecipeError(`Recipe ${name} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ])
  }

  return parseRecipe(decoded)
}
