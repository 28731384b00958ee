import type { Recipe } from './types.js'

export const PYPI_SOURCE_ROOT = 'https://files.pythonhosted.org/packages/source'

export function sourceDirName(recipe: Recipe): string {
  return `${recipe.source.pypi}-${recipe.version}`
}

export function sourceArchiveName(recipe: Recipe): string {
  return `${sourceDirName(recipe)}.tar.gz`
}

export function pypiSourceUrl(recipe: Recipe): string {
  const { pypi } = recipe.source
  return `${PYPI_SOURCE_ROOT}/${pypi.charAt(0)}/${pypi}/${sourceArchiveName(recipe)}`
}

/**
 * Recipe names the package can be built under: the target recipe plus one
 * per extended build class.
 */
export function recipeVariants(recipe: Recipe): string[] {
  const variants = [recipe.name]
  if (recipe.classExtend.includes('native')) {
    variants.push(`${recipe.name}-native`)
  }
  if (recipe.classExtend.includes('nativesdk')) {
    variants.push(`nativesdk-${recipe.name}`)
  }
  return variants
}
