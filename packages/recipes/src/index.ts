// Recipe model
export {
  type BuildClass,
  type CheckStatus,
  type LicenseFile,
  type Recipe,
  type RecipeSource,
  type SourceCheck,
  type VerificationReport,
} from './types.js'

// Loading and validation
export { RECIPES_DIR, RecipeError, loadRecipe, parseRecipe } from './recipe.js'

// Licenses
export {
  type LicenseExpression,
  formatLicenseExpression,
  licenseIds,
  parseLicenseExpression,
} from './license.js'

// Package index sources
export {
  PYPI_SOURCE_ROOT,
  pypiSourceUrl,
  recipeVariants,
  sourceArchiveName,
  sourceDirName,
} from './pypi.js'

// Source verification
export { verifyRecipeSources } from './verify.js'

// CLI
export { createProgram, describeRecipe, main, reportVerification } from './cli.js'
