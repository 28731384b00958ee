import type { Recipe } from '../src/types.js'

export function sampleRecipe(overrides: Partial<Recipe> = {}): Recipe {
  return {
    name: 'python3-pylibfdt',
    version: '1.7.2',
    summary: 'Python Library for the Device Tree Compiler',
    license: 'GPL-2.0-only | BSD-2-Clause',
    licenseFiles: [
      { file: 'GPL', md5: '0'.repeat(32) },
      { file: 'BSD-2-Clause', md5: '0'.repeat(32) },
    ],
    source: { pypi: 'pylibfdt', sha256: '0'.repeat(64) },
    inherits: ['pypi', 'setuptools3'],
    depends: ['python3-setuptools-scm-native', 'swig-native'],
    classExtend: ['native', 'nativesdk'],
    ...overrides,
  }
}
