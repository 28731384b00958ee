import { RecipeError } from './recipe.js'

export type LicenseExpression =
  | { kind: 'license'; id: string }
  | { kind: 'any'; terms: LicenseExpression[] }
  | { kind: 'all'; terms: LicenseExpression[] }

type Token = '|' | '&' | '(' | ')' | { id: string }

function tokenize(expression: string): Token[] {
  const tokens: Token[] = []
  const pattern = /\s*(?:([|&()])|([A-Za-z0-9.+_-]+))/y
  let index = 0

  while (index < expression.length) {
    if (expression.slice(index).trim() === '') break
    pattern.lastIndex = index
    const match = pattern.exec(expression)
    if (!match) {
      throw new RecipeError(
        `Unexpected character in license expression "${expression}" at ${index}`,
      )
    }
    const [whole, operator, id] = match
    if (operator === '|' || operator === '&' || operator === '(' || operator === ')') {
      tokens.push(operator)
    } else if (id) {
      tokens.push({ id })
    }
    index += whole.length
  }

  return tokens
}

/**
 * Parse a license expression such as `GPL-2.0-only | BSD-2-Clause`.
 * `&` binds tighter than `|`; parentheses group.
 */
export function parseLicenseExpression(expression: string): LicenseExpression {
  const tokens = tokenize(expression)
  let position = 0

  const fail = (reason: string): never => {
    throw new RecipeError(`Invalid license expression "${expression}": ${reason}`)
  }

  const parseAny = (): LicenseExpression => {
    const terms = [parseAll()]
    while (tokens[position] === '|') {
      position++
      terms.push(parseAll())
    }
    return terms.length === 1 && terms[0] ? terms[0] : { kind: 'any', terms }
  }

  const parseAll = (): LicenseExpression => {
    const terms = [parseTerm()]
    while (tokens[position] === '&') {
      position++
      terms.push(parseTerm())
    }
    return terms.length === 1 && terms[0] ? terms[0] : { kind: 'all', terms }
  }

  const parseTerm = (): LicenseExpression => {
    const token = tokens[position]
    if (token === undefined) return fail('unexpected end')
    if (token === '(') {
      position++
      const inner = parseAny()
      if (tokens[position] !== ')') return fail('missing )')
      position++
      return inner
    }
    if (typeof token === 'object') {
      position++
      return { kind: 'license', id: token.id }
    }
    return fail(`unexpected "${token}"`)
  }

  const result = parseAny()
  if (position < tokens.length) {
    fail('trailing input')
  }
  return result
}

export function licenseIds(expression: LicenseExpression | string): string[] {
  const parsed =
    typeof expression === 'string' ? parseLicenseExpression(expression) : expression
  if (parsed.kind === 'license') return [parsed.id]
  return [...new Set(parsed.terms.flatMap((term) => licenseIds(term)))]
}

export function formatLicenseExpression(expression: LicenseExpression): string {
  switch (expression.kind) {
    case 'license':
      return expression.id
    case 'all':
      return expression.terms
        .map((term) =>
          term.kind === 'any' ? `(${formatLicenseExpression(term)})` : formatLicenseExpression(term),
        )
        .join(' & ')
    case 'any':
      return expression.terms.map(formatLicenseExpression).join(' | ')
  }
}
