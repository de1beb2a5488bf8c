/**
 * Version Comparison Functions
 *
 * apk version ordering: compare, validate, and test version relationships.
 */

import { ValidationError } from '../errors'
import { getToken } from './token'
import { TOKEN_ORDER, type CompareResult, type ConstraintOperator, type TokenKind } from './types'

/**
 * Check whether a version string is valid.
 */
export function validate(version: string): boolean {
  let current: TokenKind = 'digit'
  let pos = 0
  while (current !== 'end') {
    const token = getToken(current, version, pos)
    current = token.kind
    pos = token.pos
    if (current === 'invalid') {
      return false
    }
  }
  return true
}

/**
 * Compare two versions.
 * Returns:
 *  - -1 if a < b
 *  -  0 if a == b
 *  -  1 if a > b
 *
 * With `fuzzy`, versions whose values agree but end on different token
 * kinds are equal ("1.2" ~ "1.2.3").
 */
export function compare(a: string, b: string, fuzzy = false): CompareResult {
  let aToken: TokenKind = 'digit'
  let bToken: TokenKind = 'digit'
  let aValue = 0
  let bValue = 0
  let aPos = 0
  let bPos = 0

  // Walk both strings until one ends, or the current token differs
  while (aToken === bToken && aToken !== 'end' && aToken !== 'invalid' && aValue === bValue) {
    const at = getToken(aToken, a, aPos)
    const bt = getToken(bToken, b, bPos)
    aToken = at.kind
    aValue = at.value
    aPos = at.pos
    bToken = bt.kind
    bValue = bt.value
    bPos = bt.pos
  }

  if (aValue < bValue) return -1
  if (aValue > bValue) return 1

  if (aToken === bToken || fuzzy) return 0

  // Equal so far: the longer version wins, unless it continues with a
  // pre-release suffix
  if (aToken === 'suffix') {
    const at = getToken(aToken, a, aPos)
    aToken = at.kind
    if (at.value < 0) return -1
  }
  if (bToken === 'suffix') {
    const bt = getToken(bToken, b, bPos)
    bToken = bt.kind
    if (bt.value < 0) return 1
  }

  // Lower kind means more components follow, e.g. digit_or_zero vs end
  if (TOKEN_ORDER[aToken] > TOKEN_ORDER[bToken]) return -1
  if (TOKEN_ORDER[aToken] < TOKEN_ORDER[bToken]) return 1

  return 0
}

/**
 * a < b
 */
export function lt(a: string, b: string): boolean {
  return compare(a, b) === -1
}

/**
 * a > b
 */
export function gt(a: string, b: string): boolean {
  return compare(a, b) === 1
}

/**
 * a == b
 */
export function eq(a: string, b: string): boolean {
  return compare(a, b) === 0
}

/**
 * a <= b
 */
export function lte(a: string, b: string): boolean {
  return compare(a, b) <= 0
}

/**
 * a >= b
 */
export function gte(a: string, b: string): boolean {
  return compare(a, b) >= 0
}

/**
 * Sort versions ascending (returns a new array)
 */
export function sortVersions(versions: readonly string[]): string[] {
  return [...versions].sort((a, b) => compare(a, b))
}

/**
 * Sort versions descending (returns a new array)
 */
export function rsortVersions(versions: readonly string[]): string[] {
  return [...versions].sort((a, b) => compare(b, a))
}

/**
 * Highest version, or null for an empty list. Ties keep the first.
 */
export function maxVersion(versions: readonly string[]): string | null {
  let best: string | null = null
  for (const version of versions) {
    if (best === null || compare(version, best) === 1) {
      best = version
    }
  }
  return best
}

// Longer operators first so ">=" is not read as ">"
const CONSTRAINT_OPERATORS: readonly ConstraintOperator[] = ['>=', '<=', '>', '<', '=', '~']

/**
 * Check a version against a rule such as ">=1.0.0", "<4.0" or "~5.2".
 *
 * @throws ValidationError when the rule has no known operator
 */
export function checkConstraint(version: string, rule: string): boolean {
  const operator = CONSTRAINT_OPERATORS.find((op) => rule.startsWith(op))
  const target = operator ? rule.slice(operator.length) : ''
  if (!operator || !target) {
    throw new ValidationError(`Could not find operator and version in '${rule}'`)
  }

  switch (operator) {
    case '>=':
      return compare(version, target) >= 0
    case '<=':
      return compare(version, target) <= 0
    case '>':
      return compare(version, target) === 1
    case '<':
      return compare(version, target) === -1
    case '=':
      return compare(version, target) === 0
    case '~':
      return compare(version, target, true) === 0
  }
}

const DEPEND_OPERATORS = ['>', '>=', '<=', '=', '<', '~'] as const

/**
 * Strip the version constraint from a dependency spec: "foo>=1.2" -> "foo".
 * Operators are tried in a fixed order and the first one present wins.
 */
export function removeOperators(spec: string): string {
  for (const operator of DEPEND_OPERATORS) {
    const idx = spec.indexOf(operator)
    if (idx !== -1) {
      return spec.slice(0, idx)
    }
  }
  return spec
}
