/**
 * Version - apk version ordering
 *
 * Tokenizer, comparison and constraint checks that order versions the way
 * apk does.
 */

// Types
export type {
  TokenKind,
  Token,
  CompareResult,
  ConstraintOperator,
} from './types'
export { TOKEN_ORDER } from './types'

// Tokenizer
export { getToken, nextToken, parseSuffix } from './token'

// Comparison
export {
  compare,
  validate,
  lt,
  gt,
  eq,
  lte,
  gte,
  sortVersions,
  rsortVersions,
  maxVersion,
  checkConstraint,
  removeOperators,
} from './compare'
