/**
 * Version Types
 *
 * Type definitions for apk version strings.
 */

/**
 * Token kinds, in the order apk ranks them. A later kind following an
 * earlier one is a normal transition; going backwards is only allowed for
 * three pairs (see `nextToken`).
 */
export type TokenKind =
  | 'invalid'
  | 'digit_or_zero'
  | 'digit'
  | 'letter'
  | 'suffix'
  | 'suffix_no'
  | 'revision_no'
  | 'end'

export const TOKEN_ORDER: Readonly<Record<TokenKind, number>> = {
  invalid: -1,
  digit_or_zero: 0,
  digit: 1,
  letter: 2,
  suffix: 3,
  suffix_no: 4,
  revision_no: 5,
  end: 6,
}

/**
 * A token read from a version string: the kind of the token that comes
 * next, the value of the one just consumed, and the cursor after it.
 */
export interface Token {
  kind: TokenKind
  value: number
  pos: number
}

/**
 * Comparison result: -1 (less), 0 (equal), 1 (greater)
 */
export type CompareResult = -1 | 0 | 1

/**
 * Constraint operators accepted by `checkConstraint`
 */
export type ConstraintOperator = '>=' | '<=' | '>' | '<' | '=' | '~'
