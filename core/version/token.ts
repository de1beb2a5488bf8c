/**
 * Version tokenizer
 *
 * A cursor-based state machine over an apk version string. Nothing here
 * throws: an unparseable token is reported as kind `invalid`.
 */

import { TOKEN_ORDER, type Token, type TokenKind } from './types'

const PRE_SUFFIXES = ['alpha', 'beta', 'pre', 'rc'] as const
const POST_SUFFIXES = ['cvs', 'svn', 'git', 'hg', 'p'] as const

const CHAR_0 = 48
const CHAR_9 = 57

function isDigit(input: string, pos: number): boolean {
  const c = input.charCodeAt(pos)
  return c >= CHAR_0 && c <= CHAR_9
}

function isLower(input: string, pos: number): boolean {
  const ch = input.charAt(pos)
  return ch !== '' && ch !== ch.toUpperCase() && ch === ch.toLowerCase()
}

/**
 * Whether `next` may follow `previous` even though it ranks lower.
 */
function isAllowedBackward(previous: TokenKind, next: TokenKind): boolean {
  return (
    (next === 'digit_or_zero' && previous === 'digit') ||
    (next === 'suffix' && previous === 'suffix_no') ||
    (next === 'digit' && previous === 'letter')
  )
}

/**
 * Determine the kind of the upcoming token and skip its separator, if any.
 * The token's own characters are left for `getToken`.
 */
export function nextToken(previous: TokenKind, input: string, pos: number): { kind: TokenKind; pos: number } {
  let next: TokenKind = 'invalid'

  if (pos >= input.length) {
    next = 'end'
  } else if ((previous === 'digit' || previous === 'digit_or_zero') && isLower(input, pos)) {
    next = 'letter'
  } else if (previous === 'letter' && isDigit(input, pos)) {
    next = 'digit'
  } else if (previous === 'suffix' && isDigit(input, pos)) {
    next = 'suffix_no'
  } else {
    const ch = input.charAt(pos)
    if (ch === '.') {
      next = 'digit_or_zero'
    } else if (ch === '_') {
      next = 'suffix'
    } else if (input.startsWith('-r', pos)) {
      next = 'revision_no'
      pos++
    }
    pos++
  }

  if (TOKEN_ORDER[next] < TOKEN_ORDER[previous] && !isAllowedBackward(previous, next)) {
    next = 'invalid'
  }
  return { kind: next, pos }
}

/**
 * Match a suffix keyword at `pos`. Pre-release suffixes are negative,
 * post-release suffixes are their index.
 */
export function parseSuffix(input: string, pos: number): { value: number; pos: number } | null {
  for (const [i, suffix] of PRE_SUFFIXES.entries()) {
    if (input.startsWith(suffix, pos)) {
      return { value: i - PRE_SUFFIXES.length, pos: pos + suffix.length }
    }
  }
  for (const [i, suffix] of POST_SUFFIXES.entries()) {
    if (input.startsWith(suffix, pos)) {
      return { value: i, pos: pos + suffix.length }
    }
  }
  return null
}

/**
 * Consume the token announced by `previous`, return its value and the kind
 * of the token after it.
 */
export function getToken(previous: TokenKind, input: string, pos: number): Token {
  let value = 0
  let next: TokenKind = 'invalid'
  let invalidSuffix = false

  if (pos >= input.length) {
    return { kind: 'end', value: 0, pos }
  }

  if (previous === 'digit_or_zero' && input.charCodeAt(pos) === CHAR_0) {
    // Every leading zero lowers the value, the rest is the next digit token
    while (pos < input.length && input.charCodeAt(pos) === CHAR_0) {
      pos++
      value--
    }
    next = 'digit'
  } else if (
    previous === 'digit_or_zero' ||
    previous === 'digit' ||
    previous === 'suffix_no' ||
    previous === 'revision_no'
  ) {
    while (pos < input.length && isDigit(input, pos)) {
      value = value * 10 + (input.charCodeAt(pos) - CHAR_0)
      pos++
    }
  } else if (previous === 'letter') {
    value = input.charCodeAt(pos)
    pos++
  } else if (previous === 'suffix') {
    const suffix = parseSuffix(input, pos)
    if (suffix) {
      value = suffix.value
      pos = suffix.pos
    } else {
      invalidSuffix = true
    }
  } else {
    value = -1
  }

  if (pos >= input.length) {
    next = 'end'
  } else if (next === 'invalid' && !invalidSuffix) {
    const upcoming = nextToken(previous, input, pos)
    next = upcoming.kind
    pos = upcoming.pos
  }

  return { kind: next, value, pos }
}
