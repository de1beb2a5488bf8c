/**
 * APKBUILD reader
 *
 * Reads top-level shell assignments and the assignments inside subpackage
 * functions. This is not a shell: loops, conditionals and command
 * substitution are left alone.
 */

import { ParseError } from '../errors'
import { silentLogger, type Logger } from '../log'
import type { RecipeMetadata, SubpackageMetadata } from './types'

const ASSIGNMENT = /^([a-zA-Z_][a-zA-Z0-9_]*)=(.*)$/

// ${foo}
const VAR_BRACED = /\$\{([a-zA-Z_]+[a-zA-Z0-9_]*)\}/g
// $foo
const VAR_PLAIN = /\$([a-zA-Z_]+[a-zA-Z0-9_]*)/g
// ${var/foo/bar}, ${var/foo/}, ${var/foo}
const VAR_REPLACE = /\$\{([a-zA-Z_]+[a-zA-Z0-9_]*)\/([^/]+)(?:\/([^/]*?))?\}/g
// ${foo#bar}
const VAR_CUT_PREFIX = /\$\{([a-zA-Z_]+[a-zA-Z0-9_]*)#(.*)\}/g

type Vars = Map<string, string>

interface Context {
  path: string
  logger: Logger
}

function replaceFirst(value: string, search: string, replacement: string): string {
  return value.replace(search, () => replacement)
}

/**
 * Substitute variables that were assigned before. Unknown variables are
 * left in place.
 */
export function replaceVariables(vars: Vars, value: string, logger: Logger = silentLogger): string {
  const pkgname = vars.get('pkgname') ?? ''
  const notFound = (match: RegExpMatchArray): void => {
    logger.verbose(`${pkgname}: key '${match[1]}' for replacing '${match[0]}' not found, ignoring`)
  }

  for (const match of [...value.matchAll(VAR_BRACED)]) {
    const replacement = vars.get(match[1] ?? '')
    if (replacement === undefined) {
      notFound(match)
      continue
    }
    value = replaceFirst(value, match[0], replacement)
  }

  for (const match of [...value.matchAll(VAR_PLAIN)]) {
    const replacement = vars.get(match[1] ?? '')
    if (replacement === undefined) {
      notFound(match)
      continue
    }
    value = replaceFirst(value, match[0], replacement)
  }

  for (const match of [...value.matchAll(VAR_REPLACE)]) {
    const current = vars.get(match[1] ?? '')
    if (current === undefined) {
      notFound(match)
      continue
    }
    const replaced = replaceFirst(current, match[2] ?? '', match[3] ?? '')
    value = replaceFirst(value, match[0], replaced)
  }

  for (const match of [...value.matchAll(VAR_CUT_PREFIX)]) {
    const current = vars.get(match[1] ?? '')
    if (current === undefined) {
      notFound(match)
      continue
    }
    const prefix = match[2] ?? ''
    const cut = current.startsWith(prefix) ? current.slice(prefix.length) : current
    value = replaceFirst(value, match[0], cut)
  }

  return value
}

/**
 * Read the value of the assignment on line `i`. Quoted values may span
 * lines; unquoted values end at a `#` comment.
 *
 * @returns the raw value and the index of the last line it used
 */
function readValue(lines: readonly string[], i: number, raw: string, name: string, ctx: Context): { value: string; end: number } {
  const quote = raw.startsWith("'") || raw.startsWith('"') ? raw.charAt(0) : ''
  if (!quote) {
    return { value: (raw.split('#')[0] ?? '').trimEnd(), end: i }
  }

  let value = raw.slice(1)
  const close = value.indexOf(quote)
  if (close !== -1) {
    return { value: value.slice(0, close), end: i }
  }

  for (let j = i + 1; j < lines.length; j++) {
    const line = lines[j] ?? ''
    value += ' '
    const idx = line.indexOf(quote)
    if (idx !== -1) {
      value += line.slice(0, idx).trim()
      return { value: value.trim(), end: j }
    }
    value += line.trim()
  }

  throw new ParseError(`Can't find closing quote sign (${quote}) for attribute '${name}' in: ${ctx.path}`, {
    path: ctx.path,
  })
}

function readAssignments(lines: readonly string[], vars: Vars, ctx: Context): void {
  for (let i = 0; i < lines.length; i++) {
    const match = ASSIGNMENT.exec(lines[i] ?? '')
    if (!match) continue

    const name = match[1] ?? ''
    const { value, end } = readValue(lines, i, match[2] ?? '', name, ctx)
    vars.set(name, replaceVariables(vars, value, ctx.logger))
    i = end
  }
}

function splitWords(value: string | undefined): string[] {
  return (value ?? '').split(/\s+/).filter((word) => word.length > 0)
}

function parseInteger(value: string | undefined, name: string, ctx: Context): number | undefined {
  if (!value) return undefined
  if (!/^-?\d+$/.test(value)) {
    throw new ParseError(`Invalid ${name} '${value}' in: ${ctx.path}`, { path: ctx.path })
  }
  return parseInt(value, 10)
}

/**
 * Read a subpackage function. Entries look like "name", "name:function"
 * or "name:function:arch"; without a function name the last dash-separated
 * word of the subpackage name is used.
 */
function readSubpackage(
  lines: readonly string[],
  vars: Vars,
  entry: string,
  ctx: Context
): [string, SubpackageMetadata | null] {
  const parts = entry.split(':')
  const subpkgname = parts[0] ?? ''
  const func = parts[1] ? parts[1] : subpkgname.slice(subpkgname.lastIndexOf('-') + 1)
  const prefix = `${func}() {`

  let start = 0
  let end = 0
  for (const [i, line] of lines.entries()) {
    if (line.startsWith(prefix)) {
      start = i + 1
    } else if (start && line.startsWith('}')) {
      end = i
      break
    }
  }

  if (!start) {
    ctx.logger.verbose(
      `${vars.get('pkgname') ?? ''}: subpackage function '${func}' for subpackage '${subpkgname}' not found, ignoring`
    )
    return [subpkgname, null]
  }
  if (!end) {
    throw new ParseError(
      `Could not find end of subpackage function, no line starts with '}' after '${prefix}' in ${ctx.path}`,
      { path: ctx.path, package: subpkgname }
    )
  }

  // Package attributes are not inherited from the main package
  const scope: Vars = new Map(vars)
  scope.set('subpkgname', subpkgname)
  scope.delete('depends')
  scope.delete('provides')
  scope.delete('provider_priority')

  const body = lines.slice(start, end).map((line) => line.trim())
  readAssignments(body, scope, ctx)

  const metadata: SubpackageMetadata = {
    depends: splitWords(scope.get('depends')),
    provides: splitWords(scope.get('provides')),
  }
  const priority = parseInteger(scope.get('provider_priority'), 'provider_priority', ctx)
  if (priority !== undefined) metadata.providerPriority = priority

  return [subpkgname, metadata]
}

/**
 * Parse the text of an APKBUILD.
 *
 * @throws ParseError on CRLF line endings, an unterminated quote or an
 *         unterminated subpackage function
 */
export function parseApkbuild(text: string, path: string, logger: Logger = silentLogger): RecipeMetadata {
  const ctx: Context = { path, logger }
  if (text.includes('\r')) {
    throw new ParseError(`Wrong line endings in APKBUILD: ${path}`, { path })
  }

  const lines = text.split('\n')
  const vars: Vars = new Map()
  readAssignments(lines, vars, ctx)

  const subpackages = new Map<string, SubpackageMetadata | null>()
  for (const entry of splitWords(vars.get('subpackages'))) {
    const [name, metadata] = readSubpackage(lines, vars, entry, ctx)
    subpackages.set(name, metadata)
  }

  const recipe: RecipeMetadata = {
    pkgname: vars.get('pkgname') ?? '',
    pkgver: vars.get('pkgver') ?? '',
    pkgrel: vars.get('pkgrel') ?? '',
    depends: splitWords(vars.get('depends')),
    provides: splitWords(vars.get('provides')),
    arch: splitWords(vars.get('arch')),
    subpackages,
  }
  const priority = parseInteger(vars.get('provider_priority'), 'provider_priority', ctx)
  if (priority !== undefined) recipe.providerPriority = priority

  return recipe
}

/**
 * Whether a recipe's arch list allows building for `arch`. "!arch" denies
 * it; "all" and "noarch" allow everything else.
 */
export function checkArches(arches: readonly string[], arch: string): boolean {
  if (arches.includes(`!${arch}`)) return false
  for (const value of [arch, 'all', 'noarch']) {
    if (arches.includes(value)) return true
  }
  return false
}
