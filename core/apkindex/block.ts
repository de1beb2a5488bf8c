/**
 * APKINDEX block parsing
 *
 * An index is a sequence of blocks of `<letter>:<value>` lines, each block
 * terminated by an empty line.
 */

import { ParseError } from '../errors'
import { compare } from '../version'
import type { PackageRecord } from './types'

type Field = 'arch' | 'depends' | 'origin' | 'pkgname' | 'provides' | 'providerPriority' | 'timestamp' | 'version'

const KEYS: Readonly<Record<string, Field>> = {
  A: 'arch',
  D: 'depends',
  o: 'origin',
  P: 'pkgname',
  p: 'provides',
  k: 'providerPriority',
  t: 'timestamp',
  V: 'version',
}

const CONSTRAINT_CHARS = /[<>=~]/

/**
 * Cut at the first operator character, wherever it is:
 * "so:libc.musl-x86_64.so.1=1" -> "so:libc.musl-x86_64.so.1",
 * "mesa<=24" -> "mesa"
 */
export function stripConstraint(entry: string): string {
  const match = CONSTRAINT_CHARS.exec(entry)
  return match ? entry.slice(0, match.index) : entry
}

function splitList(value: string | undefined): string[] {
  if (!value) return []
  return value
    .split(' ')
    .filter((entry) => entry.length > 0)
    .map(stripConstraint)
}

function formatBlock(fields: Map<Field, string>): string {
  return JSON.stringify(Object.fromEntries(fields))
}

function required(fields: Map<Field, string>, key: Field, path: string): string {
  const value = fields.get(key)
  if (value === undefined) {
    throw new ParseError(`Missing required key '${key}' in block ${formatBlock(fields)}, file: ${path}`, {
      path,
      block: formatBlock(fields),
    })
  }
  return value
}

function toRecord(fields: Map<Field, string>, path: string): PackageRecord {
  const arch = required(fields, 'arch', path)
  const pkgname = required(fields, 'pkgname', path)
  const version = required(fields, 'version', path)

  const record: {
    -readonly [K in keyof PackageRecord]: PackageRecord[K]
  } = {
    pkgname,
    version,
    arch,
    depends: splitList(fields.get('depends')),
    provides: splitList(fields.get('provides')),
  }

  const origin = fields.get('origin')
  if (origin !== undefined) record.origin = origin
  const timestamp = fields.get('timestamp')
  if (timestamp !== undefined) record.timestamp = timestamp

  const priority = fields.get('providerPriority')
  if (priority !== undefined) {
    if (!/^-?\d+$/.test(priority.trim())) {
      throw new ParseError(`Invalid provider_priority '${priority}' for ${pkgname}, file: ${path}`, {
        path,
        package: pkgname,
      })
    }
    record.providerPriority = parseInt(priority, 10)
  }

  return Object.freeze(record)
}

/**
 * Parse the text of an APKINDEX (or installed database) into records, in
 * file order. Nothing is filtered or deduplicated.
 *
 * @throws ParseError on a duplicate key, a missing arch/pkgname/version or
 *         a last block without a terminating empty line
 */
export function parseIndexText(text: string, path: string): PackageRecord[] {
  const ret: PackageRecord[] = []
  const lines = text.split('\n')

  // A trailing newline leaves one empty string after the last line
  const hasFinalNewline = lines[lines.length - 1] === ''
  if (hasFinalNewline) lines.pop()

  let fields = new Map<Field, string>()
  for (const [i, line] of lines.entries()) {
    const terminated = i < lines.length - 1 || hasFinalNewline
    if (line === '' && terminated) {
      ret.push(toRecord(fields, path))
      fields = new Map()
      continue
    }

    if (line.charAt(1) !== ':') continue
    const key: Field | undefined = KEYS[line.charAt(0)]
    if (key === undefined) continue

    if (fields.has(key)) {
      throw new ParseError(
        `Key ${key} (${line.charAt(0)}:) specified twice in block: ${formatBlock(fields)}, file: ${path}`,
        { path, block: formatBlock(fields) }
      )
    }
    fields.set(key, line.slice(2))
  }

  if (fields.size > 0) {
    throw new ParseError(
      `Last block in ${path} does not end with a new line! Delete the file and try again. Last block: ${formatBlock(fields)}`,
      { path, block: formatBlock(fields) }
    )
  }

  return ret
}

/**
 * Register a record under `alias` in a repository view. An existing record
 * of the same provider is only kept if its version is higher.
 */
export function addProvider(
  view: Map<string, Map<string, PackageRecord>>,
  record: PackageRecord,
  alias: string = record.pkgname
): void {
  let providers = view.get(alias)
  const old = providers?.get(record.pkgname)
  if (old && compare(old.version, record.version) === 1) return

  if (!providers) {
    providers = new Map()
    view.set(alias, providers)
  }
  providers.set(record.pkgname, record)
}

/**
 * Register a record under `alias` in an installed database view.
 */
export function addInstalled(
  view: Map<string, PackageRecord>,
  record: PackageRecord,
  alias: string = record.pkgname
): void {
  const old = view.get(alias)
  if (old && compare(old.version, record.version) === 1) return
  view.set(alias, record)
}
