/**
 * Index record and view types
 */

/**
 * One package block of an APKINDEX or installed database.
 *
 * `depends` and `provides` hold bare names; version constraints are
 * stripped while parsing. Records without `timestamp` are virtual packages.
 */
export interface PackageRecord {
  readonly pkgname: string
  readonly version: string
  readonly arch: string
  readonly depends: readonly string[]
  readonly provides: readonly string[]
  readonly origin?: string
  readonly timestamp?: string
  readonly providerPriority?: number
}

/**
 * Repository view: capability -> provider pkgname -> record
 */
export type ProviderIndex = ReadonlyMap<string, ReadonlyMap<string, PackageRecord>>

/**
 * Installed database view: capability -> record
 */
export type InstalledIndex = ReadonlyMap<string, PackageRecord>

/**
 * Cache slots kept per index file
 */
export interface IndexViews {
  multiple: ProviderIndex
  single: InstalledIndex
}

/**
 * File metadata the parser needs; null when the path is not a regular file.
 */
export type StatFn = (path: string) => { mtimeMs: number } | null

export type ReadFileFn = (path: string) => Uint8Array
