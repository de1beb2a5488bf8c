/**
 * Provider resolution types
 */

import type { InstalledIndex, PackageRecord } from '../apkindex'

/**
 * Providers of one capability, keyed by provider pkgname, in index order
 */
export type ProviderMap = ReadonlyMap<string, PackageRecord>

/**
 * Lists the APKINDEX files to search for an architecture, in priority order.
 */
export interface IndexLocator {
  files(arch: string): string[]
}

/**
 * Membership test for package names
 */
export interface NameSet {
  has(name: string): boolean
}

export interface ProvidersOptions {
  /** Index files to search; defaults to the locator's files for `arch` */
  indexes?: readonly string[]
  /** Architecture for the default index list; defaults to the native one */
  arch?: string
  /**
   * Throw PackageNotFoundError when nothing provides the name
   * @default true
   */
  mustExist?: boolean
}

export interface ResolveOneOptions {
  /** Names that are about to be installed */
  install?: NameSet
  /** Installed database of the target environment, read on demand */
  installed?: InstalledIndex | (() => InstalledIndex)
  /** Explicit picks: capability -> provider pkgname */
  overrides?: Readonly<Record<string, string>>
  /** Index files to search; defaults to the locator's files for `arch` */
  indexes?: readonly string[]
  /** Architecture whose indexes are searched */
  arch?: string
}
