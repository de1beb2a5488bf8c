/**
 * Collaborators of the dependency recursion
 */

import type { InstalledIndex } from '../apkindex'
import type { RecipeMetadata } from '../aports'

export type { IndexLocator, NameSet } from '../provider'

/**
 * Local recipe lookup
 */
export interface RecipeSource {
  /** Directory of the recipe building `name`, or null */
  find(name: string): string | null
  parse(dir: string): RecipeMetadata
}

/**
 * Installed database of an environment
 */
export interface InstalledSource {
  get(environment: string): InstalledIndex
}

/**
 * What the recursion needs to know about a package, from either a recipe
 * or a binary index
 */
export interface ResolvedPackage {
  readonly pkgname: string
  readonly version: string
  readonly depends: readonly string[]
}

/**
 * A package as the lookup across recipes and indexes of every
 * architecture reports it
 */
export interface PackageInfo {
  readonly pkgname: string
  readonly version: string
  readonly depends: readonly string[]
  readonly provides: readonly string[]
  /** The recipe's arch list, or the single arch of a binary record */
  readonly arch: readonly string[]
}
