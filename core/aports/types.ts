/**
 * Recipe (APKBUILD) metadata
 */

export interface SubpackageMetadata {
  depends: string[]
  provides: string[]
  providerPriority?: number
}

export interface RecipeMetadata {
  pkgname: string
  pkgver: string
  pkgrel: string
  /** Dependencies as written, constraints included */
  depends: string[]
  provides: string[]
  arch: string[]
  /**
   * Subpackages in declaration order. A subpackage whose function could not
   * be found maps to null.
   */
  subpackages: ReadonlyMap<string, SubpackageMetadata | null>
  providerPriority?: number
}
