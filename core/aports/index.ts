/**
 * Aports - local recipe tree
 */

export type { RecipeMetadata, SubpackageMetadata } from './types'
export { parseApkbuild, replaceVariables, checkArches } from './apkbuild'
export { RecipeTree, type RecipeTreeOptions } from './tree'
