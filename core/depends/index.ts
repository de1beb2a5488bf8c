/**
 * Depends - flatten requested packages into an install plan
 */

export type {
  RecipeSource,
  InstalledSource,
  IndexLocator,
  NameSet,
  ResolvedPackage,
  PackageInfo,
} from './types'

export { DependencyResolver, type DependencyResolverOptions } from './resolver'
