/**
 * apkdeps - package metadata engine
 *
 * Version ordering, index parsing, provider selection and dependency
 * recursion for apk based distributions. Everything here is synchronous.
 */

// Version - apk version ordering
export * as version from './version'
export type { CompareResult, ConstraintOperator, TokenKind } from './version'
export { compare, validate, checkConstraint, removeOperators } from './version'

// APKINDEX - index parsing
export * as apkindex from './apkindex'
export type { PackageRecord, ProviderIndex, InstalledIndex } from './apkindex'
export { IndexParser, parseIndexText } from './apkindex'

// Provider - provider selection
export * as provider from './provider'
export type { ProviderMap, IndexLocator, NameSet } from './provider'
export { ProviderResolver, highestPriority, shortestProvider } from './provider'

// Depends - dependency recursion
export * as depends from './depends'
export type { RecipeSource, InstalledSource, ResolvedPackage, PackageInfo } from './depends'
export { DependencyResolver } from './depends'

// Aports - local recipe tree
export * as aports from './aports'
export type { RecipeMetadata } from './aports'
export { RecipeTree, parseApkbuild, checkArches } from './aports'

// Repository and installed database locations
export { repositoryHash, repositoryUrls, apkindexFiles, RepositoryIndexes } from './repo'
export { installedPath, archForEnvironment, InstalledPackages } from './installed'

// Tarball - index archive reading
export * as tarball from './tarball'

// Cache - mtime keyed view cache
export { IndexCache, type IndexCacheOptions, type IndexCacheStats } from './cache'

// Errors - structured error types
export * from './errors'

// Logging and configuration
export { createLogger, silentLogger, type Logger, type LogLevel } from './log'
export { resolveConfig, defaultConfig, BUILD_DEVICE_ARCHES, type ApkdepsConfig, type ConfigOverrides } from './config'

// Engine wiring
export { createEngine, type Engine, type EngineOptions } from './engine'
