/**
 * Provider - pick the package that satisfies a name
 */

export type {
  ProviderMap,
  IndexLocator,
  NameSet,
  ProvidersOptions,
  ResolveOneOptions,
} from './types'

export {
  ProviderResolver,
  highestPriority,
  shortestProvider,
  type ProviderResolverOptions,
} from './resolver'
