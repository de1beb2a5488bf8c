export { IndexCache, type IndexCacheOptions, type IndexCacheStats } from './index-cache'
