export { CacheLayer, cacheKeyId } from './cache-layer';
export type { CacheEntry, CacheKey, CacheOptions, CacheStats, Computed } from './cache-layer';
