/**
 * @marketlens/series-cache
 *
 * TTL caching and in-flight request coalescing for market-data providers.
 */

export { TtlCache, DEFAULT_TTL_MS } from './ttl-cache.js';
export type { TtlCacheOptions, TtlCacheStats, CacheEntry } from './ttl-cache.js';

export { InflightRequests } from './inflight.js';

export { CachedSeriesProvider, seriesCacheKey } from './cached-provider.js';
export type { CachedSeriesProviderOptions } from './cached-provider.js';
