/**
 * @studyhall/tutor-cache
 * Semantic response cache with pluggable stores
 */

export { SemanticCache, cacheNamespace, type SemanticCacheOptions } from './semantic-cache.js';
export { InMemorySemanticCacheStore } from './store/in-memory-store.js';
export type {
  CacheEntry,
  CacheKey,
  CacheLookupOutcome,
  CacheLookupResult,
  SemanticCacheStats,
  SemanticCacheStore,
} from './types.js';
