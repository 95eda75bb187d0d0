import type { AgentResponse, EmbeddingVector, Intent } from '@studyhall/tutor-core';

export interface CacheKey {
  tenantId: string;
  intent: Intent;
  /** Query text; normalized by the cache */
  text: string;
  embedding: EmbeddingVector;
  /** Hash of the retrieval scope the answer was grounded in */
  contextFingerprint: string;
}

export interface CacheEntry {
  id: string;
  namespace: string;
  tenantId: string;
  normalizedText: string;
  embedding: EmbeddingVector;
  response: AgentResponse;
  /** Grounding passages the response was generated from */
  sourceIds: string[];
  createdAt: number;
  lastAccessedAt: number;
  hits: number;
}

export interface CacheLookupResult {
  entry: CacheEntry;
  similarity: number;
}

export interface CacheLookupOutcome {
  hit: CacheLookupResult | null;
  /** The store failed or was too slow; treated as a miss */
  degraded: boolean;
  reason?: string;
}

/**
 * Backing store for cache entries. The SemanticCache owns similarity,
 * TTL and LRU policy; stores only keep entries.
 */
export interface SemanticCacheStore {
  readonly id: string;
  get(id: string): Promise<CacheEntry | undefined>;
  put(entry: CacheEntry): Promise<void>;
  delete(id: string): Promise<boolean>;
  /** Entries of one namespace, or all entries when omitted */
  entries(namespace?: string): Promise<CacheEntry[]>;
  size(): Promise<number>;
  clear(): Promise<void>;
}

export interface SemanticCacheStats {
  size: number;
  maxEntries: number;
  lookups: number;
  hits: number;
  misses: number;
  errors: number;
  stores: number;
  evictions: number;
  expired: number;
  hitRate: number;
}
