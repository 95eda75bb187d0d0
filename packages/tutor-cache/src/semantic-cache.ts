/**
 * Semantic Cache
 *
 * Similarity-keyed cache for agent responses. Entries are grouped by
 * namespace (tenant, intent, context fingerprint); a lookup only returns
 * the nearest entry of its own namespace, and only at or above the
 * similarity threshold.
 *
 * Eviction: absolute TTL checked on read, plus an LRU bound on the total
 * number of entries.
 */

import {
  CacheError,
  CancelledError,
  cosineSimilarity,
  getCategoryLogger,
  normalizeQueryText,
  shortHash,
  withTimeout,
  type AgentResponse,
  type Logger,
} from '@studyhall/tutor-core';
import { InMemorySemanticCacheStore } from './store/in-memory-store.js';
import type {
  CacheEntry,
  CacheKey,
  CacheLookupOutcome,
  CacheLookupResult,
  SemanticCacheStats,
  SemanticCacheStore,
} from './types.js';

export interface SemanticCacheOptions {
  store?: SemanticCacheStore;
  similarityThreshold?: number;
  ttlMs?: number;
  maxEntries?: number;
  lookupTimeoutMs?: number;
  logger?: Logger;
  /** Clock, replaceable in tests */
  now?: () => number;
}

const DEFAULT_OPTIONS = {
  similarityThreshold: 0.92,
  ttlMs: 60 * 60 * 1000, // 1 hour
  maxEntries: 1000,
  lookupTimeoutMs: 150,
};

export function cacheNamespace(key: Pick<CacheKey, 'tenantId' | 'intent' | 'contextFingerprint'>): string {
  return `${key.tenantId}:${key.intent}:${key.contextFingerprint}`;
}

export class SemanticCache {
  private readonly backing: SemanticCacheStore;
  private readonly similarityThreshold: number;
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly lookupTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private counters = { lookups: 0, hits: 0, misses: 0, errors: 0, stores: 0, evictions: 0, expired: 0 };

  constructor(options: SemanticCacheOptions = {}) {
    this.backing = options.store ?? new InMemorySemanticCacheStore();
    this.similarityThreshold = options.similarityThreshold ?? DEFAULT_OPTIONS.similarityThreshold;
    this.ttlMs = options.ttlMs ?? DEFAULT_OPTIONS.ttlMs;
    this.maxEntries = options.maxEntries ?? DEFAULT_OPTIONS.maxEntries;
    this.lookupTimeoutMs = options.lookupTimeoutMs ?? DEFAULT_OPTIONS.lookupTimeoutMs;
    this.logger = getCategoryLogger('cache', options.logger);
    this.now = options.now ?? Date.now;
  }

  get threshold(): number {
    return this.similarityThreshold;
  }

  /**
   * Nearest entry in the key's namespace at or above the threshold
   */
  async lookup(key: CacheKey, signal?: AbortSignal): Promise<CacheLookupResult | null> {
    return (await this.lookupWithStatus(key, signal)).hit;
  }

  /**
   * Like lookup, but reports whether a miss came from a store failure
   */
  async lookupWithStatus(key: CacheKey, signal?: AbortSignal): Promise<CacheLookupOutcome> {
    this.counters.lookups++;
    try {
      const hit = await withTimeout(() => this.findNearest(key), {
        step: 'cache lookup',
        timeoutMs: this.lookupTimeoutMs,
        signal,
      });
      if (hit) {
        this.counters.hits++;
      } else {
        this.counters.misses++;
      }
      return { hit, degraded: false };
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      this.counters.misses++;
      this.counters.errors++;
      const failure = toCacheError('lookup', error);
      this.logger.warn(
        { code: 'CACHE_ERROR', tenantId: key.tenantId, err: failure.message },
        'Cache lookup failed, treating as miss',
      );
      return { hit: null, degraded: true, reason: failure.message };
    }
  }

  /**
   * Store a response. Idempotent per namespace and normalized text:
   * a second store updates the entry and keeps its hit count.
   * The response is copied, so later changes by the caller do not reach
   * the cache. Backing store failures are raised as CacheError.
   */
  async store(key: CacheKey, response: AgentResponse, sourceIds: string[] = []): Promise<CacheEntry> {
    const namespace = cacheNamespace(key);
    const normalizedText = normalizeQueryText(key.text);
    const id = shortHash(`${namespace}\n${normalizedText}`);
    const now = this.now();

    try {
      const existing = await this.backing.get(id);
      const entry: CacheEntry = {
        id,
        namespace,
        tenantId: key.tenantId,
        normalizedText,
        embedding: structuredClone(key.embedding),
        response: structuredClone(response),
        sourceIds: [...sourceIds],
        createdAt: now,
        lastAccessedAt: now,
        hits: existing?.hits ?? 0,
      };

      await this.backing.put(entry);
      this.counters.stores++;
      await this.enforceCapacity();
      this.logger.debug({ namespace, id, updated: Boolean(existing) }, 'Cache entry stored');
      return entry;
    } catch (error) {
      this.counters.errors++;
      throw toCacheError('store', error);
    }
  }

  /**
   * Drop every entry of a tenant (e.g. after re-ingesting its corpus)
   */
  async invalidateTenant(tenantId: string): Promise<number> {
    let removed = 0;
    for (const entry of await this.backing.entries()) {
      if (entry.tenantId === tenantId && (await this.backing.delete(entry.id))) {
        removed++;
      }
    }
    this.logger.info({ tenantId, removed }, 'Cache invalidated for tenant');
    return removed;
  }

  async clear(): Promise<void> {
    await this.backing.clear();
  }

  async stats(): Promise<SemanticCacheStats> {
    const { lookups, hits } = this.counters;
    return {
      ...this.counters,
      size: await this.backing.size(),
      maxEntries: this.maxEntries,
      hitRate: lookups > 0 ? hits / lookups : 0,
    };
  }

  private async findNearest(key: CacheKey): Promise<CacheLookupResult | null> {
    const now = this.now();
    let best: CacheLookupResult | null = null;

    for (const entry of await this.backing.entries(cacheNamespace(key))) {
      if (now - entry.createdAt > this.ttlMs) {
        await this.backing.delete(entry.id);
        this.counters.expired++;
        continue;
      }
      if (entry.embedding.dim !== key.embedding.dim) {
        continue;
      }
      const similarity = cosineSimilarity(key.embedding.values, entry.embedding.values);
      if (similarity >= this.similarityThreshold && (!best || similarity > best.similarity)) {
        best = { entry, similarity };
      }
    }

    if (!best) {
      return null;
    }

    const updated: CacheEntry = {
      ...best.entry,
      hits: best.entry.hits + 1,
      lastAccessedAt: now,
    };
    await this.backing.put(updated);
    return { entry: { ...updated, response: structuredClone(updated.response) }, similarity: best.similarity };
  }

  private async enforceCapacity(): Promise<void> {
    let size = await this.backing.size();
    if (size <= this.maxEntries) {
      return;
    }

    const byRecency = (await this.backing.entries()).sort(
      (a, b) => a.lastAccessedAt - b.lastAccessedAt || a.createdAt - b.createdAt,
    );
    for (const entry of byRecency) {
      if (size <= this.maxEntries) {
        break;
      }
      if (await this.backing.delete(entry.id)) {
        size--;
        this.counters.evictions++;
      }
    }
  }
}

function toCacheError(operation: 'lookup' | 'store', error: unknown): CacheError {
  if (error instanceof CacheError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const failure = new CacheError(message, { operation });
  failure.cause = error;
  return failure;
}
