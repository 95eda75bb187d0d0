import { describe, it, expect } from 'vitest';
import { CacheError, CancelledError, type AgentResponse, type EmbeddingVector } from '@studyhall/tutor-core';
import { SemanticCache } from '../semantic-cache.js';
import { InMemorySemanticCacheStore } from '../store/in-memory-store.js';
import type { CacheKey, SemanticCacheStore } from '../types.js';

function vec(...values: number[]): EmbeddingVector {
  return { dim: values.length, values };
}

function key(text: string, embedding: EmbeddingVector, overrides: Partial<CacheKey> = {}): CacheKey {
  return {
    tenantId: 't1',
    intent: 'explain',
    text,
    embedding,
    contextFingerprint: 'fp-algebra-8',
    ...overrides,
  };
}

function response(text: string): AgentResponse {
  return {
    specialist: 'content',
    payload: { text },
    latencyMs: 10,
    provenance: 'generated',
    meta: { requestId: 'rq-1', intent: 'explain', specialistsRun: ['content'], providers: ['primary'], warnings: [] },
  };
}

function createClock(start = 1_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('SemanticCache', () => {
  it('returns a near-duplicate at or above the threshold', async () => {
    const cache = new SemanticCache({ similarityThreshold: 0.9 });
    await cache.store(key('Explain quadratic equations', vec(1, 0)), response('cached'));

    const hit = await cache.lookup(key('explain quadratic equations please', vec(0.95, 0.05)));

    expect(hit?.entry.response.payload.text).toBe('cached');
    expect(hit?.similarity).toBeGreaterThanOrEqual(0.9);
    expect(hit?.entry.hits).toBe(1);
  });

  it('misses below the threshold', async () => {
    const cache = new SemanticCache({ similarityThreshold: 0.92 });
    await cache.store(key('Explain quadratic equations', vec(1, 0)), response('cached'));

    // cos([1,0],[0.8,0.6]) = 0.8
    expect(await cache.lookup(key('Explain linear equations', vec(0.8, 0.6)))).toBeNull();
  });

  it('accepts a similarity exactly at the threshold', async () => {
    const cache = new SemanticCache({ similarityThreshold: 0.6 });
    await cache.store(key('a', vec(1, 0)), response('cached'));

    // cos([1,0],[3,4]) = 3/5
    expect(await cache.lookup(key('b', vec(3, 4)))).not.toBeNull();
  });

  it('returns the nearest entry when several qualify', async () => {
    const cache = new SemanticCache({ similarityThreshold: 0.5 });
    await cache.store(key('first', vec(0.8, 0.6)), response('farther'));
    await cache.store(key('second', vec(1, 0.05)), response('nearest'));

    const hit = await cache.lookup(key('query', vec(1, 0)));
    expect(hit?.entry.response.payload.text).toBe('nearest');
  });

  it('scopes entries by tenant, intent and context fingerprint', async () => {
    const cache = new SemanticCache();
    await cache.store(key('Explain quadratic equations', vec(1, 0)), response('cached'));

    expect(await cache.lookup(key('Explain quadratic equations', vec(1, 0), { tenantId: 't2' }))).toBeNull();
    expect(await cache.lookup(key('Explain quadratic equations', vec(1, 0), { intent: 'solve' }))).toBeNull();
    expect(
      await cache.lookup(key('Explain quadratic equations', vec(1, 0), { contextFingerprint: 'fp-algebra-9' })),
    ).toBeNull();
  });

  it('stores idempotently and keeps hit counts', async () => {
    const store = new InMemorySemanticCacheStore();
    const cache = new SemanticCache({ store });

    await cache.store(key('Explain quadratic equations', vec(1, 0)), response('v1'));
    await cache.lookup(key('Explain quadratic equations', vec(1, 0)));
    const updated = await cache.store(key('  explain QUADRATIC equations? ', vec(1, 0)), response('v2'));

    expect(await store.size()).toBe(1);
    expect(updated.hits).toBe(1);
    expect(updated.response.payload.text).toBe('v2');
  });

  it('expires entries after the TTL', async () => {
    const clock = createClock();
    const cache = new SemanticCache({ ttlMs: 1000, now: clock.now });
    await cache.store(key('q', vec(1, 0)), response('cached'));

    clock.advance(1000);
    expect(await cache.lookup(key('q', vec(1, 0)))).not.toBeNull();

    clock.advance(1);
    expect(await cache.lookup(key('q', vec(1, 0)))).toBeNull();
    expect((await cache.stats()).expired).toBe(1);
    expect((await cache.stats()).size).toBe(0);
  });

  it('evicts the least recently used entry beyond capacity', async () => {
    const clock = createClock();
    const cache = new SemanticCache({ maxEntries: 2, now: clock.now });

    await cache.store(key('a', vec(1, 0, 0)), response('a'));
    clock.advance(1);
    await cache.store(key('b', vec(0, 1, 0)), response('b'));
    clock.advance(1);
    await cache.lookup(key('a', vec(1, 0, 0)));
    clock.advance(1);
    await cache.store(key('c', vec(0, 0, 1)), response('c'));

    expect(await cache.lookup(key('a', vec(1, 0, 0)))).not.toBeNull();
    expect(await cache.lookup(key('b', vec(0, 1, 0)))).toBeNull();
    expect(await cache.lookup(key('c', vec(0, 0, 1)))).not.toBeNull();
    expect((await cache.stats()).evictions).toBe(1);
  });

  it('treats a slow store as a miss', async () => {
    const store = new InMemorySemanticCacheStore();
    const slow: SemanticCacheStore = {
      id: 'slow',
      get: id => store.get(id),
      put: entry => store.put(entry),
      delete: id => store.delete(id),
      entries: () => new Promise(() => {}),
      size: () => store.size(),
      clear: () => store.clear(),
    };
    const cache = new SemanticCache({ store: slow, lookupTimeoutMs: 10 });

    const outcome = await cache.lookupWithStatus(key('q', vec(1, 0)));

    expect(outcome).toEqual({ hit: null, degraded: true, reason: 'cache lookup timed out after 10ms' });
    expect((await cache.stats()).errors).toBe(1);
  });

  it('treats a failing store as a miss', async () => {
    const broken: SemanticCacheStore = {
      id: 'broken',
      get: async () => undefined,
      put: async () => {},
      delete: async () => false,
      entries: async () => {
        throw new Error('ECONNREFUSED');
      },
      size: async () => 0,
      clear: async () => {},
    };
    const cache = new SemanticCache({ store: broken });

    await expect(cache.lookup(key('q', vec(1, 0)))).resolves.toBeNull();
  });

  it('propagates cancellation instead of reporting a miss', async () => {
    const cache = new SemanticCache();
    const controller = new AbortController();
    controller.abort();

    await expect(cache.lookup(key('q', vec(1, 0)), controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });

  it('invalidates a single tenant', async () => {
    const cache = new SemanticCache();
    await cache.store(key('a', vec(1, 0)), response('a'));
    await cache.store(key('b', vec(0, 1), { intent: 'solve' }), response('b'));
    await cache.store(key('a', vec(1, 0), { tenantId: 't2' }), response('other'));

    expect(await cache.invalidateTenant('t1')).toBe(2);
    expect((await cache.stats()).size).toBe(1);
    expect(await cache.lookup(key('a', vec(1, 0), { tenantId: 't2' }))).not.toBeNull();
  });

  it('reports hit rate', async () => {
    const cache = new SemanticCache();
    await cache.store(key('a', vec(1, 0)), response('a'));
    await cache.lookup(key('a', vec(1, 0)));
    await cache.lookup(key('z', vec(0, 1)));

    expect(await cache.stats()).toMatchObject({ lookups: 2, hits: 1, misses: 1, stores: 1, hitRate: 0.5 });
  });

  it('raises CacheError when the backing store rejects a write', async () => {
    const readOnly: SemanticCacheStore = {
      id: 'read-only',
      get: async () => undefined,
      put: async () => {
        throw new Error('EROFS');
      },
      delete: async () => false,
      entries: async () => [],
      size: async () => 0,
      clear: async () => {},
    };
    const cache = new SemanticCache({ store: readOnly });

    const write = cache.store(key('a', vec(1, 0)), response('a'));

    await expect(write).rejects.toBeInstanceOf(CacheError);
    await expect(write).rejects.toThrow('EROFS');
    expect((await cache.stats()).errors).toBe(1);
  });

  it('keeps stored responses apart from the caller copy', async () => {
    const cache = new SemanticCache();
    const original = response('cached');
    await cache.store(key('a', vec(1, 0)), original);

    original.payload.text = 'changed by caller';
    const first = await cache.lookup(key('a', vec(1, 0)));
    if (first) {
      first.entry.response.payload.text = 'changed after hit';
    }
    const second = await cache.lookup(key('a', vec(1, 0)));

    expect(second?.entry.response.payload).toEqual({ text: 'cached' });
  });
});
