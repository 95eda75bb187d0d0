import type { CacheEntry, SemanticCacheStore } from '../types.js';

/**
 * Process-local cache store with a namespace index
 */
export class InMemorySemanticCacheStore implements SemanticCacheStore {
  readonly id = 'memory';
  private readonly byId = new Map<string, CacheEntry>();
  private readonly byNamespace = new Map<string, Set<string>>();

  async get(id: string): Promise<CacheEntry | undefined> {
    const entry = this.byId.get(id);
    return entry ? { ...entry } : undefined;
  }

  async put(entry: CacheEntry): Promise<void> {
    this.byId.set(entry.id, structuredClone(entry));
    let ids = this.byNamespace.get(entry.namespace);
    if (!ids) {
      ids = new Set();
      this.byNamespace.set(entry.namespace, ids);
    }
    ids.add(entry.id);
  }

  async delete(id: string): Promise<boolean> {
    const entry = this.byId.get(id);
    if (!entry) {
      return false;
    }
    this.byId.delete(id);
    const ids = this.byNamespace.get(entry.namespace);
    ids?.delete(id);
    if (ids && ids.size === 0) {
      this.byNamespace.delete(entry.namespace);
    }
    return true;
  }

  async entries(namespace?: string): Promise<CacheEntry[]> {
    if (namespace === undefined) {
      return Array.from(this.byId.values(), entry => ({ ...entry }));
    }
    const ids = this.byNamespace.get(namespace);
    if (!ids) {
      return [];
    }
    const result: CacheEntry[] = [];
    for (const id of ids) {
      const entry = this.byId.get(id);
      if (entry) {
        result.push({ ...entry });
      }
    }
    return result;
  }

  async size(): Promise<number> {
    return this.byId.size;
  }

  async clear(): Promise<void> {
    this.byId.clear();
    this.byNamespace.clear();
  }
}
