/**
 * @module @studyhall/tutor-retrieval/vector-store/local
 * In-process vector store, optionally persisted as one JSON file per tenant
 */

import path from 'node:path';
import fs from 'fs-extra';
import { z } from 'zod';
import { RetrievalError, cosineSimilarity } from '@studyhall/tutor-core';
import type {
  PassageFilters,
  StoredPassage,
  VectorSearchMatch,
  VectorStore,
} from './vector-store.js';

export interface LocalVectorStoreOptions {
  /** Directory for tenant index files; memory only when absent */
  indexDir?: string;
}

const StoredPassageSchema = z.object({
  passageId: z.string(),
  tenantId: z.string(),
  subject: z.string(),
  grade: z.number().int().optional(),
  sourceId: z.string(),
  text: z.string(),
  metadata: z.record(z.unknown()).optional(),
  embedding: z.object({
    dim: z.number().int(),
    values: z.array(z.number()),
  }),
});

const TenantIndexFileSchema = z.object({
  tenantId: z.string(),
  generatedAt: z.string(),
  passages: z.array(StoredPassageSchema),
});

type TenantIndexFile = z.infer<typeof TenantIndexFileSchema>;

/**
 * Local vector store implementation
 */
export class LocalVectorStore implements VectorStore {
  readonly id: string;
  private readonly options: LocalVectorStoreOptions;
  private readonly cache = new Map<string, StoredPassage[]>();

  constructor(options: LocalVectorStoreOptions = {}) {
    this.options = options;
    this.id = options.indexDir ? 'file' : 'memory';
  }

  async replaceTenant(tenantId: string, passages: StoredPassage[]): Promise<void> {
    this.cache.set(tenantId, [...passages]);
    await this.persist(tenantId);
  }

  async upsertPassages(tenantId: string, passages: StoredPassage[]): Promise<void> {
    const byId = new Map((await this.loadTenant(tenantId)).map(p => [p.passageId, p]));
    for (const passage of passages) {
      byId.set(passage.passageId, passage);
    }
    this.cache.set(tenantId, [...byId.values()]);
    await this.persist(tenantId);
  }

  async search(
    tenantId: string,
    vector: StoredPassage['embedding'],
    limit: number,
    filters?: PassageFilters,
  ): Promise<VectorSearchMatch[]> {
    const records = await this.loadTenant(tenantId);
    if (records.length === 0) {
      return [];
    }

    return records
      .filter(passage => applyFilters(passage, filters))
      .map(passage => ({
        passage,
        score: passage.embedding.dim === vector.dim
          ? cosineSimilarity(vector.values, passage.embedding.values)
          : 0,
      }))
      .filter(match => Number.isFinite(match.score))
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }

  async deleteTenant(tenantId: string): Promise<void> {
    this.cache.set(tenantId, []);
    if (this.options.indexDir) {
      await fs.remove(this.getTenantPath(this.options.indexDir, tenantId));
    }
  }

  async count(tenantId: string): Promise<number> {
    return (await this.loadTenant(tenantId)).length;
  }

  private async persist(tenantId: string): Promise<void> {
    if (!this.options.indexDir) {
      return;
    }
    await fs.ensureDir(this.options.indexDir);
    const payload: TenantIndexFile = {
      tenantId,
      generatedAt: new Date().toISOString(),
      passages: this.cache.get(tenantId) ?? [],
    };
    await fs.writeJson(this.getTenantPath(this.options.indexDir, tenantId), payload, { spaces: 2 });
  }

  private async loadTenant(tenantId: string): Promise<StoredPassage[]> {
    const cached = this.cache.get(tenantId);
    if (cached) {
      return cached;
    }

    if (!this.options.indexDir) {
      return [];
    }

    const filePath = this.getTenantPath(this.options.indexDir, tenantId);
    if (!(await fs.pathExists(filePath))) {
      this.cache.set(tenantId, []);
      return [];
    }

    const parsed = TenantIndexFileSchema.safeParse(await fs.readJson(filePath));
    if (!parsed.success) {
      throw new RetrievalError(`Corrupt index file ${filePath}`, {
        issues: parsed.error.issues.length,
      });
    }
    this.cache.set(tenantId, parsed.data.passages);
    return parsed.data.passages;
  }

  private getTenantPath(indexDir: string, tenantId: string): string {
    // Injective, so distinct tenants never share a file
    return path.join(indexDir, `${encodeURIComponent(tenantId)}.json`);
  }
}

function applyFilters(passage: StoredPassage, filters?: PassageFilters): boolean {
  if (!filters) {
    return true;
  }
  if (filters.subject !== undefined && passage.subject.toLowerCase() !== filters.subject.toLowerCase()) {
    return false;
  }
  if (filters.grade !== undefined && passage.grade !== undefined && passage.grade !== filters.grade) {
    return false;
  }
  return true;
}
