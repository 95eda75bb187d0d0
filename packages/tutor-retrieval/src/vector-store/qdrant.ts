/**
 * @module @studyhall/tutor-retrieval/vector-store/qdrant
 * Qdrant vector store implementation over the REST API
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import {
  RetrievalError,
  getCategoryLogger,
  withTimeout,
  type EmbeddingVector,
  type Logger,
} from '@studyhall/tutor-core';
import type { FetchLike } from '@studyhall/tutor-embeddings';
import type {
  PassageFilters,
  StoredPassage,
  VectorSearchMatch,
  VectorStore,
} from './vector-store.js';

export interface QdrantVectorStoreOptions {
  url: string;
  apiKey?: string;
  collectionName?: string;
  dimension: number;
  timeout?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

interface QdrantFieldCondition {
  key: string;
  match: { value: string | number };
}

interface QdrantIsNullCondition {
  is_null: { key: string };
}

interface QdrantNestedFilter {
  should: Array<QdrantFieldCondition | QdrantIsNullCondition>;
}

type QdrantCondition = QdrantFieldCondition | QdrantNestedFilter;

interface QdrantFilter {
  must: QdrantCondition[];
}

const PayloadSchema = z.object({
  tenantId: z.string(),
  passageId: z.string(),
  subject: z.string(),
  grade: z.number().int().nullable().optional(),
  sourceId: z.string(),
  text: z.string(),
  metadata: z.record(z.unknown()).nullable().optional(),
});

const SearchResponseSchema = z.object({
  result: z.array(
    z.object({
      id: z.union([z.string(), z.number()]),
      score: z.number(),
      payload: PayloadSchema.nullable().optional(),
    }),
  ),
});

const CountResponseSchema = z.object({
  result: z.object({ count: z.number().int() }),
});

/**
 * Convert a string to a deterministic UUID-shaped id.
 * Qdrant requires point IDs to be either unsigned integers or UUIDs.
 */
export function stringToUUID(str: string): string {
  const hash = createHash('sha256').update(str).digest();
  return [
    hash.subarray(0, 4).toString('hex'),
    hash.subarray(4, 6).toString('hex'),
    hash.subarray(6, 8).toString('hex'),
    hash.subarray(8, 10).toString('hex'),
    hash.subarray(10, 16).toString('hex'),
  ].join('-');
}

class QdrantRequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'QdrantRequestError';
  }
}

/**
 * Qdrant vector store implementation
 */
export class QdrantVectorStore implements VectorStore {
  readonly id = 'qdrant';
  private readonly url: string;
  private readonly apiKey?: string;
  private readonly collectionName: string;
  private readonly dimension: number;
  private readonly timeout: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private collectionReady = false;

  constructor(options: QdrantVectorStoreOptions) {
    this.url = options.url.replace(/\/$/, '');
    this.apiKey = options.apiKey;
    this.collectionName = options.collectionName ?? 'studyhall_passages';
    this.dimension = options.dimension;
    this.timeout = options.timeout ?? 30000;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = getCategoryLogger('qdrant', options.logger);
  }

  async replaceTenant(tenantId: string, passages: StoredPassage[]): Promise<void> {
    await this.deleteTenant(tenantId);
    await this.upsertPassages(tenantId, passages);
  }

  async upsertPassages(tenantId: string, passages: StoredPassage[]): Promise<void> {
    if (passages.length === 0) {
      return;
    }
    await this.ensureCollection();

    const points = passages.map(passage => ({
      id: stringToUUID(`${tenantId}:${passage.passageId}`),
      vector: passage.embedding.values,
      payload: {
        tenantId,
        passageId: passage.passageId,
        subject: passage.subject.toLowerCase(),
        grade: passage.grade ?? null,
        sourceId: passage.sourceId,
        text: passage.text,
        metadata: passage.metadata ?? null,
      },
    }));

    // Qdrant handles up to 100 points per request comfortably
    const batchSize = 100;
    for (let i = 0; i < points.length; i += batchSize) {
      const batch = points.slice(i, i + batchSize);
      await this.request('PUT', `/collections/${this.collectionName}/points?wait=true`, { points: batch });
    }
    this.logger.debug({ tenantId, count: points.length }, 'Upserted passages');
  }

  async search(
    tenantId: string,
    vector: EmbeddingVector,
    limit: number,
    filters?: PassageFilters,
    signal?: AbortSignal,
  ): Promise<VectorSearchMatch[]> {
    const filter = this.buildFilter(tenantId, filters);

    let body: unknown;
    try {
      body = await this.request(
        'POST',
        `/collections/${this.collectionName}/points/search`,
        { vector: vector.values, limit, filter, with_payload: true, with_vector: false },
        signal,
      );
    } catch (error) {
      // A missing collection simply has no passages yet
      if (error instanceof QdrantRequestError && error.status === 404) {
        return [];
      }
      throw error;
    }

    const parsed = SearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RetrievalError('Malformed Qdrant search response', { collection: this.collectionName });
    }

    const matches: VectorSearchMatch[] = [];
    for (const result of parsed.data.result) {
      const payload = result.payload;
      if (!payload) {
        this.logger.warn({ pointId: result.id }, 'Search result has no payload');
        continue;
      }
      matches.push({
        passage: {
          passageId: payload.passageId,
          tenantId: payload.tenantId,
          subject: payload.subject,
          grade: payload.grade ?? undefined,
          sourceId: payload.sourceId,
          text: payload.text,
          metadata: payload.metadata ?? undefined,
          // Qdrant doesn't return vectors, use query vector as placeholder
          embedding: vector,
        },
        score: result.score,
      });
    }
    return matches;
  }

  async deleteTenant(tenantId: string): Promise<void> {
    try {
      await this.request('POST', `/collections/${this.collectionName}/points/delete?wait=true`, {
        filter: this.buildFilter(tenantId),
      });
    } catch (error) {
      if (error instanceof QdrantRequestError && error.status === 404) {
        return;
      }
      throw error;
    }
  }

  async count(tenantId: string): Promise<number> {
    try {
      const body = await this.request('POST', `/collections/${this.collectionName}/points/count`, {
        filter: this.buildFilter(tenantId),
        exact: true,
      });
      const parsed = CountResponseSchema.safeParse(body);
      return parsed.success ? parsed.data.result.count : 0;
    } catch (error) {
      if (error instanceof QdrantRequestError && error.status === 404) {
        return 0;
      }
      throw error;
    }
  }

  private buildFilter(tenantId: string, filters?: PassageFilters): QdrantFilter {
    const must: QdrantCondition[] = [{ key: 'tenantId', match: { value: tenantId } }];
    if (filters?.subject) {
      must.push({ key: 'subject', match: { value: filters.subject.toLowerCase() } });
    }
    if (filters?.grade !== undefined) {
      // Grade-less passages apply to every grade
      must.push({
        should: [{ key: 'grade', match: { value: filters.grade } }, { is_null: { key: 'grade' } }],
      });
    }
    return { must };
  }

  private async ensureCollection(): Promise<void> {
    if (this.collectionReady) {
      return;
    }
    try {
      await this.request('GET', `/collections/${this.collectionName}`);
    } catch (error) {
      if (!(error instanceof QdrantRequestError && error.status === 404)) {
        throw error;
      }
      this.logger.info({ collection: this.collectionName, dimension: this.dimension }, 'Creating Qdrant collection');
      await this.request('PUT', `/collections/${this.collectionName}`, {
        vectors: { size: this.dimension, distance: 'Cosine' },
      });
    }
    this.collectionReady = true;
  }

  private async request(method: string, pathname: string, body?: unknown, signal?: AbortSignal): Promise<unknown> {
    const headers: Record<string, string> = {};
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.apiKey) {
      headers['api-key'] = this.apiKey;
    }

    const response = await withTimeout(
      requestSignal =>
        this.fetchImpl(`${this.url}${pathname}`, {
          method,
          headers,
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: requestSignal,
        }),
      { step: 'qdrant', timeoutMs: this.timeout, signal },
    );

    if (!response.ok) {
      const errorText = await response.text();
      throw new QdrantRequestError(
        `Qdrant ${method} ${pathname} failed: ${response.status} ${errorText}`,
        response.status,
      );
    }
    const text = await response.text();
    return text.length > 0 ? JSON.parse(text) : undefined;
  }
}
