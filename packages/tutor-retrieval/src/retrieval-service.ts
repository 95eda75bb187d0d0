/**
 * Retrieval Service
 *
 * Top-k passages for a query within a tenant/subject scope. Fails soft:
 * embedding errors, backend errors and timeouts all yield an empty context.
 */

import {
  CancelledError,
  RetrievalError,
  createTutorError,
  getCategoryLogger,
  shortHash,
  withTimeout,
  type EmbeddingVector,
  type Logger,
  type RetrievedContext,
  type RetrievedPassage,
} from '@studyhall/tutor-core';
import type { EmbeddingProvider } from '@studyhall/tutor-embeddings';
import type { PassageFilters, StoredPassage, VectorStore } from './vector-store/vector-store.js';

export interface RetrievalScope {
  tenantId: string;
  subject: string;
  grade?: number;
}

export interface RetrievalServiceOptions {
  store: VectorStore;
  embeddings: EmbeddingProvider;
  topK?: number;
  scoreFloor?: number;
  timeoutMs?: number;
  /** Also filter passages by the student's grade */
  scopeByGrade?: boolean;
  logger?: Logger;
}

export interface RetrieveOptions {
  /** Precomputed query embedding; skips the embedding call */
  embedding?: EmbeddingVector;
  signal?: AbortSignal;
}

export interface RetrievalOutcome {
  context: RetrievedContext;
  /** The backend failed or timed out; context is empty */
  degraded: boolean;
  reason?: string;
  error?: RetrievalError;
}

export interface PassageInput {
  id?: string;
  text: string;
  subject: string;
  grade?: number;
  sourceId: string;
  metadata?: Record<string, unknown>;
}

export interface RetrievalStats {
  requests: number;
  degraded: number;
  emptyResults: number;
  passagesReturned: number;
}

export class RetrievalService {
  private readonly store: VectorStore;
  private readonly embeddings: EmbeddingProvider;
  private readonly topK: number;
  private readonly scoreFloor: number;
  private readonly timeoutMs: number;
  private readonly scopeByGrade: boolean;
  private readonly logger: Logger;
  private stats: RetrievalStats = { requests: 0, degraded: 0, emptyResults: 0, passagesReturned: 0 };

  constructor(options: RetrievalServiceOptions) {
    this.store = options.store;
    this.embeddings = options.embeddings;
    this.topK = options.topK ?? 5;
    this.scoreFloor = options.scoreFloor ?? 0.35;
    this.timeoutMs = options.timeoutMs ?? 2000;
    this.scopeByGrade = options.scopeByGrade ?? false;
    this.logger = getCategoryLogger('retrieval', options.logger);
  }

  async retrieve(queryText: string, scope: RetrievalScope, options: RetrieveOptions = {}): Promise<RetrievedContext> {
    return (await this.retrieveWithStatus(queryText, scope, options)).context;
  }

  /**
   * Like retrieve, but reports whether the empty result came from a failure
   */
  async retrieveWithStatus(
    queryText: string,
    scope: RetrievalScope,
    options: RetrieveOptions = {},
  ): Promise<RetrievalOutcome> {
    this.stats.requests++;
    const filters: PassageFilters = {
      subject: scope.subject,
      grade: this.scopeByGrade ? scope.grade : undefined,
    };

    try {
      const matches = await withTimeout(
        async signal => {
          const vector = options.embedding ?? (await this.embedQuery(queryText, signal));
          return this.store.search(scope.tenantId, vector, this.topK, filters, signal);
        },
        { step: 'retrieval', timeoutMs: this.timeoutMs, signal: options.signal },
      );

      const context: RetrievedPassage[] = matches
        .filter(match => match.score >= this.scoreFloor)
        .slice(0, this.topK)
        .map(match => ({
          text: match.passage.text,
          score: match.score,
          sourceId: match.passage.sourceId,
          metadata: match.passage.metadata,
        }));

      if (context.length === 0) {
        this.stats.emptyResults++;
        this.logger.debug({ tenantId: scope.tenantId, subject: scope.subject, candidates: matches.length }, 'No passages above score floor');
      }
      this.stats.passagesReturned += context.length;
      return { context, degraded: false };
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      this.stats.degraded++;
      const failure = toRetrievalError(error, scope);
      this.logger.warn(
        { code: failure.code, tenantId: scope.tenantId, subject: scope.subject, err: failure.message },
        'Retrieval failed, continuing without grounding',
      );
      return { context: [], degraded: true, reason: failure.message, error: failure };
    }
  }

  /**
   * Embed and store passages for a tenant
   *
   * @returns number of passages written
   */
  async ingest(tenantId: string, passages: PassageInput[], options: { replace?: boolean } = {}): Promise<number> {
    if (passages.length === 0 && !options.replace) {
      return 0;
    }

    let vectors: EmbeddingVector[];
    try {
      vectors = await this.embeddings.embed(passages.map(p => p.text));
    } catch (error) {
      throw createTutorError('TUTOR_INGEST_ERROR', `Embedding passages failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    const stored: StoredPassage[] = [];
    passages.forEach((passage, index) => {
      const embedding = vectors[index];
      if (!embedding) {
        return;
      }
      stored.push({
        passageId: passage.id ?? shortHash(`${passage.sourceId}\n${passage.text}`),
        tenantId,
        subject: passage.subject.trim().toLowerCase(),
        grade: passage.grade,
        sourceId: passage.sourceId,
        text: passage.text,
        metadata: passage.metadata,
        embedding,
      });
    });

    if (options.replace) {
      await this.store.replaceTenant(tenantId, stored);
    } else {
      await this.store.upsertPassages(tenantId, stored);
    }
    this.logger.info({ tenantId, count: stored.length, store: this.store.id }, 'Ingested passages');
    return stored.length;
  }

  getStats(): RetrievalStats {
    return { ...this.stats };
  }

  private async embedQuery(text: string, signal: AbortSignal): Promise<EmbeddingVector> {
    const [vector] = await this.embeddings.embed([text], signal);
    if (!vector) {
      throw createTutorError('TUTOR_EMBEDDING_ERROR', 'Embedding provider returned no vector');
    }
    return vector;
  }
}

function toRetrievalError(error: unknown, scope: RetrievalScope): RetrievalError {
  if (error instanceof RetrievalError) {
    return error;
  }
  const failure = new RetrievalError(error instanceof Error ? error.message : String(error), {
    tenantId: scope.tenantId,
    subject: scope.subject,
  });
  failure.cause = error;
  return failure;
}
