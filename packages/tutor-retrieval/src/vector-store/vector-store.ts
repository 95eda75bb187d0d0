/**
 * @module @studyhall/tutor-retrieval/vector-store/vector-store
 * Vector store interface for abstracting storage backends
 */

import type { EmbeddingVector } from '@studyhall/tutor-core';

export interface StoredPassage {
  passageId: string;
  tenantId: string;
  subject: string;
  /** Grade the passage targets; absent means any grade */
  grade?: number;
  sourceId: string;
  text: string;
  metadata?: Record<string, unknown>;
  embedding: EmbeddingVector;
}

export interface PassageFilters {
  subject?: string;
  /** Passages without a grade match every grade */
  grade?: number;
}

export interface VectorSearchMatch {
  passage: StoredPassage;
  score: number;
}

export interface VectorStore {
  readonly id: string;

  /**
   * Insert or replace passages by passageId within a tenant
   */
  upsertPassages(tenantId: string, passages: StoredPassage[]): Promise<void>;

  /**
   * Replace all passages for a tenant (full rebuild)
   */
  replaceTenant(tenantId: string, passages: StoredPassage[]): Promise<void>;

  /**
   * Search for similar passages using vector similarity, best first
   */
  search(
    tenantId: string,
    vector: EmbeddingVector,
    limit: number,
    filters?: PassageFilters,
    signal?: AbortSignal,
  ): Promise<VectorSearchMatch[]>;

  deleteTenant(tenantId: string): Promise<void>;

  count(tenantId: string): Promise<number>;
}
