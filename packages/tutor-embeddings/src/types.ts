import type { EmbeddingVector } from '@studyhall/tutor-core';

export interface EmbeddingProvider {
  readonly id: string;
  readonly dimension: number;
  embed(texts: string[], signal?: AbortSignal): Promise<EmbeddingVector[]>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
