/**
 * @module @studyhall/tutor-embeddings/providers/openai
 * OpenAI Embedding Provider implementation
 */

import { z } from 'zod';
import {
  CancelledError,
  createTutorError,
  wrapError,
  type TutorError,
  getCategoryLogger,
  sleep,
  withTimeout,
  type EmbeddingVector,
  type Logger,
} from '@studyhall/tutor-core';
import type { EmbeddingProvider, FetchLike } from '../types.js';

export interface OpenAIEmbeddingProviderOptions {
  apiKey: string;
  model?: string;
  dimension?: number;
  batchSize?: number;
  timeout?: number;
  retries?: number;
  baseURL?: string;
  fetch?: FetchLike;
  logger?: Logger;
}

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_BATCH_SIZE = 100;
const DEFAULT_TIMEOUT = 30000;
const DEFAULT_RETRIES = 3;
const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
  model: z.string().optional(),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

/**
 * Create OpenAI embedding provider over the REST API
 */
export function createOpenAIEmbeddingProvider(
  options: OpenAIEmbeddingProviderOptions,
): EmbeddingProvider {
  const {
    apiKey,
    model = DEFAULT_MODEL,
    dimension,
    batchSize = DEFAULT_BATCH_SIZE,
    timeout = DEFAULT_TIMEOUT,
    retries = DEFAULT_RETRIES,
    baseURL = DEFAULT_BASE_URL,
  } = options;
  const fetchImpl: FetchLike = options.fetch ?? fetch;
  const logger = getCategoryLogger('embeddings', options.logger);

  return {
    id: `openai-${model}`,
    dimension: dimension ?? getDefaultDimension(model),

    async embed(texts: string[], signal?: AbortSignal): Promise<EmbeddingVector[]> {
      if (texts.length === 0) {
        return [];
      }

      const results: EmbeddingVector[] = [];
      for (let i = 0; i < texts.length; i += batchSize) {
        const batch = texts.slice(i, i + batchSize);
        const vectors = await embedBatch(batch, signal);
        results.push(...vectors);
      }
      return results;
    },
  };

  async function embedBatch(texts: string[], signal?: AbortSignal): Promise<EmbeddingVector[]> {
    const url = `${baseURL.replace(/\/$/, '')}/embeddings`;
    const requestBody: Record<string, unknown> = { model, input: texts };

    // Only text-embedding-3 models accept a dimensions parameter
    if (dimension && (model.includes('3-small') || model.includes('3-large'))) {
      requestBody.dimensions = dimension;
    }

    let lastError: TutorError | undefined;
    for (let attempt = 0; attempt <= retries; attempt++) {
      let response: Response;
      try {
        response = await withTimeout(
          requestSignal =>
            fetchImpl(url, {
              method: 'POST',
              headers: {
                Authorization: `Bearer ${apiKey}`,
                'Content-Type': 'application/json',
              },
              body: JSON.stringify(requestBody),
              signal: requestSignal,
            }),
          { step: 'embeddings', timeoutMs: timeout, signal },
        );
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }
        lastError = wrapError(error, 'TUTOR_EMBEDDING_ERROR');
        if (attempt < retries) {
          await sleep(2 ** attempt * 1000, signal);
        }
        continue;
      }

      if (!response.ok) {
        const errorText = await response.text();
        const parsedError = safeJson(errorText, ErrorBodySchema);
        const message = parsedError?.error.message ?? `OpenAI API error: ${response.status} ${response.statusText}`;
        const error = createTutorError('TUTOR_EMBEDDING_ERROR', message, { status: response.status });

        // Don't retry on client errors (4xx) except 429
        if (response.status >= 400 && response.status < 500 && response.status !== 429) {
          throw error;
        }

        lastError = error;
        if (attempt < retries) {
          const retryAfter = response.headers.get('retry-after');
          const waitTime = retryAfter ? parseInt(retryAfter, 10) * 1000 : 2 ** attempt * 1000;
          logger.warn({ status: response.status, attempt: attempt + 1, waitTime }, 'Embedding request retrying');
          await sleep(waitTime, signal);
        }
        continue;
      }

      const data = EmbeddingResponseSchema.safeParse(await response.json());
      if (!data.success) {
        throw createTutorError('TUTOR_EMBEDDING_ERROR', 'Malformed embeddings response');
      }

      const sortedData = [...data.data.data].sort((a, b) => a.index - b.index);
      return sortedData.map(item => ({
        dim: item.embedding.length,
        values: item.embedding,
      }));
    }

    throw lastError ?? createTutorError('TUTOR_EMBEDDING_ERROR', 'Failed to generate embeddings after retries');
  }
}

function safeJson<T>(text: string, schema: z.ZodType<T>): T | undefined {
  try {
    const result = schema.safeParse(JSON.parse(text));
    return result.success ? result.data : undefined;
  } catch {
    return undefined;
  }
}

function getDefaultDimension(model: string): number {
  if (model.includes('3-large')) {
    return 3072;
  }
  return 1536;
}
