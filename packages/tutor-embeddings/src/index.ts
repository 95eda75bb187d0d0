/**
 * @studyhall/tutor-embeddings
 * Embedding providers for queries and curriculum passages
 */

import { createTutorError, type Logger } from '@studyhall/tutor-core';
import type { EmbeddingsConfig } from '@studyhall/tutor-contracts';
import { createDeterministicEmbeddingProvider } from './providers/deterministic.js';
import { createOpenAIEmbeddingProvider } from './providers/openai.js';
import type { EmbeddingProvider, FetchLike } from './types.js';

export type { EmbeddingProvider, FetchLike } from './types.js';
export {
  createDeterministicEmbeddingProvider,
  createDeterministicVector,
  type DeterministicEmbeddingProviderOptions,
} from './providers/deterministic.js';
export {
  createOpenAIEmbeddingProvider,
  type OpenAIEmbeddingProviderOptions,
} from './providers/openai.js';

export interface EmbeddingRuntime {
  env?: Record<string, string | undefined>;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Create embedding provider from validated configuration
 */
export function createEmbeddingProvider(
  config: EmbeddingsConfig,
  runtime: EmbeddingRuntime = {},
): EmbeddingProvider {
  switch (config.type) {
    case 'deterministic':
      return createDeterministicEmbeddingProvider({ dimension: config.dimension });

    case 'openai': {
      const env = runtime.env ?? process.env;
      const apiKey = env[config.apiKeyEnv];
      if (!apiKey) {
        throw createTutorError(
          'TUTOR_CONFIG_INVALID',
          `OpenAI embeddings need an API key. Set ${config.apiKeyEnv} or switch embeddings.type to "deterministic".`,
        );
      }
      return createOpenAIEmbeddingProvider({
        apiKey,
        model: config.model,
        dimension: config.dimension,
        batchSize: config.batchSize,
        timeout: config.timeoutMs,
        retries: config.retries,
        baseURL: config.baseURL,
        fetch: runtime.fetch,
        logger: runtime.logger,
      });
    }
  }
}
