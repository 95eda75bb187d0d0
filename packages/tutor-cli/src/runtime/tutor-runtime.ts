/**
 * Runtime wiring
 *
 * Builds every component from a validated config. Nothing here is a
 * process-wide singleton: each runtime owns its clients.
 */

import * as path from 'node:path';
import { createTutorError, getCategoryLogger, useLogger, type Logger } from '@studyhall/tutor-core';
import type { TutorConfig, VectorBackendConfig } from '@studyhall/tutor-contracts';
import { createSpecialists } from '@studyhall/tutor-agents';
import { SemanticCache } from '@studyhall/tutor-cache';
import { createEmbeddingProvider, type EmbeddingProvider, type FetchLike } from '@studyhall/tutor-embeddings';
import { LLMClient, createOpenAIProvider, type ChatCompletionFn, type ProviderEntry } from '@studyhall/tutor-llm';
import { Supervisor } from '@studyhall/tutor-orchestrator';
import { LocalVectorStore, QdrantVectorStore, RetrievalService, type VectorStore } from '@studyhall/tutor-retrieval';

export interface TutorRuntimeOptions {
  cwd: string;
  env?: Record<string, string | undefined>;
  fetch?: FetchLike;
  logger?: Logger;
  /** Chat completion transport for every provider (tests, gateways) */
  createCompletion?: ChatCompletionFn;
}

export interface TutorRuntime {
  config: TutorConfig;
  supervisor: Supervisor;
  retrieval: RetrievalService;
  cache?: SemanticCache;
  llm: LLMClient;
  embeddings: EmbeddingProvider;
  store: VectorStore;
}

export function createProviderEntries(
  config: TutorConfig,
  env: Record<string, string | undefined>,
  createCompletion?: ChatCompletionFn,
): ProviderEntry[] {
  return config.llm.providers.map(provider => {
    const apiKey = env[provider.apiKeyEnv];
    if (!apiKey && !createCompletion) {
      throw createTutorError(
        'TUTOR_CONFIG_INVALID',
        `Provider "${provider.id}" needs an API key. Set ${provider.apiKeyEnv}.`,
        { providerId: provider.id },
      );
    }
    return {
      provider: createOpenAIProvider({
        id: provider.id,
        model: provider.model,
        apiKey,
        baseURL: provider.baseURL,
        timeout: provider.timeoutMs,
        temperature: provider.temperature,
        maxTokens: provider.maxTokens,
        createCompletion,
      }),
      settings: {
        retries: provider.retries,
        backoffBaseMs: provider.backoffBaseMs,
        timeoutMs: provider.timeoutMs,
      },
    };
  });
}

export function createVectorStore(
  backend: VectorBackendConfig,
  embeddings: EmbeddingProvider,
  options: Pick<TutorRuntimeOptions, 'cwd' | 'env' | 'fetch' | 'logger'>,
): VectorStore {
  switch (backend.type) {
    case 'memory':
      return new LocalVectorStore();
    case 'file':
      return new LocalVectorStore({ indexDir: path.resolve(options.cwd, backend.path) });
    case 'qdrant':
      return new QdrantVectorStore({
        url: backend.url,
        apiKey: backend.apiKeyEnv ? options.env?.[backend.apiKeyEnv] : undefined,
        collectionName: backend.collection,
        dimension: embeddings.dimension,
        timeout: backend.timeoutMs,
        fetch: options.fetch,
        logger: options.logger,
      });
  }
}

export function createTutorRuntime(config: TutorConfig, options: TutorRuntimeOptions): TutorRuntime {
  const env = options.env ?? process.env;
  const logger = options.logger ?? useLogger();

  const embeddings = createEmbeddingProvider(config.embeddings, { env, fetch: options.fetch, logger });
  const store = createVectorStore(config.retrieval.backend, embeddings, { ...options, env, logger });
  const retrieval = new RetrievalService({
    store,
    embeddings,
    topK: config.retrieval.topK,
    scoreFloor: config.retrieval.scoreFloor,
    timeoutMs: config.retrieval.timeoutMs,
    scopeByGrade: config.retrieval.scopeByGrade,
    logger,
  });

  const cache = config.cache.enabled
    ? new SemanticCache({
        similarityThreshold: config.cache.similarityThreshold,
        ttlMs: config.cache.ttlMs,
        maxEntries: config.cache.maxEntries,
        lookupTimeoutMs: config.cache.lookupTimeoutMs,
        logger,
      })
    : undefined;

  const llm = new LLMClient(createProviderEntries(config, env, options.createCompletion), {
    taskRouting: config.llm.taskRouting,
    logger,
  });

  const supervisor = new Supervisor({
    specialists: createSpecialists(llm, {
      quizQuestions: config.agents.quizQuestions,
      solverValidation: config.agents.solverValidation,
      logger,
    }),
    llm,
    cache,
    retrieval,
    embeddings,
    routing: config.routing,
    knowledgeRevision: config.retrieval.knowledgeRevision,
    logger,
  });

  getCategoryLogger('runtime', logger).debug(
    {
      providers: llm.providerIds,
      embeddings: embeddings.id,
      vectorStore: store.id,
      cache: cache ? 'memory' : 'disabled',
    },
    'Runtime ready',
  );

  return { config, supervisor, retrieval, cache, llm, embeddings, store };
}
