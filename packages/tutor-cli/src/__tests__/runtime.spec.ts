import { describe, expect, it } from 'vitest';
import { createLogger } from '@studyhall/tutor-core';
import { parseTutorConfig } from '@studyhall/tutor-contracts';
import { createDeterministicEmbeddingProvider } from '@studyhall/tutor-embeddings';
import { LocalVectorStore, QdrantVectorStore } from '@studyhall/tutor-retrieval';
import { createProviderEntries, createTutorRuntime, createVectorStore } from '../runtime/tutor-runtime.js';

const logger = createLogger({ level: 'silent' });

describe('runtime wiring', () => {
  it('builds providers in configured order with their settings', () => {
    const config = parseTutorConfig({
      llm: {
        providers: [
          { id: 'main', model: 'gpt-4o-mini', apiKeyEnv: 'MAIN_KEY', retries: 1 },
          { id: 'backup', model: 'local-model', baseURL: 'http://localhost:8080/v1', apiKeyEnv: 'BACKUP_KEY' },
        ],
      },
    });

    const entries = createProviderEntries(config, { MAIN_KEY: 'test-secret', BACKUP_KEY: 'test-secret' });

    expect(entries.map(e => e.provider.id)).toEqual(['main', 'backup']);
    expect(entries[0]?.settings).toEqual({ retries: 1, backoffBaseMs: 250, timeoutMs: 20_000 });
  });

  it('names the missing credential variable', () => {
    const config = parseTutorConfig({ llm: { providers: [{ id: 'main', model: 'm', apiKeyEnv: 'MAIN_KEY' }] } });

    expect(() => createProviderEntries(config, {})).toThrow('Provider "main" needs an API key. Set MAIN_KEY.');
  });

  it('creates the configured vector backend', () => {
    const embeddings = createDeterministicEmbeddingProvider({ dimension: 64 });
    const options = { cwd: '/srv/tutor', env: { QDRANT_KEY: 'test-secret' }, logger };

    expect(createVectorStore({ type: 'memory' }, embeddings, options).id).toBe('memory');
    expect(createVectorStore({ type: 'file', path: 'index' }, embeddings, options)).toBeInstanceOf(LocalVectorStore);
    expect(
      createVectorStore(
        {
          type: 'qdrant',
          url: 'http://localhost:6333',
          collection: 'passages',
          apiKeyEnv: 'QDRANT_KEY',
          timeoutMs: 1000,
        },
        embeddings,
        options,
      ),
    ).toBeInstanceOf(QdrantVectorStore);
  });

  it('leaves the cache out when disabled', () => {
    const config = parseTutorConfig({ cache: { enabled: false } });

    const runtime = createTutorRuntime(config, { cwd: '/srv/tutor', env: { OPENAI_API_KEY: 'test-secret' }, logger });

    expect(runtime.cache).toBeUndefined();
    expect(runtime.llm.providerIds).toEqual(['primary']);
    expect(runtime.embeddings.id).toBe('deterministic');
  });
});
