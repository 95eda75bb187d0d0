import { describe, it, expect } from 'vitest';
import { isTutorError } from '@studyhall/tutor-core';
import {
  DEFAULT_TUTOR_CONFIG,
  parseTutorConfig,
  TutorErrorEnvelopeSchema,
  TutorRequestSchema,
  TutorResponseSchema,
} from '../src/index.js';

describe('TutorConfigSchema', () => {
  it('fills every default from an empty object', () => {
    expect(DEFAULT_TUTOR_CONFIG.cache).toEqual({
      enabled: true,
      similarityThreshold: 0.92,
      ttlMs: 3_600_000,
      maxEntries: 1000,
      lookupTimeoutMs: 150,
    });
    expect(DEFAULT_TUTOR_CONFIG.retrieval.topK).toBe(5);
    expect(DEFAULT_TUTOR_CONFIG.retrieval.scoreFloor).toBe(0.35);
    expect(DEFAULT_TUTOR_CONFIG.retrieval.backend).toEqual({ type: 'memory' });
    expect(DEFAULT_TUTOR_CONFIG.embeddings).toEqual({ type: 'deterministic', dimension: 256 });
    expect(DEFAULT_TUTOR_CONFIG.llm.providers).toHaveLength(1);
    expect(DEFAULT_TUTOR_CONFIG.llm.providers[0]).toMatchObject({
      id: 'primary',
      model: 'gpt-4o-mini',
      retries: 2,
      backoffBaseMs: 250,
      apiKeyEnv: 'OPENAI_API_KEY',
    });
    expect(DEFAULT_TUTOR_CONFIG.routing).toEqual({
      groundingIntents: ['explain', 'solve', 'grade'],
      gradeFollowUpAnalysis: true,
      routes: {},
    });
    expect(DEFAULT_TUTOR_CONFIG.agents).toEqual({
      quizQuestions: 5,
      solverValidation: { enabled: false, maxRegenerations: 3 },
    });
  });

  it('caps solver regenerations at three', () => {
    expect(parseTutorConfig({ agents: { solverValidation: { enabled: true } } }).agents.solverValidation).toEqual({
      enabled: true,
      maxRegenerations: 3,
    });
    expect(() => parseTutorConfig({ agents: { solverValidation: { maxRegenerations: 4 } } })).toThrow(
      'agents.solverValidation.maxRegenerations',
    );
  });

  it('applies nested defaults inside a partial config', () => {
    const config = parseTutorConfig({
      cache: { similarityThreshold: 0.8 },
      retrieval: { backend: { type: 'file' } },
      llm: {
        providers: [
          { id: 'main', model: 'gpt-4o-mini' },
          { id: 'backup', model: 'llama3', baseURL: 'http://localhost:11434/v1', retries: 0 },
        ],
        taskRouting: { grader: 'backup' },
      },
    });

    expect(config.cache.similarityThreshold).toBe(0.8);
    expect(config.cache.ttlMs).toBe(3_600_000);
    expect(config.retrieval.backend).toEqual({ type: 'file', path: '.studyhall/index' });
    expect(config.llm.providers.map(p => p.id)).toEqual(['main', 'backup']);
    expect(config.llm.providers[1]?.retries).toBe(0);
    expect(config.llm.taskRouting).toEqual({ grader: 'backup' });
  });

  it('rejects out-of-range thresholds with TUTOR_CONFIG_INVALID', () => {
    try {
      parseTutorConfig({ cache: { similarityThreshold: 1.5 } });
      expect.unreachable();
    } catch (error) {
      expect(isTutorError(error)).toBe(true);
      if (isTutorError(error)) {
        expect(error.code).toBe('TUTOR_CONFIG_INVALID');
        expect(error.message).toContain('cache.similarityThreshold');
      }
    }
  });

  it('rejects duplicate provider ids and unknown task routing targets', () => {
    expect(() =>
      parseTutorConfig({
        llm: {
          providers: [
            { id: 'a', model: 'm' },
            { id: 'a', model: 'm2' },
          ],
        },
      }),
    ).toThrow('Duplicate provider id "a"');

    expect(() =>
      parseTutorConfig({
        llm: {
          providers: [{ id: 'a', model: 'm' }],
          taskRouting: { content: 'missing' },
        },
      }),
    ).toThrow('Unknown provider "missing"');
  });

  it('rejects empty provider lists and empty route steps', () => {
    expect(() => parseTutorConfig({ llm: { providers: [] } })).toThrow('llm.providers');
    expect(() => parseTutorConfig({ routing: { routes: { explain: [[]] } } })).toThrow(
      'routing.routes.explain.0',
    );
  });
});

describe('TutorRequestSchema', () => {
  it('accepts the minimal inbound request', () => {
    const parsed = TutorRequestSchema.parse({
      tenant_id: 't1',
      user_query: 'Explain quadratic equations',
      student_profile: { grade: 8, subject: 'algebra', favourite_colour: 'green' },
    });
    expect(parsed.student_profile).toEqual({ grade: 8, subject: 'algebra' });
  });

  it('rejects blank queries and fractional grades', () => {
    expect(
      TutorRequestSchema.safeParse({
        tenant_id: 't1',
        user_query: '   ',
        student_profile: { grade: 8, subject: 'algebra' },
      }).success,
    ).toBe(false);
    expect(
      TutorRequestSchema.safeParse({
        tenant_id: 't1',
        user_query: 'hi',
        student_profile: { grade: 8.5, subject: 'algebra' },
      }).success,
    ).toBe(false);
  });
});

describe('outbound schemas', () => {
  it('accept a response and an error envelope', () => {
    expect(
      TutorResponseSchema.safeParse({
        specialist: 'content',
        payload: { text: 'A quadratic equation is ...' },
        provenance: 'generated',
        latency_ms: 12,
        request_id: 'rq-abc',
        intent: 'explain',
        warnings: [],
      }).success,
    ).toBe(true);

    expect(
      TutorErrorEnvelopeSchema.safeParse({
        error: {
          code: 'TUTOR_ORCHESTRATION_FAILED',
          message: 'No response',
          specialist: 'content',
          specialists: ['content'],
          providers_attempted: ['primary', 'secondary'],
          attempts: 4,
        },
      }).success,
    ).toBe(true);
  });
});
