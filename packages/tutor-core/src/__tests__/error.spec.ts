import { describe, it, expect } from 'vitest';
import {
  TutorError,
  ProviderError,
  OrchestrationError,
  TimeoutError,
  getExitCode,
  createTutorError,
  wrapError,
  isTutorError,
  ERROR_HINTS,
} from '../error/tutor-error.js';

describe('TutorError', () => {
  it('should create error with code and message', () => {
    const error = new TutorError('TUTOR_TEST', 'Test error message');

    expect(error.name).toBe('TutorError');
    expect(error.code).toBe('TUTOR_TEST');
    expect(error.message).toBe('Test error message');
    expect(error.hint).toBeUndefined();
    expect(error.meta).toBeUndefined();
  });

  it('should create error with hint and meta', () => {
    const meta = { tenantId: 't1' };
    const error = new TutorError('TUTOR_TEST', 'Test error', 'Try again', meta);

    expect(error.hint).toBe('Try again');
    expect(error.meta).toBe(meta);
  });

  it('should map error codes to exit codes', () => {
    expect(getExitCode(new TutorError('TUTOR_ORCHESTRATION_FAILED', 'Failed'))).toBe(3);
    expect(getExitCode(new TutorError('TUTOR_CONFIG_INVALID', 'Bad config'))).toBe(2);
    expect(getExitCode(new TutorError('TUTOR_INVALID_REQUEST', 'Bad request'))).toBe(2);
    expect(getExitCode(new TutorError('TUTOR_CANCELLED', 'Cancelled'))).toBe(130);
    expect(getExitCode(new TutorError('TUTOR_TIMEOUT', 'Timeout'))).toBe(1);
    expect(getExitCode(new TutorError('UNKNOWN', 'Unknown'))).toBe(1);
  });

  it('should attach standard hints', () => {
    const error = createTutorError('TUTOR_CACHE_ERROR', 'store down');
    expect(error.hint).toBe(ERROR_HINTS.TUTOR_CACHE_ERROR);
  });

  it('should wrap unknown errors once', () => {
    const wrapped = wrapError(new Error('boom'), 'TUTOR_INGEST_ERROR');
    expect(wrapped.code).toBe('TUTOR_INGEST_ERROR');
    expect(wrapped.message).toBe('boom');
    expect(wrapError(wrapped)).toBe(wrapped);
    expect(wrapError('plain').message).toBe('plain');
    expect(isTutorError(wrapped)).toBe(true);
    expect(isTutorError(new Error('x'))).toBe(false);
  });
});

describe('ProviderError', () => {
  it('should treat unavailable as not retryable by default', () => {
    expect(new ProviderError('unavailable', 'down', { providerId: 'a' }).retryable).toBe(false);
    expect(new ProviderError('timeout', 'slow', { providerId: 'a' }).retryable).toBe(true);
  });

  it('should list distinct providers in attempt order', () => {
    const error = new ProviderError('unavailable', 'exhausted', {
      providerId: 'b',
      attempts: [
        { providerId: 'a', attempt: 1, ok: false, kind: 'timeout', latencyMs: 1 },
        { providerId: 'a', attempt: 2, ok: false, kind: 'timeout', latencyMs: 1 },
        { providerId: 'b', attempt: 1, ok: false, kind: 'rate-limited', latencyMs: 1 },
      ],
    });
    expect(error.providersAttempted).toEqual(['a', 'b']);
    expect(error.code).toBe('TUTOR_PROVIDER_ERROR');
  });
});

describe('OrchestrationError', () => {
  it('should serialize to a structured failure', () => {
    const error = new OrchestrationError({
      specialists: ['content'],
      providersAttempted: ['primary', 'secondary'],
      attemptCount: 4,
      requestId: 'rq-1',
    });

    expect(error.message).toBe(
      'No response from specialist content after 4 attempts across providers [primary, secondary]',
    );
    expect(error.toJSON()).toEqual({
      code: 'TUTOR_ORCHESTRATION_FAILED',
      message: error.message,
      specialists: ['content'],
      providersAttempted: ['primary', 'secondary'],
      attempts: 4,
      requestId: 'rq-1',
    });
    expect(getExitCode(error)).toBe(3);
  });
});

describe('TimeoutError', () => {
  it('should name the step', () => {
    const error = new TimeoutError('retrieval', 2000);
    expect(error.message).toBe('retrieval timed out after 2000ms');
    expect(error.code).toBe('TUTOR_TIMEOUT');
  });
});
