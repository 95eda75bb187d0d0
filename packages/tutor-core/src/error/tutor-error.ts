/**
 * @module @studyhall/tutor-core/error
 * Standardized error classes for the tutoring orchestrator
 */

import type { SpecialistKind } from '../types/index.js';

/**
 * Error codes with their standard hints
 */
export const ERROR_HINTS = {
  TUTOR_CONFIG_INVALID: 'Configuration failed validation - check tutor.config.json and environment overrides',
  TUTOR_INVALID_REQUEST: 'Request does not match the inbound schema - check tenant_id, user_query and student_profile',
  TUTOR_PROVIDER_ERROR: 'LLM provider call failed - check provider URL, model name and credentials',
  TUTOR_EMBEDDING_ERROR: 'Embedding provider failed - check embedding configuration',
  TUTOR_RETRIEVAL_ERROR: 'Vector index query failed - grounding was skipped for this request',
  TUTOR_CACHE_ERROR: 'Semantic cache unavailable - request was served without the cache',
  TUTOR_CLASSIFICATION_AMBIGUOUS: 'Intent could not be determined - defaulted to explain',
  TUTOR_ORCHESTRATION_FAILED: 'No specialist could produce a response through any provider',
  TUTOR_TIMEOUT: 'Operation timed out - try increasing the step timeout',
  TUTOR_CANCELLED: 'Request was cancelled by the caller',
  TUTOR_INGEST_ERROR: 'Passage ingestion failed - check the corpus file format',
} as const;

export type ErrorCode = keyof typeof ERROR_HINTS;

export class TutorError extends Error {
  constructor(
    public code: string,
    message: string,
    public hint?: string,
    public meta?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'TutorError';
  }
}

/**
 * Maps TutorError codes (or error envelope codes) to CLI exit codes
 */
export function getExitCode(err: Pick<TutorError, 'code'>): number {
  if (err.code === 'TUTOR_ORCHESTRATION_FAILED') {return 3;}
  if (err.code === 'TUTOR_CONFIG_INVALID') {return 2;}
  if (err.code === 'TUTOR_INVALID_REQUEST') {return 2;}
  if (err.code === 'TUTOR_CANCELLED') {return 130;}
  return 1;
}

/**
 * Create a TutorError with standardized code and hint
 */
export function createTutorError(
  code: ErrorCode,
  message: string,
  meta?: Record<string, unknown>,
): TutorError {
  return new TutorError(code, message, ERROR_HINTS[code], meta);
}

/**
 * Create a TutorError from a generic error
 */
export function wrapError(error: unknown, code: ErrorCode = 'TUTOR_PROVIDER_ERROR'): TutorError {
  if (error instanceof TutorError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return createTutorError(code, message, { originalError: error });
}

/**
 * Check if an error is a TutorError
 */
export function isTutorError(error: unknown): error is TutorError {
  return error instanceof TutorError;
}

// === PROVIDER ERRORS ===

export type ProviderErrorKind = 'timeout' | 'rate-limited' | 'invalid-response' | 'unavailable';

export interface ProviderAttempt {
  providerId: string;
  /** 1-based attempt number against this provider */
  attempt: number;
  ok: boolean;
  kind?: ProviderErrorKind;
  message?: string;
  latencyMs: number;
}

export interface ProviderErrorOptions {
  providerId: string;
  retryable?: boolean;
  status?: number;
  attempts?: ProviderAttempt[];
  cause?: unknown;
}

export class ProviderError extends TutorError {
  readonly kind: ProviderErrorKind;
  readonly providerId: string;
  readonly retryable: boolean;
  readonly status?: number;
  readonly attempts: ProviderAttempt[];

  constructor(kind: ProviderErrorKind, message: string, options: ProviderErrorOptions) {
    super('TUTOR_PROVIDER_ERROR', message, ERROR_HINTS.TUTOR_PROVIDER_ERROR, {
      kind,
      providerId: options.providerId,
      status: options.status,
    });
    this.name = 'ProviderError';
    this.kind = kind;
    this.providerId = options.providerId;
    this.retryable = options.retryable ?? kind !== 'unavailable';
    this.status = options.status;
    this.attempts = options.attempts ?? [];
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  /** Distinct providers in the order they were tried */
  get providersAttempted(): string[] {
    return [...new Set(this.attempts.map(a => a.providerId))];
  }
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

// === NON-FATAL DEPENDENCY ERRORS ===

export class RetrievalError extends TutorError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super('TUTOR_RETRIEVAL_ERROR', message, ERROR_HINTS.TUTOR_RETRIEVAL_ERROR, meta);
    this.name = 'RetrievalError';
  }
}

export class CacheError extends TutorError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super('TUTOR_CACHE_ERROR', message, ERROR_HINTS.TUTOR_CACHE_ERROR, meta);
    this.name = 'CacheError';
  }
}

export class TimeoutError extends TutorError {
  constructor(
    public readonly step: string,
    public readonly timeoutMs: number,
  ) {
    super('TUTOR_TIMEOUT', `${step} timed out after ${timeoutMs}ms`, ERROR_HINTS.TUTOR_TIMEOUT, {
      step,
      timeoutMs,
    });
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends TutorError {
  constructor(step: string) {
    super('TUTOR_CANCELLED', `${step} was cancelled`, ERROR_HINTS.TUTOR_CANCELLED, { step });
    this.name = 'CancelledError';
  }
}

// === FATAL ===

export interface OrchestrationFailure {
  code: 'TUTOR_ORCHESTRATION_FAILED';
  message: string;
  specialists: SpecialistKind[];
  providersAttempted: string[];
  attempts: number;
  requestId?: string;
}

/**
 * Raised only when no eligible specialist could produce a response
 * through any configured provider.
 */
export class OrchestrationError extends TutorError {
  readonly specialists: SpecialistKind[];
  readonly providersAttempted: string[];
  readonly attemptCount: number;
  readonly requestId?: string;

  constructor(options: {
    specialists: SpecialistKind[];
    providersAttempted: string[];
    attemptCount: number;
    requestId?: string;
    cause?: unknown;
  }) {
    const who = options.specialists.join(' -> ') || 'none';
    super(
      'TUTOR_ORCHESTRATION_FAILED',
      `No response from specialist ${who} after ${options.attemptCount} attempts across providers [${options.providersAttempted.join(', ')}]`,
      ERROR_HINTS.TUTOR_ORCHESTRATION_FAILED,
      {
        specialists: options.specialists,
        providersAttempted: options.providersAttempted,
        attempts: options.attemptCount,
      },
    );
    this.name = 'OrchestrationError';
    this.specialists = options.specialists;
    this.providersAttempted = options.providersAttempted;
    this.attemptCount = options.attemptCount;
    this.requestId = options.requestId;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  toJSON(): OrchestrationFailure {
    return {
      code: 'TUTOR_ORCHESTRATION_FAILED',
      message: this.message,
      specialists: this.specialists,
      providersAttempted: this.providersAttempted,
      attempts: this.attemptCount,
      requestId: this.requestId,
    };
  }
}

export function isOrchestrationError(error: unknown): error is OrchestrationError {
  return error instanceof OrchestrationError;
}
