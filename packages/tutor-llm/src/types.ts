/**
 * LLM Provider Interface
 *
 * One provider is one OpenAI-compatible completion endpoint. The client
 * owns retries, backoff and fallback; providers only make a single call.
 */

import type { ProviderAttempt } from '@studyhall/tutor-core';

export interface LLMCompleteOptions {
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  stop?: string[];
  /** Ask the endpoint for a JSON object response */
  json?: boolean;
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface ProviderCompletion {
  text: string;
  model?: string;
  usage?: ProviderUsage;
}

export interface LLMProvider {
  readonly id: string;

  /**
   * Single completion call. Failures should be thrown as ProviderError;
   * anything else is treated as `unavailable`.
   */
  complete(options: LLMCompleteOptions, signal: AbortSignal): Promise<ProviderCompletion>;
}

export interface ProviderSettings {
  /** Extra attempts against the same provider after the first */
  retries: number;
  backoffBaseMs: number;
  /** Per-attempt timeout */
  timeoutMs: number;
}

export interface ProviderEntry {
  provider: LLMProvider;
  settings: ProviderSettings;
}

export interface LLMCallOptions {
  /** Task name used for provider preference (specialist kind) */
  task?: string;
  signal?: AbortSignal;
}

export interface LLMResult<T = string> {
  value: T;
  /** Raw text returned by the provider */
  text: string;
  providerId: string;
  /** The answering provider was not first in the order for this task */
  fallbackUsed: boolean;
  attempts: ProviderAttempt[];
  latencyMs: number;
}

export interface ProviderStats {
  calls: number;
  failures: number;
  tokensIn: number;
  tokensOut: number;
  totalLatencyMs: number;
}

export interface LLMStats {
  calls: number;
  failures: number;
  fallbacks: number;
  tokensIn: number;
  tokensOut: number;
  byProvider: Record<string, ProviderStats>;
}
