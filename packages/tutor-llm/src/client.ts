/**
 * LLM Client
 *
 * Consumes an ordered provider list: each provider is retried up to its
 * `retries` with exponential backoff, then the next provider is tried.
 * Every attempt yields a typed outcome; only cancellation is thrown out
 * of the loop.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import {
  CancelledError,
  ProviderError,
  TimeoutError,
  getCategoryLogger,
  sleep as defaultSleep,
  withTimeout,
  type Logger,
  type ProviderAttempt,
} from '@studyhall/tutor-core';
import { extractJSON, JSON_INSTRUCTIONS } from './json.js';
import { toProviderError } from './providers/openai.js';
import type {
  LLMCallOptions,
  LLMCompleteOptions,
  LLMResult,
  LLMStats,
  ProviderCompletion,
  ProviderEntry,
  ProviderStats,
} from './types.js';

export interface LLMClientOptions {
  /** Preferred provider id per task; moved to the front of the order */
  taskRouting?: Partial<Record<string, string>>;
  logger?: Logger;
  /** Backoff sleep, replaceable in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

type AttemptOutcome<T> =
  | { ok: true; value: T; completion: ProviderCompletion; latencyMs: number }
  | { ok: false; error: ProviderError; latencyMs: number };

function emptyProviderStats(): ProviderStats {
  return { calls: 0, failures: 0, tokensIn: 0, tokensOut: 0, totalLatencyMs: 0 };
}

function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export class LLMClient {
  private readonly entries: ProviderEntry[];
  private readonly taskRouting: Partial<Record<string, string>>;
  private readonly logger: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private stats: LLMStats;

  constructor(entries: ProviderEntry[], options: LLMClientOptions = {}) {
    if (entries.length === 0) {
      throw new ProviderError('unavailable', 'LLM client requires at least one provider', {
        providerId: 'none',
        retryable: false,
      });
    }
    this.entries = entries;
    this.taskRouting = options.taskRouting ?? {};
    this.logger = getCategoryLogger('llm', options.logger);
    this.sleep = options.sleep ?? defaultSleep;
    this.stats = this.createStats();
  }

  get providerIds(): string[] {
    return this.entries.map(entry => entry.provider.id);
  }

  /**
   * Generate text completion
   */
  async complete(request: LLMCompleteOptions, options: LLMCallOptions = {}): Promise<LLMResult<string>> {
    return this.execute(request, text => text, options);
  }

  /**
   * Generate JSON structured output validated by `schema`.
   * Output that does not parse or validate is an `invalid-response`
   * failure and goes through the same retry and fallback path.
   */
  async completeStructured<T>(
    request: LLMCompleteOptions,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: LLMCallOptions = {},
  ): Promise<LLMResult<T>> {
    const systemPrompt = request.systemPrompt
      ? `${request.systemPrompt}\n\n${JSON_INSTRUCTIONS}`
      : JSON_INSTRUCTIONS;

    return this.execute(
      { ...request, systemPrompt, json: true, temperature: request.temperature ?? 0.1 },
      text => {
        const parsed = schema.safeParse(extractJSON(text));
        if (!parsed.success) {
          const first = parsed.error.issues[0];
          throw new Error(`Structured output failed validation at ${first?.path.join('.') ?? '(root)'}: ${first?.message ?? 'invalid'}`);
        }
        return parsed.data;
      },
      options,
    );
  }

  getStats(): LLMStats {
    const byProvider: Record<string, ProviderStats> = {};
    for (const [id, stats] of Object.entries(this.stats.byProvider)) {
      byProvider[id] = { ...stats };
    }
    return { ...this.stats, byProvider };
  }

  resetStats(): void {
    this.stats = this.createStats();
  }

  /**
   * Provider order for a task: the routed provider first, the rest in
   * configured order.
   */
  orderFor(task?: string): ProviderEntry[] {
    const preferred = task ? this.taskRouting[task] : undefined;
    if (!preferred) {
      return [...this.entries];
    }
    const head = this.entries.filter(entry => entry.provider.id === preferred);
    const tail = this.entries.filter(entry => entry.provider.id !== preferred);
    return [...head, ...tail];
  }

  private async execute<T>(
    request: LLMCompleteOptions,
    parse: (text: string) => T,
    options: LLMCallOptions,
  ): Promise<LLMResult<T>> {
    const started = Date.now();
    const order = this.orderFor(options.task);
    const attempts: ProviderAttempt[] = [];
    let lastError: ProviderError | undefined;

    this.stats.calls++;

    for (const [index, entry] of order.entries()) {
      const { provider, settings } = entry;
      const maxAttempts = settings.retries + 1;

      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (attempt > 1) {
          await this.sleep(settings.backoffBaseMs * 2 ** (attempt - 2), options.signal);
        }

        const outcome = await this.runAttempt(entry, request, parse, options.signal);
        this.record(provider.id, request, outcome);

        if (outcome.ok) {
          attempts.push({ providerId: provider.id, attempt, ok: true, latencyMs: outcome.latencyMs });
          const fallbackUsed = index > 0;
          if (fallbackUsed) {
            this.stats.fallbacks++;
            this.logger.warn(
              { providerId: provider.id, task: options.task, attempts: attempts.length },
              'Completion served by fallback provider',
            );
          }
          return {
            value: outcome.value,
            text: outcome.completion.text,
            providerId: provider.id,
            fallbackUsed,
            attempts,
            latencyMs: Date.now() - started,
          };
        }

        const { error } = outcome;
        lastError = error;
        attempts.push({
          providerId: provider.id,
          attempt,
          ok: false,
          kind: error.kind,
          message: error.message,
          latencyMs: outcome.latencyMs,
        });
        this.logger.debug(
          { providerId: provider.id, attempt, kind: error.kind, retryable: error.retryable },
          'Provider attempt failed',
        );

        if (!error.retryable) {
          break;
        }
      }
    }

    this.stats.failures++;
    const providersAttempted = [...new Set(attempts.map(a => a.providerId))];
    this.logger.error(
      { providersAttempted, attempts: attempts.length, task: options.task },
      'All providers exhausted',
    );

    throw new ProviderError(
      'unavailable',
      `All providers failed after ${attempts.length} attempts [${providersAttempted.join(', ')}]: ${lastError?.message ?? 'no providers'}`,
      {
        providerId: lastError?.providerId ?? 'none',
        retryable: false,
        attempts,
        cause: lastError,
      },
    );
  }

  private async runAttempt<T>(
    entry: ProviderEntry,
    request: LLMCompleteOptions,
    parse: (text: string) => T,
    signal?: AbortSignal,
  ): Promise<AttemptOutcome<T>> {
    const { provider, settings } = entry;
    const started = Date.now();

    try {
      const completion = await withTimeout(
        attemptSignal => provider.complete(request, attemptSignal),
        { step: `llm:${provider.id}`, timeoutMs: settings.timeoutMs, signal },
      );
      const latencyMs = Date.now() - started;

      try {
        return { ok: true, value: parse(completion.text), completion, latencyMs };
      } catch (parseError) {
        const message = parseError instanceof Error ? parseError.message : String(parseError);
        return {
          ok: false,
          error: new ProviderError('invalid-response', message, {
            providerId: provider.id,
            cause: parseError,
          }),
          latencyMs,
        };
      }
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      const latencyMs = Date.now() - started;
      if (error instanceof TimeoutError) {
        return {
          ok: false,
          error: new ProviderError('timeout', error.message, { providerId: provider.id, cause: error }),
          latencyMs,
        };
      }
      return { ok: false, error: toProviderError(error, provider.id), latencyMs };
    }
  }

  private record<T>(providerId: string, request: LLMCompleteOptions, outcome: AttemptOutcome<T>): void {
    const stats = this.stats.byProvider[providerId] ?? emptyProviderStats();
    stats.calls++;
    stats.totalLatencyMs += outcome.latencyMs;
    if (outcome.ok) {
      const usage = outcome.completion.usage;
      const tokensIn = usage?.promptTokens
        ?? estimateTokens(`${request.systemPrompt ?? ''}${request.prompt}`);
      const tokensOut = usage?.completionTokens ?? estimateTokens(outcome.completion.text);
      stats.tokensIn += tokensIn;
      stats.tokensOut += tokensOut;
      this.stats.tokensIn += tokensIn;
      this.stats.tokensOut += tokensOut;
    } else {
      stats.failures++;
    }
    this.stats.byProvider[providerId] = stats;
  }

  private createStats(): LLMStats {
    const byProvider: Record<string, ProviderStats> = {};
    for (const entry of this.entries) {
      byProvider[entry.provider.id] = emptyProviderStats();
    }
    return { calls: 0, failures: 0, fallbacks: 0, tokensIn: 0, tokensOut: 0, byProvider };
  }
}
