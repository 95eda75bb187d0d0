/**
 * @module @studyhall/tutor-llm/providers/openai
 * OpenAI-compatible chat completion provider
 */

import OpenAI from 'openai';
import { ProviderError, type ProviderErrorKind } from '@studyhall/tutor-core';
import type { LLMCompleteOptions, LLMProvider, ProviderCompletion } from '../types.js';

export interface ChatCompletionBody {
  model: string;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
  max_tokens: number;
  temperature: number;
  stop?: string[];
  response_format?: { type: 'json_object' };
}

export interface ChatCompletionReply {
  model: string;
  choices: Array<{
    message: { content: string | null };
    finish_reason: string | null;
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number } | null;
}

export type ChatCompletionFn = (
  body: ChatCompletionBody,
  options: { signal: AbortSignal },
) => Promise<ChatCompletionReply>;

export interface OpenAIProviderOptions {
  id: string;
  model: string;
  /** Required unless `createCompletion` is given */
  apiKey?: string;
  /** Base URL for API (optional, for custom endpoints) */
  baseURL?: string;
  /** SDK-level timeout; the client enforces its own per-attempt timeout too */
  timeout?: number;
  temperature?: number;
  maxTokens?: number;
  /** Transport override, used by tests and custom gateways */
  createCompletion?: ChatCompletionFn;
}

function createSdkCompletion(options: OpenAIProviderOptions): ChatCompletionFn {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    // Retries are owned by the LLM client
    maxRetries: 0,
    timeout: options.timeout ?? 30000,
  });

  return (body, { signal }) =>
    client.chat.completions.create(
      {
        model: body.model,
        messages: body.messages.map(message =>
          message.role === 'system'
            ? { role: 'system' as const, content: message.content }
            : { role: 'user' as const, content: message.content },
        ),
        max_tokens: body.max_tokens,
        temperature: body.temperature,
        stop: body.stop,
        response_format: body.response_format,
      },
      { signal },
    );
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Map SDK and HTTP failures onto provider error kinds
 */
export function toProviderError(error: unknown, providerId: string): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ProviderError('timeout', message, { providerId, cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ProviderError('unavailable', message, { providerId, retryable: true, cause: error });
  }

  const status = statusOf(error);
  let kind: ProviderErrorKind = 'unavailable';
  let retryable = true;

  if (status === 429) {
    kind = 'rate-limited';
  } else if (status === 408 || status === 504) {
    kind = 'timeout';
  } else if (status !== undefined && status >= 500) {
    kind = 'unavailable';
  } else if (status !== undefined && status >= 400) {
    // Auth, missing model, malformed request: retrying the same provider will not help
    retryable = false;
  }

  return new ProviderError(kind, message, { providerId, status, retryable, cause: error });
}

/**
 * Create OpenAI-compatible provider
 */
export function createOpenAIProvider(options: OpenAIProviderOptions): LLMProvider {
  const { id, model, temperature = 0.3, maxTokens = 1024 } = options;

  if (!options.createCompletion && !options.apiKey) {
    throw new ProviderError('unavailable', `Provider "${id}" has no API key`, {
      providerId: id,
      retryable: false,
    });
  }

  const createCompletion = options.createCompletion ?? createSdkCompletion(options);

  return {
    id,

    async complete(request: LLMCompleteOptions, signal: AbortSignal): Promise<ProviderCompletion> {
      const messages: ChatCompletionBody['messages'] = [];
      if (request.systemPrompt) {
        messages.push({ role: 'system', content: request.systemPrompt });
      }
      messages.push({ role: 'user', content: request.prompt });

      let response: ChatCompletionReply;
      try {
        response = await createCompletion(
          {
            model,
            messages,
            max_tokens: request.maxTokens ?? maxTokens,
            temperature: request.temperature ?? temperature,
            stop: request.stop,
            response_format: request.json ? { type: 'json_object' } : undefined,
          },
          { signal },
        );
      } catch (error) {
        throw toProviderError(error, id);
      }

      const choice = response.choices[0];
      const text = choice?.message.content ?? '';
      if (!choice || text.trim().length === 0) {
        throw new ProviderError('invalid-response', `Empty completion from ${id}`, { providerId: id });
      }

      return {
        text,
        model: response.model,
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
            }
          : undefined,
      };
    },
  };
}
