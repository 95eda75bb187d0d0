/**
 * @studyhall/tutor-llm
 * LLM providers and the retrying, falling-back client
 */

export { LLMClient, type LLMClientOptions } from './client.js';
export { extractJSON, JSON_INSTRUCTIONS } from './json.js';
export {
  createOpenAIProvider,
  toProviderError,
  type OpenAIProviderOptions,
  type ChatCompletionFn,
  type ChatCompletionBody,
  type ChatCompletionReply,
} from './providers/openai.js';
export type {
  LLMProvider,
  LLMCompleteOptions,
  LLMCallOptions,
  LLMResult,
  LLMStats,
  ProviderStats,
  ProviderCompletion,
  ProviderUsage,
  ProviderEntry,
  ProviderSettings,
} from './types.js';
