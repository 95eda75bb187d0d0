import type { AgentPayload, SpecialistKind } from '@studyhall/tutor-core';
import type { LLMResult } from '@studyhall/tutor-llm';
import type { SpecialistResult } from '../types.js';

export function toSpecialistResult<T>(
  kind: SpecialistKind,
  payload: AgentPayload,
  llm: LLMResult<T>,
): SpecialistResult {
  return {
    kind,
    payload,
    providerId: llm.providerId,
    fallbackUsed: llm.fallbackUsed,
    attempts: llm.attempts,
    latencyMs: llm.latencyMs,
  };
}

export function sourcesOf(context: ReadonlyArray<{ sourceId: string }>): string[] {
  return [...new Set(context.map(passage => passage.sourceId))];
}
