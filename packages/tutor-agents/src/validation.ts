/**
 * Solution review for the solver's validate-then-regenerate loop
 */

import { z } from 'zod';
import type { StudentProfile } from '@studyhall/tutor-core';
import type { LLMClient } from '@studyhall/tutor-llm';
import { buildSolutionReviewPrompt } from './prompts.js';

export const SolutionReviewSchema = z.object({
  valid: z.boolean(),
  issues: z.array(z.string()).default([]),
});

export type SolutionReview = z.infer<typeof SolutionReviewSchema>;

export interface SolutionUnderReview {
  problem: string;
  profile: StudentProfile;
  steps: readonly string[];
  finalAnswer: string;
}

export interface SolutionValidator {
  review(solution: SolutionUnderReview, options?: { signal?: AbortSignal }): Promise<SolutionReview>;
}

export interface LLMSolutionValidatorOptions {
  llm: LLMClient;
  maxTokens?: number;
}

/**
 * Asks a model to check a worked solution. A review that says invalid
 * without naming an issue gets a generic one, so the solver always has
 * something to fix.
 */
export class LLMSolutionValidator implements SolutionValidator {
  private readonly llm: LLMClient;
  private readonly maxTokens?: number;

  constructor(options: LLMSolutionValidatorOptions) {
    this.llm = options.llm;
    this.maxTokens = options.maxTokens;
  }

  async review(solution: SolutionUnderReview, options: { signal?: AbortSignal } = {}): Promise<SolutionReview> {
    const { systemPrompt, prompt } = buildSolutionReviewPrompt(solution);
    const result = await this.llm.completeStructured(
      { prompt, systemPrompt, maxTokens: this.maxTokens },
      SolutionReviewSchema,
      { task: 'validator', signal: options.signal },
    );
    const { valid, issues } = result.value;
    if (!valid && issues.length === 0) {
      return { valid, issues: ['Solution was rejected without a stated reason'] };
    }
    return { valid, issues };
  }
}
