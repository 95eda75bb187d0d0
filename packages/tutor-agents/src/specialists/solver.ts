/**
 * Solver specialist
 *
 * Works a problem into ordered steps and a final answer. With a validator,
 * each solution is reviewed and regenerated with the reviewer's issues
 * until it passes or the regeneration budget is spent.
 */

import { z } from 'zod';
import {
  CancelledError,
  getCategoryLogger,
  type Logger,
  type ProviderAttempt,
  type StudentProfile,
} from '@studyhall/tutor-core';
import type { LLMClient, LLMResult } from '@studyhall/tutor-llm';
import { assessLearner, type LearnerState } from '../learner-model.js';
import { buildSolverPrompt } from '../prompts.js';
import type { SolverSpecialist, SpecialistInput, SpecialistResult, SpecialistRunOptions } from '../types.js';
import type { SolutionReview, SolutionValidator } from '../validation.js';
import { sourcesOf } from './result.js';

export const SolverOutputSchema = z.object({
  steps: z.array(z.string()).min(1),
  finalAnswer: z.string().min(1),
  explanation: z.string().optional(),
});

export type SolverOutput = z.infer<typeof SolverOutputSchema>;

export const MAX_REGENERATIONS = 3;

export interface SolverAgentOptions {
  llm: LLMClient;
  maxTokens?: number;
  validator?: SolutionValidator;
  /** Regenerations after a rejected solution (capped at 3) */
  maxRegenerations?: number;
  logger?: Logger;
}

export class SolverAgent implements SolverSpecialist {
  readonly kind = 'solver';
  readonly acceptsContext = true;
  readonly acceptsPrior = false;

  private readonly llm: LLMClient;
  private readonly maxTokens?: number;
  private readonly validator?: SolutionValidator;
  private readonly maxRegenerations: number;
  private readonly logger: Logger;

  constructor(options: SolverAgentOptions) {
    this.llm = options.llm;
    this.maxTokens = options.maxTokens;
    this.validator = options.validator;
    this.maxRegenerations = Math.min(Math.max(options.maxRegenerations ?? MAX_REGENERATIONS, 0), MAX_REGENERATIONS);
    this.logger = getCategoryLogger('solver', options.logger);
  }

  async run(input: SpecialistInput, options: SpecialistRunOptions = {}): Promise<SpecialistResult> {
    const learner = assessLearner(input.profile, input.query.text);
    const attempts: ProviderAttempt[] = [];
    let fallbackUsed = false;
    let latencyMs = 0;
    let rejectedIssues: string[] = [];
    let regenerations = 0;

    for (;;) {
      const result = await this.solve(input, learner, rejectedIssues, options.signal);
      attempts.push(...result.attempts);
      fallbackUsed = fallbackUsed || result.fallbackUsed;
      latencyMs += result.latencyMs;

      const review = this.validator
        ? await this.review(this.validator, input.query.text, input.profile, result.value, options.signal)
        : undefined;

      if (!review || review.valid || review.unavailable || regenerations >= this.maxRegenerations) {
        return {
          kind: this.kind,
          payload: {
            ...this.toPayload(result.value, input),
            ...(review
              ? {
                  validated: review.valid,
                  validationIssues: review.valid ? undefined : review.issues,
                  regenerations,
                }
              : {}),
          },
          providerId: result.providerId,
          fallbackUsed,
          attempts,
          latencyMs,
        };
      }

      regenerations++;
      rejectedIssues = review.issues;
      this.logger.info({ regeneration: regenerations, issues: review.issues.length }, 'Solution rejected, regenerating');
    }
  }

  private async solve(
    input: SpecialistInput,
    learner: LearnerState,
    rejectedIssues: readonly string[],
    signal?: AbortSignal,
  ): Promise<LLMResult<SolverOutput>> {
    const { systemPrompt, prompt } = buildSolverPrompt({
      text: input.query.text,
      profile: input.profile,
      context: input.context,
      learner,
      rejectedIssues,
    });
    return this.llm.completeStructured(
      { prompt, systemPrompt, maxTokens: this.maxTokens },
      SolverOutputSchema,
      { task: this.kind, signal },
    );
  }

  /**
   * A review that cannot be obtained leaves the solution unverified;
   * only cancellation escapes.
   */
  private async review(
    validator: SolutionValidator,
    problem: string,
    profile: StudentProfile,
    output: SolverOutput,
    signal?: AbortSignal,
  ): Promise<SolutionReview & { unavailable?: boolean }> {
    try {
      return await validator.review(
        { problem, profile, steps: output.steps, finalAnswer: output.finalAnswer },
        { signal },
      );
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn({ err: message }, 'Solution review failed');
      return { valid: false, issues: [`Review unavailable: ${message}`], unavailable: true };
    }
  }

  private toPayload(output: SolverOutput, input: SpecialistInput) {
    const text = [
      ...output.steps.map((step, i) => `${i + 1}. ${step}`),
      `Answer: ${output.finalAnswer}`,
    ].join('\n');
    return {
      text: output.explanation ? `${output.explanation}\n\n${text}` : text,
      steps: output.steps,
      finalAnswer: output.finalAnswer,
      sources: sourcesOf(input.context),
    };
  }
}
