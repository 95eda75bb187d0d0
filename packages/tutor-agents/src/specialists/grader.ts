/**
 * Grader specialist
 *
 * Scores a submitted answer on a 0-10 scale. When the query carries no
 * separate answer, the query text itself is graded.
 */

import { z } from 'zod';
import type { LLMClient } from '@studyhall/tutor-llm';
import { buildGraderPrompt } from '../prompts.js';
import type { GraderSpecialist, SpecialistInput, SpecialistResult, SpecialistRunOptions } from '../types.js';
import { toSpecialistResult } from './result.js';

export const GRADE_MAX_SCORE = 10;
export const PASSING_SCORE = 7;

// Models sometimes quote the number; anything else is an invalid response
const ScoreSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+(\.\d+)?$/).transform(Number)])
  .pipe(z.number().min(0).max(GRADE_MAX_SCORE));

export const GraderOutputSchema = z.object({
  score: ScoreSchema,
  feedback: z.string().min(1),
  mistakes: z.array(z.string()).default([]),
});

export type GraderOutput = z.infer<typeof GraderOutputSchema>;

export interface GraderAgentOptions {
  llm: LLMClient;
  maxTokens?: number;
}

export class GraderAgent implements GraderSpecialist {
  readonly kind = 'grader';
  readonly acceptsContext = true;
  readonly acceptsPrior = false;

  private readonly llm: LLMClient;
  private readonly maxTokens?: number;

  constructor(options: GraderAgentOptions) {
    this.llm = options.llm;
    this.maxTokens = options.maxTokens;
  }

  async run(input: SpecialistInput, options: SpecialistRunOptions = {}): Promise<SpecialistResult> {
    const { query, profile, context } = input;
    const { systemPrompt, prompt } = buildGraderPrompt({
      question: query.text,
      submittedAnswer: query.submittedAnswer ?? query.text,
      expectedAnswer: query.expectedAnswer,
      profile,
      context,
    });

    const result = await this.llm.completeStructured(
      { prompt, systemPrompt, maxTokens: this.maxTokens },
      GraderOutputSchema,
      { task: this.kind, signal: options.signal },
    );
    const { score, feedback, mistakes } = result.value;

    return toSpecialistResult(
      this.kind,
      {
        text: `Score: ${score}/${GRADE_MAX_SCORE}\n${feedback}`,
        score,
        maxScore: GRADE_MAX_SCORE,
        correct: score >= PASSING_SCORE,
        feedback,
        mistakes,
      },
      result,
    );
  }
}
