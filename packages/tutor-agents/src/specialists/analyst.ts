/**
 * Analyst specialist
 *
 * Turns performance signals, and the grader's output when chained, into
 * strengths, weaknesses and recommendations. Does not read retrieved context.
 */

import { z } from 'zod';
import type { LLMClient } from '@studyhall/tutor-llm';
import { assessLearner } from '../learner-model.js';
import { buildAnalystPrompt } from '../prompts.js';
import type { AnalystSpecialist, SpecialistInput, SpecialistResult, SpecialistRunOptions } from '../types.js';
import { toSpecialistResult } from './result.js';

export const AnalystOutputSchema = z.object({
  analysis: z.string().min(1),
  strengths: z.array(z.string()).default([]),
  weaknesses: z.array(z.string()).default([]),
  recommendations: z.array(z.string()).default([]),
});

export type AnalystOutput = z.infer<typeof AnalystOutputSchema>;

export interface AnalystAgentOptions {
  llm: LLMClient;
  maxTokens?: number;
}

export class AnalystAgent implements AnalystSpecialist {
  readonly kind = 'analyst';
  readonly acceptsContext = false;
  readonly acceptsPrior = true;

  private readonly llm: LLMClient;
  private readonly maxTokens?: number;

  constructor(options: AnalystAgentOptions) {
    this.llm = options.llm;
    this.maxTokens = options.maxTokens;
  }

  async run(input: SpecialistInput, options: SpecialistRunOptions = {}): Promise<SpecialistResult> {
    const { query, profile, prior } = input;
    const { systemPrompt, prompt } = buildAnalystPrompt({
      text: query.text,
      profile,
      learner: assessLearner(profile, query.text),
      grading: prior,
    });

    const result = await this.llm.completeStructured(
      { prompt, systemPrompt, maxTokens: this.maxTokens },
      AnalystOutputSchema,
      { task: this.kind, signal: options.signal },
    );
    const output = result.value;

    return toSpecialistResult(
      this.kind,
      {
        text: output.analysis,
        strengths: output.strengths,
        weaknesses: output.weaknesses,
        recommendations: output.recommendations,
      },
      result,
    );
  }
}
