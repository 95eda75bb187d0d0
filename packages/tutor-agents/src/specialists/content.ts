/**
 * Content specialist
 *
 * Explains a concept at the student's level, grounded in retrieved passages.
 * Quiz requests get a structured set of questions instead.
 */

import { z } from 'zod';
import type { QuizQuestion } from '@studyhall/tutor-core';
import type { LLMClient } from '@studyhall/tutor-llm';
import { assessLearner } from '../learner-model.js';
import { buildContentPrompt, buildQuizPrompt } from '../prompts.js';
import type { ContentSpecialist, SpecialistInput, SpecialistResult, SpecialistRunOptions } from '../types.js';
import { sourcesOf, toSpecialistResult } from './result.js';

export const MAX_QUIZ_QUESTIONS = 12;
export const DEFAULT_QUIZ_QUESTIONS = 5;

const QUIZ_REQUEST = /\b(quiz|test me|practice questions?)\b/i;

export function isQuizRequest(text: string): boolean {
  return QUIZ_REQUEST.test(text);
}

const QuizQuestionSchema = z
  .object({
    question: z.string().min(1),
    type: z.enum(['multiple_choice', 'open']).default('open'),
    options: z.array(z.string().min(1)).optional(),
    answer: z.string().min(1),
  })
  .superRefine((value, ctx) => {
    if (value.type !== 'multiple_choice') {
      return;
    }
    if (!value.options || value.options.length < 2) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['options'], message: 'needs at least two options' });
    } else if (!value.options.includes(value.answer)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['answer'], message: 'must be one of the options' });
    }
  });

export const QuizOutputSchema = z.object({
  questions: z.array(QuizQuestionSchema).min(1).max(MAX_QUIZ_QUESTIONS),
});

export type QuizOutput = z.infer<typeof QuizOutputSchema>;

export interface ContentAgentOptions {
  llm: LLMClient;
  maxTokens?: number;
  /** Questions asked for in quiz mode */
  quizQuestions?: number;
}

export class ContentAgent implements ContentSpecialist {
  readonly kind = 'content';
  readonly acceptsContext = true;
  readonly acceptsPrior = false;

  private readonly llm: LLMClient;
  private readonly maxTokens?: number;
  private readonly quizQuestions: number;

  constructor(options: ContentAgentOptions) {
    this.llm = options.llm;
    this.maxTokens = options.maxTokens;
    this.quizQuestions = Math.min(Math.max(options.quizQuestions ?? DEFAULT_QUIZ_QUESTIONS, 1), MAX_QUIZ_QUESTIONS);
  }

  async run(input: SpecialistInput, options: SpecialistRunOptions = {}): Promise<SpecialistResult> {
    if (isQuizRequest(input.query.text)) {
      return this.runQuiz(input, options);
    }

    const { query, profile, context } = input;
    const learner = assessLearner(profile, query.text);
    const { systemPrompt, prompt } = buildContentPrompt({
      text: query.text,
      profile,
      context,
      history: query.history,
      learner,
    });

    const result = await this.llm.complete(
      { prompt, systemPrompt, maxTokens: this.maxTokens },
      { task: this.kind, signal: options.signal },
    );

    return toSpecialistResult(this.kind, { text: result.value.trim(), sources: sourcesOf(context) }, result);
  }

  private async runQuiz(input: SpecialistInput, options: SpecialistRunOptions): Promise<SpecialistResult> {
    const { query, profile, context } = input;
    const { systemPrompt, prompt } = buildQuizPrompt({
      text: query.text,
      profile,
      context,
      learner: assessLearner(profile, query.text),
      questionCount: this.quizQuestions,
    });

    const result = await this.llm.completeStructured(
      { prompt, systemPrompt, maxTokens: this.maxTokens },
      QuizOutputSchema,
      { task: this.kind, signal: options.signal },
    );
    const quiz: QuizQuestion[] = result.value.questions;

    return toSpecialistResult(this.kind, { text: formatQuiz(quiz), quiz, sources: sourcesOf(context) }, result);
  }
}

export function formatQuiz(quiz: readonly QuizQuestion[]): string {
  return quiz
    .map((item, i) => {
      const options = (item.options ?? []).map((option, j) => `   ${String.fromCharCode(97 + j)}) ${option}`);
      return [`${i + 1}. ${item.question}`, ...options].join('\n');
    })
    .join('\n');
}
