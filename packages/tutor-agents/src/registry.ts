import type { Logger } from '@studyhall/tutor-core';
import type { LLMClient } from '@studyhall/tutor-llm';
import { AnalystAgent } from './specialists/analyst.js';
import { ContentAgent } from './specialists/content.js';
import { GraderAgent } from './specialists/grader.js';
import { SolverAgent } from './specialists/solver.js';
import type { SpecialistRegistry } from './types.js';
import { LLMSolutionValidator } from './validation.js';

export interface SpecialistRegistryOptions {
  maxTokens?: number;
  quizQuestions?: number;
  solverValidation?: {
    enabled: boolean;
    maxRegenerations?: number;
  };
  logger?: Logger;
}

/**
 * All four specialists backed by one LLM client
 */
export function createSpecialists(llm: LLMClient, options: SpecialistRegistryOptions = {}): SpecialistRegistry {
  const { maxTokens, quizQuestions, solverValidation, logger } = options;
  const validator = solverValidation?.enabled ? new LLMSolutionValidator({ llm, maxTokens }) : undefined;
  return {
    content: new ContentAgent({ llm, maxTokens, quizQuestions }),
    solver: new SolverAgent({
      llm,
      maxTokens,
      validator,
      maxRegenerations: solverValidation?.maxRegenerations,
      logger,
    }),
    grader: new GraderAgent({ llm, maxTokens }),
    analyst: new AnalystAgent({ llm, maxTokens }),
  };
}
