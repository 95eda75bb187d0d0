/**
 * @studyhall/tutor-agents
 * Specialist agents, prompt templates and the learner model
 */

export {
  ContentAgent,
  QuizOutputSchema,
  isQuizRequest,
  formatQuiz,
  MAX_QUIZ_QUESTIONS,
  DEFAULT_QUIZ_QUESTIONS,
  type ContentAgentOptions,
  type QuizOutput,
} from './specialists/content.js';
export {
  SolverAgent,
  SolverOutputSchema,
  MAX_REGENERATIONS,
  type SolverAgentOptions,
  type SolverOutput,
} from './specialists/solver.js';
export {
  LLMSolutionValidator,
  SolutionReviewSchema,
  type LLMSolutionValidatorOptions,
  type SolutionReview,
  type SolutionUnderReview,
  type SolutionValidator,
} from './validation.js';
export {
  GraderAgent,
  GraderOutputSchema,
  GRADE_MAX_SCORE,
  PASSING_SCORE,
  type GraderAgentOptions,
  type GraderOutput,
} from './specialists/grader.js';
export { AnalystAgent, AnalystOutputSchema, type AnalystAgentOptions, type AnalystOutput } from './specialists/analyst.js';
export { createSpecialists, type SpecialistRegistryOptions } from './registry.js';
export {
  assessLearner,
  DEFAULT_MAX_SCORE,
  PRIOR_MASTERY,
  SCAFFOLDING_THRESHOLD,
  type LearnerState,
} from './learner-model.js';
export {
  buildContentPrompt,
  buildQuizPrompt,
  buildSolverPrompt,
  buildSolutionReviewPrompt,
  buildGraderPrompt,
  buildAnalystPrompt,
  type PromptParts,
} from './prompts.js';
export type {
  Specialist,
  SpecialistInput,
  SpecialistResult,
  SpecialistRunOptions,
  SpecialistRegistry,
  ContentSpecialist,
  SolverSpecialist,
  GraderSpecialist,
  AnalystSpecialist,
} from './types.js';
