/**
 * Prompt templates. Pure functions of their inputs.
 */

import type { AgentPayload, ConversationTurn, RetrievedContext, StudentProfile } from '@studyhall/tutor-core';
import type { LearnerState } from './learner-model.js';

export interface PromptParts {
  systemPrompt: string;
  prompt: string;
}

const HISTORY_TURNS = 6;

function formatContext(context: RetrievedContext): string {
  if (context.length === 0) {
    return 'No reference material was found. Answer from general curriculum knowledge.';
  }
  return context.map((passage, i) => `[${i + 1}] (${passage.sourceId}) ${passage.text}`).join('\n');
}

function formatHistory(history: readonly ConversationTurn[] | undefined): string | null {
  if (!history || history.length === 0) {
    return null;
  }
  return history
    .slice(-HISTORY_TURNS)
    .map(turn => `${turn.role === 'student' ? 'Student' : 'Tutor'}: ${turn.text}`)
    .join('\n');
}

function formatLearner(learner: LearnerState): string[] {
  const lines: string[] = [];
  if (learner.mastery !== null) {
    lines.push(`Estimated mastery: ${Math.round(learner.mastery * 100)}%`);
  }
  if (learner.requiresRecap) {
    lines.push('The student missed lessons on this topic: start with a short recap of the prerequisites.');
  }
  if (learner.enableScaffolding) {
    lines.push('Mastery is low: break the material into small steps and check understanding after each.');
  }
  if (learner.focusTopics.length > 0) {
    lines.push(`Topics needing attention: ${learner.focusTopics.join(', ')}`);
  }
  return lines;
}

function studentLine(profile: StudentProfile): string {
  return `Student: grade ${profile.grade}, subject ${profile.subject}`;
}

function join(sections: Array<string | null | undefined>): string {
  return sections.filter((s): s is string => Boolean(s)).join('\n\n');
}

export function buildContentPrompt(input: {
  text: string;
  profile: StudentProfile;
  context: RetrievedContext;
  history?: readonly ConversationTurn[];
  learner: LearnerState;
}): PromptParts {
  return {
    systemPrompt:
      `You are a patient school tutor. Explain concepts for a grade ${input.profile.grade} student ` +
      `studying ${input.profile.subject}. Cite reference passages by their number when you use them.`,
    prompt: join([
      studentLine(input.profile),
      formatLearner(input.learner).join('\n') || null,
      `Reference material:\n${formatContext(input.context)}`,
      formatHistory(input.history) ? `Conversation so far:\n${formatHistory(input.history)}` : null,
      `Question: ${input.text}`,
    ]),
  };
}

export function buildQuizPrompt(input: {
  text: string;
  profile: StudentProfile;
  context: RetrievedContext;
  learner: LearnerState;
  questionCount: number;
}): PromptParts {
  return {
    systemPrompt:
      `You write short quizzes for a grade ${input.profile.grade} student studying ${input.profile.subject}. ` +
      'Return JSON with "questions": an array of objects with "question", "type" ("multiple_choice" or ' +
      '"open"), "options" (array of strings, multiple_choice only) and "answer" (string; for ' +
      'multiple_choice, one of the options).',
    prompt: join([
      studentLine(input.profile),
      formatLearner(input.learner).join('\n') || null,
      `Reference material:\n${formatContext(input.context)}`,
      `Write ${input.questionCount} questions, mixing question types.`,
      `Request: ${input.text}`,
    ]),
  };
}

export function buildSolverPrompt(input: {
  text: string;
  profile: StudentProfile;
  context: RetrievedContext;
  learner: LearnerState;
  /** Reviewer issues with the previous attempt */
  rejectedIssues?: readonly string[];
}): PromptParts {
  const rejected = input.rejectedIssues ?? [];
  return {
    systemPrompt:
      'You solve school problems step by step. Return JSON with "steps" (array of strings), ' +
      '"finalAnswer" (string) and "explanation" (string).',
    prompt: join([
      studentLine(input.profile),
      formatLearner(input.learner).join('\n') || null,
      `Reference material:\n${formatContext(input.context)}`,
      rejected.length > 0
        ? `A previous solution was rejected. Fix these issues:\n${rejected.map(issue => `- ${issue}`).join('\n')}`
        : null,
      `Problem: ${input.text}`,
    ]),
  };
}

export function buildSolutionReviewPrompt(input: {
  problem: string;
  profile: StudentProfile;
  steps: readonly string[];
  finalAnswer: string;
}): PromptParts {
  return {
    systemPrompt:
      'You check worked solutions for correctness and for fit with the student level. Return JSON with ' +
      '"valid" (boolean) and "issues" (array of strings, empty when valid).',
    prompt: join([
      studentLine(input.profile),
      `Problem: ${input.problem}`,
      `Steps:\n${input.steps.map((step, i) => `${i + 1}. ${step}`).join('\n')}`,
      `Final answer: ${input.finalAnswer}`,
    ]),
  };
}

export function buildGraderPrompt(input: {
  question: string;
  submittedAnswer: string;
  expectedAnswer?: string;
  profile: StudentProfile;
  context: RetrievedContext;
}): PromptParts {
  return {
    systemPrompt:
      'You are a fair and detailed teacher grading a student answer on a 0-10 scale. Return JSON with ' +
      '"score" (number 0-10), "feedback" (string) and "mistakes" (array of strings).',
    prompt: join([
      studentLine(input.profile),
      `Reference material:\n${formatContext(input.context)}`,
      `Question: ${input.question}`,
      input.expectedAnswer ? `Expected answer: ${input.expectedAnswer}` : null,
      `Student answer: ${input.submittedAnswer}`,
    ]),
  };
}

export function buildAnalystPrompt(input: {
  text: string;
  profile: StudentProfile;
  learner: LearnerState;
  grading?: AgentPayload;
}): PromptParts {
  const performance = input.profile.performance;
  const grading = input.grading;
  return {
    systemPrompt:
      'You are a learning analyst. Assess strengths, weaknesses and progress, then give personalised ' +
      'recommendations. Return JSON with "analysis" (string), "strengths", "weaknesses" and ' +
      '"recommendations" (arrays of strings).',
    prompt: join([
      studentLine(input.profile),
      formatLearner(input.learner).join('\n') || null,
      performance?.recentScores?.length
        ? `Recent scores: ${performance.recentScores.join(', ')} out of ${performance.maxScore ?? 12}`
        : null,
      performance?.weakTopics?.length ? `Weak topics: ${performance.weakTopics.join(', ')}` : null,
      performance?.strongTopics?.length ? `Strong topics: ${performance.strongTopics.join(', ')}` : null,
      grading
        ? `Latest grading: ${grading.score ?? '?'}/${grading.maxScore ?? 10}` +
          (grading.feedback ? `\nFeedback: ${grading.feedback}` : '') +
          (grading.mistakes?.length ? `\nMistakes: ${grading.mistakes.join('; ')}` : '')
        : null,
      `Request: ${input.text}`,
    ]),
  };
}
