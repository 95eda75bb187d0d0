import type { Intent, Query } from '@studyhall/tutor-core';

export interface IntentRule {
  name: string;
  intent: Intent;
  weight: number;
  /** Tested against the lowercased query text */
  pattern?: RegExp;
  /** Structural test over the whole query */
  test?: (query: Query) => boolean;
}

export const DEFAULT_INTENT_RULES: readonly IntentRule[] = [
  // grade
  { name: 'submitted-answer', intent: 'grade', weight: 3, test: query => Boolean(query.submittedAnswer?.trim()) },
  {
    name: 'check-my-work',
    intent: 'grade',
    weight: 3,
    pattern: /\b(check|grade|mark|evaluate|review)\b(\s+\w+){0,3}\s+(answer|solution|work|homework|essay|attempt)\b/,
  },
  { name: 'is-it-correct', intent: 'grade', weight: 3, pattern: /\bis (this|my answer|it) (right|correct|wrong)\b/ },
  { name: 'my-answer', intent: 'grade', weight: 1, pattern: /\bmy (answer|solution)\b/ },

  // analyze
  {
    name: 'progress',
    intent: 'analyze',
    weight: 2,
    pattern: /\b(my progress|strengths?|weaknesses?|my performance|how am i doing|my (grades|results|scores))\b/,
  },
  { name: 'study-advice', intent: 'analyze', weight: 2, pattern: /\bwhat should i (study|practice|focus on|improve)\b/ },
  { name: 'analyze-verb', intent: 'analyze', weight: 1, pattern: /\b(analy[sz]e|recommendations?)\b/ },

  // solve
  {
    name: 'solve-verb',
    intent: 'solve',
    weight: 2,
    pattern: /\b(solve|calculate|compute|simplify|factori[sz]e|factor|find the value|work out)\b/,
  },
  { name: 'math-expression', intent: 'solve', weight: 1, pattern: /[=<>]|\d\s*[-+*/^]\s*[\d(a-z]/ },

  // explain; quizzes are served by the content specialist
  { name: 'quiz-request', intent: 'explain', weight: 3, pattern: /\b(quiz|test me|practice questions?)\b/ },
  {
    name: 'explain-verb',
    intent: 'explain',
    weight: 2,
    pattern: /\b(explain|describe|define|tell me about|meaning of|what (is|are|does)|why|how (does|do|is|are))\b/,
  },
];
