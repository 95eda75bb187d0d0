/**
 * Learner model
 *
 * Mastery estimate from recent assessment scores, recap flag from topics
 * the student missed, scaffolding when mastery is low.
 */

import { normalizeQueryText, type StudentProfile } from '@studyhall/tutor-core';

export const DEFAULT_MAX_SCORE = 12;
/** Prior used when the student has a record but no scores yet */
export const PRIOR_MASTERY = 0.25;
export const SCAFFOLDING_THRESHOLD = 0.6;

export interface LearnerState {
  /** 0..1, null when there is no performance data at all */
  mastery: number | null;
  requiresRecap: boolean;
  enableScaffolding: boolean;
  /** Missed or weak topics mentioned by the query */
  focusTopics: string[];
}

function mentions(queryText: string, topic: string): boolean {
  const normalizedTopic = normalizeQueryText(topic);
  return normalizedTopic.length > 0 && queryText.includes(normalizedTopic);
}

export function assessLearner(profile: StudentProfile, queryText: string): LearnerState {
  const performance = profile.performance;
  if (!performance) {
    return { mastery: null, requiresRecap: false, enableScaffolding: false, focusTopics: [] };
  }

  const scores = performance.recentScores ?? [];
  const maxScore = performance.maxScore ?? DEFAULT_MAX_SCORE;
  let mastery = PRIOR_MASTERY;
  if (scores.length > 0) {
    const average = scores.reduce((sum, score) => sum + score, 0) / scores.length;
    mastery = Math.min(1, Math.max(0, average / maxScore));
  }

  const text = normalizeQueryText(queryText);
  const missed = (performance.missedTopics ?? []).filter(topic => mentions(text, topic));
  const weak = (performance.weakTopics ?? []).filter(topic => mentions(text, topic));

  return {
    mastery,
    requiresRecap: missed.length > 0,
    enableScaffolding: mastery < SCAFFOLDING_THRESHOLD,
    focusTopics: [...new Set([...missed, ...weak])],
  };
}
