/**
 * Intent Classifier
 *
 * Rule based and deterministic: every matching rule adds its weight to its
 * intent and the heaviest intent wins. No match, or a tie between intents,
 * is ambiguous. No match falls back to `explain`; a tie goes to the
 * intent listed first in INTENTS.
 */

import { INTENTS, type ClassificationResult, type Intent, type Query } from '@studyhall/tutor-core';
import { DEFAULT_INTENT_RULES, type IntentRule } from './rules.js';

export interface IntentClassifierOptions {
  /** Intents that need retrieved grounding */
  groundingIntents?: readonly Intent[];
  rules?: readonly IntentRule[];
}

export const DEFAULT_INTENT: Intent = 'explain';

export class IntentClassifier {
  private readonly groundingIntents: ReadonlySet<Intent>;
  private readonly rules: readonly IntentRule[];

  constructor(options: IntentClassifierOptions = {}) {
    this.groundingIntents = new Set(options.groundingIntents ?? ['explain', 'solve', 'grade']);
    this.rules = options.rules ?? DEFAULT_INTENT_RULES;
  }

  classify(query: Query): ClassificationResult {
    const text = query.text.toLowerCase();
    const scores = new Map<Intent, number>();
    const matchedRules: string[] = [];

    for (const rule of this.rules) {
      const matched = (rule.pattern?.test(text) ?? false) || (rule.test?.(query) ?? false);
      if (matched) {
        matchedRules.push(rule.name);
        scores.set(rule.intent, (scores.get(rule.intent) ?? 0) + rule.weight);
      }
    }

    if (scores.size === 0) {
      return this.result(DEFAULT_INTENT, 0, true, matchedRules);
    }

    const total = [...scores.values()].reduce((sum, score) => sum + score, 0);
    const best = Math.max(...scores.values());
    const leaders = INTENTS.filter(intent => scores.get(intent) === best);
    const intent = leaders[0] ?? DEFAULT_INTENT;

    return this.result(intent, best / total, leaders.length > 1, matchedRules);
  }

  private result(intent: Intent, confidence: number, ambiguous: boolean, matchedRules: string[]): ClassificationResult {
    return {
      intent,
      confidence,
      requiresGrounding: this.groundingIntents.has(intent),
      ambiguous,
      matchedRules,
    };
  }
}
