import {
  SPECIALIST_PRIORITY,
  type Intent,
  type Query,
  type SpecialistKind,
} from '@studyhall/tutor-core';
import type { Route, RoutingConfig } from '@studyhall/tutor-contracts';
import type { Specialist, SpecialistRegistry } from '@studyhall/tutor-agents';

/**
 * Route of an intent: configured override, or the built-in mapping.
 */
export function routeFor(intent: Intent, query: Query, routing: RoutingConfig): Route {
  const configured = routing.routes[intent];
  if (configured) {
    return configured;
  }
  switch (intent) {
    case 'explain':
      return [['content']];
    case 'solve':
      return [['solver']];
    case 'grade':
      return routing.gradeFollowUpAnalysis ? [['grader'], ['analyst']] : [['grader']];
    case 'analyze':
      return query.submittedAnswer?.trim() ? [['grader'], ['analyst']] : [['analyst']];
  }
}

export interface StepSelection {
  specialist: Specialist | null;
  /** Registered candidates that were passed over */
  skipped: SpecialistKind[];
}

/**
 * One specialist per step: the registered candidate earliest in
 * SPECIALIST_PRIORITY.
 */
export function selectSpecialist(candidates: readonly SpecialistKind[], registry: SpecialistRegistry): StepSelection {
  const eligible = SPECIALIST_PRIORITY.filter(kind => candidates.includes(kind) && registry[kind] !== undefined);
  const [first, ...rest] = eligible;
  return {
    specialist: first ? registry[first] ?? null : null,
    skipped: rest,
  };
}
