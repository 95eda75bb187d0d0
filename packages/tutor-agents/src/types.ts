/**
 * Specialist agent contract.
 *
 * A tagged variant over the four specialist kinds. Each specialist takes the
 * same input shape and declares which optional parts it reads.
 */

import type {
  AgentPayload,
  ProviderAttempt,
  Query,
  RetrievedContext,
  SpecialistKind,
  StudentProfile,
} from '@studyhall/tutor-core';

export interface SpecialistInput {
  query: Query;
  profile: StudentProfile;
  /** Grounding passages; empty when retrieval was skipped or degraded */
  context: RetrievedContext;
  /** Output of the previous step in a chain */
  prior?: AgentPayload;
}

export interface SpecialistRunOptions {
  signal?: AbortSignal;
}

export interface SpecialistResult {
  kind: SpecialistKind;
  payload: AgentPayload;
  providerId: string;
  fallbackUsed: boolean;
  attempts: ProviderAttempt[];
  latencyMs: number;
}

interface SpecialistBase<K extends SpecialistKind> {
  readonly kind: K;
  /** Reads `input.context` */
  readonly acceptsContext: boolean;
  /** Reads `input.prior` */
  readonly acceptsPrior: boolean;
  run(input: SpecialistInput, options?: SpecialistRunOptions): Promise<SpecialistResult>;
}

export type ContentSpecialist = SpecialistBase<'content'>;
export type SolverSpecialist = SpecialistBase<'solver'>;
export type GraderSpecialist = SpecialistBase<'grader'>;
export type AnalystSpecialist = SpecialistBase<'analyst'>;

export type Specialist = ContentSpecialist | SolverSpecialist | GraderSpecialist | AnalystSpecialist;

export type SpecialistRegistry = Partial<Record<SpecialistKind, Specialist>>;
