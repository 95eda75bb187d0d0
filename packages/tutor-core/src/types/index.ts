/**
 * Shared domain types for the tutoring orchestrator.
 * Used by ≥2 packages to avoid circular dependencies.
 */

// === INTENTS & SPECIALISTS ===

export type Intent = 'explain' | 'solve' | 'grade' | 'analyze';

export const INTENTS: readonly Intent[] = ['explain', 'solve', 'grade', 'analyze'];

export type SpecialistKind = 'content' | 'solver' | 'grader' | 'analyst';

/**
 * Fixed priority order used to break ties when configuration makes
 * more than one specialist eligible for the same route step.
 */
export const SPECIALIST_PRIORITY: readonly SpecialistKind[] = [
  'content',
  'solver',
  'grader',
  'analyst',
];

export type Provenance = 'cache-hit' | 'generated' | 'fallback-degraded';

// === REQUEST SIDE ===

export interface ConversationTurn {
  readonly role: 'student' | 'tutor';
  readonly text: string;
}

export interface PerformanceSignals {
  /** Most recent assessment scores, oldest first */
  readonly recentScores?: readonly number[];
  /** Scale of recentScores (default 12) */
  readonly maxScore?: number;
  readonly weakTopics?: readonly string[];
  readonly strongTopics?: readonly string[];
  /** Topics the student was absent for */
  readonly missedTopics?: readonly string[];
}

export interface StudentProfile {
  readonly grade: number;
  readonly subject: string;
  readonly studentId?: string;
  readonly performance?: PerformanceSignals;
}

export interface Query {
  readonly tenantId: string;
  readonly text: string;
  readonly history?: readonly ConversationTurn[];
  /** Student answer to be graded */
  readonly submittedAnswer?: string;
  /** Reference answer, when the caller has one */
  readonly expectedAnswer?: string;
}

export interface ClassificationResult {
  intent: Intent;
  confidence: number;
  requiresGrounding: boolean;
  /** No rule matched, or rules for several intents matched equally */
  ambiguous: boolean;
  matchedRules: string[];
}

// === RETRIEVAL ===

export interface EmbeddingVector {
  dim: number;
  values: number[];
}

export interface RetrievedPassage {
  text: string;
  score: number;
  sourceId: string;
  metadata?: Record<string, unknown>;
}

export type RetrievedContext = readonly RetrievedPassage[];

// === RESPONSE SIDE ===

export interface QuizQuestion {
  question: string;
  type: 'multiple_choice' | 'open';
  /** Choices for multiple_choice questions; the answer is one of them */
  options?: string[];
  answer: string;
}

export interface AgentPayload {
  text: string;
  score?: number;
  maxScore?: number;
  correct?: boolean;
  feedback?: string;
  mistakes?: string[];
  steps?: string[];
  finalAnswer?: string;
  strengths?: string[];
  weaknesses?: string[];
  recommendations?: string[];
  quiz?: QuizQuestion[];
  /** Set when a solution went through review */
  validated?: boolean;
  validationIssues?: string[];
  regenerations?: number;
  sources?: string[];
}

export type ResponseWarningCode =
  | 'CLASSIFICATION_AMBIGUOUS'
  | 'RETRIEVAL_DEGRADED'
  | 'CACHE_UNAVAILABLE'
  | 'PROVIDER_FALLBACK'
  | 'CHAIN_STEP_FAILED'
  | 'SPECIALIST_AMBIGUOUS'
  | 'SOLUTION_UNVERIFIED';

export interface ResponseWarning {
  code: ResponseWarningCode;
  message: string;
}

export interface ResponseMeta {
  requestId: string;
  intent: Intent;
  specialistsRun: SpecialistKind[];
  /** Providers that produced the specialist outputs, in run order */
  providers: string[];
  warnings: ResponseWarning[];
  cacheSimilarity?: number;
}

export interface AgentResponse {
  specialist: SpecialistKind;
  payload: AgentPayload;
  latencyMs: number;
  provenance: Provenance;
  meta: ResponseMeta;
}
