/**
 * Mapping between the snake_case wire format and domain types
 */

import {
  isOrchestrationError,
  isProviderError,
  type AgentPayload,
  type AgentResponse,
  type Query,
  type StudentProfile,
  type TutorError,
} from '@studyhall/tutor-core';
import type {
  AgentPayloadWire,
  TutorErrorEnvelope,
  TutorRequest,
  TutorResponse,
} from '@studyhall/tutor-contracts';

export function toQuery(request: TutorRequest): Query {
  return {
    tenantId: request.tenant_id,
    text: request.user_query,
    history: request.history,
    submittedAnswer: request.submitted_answer,
    expectedAnswer: request.expected_answer,
  };
}

export function toProfile(request: TutorRequest): StudentProfile {
  const wire = request.student_profile;
  const performance = wire.performance;
  return {
    grade: wire.grade,
    subject: wire.subject,
    studentId: wire.student_id,
    performance: performance && {
      recentScores: performance.recent_scores,
      maxScore: performance.max_score,
      weakTopics: performance.weak_topics,
      strongTopics: performance.strong_topics,
      missedTopics: performance.missed_topics,
    },
  };
}

function toWirePayload(payload: AgentPayload): AgentPayloadWire {
  return {
    text: payload.text,
    score: payload.score,
    max_score: payload.maxScore,
    correct: payload.correct,
    feedback: payload.feedback,
    mistakes: payload.mistakes,
    steps: payload.steps,
    final_answer: payload.finalAnswer,
    strengths: payload.strengths,
    weaknesses: payload.weaknesses,
    recommendations: payload.recommendations,
    sources: payload.sources,
    quiz: payload.quiz,
    validated: payload.validated,
    validation_issues: payload.validationIssues,
    regenerations: payload.regenerations,
  };
}

export function toWireResponse(response: AgentResponse): TutorResponse {
  return {
    specialist: response.specialist,
    payload: toWirePayload(response.payload),
    provenance: response.provenance,
    latency_ms: response.latencyMs,
    request_id: response.meta.requestId,
    intent: response.meta.intent,
    warnings: response.meta.warnings.map(warning => ({ code: warning.code, message: warning.message })),
    cache_similarity: response.meta.cacheSimilarity,
  };
}

export function toErrorEnvelope(error: TutorError, requestId?: string, issues?: string[]): TutorErrorEnvelope {
  if (isOrchestrationError(error)) {
    return {
      error: {
        code: error.code,
        message: error.message,
        hint: error.hint,
        specialist: error.specialists[error.specialists.length - 1] ?? null,
        specialists: error.specialists,
        providers_attempted: error.providersAttempted,
        attempts: error.attemptCount,
        request_id: error.requestId ?? requestId,
      },
    };
  }

  return {
    error: {
      code: error.code,
      message: error.message,
      hint: error.hint,
      specialist: null,
      specialists: [],
      providers_attempted: isProviderError(error) ? error.providersAttempted : [],
      attempts: isProviderError(error) ? error.attempts.length : 0,
      request_id: requestId,
      issues,
    },
  };
}

export function isErrorEnvelope(result: TutorResponse | TutorErrorEnvelope): result is TutorErrorEnvelope {
  return 'error' in result;
}
