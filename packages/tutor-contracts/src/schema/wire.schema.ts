import { z } from 'zod';
import { IntentSchema, SpecialistSchema } from './config.schema.js';

const PerformanceWireSchema = z.object({
  recent_scores: z.array(z.number().nonnegative()).optional(),
  max_score: z.number().positive().optional(),
  weak_topics: z.array(z.string()).optional(),
  strong_topics: z.array(z.string()).optional(),
  missed_topics: z.array(z.string()).optional(),
});

export const StudentProfileWireSchema = z.object({
  grade: z.number().int().positive(),
  subject: z.string().trim().min(1),
  student_id: z.string().min(1).optional(),
  performance: PerformanceWireSchema.optional(),
});

export const TutorRequestSchema = z.object({
  tenant_id: z.string().trim().min(1),
  user_query: z.string().trim().min(1),
  student_profile: StudentProfileWireSchema,
  history: z
    .array(
      z.object({
        role: z.enum(['student', 'tutor']),
        text: z.string(),
      }),
    )
    .optional(),
  submitted_answer: z.string().optional(),
  expected_answer: z.string().optional(),
});

export const AgentPayloadWireSchema = z.object({
  text: z.string(),
  score: z.number().optional(),
  max_score: z.number().optional(),
  correct: z.boolean().optional(),
  feedback: z.string().optional(),
  mistakes: z.array(z.string()).optional(),
  steps: z.array(z.string()).optional(),
  final_answer: z.string().optional(),
  strengths: z.array(z.string()).optional(),
  weaknesses: z.array(z.string()).optional(),
  recommendations: z.array(z.string()).optional(),
  sources: z.array(z.string()).optional(),
  quiz: z
    .array(
      z.object({
        question: z.string(),
        type: z.enum(['multiple_choice', 'open']),
        options: z.array(z.string()).optional(),
        answer: z.string(),
      }),
    )
    .optional(),
  validated: z.boolean().optional(),
  validation_issues: z.array(z.string()).optional(),
  regenerations: z.number().int().nonnegative().optional(),
});

export const ProvenanceSchema = z.enum(['cache-hit', 'generated', 'fallback-degraded']);

export const TutorResponseSchema = z.object({
  specialist: SpecialistSchema,
  payload: AgentPayloadWireSchema,
  provenance: ProvenanceSchema,
  latency_ms: z.number().nonnegative(),
  request_id: z.string(),
  intent: IntentSchema,
  warnings: z.array(
    z.object({
      code: z.string(),
      message: z.string(),
    }),
  ),
  cache_similarity: z.number().optional(),
});

export const TutorErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    hint: z.string().optional(),
    /** Specialist that could not answer; null for request validation errors */
    specialist: SpecialistSchema.nullable(),
    specialists: z.array(SpecialistSchema),
    providers_attempted: z.array(z.string()),
    attempts: z.number().int().nonnegative(),
    request_id: z.string().optional(),
    issues: z.array(z.string()).optional(),
  }),
});

export type TutorRequest = z.output<typeof TutorRequestSchema>;
export type TutorRequestInput = z.input<typeof TutorRequestSchema>;
export type AgentPayloadWire = z.output<typeof AgentPayloadWireSchema>;
export type TutorResponse = z.output<typeof TutorResponseSchema>;
export type TutorErrorEnvelope = z.output<typeof TutorErrorEnvelopeSchema>;
