import { z } from 'zod';

export const IntentSchema = z.enum(['explain', 'solve', 'grade', 'analyze']);
export const SpecialistSchema = z.enum(['content', 'solver', 'grader', 'analyst']);
export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const CacheConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Minimum cosine similarity for a hit */
  similarityThreshold: z.number().min(0).max(1).default(0.92),
  /** Absolute time-to-live of an entry */
  ttlMs: z.number().int().positive().default(3_600_000),
  /** LRU capacity bound across all namespaces */
  maxEntries: z.number().int().positive().default(1000),
  /** Lookups slower than this count as a miss */
  lookupTimeoutMs: z.number().int().positive().default(150),
});

const MemoryBackendSchema = z.object({
  type: z.literal('memory'),
});

const FileBackendSchema = z.object({
  type: z.literal('file'),
  path: z.string().min(1).default('.studyhall/index'),
});

const QdrantBackendSchema = z.object({
  type: z.literal('qdrant'),
  url: z.string().url(),
  collection: z.string().min(1).default('studyhall_passages'),
  apiKeyEnv: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(30_000),
});

export const VectorBackendSchema = z.discriminatedUnion('type', [
  MemoryBackendSchema,
  FileBackendSchema,
  QdrantBackendSchema,
]);

export const RetrievalConfigSchema = z.object({
  topK: z.number().int().positive().max(50).default(5),
  /** Passages scoring below the floor are dropped, never padded */
  scoreFloor: z.number().min(-1).max(1).default(0.35),
  timeoutMs: z.number().int().positive().default(2000),
  /** Restrict passages to the student's grade as well as tenant and subject */
  scopeByGrade: z.boolean().default(false),
  /** Bumped when the corpus changes; part of the cache context fingerprint */
  knowledgeRevision: z.string().min(1).optional(),
  backend: VectorBackendSchema.default({ type: 'memory' }),
});

const DeterministicEmbeddingsSchema = z.object({
  type: z.literal('deterministic'),
  dimension: z.number().int().positive().default(256),
});

const OpenAIEmbeddingsSchema = z.object({
  type: z.literal('openai'),
  model: z.string().min(1).default('text-embedding-3-small'),
  dimension: z.number().int().positive().optional(),
  baseURL: z.string().url().optional(),
  apiKeyEnv: z.string().min(1).default('OPENAI_API_KEY'),
  batchSize: z.number().int().positive().default(100),
  timeoutMs: z.number().int().positive().default(30_000),
  retries: z.number().int().min(0).max(10).default(3),
});

export const EmbeddingsConfigSchema = z.discriminatedUnion('type', [
  DeterministicEmbeddingsSchema,
  OpenAIEmbeddingsSchema,
]);

export const ProviderConfigSchema = z.object({
  id: z.string().min(1),
  model: z.string().min(1),
  /** OpenAI-compatible endpoint; the SDK default when absent */
  baseURL: z.string().url().optional(),
  /** Environment variable holding the credential */
  apiKeyEnv: z.string().min(1).default('OPENAI_API_KEY'),
  retries: z.number().int().min(0).max(10).default(2),
  backoffBaseMs: z.number().int().nonnegative().default(250),
  timeoutMs: z.number().int().positive().default(20_000),
  temperature: z.number().min(0).max(2).default(0.3),
  maxTokens: z.number().int().positive().default(1024),
});

export const TaskRoutingSchema = z.object({
  content: z.string().min(1).optional(),
  solver: z.string().min(1).optional(),
  grader: z.string().min(1).optional(),
  analyst: z.string().min(1).optional(),
  /** Solution review when solver validation is on */
  validator: z.string().min(1).optional(),
});

export const LLMConfigSchema = z
  .object({
    providers: z
      .array(ProviderConfigSchema)
      .min(1)
      .default([{ id: 'primary', model: 'gpt-4o-mini' }]),
    /** Preferred provider per specialist, tried before the rest of the list */
    taskRouting: TaskRoutingSchema.default({}),
  })
  .superRefine((value, ctx) => {
    const ids = new Set<string>();
    for (const provider of value.providers) {
      if (ids.has(provider.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['providers'],
          message: `Duplicate provider id "${provider.id}"`,
        });
      }
      ids.add(provider.id);
    }
    for (const [task, providerId] of Object.entries(value.taskRouting)) {
      if (providerId !== undefined && !ids.has(providerId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['taskRouting', task],
          message: `Unknown provider "${providerId}"`,
        });
      }
    }
  });

/** A route is an ordered list of steps; each step lists candidate specialists */
export const RouteSchema = z.array(z.array(SpecialistSchema).min(1)).min(1);

export const RoutingConfigSchema = z.object({
  groundingIntents: z.array(IntentSchema).default(['explain', 'solve', 'grade']),
  /** Run the Analyst after the Grader for the grade intent */
  gradeFollowUpAnalysis: z.boolean().default(true),
  routes: z
    .object({
      explain: RouteSchema.optional(),
      solve: RouteSchema.optional(),
      grade: RouteSchema.optional(),
      analyze: RouteSchema.optional(),
    })
    .default({}),
});

export const AgentsConfigSchema = z.object({
  quizQuestions: z.number().int().min(1).max(12).default(5),
  solverValidation: z
    .object({
      enabled: z.boolean().default(false),
      maxRegenerations: z.number().int().min(0).max(3).default(3),
    })
    .default({}),
});

export const TutorConfigSchema = z.object({
  logLevel: LogLevelSchema.default('info'),
  cache: CacheConfigSchema.default({}),
  retrieval: RetrievalConfigSchema.default({}),
  embeddings: EmbeddingsConfigSchema.default({ type: 'deterministic' }),
  llm: LLMConfigSchema.default({}),
  routing: RoutingConfigSchema.default({}),
  agents: AgentsConfigSchema.default({}),
});

export type CacheConfig = z.output<typeof CacheConfigSchema>;
export type RetrievalConfig = z.output<typeof RetrievalConfigSchema>;
export type VectorBackendConfig = z.output<typeof VectorBackendSchema>;
export type EmbeddingsConfig = z.output<typeof EmbeddingsConfigSchema>;
export type ProviderConfig = z.output<typeof ProviderConfigSchema>;
export type TaskRouting = z.output<typeof TaskRoutingSchema>;
export type LLMConfig = z.output<typeof LLMConfigSchema>;
export type Route = z.output<typeof RouteSchema>;
export type AgentsConfig = z.output<typeof AgentsConfigSchema>;
export type RoutingConfig = z.output<typeof RoutingConfigSchema>;
export type TutorConfig = z.output<typeof TutorConfigSchema>;
export type TutorConfigInput = z.input<typeof TutorConfigSchema>;
