/**
 * Supervisor
 *
 * Classifies a query, consults the semantic cache, grounds the query through
 * retrieval, runs the specialist route of the intent and assembles exactly
 * one AgentResponse.
 *
 * Flow:
 *   classify -> embed -> cache lookup -> (hit: return)
 *            -> retrieval (grounding intents) -> specialist chain -> merge
 *            -> cache write (fire-and-forget) -> return
 *
 * Only total provider exhaustion across the whole route is raised, as an
 * OrchestrationError. Every other dependency failure degrades the response.
 */

import { randomUUID } from 'node:crypto';
import {
  CancelledError,
  OrchestrationError,
  fingerprint,
  getCategoryLogger,
  isProviderError,
  isTutorError,
  withTimeout,
  createTutorError,
  type AgentPayload,
  type AgentResponse,
  type ClassificationResult,
  type EmbeddingVector,
  type Intent,
  type Logger,
  type Provenance,
  type ProviderAttempt,
  type Query,
  type ResponseWarning,
  type RetrievedContext,
  type SpecialistKind,
  type StudentProfile,
} from '@studyhall/tutor-core';
import {
  formatIssues,
  TutorRequestSchema,
  type RoutingConfig,
  type TutorErrorEnvelope,
  type TutorResponse,
} from '@studyhall/tutor-contracts';
import type { SpecialistRegistry, SpecialistResult } from '@studyhall/tutor-agents';
import type { CacheKey, SemanticCache, SemanticCacheStats } from '@studyhall/tutor-cache';
import type { EmbeddingProvider } from '@studyhall/tutor-embeddings';
import type { LLMClient, LLMStats } from '@studyhall/tutor-llm';
import type { RetrievalService, RetrievalStats } from '@studyhall/tutor-retrieval';
import { IntentClassifier } from '../classifier/intent-classifier.js';
import { toErrorEnvelope, toProfile, toQuery, toWireResponse } from '../boundary/wire.js';
import { routeFor, selectSpecialist } from './routes.js';

export interface SupervisorOptions {
  specialists: SpecialistRegistry;
  /** Used for stats only; specialists hold their own reference */
  llm?: LLMClient;
  /** Omit to run without a semantic cache */
  cache?: SemanticCache;
  /** Omit to run without grounding */
  retrieval?: RetrievalService;
  /** Query embeddings for the cache key; shared with retrieval */
  embeddings?: EmbeddingProvider;
  routing?: Partial<RoutingConfig>;
  /** Part of the cache fingerprint; bump after re-ingesting a corpus */
  knowledgeRevision?: string;
  embeddingTimeoutMs?: number;
  classifier?: IntentClassifier;
  logger?: Logger;
  now?: () => number;
}

export interface HandleOptions {
  signal?: AbortSignal;
  /** Defaults to a generated `rq-` id */
  requestId?: string;
}

export interface SupervisorStats {
  requests: number;
  cacheHits: number;
  generated: number;
  fallbackDegraded: number;
  failures: number;
  byIntent: Record<Intent, number>;
  pendingCacheWrites: number;
  llm?: LLMStats;
  cache?: SemanticCacheStats;
  retrieval?: RetrievalStats;
}

interface StepFailure {
  kind: SpecialistKind;
  error: unknown;
  attempts: ProviderAttempt[];
}

interface ChainOutcome {
  results: SpecialistResult[];
  failures: StepFailure[];
  attempted: SpecialistKind[];
  warnings: ResponseWarning[];
}

const DEFAULT_ROUTING: RoutingConfig = {
  groundingIntents: ['explain', 'solve', 'grade'],
  gradeFollowUpAnalysis: true,
  routes: {},
};

/** Fields of earlier chain steps carried into the final payload */
const CARRIED_FIELDS = ['score', 'maxScore', 'correct', 'feedback', 'mistakes'] as const;

export function createRequestId(): string {
  return `rq-${randomUUID().slice(0, 12)}`;
}

export class Supervisor {
  private readonly specialists: SpecialistRegistry;
  private readonly llm?: LLMClient;
  private readonly cache?: SemanticCache;
  private readonly retrieval?: RetrievalService;
  private readonly embeddings?: EmbeddingProvider;
  private readonly routing: RoutingConfig;
  private readonly knowledgeRevision?: string;
  private readonly embeddingTimeoutMs: number;
  private readonly classifier: IntentClassifier;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly pendingWrites = new Set<Promise<void>>();
  private counters = this.emptyCounters();

  constructor(options: SupervisorOptions) {
    this.specialists = options.specialists;
    this.llm = options.llm;
    this.cache = options.cache;
    this.retrieval = options.retrieval;
    this.embeddings = options.embeddings;
    this.routing = { ...DEFAULT_ROUTING, ...options.routing };
    this.knowledgeRevision = options.knowledgeRevision;
    this.embeddingTimeoutMs = options.embeddingTimeoutMs ?? 5000;
    this.classifier = options.classifier ?? new IntentClassifier({ groundingIntents: this.routing.groundingIntents });
    this.logger = getCategoryLogger('supervisor', options.logger);
    this.now = options.now ?? Date.now;
  }

  /**
   * Produce exactly one response for a query.
   * @throws OrchestrationError when no specialist of the route produced output
   * @throws CancelledError when the signal aborts
   */
  async handle(query: Query, profile: StudentProfile, options: HandleOptions = {}): Promise<AgentResponse> {
    const started = this.now();
    const requestId = options.requestId ?? createRequestId();
    const { signal } = options;
    const warnings: ResponseWarning[] = [];
    const log = this.logger.child({ requestId, tenantId: query.tenantId });

    this.counters.requests++;
    throwIfAborted(signal);

    // 1. Classify
    const classification = this.classifier.classify(query);
    const { intent } = classification;
    this.counters.byIntent[intent]++;
    if (classification.ambiguous) {
      warnings.push({
        code: 'CLASSIFICATION_AMBIGUOUS',
        message: classification.matchedRules.length === 0
          ? `No intent rule matched; defaulted to ${intent}`
          : `Intent rules tied; chose ${intent}`,
      });
      log.info(
        { code: 'CLASSIFICATION_AMBIGUOUS', intent, matchedRules: classification.matchedRules },
        'Ambiguous intent classification',
      );
    }

    // 2. Semantic cache
    const embedding = await this.embedQuery(query, log, warnings, signal);
    const cacheKey = embedding ? this.buildCacheKey(query, profile, classification, embedding) : undefined;

    if (this.cache && cacheKey) {
      const outcome = await this.cache.lookupWithStatus(cacheKey, signal);
      if (outcome.degraded) {
        warnings.push({ code: 'CACHE_UNAVAILABLE', message: `Semantic cache lookup failed: ${outcome.reason ?? 'unknown'}` });
      }
      if (outcome.hit) {
        const cached = outcome.hit.entry.response;
        this.counters.cacheHits++;
        const response: AgentResponse = {
          specialist: cached.specialist,
          payload: cached.payload,
          provenance: 'cache-hit',
          latencyMs: this.now() - started,
          meta: {
            requestId,
            intent,
            specialistsRun: [],
            providers: [],
            warnings,
            cacheSimilarity: outcome.hit.similarity,
          },
        };
        log.info({ intent, similarity: outcome.hit.similarity, latencyMs: response.latencyMs }, 'Served from semantic cache');
        return response;
      }
    }

    // 3. Grounding
    throwIfAborted(signal);
    let context: RetrievedContext = [];
    if (classification.requiresGrounding && this.retrieval) {
      const outcome = await this.retrieval.retrieveWithStatus(
        query.text,
        { tenantId: query.tenantId, subject: profile.subject, grade: profile.grade },
        { embedding, signal },
      );
      context = outcome.context;
      if (outcome.degraded) {
        warnings.push({
          code: 'RETRIEVAL_DEGRADED',
          message: `Answered without grounding: ${outcome.reason ?? 'retrieval failed'}`,
        });
      }
    }

    // 4. Specialist route
    const route = routeFor(intent, query, this.routing);
    const chain = await this.runChain(route, query, profile, context, log, signal);
    warnings.push(...chain.warnings);

    const last = chain.results[chain.results.length - 1];
    if (!last) {
      this.counters.failures++;
      const attempts = chain.failures.flatMap(failure => failure.attempts);
      const error = new OrchestrationError({
        specialists: chain.attempted,
        providersAttempted: [...new Set(attempts.map(attempt => attempt.providerId))],
        attemptCount: attempts.length,
        requestId,
        cause: chain.failures[chain.failures.length - 1]?.error,
      });
      log.error({ err: error.toJSON() }, 'Orchestration failed');
      throw error;
    }

    const chainLost = chain.failures.length > 0;
    const fallbackUsed = chain.results.some(result => result.fallbackUsed);
    if (fallbackUsed) {
      const providers = chain.results.filter(result => result.fallbackUsed).map(result => `${result.kind} via ${result.providerId}`);
      warnings.push({ code: 'PROVIDER_FALLBACK', message: `Served by fallback provider: ${providers.join(', ')}` });
    }
    for (const result of chain.results) {
      if (result.payload.validated === false) {
        warnings.push({
          code: 'SOLUTION_UNVERIFIED',
          message: `${result.kind} solution did not pass review: ${(result.payload.validationIssues ?? []).join('; ')}`,
        });
      }
    }

    const provenance: Provenance = fallbackUsed || chainLost ? 'fallback-degraded' : 'generated';
    if (provenance === 'generated') {
      this.counters.generated++;
    } else {
      this.counters.fallbackDegraded++;
    }

    const response: AgentResponse = {
      specialist: last.kind,
      payload: mergePayloads(chain.results),
      latencyMs: this.now() - started,
      provenance,
      meta: {
        requestId,
        intent,
        specialistsRun: chain.results.map(result => result.kind),
        providers: chain.results.map(result => result.providerId),
        warnings,
      },
    };

    // 5. Cache write, off the response path
    if (this.cache && cacheKey) {
      this.dispatchCacheWrite(this.cache, cacheKey, response, context.map(passage => passage.sourceId), log);
    }

    log.info(
      { intent, specialist: response.specialist, provenance, latencyMs: response.latencyMs, warnings: warnings.length },
      'Request handled',
    );
    return response;
  }

  /**
   * Validate a wire request and answer with a wire response or an error
   * envelope. Only failures that are not TutorErrors are thrown.
   */
  async handleRequest(request: unknown, options: HandleOptions = {}): Promise<TutorResponse | TutorErrorEnvelope> {
    const requestId = options.requestId ?? createRequestId();
    const parsed = TutorRequestSchema.safeParse(request);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      this.logger.warn({ requestId, issues }, 'Rejected invalid request');
      return toErrorEnvelope(
        createTutorError('TUTOR_INVALID_REQUEST', `Invalid request: ${issues.join('; ')}`),
        requestId,
        issues,
      );
    }

    try {
      const response = await this.handle(toQuery(parsed.data), toProfile(parsed.data), { ...options, requestId });
      return toWireResponse(response);
    } catch (error) {
      if (isTutorError(error)) {
        return toErrorEnvelope(error, requestId);
      }
      throw error;
    }
  }

  /**
   * Drop cached responses of one tenant, or of every tenant
   * @returns number of entries removed
   */
  async invalidateCache(tenantId?: string): Promise<number> {
    if (!this.cache) {
      return 0;
    }
    if (tenantId !== undefined) {
      return this.cache.invalidateTenant(tenantId);
    }
    const { size } = await this.cache.stats();
    await this.cache.clear();
    return size;
  }

  async getStats(): Promise<SupervisorStats> {
    return {
      ...this.counters,
      byIntent: { ...this.counters.byIntent },
      pendingCacheWrites: this.pendingWrites.size,
      llm: this.llm?.getStats(),
      cache: this.cache ? await this.cache.stats() : undefined,
      retrieval: this.retrieval?.getStats(),
    };
  }

  /**
   * Wait for dispatched cache writes
   */
  async drain(): Promise<void> {
    while (this.pendingWrites.size > 0) {
      await Promise.all([...this.pendingWrites]);
    }
  }

  private async runChain(
    route: readonly (readonly SpecialistKind[])[],
    query: Query,
    profile: StudentProfile,
    context: RetrievedContext,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<ChainOutcome> {
    const outcome: ChainOutcome = { results: [], failures: [], attempted: [], warnings: [] };
    let prior: AgentPayload | undefined;

    for (const [index, candidates] of route.entries()) {
      throwIfAborted(signal);
      const { specialist, skipped } = selectSpecialist(candidates, this.specialists);

      if (skipped.length > 0 && specialist) {
        outcome.warnings.push({
          code: 'SPECIALIST_AMBIGUOUS',
          message: `Several specialists eligible (${[specialist.kind, ...skipped].join(', ')}); ran ${specialist.kind}`,
        });
        log.warn({ step: index, chosen: specialist.kind, skipped }, 'Ambiguous specialist configuration');
      }

      if (!specialist) {
        outcome.warnings.push({
          code: 'CHAIN_STEP_FAILED',
          message: `No registered specialist for step ${index + 1} (${candidates.join(', ')})`,
        });
        outcome.failures.push({ kind: candidates[0] ?? 'content', error: undefined, attempts: [] });
        continue;
      }

      outcome.attempted.push(specialist.kind);
      try {
        const result = await specialist.run(
          {
            query,
            profile,
            context: specialist.acceptsContext ? context : [],
            prior: specialist.acceptsPrior ? prior : undefined,
          },
          { signal },
        );
        outcome.results.push(result);
        prior = result.payload;
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        outcome.failures.push({
          kind: specialist.kind,
          error,
          attempts: isProviderError(error) ? error.attempts : [],
        });
        outcome.warnings.push({ code: 'CHAIN_STEP_FAILED', message: `${specialist.kind} failed: ${message}` });
        log.warn({ specialist: specialist.kind, step: index, err: message }, 'Specialist failed');
      }
    }

    return outcome;
  }

  private async embedQuery(
    query: Query,
    log: Logger,
    warnings: ResponseWarning[],
    signal?: AbortSignal,
  ): Promise<EmbeddingVector | undefined> {
    const embeddings = this.embeddings;
    if (!embeddings || !this.cache) {
      return undefined;
    }
    try {
      const [vector] = await withTimeout(
        attemptSignal => embeddings.embed([query.text], attemptSignal),
        { step: 'query embedding', timeoutMs: this.embeddingTimeoutMs, signal },
      );
      return vector;
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      warnings.push({ code: 'CACHE_UNAVAILABLE', message: `Query embedding failed: ${message}` });
      log.warn({ code: 'CACHE_ERROR', err: message }, 'Query embedding failed, skipping semantic cache');
      return undefined;
    }
  }

  /**
   * Cache keys are scoped by everything a response depends on besides the
   * question: the retrieval scope and, for personal routes, the student's
   * answer and record.
   */
  private buildCacheKey(
    query: Query,
    profile: StudentProfile,
    classification: ClassificationResult,
    embedding: EmbeddingVector,
  ): CacheKey {
    const route = routeFor(classification.intent, query, this.routing).flat();
    const grades = route.includes('grader');
    const analyses = route.includes('analyst');

    return {
      tenantId: query.tenantId,
      intent: classification.intent,
      text: query.text,
      embedding,
      contextFingerprint: fingerprint({
        tenantId: query.tenantId,
        subject: profile.subject.toLowerCase(),
        grade: profile.grade,
        knowledgeRevision: this.knowledgeRevision,
        submittedAnswer: grades ? query.submittedAnswer : undefined,
        expectedAnswer: grades ? query.expectedAnswer : undefined,
        studentId: analyses ? profile.studentId : undefined,
        performance: analyses ? profile.performance : undefined,
      }),
    };
  }

  private dispatchCacheWrite(
    cache: SemanticCache,
    key: CacheKey,
    response: AgentResponse,
    sourceIds: string[],
    log: Logger,
  ): void {
    const snapshot = structuredClone(response);
    const write = Promise.resolve()
      .then(() => cache.store(key, snapshot, sourceIds))
      .then(
        entry => {
          log.debug({ entryId: entry.id }, 'Cached response');
        },
        (error: unknown) => {
          log.warn(
            { code: 'CACHE_ERROR', err: error instanceof Error ? error.message : String(error) },
            'Cache write failed',
          );
        },
      );
    this.pendingWrites.add(write);
    void write.then(() => this.pendingWrites.delete(write));
  }

  private emptyCounters() {
    return {
      requests: 0,
      cacheHits: 0,
      generated: 0,
      fallbackDegraded: 0,
      failures: 0,
      byIntent: { explain: 0, solve: 0, grade: 0, analyze: 0 } satisfies Record<Intent, number>,
    };
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError('request');
  }
}

/**
 * Last step's payload, with grading fields of earlier steps filled in
 * where the last step left them unset.
 */
export function mergePayloads(results: readonly SpecialistResult[]): AgentPayload {
  const last = results[results.length - 1];
  if (!last) {
    return { text: '' };
  }
  const merged: AgentPayload = { ...last.payload };
  for (const earlier of results.slice(0, -1).reverse()) {
    for (const field of CARRIED_FIELDS) {
      if (merged[field] === undefined && earlier.payload[field] !== undefined) {
        copyField(merged, earlier.payload, field);
      }
    }
  }
  return merged;
}

function copyField<K extends keyof AgentPayload>(target: AgentPayload, source: AgentPayload, field: K): void {
  target[field] = source[field];
}
