/**
 * @fileoverview Pipeline orchestrator.
 *
 * Runs PLAN -> RETRIEVE -> WRITE -> CRITIQUE? -> VERIFY? -> FINALIZE in one
 * pass, one trace event per transition, no retries and no concurrency between
 * stages. Stages absorb their own degradable failures (a generator that
 * errors, a query that cannot be vectorized). Anything that reaches this
 * file's catch is fatal to the run: the partial trace is saved with an
 * `error` event and a PipelineError carrying the trace id is thrown.
 */

import { computeConfidence, DEFAULT_CONFIDENCE_POLICY, isRefusal } from '../agents/confidence.js';
import type { Critic } from '../agents/critic.js';
import type { Planner } from '../agents/planner.js';
import type { Retriever } from '../agents/retriever.js';
import type { Verifier } from '../agents/verifier.js';
import type { Writer } from '../agents/writer.js';
import type { ConfidencePolicy } from '../config/index.js';
import { PipelineError, ValidationError, type PipelineStage } from '../core/errors.js';
import type { TraceStore } from '../storage/types.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { ClaimVerification, PipelineResult } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { newAnswerId, newTraceId, TraceRecorder } from './trace_recorder.js';

export const DEFAULT_MAX_SOURCES = 8;
export const MAX_SOURCES_LIMIT = 25;

export interface RunOptions {
  maxSources?: number;
  /** Supply to correlate with an outer request id; generated otherwise. */
  traceId?: string;
  /** Restrict retrieval to these documents. */
  documentIds?: readonly string[];
}

export interface ResearchPipelineDeps {
  planner: Planner;
  retriever: Retriever;
  writer: Writer;
  /** null skips the critique stage. */
  critic: Critic | null;
  /** null skips verification; the run then has no claims. */
  verifier: Verifier | null;
  traceStore: TraceStore;
  confidence?: ConfidencePolicy;
  defaultMaxSources?: number;
  maxSourcesLimit?: number;
  now?: () => Date;
}

function freezeResult(result: PipelineResult): PipelineResult {
  Object.freeze(result.plan);
  Object.freeze(result.evidence);
  Object.freeze(result.citations);
  Object.freeze(result.claimVerifications);
  Object.freeze(result.traceEvents);
  return Object.freeze(result);
}

export class ResearchPipeline {
  private readonly confidence: ConfidencePolicy;
  private readonly defaultMaxSources: number;
  private readonly maxSourcesLimit: number;

  constructor(private readonly deps: ResearchPipelineDeps) {
    this.confidence = deps.confidence ?? DEFAULT_CONFIDENCE_POLICY;
    this.defaultMaxSources = deps.defaultMaxSources ?? DEFAULT_MAX_SOURCES;
    this.maxSourcesLimit = deps.maxSourcesLimit ?? MAX_SOURCES_LIMIT;
  }

  private resolveMaxSources(requested: number | undefined): number {
    const maxSources = requested ?? this.defaultMaxSources;
    if (!Number.isInteger(maxSources) || maxSources < 1 || maxSources > this.maxSourcesLimit) {
      throw new ValidationError('maxSources', `an integer between 1 and ${this.maxSourcesLimit}`, String(maxSources));
    }
    return maxSources;
  }

  async runPipeline(query: string, options: RunOptions = {}): Promise<PipelineResult> {
    if (query.trim().length === 0) {
      throw new ValidationError('query', 'a non-empty string', JSON.stringify(query));
    }
    const maxSources = this.resolveMaxSources(options.maxSources);
    const traceId = options.traceId ?? newTraceId();
    const recorder = new TraceRecorder(traceId, this.deps.now);
    const { planner, retriever, writer, critic, verifier } = this.deps;

    let stage: PipelineStage = 'plan';
    let result: PipelineResult;
    try {
      const plan = await planner.plan(query);
      recorder.record('Planner', 'plan', {
        planner: planner.id,
        plan: plan.map((step) => step.searchQuery),
        questions: plan.map((step) => step.question),
      });

      stage = 'retrieve';
      const retrieval = await retriever.retrieve(plan, maxSources, { documentIds: options.documentIds });
      recorder.record('Retriever', 'retrieve', {
        queries: plan.map((step) => step.searchQuery),
        result_count: retrieval.evidence.length,
        chunk_ids: retrieval.evidence.map((chunk) => chunk.chunkId),
        ...(retrieval.degraded === null ? {} : { degraded: retrieval.degraded }),
      });
      if (retrieval.degraded !== null) {
        logWarning('Retrieval skipped plan steps', { traceId, reason: retrieval.degraded });
      }

      stage = 'write';
      const draft = await writer.write(query, retrieval.evidence);
      recorder.record('Writer', 'write', {
        citations: draft.citations.length,
        answer_length: draft.answer.length,
        fallback: draft.usedFallback,
      });

      let critique: string | null = null;
      if (critic) {
        stage = 'critique';
        critique = await critic.critique(query, draft.answer, retrieval.evidence);
        recorder.record('Critic', 'critique', { critique });
      }

      let claimVerifications: ClaimVerification[] = [];
      if (verifier) {
        stage = 'verify';
        claimVerifications = await verifier.verify(draft.answer, retrieval.evidence);
        recorder.record('Verifier', 'verify', {
          claims: claimVerifications.length,
          supported: claimVerifications.filter((claim) => claim.verdict === 'supported').length,
        });
      }

      stage = 'finalize';
      const confidenceScore = computeConfidence(retrieval.evidence.length, claimVerifications, this.confidence);
      const refusal = isRefusal(confidenceScore, this.confidence);
      recorder.record('Orchestrator', 'finalize', { confidence_score: confidenceScore, refusal });

      result = {
        traceId,
        answerId: newAnswerId(),
        query,
        plan,
        evidence: retrieval.evidence,
        answer: draft.answer,
        citations: draft.citations,
        critique,
        claimVerifications,
        confidenceScore,
        refusal,
        traceEvents: recorder.events(),
      };
    } catch (error) {
      const cause = toError(error);
      recorder.record('Orchestrator', 'error', { stage, error: cause.message });
      await this.savePartialTrace(traceId, query, recorder);
      throw new PipelineError(stage, traceId, cause);
    }

    try {
      await this.deps.traceStore.saveTrace(traceId, query, result.traceEvents);
    } catch (error) {
      throw new PipelineError('persist', traceId, toError(error));
    }
    logDebug('Pipeline run complete', { traceId, evidence: result.evidence.length, confidence: result.confidenceScore });
    return freezeResult(result);
  }

  private async savePartialTrace(traceId: string, query: string, recorder: TraceRecorder): Promise<void> {
    try {
      await this.deps.traceStore.saveTrace(traceId, query, recorder.events());
    } catch (saveError) {
      logWarning('Could not persist partial trace', { traceId, error: getErrorMessage(saveError) });
    }
  }
}
