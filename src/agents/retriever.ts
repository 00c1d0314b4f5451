/**
 * @fileoverview Retriever stage: similarity search over the document store.
 */

import { isFatalToRun } from '../core/errors.js';
import type { Vectorizer } from '../ingest/vectorizer.js';
import { compareScored } from '../query/ranking.js';
import type { DocumentStore, ScoredChunk, VectorSearchOptions } from '../storage/types.js';
import { logWarning } from '../telemetry/logger.js';
import type { EvidenceChunk, FeatureVector, PlanStep } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';

export function toEvidence({ chunk, score }: ScoredChunk): EvidenceChunk {
  return {
    sourceId: chunk.documentId,
    chunkId: chunk.id,
    text: chunk.text,
    score,
    metadata: { ...chunk.metadata },
    chunkStart: chunk.start,
    chunkEnd: chunk.end,
  };
}

export interface RetrievalOutcome {
  evidence: EvidenceChunk[];
  /** Reasons for plan steps that could not be vectorized and were skipped, or null. */
  degraded: string | null;
}

export class Retriever {
  constructor(
    private readonly store: DocumentStore,
    private readonly vectorizer: Vectorizer,
  ) {}

  /**
   * Chunks with similarity above zero, best first, ties in insertion order,
   * at most `limit`.
   */
  async search(query: string, limit: number, options: VectorSearchOptions = {}): Promise<EvidenceChunk[]> {
    const queryVector = await this.vectorizer.vectorize(query);
    const ranked = await this.store.vectorSearch(queryVector, limit, options);
    return ranked.map(toEvidence);
  }

  /**
   * Search once per plan step and merge by chunk id, keeping each chunk's best
   * score. Ties fall back to the store's scan order. A step whose query cannot
   * be vectorized is skipped; store failures propagate.
   */
  async retrieve(plan: readonly PlanStep[], maxSources: number, options: VectorSearchOptions = {}): Promise<RetrievalOutcome> {
    const best = new Map<string, ScoredChunk>();
    const skipped: string[] = [];
    for (const step of plan) {
      let queryVector: FeatureVector;
      try {
        queryVector = await this.vectorizer.vectorize(step.searchQuery);
      } catch (error) {
        if (isFatalToRun(error)) throw error;
        const reason = getErrorMessage(error);
        logWarning('Query vectorization failed; skipping plan step', { searchQuery: step.searchQuery, error: reason });
        skipped.push(reason);
        continue;
      }
      for (const scored of await this.store.vectorSearch(queryVector, maxSources, options)) {
        const existing = best.get(scored.chunk.id);
        if (!existing || scored.score > existing.score) {
          best.set(scored.chunk.id, existing ? { ...existing, score: scored.score } : scored);
        }
      }
    }
    const merged = [...best.values()].sort(compareScored).slice(0, maxSources);
    return { evidence: merged.map(toEvidence), degraded: skipped.length > 0 ? skipped.join('; ') : null };
  }
}
