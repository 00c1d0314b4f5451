/**
 * @fileoverview Brute-force similarity ranking shared by every DocumentStore.
 *
 * Candidates arrive in insertion order. Equal scores keep that order, and
 * each result carries its scan position so merged result lists can restore it.
 */

import { cosineSimilarity, vectorNorm } from '../ingest/vectorizer.js';
import type { ScoredChunk } from '../storage/types.js';
import type { Chunk, FeatureVector } from '../types.js';

export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
  return b.score - a.score || a.position - b.position;
}

/** Whether a search for this vector can match anything at all. */
export function isSearchable(queryVector: FeatureVector, limit: number): boolean {
  return limit > 0 && vectorNorm(queryVector) > 0;
}

export function rankChunks(queryVector: FeatureVector, candidates: Iterable<Chunk>, limit: number): ScoredChunk[] {
  if (!isSearchable(queryVector, limit)) return [];
  const queryNorm = vectorNorm(queryVector);

  const scored: ScoredChunk[] = [];
  let position = 0;
  for (const chunk of candidates) {
    const score = cosineSimilarity(queryVector, queryNorm, chunk.vector, chunk.vectorNorm);
    if (score > 0) {
      scored.push({ chunk, score, position });
    }
    position += 1;
  }
  scored.sort(compareScored);
  return scored.slice(0, limit);
}
