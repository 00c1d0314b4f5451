/**
 * @fileoverview Text vectorization and similarity
 *
 * Two representations sit behind one contract:
 * - sparse token counts, computed locally (the default)
 * - dense embeddings from an EmbeddingProvider
 *
 * Callers only ever hand vectors back to `cosineSimilarity`, so swapping the
 * vectorizer never touches the indexer, stores or retriever.
 */

import type { DenseVector, FeatureVector, SparseVector } from '../types.js';
import type { EmbeddingProvider } from '../providers/types.js';

const TOKEN_PATTERN = /[a-z0-9]+/g;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

export function sparseVector(text: string): SparseVector {
  const weights: Record<string, number> = {};
  for (const token of tokenize(text)) {
    weights[token] = (weights[token] ?? 0) + 1;
  }
  return { kind: 'sparse', weights };
}

export function denseVector(values: readonly number[]): DenseVector {
  return { kind: 'dense', values: [...values] };
}

export function vectorNorm(vector: FeatureVector): number {
  let sum = 0;
  const values = vector.kind === 'sparse' ? Object.values(vector.weights) : vector.values;
  for (const value of values) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

function sparseDot(a: SparseVector, b: SparseVector): number {
  // Iterate the smaller map; only shared keys contribute.
  const [small, large] = Object.keys(a.weights).length <= Object.keys(b.weights).length ? [a, b] : [b, a];
  let dot = 0;
  for (const [token, weight] of Object.entries(small.weights)) {
    const other = large.weights[token];
    if (other !== undefined) dot += weight * other;
  }
  return dot;
}

function denseDot(a: DenseVector, b: DenseVector): number | null {
  if (a.values.length !== b.values.length) return null;
  let dot = 0;
  for (let i = 0; i < a.values.length; i += 1) {
    dot += (a.values[i] ?? 0) * (b.values[i] ?? 0);
  }
  return dot;
}

/**
 * Cosine similarity given precomputed norms.
 * Zero when either norm is zero or the two vectors live in different spaces.
 */
export function cosineSimilarity(a: FeatureVector, aNorm: number, b: FeatureVector, bNorm: number): number {
  if (aNorm === 0 || bNorm === 0) return 0;
  let dot: number | null;
  if (a.kind === 'sparse' && b.kind === 'sparse') {
    dot = sparseDot(a, b);
  } else if (a.kind === 'dense' && b.kind === 'dense') {
    dot = denseDot(a, b);
  } else {
    dot = null;
  }
  if (dot === null) return 0;
  const score = dot / (aNorm * bNorm);
  // Guard against float drift just past the bounds (e.g. 1.0000000000000002).
  return Math.max(-1, Math.min(1, score));
}

/** Convenience form for callers without cached norms. */
export function similarity(a: FeatureVector, b: FeatureVector): number {
  return cosineSimilarity(a, vectorNorm(a), b, vectorNorm(b));
}

// ============================================================================
// VECTORIZERS
// ============================================================================

export interface Vectorizer {
  /** Identifies the vector space; chunks from different spaces never match. */
  readonly id: string;
  vectorize(text: string): Promise<FeatureVector>;
  vectorizeBatch(texts: readonly string[]): Promise<FeatureVector[]>;
}

export class SparseTokenVectorizer implements Vectorizer {
  readonly id = 'sparse-token-counts';

  async vectorize(text: string): Promise<FeatureVector> {
    return sparseVector(text);
  }

  async vectorizeBatch(texts: readonly string[]): Promise<FeatureVector[]> {
    return texts.map((text) => sparseVector(text));
  }
}

export class DenseEmbeddingVectorizer implements Vectorizer {
  readonly id: string;

  constructor(private readonly provider: EmbeddingProvider) {
    this.id = `dense:${provider.modelId}`;
  }

  async vectorize(text: string): Promise<FeatureVector> {
    const [vector] = await this.vectorizeBatch([text]);
    return vector ?? denseVector([]);
  }

  async vectorizeBatch(texts: readonly string[]): Promise<FeatureVector[]> {
    if (texts.length === 0) return [];
    const embeddings = await this.provider.embed(texts);
    return embeddings.map((values) => denseVector(values));
  }
}
