import { describe, expect, it } from 'vitest';
import { denseVector, sparseVector, vectorNorm } from '../../ingest/vectorizer.js';
import type { Chunk } from '../../types.js';
import { isSearchable, rankChunks } from '../ranking.js';

function chunk(id: string, text: string): Chunk {
  const vector = sparseVector(text);
  return {
    id,
    documentId: 'doc',
    index: 0,
    text,
    start: 0,
    end: text.length,
    vector,
    vectorNorm: vectorNorm(vector),
    metadata: { url: 'local://doc', title: 'doc.txt', publishedAt: '2024-03-01T00:00:00.000Z' },
  };
}

describe('rankChunks', () => {
  const candidates = [chunk('a', 'tide moon'), chunk('b', 'sun'), chunk('c', 'tide'), chunk('d', 'tide moon')];

  it('orders by score and keeps scan order for ties', () => {
    const ranked = rankChunks(sparseVector('tide'), candidates, 10);

    expect(ranked.map((scored) => [scored.chunk.id, scored.position])).toEqual([
      ['c', 2],
      ['a', 0],
      ['d', 3],
    ]);
  });

  it('consumes no candidates when nothing can match', () => {
    function* unreachable(): Generator<Chunk> {
      throw new Error('candidates were read');
    }

    expect(rankChunks(sparseVector('?!'), unreachable(), 5)).toEqual([]);
    expect(rankChunks(sparseVector('tide'), unreachable(), 0)).toEqual([]);
  });
});

describe('isSearchable', () => {
  it('requires a positive limit and a non-zero query', () => {
    expect(isSearchable(sparseVector('tide'), 1)).toBe(true);
    expect(isSearchable(sparseVector('tide'), 0)).toBe(false);
    expect(isSearchable(sparseVector(''), 3)).toBe(false);
    expect(isSearchable(denseVector([0, 0]), 3)).toBe(false);
  });
});
