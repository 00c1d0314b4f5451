/**
 * @fileoverview Answer-level evaluation scores. Both are case-insensitive
 * substring checks and both are 1 when nothing is expected.
 */

import type { Citation } from '../types.js';

export function scoreFaithfulness(answer: string, expectedFacts: readonly string[]): number {
  if (expectedFacts.length === 0) return 1;
  const haystack = answer.toLowerCase();
  const hits = expectedFacts.filter((fact) => haystack.includes(fact.toLowerCase())).length;
  return hits / expectedFacts.length;
}

export function scoreCitationCoverage(
  citations: readonly Pick<Citation, 'title' | 'url'>[],
  expectedCitations: readonly string[],
): number {
  if (expectedCitations.length === 0) return 1;
  const available = citations.map((citation) => `${citation.title} ${citation.url}`).join(' ').toLowerCase();
  const hits = expectedCitations.filter((expected) => available.includes(expected.toLowerCase())).length;
  return hits / expectedCitations.length;
}
