/**
 * @fileoverview Writer stage: draft a grounded answer and its citations.
 *
 * Citations are built from the evidence, not from the generated text: one per
 * evidence chunk, in evidence order. The answer may cite them as [n].
 */

import { isFatalToRun } from '../core/errors.js';
import type { TextGenerator } from '../providers/types.js';
import { logWarning } from '../telemetry/logger.js';
import type { Citation, EvidenceChunk } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import { buildWriterContent, WRITER_SYSTEM_PROMPT } from './prompts.js';

export const DEFAULT_SNIPPET_LENGTH = 200;
const FALLBACK_EXCERPT_LENGTH = 160;

export interface WriterOutput {
  answer: string;
  citations: Citation[];
  /** True when the answer came from the fixed fallback rather than the generator. */
  usedFallback: boolean;
}

export function noEvidenceAnswer(query: string): string {
  return `No indexed sources matched the query: ${query}`;
}

export function fallbackAnswer(evidence: readonly EvidenceChunk[]): string {
  const excerpt = evidence[0]?.text.slice(0, FALLBACK_EXCERPT_LENGTH) ?? '';
  return `According to the retrieved sources, ${excerpt}`;
}

export function citationId(index: number): string {
  return `cit-${String(index).padStart(3, '0')}`;
}

export function buildCitations(evidence: readonly EvidenceChunk[], snippetLength: number = DEFAULT_SNIPPET_LENGTH): Citation[] {
  return evidence.map((chunk, index) => ({
    citationId: citationId(index),
    sourceId: chunk.sourceId,
    title: chunk.metadata.title || 'Untitled',
    url: chunk.metadata.url || '',
    publishedAt: chunk.metadata.publishedAt || '',
    snippet: chunk.text.slice(0, snippetLength),
    chunkStart: chunk.chunkStart,
    chunkEnd: chunk.chunkEnd,
  }));
}

export interface WriterOptions {
  snippetLength?: number;
}

export class Writer {
  private readonly snippetLength: number;

  constructor(
    private readonly generator: TextGenerator,
    options: WriterOptions = {},
  ) {
    this.snippetLength = options.snippetLength ?? DEFAULT_SNIPPET_LENGTH;
  }

  async write(query: string, evidence: readonly EvidenceChunk[]): Promise<WriterOutput> {
    if (evidence.length === 0) {
      return { answer: noEvidenceAnswer(query), citations: [], usedFallback: true };
    }

    const citations = buildCitations(evidence, this.snippetLength);
    let generated = '';
    try {
      generated = (await this.generator.generate(WRITER_SYSTEM_PROMPT, buildWriterContent(query, evidence))).trim();
    } catch (error) {
      if (isFatalToRun(error)) throw error;
      logWarning('Writer generation failed; using extractive answer', { error: getErrorMessage(error) });
    }
    if (generated.length === 0) {
      return { answer: fallbackAnswer(evidence), citations, usedFallback: true };
    }
    return { answer: generated, citations, usedFallback: false };
  }
}
