/**
 * Shared stand-ins for the agent stage tests.
 */

import type { TextGenerator } from '../../providers/types.js';
import type { EvidenceChunk } from '../../types.js';

export function makeEvidence(chunkId: string, text: string, overrides: Partial<EvidenceChunk> = {}): EvidenceChunk {
  return {
    sourceId: 'doc-1',
    chunkId,
    text,
    score: 0.5,
    metadata: { url: 'local://doc-1', title: 'Doc One', publishedAt: '2024-01-01T00:00:00.000Z' },
    chunkStart: 0,
    chunkEnd: text.length,
    ...overrides,
  };
}

export interface ScriptedGenerator extends TextGenerator {
  readonly calls: Array<{ systemPrompt: string; userContent: string }>;
}

/**
 * A generator that replays `outputs` in order (the last one repeats). An Error
 * entry is thrown instead of returned.
 */
export function scriptedGenerator(...outputs: Array<string | Error>): ScriptedGenerator {
  const calls: Array<{ systemPrompt: string; userContent: string }> = [];
  return {
    id: 'scripted',
    calls,
    async generate(systemPrompt, userContent) {
      const output = outputs[Math.min(calls.length, outputs.length - 1)] ?? '';
      calls.push({ systemPrompt, userContent });
      if (output instanceof Error) throw output;
      return output;
    },
  };
}
