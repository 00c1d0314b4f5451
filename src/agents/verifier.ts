/**
 * @fileoverview Verifier stage: split the answer into claims and judge each one.
 */

import { isFatalToRun } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import type { ClaimVerification, EvidenceChunk } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import type { ClaimJudge } from './claim_judge.js';

export const DEFAULT_MAX_CLAIMS = 2;

/** Sentences in order, split after terminal punctuation followed by whitespace. */
export function extractClaims(answer: string, maxClaims: number = DEFAULT_MAX_CLAIMS): string[] {
  return answer
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0)
    .slice(0, maxClaims);
}

export function claimId(index: number): string {
  return `claim-${String(index).padStart(3, '0')}`;
}

export interface VerifierOptions {
  maxClaims?: number;
}

export class Verifier {
  private readonly maxClaims: number;

  constructor(
    private readonly judge: ClaimJudge,
    options: VerifierOptions = {},
  ) {
    this.maxClaims = options.maxClaims ?? DEFAULT_MAX_CLAIMS;
  }

  /**
   * An empty answer or empty evidence yields no claims at all, never a
   * default verdict. Each claim lists every evidence chunk consulted.
   */
  async verify(answer: string, evidence: readonly EvidenceChunk[]): Promise<ClaimVerification[]> {
    if (answer.trim().length === 0 || evidence.length === 0) return [];

    const evidenceChunkIds = evidence.map((chunk) => chunk.chunkId);
    const verifications: ClaimVerification[] = [];
    for (const [index, claimText] of extractClaims(answer, this.maxClaims).entries()) {
      try {
        const judgement = await this.judge.judge(claimText, evidence);
        verifications.push({
          claimId: claimId(index),
          claimText,
          verdict: judgement.verdict,
          evidenceChunkIds: [...evidenceChunkIds],
          confidence: judgement.confidence,
          notes: judgement.notes,
        });
      } catch (error) {
        if (isFatalToRun(error)) throw error;
        const reason = getErrorMessage(error);
        logWarning('Claim judge failed; marking claim unsupported', { claimId: claimId(index), error: reason });
        verifications.push({
          claimId: claimId(index),
          claimText,
          verdict: 'unsupported',
          evidenceChunkIds: [...evidenceChunkIds],
          confidence: 0,
          notes: `Judge failed: ${reason}`,
        });
      }
    }
    return verifications;
  }
}
