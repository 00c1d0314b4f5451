/**
 * @fileoverview Claim judges: decide whether evidence backs a single claim.
 *
 * Two rules share one contract:
 * - HeuristicClaimJudge reads free text and looks for the word "unsupported".
 * - StructuredClaimJudge asks for a JSON verdict and validates it with zod,
 *   reading the raw text the heuristic way when the JSON is malformed.
 *
 * Judges may throw (the generator failed); the verifier maps that to an
 * unsupported verdict with zero confidence.
 */

import { z } from 'zod';
import { tokenize } from '../ingest/vectorizer.js';
import type { TextGenerator } from '../providers/types.js';
import type { ClaimVerdict, EvidenceChunk } from '../types.js';
import { roundTo } from '../utils/math.js';
import { OutputValidationError, validateLLMOutput } from '../utils/output_validator.js';
import { buildJudgeContent, JUDGE_SYSTEM_PROMPT, STRUCTURED_JUDGE_SYSTEM_PROMPT } from './prompts.js';

export interface ClaimJudgement {
  verdict: ClaimVerdict;
  confidence: number;
  notes: string;
}

export interface ClaimJudge {
  readonly id: string;
  judge(claim: string, evidence: readonly EvidenceChunk[]): Promise<ClaimJudgement>;
}

const UNSUPPORTED_PATTERN = /\bunsupported\b/i;
const NO_JUDGE_OUTPUT = 'No judge output; verdict defaults to supported.';

export function verdictFromText(text: string): ClaimVerdict {
  return UNSUPPORTED_PATTERN.test(text) ? 'unsupported' : 'supported';
}

/**
 * Share of the claim's distinct tokens that appear anywhere in the evidence,
 * rounded to 2 decimals. Zero for a claim with no tokens.
 */
export function lexicalCoverage(claim: string, evidence: readonly EvidenceChunk[]): number {
  const claimTokens = new Set(tokenize(claim));
  if (claimTokens.size === 0) return 0;
  const evidenceTokens = new Set(evidence.flatMap((chunk) => tokenize(chunk.text)));
  let covered = 0;
  for (const token of claimTokens) {
    if (evidenceTokens.has(token)) covered += 1;
  }
  return roundTo(covered / claimTokens.size, 2);
}

function heuristicJudgement(text: string, claim: string, evidence: readonly EvidenceChunk[]): ClaimJudgement {
  const trimmed = text.trim();
  return {
    verdict: verdictFromText(trimmed),
    confidence: lexicalCoverage(claim, evidence),
    notes: trimmed.length > 0 ? trimmed : NO_JUDGE_OUTPUT,
  };
}

export class HeuristicClaimJudge implements ClaimJudge {
  readonly id = 'heuristic';

  constructor(private readonly generator: TextGenerator) {}

  async judge(claim: string, evidence: readonly EvidenceChunk[]): Promise<ClaimJudgement> {
    const generated = await this.generator.generate(JUDGE_SYSTEM_PROMPT, buildJudgeContent(claim, evidence));
    return heuristicJudgement(generated, claim, evidence);
  }
}

const StructuredVerdictSchema = z.object({
  verdict: z.enum(['supported', 'unsupported']),
  confidence: z.number().min(0).max(1),
  notes: z.string().default(''),
});

export class StructuredClaimJudge implements ClaimJudge {
  readonly id = 'structured';

  constructor(private readonly generator: TextGenerator) {}

  async judge(claim: string, evidence: readonly EvidenceChunk[]): Promise<ClaimJudgement> {
    const generated = await this.generator.generate(STRUCTURED_JUDGE_SYSTEM_PROMPT, buildJudgeContent(claim, evidence));
    try {
      const parsed = validateLLMOutput(generated, StructuredVerdictSchema);
      return {
        verdict: parsed.verdict,
        confidence: roundTo(parsed.confidence, 2),
        notes: parsed.notes.trim() || `Judge verdict: ${parsed.verdict}.`,
      };
    } catch (error) {
      if (!(error instanceof OutputValidationError)) throw error;
      return heuristicJudgement(generated, claim, evidence);
    }
  }
}

export type ClaimJudgeKind = 'heuristic' | 'structured';

export function createClaimJudge(kind: ClaimJudgeKind, generator: TextGenerator): ClaimJudge {
  return kind === 'structured' ? new StructuredClaimJudge(generator) : new HeuristicClaimJudge(generator);
}
