/**
 * @fileoverview Run-level confidence and the refusal decision.
 *
 *   no evidence                 -> noEvidence (0.0)
 *   evidence, no claims         -> noClaims   (0.2)
 *   evidence and claims         -> base + supportedWeight * supported / total
 *
 * Rounded to 2 decimals and clamped to [0, 1]. Monotone in the supported ratio.
 */

import type { ConfidencePolicy } from '../config/index.js';
import type { ClaimVerification } from '../types.js';
import { clamp01, roundTo } from '../utils/math.js';

export const DEFAULT_CONFIDENCE_POLICY: ConfidencePolicy = {
  noEvidence: 0,
  noClaims: 0.2,
  base: 0.4,
  supportedWeight: 0.6,
  refusalThreshold: 0.4,
};

export function computeConfidence(
  evidenceCount: number,
  claims: readonly Pick<ClaimVerification, 'verdict'>[],
  policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY,
): number {
  if (evidenceCount === 0) return clamp01(policy.noEvidence);
  if (claims.length === 0) return clamp01(policy.noClaims);
  const supported = claims.filter((claim) => claim.verdict === 'supported').length;
  return clamp01(roundTo(policy.base + policy.supportedWeight * (supported / claims.length), 2));
}

export function isRefusal(score: number, policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY): boolean {
  return score < policy.refusalThreshold;
}
