/**
 * @fileoverview Agents module exports
 */

export {
  PLANNER_SYSTEM_PROMPT,
  WRITER_SYSTEM_PROMPT,
  CRITIC_SYSTEM_PROMPT,
  JUDGE_SYSTEM_PROMPT,
  STRUCTURED_JUDGE_SYSTEM_PROMPT,
  formatEvidence,
} from './prompts.js';

export { DEFAULT_MAX_PLAN_STEPS, HeuristicPlanner, GenerativePlanner, heuristicPlanStep } from './planner.js';
export type { Planner, GenerativePlannerOptions } from './planner.js';

export { Retriever, toEvidence } from './retriever.js';
export type { RetrievalOutcome } from './retriever.js';

export { Writer, DEFAULT_SNIPPET_LENGTH, buildCitations, citationId, fallbackAnswer, noEvidenceAnswer } from './writer.js';
export type { WriterOptions, WriterOutput } from './writer.js';

export { Critic, NO_CRITIQUE } from './critic.js';

export { HeuristicClaimJudge, StructuredClaimJudge, createClaimJudge, lexicalCoverage, verdictFromText } from './claim_judge.js';
export type { ClaimJudge, ClaimJudgeKind, ClaimJudgement } from './claim_judge.js';

export { Verifier, DEFAULT_MAX_CLAIMS, claimId, extractClaims } from './verifier.js';
export type { VerifierOptions } from './verifier.js';

export { DEFAULT_CONFIDENCE_POLICY, computeConfidence, isRefusal } from './confidence.js';
