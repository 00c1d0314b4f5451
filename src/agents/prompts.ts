/**
 * @fileoverview System prompts and user-content builders for the generative stages.
 */

import type { EvidenceChunk } from '../types.js';

export const PLANNER_SYSTEM_PROMPT = [
  'You plan research for a question answering system.',
  'Write between one and three short search queries that together cover the question.',
  'Output one query per line with no numbering and no commentary.',
].join('\n');

export const WRITER_SYSTEM_PROMPT = [
  'You answer questions using only the numbered sources provided.',
  'Cite sources inline as [n]. If the sources do not answer the question, say so plainly.',
  'Do not add facts that are not in the sources.',
].join('\n');

export const CRITIC_SYSTEM_PROMPT = [
  'You review a drafted answer against its sources.',
  'Point out statements the sources do not back, missing caveats and unclear citations.',
  'Be brief. Your review is advisory and will not change the answer.',
].join('\n');

export const JUDGE_SYSTEM_PROMPT = [
  'You check one claim against the sources provided.',
  'Reply "supported" if the sources state or directly imply the claim, otherwise reply "unsupported",',
  'followed by one sentence of justification.',
].join('\n');

export const STRUCTURED_JUDGE_SYSTEM_PROMPT = [
  'You check one claim against the sources provided.',
  'Reply with JSON only, in the form',
  '{"verdict": "supported" | "unsupported", "confidence": <number between 0 and 1>, "notes": "<one sentence>"}.',
].join('\n');

/** Render evidence as `[1] title (url)\ntext` blocks, numbered from 1. */
export function formatEvidence(evidence: readonly EvidenceChunk[]): string {
  return evidence
    .map((chunk, index) => `[${index + 1}] ${chunk.metadata.title} (${chunk.metadata.url})\n${chunk.text}`)
    .join('\n\n');
}

export function buildWriterContent(query: string, evidence: readonly EvidenceChunk[]): string {
  return `Question: ${query}\n\nSources:\n${formatEvidence(evidence)}`;
}

export function buildCriticContent(query: string, answer: string, evidence: readonly EvidenceChunk[]): string {
  return `Question: ${query}\n\nAnswer:\n${answer}\n\nSources:\n${formatEvidence(evidence)}`;
}

export function buildJudgeContent(claim: string, evidence: readonly EvidenceChunk[]): string {
  return `Claim: ${claim}\n\nSources:\n${formatEvidence(evidence)}`;
}
