/**
 * @fileoverview Critic stage: advisory review of the drafted answer.
 */

import { isFatalToRun } from '../core/errors.js';
import type { TextGenerator } from '../providers/types.js';
import { logWarning } from '../telemetry/logger.js';
import type { EvidenceChunk } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import { buildCriticContent, CRITIC_SYSTEM_PROMPT } from './prompts.js';

export const NO_CRITIQUE = 'No critique available.';

export class Critic {
  constructor(private readonly generator: TextGenerator) {}

  /** Never empty. The critique is recorded in the trace and never edits the answer. */
  async critique(query: string, answer: string, evidence: readonly EvidenceChunk[]): Promise<string> {
    try {
      const generated = (await this.generator.generate(CRITIC_SYSTEM_PROMPT, buildCriticContent(query, answer, evidence))).trim();
      return generated.length > 0 ? generated : NO_CRITIQUE;
    } catch (error) {
      if (isFatalToRun(error)) throw error;
      logWarning('Critic generation failed', { error: getErrorMessage(error) });
      return NO_CRITIQUE;
    }
  }
}
