/**
 * @fileoverview Planner stage: turn a query into search steps.
 */

import { isFatalToRun } from '../core/errors.js';
import type { TextGenerator } from '../providers/types.js';
import { logWarning } from '../telemetry/logger.js';
import type { PlanStep } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import { PLANNER_SYSTEM_PROMPT } from './prompts.js';

export const DEFAULT_MAX_PLAN_STEPS = 3;

export interface Planner {
  readonly id: string;
  /** Never empty for a non-empty query. */
  plan(query: string): Promise<PlanStep[]>;
}

export function heuristicPlanStep(query: string): PlanStep {
  return {
    question: `Key points for: ${query}`,
    searchQuery: `${query} evidence`,
  };
}

export class HeuristicPlanner implements Planner {
  readonly id = 'heuristic';

  async plan(query: string): Promise<PlanStep[]> {
    return [heuristicPlanStep(query)];
  }
}

/** Strip list markers a model tends to add despite being asked not to. */
function cleanPlanLine(line: string): string {
  return line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').replace(/^["']|["']$/g, '').trim();
}

export interface GenerativePlannerOptions {
  maxPlanSteps?: number;
}

export class GenerativePlanner implements Planner {
  readonly id = 'generative';
  private readonly maxPlanSteps: number;

  constructor(
    private readonly generator: TextGenerator,
    options: GenerativePlannerOptions = {},
  ) {
    this.maxPlanSteps = options.maxPlanSteps ?? DEFAULT_MAX_PLAN_STEPS;
  }

  async plan(query: string): Promise<PlanStep[]> {
    let generated: string;
    try {
      generated = await this.generator.generate(PLANNER_SYSTEM_PROMPT, `Question: ${query}`);
    } catch (error) {
      if (isFatalToRun(error)) throw error;
      logWarning('Planner generation failed; using heuristic plan', { error: getErrorMessage(error) });
      return [heuristicPlanStep(query)];
    }

    const seen = new Set<string>();
    const steps: PlanStep[] = [];
    for (const line of generated.split('\n')) {
      const searchQuery = cleanPlanLine(line);
      const key = searchQuery.toLowerCase();
      if (searchQuery.length === 0 || seen.has(key)) continue;
      seen.add(key);
      steps.push({ question: searchQuery, searchQuery });
      if (steps.length >= this.maxPlanSteps) break;
    }
    return steps.length > 0 ? steps : [heuristicPlanStep(query)];
  }
}
