/**
 * @fileoverview Offline evaluation: run each example through the service and score it.
 */

import type { QueryResponse } from '../types.js';
import type { EvaluationExample } from './dataset.js';
import { scoreCitationCoverage, scoreFaithfulness } from './scoring.js';

export interface EvaluationResult {
  exampleId: string;
  faithfulness: number;
  citationCoverage: number;
  refusal: boolean;
}

export interface EvaluationAverages {
  faithfulness: number;
  citationCoverage: number;
}

export interface EvaluationReport {
  results: EvaluationResult[];
  averages: EvaluationAverages;
}

/** The slice of the research service the evaluator needs. */
export interface QueryRunner {
  query(query: string): Promise<QueryResponse>;
}

export type EvaluationProgress = (completed: number, total: number) => void;

export async function runEvaluation(
  service: QueryRunner,
  examples: readonly EvaluationExample[],
  onProgress?: EvaluationProgress,
): Promise<EvaluationReport> {
  const results: EvaluationResult[] = [];
  // Sequential: each query is a full pipeline run against one store.
  for (const example of examples) {
    const response = await service.query(example.query);
    results.push({
      exampleId: example.id,
      faithfulness: scoreFaithfulness(response.answer, example.expectedFacts),
      citationCoverage: scoreCitationCoverage(response.citations, example.expectedCitations),
      refusal: response.refusal,
    });
    onProgress?.(results.length, examples.length);
  }

  const count = Math.max(results.length, 1);
  return {
    results,
    averages: {
      faithfulness: results.reduce((sum, item) => sum + item.faithfulness, 0) / count,
      citationCoverage: results.reduce((sum, item) => sum + item.citationCoverage, 0) / count,
    },
  };
}

export function formatEvaluationReport(report: EvaluationReport): string {
  const lines = ['Evaluation results'];
  for (const item of report.results) {
    lines.push(`- ${item.exampleId}: faithfulness=${item.faithfulness.toFixed(2)}, citation_coverage=${item.citationCoverage.toFixed(2)}`);
  }
  lines.push('Averages');
  lines.push(`- faithfulness=${report.averages.faithfulness.toFixed(2)}`);
  lines.push(`- citation_coverage=${report.averages.citationCoverage.toFixed(2)}`);
  return lines.join('\n');
}
