/**
 * @fileoverview Evaluation datasets: one JSON object per line.
 *
 *   {"id": "...", "query": "...", "expected_facts": [...], "expected_citations": [...]}
 *
 * Blank lines are skipped. Both expectation lists are optional. A dataset
 * can ship with a corpus directory of text files its queries are answered from.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { glob } from 'glob';
import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { parseJsonAs } from '../utils/safe_json.js';

export const DEFAULT_DATASET_PATH = fileURLToPath(new URL('../../eval-corpus/baseline.jsonl', import.meta.url));
export const DEFAULT_CORPUS_DIR = fileURLToPath(new URL('../../eval-corpus/documents', import.meta.url));

const EvaluationExampleSchema = z.object({
  id: z.string().min(1),
  query: z.string().min(1),
  expected_facts: z.array(z.string()).default([]),
  expected_citations: z.array(z.string()).default([]),
});

export interface EvaluationExample {
  id: string;
  query: string;
  expectedFacts: string[];
  expectedCitations: string[];
}

export function parseEvaluationDataset(content: string, source = 'dataset'): EvaluationExample[] {
  const examples: EvaluationExample[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim().length === 0) return;
    const parsed = parseJsonAs(line, EvaluationExampleSchema);
    if (!parsed.ok) {
      throw new ValidationError(`${source}:${index + 1}`, 'an evaluation example object', parsed.error.message);
    }
    examples.push({
      id: parsed.value.id,
      query: parsed.value.query,
      expectedFacts: parsed.value.expected_facts,
      expectedCitations: parsed.value.expected_citations,
    });
  });
  return examples;
}

export async function loadEvaluationDataset(datasetPath: string = DEFAULT_DATASET_PATH): Promise<EvaluationExample[]> {
  const content = await readFile(datasetPath, 'utf8');
  return parseEvaluationDataset(content, datasetPath);
}

export interface CorpusDocument {
  /** Stable id, so indexing the corpus again replaces its documents. */
  documentId: string;
  filename: string;
  text: string;
}

/** Text and Markdown files directly inside `corpusDir`, sorted by name. */
export async function loadCorpusDocuments(corpusDir: string = DEFAULT_CORPUS_DIR): Promise<CorpusDocument[]> {
  const files = (await glob('*.{txt,md}', { cwd: corpusDir, nodir: true })).sort();
  const documents: CorpusDocument[] = [];
  for (const filename of files) {
    documents.push({
      documentId: `corpus-${path.parse(filename).name}`,
      filename,
      text: await readFile(path.join(corpusDir, filename), 'utf8'),
    });
  }
  return documents;
}
