import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import type { DocumentMetadata } from '../../types.js';
import { parseJsonObject } from '../../utils/safe_json.js';
import { printJson, type CommandContext } from '../context.js';
import { createError } from '../errors.js';
import { createProgressBar } from '../progress.js';

export interface IngestSummary {
  documentId: string;
  filename: string;
  status: string;
  chunks: number;
  sizeBytes: number;
}

/** Expand each argument as a glob; an argument naming an existing file matches itself. */
export async function resolveInputFiles(patterns: readonly string[], cwd: string = process.cwd()): Promise<string[]> {
  const files = new Set<string>();
  for (const pattern of patterns) {
    const matches = await glob(pattern, { cwd, nodir: true, absolute: true });
    for (const match of matches) files.add(match);
  }
  return [...files].sort();
}

function parseMetadata(raw: string | undefined): DocumentMetadata {
  if (raw === undefined) return {};
  const parsed = parseJsonObject(raw);
  if (!parsed) {
    throw createError('INVALID_ARGUMENT', '--metadata must be a JSON object');
  }
  return parsed;
}

export async function ingestCommand({ service, args, flags }: CommandContext): Promise<void> {
  if (args.length === 0) {
    throw createError('INVALID_ARGUMENT', 'At least one file or glob is required. Usage: sourcewise ingest <paths...>');
  }
  const metadata = parseMetadata(flags.metadata);
  const files = await resolveInputFiles(args);
  if (files.length === 0) {
    throw createError('INVALID_ARGUMENT', `No files matched: ${args.join(' ')}`);
  }
  if (files.length > 1 && metadata.document_id !== undefined) {
    throw createError('INVALID_ARGUMENT', '--metadata document_id can only be used with a single file');
  }

  const progress = createProgressBar({ total: files.length, enabled: !flags.json });
  const summaries: IngestSummary[] = [];
  try {
    for (const file of files) {
      const text = await readFile(file, 'utf8');
      const document = await service.ingestDocument(text, path.basename(file), metadata);
      summaries.push({
        documentId: document.id,
        filename: document.filename,
        status: document.status,
        chunks: document.chunks.length,
        sizeBytes: document.sizeBytes,
      });
      progress.increment(1, { task: path.basename(file) });
    }
  } finally {
    progress.stop();
  }

  if (flags.json) {
    printJson(summaries);
    return;
  }
  for (const summary of summaries) {
    console.log(`${summary.documentId}\t${summary.status}\t${summary.chunks} chunks\t${summary.filename}`);
  }
}
