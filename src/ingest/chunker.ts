/**
 * @fileoverview Fixed-window text chunking
 *
 * Windows of `chunkSize` characters advance by `chunkSize - overlap`, so
 * consecutive chunks share `overlap` characters. The last window is clipped to
 * the end of the text and chunking stops there, which covers the text end to
 * end with no gap.
 */

import { ValidationError } from '../core/errors.js';

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 50;

export interface TextChunk {
  text: string;
  /** Inclusive start index into the source string. */
  start: number;
  /** Exclusive end index into the source string. */
  end: number;
}

function validateWindow(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError('chunkSize', 'a positive integer', String(chunkSize));
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ValidationError('overlap', 'a non-negative integer', String(overlap));
  }
  if (overlap >= chunkSize) {
    throw new ValidationError('overlap', `less than chunkSize (${chunkSize})`, String(overlap));
  }
}

export function chunkText(
  text: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP,
): TextChunk[] {
  validateWindow(chunkSize, overlap);
  if (text.length === 0) return [];

  const chunks: TextChunk[] = [];
  const length = text.length;
  let start = 0;
  while (start < length) {
    const end = Math.min(start + chunkSize, length);
    chunks.push({ text: text.slice(start, end), start, end });
    if (end === length) break;
    start = end - overlap;
  }
  return chunks;
}
