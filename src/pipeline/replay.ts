/**
 * @fileoverview Post-hoc event stream over a finished pipeline result.
 *
 * Nothing here runs the pipeline incrementally: the run is complete before
 * the first event is produced. Order is every trace event, then every
 * citation, then the answer in fixed-size slices, then the final response.
 */

import type { Citation, PipelineResult, QueryResponse, TraceEvent } from '../types.js';

export const DEFAULT_ANSWER_CHUNK_SIZE = 80;

export type ReplayEvent =
  | { event: 'trace_event'; data: TraceEvent }
  | { event: 'citation'; data: Citation }
  | { event: 'answer_delta'; data: { text: string } }
  | { event: 'final'; data: QueryResponse };

export interface ReplayOptions {
  answerChunkSize?: number;
}

export function toQueryResponse(result: PipelineResult): QueryResponse {
  return {
    answerId: result.answerId,
    query: result.query,
    answer: result.answer,
    citations: [...result.citations],
    claimVerifications: [...result.claimVerifications],
    confidenceScore: result.confidenceScore,
    refusal: result.refusal,
    traceId: result.traceId,
  };
}

export function chunkAnswer(text: string, chunkSize: number = DEFAULT_ANSWER_CHUNK_SIZE): string[] {
  const size = Math.max(1, Math.floor(chunkSize));
  const slices: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    slices.push(text.slice(i, i + size));
  }
  return slices;
}

export function* replayResult(result: PipelineResult, options: ReplayOptions = {}): Generator<ReplayEvent> {
  for (const traceEvent of result.traceEvents) {
    yield { event: 'trace_event', data: traceEvent };
  }
  for (const citation of result.citations) {
    yield { event: 'citation', data: citation };
  }
  for (const text of chunkAnswer(result.answer, options.answerChunkSize ?? DEFAULT_ANSWER_CHUNK_SIZE)) {
    yield { event: 'answer_delta', data: { text } };
  }
  yield { event: 'final', data: toQueryResponse(result) };
}

/** JSON with every non-ASCII code unit escaped, so the stream is 7-bit clean. */
export function asciiJson(value: unknown): string {
  return JSON.stringify(value).replace(/[\u007f-\uffff]/g, (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

export function formatServerSentEvent(replayEvent: ReplayEvent): string {
  return `event: ${replayEvent.event}\ndata: ${asciiJson(replayEvent.data)}\n\n`;
}
