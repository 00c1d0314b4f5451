import { describe, expect, it } from 'vitest';
import type { Citation, PipelineResult, TraceEvent } from '../../types.js';
import { TraceRecorder, newAnswerId, newTraceId } from '../trace_recorder.js';
import { asciiJson, chunkAnswer, formatServerSentEvent, replayResult, toQueryResponse } from '../replay.js';

function makeCitation(index: number): Citation {
  return {
    citationId: `cit-00${index}`,
    sourceId: 'doc-1',
    title: 'Doc One',
    url: 'local://doc-1',
    publishedAt: '2024-01-01',
    snippet: 'snippet',
    chunkStart: 0,
    chunkEnd: 7,
  };
}

function makeResult(answer: string): PipelineResult {
  const recorder = new TraceRecorder('trace-r', () => new Date('2024-01-01T00:00:00.000Z'));
  recorder.record('Planner', 'plan', {});
  recorder.record('Orchestrator', 'finalize', { confidence_score: 0.7, refusal: false });
  return {
    traceId: 'trace-r',
    answerId: 'ans-r',
    query: 'q',
    plan: [],
    evidence: [],
    answer,
    citations: [makeCitation(0), makeCitation(1)],
    critique: null,
    claimVerifications: [],
    confidenceScore: 0.7,
    refusal: false,
    traceEvents: recorder.events(),
  };
}

describe('TraceRecorder', () => {
  it('numbers events across the run', () => {
    const recorder = new TraceRecorder('trace-1', () => new Date('2024-01-01T00:00:00.000Z'));
    recorder.record('Planner', 'plan', {});
    const event: TraceEvent = recorder.record('Retriever', 'retrieve', { result_count: 0 });

    expect(event).toEqual({
      eventId: 'trace-1/evt-retrieve-002',
      agent: 'Retriever',
      eventType: 'retrieve',
      timestamp: '2024-01-01T00:00:00.000Z',
      payload: { result_count: 0 },
    });
    expect(recorder.size).toBe(2);
  });

  it('returns snapshots that later records do not change', () => {
    const recorder = new TraceRecorder('trace-1');
    recorder.record('Planner', 'plan', {});
    const snapshot = recorder.events();
    recorder.record('Writer', 'write', {});

    expect(snapshot).toHaveLength(1);
  });

  it('generates prefixed ids', () => {
    expect(newTraceId()).toMatch(/^trace-[0-9a-f]{12}$/);
    expect(newAnswerId()).toMatch(/^ans-[0-9a-f]{8}$/);
  });
});

describe('chunkAnswer', () => {
  it('slices into fixed-size pieces with a shorter tail', () => {
    expect(chunkAnswer('a'.repeat(170), 80).map((slice) => slice.length)).toEqual([80, 80, 10]);
  });

  it('returns nothing for an empty answer', () => {
    expect(chunkAnswer('')).toEqual([]);
  });

  it('treats a size below 1 as 1', () => {
    expect(chunkAnswer('abc', 0)).toEqual(['a', 'b', 'c']);
  });
});

describe('replayResult', () => {
  it('emits trace events, citations, answer slices, then the final response', () => {
    const result = makeResult('x'.repeat(100));

    const events = [...replayResult(result)];

    expect(events.map((event) => event.event)).toEqual([
      'trace_event',
      'trace_event',
      'citation',
      'citation',
      'answer_delta',
      'answer_delta',
      'final',
    ]);
    expect(events[4]).toEqual({ event: 'answer_delta', data: { text: 'x'.repeat(80) } });
    expect(events[6]).toEqual({ event: 'final', data: toQueryResponse(result) });
  });

  it('honors a custom slice size', () => {
    const events = [...replayResult(makeResult('abcdef'), { answerChunkSize: 4 })];

    expect(events.filter((event) => event.event === 'answer_delta').map((event) => event.data)).toEqual([
      { text: 'abcd' },
      { text: 'ef' },
    ]);
  });
});

describe('toQueryResponse', () => {
  it('keeps the response fields only', () => {
    expect(toQueryResponse(makeResult('answer'))).toEqual({
      answerId: 'ans-r',
      query: 'q',
      answer: 'answer',
      citations: [makeCitation(0), makeCitation(1)],
      claimVerifications: [],
      confidenceScore: 0.7,
      refusal: false,
      traceId: 'trace-r',
    });
  });
});

describe('server-sent events', () => {
  it('escapes non-ASCII characters', () => {
    expect(asciiJson({ text: 'café ☕' })).toBe('{"text":"caf\\u00e9 \\u2615"}');
  });

  it('formats an event block', () => {
    expect(formatServerSentEvent({ event: 'answer_delta', data: { text: 'hi' } })).toBe(
      'event: answer_delta\ndata: {"text":"hi"}\n\n',
    );
  });
});
