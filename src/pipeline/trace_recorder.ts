/**
 * @fileoverview Append-only event log for one pipeline run.
 *
 * Event ids are `<traceId>/evt-<type>-<nnn>`, where nnn counts every event in
 * the run from 001, so ids are unique across runs and ordered within one.
 */

import { randomUUID } from 'node:crypto';
import type { AgentName, TraceEvent, TraceEventType } from '../types.js';

function shortHex(length: number): string {
  return randomUUID().replace(/-/g, '').slice(0, length);
}

export function newTraceId(): string {
  return `trace-${shortHex(12)}`;
}

export function newAnswerId(): string {
  return `ans-${shortHex(8)}`;
}

export class TraceRecorder {
  private readonly _events: TraceEvent[] = [];

  constructor(
    readonly traceId: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  record(agent: AgentName, eventType: TraceEventType, payload: Record<string, unknown>): TraceEvent {
    const sequence = String(this._events.length + 1).padStart(3, '0');
    const event: TraceEvent = {
      eventId: `${this.traceId}/evt-${eventType}-${sequence}`,
      agent,
      eventType,
      timestamp: this.now().toISOString(),
      payload,
    };
    this._events.push(event);
    return event;
  }

  get size(): number {
    return this._events.length;
  }

  /** A copy, so later records never show up in an earlier snapshot. */
  events(): TraceEvent[] {
    return [...this._events];
  }
}
