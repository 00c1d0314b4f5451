import type { TraceRecord } from '../../types.js';
import { printJson, requireArgument, type CommandContext } from '../context.js';
import { createError } from '../errors.js';

export function formatTrace(trace: TraceRecord): string {
  const lines = [`Trace ${trace.traceId}`, `Query: ${trace.query}`, ''];
  for (const event of trace.events) {
    lines.push(`${event.timestamp}  ${event.agent.padEnd(12)} ${event.eventType.padEnd(9)} ${JSON.stringify(event.payload)}`);
  }
  return lines.join('\n');
}

export async function traceCommand({ service, args, flags }: CommandContext): Promise<void> {
  const traceId = requireArgument(args, 'Trace id', 'sourcewise trace <trace-id>');
  const trace = await service.getTrace(traceId);
  if (!trace) {
    throw createError('NOT_FOUND', `Trace not found: ${traceId}`, { traceId });
  }
  if (flags.json) {
    printJson(trace);
    return;
  }
  console.log(formatTrace(trace));
}
