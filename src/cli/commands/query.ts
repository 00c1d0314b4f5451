import { formatServerSentEvent, replayResult, toQueryResponse } from '../../pipeline/replay.js';
import type { PipelineResult } from '../../types.js';
import { parseIntegerFlag, printJson, requireArgument, type CommandContext } from '../context.js';

export function formatAnswer(result: PipelineResult): string {
  const lines = [result.answer, ''];
  if (result.citations.length > 0) {
    lines.push('Sources:');
    result.citations.forEach((citation, index) => {
      lines.push(`  [${index + 1}] ${citation.title} (${citation.url})`);
    });
    lines.push('');
  }
  const supported = result.claimVerifications.filter((claim) => claim.verdict === 'supported').length;
  lines.push(`Confidence: ${result.confidenceScore.toFixed(2)} (${supported}/${result.claimVerifications.length} claims supported)`);
  if (result.refusal) {
    lines.push('Refusal: confidence is below the threshold; treat this answer as unverified.');
  }
  lines.push(`Trace: ${result.traceId}`);
  return lines.join('\n');
}

export async function queryCommand({ service, args, flags }: CommandContext): Promise<void> {
  const query = requireArgument(args, 'Query', 'sourcewise query "<question>"');
  const result = await service.runPipeline(query, {
    maxSources: parseIntegerFlag(flags.maxSources, '--max-sources'),
    documentIds: flags.documents.length > 0 ? flags.documents : undefined,
  });

  if (flags.stream) {
    for (const event of replayResult(result, { answerChunkSize: service.config.pipeline.answerChunkSize })) {
      process.stdout.write(formatServerSentEvent(event));
    }
    return;
  }
  if (flags.json) {
    printJson(toQueryResponse(result));
    return;
  }
  console.log(formatAnswer(result));
}
