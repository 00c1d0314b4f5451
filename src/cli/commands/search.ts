import { parseIntegerFlag, printJson, requireArgument, type CommandContext } from '../context.js';

export async function searchCommand({ service, args, flags }: CommandContext): Promise<void> {
  const query = requireArgument(args, 'Search query', 'sourcewise search "<query>"');
  const response = await service.searchWeb(query, {
    maxResults: parseIntegerFlag(flags.maxResults, '--max-results'),
  });
  if (flags.json) {
    printJson(response);
    return;
  }
  if (response.results.length === 0) {
    console.log(`No results. Trace: ${response.traceId}`);
    return;
  }
  response.results.forEach((result, index) => {
    console.log(`[${index + 1}] ${result.title}\n    ${result.url}\n    ${result.snippet.replace(/\s+/g, ' ')}`);
  });
  console.log(`Trace: ${response.traceId}`);
}
