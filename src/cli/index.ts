#!/usr/bin/env node
/**
 * @fileoverview sourcewise CLI
 *
 * Commands:
 *   sourcewise ingest <paths...>     - Index text files
 *   sourcewise query "<question>"    - Answer a question with citations
 *   sourcewise trace <id>            - Show a run's trace
 *   sourcewise document <id>         - Show an indexed document
 *   sourcewise search "<query>"      - Web search, fetch and index
 *   sourcewise eval [dataset]        - Offline evaluation
 *   sourcewise health                - Status and version
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { pathToFileURL } from 'node:url';
import { createResearchService } from '../api/service.js';
import { loadConfig } from '../config/index.js';
import { configureLogger } from '../telemetry/logger.js';
import { VERSION } from '../version.js';
import { documentCommand } from './commands/document.js';
import { evalCommand } from './commands/eval.js';
import { healthCommand } from './commands/health.js';
import { ingestCommand } from './commands/ingest.js';
import { queryCommand } from './commands/query.js';
import { searchCommand } from './commands/search.js';
import { traceCommand } from './commands/trace.js';
import type { CommandContext } from './context.js';
import {
  classifyError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';
import { showHelp } from './help.js';

type CommandHandler = (context: CommandContext) => Promise<void>;

const COMMANDS: Record<string, CommandHandler> = {
  ingest: ingestCommand,
  query: queryCommand,
  trace: traceCommand,
  document: documentCommand,
  search: searchCommand,
  eval: evalCommand,
  health: healthCommand,
};

const CLI_OPTIONS = {
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
  json: { type: 'boolean', default: false },
  stream: { type: 'boolean', default: false },
  'data-dir': { type: 'string' },
  config: { type: 'string' },
  'max-sources': { type: 'string' },
  'max-results': { type: 'string' },
  metadata: { type: 'string' },
  corpus: { type: 'string' },
  document: { type: 'string', multiple: true },
} as const;

function parseCliArgs(argv: string[]) {
  return parseArgs({ args: argv, options: CLI_OPTIONS, allowPositionals: true, strict: true });
}

/**
 * Output a structured error: JSON for agents, hints for humans. Always stderr.
 */
function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  console.error(useJson ? formatErrorJson(envelope) : formatErrorWithHints(envelope));
}

export async function main(argv: string[]): Promise<number> {
  const jsonMode = argv.includes('--json');

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    const envelope = createErrorEnvelope('INVALID_ARGUMENT', error instanceof Error ? error.message : String(error), {
      recoveryHints: ["Run 'sourcewise help' for usage information"],
    });
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  }
  const { values, positionals } = parsed;

  if (values.version) {
    console.log(`sourcewise ${VERSION}`);
    return 0;
  }

  const [command, ...args] = positionals;
  if (values.help || !command || command === 'help') {
    showHelp(command === 'help' ? args[0] : command);
    return 0;
  }

  const handler = COMMANDS[command];
  if (!handler) {
    const envelope = createErrorEnvelope('INVALID_ARGUMENT', `Unknown command: ${command}`, {
      recoveryHints: ["Run 'sourcewise help' for usage information", `Available commands: ${Object.keys(COMMANDS).join(', ')}`],
      context: { command },
    });
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  }

  try {
    const config = loadConfig({
      configPath: values.config,
      overrides: values['data-dir'] ? { dataDir: values['data-dir'] } : {},
    });
    configureLogger({ level: config.logLevel });
    const service = await createResearchService(config);
    try {
      await handler({
        service,
        args,
        flags: {
          json: values.json,
          stream: values.stream,
          maxSources: values['max-sources'],
          maxResults: values['max-results'],
          metadata: values.metadata,
          corpus: values.corpus,
          documents: values.document ?? [],
        },
      });
    } finally {
      await service.close();
    }
    return 0;
  } catch (error) {
    const envelope = classifyError(error);
    envelope.context.command = command;
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
