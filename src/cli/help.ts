/**
 * @fileoverview Detailed help text for sourcewise CLI commands
 */

const HELP_TEXT: Record<string, string> = {
  main: `
sourcewise - cited, verified answers over your own documents

USAGE:
    sourcewise <command> [options]

COMMANDS:
    ingest <paths...>   Index text files (paths or globs)
    query "<question>"  Answer a question from the index
    trace <trace-id>    Show the recorded trace of a run
    document <id>       Show an indexed document
    search "<query>"    Search the web, index the pages, rank them
    eval [dataset]      Score answers against a JSONL dataset
    health              Show service status and version
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --data-dir <dir>    Data directory (default: .sourcewise)
    --config <file>     YAML config file (default: ./sourcewise.config.yaml)
    --json              Machine-readable output; errors as JSON on stderr

EXAMPLES:
    sourcewise ingest "notes/**/*.md"
    sourcewise query "What limits tidal power?" --max-sources 5
    sourcewise trace trace-4f1c2a9b7e3d

For more information on a specific command, run:
    sourcewise help <command>
`,

  ingest: `
sourcewise ingest - Index text files

USAGE:
    sourcewise ingest <paths-or-globs...> [--metadata <json>]

OPTIONS:
    --metadata <json>   Metadata for every file: url, title, published_at,
                        or document_id (single file only; replaces that document)

Each file becomes one document, split into overlapping chunks.
`,

  query: `
sourcewise query - Answer a question from the index

USAGE:
    sourcewise query "<question>" [--max-sources N] [--document <id>]... [--stream] [--json]

OPTIONS:
    --max-sources N     Evidence chunks to use (default 8, at most 25)
    --document <id>     Only retrieve from this document (repeatable)
    --stream            Print the finished run as server-sent events
    --json              Print the query response as JSON
`,

  trace: `
sourcewise trace - Show the recorded trace of a run

USAGE:
    sourcewise trace <trace-id> [--json]
`,

  document: `
sourcewise document - Show an indexed document

USAGE:
    sourcewise document <document-id> [--json]
`,

  search: `
sourcewise search - Search the web and index the results

USAGE:
    sourcewise search "<query>" [--max-results N] [--json]

OPTIONS:
    --max-results N     Search hits to fetch and results to return (default 10, at most 50)

Requires BING_API_KEY or SERPAPI_KEY.
`,

  eval: `
sourcewise eval - Score answers against a dataset

USAGE:
    sourcewise eval [dataset.jsonl] [--corpus <dir>] [--json]

Each line: {"id", "query", "expected_facts"?, "expected_citations"?}.
Defaults to the bundled eval-corpus/baseline.jsonl, whose documents in
eval-corpus/documents are indexed first. For another dataset, pass --corpus
to index a directory of .txt/.md files, or ingest its sources beforehand.
`,

  health: `
sourcewise health - Show service status and version

USAGE:
    sourcewise health [--json]
`,
};

export function getHelpText(command?: string): string {
  return (command ? HELP_TEXT[command] : undefined) ?? HELP_TEXT.main ?? '';
}

export function showHelp(command?: string): void {
  console.log(getHelpText(command));
}
