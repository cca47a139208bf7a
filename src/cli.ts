export interface CliOptions {
  verbosity: number;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/**
 * Parses `-v` (repeatable, also `-vv`), `--verbose` and `--help`/`-h`.
 */
export function parseArgs(args: string[]): CliOptions {
  let verbosity = 0;
  let help = false;

  for (const arg of args) {
    if (arg === "--verbose") {
      verbosity++;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (/^-v+$/.test(arg)) {
      verbosity += arg.length - 1;
    } else {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return { verbosity, help };
}

export const HELP_TEXT = `
notepm-mcp - NotePM search and page detail as MCP tools (stdio transport)

Usage:
  notepm-mcp [-v | -vv] [--help]

Options:
  -v, --verbose   Increase log verbosity (repeatable: -v info, -vv debug)
  -h, --help      Show this help

Environment variables required:
  NOTEPM_TEAM                      Team name (https://<team>.notepm.jp)
  NOTEPM_API_TOKEN                 API access token

Optional:
  NOTEPM_MAX_BODY_LENGTH           Max characters of each page body in search results (default: 200)
  NOTEPM_REQUEST_TIMEOUT_MS        Upstream request timeout (default: 30000)
  NOTEPM_SEARCH_DESCRIPTION        Override the search tool description
  NOTEPM_PAGE_DETAIL_DESCRIPTION   Override the pageDetail tool description
  LOG_LEVEL                        debug, info, warn or error (overrides -v)
  OTEL_ENABLED                     Set to true to export traces over OTLP
`;
