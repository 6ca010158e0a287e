export type ServerAction = "start" | "stop" | "restart" | "status" | "health" | "test" | "tools" | "run";

export interface ParsedArgs {
  url?: string;
  stdio?: string;
  eval?: string;
  ns?: string;
  status?: boolean;
  test?: boolean;
  summary?: boolean;
  tools?: boolean;
  format?: string;
  tool?: string;
  args?: string;
  pretty?: boolean;
  quiet?: boolean;
  interactive: boolean;
  historyFile?: string;
  server?: ServerAction;
  helpRequested?: boolean;
  unknown: string[];
}

const SERVER_ACTIONS: ReadonlySet<string> = new Set<ServerAction>([
  "start",
  "stop",
  "restart",
  "status",
  "health",
  "test",
  "tools",
  "run"
]);

export const HELP_TEXT = `
Usage
  mcp-nrepl [options]
  mcp-nrepl server <start|stop|restart|status|health|test|tools|run>

Quick actions
  --eval, -e <code>        Evaluate code and exit
  --ns <namespace>         Namespace for --eval
  --status                 Show nREPL server status and exit
  --test                   Run the smoke scenario against the server
  --summary                Only print the scenario totals
  --tools                  List available tools
  --format <text|json|table>  Output format for --tools (default: text)
  --tool <name>            Call a specific tool
  --args <json>            Tool arguments as JSON (default: {})

Connection
  --url, -u <url>          MCP server URL (default: http://localhost:<MCP_HTTP_PORT or 3000>/mcp)
  --stdio <command>        Spawn <command> and speak MCP over its stdin/stdout

Output
  --pretty                 Structured rendering of JSON results
  --quiet, -q              Minimal output for scripts (results and errors only)

Interactive
  --interactive, -i        Start the interactive loop
  --history-file <path>    Where evaluation history is kept (default: .mcp_history)

  --help, -h               Show this help message

Examples
  mcp-nrepl --eval "(+ 1 2 3)"
  mcp-nrepl --tool nrepl-eval --args '{"code": "(* 6 7)"}'
  mcp-nrepl --test --summary --quiet
  mcp-nrepl server start
  mcp-nrepl server run     Start the server, run the scenario, then the health check
`.trim();

export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    interactive: false,
    unknown: []
  };

  const consumeValue = (index: number): string | undefined => {
    const value = argv[index + 1];
    if (value === undefined) {
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    switch (arg) {
      case "--url":
      case "-u": {
        const value = consumeValue(i);
        if (value !== undefined) {
          result.url = value;
          i += 1;
        }
        break;
      }
      case "--stdio": {
        const value = consumeValue(i);
        if (value !== undefined) {
          result.stdio = value;
          i += 1;
        }
        break;
      }
      case "--eval":
      case "-e": {
        const value = consumeValue(i);
        if (value !== undefined) {
          result.eval = value;
          i += 1;
        }
        break;
      }
      case "--ns": {
        const value = consumeValue(i);
        if (value !== undefined) {
          result.ns = value;
          i += 1;
        }
        break;
      }
      case "--tool": {
        const value = consumeValue(i);
        if (value !== undefined) {
          result.tool = value;
          i += 1;
        }
        break;
      }
      case "--args": {
        const value = consumeValue(i);
        if (value !== undefined) {
          result.args = value;
          i += 1;
        }
        break;
      }
      case "--format": {
        const value = consumeValue(i);
        if (value !== undefined) {
          result.format = value;
          i += 1;
        }
        break;
      }
      case "--history-file": {
        const value = consumeValue(i);
        if (value !== undefined) {
          result.historyFile = value;
          i += 1;
        }
        break;
      }
      case "--status": {
        result.status = true;
        break;
      }
      case "--test":
      case "--test-nrepl": {
        result.test = true;
        break;
      }
      case "--summary": {
        result.summary = true;
        break;
      }
      case "--tools": {
        result.tools = true;
        break;
      }
      case "--pretty": {
        result.pretty = true;
        break;
      }
      case "--quiet":
      case "-q": {
        result.quiet = true;
        break;
      }
      case "--interactive":
      case "-i": {
        result.interactive = true;
        break;
      }
      case "--help":
      case "-h": {
        result.helpRequested = true;
        break;
      }
      default: {
        if (arg.startsWith("-")) {
          result.unknown.push(arg);
          break;
        }

        if (arg === "server" && !result.server) {
          const action = consumeValue(i);
          if (action !== undefined && isServerAction(action)) {
            result.server = action;
            i += 1;
            break;
          }
        }

        result.unknown.push(arg);
      }
    }
  }

  return result;
}

function isServerAction(value: string): value is ServerAction {
  return SERVER_ACTIONS.has(value);
}
