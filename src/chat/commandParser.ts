export type CommandKind =
  | "empty"
  | "help"
  | "eval"
  | "status"
  | "tools"
  | "tool"
  | "test"
  | "history"
  | "clear"
  | "quit"
  | "unknown";

export interface BaseParsedCommand {
  kind: CommandKind;
}

export interface SimpleCommand extends BaseParsedCommand {
  kind: "empty" | "help" | "status" | "tools" | "clear" | "quit";
}

export interface EvalCommand extends BaseParsedCommand {
  kind: "eval";
  code: string;
}

export interface ToolCommand extends BaseParsedCommand {
  kind: "tool";
  name: string;
  argsJson?: string;
}

export interface TestCommand extends BaseParsedCommand {
  kind: "test";
  summaryOnly: boolean;
}

export interface HistoryCommand extends BaseParsedCommand {
  kind: "history";
  count: number;
}

export interface UnknownCommand extends BaseParsedCommand {
  kind: "unknown";
  message: string;
}

export type ParsedCommand = SimpleCommand | EvalCommand | ToolCommand | TestCommand | HistoryCommand | UnknownCommand;

export const DEFAULT_HISTORY_COUNT = 10;

const SIMPLE_COMMANDS: Record<string, SimpleCommand["kind"]> = {
  help: "help",
  "?": "help",
  status: "status",
  tools: "tools",
  list: "tools",
  clear: "clear",
  cls: "clear",
  quit: "quit",
  exit: "quit",
  q: "quit"
};

/**
 * Split a line into its command word and the raw tail. The tail is kept
 * verbatim because it carries code or JSON.
 */
export function splitCommandLine(line: string): {word: string; tail: string} {
  const trimmed = line.trim();
  const withoutSlash = trimmed.startsWith("/") ? trimmed.slice(1) : trimmed;
  const match = /^(\S+)\s*([\s\S]*)$/.exec(withoutSlash);
  if (!match) {
    return {word: "", tail: ""};
  }
  return {word: match[1].toLowerCase(), tail: match[2].trim()};
}

export function parseCommand(input: string): ParsedCommand {
  const {word, tail} = splitCommandLine(input);
  if (!word) {
    return {kind: "empty"};
  }

  const simpleKind = SIMPLE_COMMANDS[word];
  if (simpleKind) {
    return {kind: simpleKind};
  }

  switch (word) {
    case "eval":
    case "e":
      if (!tail) {
        return {kind: "unknown", message: "Usage: eval <code>"};
      }
      return {kind: "eval", code: tail};

    case "tool":
    case "call":
      return parseTool(tail);

    case "test":
    case "scenario":
      return {kind: "test", summaryOnly: tail === "summary" || tail === "--summary"};

    case "history":
      return parseHistory(tail);

    default:
      return {
        kind: "unknown",
        message: `Unknown command: ${word}. Type "help" to see what I can do.`
      };
  }
}

function parseTool(tail: string): ParsedCommand {
  if (!tail) {
    return {kind: "unknown", message: "Usage: tool <name> [json-args]"};
  }
  const {word: name, tail: argsJson} = splitToolTail(tail);
  return argsJson ? {kind: "tool", name, argsJson} : {kind: "tool", name};
}

// Operation names are case-sensitive, unlike command words
function splitToolTail(tail: string): {word: string; tail: string} {
  const match = /^(\S+)\s*([\s\S]*)$/.exec(tail);
  return match ? {word: match[1], tail: match[2].trim()} : {word: tail, tail: ""};
}

function parseHistory(tail: string): ParsedCommand {
  if (!tail) {
    return {kind: "history", count: DEFAULT_HISTORY_COUNT};
  }
  const count = Number.parseInt(tail, 10);
  if (!Number.isInteger(count) || count <= 0 || String(count) !== tail) {
    return {kind: "unknown", message: "Usage: history [count]"};
  }
  return {kind: "history", count};
}
