/**
 * Interactive commands, and completion over them plus the server's tools
 */

import type {OperationCatalog} from "../runtime/catalog.js";

export interface CommandOption {
  command: string;
  description: string;
  category: "Command" | "Tool";
}

export const AVAILABLE_COMMANDS: CommandOption[] = [
  {command: "eval", description: "Evaluate code", category: "Command"},
  {command: "status", description: "Show nREPL server status", category: "Command"},
  {command: "tools", description: "List available tools", category: "Command"},
  {command: "tool", description: "Call a tool: tool <name> [json-args]", category: "Command"},
  {command: "test", description: "Run the smoke scenario (test summary for totals only)", category: "Command"},
  {command: "history", description: "Show evaluation history: history [count]", category: "Command"},
  {command: "clear", description: "Clear the screen", category: "Command"},
  {command: "help", description: "Show help message", category: "Command"},
  {command: "quit", description: "Exit", category: "Command"}
];

const MAX_SUGGESTIONS = 10;

/** Fixed command words followed by the catalog's tool names, in catalog order. */
export function completionCandidates(catalog: OperationCatalog): CommandOption[] {
  const tools: CommandOption[] = catalog.list().map((operation) => ({
    command: operation.name,
    description: operation.description || "No description",
    category: "Tool"
  }));
  return [...AVAILABLE_COMMANDS, ...tools];
}

/**
 * Candidates for the word under the cursor. The first word completes against
 * everything; after `tool ` only tool names are offered.
 */
export function getCommandSuggestions(input: string, catalog: OperationCatalog): CommandOption[] {
  const toolArg = /^\/?(?:tool|call)\s+(\S*)$/i.exec(input);
  if (toolArg) {
    const prefix = toolArg[1];
    return completionCandidates(catalog)
      .filter((option) => option.category === "Tool" && option.command.startsWith(prefix))
      .slice(0, MAX_SUGGESTIONS);
  }

  const word = input.startsWith("/") ? input.slice(1) : input;
  if (word.length === 0 || /\s/.test(word)) {
    return [];
  }
  return completionCandidates(catalog)
    .filter((option) => option.command.startsWith(word))
    .slice(0, MAX_SUGGESTIONS);
}

/** Replace the word being completed with `candidate`, keeping anything before it. */
export function applySuggestion(input: string, candidate: string): string {
  const index = input.search(/\S*$/);
  return `${input.slice(0, index)}${candidate} `;
}
