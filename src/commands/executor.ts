import type {ParsedCommand, ToolCommand} from "../chat/commandParser.js";
import {describeError} from "../errors.js";
import {renderListing} from "../output/listing.js";
import type {ClientRuntime} from "../runtime/client.js";
import {describeScenarioEvent} from "../scenario/report.js";
import {ScenarioRunner, type ScenarioEvent} from "../scenario/runner.js";
import {parseToolArguments} from "./arguments.js";
import type {Invocation} from "./dispatcher.js";

export interface CommandOutput {
  lines: string[];
  isError?: boolean;
  shouldExit?: boolean;
  clearScreen?: boolean;
}

export type CommandExecutionContext = Pick<
  ClientRuntime,
  "session" | "dispatcher" | "history" | "formatter" | "scenario" | "config"
>;

/**
 * Run one parsed interactive command. Errors are turned into output lines;
 * nothing here throws for a failed command.
 */
export async function executeCommand(parsed: ParsedCommand, context: CommandExecutionContext): Promise<CommandOutput> {
  try {
    switch (parsed.kind) {
      case "empty":
        return {lines: []};

      case "help":
        return {lines: [detailedHelpMessage()]};

      case "quit":
        return {lines: [context.formatter.info("Goodbye!")], shouldExit: true};

      case "clear":
        return {lines: [], clearScreen: true};

      case "eval":
        return reportInvocation(
          await context.dispatcher.evaluate(parsed.code, {formatted: true}),
          context,
          [context.formatter.info(`Evaluating: ${parsed.code}`)]
        );

      case "status":
        return reportInvocation(await context.dispatcher.status(true), context);

      case "tools":
        return await executeTools(context);

      case "tool":
        return await executeTool(parsed, context);

      case "test":
        return await executeScenario(parsed.summaryOnly, context);

      case "history":
        return executeHistory(parsed.count, context);

      case "unknown":
      default:
        return {lines: [context.formatter.error(parsed.message)], isError: true};
    }
  } catch (error) {
    return {lines: [context.formatter.error(describeError(error))], isError: true};
  }
}

export function reportInvocation(
  invocation: Invocation,
  context: Pick<CommandExecutionContext, "formatter">,
  preamble: string[] = []
): CommandOutput {
  const {formatter} = context;
  const {exchange, rendered, backendFailure} = invocation;
  if (exchange.error) {
    return {
      lines: [...preamble, formatter.error(`Tool call failed: ${describeError(exchange.error)}`)],
      isError: true
    };
  }
  const body = rendered ?? "";
  return {
    lines: [...preamble, formatter.panel("Result", body)],
    isError: backendFailure !== undefined
  };
}

async function executeTools(context: CommandExecutionContext): Promise<CommandOutput> {
  let catalog = context.session.catalog;
  if (catalog.size === 0) {
    catalog = await context.session.refreshCatalog();
  }
  if (catalog.size === 0) {
    return {lines: [context.formatter.error("No tools available")], isError: true};
  }
  const format = context.formatter.enhanced ? "table" : "text";
  return {lines: renderListing(catalog, format, context.formatter)};
}

async function executeTool(parsed: ToolCommand, context: CommandExecutionContext): Promise<CommandOutput> {
  const args = parseToolArguments(parsed.argsJson);
  const preamble = [context.formatter.info(`Calling tool: ${parsed.name}`)];
  if (Object.keys(args).length > 0) {
    preamble.push(`Arguments: ${JSON.stringify(args, null, 2)}`);
  }
  return reportInvocation(await context.dispatcher.invoke(parsed.name, args, true), context, preamble);
}

async function executeScenario(summaryOnly: boolean, context: CommandExecutionContext): Promise<CommandOutput> {
  const lines: string[] = [];
  const listener = (event: ScenarioEvent) => {
    lines.push(...describeScenarioEvent(event, context.formatter));
  };
  const result = await new ScenarioRunner(context.dispatcher, listener).run(context.scenario, summaryOnly);
  return {lines, isError: result.passedCount !== result.totalCount};
}

function executeHistory(count: number, context: CommandExecutionContext): CommandOutput {
  const {formatter, history} = context;
  if (history.size === 0) {
    return {lines: [formatter.info("No evaluation history")]};
  }
  const recent = history.last(count);
  const offset = history.size - recent.length;
  return {
    lines: [
      formatter.accent("📜 Evaluation History:"),
      ...recent.map((code, index) => `  ${offset + index + 1}. ${code}`)
    ]
  };
}

export function overviewMessage(): string {
  return [
    "Interactive MCP-nREPL Client",
    "",
    "Commands:",
    "  eval <code>            Evaluate code",
    "  status                 Show nREPL server status",
    "  tools                  List available tools",
    "  tool <name> [json]     Call a specific tool",
    "  test                   Run the smoke scenario",
    "  history [n]            Show evaluation history",
    "  clear                  Clear screen",
    "  quit                   Exit",
    "",
    "Tab completes commands and tool names.",
    ""
  ].join("\n");
}

export function detailedHelpMessage(): string {
  const commands = [
    {cmd: "eval", args: "<code>", desc: "Evaluate code through the server's eval tool"},
    {cmd: "status", desc: "Show nREPL server status"},
    {cmd: "tools", desc: "List available tools (aliases: list)"},
    {cmd: "tool", args: "<name> [json-args]", desc: "Call a tool directly (aliases: call)"},
    {cmd: "test", args: "[summary]", desc: "Run the smoke scenario"},
    {cmd: "history", args: "[n]", desc: "Show the last n evaluations (default 10)"},
    {cmd: "clear", desc: "Clear the screen"},
    {cmd: "help", desc: "Show this help message"},
    {cmd: "quit", desc: "Exit (aliases: exit, q)"}
  ];

  const formatCommands = (cmds: Array<{cmd: string; args?: string; desc: string}>) => {
    const maxLength = Math.max(...cmds.map((c) => (c.cmd + (c.args ? " " + c.args : "")).length));
    return cmds.map(({cmd, args, desc}) => {
      const full = cmd + (args ? " " + args : "");
      const padding = " ".repeat(maxLength - full.length + 2);
      return `  ${full}${padding}${desc}`;
    });
  };

  return [
    "MCP-nREPL Client",
    "",
    "Commands:",
    ...formatCommands(commands),
    "",
    "Examples:",
    "  eval (+ 1 2 3)",
    '  tool nrepl-eval {"code": "(* 6 7)"}',
    "  history 5"
  ].join("\n");
}
