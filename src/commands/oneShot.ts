import {describeError} from "../errors.js";
import type {ParsedArgs} from "../parseArgs.js";
import {renderListing} from "../output/listing.js";
import type {ClientRuntime} from "../runtime/client.js";
import {printScenario} from "../scenario/report.js";
import {ScenarioRunner, allPassed} from "../scenario/runner.js";
import type {ToolArguments} from "../types/mcp.js";
import {parseToolArguments} from "./arguments.js";
import type {Invocation} from "./dispatcher.js";

export type OneShotAction =
  | {kind: "eval"; code: string; ns?: string}
  | {kind: "status"}
  | {kind: "test"; summaryOnly: boolean}
  | {kind: "tools"}
  | {kind: "tool"; name: string; argsJson?: string}
  | {kind: "overview"};

export type OneShotRuntime = Pick<ClientRuntime, "config" | "printer" | "session" | "dispatcher" | "scenario">;

/** First matching flag wins: eval, status, test, tools, tool. */
export function selectAction(args: ParsedArgs): OneShotAction {
  if (args.eval !== undefined) {
    return {kind: "eval", code: args.eval, ns: args.ns};
  }
  if (args.status) {
    return {kind: "status"};
  }
  if (args.test) {
    return {kind: "test", summaryOnly: args.summary ?? false};
  }
  if (args.tools) {
    return {kind: "tools"};
  }
  if (args.tool !== undefined) {
    return {kind: "tool", name: args.tool, argsJson: args.args};
  }
  return {kind: "overview"};
}

/** Connect, perform one action, close. Resolves to the process exit code. */
export async function runOneShot(action: OneShotAction, runtime: OneShotRuntime): Promise<number> {
  const {printer, session} = runtime;

  let toolArgs: ToolArguments = {};
  if (action.kind === "tool") {
    try {
      toolArgs = parseToolArguments(action.argsJson);
    } catch (error) {
      printer.error(describeError(error));
      return 1;
    }
  }

  printer.info(`Connecting to MCP server: ${session.endpoint}`);
  try {
    const connection = await session.connect();
    if (!connection.connected) {
      printer.error(`Connection failed: ${describeError(connection.error)}`);
      return 1;
    }
    printer.success("Connected successfully!");
    if (connection.catalogError) {
      printer.warn(`Could not list tools: ${describeError(connection.catalogError)}`);
    }

    return await perform(action, toolArgs, runtime);
  } catch (error) {
    printer.error(describeError(error));
    return 1;
  } finally {
    await session.close();
  }
}

async function perform(action: OneShotAction, toolArgs: ToolArguments, runtime: OneShotRuntime): Promise<number> {
  const {config, dispatcher, printer} = runtime;

  switch (action.kind) {
    case "eval":
      printer.info(`Evaluating: ${action.code}`);
      return report(await dispatcher.evaluate(action.code, {ns: action.ns, formatted: config.pretty}), runtime);

    case "status":
      return report(await dispatcher.status(config.pretty), runtime);

    case "tool":
      printer.info(`Calling tool: ${action.name}`);
      return report(await dispatcher.invoke(action.name, toolArgs, config.pretty), runtime);

    case "test": {
      const result = await new ScenarioRunner(dispatcher, printScenario(printer)).run(runtime.scenario, action.summaryOnly);
      return allPassed(result) ? 0 : 1;
    }

    case "tools": {
      const catalog = runtime.session.catalog;
      if (catalog.size === 0) {
        printer.error("No tools available");
        return 1;
      }
      renderListing(catalog, config.listingFormat, printer.formatter).forEach((line) => printer.result(line));
      return 0;
    }

    case "overview":
    default:
      renderListing(runtime.session.catalog, "text", printer.formatter).forEach((line) => printer.result(line));
      printer.narrate(printer.formatter.muted("💡 Use --interactive for interactive mode, or --help for more options"));
      return 0;
  }
}

function report(invocation: Invocation, runtime: OneShotRuntime): number {
  const {config, printer} = runtime;
  if (invocation.exchange.error) {
    printer.error(`Tool call failed: ${describeError(invocation.exchange.error)}`);
    return 1;
  }
  const body = invocation.rendered ?? "";
  printer.result(config.pretty ? printer.formatter.panel("Result", body) : body);
  return invocation.backendFailure ? 1 : 0;
}
