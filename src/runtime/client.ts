import {CommandDispatcher} from "../commands/dispatcher.js";
import type {ClientConfig} from "../config.js";
import type {Logger} from "../logger.js";
import type {OutputFormatter} from "../output/formatter.js";
import {Printer, type WriteLine} from "../output/printer.js";
import {FileHistoryStore, History, type HistoryStore} from "../repl/history.js";
import {buildNreplScenario} from "../scenario/nreplScenario.js";
import type {ScenarioStep} from "../scenario/runner.js";
import {HttpTransport} from "./httpTransport.js";
import {Session} from "./session.js";
import {StdioTransport} from "./stdioTransport.js";
import type {Transport} from "./transport.js";

/**
 * Everything one client instance owns. Built once in the entry point and
 * handed to the one-shot runner or the interactive loop; nothing here is global.
 */
export interface ClientRuntime {
  config: ClientConfig;
  logger: Logger;
  formatter: OutputFormatter;
  printer: Printer;
  session: Session;
  dispatcher: CommandDispatcher;
  history: History;
  historyStore: HistoryStore;
  scenario: ScenarioStep[];
}

export interface RuntimeOverrides {
  transport?: Transport;
  historyStore?: HistoryStore;
  stdout?: WriteLine;
  stderr?: WriteLine;
}

export function createTransport(config: ClientConfig, logger: Logger): Transport {
  if (config.stdioCommand) {
    return new StdioTransport({command: config.stdioCommand, logger});
  }
  return new HttpTransport({url: config.url, timeoutMs: config.requestTimeoutMs, logger});
}

export function createClientRuntime(
  config: ClientConfig,
  formatter: OutputFormatter,
  logger: Logger,
  overrides: RuntimeOverrides = {}
): ClientRuntime {
  const transport = overrides.transport ?? createTransport(config, logger);
  const session = new Session(transport, {clientInfo: config.clientInfo, logger});
  const history = new History([], config.historyLimit);
  const dispatcher = new CommandDispatcher(session, history, {
    evaluateOperation: config.operations.evaluateOperation,
    statusOperation: config.operations.statusOperation
  });

  return {
    config,
    logger,
    formatter,
    printer: new Printer({formatter, quiet: config.quiet, stdout: overrides.stdout, stderr: overrides.stderr}),
    session,
    dispatcher,
    history,
    historyStore: overrides.historyStore ?? new FileHistoryStore(config.historyFile),
    scenario: buildNreplScenario(config.operations)
  };
}
