import {BackendReportedFailure, TransportError, UnknownOperationError} from "../errors.js";
import type {History} from "../repl/history.js";
import type {Session} from "../runtime/session.js";
import type {Exchange} from "../runtime/transport.js";
import {METHODS, contentTexts, type ToolArguments} from "../types/mcp.js";

/** Leading marker the backend puts on text payloads of failed evaluations. */
export const FAILURE_MARKER = "❌";

export interface Invocation {
  operation: string;
  exchange: Exchange;
  /** Display text of a successful result. */
  rendered?: string;
  backendFailure?: BackendReportedFailure;
}

export interface DispatcherOptions {
  evaluateOperation: string;
  statusOperation: string;
}

export interface EvaluateOptions {
  ns?: string;
  formatted?: boolean;
}

/**
 * Maps a named operation and its arguments onto one tools/call exchange.
 * The catalog gates which names may be sent; arguments are passed through as given.
 */
export class CommandDispatcher {
  constructor(
    private readonly session: Session,
    private readonly history: History,
    private readonly options: DispatcherOptions
  ) {}

  get evaluateOperation(): string {
    return this.options.evaluateOperation;
  }

  get statusOperation(): string {
    return this.options.statusOperation;
  }

  async invoke(name: string, args: ToolArguments = {}, formatted = false): Promise<Invocation> {
    const catalog = this.session.catalog;
    if (!catalog.find(name)) {
      throw new UnknownOperationError(name, catalog.names());
    }

    const exchange = await this.session.exchange(METHODS.callTool, {name, arguments: args});
    if (exchange.error || !exchange.result) {
      return {operation: name, exchange};
    }

    return {
      operation: name,
      exchange,
      rendered: renderResult(exchange.result, formatted),
      backendFailure: detectBackendFailure(name, exchange.result)
    };
  }

  async evaluate(code: string, {ns, formatted = false}: EvaluateOptions = {}): Promise<Invocation> {
    const args: ToolArguments = {code};
    if (ns) {
      args.ns = ns;
    }
    const invocation = await this.invoke(this.options.evaluateOperation, args, formatted);
    // Anything the backend answered is recorded, failures included
    if (!(invocation.exchange.error instanceof TransportError)) {
      this.history.append(code);
    }
    return invocation;
  }

  status(formatted = false): Promise<Invocation> {
    return this.invoke(this.options.statusOperation, {}, formatted);
  }
}

/**
 * Text items are shown one per line. With `formatted`, items that parse as
 * JSON are re-indented; anything else is shown as it came. Results without a
 * content list are shown as JSON.
 */
export function renderResult(result: Record<string, unknown>, formatted: boolean): string {
  const texts = contentTexts(result);
  if (texts === undefined) {
    return JSON.stringify(result, null, 2);
  }
  if (!formatted) {
    return texts.join("\n");
  }
  return texts.map(prettyJsonOrText).join("\n");
}

function prettyJsonOrText(text: string): string {
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    return text;
  }
}

export function detectBackendFailure(
  operation: string,
  result: Record<string, unknown> | undefined
): BackendReportedFailure | undefined {
  const first = contentTexts(result)?.[0];
  if (first !== undefined && first.startsWith(FAILURE_MARKER)) {
    return new BackendReportedFailure(operation, first);
  }
  return undefined;
}
