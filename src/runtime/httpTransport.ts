import {TransportError, describeError} from "../errors.js";
import {silentLogger, type Logger} from "../logger.js";
import type {JsonRpcRequest} from "../types/mcp.js";
import {isRecord} from "../types/mcp.js";
import {completeExchange, failedExchange, type Exchange, type Transport} from "./transport.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpTransportOptions {
  url: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * One POST per exchange. The request is aborted after `timeoutMs` and the
 * exchange fails with a timeout.
 */
export class HttpTransport implements Transport {
  readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor({url, timeoutMs = DEFAULT_TIMEOUT_MS, fetchImpl = fetch, logger = silentLogger}: HttpTransportOptions) {
    this.endpoint = url;
    this.timeoutMs = timeoutMs;
    this.fetchImpl = fetchImpl;
    this.logger = logger;
  }

  async send(request: JsonRpcRequest): Promise<Exchange> {
    this.logger.debug(`→ ${request.method} #${request.id} ${this.endpoint}`);

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {"Content-Type": "application/json", Accept: "application/json"},
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      const transportError = classifyFetchError(error, this.endpoint, this.timeoutMs);
      this.logger.debug(`← #${request.id} ${transportError.kind}: ${transportError.message}`);
      return failedExchange(request, transportError);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      return failedExchange(
        request,
        new TransportError("http", `HTTP ${response.status} ${response.statusText}${detail ? `: ${detail.slice(0, 200)}` : ""}`)
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return failedExchange(
        request,
        new TransportError("malformed", `Response body is not valid JSON: ${describeError(error)}`, {cause: error})
      );
    }

    const exchange = completeExchange(request, body);
    this.logger.debug(`← #${request.id} ${exchange.error ? "error" : "ok"}`);
    return exchange;
  }

  async close(): Promise<void> {
    // Nothing held open between exchanges.
  }
}

function classifyFetchError(error: unknown, url: string, timeoutMs: number): TransportError {
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return new TransportError("timeout", `Request to ${url} timed out after ${timeoutMs}ms`, {cause: error});
  }
  const code = errorCode(error);
  if (code === "ECONNREFUSED") {
    return new TransportError("refused", `Connection refused: ${url}`, {cause: error});
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError("network", `Request to ${url} failed: ${code ? `${message} (${code})` : message}`, {
    cause: error
  });
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }
  const candidates: unknown[] = [error, error.cause];
  for (const candidate of candidates) {
    if (isRecord(candidate) && typeof candidate.code === "string") {
      return candidate.code;
    }
  }
  return undefined;
}
