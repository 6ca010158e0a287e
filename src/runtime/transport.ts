import {ProtocolError, TransportError, type ExchangeError} from "../errors.js";
import type {JsonRpcRequest} from "../types/mcp.js";
import {isRecord} from "../types/mcp.js";

/** One correlated request/response pair. Exactly one of `result`/`error` is set. */
export interface Exchange {
  id: number;
  method: string;
  params: Record<string, unknown>;
  result?: Record<string, unknown>;
  error?: ExchangeError;
}

/**
 * Sends one request and resolves with its completed exchange. Failures resolve
 * with `error` set; `send` does not reject.
 */
export interface Transport {
  readonly endpoint: string;
  send(request: JsonRpcRequest): Promise<Exchange>;
  close(): Promise<void>;
}

export function failedExchange(request: JsonRpcRequest, error: ExchangeError): Exchange {
  return {id: request.id, method: request.method, params: request.params, error};
}

/**
 * Turn a decoded response body into the completed exchange for `request`.
 * Shared by both transports so correlation and envelope checks stay identical.
 */
export function completeExchange(request: JsonRpcRequest, body: unknown): Exchange {
  if (!isRecord(body)) {
    return failedExchange(request, new TransportError("malformed", "Response is not a JSON object"));
  }
  if (body.id !== undefined && body.id !== null && body.id !== request.id) {
    return failedExchange(
      request,
      new TransportError("malformed", `Response id ${String(body.id)} does not match request id ${request.id}`)
    );
  }
  if (body.error !== undefined && body.error !== null) {
    return failedExchange(request, new ProtocolError(body.error));
  }
  if (body.result === undefined) {
    return failedExchange(request, new TransportError("malformed", "Response carries neither result nor error"));
  }
  const result = body.result ?? {};
  if (!isRecord(result)) {
    return {id: request.id, method: request.method, params: request.params, result: {value: result}};
  }
  return {id: request.id, method: request.method, params: request.params, result};
}
