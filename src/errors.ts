import type {JsonRpcErrorObject} from "./types/mcp.js";
import {isRecord} from "./types/mcp.js";

export type TransportErrorKind = "refused" | "timeout" | "malformed" | "closed" | "http" | "spawn" | "network";

/** The exchange never produced a usable response. */
export class TransportError extends Error {
  readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = "TransportError";
    this.kind = kind;
  }
}

/** A well-formed response whose envelope carries `error`. */
export class ProtocolError extends Error {
  readonly code?: number;
  readonly data?: unknown;
  readonly payload: unknown;

  constructor(payload: unknown) {
    const normalized = normalizeErrorPayload(payload);
    super(normalized.message);
    this.name = "ProtocolError";
    this.code = normalized.code;
    this.data = normalized.data;
    this.payload = payload;
  }
}

export class UnknownOperationError extends Error {
  readonly operation: string;
  readonly available: string[];

  constructor(operation: string, available: string[]) {
    const hint = available.length > 0 ? ` Available tools: ${available.join(", ")}` : " The tool catalog is empty.";
    super(`Tool '${operation}' not found.${hint}`);
    this.name = "UnknownOperationError";
    this.operation = operation;
    this.available = available;
  }
}

export class ArgumentParseError extends Error {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Invalid JSON arguments: ${reason}`);
    this.name = "ArgumentParseError";
    this.input = input;
  }
}

/** The envelope succeeded but the evaluated operation reported failure in its text. */
export class BackendReportedFailure extends Error {
  readonly operation: string;
  readonly text: string;

  constructor(operation: string, text: string) {
    super(text);
    this.name = "BackendReportedFailure";
    this.operation = operation;
    this.text = text;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type ExchangeError = TransportError | ProtocolError;

function normalizeErrorPayload(payload: unknown): JsonRpcErrorObject {
  if (typeof payload === "string") {
    return {message: payload};
  }
  if (isRecord(payload)) {
    const message = typeof payload.message === "string" ? payload.message : JSON.stringify(payload);
    const code = typeof payload.code === "number" ? payload.code : undefined;
    return {code, message, data: payload.data};
  }
  return {message: JSON.stringify(payload) ?? String(payload)};
}

export function describeError(error: unknown): string {
  if (error instanceof ProtocolError) {
    return error.code !== undefined ? `${error.message} (code ${error.code})` : error.message;
  }
  if (error instanceof TransportError) {
    return `${error.message} [${error.kind}]`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
