import path from "node:path";

import {ConfigError} from "./errors.js";
import {isListingFormat, type ListingFormat} from "./output/listing.js";
import type {ParsedArgs} from "./parseArgs.js";
import {DEFAULT_HISTORY_LIMIT} from "./repl/history.js";
import {DEFAULT_TIMEOUT_MS} from "./runtime/httpTransport.js";

export const CLIENT_NAME = "mcp-nrepl-client";
export const CLIENT_VERSION = "1.0.0";

export const DEFAULT_HISTORY_FILE = ".mcp_history";
export const DEFAULT_SERVER_PORT = 3000;

/** Endpoint of the server a supervisor on `port` manages. */
export const localServerUrl = (port: number) => `http://localhost:${port}/mcp`;
export const DEFAULT_SERVER_COMMAND = "bb src/mcp_nrepl_proxy/core.clj";

export interface OperationNames {
  evaluateOperation: string;
  statusOperation: string;
  healthOperation: string;
  testOperation: string;
}

export interface SupervisorConfig {
  port: number;
  command: string[];
  cwd: string;
  pidFile: string;
  logFile: string;
}

export interface ClientConfig {
  url: string;
  stdioCommand?: string[];
  requestTimeoutMs: number;
  historyFile: string;
  historyLimit: number;
  operations: OperationNames;
  clientInfo: {name: string; version: string};
  listingFormat: ListingFormat;
  pretty: boolean;
  quiet: boolean;
  debug: boolean;
  supervisor: SupervisorConfig;
}

type Env = Record<string, string | undefined>;

/** CLI flags win over environment variables, which win over defaults. */
export function resolveConfig(args: ParsedArgs, env: Env = process.env, cwd = process.cwd()): ClientConfig {
  const format = args.format ?? "text";
  if (!isListingFormat(format)) {
    throw new ConfigError(`Invalid --format "${format}": expected text, json or table`);
  }

  const stdio = args.stdio ?? nonEmpty(env.MCP_STDIO_COMMAND);
  const serverDir = nonEmpty(env.MCP_SERVER_DIR) ?? cwd;
  const port = readInteger(env, "MCP_HTTP_PORT", DEFAULT_SERVER_PORT);

  return {
    url: args.url ?? nonEmpty(env.MCP_SERVER_URL) ?? localServerUrl(port),
    stdioCommand: stdio ? splitCommand(stdio) : undefined,
    requestTimeoutMs: readInteger(env, "MCP_REQUEST_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    historyFile: path.resolve(cwd, args.historyFile ?? nonEmpty(env.MCP_HISTORY_FILE) ?? DEFAULT_HISTORY_FILE),
    historyLimit: readInteger(env, "MCP_HISTORY_LIMIT", DEFAULT_HISTORY_LIMIT),
    operations: {
      evaluateOperation: nonEmpty(env.MCP_EVAL_TOOL) ?? "nrepl-eval",
      statusOperation: nonEmpty(env.MCP_STATUS_TOOL) ?? "nrepl-status",
      healthOperation: nonEmpty(env.MCP_HEALTH_TOOL) ?? "nrepl-health-check",
      testOperation: nonEmpty(env.MCP_TEST_TOOL) ?? "nrepl-test"
    },
    clientInfo: {name: CLIENT_NAME, version: CLIENT_VERSION},
    listingFormat: format,
    pretty: args.pretty ?? false,
    quiet: args.quiet ?? false,
    debug: isTruthy(env.MCP_DEBUG),
    supervisor: {
      port,
      command: splitCommand(nonEmpty(env.MCP_SERVER_COMMAND) ?? DEFAULT_SERVER_COMMAND),
      cwd: serverDir,
      pidFile: path.resolve(serverDir, `server_${port}.pid`),
      logFile: path.resolve(serverDir, `server_${port}.log`)
    }
  };
}

export function splitCommand(command: string): string[] {
  return command.split(/\s+/).filter((part) => part.length > 0);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

function readInteger(env: Env, key: string, fallback: number): number {
  const raw = nonEmpty(env[key]);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}
