import {spawn} from "node:child_process";
import {mkdir, open, readFile, rm, writeFile} from "node:fs/promises";
import path from "node:path";
import {setTimeout as delay} from "node:timers/promises";

import type {CommandDispatcher} from "../commands/dispatcher.js";
import {localServerUrl, type SupervisorConfig} from "../config.js";
import {describeError} from "../errors.js";
import {silentLogger, type Logger} from "../logger.js";
import type {FetchLike} from "../runtime/httpTransport.js";
import {stepSucceeded} from "../scenario/runner.js";
import {isRecord} from "../types/mcp.js";

export const HEALTH_TIMEOUT_MS = 2_000;

/** Starts a detached child writing to `logFd`; resolves to its pid. */
export type Launcher = (command: string[], options: {cwd: string; env: NodeJS.ProcessEnv; logFd: number}) => number;

export interface SupervisorDeps {
  fetchImpl?: FetchLike;
  launch?: Launcher;
  /** Signal a pid; signal 0 only checks the process exists. Throws like `process.kill`. */
  kill?: (pid: number, signal: NodeJS.Signals | 0) => void;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  pollIntervalMs?: number;
  startAttempts?: number;
  stopGraceMs?: number;
}

export interface SupervisorStatus {
  port: number;
  pid?: number;
  responding: boolean;
  backendConnected?: boolean;
}

export type StartOutcome =
  | {kind: "already-running"}
  | {kind: "started"; pid: number}
  | {kind: "failed"; pid?: number; reason: string};

export type StopOutcome =
  | {kind: "not-running"}
  | {kind: "stopped"; pid: number; forced: boolean}
  | {kind: "gone"; pid: number};

const defaultLauncher: Launcher = (command, {cwd, env, logFd}) => {
  const [executable, ...args] = command;
  if (!executable) {
    throw new Error("No server command configured");
  }
  const child = spawn(executable, args, {cwd, env, detached: true, stdio: ["ignore", logFd, logFd]});
  child.unref();
  if (child.pid === undefined) {
    throw new Error(`Could not start ${executable}`);
  }
  return child.pid;
};

/**
 * Lifecycle of a locally hosted MCP server: one per port, tracked through a
 * pid file and probed over its /health endpoint.
 */
export class ProcessSupervisor {
  private readonly fetchImpl: FetchLike;
  private readonly launch: Launcher;
  private readonly kill: (pid: number, signal: NodeJS.Signals | 0) => void;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly startAttempts: number;
  private readonly stopGraceMs: number;

  constructor(
    readonly config: SupervisorConfig,
    deps: SupervisorDeps = {}
  ) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.launch = deps.launch ?? defaultLauncher;
    this.kill = deps.kill ?? ((pid, signal) => process.kill(pid, signal));
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.logger = deps.logger ?? silentLogger;
    this.pollIntervalMs = deps.pollIntervalMs ?? 1_000;
    this.startAttempts = deps.startAttempts ?? 10;
    this.stopGraceMs = deps.stopGraceMs ?? 2_000;
  }

  get healthUrl(): string {
    return `http://localhost:${this.config.port}/health`;
  }

  get mcpUrl(): string {
    return localServerUrl(this.config.port);
  }

  async isRunning(): Promise<boolean> {
    return (await this.probe()).responding;
  }

  async start(): Promise<StartOutcome> {
    if (await this.isRunning()) {
      return {kind: "already-running"};
    }

    await mkdir(path.dirname(this.config.logFile), {recursive: true});
    const log = await open(this.config.logFile, "w");
    let pid: number;
    try {
      pid = this.launch(this.config.command, {
        cwd: this.config.cwd,
        env: {...process.env, MCP_HTTP_PORT: String(this.config.port)},
        logFd: log.fd
      });
    } catch (error) {
      return {kind: "failed", reason: describeError(error)};
    } finally {
      await log.close();
    }
    await writeFile(this.config.pidFile, `${pid}\n`, "utf8");
    this.logger.debug(`launched ${this.config.command.join(" ")} as pid ${pid}`);

    for (let attempt = 0; attempt < this.startAttempts; attempt += 1) {
      await this.sleep(this.pollIntervalMs);
      if (await this.isRunning()) {
        return {kind: "started", pid};
      }
    }
    const seconds = Math.round((this.startAttempts * this.pollIntervalMs) / 1000);
    return {kind: "failed", pid, reason: `Server failed to start within ${seconds} seconds`};
  }

  async stop(): Promise<StopOutcome> {
    const pid = await this.readPid();
    if (pid === undefined) {
      return {kind: "not-running"};
    }

    try {
      if (!this.isAlive(pid)) {
        return {kind: "gone", pid};
      }
      this.kill(pid, "SIGTERM");
      await this.sleep(this.stopGraceMs);
      if (this.isAlive(pid)) {
        this.kill(pid, "SIGKILL");
        return {kind: "stopped", pid, forced: true};
      }
      return {kind: "stopped", pid, forced: false};
    } finally {
      await rm(this.config.pidFile, {force: true});
    }
  }

  async restart(): Promise<StartOutcome> {
    await this.stop();
    return this.start();
  }

  async status(): Promise<SupervisorStatus> {
    const pid = await this.readPid();
    const {responding, body} = await this.probe();
    const status: SupervisorStatus = {port: this.config.port, pid, responding};
    if (responding && isRecord(body)) {
      status.backendConnected = body["nrepl-connected"] === true;
    }
    return status;
  }

  /** Runs the backend's own health-check operation through the client core. */
  async healthCheck(dispatcher: CommandDispatcher, operation: string): Promise<boolean> {
    try {
      const {exchange} = await dispatcher.invoke(operation);
      return stepSucceeded(exchange);
    } catch (error) {
      this.logger.debug(`health check failed: ${describeError(error)}`);
      return false;
    }
  }

  async readPid(): Promise<number | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.config.pidFile, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }
    const pid = Number.parseInt(raw.trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : undefined;
  }

  private isAlive(pid: number): boolean {
    try {
      this.kill(pid, 0);
      return true;
    } catch (error) {
      // EPERM means the process exists under another user
      if (errorCode(error) === "ESRCH") {
        return false;
      }
      if (errorCode(error) === "EPERM") {
        return true;
      }
      throw error;
    }
  }

  private async probe(): Promise<{responding: boolean; body?: unknown}> {
    try {
      const response = await this.fetchImpl(this.healthUrl, {
        method: "GET",
        signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS)
      });
      if (response.status !== 200) {
        return {responding: false};
      }
      const text = await response.text();
      try {
        return {responding: true, body: JSON.parse(text)};
      } catch {
        return {responding: true};
      }
    } catch (error) {
      this.logger.debug(`health probe ${this.healthUrl}: ${describeError(error)}`);
      return {responding: false};
    }
  }
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && "code" in error ? error.code : undefined;
}

function isMissingFile(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}
