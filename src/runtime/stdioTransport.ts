import {spawn, type ChildProcess} from "node:child_process";
import type {Readable, Writable} from "node:stream";

import {TransportError, describeError} from "../errors.js";
import {silentLogger, type Logger} from "../logger.js";
import type {JsonRpcRequest} from "../types/mcp.js";
import {isRecord} from "../types/mcp.js";
import {completeExchange, failedExchange, type Exchange, type Transport} from "./transport.js";

export interface StdioStreams {
  /** The child's stdin. */
  input: Writable;
  /** The child's stdout. */
  output: Readable;
}

export interface StdioTransportOptions {
  command?: string[];
  streams?: StdioStreams;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

// Newline-delimited JSON over the child's stdio
export function serialize(request: JsonRpcRequest): string {
  return JSON.stringify(request) + "\n";
}

// Split a stream buffer into complete lines, returning remainder
export function splitLines(buffer: string): {lines: string[]; remainder: string} {
  const parts = buffer.split("\n");
  const remainder = parts.pop() ?? "";
  return {lines: parts.map((line) => line.trim()).filter((line) => line.length > 0), remainder};
}

type LineWaiter = (line: string | null) => void;

/**
 * Framed stream transport: one JSON object per line in each direction.
 * Reads block until a line arrives or the stream closes; there is no read timeout.
 */
export class StdioTransport implements Transport {
  readonly endpoint: string;
  private readonly input: Writable;
  private readonly child?: ChildProcess;
  /** Settles once the child has spawned or failed to. */
  private readonly started: Promise<void>;
  private readonly logger: Logger;
  private buffer = "";
  private readonly lines: string[] = [];
  private waiter?: LineWaiter;
  private closed = false;
  private failure?: TransportError;

  constructor({command, streams, env = process.env, logger = silentLogger}: StdioTransportOptions) {
    this.logger = logger;

    if (streams) {
      this.endpoint = "stdio";
      this.input = streams.input;
      this.started = Promise.resolve();
      this.attach(streams.input, streams.output);
      return;
    }

    if (!command || command.length === 0) {
      throw new Error("StdioTransport needs either a command or a pair of streams");
    }

    const [executable, ...args] = command;
    this.endpoint = `stdio:${command.join(" ")}`;
    const child = spawn(executable, args, {env, stdio: ["pipe", "pipe", "inherit"]});
    this.child = child;
    child.on("error", (error) => {
      this.fail(new TransportError("spawn", `Failed to start ${executable}: ${error.message}`, {cause: error}));
    });
    this.started = new Promise((resolve) => {
      child.once("spawn", () => resolve());
      child.once("error", () => resolve());
    });
    this.input = child.stdin;
    this.attach(child.stdin, child.stdout);
  }

  async send(request: JsonRpcRequest): Promise<Exchange> {
    await this.started;
    if (this.failure) {
      return failedExchange(request, this.failure);
    }
    if (this.closed) {
      return failedExchange(request, new TransportError("closed", "Server stream is closed"));
    }

    this.logger.debug(`→ ${request.method} #${request.id} ${this.endpoint}`);
    try {
      await this.write(serialize(request));
    } catch (error) {
      return failedExchange(
        request,
        this.failure ?? new TransportError("closed", `Failed to write request: ${describeError(error)}`, {cause: error})
      );
    }

    for (;;) {
      const line = await this.nextLine();
      if (line === null) {
        return failedExchange(
          request,
          this.failure ?? new TransportError("closed", "Server stream closed before a response was read")
        );
      }

      let body: unknown;
      try {
        body = JSON.parse(line);
      } catch (error) {
        return failedExchange(
          request,
          new TransportError("malformed", `Malformed frame: ${line.slice(0, 120)}`, {cause: error})
        );
      }

      // Server-initiated notifications carry a method and no id
      if (isRecord(body) && typeof body.method === "string" && body.id === undefined) {
        this.logger.debug(`skipping notification ${body.method}`);
        continue;
      }

      const exchange = completeExchange(request, body);
      this.logger.debug(`← #${request.id} ${exchange.error ? "error" : "ok"}`);
      return exchange;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.input.end();
    if (this.child && this.child.exitCode === null) {
      this.child.kill("SIGTERM");
    }
    this.release(null);
  }

  private attach(input: Writable, output: Readable): void {
    // EPIPE and friends once the child has gone away
    input.on("error", (error) => {
      this.fail(new TransportError("closed", `Server input closed: ${error.message}`, {cause: error}));
    });

    output.setEncoding("utf-8");
    output.on("data", (chunk: string) => {
      this.buffer += chunk;
      const {lines, remainder} = splitLines(this.buffer);
      this.buffer = remainder;
      for (const line of lines) {
        this.push(line);
      }
    });
    output.on("end", () => this.markClosed());
    output.on("close", () => this.markClosed());
    output.on("error", (error) => {
      this.fail(new TransportError("closed", `Server stream error: ${error.message}`, {cause: error}));
    });
  }

  private write(frame: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.input.write(frame, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  private push(line: string): void {
    if (this.waiter) {
      this.release(line);
    } else {
      this.lines.push(line);
    }
  }

  private nextLine(): Promise<string | null> {
    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  private release(line: string | null): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.(line);
  }

  private markClosed(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.release(null);
  }

  private fail(error: TransportError): void {
    this.failure ??= error;
    this.markClosed();
  }
}
