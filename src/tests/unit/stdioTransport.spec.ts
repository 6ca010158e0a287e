import {PassThrough} from "node:stream";
import {describe, expect, it} from "vitest";

import {TransportError} from "../../errors.js";
import {StdioTransport, splitLines} from "../../runtime/stdioTransport.js";
import type {JsonRpcRequest} from "../../types/mcp.js";

const request = (id: number, method = "tools/list"): JsonRpcRequest => ({jsonrpc: "2.0", id, method, params: {}});

/**
 * Wires a transport to a pair of in-memory pipes. `onRequest` sees each
 * decoded request and writes whatever it likes back.
 */
function pipeServer(onRequest: (request: JsonRpcRequest, reply: (text: string) => void, end: () => void) => void) {
  const toServer = new PassThrough();
  const fromServer = new PassThrough();
  toServer.setEncoding("utf-8");
  toServer.on("data", (chunk: string) => {
    for (const line of chunk.split("\n").filter((part) => part.trim().length > 0)) {
      onRequest(
        JSON.parse(line),
        (text) => fromServer.write(text),
        () => fromServer.end()
      );
    }
  });
  const transport = new StdioTransport({streams: {input: toServer, output: fromServer}});
  return {transport, toServer, fromServer};
}

describe("StdioTransport", () => {
  it("writes one line per request and reads the matching response", async () => {
    const seen: JsonRpcRequest[] = [];
    const {transport} = pipeServer((req, reply) => {
      seen.push(req);
      reply(`${JSON.stringify({jsonrpc: "2.0", id: req.id, result: {tools: []}})}\n`);
    });

    const first = await transport.send(request(1));
    const second = await transport.send(request(2, "tools/call"));

    expect(first.result).toEqual({tools: []});
    expect(second.id).toBe(2);
    expect(second.error).toBeUndefined();
    expect(seen.map((req) => [req.id, req.method])).toEqual([
      [1, "tools/list"],
      [2, "tools/call"]
    ]);
    await transport.close();
  });

  it("reassembles a response split across chunks", async () => {
    const {transport} = pipeServer((req, reply) => {
      const line = `${JSON.stringify({jsonrpc: "2.0", id: req.id, result: {ok: true}})}\n`;
      reply(line.slice(0, 10));
      reply(line.slice(10));
    });

    const exchange = await transport.send(request(1));

    expect(exchange.result).toEqual({ok: true});
    await transport.close();
  });

  it("skips server notifications while waiting for the response", async () => {
    const {transport} = pipeServer((req, reply) => {
      reply(`${JSON.stringify({jsonrpc: "2.0", method: "notifications/message", params: {level: "info"}})}\n`);
      reply(`${JSON.stringify({jsonrpc: "2.0", id: req.id, result: {done: true}})}\n`);
    });

    const exchange = await transport.send(request(1));

    expect(exchange.result).toEqual({done: true});
    await transport.close();
  });

  it("fails with a malformed error for a line that is not JSON", async () => {
    const {transport} = pipeServer((_req, reply) => reply("this is not json\n"));

    const exchange = await transport.send(request(1));

    expect(exchange.error).toBeInstanceOf(TransportError);
    expect(exchange.error).toMatchObject({kind: "malformed", message: "Malformed frame: this is not json"});
    await transport.close();
  });

  it("fails with a closed error when the stream ends before a response", async () => {
    const {transport} = pipeServer((_req, _reply, end) => end());

    const exchange = await transport.send(request(1));

    expect(exchange.error).toMatchObject({
      kind: "closed",
      message: "Server stream closed before a response was read"
    });

    const afterwards = await transport.send(request(2));
    expect(afterwards.error).toMatchObject({kind: "closed", message: "Server stream is closed"});
  });

  it("fails with a closed error when the input pipe breaks", async () => {
    const {transport, toServer} = pipeServer(() => undefined);
    toServer.destroy(Object.assign(new Error("write EPIPE"), {code: "EPIPE"}));
    await new Promise((resolve) => setImmediate(resolve));

    const exchange = await transport.send(request(1));

    expect(exchange.error).toMatchObject({kind: "closed", message: "Server input closed: write EPIPE"});
  });

  it("fails with a closed error when the child exits straight away", async () => {
    const transport = new StdioTransport({command: [process.execPath, "-e", "process.exit(0)"]});

    const exchange = await transport.send(request(1));

    expect(exchange.error).toBeInstanceOf(TransportError);
    expect(exchange.error).toMatchObject({kind: "closed"});
    await transport.close();
  });

  it("reports a missing executable as a spawn failure", async () => {
    const transport = new StdioTransport({command: ["mcp-nrepl-no-such-command"]});

    const exchange = await transport.send(request(1));

    expect(exchange.error).toMatchObject({kind: "spawn"});
    expect(exchange.error?.message).toMatch(/^Failed to start mcp-nrepl-no-such-command: /);
    await transport.close();
  });

  it("ends the child's input on close", async () => {
    const {transport, toServer} = pipeServer(() => undefined);

    await transport.close();

    expect(toServer.writableEnded).toBe(true);
  });
});

describe("splitLines", () => {
  it("returns complete trimmed lines and keeps the partial tail", () => {
    expect(splitLines('{"a":1}\r\n\n{"b":2}\n{"c"')).toEqual({lines: ['{"a":1}', '{"b":2}'], remainder: '{"c"'});
  });
});
