import {describe, expect, it, vi} from "vitest";

import {ProtocolError, TransportError} from "../../errors.js";
import {HttpTransport, type FetchLike} from "../../runtime/httpTransport.js";
import type {JsonRpcRequest} from "../../types/mcp.js";

const URL = "http://localhost:3000/mcp";

const request = (id: number, method = "tools/list"): JsonRpcRequest => ({jsonrpc: "2.0", id, method, params: {}});

const jsonResponse = (body: unknown, init: ResponseInit = {status: 200}) =>
  new Response(JSON.stringify(body), {...init, headers: {"Content-Type": "application/json"}});

describe("HttpTransport", () => {
  it("posts the request and returns the correlated result", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({jsonrpc: "2.0", id: 1, result: {tools: []}}));
    const transport = new HttpTransport({url: URL, fetchImpl});

    const exchange = await transport.send(request(1));

    expect(exchange.error).toBeUndefined();
    expect(exchange.result).toEqual({tools: []});
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe(URL);
    expect(init.method).toBe("POST");
    expect(typeof init.body === "string" ? JSON.parse(init.body) : undefined).toEqual(request(1));
  });

  it("reports a timeout when the request is aborted by its deadline", async () => {
    const fetchImpl: FetchLike = async () => {
      throw Object.assign(new Error("The operation was aborted due to timeout"), {name: "TimeoutError"});
    };
    const transport = new HttpTransport({url: URL, timeoutMs: 50, fetchImpl});

    const exchange = await transport.send(request(1));

    expect(exchange.error).toBeInstanceOf(TransportError);
    expect(exchange.error).toMatchObject({kind: "timeout", message: `Request to ${URL} timed out after 50ms`});
  });

  it("reports a refused connection from the error cause", async () => {
    const fetchImpl: FetchLike = async () => {
      throw new TypeError("fetch failed", {
        cause: Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:3000"), {code: "ECONNREFUSED"})
      });
    };
    const transport = new HttpTransport({url: URL, fetchImpl});

    const exchange = await transport.send(request(1));

    expect(exchange.error).toMatchObject({kind: "refused", message: `Connection refused: ${URL}`});
  });

  it("treats a non-2xx status as a transport failure", async () => {
    const fetchImpl: FetchLike = async () => new Response("boom", {status: 500, statusText: "Internal Server Error"});
    const transport = new HttpTransport({url: URL, fetchImpl});

    const exchange = await transport.send(request(1));

    expect(exchange.error).toMatchObject({kind: "http", message: "HTTP 500 Internal Server Error: boom"});
  });

  it("rejects a response whose id does not match the request", async () => {
    const fetchImpl: FetchLike = async () => jsonResponse({jsonrpc: "2.0", id: 99, result: {}});
    const transport = new HttpTransport({url: URL, fetchImpl});

    const exchange = await transport.send(request(1));

    expect(exchange.result).toBeUndefined();
    expect(exchange.error).toMatchObject({kind: "malformed", message: "Response id 99 does not match request id 1"});
  });

  it("rejects a body that is not JSON", async () => {
    const fetchImpl: FetchLike = async () => new Response("<html>", {status: 200});
    const transport = new HttpTransport({url: URL, fetchImpl});

    const exchange = await transport.send(request(1));

    expect(exchange.error).toBeInstanceOf(TransportError);
    expect(exchange.error).toMatchObject({kind: "malformed"});
  });

  it("rejects a response carrying neither result nor error", async () => {
    const fetchImpl: FetchLike = async () => jsonResponse({jsonrpc: "2.0", id: 1});
    const transport = new HttpTransport({url: URL, fetchImpl});

    const exchange = await transport.send(request(1));

    expect(exchange.result).toBeUndefined();
    expect(exchange.error).toMatchObject({kind: "malformed", message: "Response carries neither result nor error"});
  });

  it("surfaces an error envelope as a protocol error", async () => {
    const fetchImpl: FetchLike = async () =>
      jsonResponse({jsonrpc: "2.0", id: 3, error: {code: -32601, message: "Method not found"}});
    const transport = new HttpTransport({url: URL, fetchImpl});

    const exchange = await transport.send(request(3, "bogus"));

    expect(exchange.error).toBeInstanceOf(ProtocolError);
    expect(exchange.error).toMatchObject({code: -32601, message: "Method not found"});
    expect(exchange.method).toBe("bogus");
  });

  it("wraps a scalar result so every result is an object", async () => {
    const fetchImpl: FetchLike = async () => jsonResponse({jsonrpc: "2.0", id: 1, result: 42});
    const transport = new HttpTransport({url: URL, fetchImpl});

    const exchange = await transport.send(request(1));

    expect(exchange.result).toEqual({value: 42});
  });
});
