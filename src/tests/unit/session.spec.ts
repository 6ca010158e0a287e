import {describe, expect, it} from "vitest";

import {ProtocolError, TransportError} from "../../errors.js";
import {Session} from "../../runtime/session.js";
import {FakeTransport, NREPL_TOOLS, fakeServer, type Reply} from "../helpers/fakeServer.js";

const clientInfo = {name: "mcp-nrepl-client", version: "1.0.0"};

describe("Session", () => {
  it("sends the handshake and then lists tools", async () => {
    const transport = new FakeTransport(fakeServer());
    const session = new Session(transport, {clientInfo});

    const result = await session.connect();

    expect(result).toEqual({connected: true, serverInfo: {name: "fake-nrepl", version: "0.1.0"}});
    expect(session.initialized).toBe(true);
    expect(transport.requests.map((request) => request.method)).toEqual(["initialize", "tools/list"]);
    expect(transport.requests[0].params).toEqual({
      protocolVersion: "2024-11-05",
      capabilities: {tools: {list: true, call: true}},
      clientInfo: {name: "mcp-nrepl-client", version: "1.0.0"}
    });
    expect(session.catalog.names()).toEqual(NREPL_TOOLS.map((tool) => tool.name));
  });

  it("numbers requests from 1 without gaps, failures included", async () => {
    let calls = 0;
    const transport = new FakeTransport((request) => {
      calls += 1;
      if (calls === 3) {
        return {transportError: new TransportError("timeout", "slow")};
      }
      return fakeServer()(request);
    });
    const session = new Session(transport, {clientInfo});

    await session.connect();
    await session.exchange("tools/call", {name: "nrepl-status", arguments: {}});
    await session.exchange("tools/call", {name: "nrepl-status", arguments: {}});

    expect(transport.requests.map((request) => request.id)).toEqual([1, 2, 3, 4]);
  });

  it("stays uninitialized with an empty catalog when the handshake fails", async () => {
    const transport = new FakeTransport(() => ({transportError: new TransportError("timeout", "Request timed out")}));
    const session = new Session(transport, {clientInfo});

    const result = await session.connect();

    expect(result.connected).toBe(false);
    expect(result.error).toMatchObject({kind: "timeout"});
    expect(session.initialized).toBe(false);
    expect(session.catalog.size).toBe(0);
    expect(transport.requests).toHaveLength(1);
  });

  it("reports a catalog failure after a successful handshake", async () => {
    const transport = new FakeTransport(fakeServer({listTools: () => ({error: {code: -32603, message: "no tools"}})}));
    const session = new Session(transport, {clientInfo});

    const result = await session.connect();

    expect(result.connected).toBe(true);
    expect(result.catalogError).toBeInstanceOf(ProtocolError);
    expect(session.catalog.size).toBe(0);
  });

  it("gives the same catalog on repeated refreshes", async () => {
    const session = new Session(new FakeTransport(fakeServer()), {clientInfo});
    await session.connect();

    const first = await session.refreshCatalog();
    const second = await session.refreshCatalog();

    expect(second.names()).toEqual(first.names());
    expect(second.describe("nrepl-eval")).toBe(first.describe("nrepl-eval"));
  });

  it("keeps the previous catalog when a refresh fails", async () => {
    let listReply: Reply = {result: {tools: NREPL_TOOLS}};
    const session = new Session(new FakeTransport(fakeServer({listTools: () => listReply})), {clientInfo});
    await session.connect();
    const before = session.catalog;

    listReply = {transportError: new TransportError("closed", "gone")};

    await expect(session.refreshCatalog()).rejects.toBeInstanceOf(TransportError);
    expect(session.catalog).toBe(before);
    expect(session.catalog.size).toBe(4);
  });

  it("closes its transport", async () => {
    const transport = new FakeTransport(fakeServer());
    const session = new Session(transport, {clientInfo});

    await session.close();

    expect(transport.closed).toBe(true);
  });
});
