import {ProtocolError, TransportError, type ExchangeError} from "../errors.js";
import {silentLogger, type Logger} from "../logger.js";
import {METHODS, PROTOCOL_VERSION, isRecord, type InitializeParams, type ServerInfo} from "../types/mcp.js";
import {OperationCatalog} from "./catalog.js";
import type {Exchange, Transport} from "./transport.js";

export interface ClientIdentity {
  name: string;
  version: string;
}

export interface SessionOptions {
  clientInfo: ClientIdentity;
  logger?: Logger;
}

export interface ConnectResult {
  connected: boolean;
  error?: ExchangeError;
  serverInfo?: ServerInfo;
  /** Set when the handshake succeeded but the follow-up catalog refresh did not. */
  catalogError?: ExchangeError;
}

/**
 * Handshake state, the request-id sequence and the cached catalog for one
 * client. One exchange at a time; callers await each call before the next.
 */
export class Session {
  private readonly transport: Transport;
  private readonly clientInfo: ClientIdentity;
  private readonly logger: Logger;
  private requestCounter = 1;
  private initializedFlag = false;
  private currentCatalog = OperationCatalog.empty();
  private server?: ServerInfo;

  constructor(transport: Transport, {clientInfo, logger = silentLogger}: SessionOptions) {
    this.transport = transport;
    this.clientInfo = clientInfo;
    this.logger = logger;
  }

  get endpoint(): string {
    return this.transport.endpoint;
  }

  get initialized(): boolean {
    return this.initializedFlag;
  }

  get catalog(): OperationCatalog {
    return this.currentCatalog;
  }

  get serverInfo(): ServerInfo | undefined {
    return this.server;
  }

  nextRequestId(): number {
    const id = this.requestCounter;
    this.requestCounter += 1;
    return id;
  }

  handshakeParams(): InitializeParams {
    return {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: {tools: {list: true, call: true}},
      clientInfo: {...this.clientInfo}
    };
  }

  exchange(method: string, params: Record<string, unknown> = {}): Promise<Exchange> {
    return this.transport.send({jsonrpc: "2.0", id: this.nextRequestId(), method, params});
  }

  async connect(): Promise<ConnectResult> {
    const handshake = await this.exchange(METHODS.initialize, {...this.handshakeParams()});
    if (handshake.error) {
      this.logger.debug(`initialize failed: ${handshake.error.message}`);
      return {connected: false, error: handshake.error};
    }

    this.initializedFlag = true;
    const serverInfo = handshake.result?.serverInfo;
    this.server = isRecord(serverInfo) ? readServerInfo(serverInfo) : undefined;

    try {
      await this.refreshCatalog();
    } catch (error) {
      return {connected: true, serverInfo: this.server, catalogError: asExchangeError(error)};
    }
    return {connected: true, serverInfo: this.server};
  }

  /**
   * Replace the catalog with a fresh tools/list reply. On failure the previous
   * catalog stays in place and the exchange error is thrown.
   */
  async refreshCatalog(): Promise<OperationCatalog> {
    const reply = await this.exchange(METHODS.listTools);
    if (reply.error) {
      throw reply.error;
    }
    this.currentCatalog = OperationCatalog.fromListResult(reply.result ?? {});
    this.logger.debug(`catalog refreshed: ${this.currentCatalog.size} tools`);
    return this.currentCatalog;
  }

  async close(): Promise<void> {
    await this.transport.close();
  }
}

function readServerInfo(value: Record<string, unknown>): ServerInfo {
  return {
    name: typeof value.name === "string" ? value.name : undefined,
    version: typeof value.version === "string" ? value.version : undefined
  };
}

function asExchangeError(error: unknown): ExchangeError {
  if (error instanceof TransportError || error instanceof ProtocolError) {
    return error;
  }
  throw error;
}
