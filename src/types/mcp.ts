/**
 * MCP Protocol Type Definitions
 *
 * These types define the JSON-RPC 2.0 envelope used by the Model Context Protocol (MCP)
 * and the shapes of the three methods the client speaks: initialize, tools/list and tools/call.
 */

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: number;
  method: string;
  params: Record<string, unknown>;
}

export interface JsonRpcErrorObject {
  code?: number;
  message: string;
  data?: unknown;
}

export type ToolArguments = Record<string, unknown>;

export interface ToolInputSchema {
  type?: string;
  properties?: Record<string, unknown>;
  required?: string[];
}

export interface ToolDescriptor {
  name: string;
  description?: string;
  inputSchema?: ToolInputSchema;
}

export interface InitializeParams {
  protocolVersion: string;
  capabilities: Record<string, unknown>;
  clientInfo: {name: string; version: string};
}

export interface ServerInfo {
  name?: string;
  version?: string;
}

export const PROTOCOL_VERSION = "2024-11-05";

export const METHODS = {
  initialize: "initialize",
  listTools: "tools/list",
  callTool: "tools/call"
} as const;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Text items of a tools/call result, in order. Results that are not shaped
 * as `{content: [...]}` have no text items.
 */
export function contentTexts(result: Record<string, unknown> | undefined): string[] | undefined {
  if (!result || !Array.isArray(result.content)) {
    return undefined;
  }
  const texts: string[] = [];
  for (const item of result.content) {
    if (isRecord(item) && item.type === "text" && typeof item.text === "string") {
      texts.push(item.text);
    }
  }
  return texts;
}
