import type {ToolDescriptor, ToolInputSchema} from "../types/mcp.js";
import {isRecord} from "../types/mcp.js";

export interface Operation {
  name: string;
  description: string;
  requiredParams: ReadonlySet<string>;
  optionalParams: ReadonlySet<string>;
  /** The descriptor as the server reported it, for JSON listings. */
  descriptor: ToolDescriptor;
}

export const REQUIRED_MARKER = "*";

/**
 * Snapshot of the server's tools/list reply. Never mutated; a refresh builds a
 * new catalog and swaps it in.
 */
export class OperationCatalog {
  private readonly operations: readonly Operation[];
  private readonly byName: ReadonlyMap<string, Operation>;

  private constructor(operations: Operation[]) {
    this.operations = Object.freeze([...operations]);
    this.byName = new Map(operations.map((operation) => [operation.name, operation]));
  }

  static empty(): OperationCatalog {
    return new OperationCatalog([]);
  }

  static fromOperations(operations: Operation[]): OperationCatalog {
    return new OperationCatalog(operations);
  }

  /** Parse a tools/list result. Entries without a string name are dropped; later duplicates lose. */
  static fromListResult(result: Record<string, unknown>): OperationCatalog {
    const tools = Array.isArray(result.tools) ? result.tools : [];
    const operations: Operation[] = [];
    const seen = new Set<string>();
    for (const entry of tools) {
      const operation = parseDescriptor(entry);
      if (operation && !seen.has(operation.name)) {
        seen.add(operation.name);
        operations.push(operation);
      }
    }
    return new OperationCatalog(operations);
  }

  get size(): number {
    return this.operations.length;
  }

  list(): readonly Operation[] {
    return this.operations;
  }

  find(name: string): Operation | undefined {
    return this.byName.get(name);
  }

  names(): string[] {
    return this.operations.map((operation) => operation.name);
  }

  /** Parameter names in schema order, required ones suffixed with `*`. */
  parameterLabels(name: string): string[] {
    const operation = this.find(name);
    if (!operation) {
      return [];
    }
    const schemaOrder = Object.keys(operation.descriptor.inputSchema?.properties ?? {});
    const names = [...new Set([...schemaOrder, ...operation.requiredParams])];
    return names.map((param) => (operation.requiredParams.has(param) ? `${param}${REQUIRED_MARKER}` : param));
  }

  describe(name: string): string | undefined {
    const operation = this.find(name);
    if (!operation) {
      return undefined;
    }
    const params = this.parameterLabels(name);
    return [
      operation.name,
      `  ${operation.description || "No description"}`,
      `  Parameters: ${params.length > 0 ? params.join(", ") : "None"}`
    ].join("\n");
  }
}

function parseDescriptor(entry: unknown): Operation | undefined {
  if (!isRecord(entry) || typeof entry.name !== "string" || entry.name.length === 0) {
    return undefined;
  }
  const description = typeof entry.description === "string" ? entry.description : "";
  const inputSchema = parseSchema(entry.inputSchema);
  const properties = Object.keys(inputSchema?.properties ?? {});
  const required = new Set(inputSchema?.required ?? []);
  const optional = new Set(properties.filter((param) => !required.has(param)));

  return {
    name: entry.name,
    description,
    requiredParams: required,
    optionalParams: optional,
    descriptor: {name: entry.name, description, inputSchema}
  };
}

function parseSchema(value: unknown): ToolInputSchema | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const schema: ToolInputSchema = {};
  if (typeof value.type === "string") {
    schema.type = value.type;
  }
  if (isRecord(value.properties)) {
    schema.properties = value.properties;
  }
  if (Array.isArray(value.required)) {
    schema.required = value.required.filter((item): item is string => typeof item === "string");
  }
  return schema;
}
