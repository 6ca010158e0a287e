import type {OperationCatalog} from "../runtime/catalog.js";
import type {OutputFormatter} from "./formatter.js";

export type ListingFormat = "text" | "json" | "table";

export const LISTING_FORMATS: readonly ListingFormat[] = ["text", "json", "table"];

const FORMAT_NAMES: ReadonlySet<string> = new Set(LISTING_FORMATS);

export function isListingFormat(value: string): value is ListingFormat {
  return FORMAT_NAMES.has(value);
}

export function renderListing(catalog: OperationCatalog, format: ListingFormat, formatter: OutputFormatter): string[] {
  switch (format) {
    case "json":
      return [JSON.stringify(catalog.list().map((operation) => operation.descriptor), null, 2)];
    case "table":
      return renderTable(catalog, formatter);
    case "text":
    default:
      return renderText(catalog, formatter);
  }
}

function renderText(catalog: OperationCatalog, formatter: OutputFormatter): string[] {
  const lines = [formatter.heading(`📋 Available Tools (${catalog.size}):`)];
  catalog.list().forEach((operation, index) => {
    lines.push(formatter.accent(`  ${index + 1}. ${operation.name}`));
    lines.push(`     ${operation.description || "No description"}`);
    const params = catalog.parameterLabels(operation.name);
    if (params.length > 0) {
      lines.push(formatter.muted(`     Parameters: ${params.join(", ")}`));
    }
    lines.push("");
  });
  return lines;
}

/**
 * Aligned columns: name, description, parameters (required ones marked `*`).
 * Descriptions are cut to keep rows on one line.
 */
function renderTable(catalog: OperationCatalog, formatter: OutputFormatter): string[] {
  const headers = ["Tool Name", "Description", "Parameters"];
  const rows = catalog.list().map((operation) => {
    const params = catalog.parameterLabels(operation.name);
    return [operation.name, truncate(operation.description || "No description", 60), params.length > 0 ? params.join(", ") : "None"];
  });

  // Calculate column widths
  const columnWidths = headers.map((header, i) => {
    const maxDataWidth = Math.max(0, ...rows.map((row) => (row[i] ?? "").length));
    return Math.max(header.length, maxDataWidth);
  });

  const formatRow = (cells: string[]): string =>
    "  " + cells.map((cell, i) => cell.padEnd(columnWidths[i] ?? 0, " ")).join("  │  ");

  const lines: string[] = [];
  lines.push(formatter.heading("Available MCP Tools"));
  lines.push(formatter.heading(formatRow(headers)));
  lines.push(formatter.muted("  " + columnWidths.map((w) => "─".repeat(w)).join("──┼──")));
  rows.forEach((row) => lines.push(formatRow(row)));
  return lines;
}

function truncate(text: string, max: number): string {
  const singleLine = text.replace(/\s+/g, " ").trim();
  return singleLine.length > max ? `${singleLine.slice(0, max - 3)}...` : singleLine;
}
