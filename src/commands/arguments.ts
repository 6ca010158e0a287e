import {ArgumentParseError, describeError} from "../errors.js";
import {isRecord, type ToolArguments} from "../types/mcp.js";

/** Parse operation arguments given as JSON text. Blank input means `{}`. */
export function parseToolArguments(text: string | undefined): ToolArguments {
  const trimmed = text?.trim() ?? "";
  if (trimmed.length === 0) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (error) {
    throw new ArgumentParseError(trimmed, describeError(error));
  }

  if (!isRecord(parsed)) {
    throw new ArgumentParseError(trimmed, "expected a JSON object");
  }
  return parsed;
}
