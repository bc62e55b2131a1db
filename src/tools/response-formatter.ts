/**
 * ResponseFormatter
 * Single responsibility: serialise tool payloads into MCP `CallToolResult`s.
 */
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ToolError } from "../utils/errors.js";

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? Number(value) : value;
}

export class ResponseFormatter {
  constructor(private readonly indent = 2) {}

  public formatSuccess(data: unknown): CallToolResult {
    return {
      content: [{ type: "text", text: JSON.stringify(data ?? null, jsonReplacer, this.indent) }],
    };
  }

  public formatError(error: ToolError): CallToolResult {
    return {
      content: [{ type: "text", text: JSON.stringify(error.toPayload(), jsonReplacer, this.indent) }],
      isError: true,
    };
  }
}
