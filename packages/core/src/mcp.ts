/**
 * MCP tool response helpers.
 */

import type { Result } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

export interface ToolResponse {
  [key: string]: unknown;
  content: TextContent[];
  isError?: boolean;
}

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

export function errorResponse(message: string): ToolResponse {
  return { content: [{ type: "text", text: `Error: ${message}` }], isError: true };
}

/**
 * Render a Result as a tool response: the formatter on success, an error response otherwise.
 */
export function resultToResponse<T, E extends Error | string>(
  result: Result<T, E>,
  formatter: (value: T) => string
): ToolResponse {
  if (result.ok) {
    return textResponse(formatter(result.value));
  }
  return errorResponse(result.error instanceof Error ? result.error.message : result.error);
}

/**
 * Markdown lines joined for a text response.
 */
export function markdown(lines: Array<string | null | undefined>): string {
  return lines.filter((line): line is string => line !== null && line !== undefined).join("\n");
}
