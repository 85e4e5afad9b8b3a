/**
 * @module tools/context
 * @fileoverview What every tool handler receives besides its parameters, and
 * the response shape every handler returns.
 */

import type { FetchPort } from "../crawler/fetch-port.js";

/**
 * Long-lived collaborators, built once at startup and passed to each
 * handler call.
 */
export interface ToolContext {
  fetcher: FetchPort;
}

/** An MCP tool result holding one JSON text block. */
export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

/**
 * Wrap a response document as a tool result. `isError` marks results
 * produced by an unexpected exception.
 */
export function jsonResponse(document: object, isError = false): ToolResponse {
  const response: ToolResponse = {
    content: [{ type: "text" as const, text: JSON.stringify(document, null, 2) }],
  };
  if (isError) {
    response.isError = true;
  }
  return response;
}
