/**
 * @module tools/web-search
 * @fileoverview MCP Tool: web_search -- Google results through the Serper API.
 *
 * Needs `SERPER_API_KEY`. Without it the tool answers with an error
 * document instead of results.
 */
import { z } from "zod";
import { searchWeb } from "../services/web-search.js";
import { CrawlerError, formatError } from "../utils/errors.js";
import { jsonResponse, type ToolResponse } from "./context.js";

export const WebSearchSchema = {
  query: z.string().min(1).describe("Search query"),

  max_results: z
    .number()
    .int()
    .min(1)
    .max(100)
    .optional()
    .default(5)
    .describe("Maximum number of results to return (default: 5)"),
};

interface WebSearchParams {
  query: string;
  max_results: number;
}

/**
 * Handler for `web_search`.
 *
 * Expected failures (missing key, API errors) produce `{ success: false,
 * error }`; anything else additionally sets `isError`.
 */
export async function handleWebSearch(
  params: WebSearchParams,
): Promise<ToolResponse> {
  try {
    const results = await searchWeb(params.query, params.max_results);
    return jsonResponse({ query: params.query, results });
  } catch (error) {
    return jsonResponse(
      { success: false, error: formatError(error) },
      !(error instanceof CrawlerError),
    );
  }
}
