/**
 * @module tools/wikipedia-search
 * @fileoverview MCP Tool: wikipedia_search -- intro summary of the best
 * matching Wikipedia article.
 *
 * ## Response Format
 * ```json
 * { "query": "breadth-first search", "title": "Breadth-first search",
 *   "summary": "Breadth-first search (BFS) is an algorithm ...",
 *   "url": "https://en.wikipedia.org/wiki/Breadth-first_search" }
 * ```
 * When nothing matches, or the lookup fails:
 * ```json
 * { "query": "...", "summary": null, "url": null, "error": "..." }
 * ```
 */
import { z } from "zod";
import {
  MAX_SENTENCES,
  MIN_SENTENCES,
  searchWikipedia,
} from "../services/wikipedia.js";
import { CrawlerError, formatError } from "../utils/errors.js";
import { jsonResponse, type ToolResponse } from "./context.js";

export const WikipediaSearchSchema = {
  query: z.string().min(1).describe("Topic to look up"),

  sentences: z
    .number()
    .int()
    .optional()
    .default(3)
    .describe(
      `Number of summary sentences, ${MIN_SENTENCES} to ${MAX_SENTENCES} (default: 3)`,
    ),

  language: z
    .string()
    .optional()
    .default("en")
    .describe('Wikipedia language code, e.g. "en", "de", "pt-br" (default: "en")'),
};

interface WikipediaSearchParams {
  query: string;
  sentences: number;
  language: string;
}

export async function handleWikipediaSearch(
  params: WikipediaSearchParams,
): Promise<ToolResponse> {
  try {
    const page = await searchWikipedia(
      params.query,
      params.sentences,
      params.language,
    );

    if (!page) {
      return jsonResponse({
        query: params.query,
        summary: null,
        url: null,
        error: `No Wikipedia article found for "${params.query}"`,
      });
    }

    return jsonResponse({ query: params.query, ...page });
  } catch (error) {
    return jsonResponse(
      {
        query: params.query,
        summary: null,
        url: null,
        error: formatError(error),
      },
      !(error instanceof CrawlerError),
    );
  }
}
