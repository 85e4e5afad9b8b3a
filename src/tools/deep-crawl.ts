/**
 * @module tools/deep-crawl
 * @fileoverview MCP Tool: deep_crawl -- crawl a site from an entry URL.
 *
 * The entry URL decides the strategy:
 * - a `.txt` file is fetched on its own,
 * - a sitemap is expanded and every listed URL fetched,
 * - anything else is crawled breadth-first over same-host links, up to
 *   `max_depth` levels.
 *
 * ## Usage Example (from MCP client)
 * ```json
 * {
 *   "tool": "deep_crawl",
 *   "arguments": { "url": "https://example.com/docs/", "max_depth": 2, "max_concurrency": 5 }
 * }
 * ```
 *
 * ## Response Format
 * ```json
 * {
 *   "success": true,
 *   "crawl_type": "webpage",
 *   "url": "https://example.com/docs/",
 *   "results": [{ "url": "...", "content": "...", "success": true, "depth": 0 }],
 *   "pages_crawled": 12,
 *   "urls_crawled_preview": ["...", "...", "...", "...", "...", "..."]
 * }
 * ```
 *
 * @see {@link deepCrawl} for the crawl itself
 */
import { z } from "zod";
import { deepCrawl } from "../crawler/deep-crawl.js";
import { formatError } from "../utils/errors.js";
import { config } from "../config.js";
import { jsonResponse, type ToolContext, type ToolResponse } from "./context.js";

export const DeepCrawlSchema = {
  url: z
    .string()
    .url()
    .describe("Entry URL: a web page, a sitemap, or a .txt file"),

  max_depth: z
    .number()
    .int()
    .min(0)
    .optional()
    .default(config.defaultMaxDepth)
    .describe(
      `Number of link levels to crawl for web pages; the entry page is level one (default: ${config.defaultMaxDepth})`,
    ),

  max_concurrency: z
    .number()
    .int()
    .min(1)
    .optional()
    .default(config.defaultMaxConcurrency)
    .describe(
      `Maximum simultaneous fetches (default: ${config.defaultMaxConcurrency})`,
    ),
};

interface DeepCrawlParams {
  url: string;
  max_depth: number;
  max_concurrency: number;
}

/**
 * Handler for `deep_crawl`. Empty crawls and per-page failures are reported
 * inside the outcome; an exception from anywhere in the crawl becomes
 * `{ success: false, url, error }` with `isError` set.
 */
export async function handleDeepCrawl(
  params: DeepCrawlParams,
  context: ToolContext,
): Promise<ToolResponse> {
  try {
    const outcome = await deepCrawl(
      params.url,
      params.max_depth,
      params.max_concurrency,
      context.fetcher,
    );
    return jsonResponse(outcome);
  } catch (error) {
    console.error(`[deep-crawl] ${params.url} failed:`, error);
    return jsonResponse(
      { success: false, url: params.url, error: formatError(error) },
      true,
    );
  }
}
