/**
 * @module tools/crawl-single-page
 * @fileoverview MCP Tool: crawl_single_page -- fetch one URL and return its
 * content as Markdown.
 *
 * ## Usage Example (from MCP client)
 * ```json
 * { "tool": "crawl_single_page", "arguments": { "url": "https://example.com/article" } }
 * ```
 *
 * ## Response Format
 * ```json
 * { "url": "https://example.com/article", "content": "# Title\n\n..." }
 * ```
 * or, when the page could not be read,
 * ```json
 * { "success": false, "url": "https://example.com/article", "error": "[FETCH_FAILED] HTTP 404 Not Found" }
 * ```
 */
import { z } from "zod";
import { formatError } from "../utils/errors.js";
import { jsonResponse, type ToolContext, type ToolResponse } from "./context.js";

/**
 * Zod shape for the `crawl_single_page` parameters. A plain object, not a
 * `z.object()`: `server.tool()` takes the shape.
 */
export const CrawlSinglePageSchema = {
  url: z.string().url().describe("URL of the web page to fetch"),
};

interface CrawlSinglePageParams {
  url: string;
}

/**
 * Handler for `crawl_single_page`.
 *
 * A fetch failure is an ordinary `success: false` document; only an
 * exception escaping the fetcher sets `isError`.
 */
export async function handleCrawlSinglePage(
  params: CrawlSinglePageParams,
  context: ToolContext,
): Promise<ToolResponse> {
  try {
    const outcome = await context.fetcher.fetchPage(params.url);

    if (!outcome.success || outcome.content === null) {
      return jsonResponse({
        success: false,
        url: params.url,
        error: outcome.error ?? "No content found",
      });
    }

    return jsonResponse({ url: outcome.url, content: outcome.content });
  } catch (error) {
    return jsonResponse(
      { success: false, url: params.url, error: formatError(error) },
      true,
    );
  }
}
