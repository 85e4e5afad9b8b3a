/**
 * @module server
 * @fileoverview Builds the MCP server and registers its tools.
 *
 * ## Available Tools
 * | Tool                | Description                                        | Module                          |
 * |---------------------|----------------------------------------------------|---------------------------------|
 * | `crawl_single_page` | Fetch one URL, return Markdown                      | `./tools/crawl-single-page.js`  |
 * | `deep_crawl`        | Text file, sitemap or breadth-first site crawl      | `./tools/deep-crawl.js`         |
 * | `web_search`        | Web search through Serper                           | `./tools/web-search.js`         |
 * | `wikipedia_search`  | Intro summary of the best matching article          | `./tools/wikipedia-search.js`   |
 *
 * The tool handlers get their collaborators from the {@link ToolContext}
 * passed in here; nothing in the tool layer constructs a fetcher itself.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import {
  CrawlSinglePageSchema,
  handleCrawlSinglePage,
} from "./tools/crawl-single-page.js";
import { DeepCrawlSchema, handleDeepCrawl } from "./tools/deep-crawl.js";
import { WebSearchSchema, handleWebSearch } from "./tools/web-search.js";
import {
  WikipediaSearchSchema,
  handleWikipediaSearch,
} from "./tools/wikipedia-search.js";
import type { ToolContext } from "./tools/context.js";

export const SERVER_NAME = "mcp-web-crawler";
export const SERVER_VERSION = "1.0.0";

/**
 * Create a server with every tool registered against `context`.
 *
 * The HTTP transport calls this once per request; stdio calls it once.
 */
export function createServer(context: ToolContext): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  server.tool(
    "crawl_single_page",
    "Fetch a single web page and return its main content as Markdown.",
    CrawlSinglePageSchema,
    (params) => handleCrawlSinglePage(params, context),
  );

  server.tool(
    "deep_crawl",
    "Crawl from an entry URL. A .txt file is fetched directly, a sitemap is expanded and each listed page fetched, and any other page is crawled breadth-first over same-site links up to max_depth levels. Returns the content of every page retrieved.",
    DeepCrawlSchema,
    (params) => handleDeepCrawl(params, context),
  );

  server.tool(
    "web_search",
    "Search the web (Google via Serper) and return titles, URLs and snippets.",
    WebSearchSchema,
    (params) => handleWebSearch(params),
  );

  server.tool(
    "wikipedia_search",
    "Look up a topic on Wikipedia and return the title, a short summary and the article URL.",
    WikipediaSearchSchema,
    (params) => handleWikipediaSearch(params),
  );

  return server;
}
