#!/usr/bin/env node
/**
 * @module index
 * @fileoverview mcp-web-crawler entry point.
 *
 * ## Startup Flow
 * 1. Load configuration from environment variables (via {@link config}).
 * 2. Build the shared {@link HttpFetcher} once.
 * 3. Serve over the configured transport:
 *    - `stdio` (default): one server on stdin/stdout.
 *    - `http`: Streamable HTTP at `http://HOST:PORT/mcp`, stateless; every
 *      POST gets its own server and transport.
 *
 * ## Architecture
 * ```
 * MCP Client
 *   |
 *   | stdio  or  POST /mcp
 *   v
 * index.ts (this file) --> server.ts (McpServer)
 *   |
 *   +-- crawl_single_page --> HttpFetcher.fetchPage
 *   +-- deep_crawl        --> crawler/deep-crawl --> frontier | sitemap
 *   +-- web_search        --> services/web-search
 *   +-- wikipedia_search  --> services/wikipedia
 * ```
 *
 * stdout belongs to the stdio transport; all logging goes to stderr.
 */

import http from "node:http";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";

import { config } from "./config.js";
import { createServer } from "./server.js";
import { HttpFetcher } from "./services/http-fetcher.js";
import type { ToolContext } from "./tools/context.js";

const MCP_PATH = "/mcp";

async function serveStdio(context: ToolContext): Promise<void> {
  const server = createServer(context);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[server] Listening on stdio");
}

function sendJsonRpcError(
  res: http.ServerResponse,
  status: number,
  message: string,
): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(
    JSON.stringify({
      jsonrpc: "2.0",
      error: { code: -32000, message },
      id: null,
    }),
  );
}

async function handleHttpRequest(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  context: ToolContext,
): Promise<void> {
  const path = new URL(req.url ?? "/", "http://localhost").pathname;
  if (path !== MCP_PATH) {
    res.writeHead(404).end();
    return;
  }
  if (req.method !== "POST") {
    sendJsonRpcError(res, 405, "Method not allowed.");
    return;
  }

  const server = createServer(context);
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
  });

  res.on("close", () => {
    transport.close().catch((error: unknown) => {
      console.error("[server] Failed to close transport:", error);
    });
    server.close().catch((error: unknown) => {
      console.error("[server] Failed to close server:", error);
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res);
}

function serveHttp(context: ToolContext): Promise<void> {
  const httpServer = http.createServer((req, res) => {
    handleHttpRequest(req, res, context).catch((error: unknown) => {
      console.error("[server] Error handling MCP request:", error);
      if (!res.headersSent) {
        sendJsonRpcError(res, 500, "Internal server error");
      }
    });
  });

  return new Promise((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(config.port, config.host, () => {
      console.error(
        `[server] Listening on http://${config.host}:${config.port}${MCP_PATH}`,
      );
      resolve();
    });
  });
}

async function main(): Promise<void> {
  const context: ToolContext = { fetcher: new HttpFetcher() };

  if (config.transport === "http") {
    await serveHttp(context);
  } else {
    await serveStdio(context);
  }
}

main().catch((error: unknown) => {
  console.error("[server] Fatal error:", error);
  process.exit(1);
});
