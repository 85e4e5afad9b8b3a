/**
 * @module config
 * @fileoverview Centralized application configuration loaded from environment variables.
 *
 * Every setting has a default, so the server starts with no environment at
 * all. This module imports nothing from the application and sits at the
 * bottom of the dependency graph:
 *
 * ```
 *  +-----------+   +-----------+   +-----------+
 *  |   tools   |   |  crawler  |   | services  |
 *  +-----+-----+   +-----+-----+   +-----+-----+
 *        |               |               |
 *        +-------+-------+-------+-------+
 *                |               |
 *          +-----v-----+  +-----v-----+
 *          |   config   |  |   utils   |
 *          +-----------+  +-----------+
 * ```
 *
 * ## Environment Variable Naming Convention
 * - All uppercase with underscores (SCREAMING_SNAKE_CASE).
 * - Integers are parsed with `parseInt(..., 10)`, percentages with `parseFloat`.
 * - Booleans are the strings `"true"` / `"false"`.
 * - Lists are comma-separated.
 *
 * @example
 * ```ts
 * import { config } from "./config.js";
 * config.memoryThresholdPercent; // 70
 *
 * // Tests take a fresh snapshot instead:
 * process.env.DEFAULT_MAX_DEPTH = "1";
 * loadConfig().defaultMaxDepth; // 1
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/** Transport the MCP server listens on. */
export type TransportKind = "stdio" | "http";

/**
 * Complete application configuration.
 *
 * Every field is required and has a default.
 */
export interface AppConfig {
  /**
   * Default number of breadth-first levels `deep_crawl` expands.
   *
   * Level one is the seed URL itself, so 3 means "the seed, its links, and
   * their links".
   *
   * @default 3
   */
  defaultMaxDepth: number;

  /**
   * Default ceiling on simultaneous page fetches within one batch.
   *
   * @default 10
   */
  defaultMaxConcurrency: number;

  /**
   * System memory utilization (percent) at or above which the dispatcher
   * stops admitting more than one fetch at a time.
   *
   * @default 70
   */
  memoryThresholdPercent: number;

  /**
   * How often the dispatcher re-samples memory while a batch is running,
   * in milliseconds.
   *
   * @default 1000
   */
  memoryCheckInterval: number;

  /**
   * HTTP request timeout in milliseconds.
   *
   * @default 10000
   */
  fetchTimeout: number;

  /**
   * Maximum allowed response body size in bytes. Bodies are read as a
   * stream and abandoned once they cross this size.
   *
   * @default 10485760
   */
  maxResponseSize: number;

  /**
   * User-Agent header sent with every outbound request.
   *
   * @default "mcp-web-crawler/1.0 (MCP Server)"
   */
  userAgent: string;

  /**
   * Reject hosts that resolve to loopback, private, link-local or other
   * reserved addresses before any request is sent.
   *
   * @default true
   */
  blockPrivateNetworks: boolean;

  /**
   * Glob patterns (matched against the whole URL, `*` wildcard,
   * case-insensitive) that classify a URL as a sitemap in addition to the
   * built-in `sitemap*.xml` path rule.
   *
   * @default ["*?sitemap*", "*&sitemap*"]
   */
  sitemapPatterns: string[];

  /** API key for the Serper search API. `web_search` reports an error without it. */
  serperApiKey: string | undefined;

  /** @default "stdio" */
  transport: TransportKind;

  /** Bind address for the HTTP transport. @default "127.0.0.1" */
  host: string;

  /** Port for the HTTP transport. @default 8000 */
  port: number;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Parsing Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) {
    return fallback;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseTransport(value: string | undefined): TransportKind {
  return value?.toLowerCase() === "http" ? "http" : "stdio";
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Read environment variables and build a complete {@link AppConfig}.
 *
 * Reads `process.env` at call time and returns a plain object, so tests can
 * set variables and call it again.
 */
export function loadConfig(): AppConfig {
  return {
    defaultMaxDepth: parseInt(process.env.DEFAULT_MAX_DEPTH ?? "3", 10),
    defaultMaxConcurrency: parseInt(
      process.env.DEFAULT_MAX_CONCURRENCY ?? "10",
      10,
    ),
    memoryThresholdPercent: parseFloat(
      process.env.MEMORY_THRESHOLD_PERCENT ?? "70",
    ),
    memoryCheckInterval: parseInt(
      process.env.MEMORY_CHECK_INTERVAL ?? "1000",
      10,
    ),
    fetchTimeout: parseInt(process.env.FETCH_TIMEOUT ?? "10000", 10),
    maxResponseSize: parseInt(process.env.MAX_RESPONSE_SIZE ?? "10485760", 10),
    userAgent: process.env.USER_AGENT ?? "mcp-web-crawler/1.0 (MCP Server)",

    // Anything but an explicit "false" keeps the guard on.
    blockPrivateNetworks:
      process.env.BLOCK_PRIVATE_NETWORKS?.toLowerCase() !== "false",

    sitemapPatterns: parseList(process.env.SITEMAP_PATTERNS, [
      "*?sitemap*",
      "*&sitemap*",
    ]),

    // An empty key is the same as no key.
    serperApiKey: process.env.SERPER_API_KEY || undefined,

    transport: parseTransport(process.env.MCP_TRANSPORT),
    host: process.env.HOST ?? "127.0.0.1",
    port: parseInt(process.env.PORT ?? "8000", 10),
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Singleton Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Configuration snapshot taken at module load time.
 *
 * If you need a fresh config (e.g., in tests), call {@link loadConfig} directly.
 */
export const config: AppConfig = loadConfig();
