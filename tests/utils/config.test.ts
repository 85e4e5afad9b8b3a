/**
 * @fileoverview Tests for environment-driven configuration.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { loadConfig } from "../../src/config.js";

const VARIABLES = [
  "DEFAULT_MAX_DEPTH",
  "DEFAULT_MAX_CONCURRENCY",
  "MEMORY_THRESHOLD_PERCENT",
  "MEMORY_CHECK_INTERVAL",
  "FETCH_TIMEOUT",
  "MAX_RESPONSE_SIZE",
  "USER_AGENT",
  "BLOCK_PRIVATE_NETWORKS",
  "SITEMAP_PATTERNS",
  "SERPER_API_KEY",
  "MCP_TRANSPORT",
  "HOST",
  "PORT",
];

let saved: Record<string, string | undefined> = {};

beforeEach(() => {
  saved = {};
  for (const name of VARIABLES) {
    saved[name] = process.env[name];
    delete process.env[name];
  }
});

afterEach(() => {
  vi.unstubAllEnvs();
  for (const name of VARIABLES) {
    const value = saved[name];
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }
});

describe("loadConfig — defaults", () => {
  it("applies every default when the environment is empty", () => {
    expect(loadConfig()).toEqual({
      defaultMaxDepth: 3,
      defaultMaxConcurrency: 10,
      memoryThresholdPercent: 70,
      memoryCheckInterval: 1000,
      fetchTimeout: 10000,
      maxResponseSize: 10485760,
      userAgent: "mcp-web-crawler/1.0 (MCP Server)",
      blockPrivateNetworks: true,
      sitemapPatterns: ["*?sitemap*", "*&sitemap*"],
      serperApiKey: undefined,
      transport: "stdio",
      host: "127.0.0.1",
      port: 8000,
    });
  });
});

describe("loadConfig — overrides", () => {
  it("parses numbers from the environment", () => {
    vi.stubEnv("DEFAULT_MAX_DEPTH", "5");
    vi.stubEnv("MEMORY_THRESHOLD_PERCENT", "82.5");

    const config = loadConfig();

    expect(config.defaultMaxDepth).toBe(5);
    expect(config.memoryThresholdPercent).toBe(82.5);
  });

  it("turns the address guard off only for an explicit false", () => {
    vi.stubEnv("BLOCK_PRIVATE_NETWORKS", "FALSE");
    expect(loadConfig().blockPrivateNetworks).toBe(false);

    vi.stubEnv("BLOCK_PRIVATE_NETWORKS", "no");
    expect(loadConfig().blockPrivateNetworks).toBe(true);
  });

  it("splits and trims sitemap patterns", () => {
    vi.stubEnv("SITEMAP_PATTERNS", " */map.xml , ,*/feed ");
    expect(loadConfig().sitemapPatterns).toEqual(["*/map.xml", "*/feed"]);
  });

  it("treats an empty API key as unset", () => {
    vi.stubEnv("SERPER_API_KEY", "");
    expect(loadConfig().serperApiKey).toBeUndefined();

    vi.stubEnv("SERPER_API_KEY", "test-secret");
    expect(loadConfig().serperApiKey).toBe("test-secret");
  });

  it("selects the HTTP transport case-insensitively", () => {
    vi.stubEnv("MCP_TRANSPORT", "HTTP");
    expect(loadConfig().transport).toBe("http");

    vi.stubEnv("MCP_TRANSPORT", "websocket");
    expect(loadConfig().transport).toBe("stdio");
  });
});
