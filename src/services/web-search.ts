/**
 * @fileoverview Web search through the Serper Google Search API.
 *
 * ```
 *   POST https://google.serper.dev/search
 *   X-API-KEY: <SERPER_API_KEY>
 *   { "q": "...", "num": 5 }
 * ```
 *
 * The response is validated with zod; only the organic results are kept.
 *
 * @module services/web-search
 */

import { z } from "zod";
import { config } from "../config.js";
import {
  ConfigurationError,
  SearchError,
  TimeoutError,
} from "../utils/errors.js";

export const SERPER_ENDPOINT = "https://google.serper.dev/search";

/** One organic search hit. */
export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearchOptions {
  /** Defaults to `config.serperApiKey`. */
  apiKey?: string;
  timeoutMs?: number;
}

const SerperResponseSchema = z.object({
  organic: z
    .array(
      z.object({
        title: z.string(),
        link: z.string(),
        snippet: z.string().optional(),
      }),
    )
    .default([]),
});

/**
 * Search the web and return up to `maxResults` organic hits, in rank order.
 *
 * @throws {ConfigurationError} No API key is configured.
 * @throws {TimeoutError} The API did not answer in time.
 * @throws {SearchError} Network failure, non-2xx status or an unexpected payload.
 */
export async function searchWeb(
  query: string,
  maxResults: number,
  options: WebSearchOptions = {},
): Promise<SearchHit[]> {
  const apiKey = options.apiKey ?? config.serperApiKey;
  if (!apiKey) {
    throw new ConfigurationError("SERPER_API_KEY is not set");
  }

  const timeoutMs = options.timeoutMs ?? config.fetchTimeout;

  let response: Response;
  try {
    response = await fetch(SERPER_ENDPOINT, {
      method: "POST",
      headers: {
        "X-API-KEY": apiKey,
        "Content-Type": "application/json",
        "User-Agent": config.userAgent,
      },
      body: JSON.stringify({ q: query, num: maxResults }),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof DOMException && error.name === "TimeoutError") {
      throw new TimeoutError(`Search request timed out after ${timeoutMs}ms`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new SearchError(`Search request failed: ${message}`);
  }

  if (!response.ok) {
    throw new SearchError(
      `Search API returned HTTP ${response.status}`,
      response.status,
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SearchError(`Malformed search response: ${message}`);
  }

  const parsed = SerperResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new SearchError(`Unexpected search response: ${parsed.error.message}`);
  }

  return parsed.data.organic.slice(0, maxResults).map((hit) => ({
    title: hit.title,
    url: hit.link,
    snippet: hit.snippet ?? "",
  }));
}
