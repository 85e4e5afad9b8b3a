/**
 * @fileoverview Wikipedia lookup through the MediaWiki Action API.
 *
 * A single request searches, picks the best match and returns its intro as
 * plain text (TextExtracts) together with its canonical URL:
 *
 * ```
 *   GET https://{lang}.wikipedia.org/w/api.php
 *       ?action=query&generator=search&gsrsearch=<query>&gsrlimit=1
 *       &prop=extracts|info&exintro=1&explaintext=1&exsentences=<n>
 *       &inprop=url&redirects=1&format=json&formatversion=2
 * ```
 *
 * @module services/wikipedia
 */

import { z } from "zod";
import { config } from "../config.js";
import { SearchError, TimeoutError } from "../utils/errors.js";

/** TextExtracts accepts 1 to 10 sentences. */
export const MIN_SENTENCES = 1;
export const MAX_SENTENCES = 10;

const LANGUAGE_CODE = /^[a-z]{2,3}(-[a-z0-9]+)*$/i;

export interface WikipediaSummary {
  title: string;
  summary: string;
  url: string;
}

const QueryResponseSchema = z.object({
  query: z
    .object({
      pages: z
        .array(
          z.object({
            title: z.string(),
            extract: z.string().optional(),
            fullurl: z.string().optional(),
            missing: z.boolean().optional(),
          }),
        )
        .default([]),
    })
    .optional(),
});

export function clampSentences(sentences: number): number {
  return Math.min(MAX_SENTENCES, Math.max(MIN_SENTENCES, Math.trunc(sentences)));
}

export function buildQueryUrl(
  query: string,
  sentences: number,
  language: string,
): string {
  const url = new URL(`https://${language.toLowerCase()}.wikipedia.org/w/api.php`);
  url.search = new URLSearchParams({
    action: "query",
    format: "json",
    formatversion: "2",
    generator: "search",
    gsrsearch: query,
    gsrlimit: "1",
    prop: "extracts|info",
    exintro: "1",
    explaintext: "1",
    exsentences: String(clampSentences(sentences)),
    inprop: "url",
    redirects: "1",
  }).toString();
  return url.href;
}

/**
 * Summarize the article that best matches `query`.
 *
 * @returns `null` when the search finds no article.
 * @throws {SearchError} Invalid language code, network failure, non-2xx
 *   status or an unexpected payload.
 * @throws {TimeoutError}
 */
export async function searchWikipedia(
  query: string,
  sentences: number,
  language: string,
  timeoutMs: number = config.fetchTimeout,
): Promise<WikipediaSummary | null> {
  if (!LANGUAGE_CODE.test(language)) {
    throw new SearchError(`Invalid Wikipedia language code: ${language}`);
  }

  let response: Response;
  try {
    response = await fetch(buildQueryUrl(query, sentences, language), {
      headers: {
        "User-Agent": config.userAgent,
        Accept: "application/json",
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof DOMException && error.name === "TimeoutError") {
      throw new TimeoutError(`Wikipedia request timed out after ${timeoutMs}ms`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new SearchError(`Wikipedia request failed: ${message}`);
  }

  if (!response.ok) {
    throw new SearchError(
      `Wikipedia API returned HTTP ${response.status}`,
      response.status,
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SearchError(`Malformed Wikipedia response: ${message}`);
  }

  const parsed = QueryResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new SearchError(`Unexpected Wikipedia response: ${parsed.error.message}`);
  }

  const page = parsed.data.query?.pages.find((candidate) => !candidate.missing);
  if (!page) {
    return null;
  }

  return {
    title: page.title,
    summary: (page.extract ?? "").trim(),
    url:
      page.fullurl ??
      `https://${language.toLowerCase()}.wikipedia.org/wiki/${encodeURIComponent(page.title.replace(/ /g, "_"))}`,
  };
}
