/**
 * @module crawler/fetch-port
 * @fileoverview The retrieval contract the crawl engine depends on.
 *
 * The frontier, the sitemap expander and the deep-crawl orchestration only
 * ever talk to a {@link FetchPort}. The production implementation is
 * `services/http-fetcher`; tests substitute an in-memory fake.
 *
 * ```
 *   crawler/frontier ─┐
 *   crawler/sitemap  ─┼──>  FetchPort  <── services/http-fetcher (HTTP + Readability + Turndown)
 *   crawler/deep-crawl┘                <── tests/helpers/fake-fetcher (in-memory)
 * ```
 */

import type { DispatchPolicy } from "../services/dispatcher.js";

export type { DispatchPolicy };

/**
 * Result of retrieving one page through the port.
 *
 * Exactly one of `content` / `error` is non-null.
 */
export interface FetchOutcome {
  /** Final URL after redirects, or the requested URL when the fetch failed. */
  url: string;

  success: boolean;

  /** Page text: Markdown for HTML pages, the body itself for plaintext. */
  content: string | null;

  /** Formatted error when `success` is false. */
  error: string | null;

  /**
   * Absolute URLs of links on the page whose host equals the page's host.
   * Empty for failed fetches and non-HTML content.
   */
  internalLinks: string[];
}

/**
 * Result of retrieving a resource without any content processing.
 */
export interface RawFetchOutcome {
  url: string;
  success: boolean;
  /** Body text as received, e.g. sitemap XML. */
  body: string | null;
  error: string | null;
}

/**
 * Single-URL and batch retrieval. Implementations must not throw for a
 * per-URL failure; they report it in the outcome instead.
 */
export interface FetchPort {
  /** Retrieve a resource body as-is (any content type). */
  fetchRaw(url: string): Promise<RawFetchOutcome>;

  /** Retrieve one page and extract its content and internal links. */
  fetchPage(url: string): Promise<FetchOutcome>;

  /**
   * Retrieve many pages under `policy`. One outcome per input URL, in input
   * order; one URL's failure never affects another's outcome.
   */
  fetchMany(
    urls: readonly string[],
    policy: DispatchPolicy,
  ): Promise<FetchOutcome[]>;
}
