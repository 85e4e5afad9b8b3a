/**
 * @module crawler/aggregate
 * @fileoverview Folds the pages of one crawl into the `deep_crawl` response.
 */

import type { CrawlOutcome, CrawlType, PageResult } from "./types.js";

/** Number of URLs listed in `urls_crawled_preview`. */
export const PREVIEW_LIMIT = 5;

/** Appended to the preview when more pages were crawled than it lists. */
export const PREVIEW_MARKER = "...";

export const NO_CONTENT_ERROR = "No content found";

/**
 * Build the outcome for a finished crawl. An empty `results` list is a
 * failure with {@link NO_CONTENT_ERROR}.
 *
 * @example
 * ```ts
 * aggregate("webpage", "https://example.com/", []);
 * // { success: false, crawl_type: "webpage", url: "https://example.com/",
 * //   results: [], pages_crawled: 0, urls_crawled_preview: [],
 * //   error: "No content found" }
 * ```
 */
export function aggregate(
  crawlType: CrawlType,
  url: string,
  results: PageResult[],
): CrawlOutcome {
  const preview = results.slice(0, PREVIEW_LIMIT).map((page) => page.url);
  if (results.length > PREVIEW_LIMIT) {
    preview.push(PREVIEW_MARKER);
  }

  const outcome: CrawlOutcome = {
    success: results.length > 0,
    crawl_type: crawlType,
    url,
    results,
    pages_crawled: results.length,
    urls_crawled_preview: preview,
  };

  if (results.length === 0) {
    outcome.error = NO_CONTENT_ERROR;
  }

  return outcome;
}
