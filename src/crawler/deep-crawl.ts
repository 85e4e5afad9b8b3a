/**
 * @module crawler/deep-crawl
 * @fileoverview Entry point of a `deep_crawl` call: classify the URL, run the
 * matching strategy, aggregate the pages.
 *
 * ```
 *   url ──classify──> text_file ──> fetchPage          ─┐
 *                     sitemap   ──> expandSitemap       ├──> aggregate ──> CrawlOutcome
 *                     webpage   ──> traverse (BFS)     ─┘
 * ```
 */

import type { FetchPort } from "./fetch-port.js";
import { traverse, type ThrottleSettings } from "./frontier.js";
import { expandSitemap } from "./sitemap.js";
import { classify } from "./url-classifier.js";
import { aggregate } from "./aggregate.js";
import type { CrawlOutcome, PageResult } from "./types.js";

export interface DeepCrawlOptions {
  /** Globs that mark a sitemap; defaults to the configured patterns. */
  sitemapPatterns?: readonly string[];

  /** Memory throttle; defaults to the configured threshold and interval. */
  throttle?: ThrottleSettings;
}

async function fetchTextFile(url: string, fetcher: FetchPort): Promise<PageResult[]> {
  const outcome = await fetcher.fetchPage(url);
  if (!outcome.success || !outcome.content) {
    console.error(`[deep-crawl] Text file ${url} yielded no content: ${outcome.error ?? "empty body"}`);
    return [];
  }
  return [{ url: outcome.url, content: outcome.content, success: true, depth: 0 }];
}

/**
 * Crawl from `url` using the strategy its shape calls for.
 *
 * `maxDepth` only applies to web pages; text files and sitemaps are fetched
 * one level deep regardless.
 *
 * @throws Only for failures outside the fetch layer; per-URL fetch errors
 *   are absorbed into the outcome.
 */
export async function deepCrawl(
  url: string,
  maxDepth: number,
  maxConcurrency: number,
  fetcher: FetchPort,
  options: DeepCrawlOptions = {},
): Promise<CrawlOutcome> {
  const crawlType = options.sitemapPatterns
    ? classify(url, options.sitemapPatterns)
    : classify(url);
  console.error(`[deep-crawl] ${url} classified as ${crawlType}`);

  let results: PageResult[];
  switch (crawlType) {
    case "text_file":
      results = await fetchTextFile(url, fetcher);
      break;
    case "sitemap":
      results = await expandSitemap(url, maxConcurrency, fetcher, options.throttle);
      break;
    case "webpage":
      results = await traverse(
        { seedUrls: [url], maxDepth, maxConcurrency },
        fetcher,
        options.throttle,
      );
      break;
  }

  return aggregate(crawlType, url, results);
}
