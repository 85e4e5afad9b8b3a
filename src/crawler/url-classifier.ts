/**
 * @module crawler/url-classifier
 * @fileoverview Picks the retrieval strategy for an entry URL from the URL
 * string alone.
 *
 * | Class       | Rule                                                            |
 * |-------------|-----------------------------------------------------------------|
 * | `text_file` | path ends in `.txt`                                             |
 * | `sitemap`   | path contains `sitemap` and ends in `.xml`, or the URL matches a configured glob |
 * | `webpage`   | everything else                                                 |
 *
 * Rules are checked top to bottom and compared case-insensitively.
 * `classify` is total: unparseable input falls through to `webpage` unless
 * its raw path matches an earlier rule.
 *
 * @example
 * ```ts
 * classify("https://example.com/llms.txt");               // "text_file"
 * classify("https://example.com/sitemap_index.xml");      // "sitemap"
 * classify("https://example.com/index.php?sitemap=1");    // "sitemap" (default glob)
 * classify("https://example.com/blog/");                  // "webpage"
 * ```
 */

import { config } from "../config.js";
import { matchesPattern, urlPath } from "../utils/url.js";
import type { CrawlType } from "./types.js";

const TEXT_FILE_SUFFIX = ".txt";
const SITEMAP_SUFFIX = ".xml";

/**
 * Classify a URL.
 *
 * @param url - Any string; need not be a valid URL.
 * @param sitemapPatterns - Extra glob patterns that mark a sitemap.
 *   Defaults to `config.sitemapPatterns`.
 */
export function classify(
  url: string,
  sitemapPatterns: readonly string[] = config.sitemapPatterns,
): CrawlType {
  const path = urlPath(url);

  if (path.endsWith(TEXT_FILE_SUFFIX)) {
    return "text_file";
  }

  if (path.includes("sitemap") && path.endsWith(SITEMAP_SUFFIX)) {
    return "sitemap";
  }

  if (sitemapPatterns.some((pattern) => matchesPattern(url, pattern))) {
    return "sitemap";
  }

  return "webpage";
}
