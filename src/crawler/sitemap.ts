/**
 * @module crawler/sitemap
 * @fileoverview Sitemap expansion: fetch one sitemap document, collect its
 * `<loc>` entries and fetch them as a flat batch.
 *
 * Only one level is read. A sitemap index yields the URLs of its child
 * sitemaps, which are then fetched as ordinary pages.
 */

import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import { SitemapParseError, formatError } from "../utils/errors.js";
import type { FetchPort } from "./fetch-port.js";
import { crawlBatch, type ThrottleSettings } from "./frontier.js";
import type { PageResult } from "./types.js";

/** Element name with any namespace prefix removed, lowercased. */
function localName(name: string): string {
  const colon = name.lastIndexOf(":");
  return (colon === -1 ? name : name.slice(colon + 1)).toLowerCase();
}

/**
 * Extract the `<loc>` values of a sitemap or sitemap index, in document
 * order, trimmed, without empties or duplicates. Namespace prefixes
 * (`<sm:loc>`) are ignored.
 *
 * @throws {SitemapParseError} When the document contains no XML element.
 */
export function parseSitemap(xml: string): string[] {
  const $ = cheerio.load(xml, { xml: true });

  if ($.root().children().length === 0) {
    throw new SitemapParseError("Document has no root element");
  }

  const seen = new Set<string>();
  const urls: string[] = [];

  $<Element, string>("*").each((_index, element) => {
    if (localName(element.name) !== "loc") {
      return;
    }
    const url = $(element).text().trim();
    if (url && !seen.has(url)) {
      seen.add(url);
      urls.push(url);
    }
  });

  return urls;
}

/**
 * Fetch a sitemap and crawl every URL it lists, without following links.
 *
 * Never throws for a bad sitemap: fetch and parse failures are logged and
 * produce an empty result.
 */
export async function expandSitemap(
  sitemapUrl: string,
  maxConcurrency: number,
  fetcher: FetchPort,
  throttle?: ThrottleSettings,
): Promise<PageResult[]> {
  const raw = await fetcher.fetchRaw(sitemapUrl);
  if (!raw.success || raw.body === null) {
    console.error(`[sitemap] Failed to fetch ${sitemapUrl}: ${raw.error ?? "empty body"}`);
    return [];
  }

  let urls: string[];
  try {
    urls = parseSitemap(raw.body);
  } catch (error) {
    console.error(`[sitemap] Failed to parse ${sitemapUrl}: ${formatError(error)}`);
    return [];
  }

  console.error(`[sitemap] ${sitemapUrl}: ${urls.length} URL(s)`);
  if (urls.length === 0) {
    return [];
  }

  return crawlBatch(urls, maxConcurrency, fetcher, throttle);
}
