/**
 * @module crawler/link-resolver
 * @fileoverview Link discovery for fetched HTML pages.
 *
 * Collects every `<a href>` on a page, resolves it against the page URL
 * (honouring a `<base href>` if present), drops what cannot be fetched, and
 * marks each link internal or external.
 *
 * A link is **internal** when its hostname equals the hostname of the page
 * it was found on. Subdomains count as external; scheme and port are
 * ignored.
 *
 * @example
 * ```ts
 * const links = extractLinks(
 *   '<a href="/docs">Docs</a><a href="https://other.org/">Other</a>',
 *   "https://example.com/",
 * );
 * // [
 * //   { url: "https://example.com/docs", isInternal: true },
 * //   { url: "https://other.org/",       isInternal: false },
 * // ]
 * ```
 */

import * as cheerio from "cheerio";
import {
  normalizeUrl,
  resolveUrl,
  extractDomain,
  isFetchableUrl,
} from "../utils/url.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * A hyperlink found on a page, resolved to an absolute URL.
 */
export interface ResolvedLink {
  /** Absolute http(s) URL without fragment. */
  url: string;

  /** Same hostname as the page the link was found on. */
  isInternal: boolean;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

/** Schemes filtered before resolution; `new URL()` accepts most of them. */
const NON_FETCHABLE_SCHEMES: readonly string[] = [
  "javascript:",
  "mailto:",
  "tel:",
  "data:",
  "blob:",
  "ftp:",
  "file:",
];

function hasNonFetchableScheme(href: string): boolean {
  const lower = href.toLowerCase();
  return NON_FETCHABLE_SCHEMES.some((scheme) => lower.startsWith(scheme));
}

/**
 * The URL relative links resolve against: `<base href>` when it resolves,
 * otherwise the page URL.
 */
function documentBase($: cheerio.CheerioAPI, pageUrl: string): string {
  const baseHref = $("base[href]").first().attr("href")?.trim();
  if (!baseHref) {
    return pageUrl;
  }
  try {
    return resolveUrl(pageUrl, baseHref);
  } catch {
    return pageUrl;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extract, resolve and classify all links in an HTML document.
 *
 * Links are returned in document order, deduplicated by URL. Fragment-only hrefs, non-fetchable schemes and unparseable
 * hrefs are skipped.
 *
 * @param html - Raw HTML of the page.
 * @param pageUrl - Final URL of the page (after redirects).
 */
export function extractLinks(html: string, pageUrl: string): ResolvedLink[] {
  const $ = cheerio.load(html);
  const pageHost = extractDomain(pageUrl);
  const base = documentBase($, pageUrl);

  const seen = new Set<string>();
  const links: ResolvedLink[] = [];

  $("a[href]").each((_index, element) => {
    const href = $(element).attr("href")?.trim();
    if (!href || href.startsWith("#") || hasNonFetchableScheme(href)) {
      return;
    }

    let url: string;
    try {
      url = normalizeUrl(resolveUrl(base, href));
    } catch {
      return;
    }

    if (seen.has(url) || !isFetchableUrl(url)) {
      return;
    }
    seen.add(url);

    links.push({
      url,
      isInternal: extractDomain(url) === pageHost,
    });
  });

  return links;
}

/**
 * URLs of the internal links in `links`, in order.
 */
export function internalUrls(links: readonly ResolvedLink[]): string[] {
  return links.filter((link) => link.isInternal).map((link) => link.url);
}
