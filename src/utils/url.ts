/**
 * @module utils/url
 * @fileoverview URL helpers: dedup normalization, hostname extraction,
 * relative resolution, glob matching and path inspection.
 *
 * ## Normalization
 * {@link normalizeUrl} removes the fragment and nothing else. It works on the
 * raw string, so scheme and host case, default ports, query order and
 * trailing slashes all survive. Two strings that differ only after `#` are
 * the same crawl target; any other difference makes them distinct.
 *
 * @example
 * ```ts
 * import { normalizeUrl, extractDomain, isFetchableUrl } from "./utils/url.js";
 *
 * normalizeUrl("https://example.com/docs/#install");
 * // => "https://example.com/docs/"
 *
 * extractDomain("https://sub.example.com/path");
 * // => "sub.example.com"
 *
 * isFetchableUrl("javascript:alert(1)");
 * // => false
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/** URL schemes this application can fetch. */
const FETCHABLE_SCHEMES: ReadonlySet<string> = new Set(["http:", "https:"]);

/* ────────────────────────────────────────────────────────────────────────────
 * Normalization
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Canonicalize a URL for visited-set membership by dropping the fragment.
 *
 * Pure string operation: it never throws and accepts strings that are not
 * valid URLs. Idempotent.
 *
 * @example
 * ```ts
 * normalizeUrl("http://a/b#frag");        // "http://a/b"
 * normalizeUrl("http://a/b?x=1#a#b");     // "http://a/b?x=1"
 * normalizeUrl("HTTP://Example.com/");    // "HTTP://Example.com/"
 * ```
 */
export function normalizeUrl(url: string): string {
  const hashIndex = url.indexOf("#");
  return hashIndex === -1 ? url : url.slice(0, hashIndex);
}

/* ────────────────────────────────────────────────────────────────────────────
 * Parsing
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extract the hostname (lowercased by the WHATWG parser) from a URL.
 *
 * @throws {TypeError} If the URL cannot be parsed.
 */
export function extractDomain(url: string): string {
  return new URL(url).hostname;
}

/**
 * Resolve a possibly-relative reference against a base URL.
 *
 * @throws {TypeError} If the result is not a valid URL.
 *
 * @example
 * ```ts
 * resolveUrl("https://example.com/docs/intro", "../blog");
 * // => "https://example.com/blog"
 * ```
 */
export function resolveUrl(base: string, relative: string): string {
  return new URL(relative, base).href;
}

/**
 * The lowercased path of a URL, used for suffix checks.
 *
 * Falls back to cutting the raw string at the first `?` or `#` when it does
 * not parse, so every input yields a path.
 *
 * @example
 * ```ts
 * urlPath("https://example.com/Sitemap.XML?page=2"); // "/sitemap.xml"
 * urlPath("not a url/llms.txt#top");                 // "not a url/llms.txt"
 * ```
 */
export function urlPath(url: string): string {
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return url.split(/[?#]/, 1)[0].toLowerCase();
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Matching & Validation
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Test a URL against a glob pattern where `*` matches any run of characters.
 * Every other character is literal. Matching is anchored at both ends and
 * case-insensitive.
 *
 * @example
 * ```ts
 * matchesPattern("https://example.com/index.php?sitemap=1", "*?sitemap*"); // true
 * matchesPattern("https://example.com/about", "*.pdf");                     // false
 * ```
 */
export function matchesPattern(url: string, pattern: string): boolean {
  // Escape first, then turn `*` into `.*`.
  const source = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&")
    .replace(/\*/g, ".*");

  return new RegExp(`^${source}$`, "i").test(url);
}

/**
 * Whether a string is a parseable `http:` or `https:` URL.
 */
export function isFetchableUrl(url: string): boolean {
  try {
    return FETCHABLE_SCHEMES.has(new URL(url).protocol);
  } catch {
    return false;
  }
}
