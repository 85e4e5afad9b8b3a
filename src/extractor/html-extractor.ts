/**
 * @fileoverview Main-content capture for fetched HTML.
 *
 * Two passes:
 *
 *   1. **cheerio** strips elements that never hold page content (scripts,
 *      styles, navigation chrome, comments).
 *   2. **Readability** (over a jsdom document) picks the article body.
 *
 * When Readability finds no article, the whole `<body>` text is used.
 *
 * The result is HTML; `markdown-converter` turns it into text.
 *
 * @module extractor/html-extractor
 */

import * as cheerio from "cheerio";
import { JSDOM } from "jsdom";
import { Readability } from "@mozilla/readability";

// ---------------------------------------------------------------------------
// Preprocessing
// ---------------------------------------------------------------------------

/** Elements removed before Readability sees the document. */
const NOISE_SELECTORS: readonly string[] = [
  "script",
  "noscript",
  "style",
  "template",
  "iframe",
  "nav",
  "header",
  "footer",
  "aside",
  "[role='navigation']",
  "[role='banner']",
  "[role='contentinfo']",
];

function stripNoise(html: string): string {
  const $ = cheerio.load(html);

  $(NOISE_SELECTORS.join(", ")).remove();
  $("*")
    .contents()
    .filter((_index, node) => node.type === "comment")
    .remove();

  return $.html();
}

// ---------------------------------------------------------------------------
// Fallback
// ---------------------------------------------------------------------------

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Capture the main content of an HTML document as HTML.
 *
 * Never throws on malformed markup; the worst case is `""`.
 *
 * @param html - Raw HTML as fetched.
 * @param url - Document URL, used by Readability to absolutize links.
 *
 * @example
 * ```ts
 * extractFromHtml(html, "https://example.com/guide");
 * // "<div id=\"readability-page-1\" ...>"
 * ```
 */
export function extractFromHtml(html: string, url: string): string {
  const cleaned = stripNoise(html);

  const dom = new JSDOM(cleaned, { url });
  try {
    const article = new Readability(dom.window.document).parse();
    if (article) {
      return article.content ?? "";
    }
  } finally {
    dom.window.close();
  }

  const $ = cheerio.load(cleaned);
  const text = $("body").text().replace(/\s+/g, " ").trim();
  return text ? `<p>${escapeHtml(text)}</p>` : "";
}
