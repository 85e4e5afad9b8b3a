/**
 * @fileoverview Page extraction pipeline: one URL in, Markdown and links out.
 *
 *   1. **HTTP fetch**: {@link safeFetch} restricted to {@link PAGE_CONTENT_TYPES}.
 *   2. **Branch on MIME type**
 *        - plaintext / Markdown: the body is the content; there are no links.
 *        - HTML / XML:
 *            a. main-content capture ({@link extractFromHtml}),
 *            b. Markdown conversion ({@link htmlToMarkdown}),
 *            c. link discovery over the **raw** HTML ({@link extractLinks}),
 *               so navigation links that Readability drops are still
 *               available to the crawler.
 *
 * Nothing is cached: every call goes to the network.
 *
 * @module extractor/pipeline
 */

import { safeFetch, PAGE_CONTENT_TYPES } from "../services/fetch.js";
import { extractLinks, type ResolvedLink } from "../crawler/link-resolver.js";
import { extractFromHtml } from "./html-extractor.js";
import { htmlToMarkdown } from "./markdown-converter.js";
import { ExtractionError } from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/**
 * A fetched page after extraction.
 *
 * @example
 * ```typescript
 * const page = await extractPage("https://example.com/docs/");
 * page.url;     // "https://example.com/docs/" (after redirects)
 * page.content; // "# Docs\n\nWelcome..."
 * page.links;   // [{ url: "https://example.com/docs/install", isInternal: true }, ...]
 * ```
 */
export interface ExtractedPage {
  /** Final URL after redirects. */
  url: string;

  /** Markdown for markup documents, the raw body for plaintext. */
  content: string;

  /** Every fetchable link on the page, internal and external. */
  links: ResolvedLink[];
}

const PLAINTEXT_TYPES: ReadonlySet<string> = new Set([
  "text/plain",
  "text/markdown",
  "text/x-markdown",
]);

const ACCEPT_HEADER =
  "text/html, application/xhtml+xml, text/plain;q=0.9, text/markdown;q=0.9, */*;q=0.1";

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Fetch a page and extract its content and links.
 *
 * @throws {ExtractionError} A markup page with no readable text.
 * @throws Any error from {@link safeFetch}.
 */
export async function extractPage(url: string): Promise<ExtractedPage> {
  const fetched = await safeFetch(url, {
    acceptedTypes: PAGE_CONTENT_TYPES,
    accept: ACCEPT_HEADER,
  });

  if (PLAINTEXT_TYPES.has(fetched.mimeType)) {
    return {
      url: fetched.url,
      content: fetched.body.trim(),
      links: [],
    };
  }

  const content = htmlToMarkdown(extractFromHtml(fetched.body, fetched.url));
  if (!content) {
    throw new ExtractionError(`No readable content in ${fetched.url}`);
  }

  return {
    url: fetched.url,
    content,
    links: extractLinks(fetched.body, fetched.url),
  };
}
