/**
 * @fileoverview HTML → Markdown conversion tuned for LLM consumption.
 *
 * Turndown does the conversion with ATX headings, fenced code blocks and
 * `-` bullets; a strikethrough rule is added since Turndown's core lacks
 * one. The output is then cleaned:
 *
 * - invisible characters (zero-width spaces, soft hyphens, BOM) removed,
 * - runs of three or more newlines collapsed to one blank line,
 * - trailing spaces and tabs on each line dropped,
 * - leading and trailing whitespace trimmed.
 *
 * @module extractor/markdown-converter
 */

import TurndownService from "turndown";

const INVISIBLE_CHARS = /[\u200B-\u200F\uFEFF\u00AD\u2060-\u2064]/g;
const EXCESS_NEWLINES = /\n{3,}/g;
const TRAILING_SPACE = /[ \t]+$/gm;

/**
 * Conversion service shared by every call. Turndown keeps no per-document
 * state between `turndown()` calls.
 */
const turndown = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
  bulletListMarker: "-",
  emDelimiter: "_",
});

turndown.addRule("strikethrough", {
  filter: ["del", "s"],
  replacement: (content) => (content.trim() ? `~~${content}~~` : ""),
});

/**
 * Clean converted Markdown. Exported for tests.
 *
 * @example
 * ```ts
 * postProcessMarkdown("a\u200B\n\n\n\nb  \n"); // "a\n\nb"
 * ```
 */
export function postProcessMarkdown(markdown: string): string {
  return markdown
    .replace(INVISIBLE_CHARS, "")
    .replace(EXCESS_NEWLINES, "\n\n")
    .replace(TRAILING_SPACE, "")
    .trim();
}

/**
 * Convert an HTML fragment to cleaned Markdown. Blank input yields `""`.
 *
 * @example
 * ```ts
 * htmlToMarkdown("<h2>Install</h2><p>Run <code>npm i</code></p>");
 * // "## Install\n\nRun `npm i`"
 * ```
 */
export function htmlToMarkdown(html: string): string {
  if (!html.trim()) {
    return "";
  }
  return postProcessMarkdown(turndown.turndown(html));
}
