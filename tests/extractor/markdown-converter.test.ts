/**
 * @fileoverview Tests for HTML-to-Markdown conversion and cleanup.
 */

import { describe, it, expect } from "vitest";
import {
  htmlToMarkdown,
  postProcessMarkdown,
} from "../../src/extractor/markdown-converter.js";

// ---------------------------------------------------------------------------
// htmlToMarkdown
// ---------------------------------------------------------------------------

describe("htmlToMarkdown — block elements", () => {
  it("uses ATX headings", () => {
    expect(htmlToMarkdown("<h1>Title</h1><h2>Section</h2><h3>Detail</h3>")).toBe(
      "# Title\n\n## Section\n\n### Detail",
    );
  });

  it("uses dash bullets", () => {
    expect(htmlToMarkdown("<ul><li>One</li><li>Two</li></ul>")).toBe("-   One\n-   Two");
  });

  it("fences code blocks", () => {
    expect(htmlToMarkdown("<pre><code>const depth = 2;</code></pre>")).toBe(
      "```\nconst depth = 2;\n```",
    );
  });
});

describe("htmlToMarkdown — inline elements", () => {
  it("converts strong and b to **", () => {
    expect(htmlToMarkdown("<p><strong>bold</strong> and <b>also bold</b></p>")).toBe(
      "**bold** and **also bold**",
    );
  });

  it("converts em and i to _", () => {
    expect(htmlToMarkdown("<p><em>soft</em> and <i>slanted</i></p>")).toBe(
      "_soft_ and _slanted_",
    );
  });

  it("keeps links", () => {
    expect(htmlToMarkdown('<p>See <a href="https://example.com/docs">the docs</a>.</p>')).toBe(
      "See [the docs](https://example.com/docs).",
    );
  });

  it("converts del and s to ~~", () => {
    expect(htmlToMarkdown("<p><del>old</del> <s>gone</s></p>")).toBe("~~old~~ ~~gone~~");
  });
});

describe("htmlToMarkdown — empty input", () => {
  it("returns an empty string for empty or blank HTML", () => {
    expect(htmlToMarkdown("")).toBe("");
    expect(htmlToMarkdown("   \n\t ")).toBe("");
  });
});

// ---------------------------------------------------------------------------
// postProcessMarkdown
// ---------------------------------------------------------------------------

describe("postProcessMarkdown", () => {
  it("collapses three or more newlines to a single blank line", () => {
    expect(postProcessMarkdown("a\n\n\nb\n\n\n\n\nc")).toBe("a\n\nb\n\nc");
  });

  it("keeps single newlines and single blank lines", () => {
    expect(postProcessMarkdown("a\nb\n\nc")).toBe("a\nb\n\nc");
  });

  it("removes trailing spaces and tabs from every line", () => {
    expect(postProcessMarkdown("first  \nsecond\t\nthird")).toBe("first\nsecond\nthird");
  });

  it("trims the whole string", () => {
    expect(postProcessMarkdown("\n\n  text  \n\n")).toBe("text");
  });

  it("removes zero-width and soft-hyphen characters", () => {
    expect(postProcessMarkdown("cr\u200Baw\u00ADler\uFEFF")).toBe("crawler");
  });

  it("returns an empty string for empty input", () => {
    expect(postProcessMarkdown("")).toBe("");
  });
});
