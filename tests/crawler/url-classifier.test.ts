/**
 * @fileoverview Tests for entry URL classification.
 */

import { describe, it, expect } from "vitest";
import { classify } from "../../src/crawler/url-classifier.js";

const DEFAULT_PATTERNS = ["*?sitemap*", "*&sitemap*"];

describe("classify — text files", () => {
  it("classifies a .txt path as text_file", () => {
    expect(classify("https://example.com/llms.txt", DEFAULT_PATTERNS)).toBe("text_file");
  });

  it("ignores case in the path", () => {
    expect(classify("https://example.com/Docs/LLMS-FULL.TXT", DEFAULT_PATTERNS)).toBe(
      "text_file",
    );
  });

  it("looks at the path, not the fragment or query", () => {
    expect(classify("https://example.com/notes.txt#top", DEFAULT_PATTERNS)).toBe("text_file");
    expect(classify("https://example.com/notes.txt?v=2", DEFAULT_PATTERNS)).toBe("text_file");
  });

  it("does not treat .txt in the middle of a path as a text file", () => {
    expect(classify("https://example.com/readme.txt.html", DEFAULT_PATTERNS)).toBe("webpage");
  });
});

describe("classify — sitemaps", () => {
  it("classifies sitemap*.xml paths as sitemap", () => {
    expect(classify("https://example.com/sitemap.xml", DEFAULT_PATTERNS)).toBe("sitemap");
    expect(classify("https://example.com/sitemap_index.xml", DEFAULT_PATTERNS)).toBe("sitemap");
    expect(classify("https://example.com/post-sitemap.xml?page=1", DEFAULT_PATTERNS)).toBe(
      "sitemap",
    );
  });

  it("requires both the word sitemap and the .xml suffix for the path rule", () => {
    expect(classify("https://example.com/feed.xml", DEFAULT_PATTERNS)).toBe("webpage");
    expect(classify("https://example.com/sitemap/", DEFAULT_PATTERNS)).toBe("webpage");
  });

  it("classifies URLs matching a sitemap query pattern", () => {
    expect(classify("https://example.com/index.php?sitemap=1", DEFAULT_PATTERNS)).toBe(
      "sitemap",
    );
    expect(
      classify("https://example.com/?page=2&sitemap=posts", DEFAULT_PATTERNS),
    ).toBe("sitemap");
  });

  it("uses the patterns it is given", () => {
    expect(classify("https://example.com/map", ["*/map"])).toBe("sitemap");
    expect(classify("https://example.com/index.php?sitemap=1", [])).toBe("webpage");
  });
});

describe("classify — totality", () => {
  it("falls back to webpage for ordinary pages", () => {
    expect(classify("https://example.com/", DEFAULT_PATTERNS)).toBe("webpage");
    expect(classify("https://example.com/blog/post-1", DEFAULT_PATTERNS)).toBe("webpage");
  });

  it("classifies strings that are not URLs without throwing", () => {
    expect(classify("not a url", DEFAULT_PATTERNS)).toBe("webpage");
    expect(classify("", DEFAULT_PATTERNS)).toBe("webpage");
    expect(classify("files/list.txt", DEFAULT_PATTERNS)).toBe("text_file");
  });

  it("is deterministic", () => {
    const url = "https://example.com/sitemap.xml";
    expect(classify(url, DEFAULT_PATTERNS)).toBe(classify(url, DEFAULT_PATTERNS));
  });
});
