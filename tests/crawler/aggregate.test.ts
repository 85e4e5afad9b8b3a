/**
 * @fileoverview Tests for the crawl outcome aggregator.
 */

import { describe, it, expect } from "vitest";
import { aggregate } from "../../src/crawler/aggregate.js";
import type { PageResult } from "../../src/crawler/types.js";

function pages(count: number): PageResult[] {
  return Array.from({ length: count }, (_unused, index) => ({
    url: `https://site.test/p${index + 1}`,
    content: `page ${index + 1}`,
    success: true,
    depth: 0,
  }));
}

describe("aggregate", () => {
  it("previews the first five URLs and a marker when more were crawled", () => {
    const outcome = aggregate("webpage", "https://site.test/", pages(7));

    expect(outcome.success).toBe(true);
    expect(outcome.pages_crawled).toBe(7);
    expect(outcome.urls_crawled_preview).toEqual([
      "https://site.test/p1",
      "https://site.test/p2",
      "https://site.test/p3",
      "https://site.test/p4",
      "https://site.test/p5",
      "...",
    ]);
  });

  it("lists every URL without a marker for three pages", () => {
    const outcome = aggregate("sitemap", "https://site.test/sitemap.xml", pages(3));

    expect(outcome.urls_crawled_preview).toEqual([
      "https://site.test/p1",
      "https://site.test/p2",
      "https://site.test/p3",
    ]);
  });

  it("adds no marker for exactly five pages", () => {
    const outcome = aggregate("webpage", "https://site.test/", pages(5));

    expect(outcome.urls_crawled_preview).toHaveLength(5);
    expect(outcome.urls_crawled_preview).not.toContain("...");
  });

  it("carries the crawl type, entry URL and results through", () => {
    const results = pages(2);
    const outcome = aggregate("text_file", "https://site.test/llms.txt", results);

    expect(outcome).toEqual({
      success: true,
      crawl_type: "text_file",
      url: "https://site.test/llms.txt",
      results,
      pages_crawled: 2,
      urls_crawled_preview: ["https://site.test/p1", "https://site.test/p2"],
    });
  });

  it("reports No content found for an empty crawl", () => {
    expect(aggregate("webpage", "https://site.test/", [])).toEqual({
      success: false,
      crawl_type: "webpage",
      url: "https://site.test/",
      results: [],
      pages_crawled: 0,
      urls_crawled_preview: [],
      error: "No content found",
    });
  });
});
