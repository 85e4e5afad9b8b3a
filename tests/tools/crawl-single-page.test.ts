/**
 * @fileoverview Tests for the crawl_single_page tool handler.
 */

import { describe, it, expect } from "vitest";
import { handleCrawlSinglePage } from "../../src/tools/crawl-single-page.js";
import { FakeFetcher, ThrowingFetcher } from "../helpers/fake-fetcher.js";
import { responseJson } from "../helpers/tool-response.js";

describe("handleCrawlSinglePage", () => {
  it("returns the final URL and content", async () => {
    const fetcher = new FakeFetcher({
      "https://site.test/old": { redirectTo: "https://site.test/new", content: "# New" },
    });

    const response = await handleCrawlSinglePage({ url: "https://site.test/old" }, { fetcher });

    expect(response.isError).toBeUndefined();
    expect(responseJson(response)).toEqual({ url: "https://site.test/new", content: "# New" });
  });

  it("reports a failed fetch in the document", async () => {
    const response = await handleCrawlSinglePage(
      { url: "https://site.test/missing" },
      { fetcher: new FakeFetcher() },
    );

    expect(response.isError).toBeUndefined();
    expect(responseJson(response)).toEqual({
      success: false,
      url: "https://site.test/missing",
      error: "[FETCH_FAILED] HTTP 404 Not Found",
    });
  });

  it("flags an unexpected exception", async () => {
    const response = await handleCrawlSinglePage(
      { url: "https://site.test/" },
      { fetcher: new ThrowingFetcher() },
    );

    expect(response.isError).toBe(true);
    expect(responseJson(response)).toEqual({
      success: false,
      url: "https://site.test/",
      error: "fetcher exploded",
    });
  });
});
