/**
 * @fileoverview Tests for the wikipedia_search tool handler with the
 * Wikipedia service mocked.
 */

import { beforeEach, describe, it, expect, vi } from "vitest";
import { handleWikipediaSearch } from "../../src/tools/wikipedia-search.js";
import { searchWikipedia } from "../../src/services/wikipedia.js";
import { SearchError } from "../../src/utils/errors.js";
import { responseJson } from "../helpers/tool-response.js";

vi.mock("../../src/services/wikipedia.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../../src/services/wikipedia.js")>()),
  searchWikipedia: vi.fn(),
}));

const searchWikipediaMock = vi.mocked(searchWikipedia);

beforeEach(() => {
  searchWikipediaMock.mockReset();
});

describe("handleWikipediaSearch", () => {
  it("returns the article summary", async () => {
    searchWikipediaMock.mockResolvedValue({
      title: "Web crawler",
      summary: "A web crawler systematically browses the web.",
      url: "https://en.wikipedia.org/wiki/Web_crawler",
    });

    const response = await handleWikipediaSearch({
      query: "web crawler",
      sentences: 1,
      language: "en",
    });

    expect(searchWikipediaMock).toHaveBeenCalledWith("web crawler", 1, "en");
    expect(responseJson(response)).toEqual({
      query: "web crawler",
      title: "Web crawler",
      summary: "A web crawler systematically browses the web.",
      url: "https://en.wikipedia.org/wiki/Web_crawler",
    });
  });

  it("reports a search without results", async () => {
    searchWikipediaMock.mockResolvedValue(null);

    const response = await handleWikipediaSearch({
      query: "zzqx",
      sentences: 3,
      language: "en",
    });

    expect(response.isError).toBeUndefined();
    expect(responseJson(response)).toEqual({
      query: "zzqx",
      summary: null,
      url: null,
      error: 'No Wikipedia article found for "zzqx"',
    });
  });

  it("reports API failures in the document", async () => {
    searchWikipediaMock.mockRejectedValue(new SearchError("Wikipedia API returned HTTP 503", 503));

    const response = await handleWikipediaSearch({
      query: "graph",
      sentences: 3,
      language: "en",
    });

    expect(response.isError).toBeUndefined();
    expect(responseJson(response)).toEqual({
      query: "graph",
      summary: null,
      url: null,
      error: "[SEARCH_FAILED] Wikipedia API returned HTTP 503",
    });
  });
});
