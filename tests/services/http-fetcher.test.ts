/**
 * @fileoverview Tests for the production Fetch Port over a stubbed global
 * fetch. Hosts are public IP literals so the address guard stays on without
 * DNS lookups.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { HttpFetcher } from "../../src/services/http-fetcher.js";
import { Dispatcher } from "../../src/services/dispatcher.js";

const ORIGIN = "http://203.0.113.10";

const POLICY = { maxConcurrency: 2, memoryThresholdPercent: 70, checkIntervalMs: 1000 };

const ARTICLE_HTML = `
  <html>
    <head><title>Guide</title></head>
    <body>
      <nav><a href="/docs">Docs</a> <a href="https://elsewhere.test/">Elsewhere</a></nav>
      <article>
        <h1>Guide</h1>
        <p>This guide explains how the crawler walks a site level by level and
        records every address it has already scheduled so nothing is fetched
        twice during a single crawl.</p>
        <p>The second paragraph gives the reader more detail so the extractor
        has enough text to recognise the article body on this page.</p>
        <p>Read the <a href="/docs/setup#install">setup notes</a> next.</p>
      </article>
    </body>
  </html>
`;

type Route = () => Response;

let routes: Map<string, Route>;

const fetchMock = vi.fn(async (input: string | URL | Request): Promise<Response> => {
  const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
  const route = routes.get(url);
  return route ? route() : new Response("not found", { status: 404 });
});

beforeEach(() => {
  routes = new Map();
  fetchMock.mockClear();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function serve(path: string, body: string, contentType: string): void {
  routes.set(`${ORIGIN}${path}`, () => new Response(body, { headers: { "Content-Type": contentType } }));
}

// ---------------------------------------------------------------------------
// fetchPage
// ---------------------------------------------------------------------------

describe("HttpFetcher.fetchPage", () => {
  it("returns Markdown content and same-host links for an HTML page", async () => {
    serve("/guide", ARTICLE_HTML, "text/html; charset=utf-8");

    const outcome = await new HttpFetcher().fetchPage(`${ORIGIN}/guide`);

    expect(outcome.success).toBe(true);
    expect(outcome.error).toBeNull();
    expect(outcome.content).toContain("level by level");
    expect(outcome.internalLinks).toEqual([`${ORIGIN}/docs`, `${ORIGIN}/docs/setup`]);
  });

  it("returns a plain text body as-is, trimmed, without links", async () => {
    serve("/llms.txt", "\n# Site index\n- /docs\n\n", "text/plain");

    const outcome = await new HttpFetcher().fetchPage(`${ORIGIN}/llms.txt`);

    expect(outcome).toEqual({
      url: `${ORIGIN}/llms.txt`,
      success: true,
      content: "# Site index\n- /docs",
      error: null,
      internalLinks: [],
    });
  });

  it("reports an HTTP error as a failed outcome", async () => {
    const outcome = await new HttpFetcher().fetchPage(`${ORIGIN}/missing`);

    expect(outcome.success).toBe(false);
    expect(outcome.content).toBeNull();
    expect(outcome.error).toMatch(/^\[FETCH_FAILED\] HTTP 404/);
    expect(outcome.internalLinks).toEqual([]);
  });

  it("reports a rejected content type as a failed outcome", async () => {
    serve("/report.pdf", "%PDF-1.7", "application/pdf");

    const outcome = await new HttpFetcher().fetchPage(`${ORIGIN}/report.pdf`);

    expect(outcome.error).toMatch(/^\[CONTENT_TYPE_REJECTED\]/);
  });

  it("reports a page without readable text as an extraction failure", async () => {
    serve("/blank", "<html><body><script>render()</script></body></html>", "text/html");

    const outcome = await new HttpFetcher().fetchPage(`${ORIGIN}/blank`);

    expect(outcome.success).toBe(false);
    expect(outcome.error).toBe(`[EXTRACTION_FAILED] No readable content in ${ORIGIN}/blank`);
  });

  it("refuses reserved addresses without sending a request", async () => {
    const outcome = await new HttpFetcher().fetchPage("http://127.0.0.1/admin");

    expect(outcome.success).toBe(false);
    expect(outcome.error).toMatch(/^\[SSRF_BLOCKED\]/);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// fetchRaw
// ---------------------------------------------------------------------------

describe("HttpFetcher.fetchRaw", () => {
  it("returns the body without processing", async () => {
    const xml = "<urlset><url><loc>http://203.0.113.10/a</loc></url></urlset>";
    serve("/sitemap.xml", xml, "application/xml");

    const outcome = await new HttpFetcher().fetchRaw(`${ORIGIN}/sitemap.xml`);

    expect(outcome).toEqual({
      url: `${ORIGIN}/sitemap.xml`,
      success: true,
      body: xml,
      error: null,
    });
  });

  it("reports failures in the outcome", async () => {
    const outcome = await new HttpFetcher().fetchRaw(`${ORIGIN}/sitemap.xml`);

    expect(outcome.success).toBe(false);
    expect(outcome.body).toBeNull();
    expect(outcome.error).toMatch(/^\[FETCH_FAILED\]/);
  });
});

// ---------------------------------------------------------------------------
// fetchMany
// ---------------------------------------------------------------------------

describe("HttpFetcher.fetchMany", () => {
  it("returns one outcome per URL in request order, isolating failures", async () => {
    serve("/one.txt", "one", "text/plain");
    serve("/three.txt", "three", "text/plain");
    const fetcher = new HttpFetcher(new Dispatcher(() => 10));

    const outcomes = await fetcher.fetchMany(
      [`${ORIGIN}/one.txt`, `${ORIGIN}/two.txt`, `${ORIGIN}/three.txt`],
      POLICY,
    );

    expect(outcomes.map((outcome) => [outcome.success, outcome.content])).toEqual([
      [true, "one"],
      [false, null],
      [true, "three"],
    ]);
  });
});
