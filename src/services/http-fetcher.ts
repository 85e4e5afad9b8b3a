/**
 * @fileoverview The production {@link FetchPort}: HTTP retrieval through
 * {@link safeFetch}, page extraction through the extractor pipeline, and
 * batches through the memory-aware {@link Dispatcher}.
 *
 * Built once in `index.ts` and handed to every tool handler. It holds no
 * per-crawl state, so concurrent tool calls can share it.
 *
 * Every method resolves; failures come back as `success: false` outcomes
 * carrying the {@link formatError} string.
 *
 * @module services/http-fetcher
 */

import type {
  FetchOutcome,
  FetchPort,
  RawFetchOutcome,
} from "../crawler/fetch-port.js";
import { internalUrls } from "../crawler/link-resolver.js";
import { extractPage } from "../extractor/pipeline.js";
import { formatError } from "../utils/errors.js";
import { Dispatcher, type DispatchPolicy } from "./dispatcher.js";
import { safeFetch } from "./fetch.js";

const XML_ACCEPT =
  "application/xml, text/xml, application/rss+xml;q=0.9, */*;q=0.1";

export class HttpFetcher implements FetchPort {
  private readonly dispatcher: Dispatcher;

  constructor(dispatcher: Dispatcher = new Dispatcher()) {
    this.dispatcher = dispatcher;
  }

  async fetchRaw(url: string): Promise<RawFetchOutcome> {
    try {
      const fetched = await safeFetch(url, { accept: XML_ACCEPT });
      return {
        url: fetched.url,
        success: true,
        body: fetched.body,
        error: null,
      };
    } catch (error) {
      return {
        url,
        success: false,
        body: null,
        error: formatError(error),
      };
    }
  }

  async fetchPage(url: string): Promise<FetchOutcome> {
    try {
      const page = await extractPage(url);
      return {
        url: page.url,
        success: true,
        content: page.content,
        error: null,
        internalLinks: internalUrls(page.links),
      };
    } catch (error) {
      return {
        url,
        success: false,
        content: null,
        error: formatError(error),
        internalLinks: [],
      };
    }
  }

  fetchMany(
    urls: readonly string[],
    policy: DispatchPolicy,
  ): Promise<FetchOutcome[]> {
    return this.dispatcher.run(urls, (url) => this.fetchPage(url), policy);
  }
}
