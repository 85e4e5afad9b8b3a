/**
 * @module crawler/frontier
 * @fileoverview Breadth-first traversal engine: level-by-level expansion from
 * seed URLs, bounded by depth, deduplicated through a per-call visited set.
 *
 * ## Algorithm
 *
 * ```
 *   seeds ──normalize──> [level 0] ──fetchMany──> outcomes
 *                            ^                        |
 *                            |     internal links of successful pages
 *                            |                        |
 *                            +──── minus visited <────+
 * ```
 *
 * Each iteration fetches one whole level through {@link FetchPort.fetchMany}
 * and only then computes the next one, so there is a single suspension point
 * per level and the visited set never has concurrent writers.
 *
 * ## The visited set
 * URLs are marked visited when they are *scheduled*, not when their fetch
 * completes. Two pages on the same level that link to each other (or back
 * to a seed) therefore never cause a second fetch. After a fetch, the
 * normalized final URL is marked too, so a redirect target reached from a
 * different address is not scheduled again.
 *
 * Visited URLs are compared in normalized form (fragment stripped); the URL
 * that is actually fetched is the first spelling seen for that key.
 *
 * ## Depth
 * `maxDepth` counts levels. The seeds are the first level, so `maxDepth = 1`
 * fetches only the seeds and `maxDepth = 0` fetches nothing.
 *
 * ## Failures
 * A failed fetch, or one that produced no content, contributes neither a
 * result nor links. It never affects its siblings.
 *
 * @example
 * ```ts
 * const results = await traverse(
 *   { seedUrls: ["https://example.com/"], maxDepth: 2, maxConcurrency: 5 },
 *   fetcher,
 * );
 * results.map((page) => [page.depth, page.url]);
 * // [[0, "https://example.com/"], [1, "https://example.com/about"], ...]
 * ```
 */

import { config } from "../config.js";
import { normalizeUrl } from "../utils/url.js";
import type { DispatchPolicy, FetchOutcome, FetchPort } from "./fetch-port.js";
import type { CrawlRequest, PageResult } from "./types.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Memory throttle settings for the batches of one traversal. The concurrency
 * ceiling comes from the request.
 */
export type ThrottleSettings = Omit<DispatchPolicy, "maxConcurrency">;

/**
 * Mutable state of one traversal call. Created fresh by every call and
 * never shared.
 *
 * @internal
 */
interface TraversalState {
  /** Normalized URLs already scheduled. */
  visited: Set<string>;

  /** Normalized final URLs that already produced a result. */
  resultKeys: Set<string>;

  results: PageResult[];
}

/**
 * One breadth-first level: normalized key to the URL that will be fetched.
 * Map insertion order is request order.
 *
 * @internal
 */
type Level = Map<string, string>;

/* ────────────────────────────────────────────────────────────────────────────
 * Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

function defaultThrottle(): ThrottleSettings {
  return {
    memoryThresholdPercent: config.memoryThresholdPercent,
    checkIntervalMs: config.memoryCheckInterval,
  };
}

/** Builds a level from candidate URLs, skipping visited and repeated keys. */
function buildLevel(candidates: Iterable<string>, visited: ReadonlySet<string>): Level {
  const level: Level = new Map();
  for (const url of candidates) {
    const key = normalizeUrl(url);
    if (!visited.has(key) && !level.has(key)) {
      level.set(key, url);
    }
  }
  return level;
}

function hasContent(
  outcome: FetchOutcome,
): outcome is FetchOutcome & { content: string } {
  return outcome.success && outcome.content !== null && outcome.content !== "";
}

function toPageResult(outcome: FetchOutcome & { content: string }, depth: number): PageResult {
  return {
    url: outcome.url,
    content: outcome.content,
    success: true,
    depth,
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Public API
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Run a breadth-first traversal from `request.seedUrls`.
 *
 * Results are in level order and, within a level, in the order the URLs
 * were requested.
 *
 * @param request - Seeds and bounds. Not modified.
 * @param fetcher - Retrieval port; its batch operation is called once per level.
 * @param throttle - Memory throttle for each batch. Defaults to the
 *   configured threshold and interval.
 */
export async function traverse(
  request: CrawlRequest,
  fetcher: FetchPort,
  throttle: ThrottleSettings = defaultThrottle(),
): Promise<PageResult[]> {
  const state: TraversalState = {
    visited: new Set(),
    resultKeys: new Set(),
    results: [],
  };
  const policy: DispatchPolicy = {
    ...throttle,
    maxConcurrency: request.maxConcurrency,
  };

  let current = buildLevel(request.seedUrls, state.visited);
  let depth = 0;

  while (depth < request.maxDepth) {
    if (current.size === 0) {
      break;
    }

    for (const key of current.keys()) {
      state.visited.add(key);
    }

    const urls = [...current.values()];
    console.error(`[frontier] Level ${depth}: fetching ${urls.length} URL(s)`);
    const outcomes = await fetcher.fetchMany(urls, policy);

    const candidates: string[] = [];
    let failed = 0;
    for (const outcome of outcomes) {
      const finalKey = normalizeUrl(outcome.url);
      state.visited.add(finalKey);
      if (!hasContent(outcome)) {
        failed += 1;
        continue;
      }
      // Two requested URLs can redirect to the same page.
      if (state.resultKeys.has(finalKey)) {
        continue;
      }
      state.resultKeys.add(finalKey);
      state.results.push(toPageResult(outcome, depth));
      candidates.push(...outcome.internalLinks);
    }

    if (failed > 0) {
      console.error(`[frontier] Level ${depth}: ${failed} URL(s) yielded no content`);
    }

    current = buildLevel(candidates, state.visited);
    depth += 1;
  }

  console.error(
    `[frontier] Traversal finished: ${state.results.length} page(s), ${state.visited.size} URL(s) visited`,
  );
  return state.results;
}

/**
 * Fetch a flat list of URLs in one batch without following any links.
 * Every successful page is a depth-0 result; duplicates (after
 * normalization) are fetched once.
 */
export function crawlBatch(
  urls: readonly string[],
  maxConcurrency: number,
  fetcher: FetchPort,
  throttle: ThrottleSettings = defaultThrottle(),
): Promise<PageResult[]> {
  return traverse({ seedUrls: urls, maxDepth: 1, maxConcurrency }, fetcher, throttle);
}
