/**
 * @module crawler/types
 * @fileoverview Data shared by the crawl engine and the tool layer.
 */

/** Retrieval strategy chosen for an entry URL. */
export type CrawlType = "text_file" | "sitemap" | "webpage";

/**
 * Inputs to one breadth-first traversal. Not mutated by the engine.
 */
export interface CrawlRequest {
  readonly seedUrls: readonly string[];

  /** Number of levels to fetch; the seeds are level one. `0` fetches nothing. */
  readonly maxDepth: number;

  /** Ceiling on fetches in flight within a level. */
  readonly maxConcurrency: number;
}

/**
 * One successfully retrieved page.
 */
export interface PageResult {
  /** URL after redirects. */
  url: string;

  /** Opaque text payload (Markdown or plaintext). */
  content: string;

  success: boolean;

  /**
   * Breadth-first level the page was fetched at: `0` for seeds, sitemap
   * entries and text files, `1` for pages linked from a seed, and so on.
   */
  depth: number;
}

/**
 * The `deep_crawl` response document.
 */
export interface CrawlOutcome {
  success: boolean;
  crawl_type: CrawlType;

  /** Entry URL as given by the caller. */
  url: string;

  results: PageResult[];
  pages_crawled: number;

  /** At most five URLs, then `"..."` when more pages were crawled. */
  urls_crawled_preview: string[];

  error?: string;
}
