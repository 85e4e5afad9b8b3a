/**
 * @module utils/errors
 * @fileoverview Error class hierarchy for mcp-web-crawler.
 *
 * Every application error extends {@link CrawlerError}, which carries a
 * machine-readable `code` next to the human-readable `message`. The code
 * survives JSON serialization into tool responses, where the class does not.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── CrawlerError (base)      ─── code: string
 *         ├── FetchError            ─── "FETCH_FAILED"   + optional statusCode
 *         ├── SecurityError         ─── "SSRF_BLOCKED"
 *         ├── ContentTypeError      ─── "CONTENT_TYPE_REJECTED"
 *         ├── ResponseTooLargeError ─── "RESPONSE_TOO_LARGE"
 *         ├── TimeoutError          ─── "TIMEOUT"
 *         ├── ExtractionError       ─── "EXTRACTION_FAILED"
 *         ├── SitemapParseError     ─── "SITEMAP_PARSE_FAILED"
 *         ├── SearchError           ─── "SEARCH_FAILED"  + optional statusCode
 *         └── ConfigurationError    ─── "CONFIG_MISSING"
 * ```
 *
 * {@link formatError} is the single place errors become strings.
 *
 * @example
 * ```ts
 * import { FetchError, formatError } from "./utils/errors.js";
 *
 * formatError(new FetchError("HTTP 503 Service Unavailable", 503));
 * // => "[FETCH_FAILED] HTTP 503 Service Unavailable"
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base class for all mcp-web-crawler errors.
 *
 * Subclasses get a `name` equal to their class name, so stack traces read
 * `FetchError: ...` instead of `Error: ...`.
 */
export class CrawlerError extends Error {
  /**
   * Stable machine-readable code in SCREAMING_SNAKE_CASE. Part of the tool
   * response surface; renaming one is a breaking change.
   */
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Concrete Error Subclasses
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * An HTTP fetch failed, at the network level (DNS, TCP, TLS) or with a
 * non-2xx status. {@link statusCode} is set only when the server answered.
 */
export class FetchError extends CrawlerError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message, "FETCH_FAILED");
    this.statusCode = statusCode;
  }
}

/**
 * A request was refused before leaving the host because its target resolves
 * to a private or reserved address, or could not be resolved at all.
 */
export class SecurityError extends CrawlerError {
  constructor(message: string) {
    super(message, "SSRF_BLOCKED");
  }
}

/** The response Content-Type is not one the page pipeline can read. */
export class ContentTypeError extends CrawlerError {
  constructor(message: string) {
    super(message, "CONTENT_TYPE_REJECTED");
  }
}

/** The response body crossed the configured size limit. */
export class ResponseTooLargeError extends CrawlerError {
  constructor(message: string) {
    super(message, "RESPONSE_TOO_LARGE");
  }
}

/** A request exceeded its time budget. */
export class TimeoutError extends CrawlerError {
  constructor(message: string) {
    super(message, "TIMEOUT");
  }
}

/**
 * Content extraction produced nothing usable: a DOM the extractor could not
 * read, or an empty page after boilerplate removal.
 */
export class ExtractionError extends CrawlerError {
  constructor(message: string) {
    super(message, "EXTRACTION_FAILED");
  }
}

/**
 * A sitemap body holds no XML element. The sitemap expander logs it and
 * carries on with zero URLs.
 *
 * @example
 * ```ts
 * throw new SitemapParseError("No XML element found in https://example.com/sitemap.xml");
 * ```
 */
export class SitemapParseError extends CrawlerError {
  constructor(message: string) {
    super(message, "SITEMAP_PARSE_FAILED");
  }
}

/**
 * An external search API (Serper, Wikipedia) failed or answered with a
 * payload of the wrong shape.
 */
export class SearchError extends CrawlerError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message, "SEARCH_FAILED");
    this.statusCode = statusCode;
  }
}

/** A required setting, such as an API key, is not configured. */
export class ConfigurationError extends CrawlerError {
  constructor(message: string) {
    super(message, "CONFIG_MISSING");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Convert any caught value to a single-line string for a tool response or a
 * log line.
 *
 * - {@link CrawlerError} subclasses: `"[CODE] message"`.
 * - Other `Error` instances: `message`.
 * - Anything else: `String(error)`.
 *
 * @example
 * ```ts
 * formatError(new TimeoutError("Request timed out after 10000ms"));
 * // => "[TIMEOUT] Request timed out after 10000ms"
 *
 * formatError(new TypeError("fetch failed"));
 * // => "fetch failed"
 *
 * formatError(42);
 * // => "42"
 * ```
 */
export function formatError(error: unknown): string {
  // CrawlerError first: it also matches `instanceof Error`.
  if (error instanceof CrawlerError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
