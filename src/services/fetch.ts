/**
 * @fileoverview Guarded HTTP fetch for the mcp-web-crawler MCP server.
 *
 * Wraps the global `fetch()` with the controls every outbound request in
 * this server goes through:
 *
 * 1. **Scheme check** - only `http:` and `https:`.
 * 2. **Address guard** - optional refusal of hosts resolving to reserved
 *    addresses (see `utils/network`).
 * 3. **Timeout** - `AbortSignal.timeout(config.fetchTimeout)`.
 * 4. **Content-Type filter** - optional allow-list of MIME types.
 * 5. **Size cap** - the body is streamed and abandoned past
 *    `config.maxResponseSize`.
 *
 * ```
 *   safeFetch(url, options)
 *     |
 *     +--> URL parsing, scheme check
 *     +--> validateHostname()         (when blockPrivateNetworks)
 *     +--> fetch() with timeout, User-Agent, redirect: "follow"
 *     +--> status check, Content-Type check
 *     +--> readBodyWithLimit()
 *     +--> FetchResult
 * ```
 *
 * Concurrency is not limited here; batch callers go through the
 * dispatcher.
 *
 * @module services/fetch
 */

import { config } from "../config.js";
import { validateHostname } from "../utils/network.js";
import {
  FetchError,
  ContentTypeError,
  ResponseTooLargeError,
  TimeoutError,
} from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * A successful HTTP response, fully read.
 */
export interface FetchResult {
  /** The response body decoded as UTF-8. */
  body: string;

  /** The final URL after redirects. */
  url: string;

  /** Lowercased MIME type without parameters, `""` when absent. */
  mimeType: string;
}

/**
 * Per-call overrides for {@link safeFetch}.
 */
export interface SafeFetchOptions {
  /**
   * MIME types the caller can handle. Omit to accept any type.
   */
  acceptedTypes?: ReadonlySet<string>;

  /** Value of the `Accept` request header. */
  accept?: string;

  /** Defaults to `config.blockPrivateNetworks`. */
  blockPrivateNetworks?: boolean;

  /** Defaults to `config.fetchTimeout`. */
  timeoutMs?: number;

  /** Defaults to `config.maxResponseSize`. */
  maxBytes?: number;
}

// ---------------------------------------------------------------------------
// Content-Type Handling
// ---------------------------------------------------------------------------

/**
 * MIME types the page pipeline reads: markup it converts to Markdown and
 * plaintext it passes through.
 */
export const PAGE_CONTENT_TYPES: ReadonlySet<string> = new Set([
  "text/html",
  "application/xhtml+xml",
  "text/xml",
  "application/xml",
  "text/plain",
  "text/markdown",
  "text/x-markdown",
]);

/**
 * Extract the lowercased MIME type from a Content-Type header value.
 *
 * @example
 * ```ts
 * extractMimeType("text/html; charset=utf-8"); // "text/html"
 * extractMimeType(null);                         // ""
 * ```
 */
export function extractMimeType(contentType: string | null): string {
  if (!contentType) {
    return "";
  }
  return contentType.split(";")[0].trim().toLowerCase();
}

// ---------------------------------------------------------------------------
// Body Reading
// ---------------------------------------------------------------------------

/**
 * Read a response body as UTF-8 text, refusing to hold more than `maxBytes`.
 *
 * A declared `Content-Length` over the limit is rejected before reading.
 * Otherwise the stream is read chunk by chunk and cancelled as soon as the
 * running total crosses the limit.
 *
 * @throws {ResponseTooLargeError} When the body is over the limit.
 * @throws {FetchError} When the stream fails mid-read.
 */
async function readBodyWithLimit(
  response: Response,
  maxBytes: number,
): Promise<string> {
  const declared = parseInt(response.headers.get("content-length") ?? "", 10);
  if (!isNaN(declared) && declared > maxBytes) {
    throw new ResponseTooLargeError(
      `Response Content-Length (${declared} bytes) exceeds limit of ${maxBytes} bytes`,
    );
  }

  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder("utf-8", { fatal: false });
  const chunks: string[] = [];
  let totalBytes = 0;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel();
        throw new ResponseTooLargeError(
          `Response body exceeds limit of ${maxBytes} bytes (read ${totalBytes} bytes so far)`,
        );
      }

      chunks.push(decoder.decode(value, { stream: true }));
    }
    chunks.push(decoder.decode());
  } catch (error) {
    if (error instanceof ResponseTooLargeError) {
      throw error;
    }
    throw new FetchError(
      `Error reading response body: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return chunks.join("");
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Fetch a URL through every guard and return its body.
 *
 * @throws {FetchError} Invalid URL, unsupported scheme, network failure or non-2xx status.
 * @throws {SecurityError} Host resolves to a reserved address.
 * @throws {TimeoutError} No complete response within the timeout.
 * @throws {ContentTypeError} MIME type outside `options.acceptedTypes`.
 * @throws {ResponseTooLargeError} Body over the size limit.
 *
 * @example
 * ```ts
 * const page = await safeFetch("https://example.com", {
 *   acceptedTypes: PAGE_CONTENT_TYPES,
 * });
 * page.mimeType; // "text/html"
 * ```
 */
export async function safeFetch(
  url: string,
  options: SafeFetchOptions = {},
): Promise<FetchResult> {
  const timeoutMs = options.timeoutMs ?? config.fetchTimeout;
  const maxBytes = options.maxBytes ?? config.maxResponseSize;
  const blockPrivate =
    options.blockPrivateNetworks ?? config.blockPrivateNetworks;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new FetchError(`Invalid URL: ${url}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new FetchError(
      `Unsupported protocol: ${parsed.protocol} (only http: and https: are allowed)`,
    );
  }

  if (blockPrivate) {
    await validateHostname(parsed.hostname);
  }

  let response: Response;
  try {
    response = await fetch(parsed.href, {
      signal: AbortSignal.timeout(timeoutMs),
      headers: {
        "User-Agent": config.userAgent,
        Accept: options.accept ?? "*/*",
      },
      redirect: "follow",
    });
  } catch (error) {
    if (
      error instanceof DOMException &&
      (error.name === "TimeoutError" || error.name === "AbortError")
    ) {
      throw new TimeoutError(
        `Request to ${parsed.href} timed out after ${timeoutMs}ms`,
      );
    }
    throw new FetchError(
      `Failed to fetch ${parsed.href}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (!response.ok) {
    throw new FetchError(
      `HTTP ${response.status} ${response.statusText} for ${parsed.href}`,
      response.status,
    );
  }

  const mimeType = extractMimeType(response.headers.get("content-type"));
  if (options.acceptedTypes && !options.acceptedTypes.has(mimeType)) {
    throw new ContentTypeError(
      `Unacceptable Content-Type: "${mimeType || "(none)"}" for ${parsed.href}. ` +
        `Expected one of: ${Array.from(options.acceptedTypes).join(", ")}`,
    );
  }

  const body = await readBodyWithLimit(response, maxBytes);

  return {
    body,
    // Undici leaves `url` empty on synthetic responses.
    url: response.url || parsed.href,
    mimeType,
  };
}
