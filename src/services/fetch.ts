/**
 * @fileoverview HTTP fetch primitive used by the crawl engine and the robots cache.
 *
 * The crawler never calls `fetch()` directly. It talks to a {@link Fetcher},
 * a function from {@link FetchRequest} to {@link FetchResponse}. This module
 * provides the production implementation on Node's global `fetch`, and a
 * seed probe built on any `Fetcher`. Tests substitute an in-process fake web.
 *
 * ## Contract
 *
 * - Any HTTP status resolves: 404 and 429 are answers, and the caller
 *   decides what they mean.
 * - Transport failures reject with typed errors:
 *   {@link TimeoutError}, {@link ConnectionError}, {@link FetchError}.
 * - The body is read as UTF-8 text with a byte cap
 *   ({@link ResponseTooLargeError} past it), or not read at all when
 *   `readBody` is false.
 *
 * ## Architecture
 *
 * ```
 *   httpFetch(request)
 *     |
 *     +--> Native fetch() with:
 *     |     - AbortSignal.timeout(request.timeoutMs), merged with request.signal
 *     |     - configured headers (User-Agent, Accept, ...)
 *     |     - redirect "follow" or "manual"
 *     |
 *     +--> Error translation (abort -> TimeoutError, socket -> ConnectionError)
 *     |
 *     +--> Body: streamed with a byte counter, or cancelled
 *     |
 *     +--> FetchResponse { url, statusCode, contentType, body }
 * ```
 *
 * @module services/fetch
 */

import { config } from "../config.js";
import {
  ConnectionError,
  FetchError,
  ResponseTooLargeError,
  TimeoutError,
} from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** One outbound HTTP request. */
export interface FetchRequest {
  /** Absolute http(s) URL. */
  url: string;

  /** @default "GET" */
  method?: "GET" | "HEAD";

  /** Request headers, sent as given. */
  headers: Record<string, string>;

  /** Time budget for the whole exchange, headers and body, in milliseconds. */
  timeoutMs: number;

  /** Follow 3xx responses to their target. When false a 3xx is returned as is. */
  followRedirects: boolean;

  /**
   * Whether to read the body. A probe sets this to false so only the status
   * line and headers are transferred.
   *
   * @default true
   */
  readBody?: boolean;

  /** External cancellation, combined with the timeout. */
  signal?: AbortSignal;
}

/** The answer to a {@link FetchRequest}. */
export interface FetchResponse {
  /** Final URL after redirects. Relative links on the page resolve against it. */
  url: string;

  statusCode: number;

  /** Raw `Content-Type` header, or an empty string when absent. */
  contentType: string;

  /** Decoded body text, empty when not read. */
  body: string;
}

/** The transport the crawl engine and robots cache depend on. */
export type Fetcher = (request: FetchRequest) => Promise<FetchResponse>;

/** Options for {@link createHttpFetcher}. */
export interface HttpFetcherOptions {
  /** @default config.maxResponseSize */
  maxResponseSize?: number;
}

// ---------------------------------------------------------------------------
// Content-Type Allowlist
// ---------------------------------------------------------------------------

/**
 * MIME types the crawler treats as HTML pages. Everything else is skipped
 * without invoking extraction.
 */
export const HTML_CONTENT_TYPES: ReadonlySet<string> = new Set<string>([
  "text/html",
  "application/xhtml+xml",
]);

/**
 * Extracts the MIME type from a Content-Type header value.
 *
 * @example
 * ```typescript
 * extractMimeType("text/html; charset=utf-8");  // => "text/html"
 * extractMimeType("APPLICATION/XHTML+XML");     // => "application/xhtml+xml"
 * extractMimeType("");                          // => ""
 * ```
 */
export function extractMimeType(contentType: string | null | undefined): string {
  if (!contentType) {
    return "";
  }
  return contentType.split(";")[0].trim().toLowerCase();
}

/** Whether a Content-Type header denotes an HTML page. */
export function isHtmlContentType(contentType: string | null | undefined): boolean {
  return HTML_CONTENT_TYPES.has(extractMimeType(contentType));
}

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

/**
 * Reads a Response body as text with a size limit enforced via streaming.
 *
 * The Content-Length header is checked first when present, but the byte
 * counter on the stream is what enforces the limit: the header is optional
 * and absent for chunked transfer encoding.
 *
 * @throws {ResponseTooLargeError} If the body exceeds the size limit.
 */
async function readBodyWithLimit(
  response: Response,
  maxBytes: number,
): Promise<string> {
  const contentLength = response.headers.get("content-length");
  if (contentLength) {
    const declaredSize = parseInt(contentLength, 10);
    if (!isNaN(declaredSize) && declaredSize > maxBytes) {
      await response.body?.cancel();
      throw new ResponseTooLargeError(
        `Response Content-Length (${declaredSize} bytes) exceeds limit of ${maxBytes} bytes`,
      );
    }
  }

  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  // fatal: false replaces malformed byte sequences with U+FFFD instead of throwing.
  const decoder = new TextDecoder("utf-8", { fatal: false });

  const chunks: string[] = [];
  let totalBytes = 0;

  try {
    while (true) {
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

      // stream: true keeps multi-byte characters split across chunks intact.
      chunks.push(decoder.decode(value, { stream: true }));
    }

    chunks.push(decoder.decode());
  } catch (error) {
    if (error instanceof ResponseTooLargeError) {
      throw error;
    }
    throw translateFetchError(error, response.url);
  }

  return chunks.join("");
}

/**
 * Map whatever `fetch()` or a body read rejected with onto the typed
 * error hierarchy.
 */
function translateFetchError(
  error: unknown,
  url: string,
  timeoutMs?: number,
): Error {
  if (error instanceof DOMException && error.name === "TimeoutError") {
    return new TimeoutError(
      timeoutMs === undefined
        ? `Request to ${url} timed out`
        : `Request to ${url} timed out after ${timeoutMs}ms`,
    );
  }

  if (error instanceof DOMException && error.name === "AbortError") {
    return new FetchError(`Request to ${url} was aborted`);
  }

  // undici reports socket-level failures as TypeError("fetch failed") with
  // the system error attached as `cause`.
  if (error instanceof TypeError && error.cause instanceof Error) {
    return new ConnectionError(
      `Connection error for ${url}: ${error.cause.message}`,
    );
  }

  return new FetchError(
    `Failed to fetch ${url}: ${error instanceof Error ? error.message : String(error)}`,
  );
}

// ---------------------------------------------------------------------------
// Main Export
// ---------------------------------------------------------------------------

/**
 * Build a {@link Fetcher} on Node's global `fetch`.
 *
 * @example
 * ```typescript
 * const fetcher = createHttpFetcher({ maxResponseSize: 2 * 1024 * 1024 });
 * const res = await fetcher({
 *   url: "https://example.com/",
 *   headers: { "User-Agent": "PoliteCrawl/1.0" },
 *   timeoutMs: 15000,
 *   followRedirects: true,
 * });
 * console.log(res.statusCode, res.contentType, res.body.length);
 * ```
 */
export function createHttpFetcher(options: HttpFetcherOptions = {}): Fetcher {
  const maxResponseSize = options.maxResponseSize ?? config.maxResponseSize;

  return async (request: FetchRequest): Promise<FetchResponse> => {
    const timeout = AbortSignal.timeout(request.timeoutMs);
    const signal = request.signal
      ? AbortSignal.any([request.signal, timeout])
      : timeout;

    let response: Response;
    try {
      response = await fetch(request.url, {
        method: request.method ?? "GET",
        signal,
        headers: {
          Accept: "text/html, application/xhtml+xml, */*;q=0.1",
          ...request.headers,
        },
        redirect: request.followRedirects ? "follow" : "manual",
      });
    } catch (error) {
      throw translateFetchError(error, request.url, request.timeoutMs);
    }

    const contentType = response.headers.get("content-type") ?? "";

    let body = "";
    if (request.readBody === false || request.method === "HEAD") {
      await response.body?.cancel();
    } else {
      body = await readBodyWithLimit(response, maxResponseSize);
    }

    return {
      url: response.url || request.url,
      statusCode: response.status,
      contentType,
      body,
    };
  };
}

/** Default production fetcher, sized from {@link config}. */
export const httpFetch: Fetcher = createHttpFetcher();

// ---------------------------------------------------------------------------
// Seed Probe
// ---------------------------------------------------------------------------

/** Result of {@link probeUrl}. */
export interface ProbeResult {
  statusCode: number;
  /** Which request produced the status. */
  method: "HEAD" | "GET";
}

/**
 * Best-effort reachability check: `HEAD` first, then a bodiless `GET` when
 * the `HEAD` throws or answers with an error status (many servers reject
 * `HEAD` with 403/405).
 *
 * @throws Whatever the fallback `GET` throws.
 */
export async function probeUrl(
  fetcher: Fetcher,
  url: string,
  options: { headers: Record<string, string>; timeoutMs: number; signal?: AbortSignal },
): Promise<ProbeResult> {
  const base = {
    url,
    headers: options.headers,
    timeoutMs: options.timeoutMs,
    followRedirects: true,
    readBody: false,
    signal: options.signal,
  };

  let headStatus: number | null;
  try {
    headStatus = (await fetcher({ ...base, method: "HEAD" })).statusCode;
  } catch {
    headStatus = null;
  }

  if (headStatus !== null && headStatus < 400) {
    return { statusCode: headStatus, method: "HEAD" };
  }

  const get = await fetcher({ ...base, method: "GET" });
  return { statusCode: get.statusCode, method: "GET" };
}
