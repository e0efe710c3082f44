/**
 * @module utils/errors
 * @fileoverview Custom error class hierarchy for polite-crawl.
 *
 * Every error raised by this application extends {@link CrawlerError}, which
 * carries a machine-readable `code` string alongside the human-readable
 * `message`. The CLI prints the pair, and the MCP tools return it in the tool
 * result.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── CrawlerError (base)  ─── code: string ("INVALID_STATE" when a
 *         │                          session is run twice)
 *         ├── InvalidUrlError        ─── "INVALID_URL"
 *         ├── FetchError             ─── "FETCH_FAILED"  + optional statusCode
 *         │     └── ConnectionError  ─── "CONNECTION_FAILED"
 *         ├── TimeoutError           ─── "TIMEOUT"
 *         ├── ResponseTooLargeError  ─── "RESPONSE_TOO_LARGE"
 *         ├── SeedDisallowedError    ─── "SEED_DISALLOWED"
 *         ├── InvalidOptionsError    ─── "INVALID_OPTIONS"
 *         └── OutputError            ─── "OUTPUT_FAILED"
 * ```
 *
 * Page-level errors (`InvalidUrlError` through `ResponseTooLargeError`) never
 * end a crawl: the frontier catches them at the page boundary and moves on.
 * `SeedDisallowedError` is the only error that aborts a crawl, and
 * `OutputError` is what a caller sees when results could not be written.
 *
 * Robots, pattern and scope rejections are policy decisions, not errors, and
 * have no class here. Neither do skipped responses (HTTP 429, error statuses,
 * non-HTML content): the frontier logs them and moves on.
 *
 * @example
 * ```ts
 * import { FetchError, formatError } from "./utils/errors.js";
 *
 * try {
 *   throw new FetchError("HTTP 503 Service Unavailable", 503);
 * } catch (err) {
 *   console.error(formatError(err));
 *   // => "[FETCH_FAILED] HTTP 503 Service Unavailable"
 * }
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base error class for all polite-crawl errors.
 *
 * Subclasses get a `name` matching their class, so stack traces read
 * `TimeoutError: ...` rather than `Error: ...`.
 */
export class CrawlerError extends Error {
  /**
   * Machine-readable error code in SCREAMING_SNAKE_CASE. Codes are stable
   * and part of the tool output.
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
 * Thrown when a reference cannot be turned into a canonical http(s) URL.
 *
 * Discovered links that fail this way are dropped one at a time; the seed
 * URL failing this way is a usage error.
 */
export class InvalidUrlError extends CrawlerError {
  /** The reference that failed to parse, as it was given. */
  public readonly input: string;

  constructor(input: string, reason?: string) {
    super(
      reason ? `Invalid URL "${input}": ${reason}` : `Invalid URL "${input}"`,
      "INVALID_URL",
    );
    this.input = input;
  }
}

/**
 * Thrown when an HTTP fetch fails at the transport level, or when a caller
 * turns an error status into an exception.
 *
 * `statusCode` is set only when the server answered.
 */
export class FetchError extends CrawlerError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, code = "FETCH_FAILED") {
    super(message, code);
    this.statusCode = statusCode;
  }
}

/**
 * Thrown when no connection could be made: DNS failure, refused or reset
 * connection, TLS handshake failure.
 */
export class ConnectionError extends FetchError {
  constructor(message: string) {
    super(message, undefined, "CONNECTION_FAILED");
  }
}

/**
 * Thrown when a request exceeds its time budget.
 *
 * @example
 * ```ts
 * throw new TimeoutError("Request to https://slow.example.com/ timed out after 15000ms");
 * ```
 */
export class TimeoutError extends CrawlerError {
  constructor(message: string) {
    super(message, "TIMEOUT");
  }
}

/**
 * Thrown when the response body exceeds the configured size limit. The limit
 * is enforced while streaming, so no more than the limit is ever buffered.
 */
export class ResponseTooLargeError extends CrawlerError {
  constructor(message: string) {
    super(message, "RESPONSE_TOO_LARGE");
  }
}

/**
 * Thrown by a crawl session whose seed URL is disallowed by robots.txt while
 * robots compliance is on. The session ends in the `aborted` state without
 * having fetched anything.
 */
export class SeedDisallowedError extends CrawlerError {
  public readonly url: string;

  constructor(url: string) {
    super(
      `robots.txt disallows crawling the start URL ${url}; disable robots compliance to override (not recommended)`,
      "SEED_DISALLOWED",
    );
    this.url = url;
  }
}

/** Crawl options failed validation (CLI flags, tool arguments, session options). */
export class InvalidOptionsError extends CrawlerError {
  constructor(message: string) {
    super(message, "INVALID_OPTIONS");
  }
}

/** Results could not be written to their destination. */
export class OutputError extends CrawlerError {
  constructor(message: string) {
    super(message, "OUTPUT_FAILED");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Convert any caught value to a single-line description.
 *
 * - {@link CrawlerError} subclasses: `"[CODE] message"`.
 * - Other `Error` instances: the message.
 * - Anything else: `String(value)`.
 *
 * @example
 * ```ts
 * formatError(new TimeoutError("timed out"));  // => "[TIMEOUT] timed out"
 * formatError(new TypeError("bad"));           // => "bad"
 * formatError(42);                             // => "42"
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof CrawlerError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
