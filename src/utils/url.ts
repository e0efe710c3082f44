/**
 * @module utils/url
 * @fileoverview URL canonicalization, domain extraction and scheme checks.
 *
 * The canonical form produced here is the crawler's identity for a page: the
 * visited set, the frontier and the result records all key on it, so two
 * references that reach the same scheme + host + path must canonicalize to
 * the same string.
 *
 * ## Canonicalization Rules
 * 1. Resolve against the base URL with the WHATWG URL constructor, which
 *    also lowercases scheme and host and drops default ports.
 * 2. Reject anything that does not parse, or whose scheme is not http(s).
 * 3. Remove the fragment (`#section`).
 * 4. Remove the query (`?a=1`).
 *
 * The path is left alone: `/docs` and `/docs/` stay distinct.
 *
 * @example
 * ```ts
 * canonicalizeUrl("../about?ref=nav#team", "https://Example.com:443/docs/intro");
 * // => "https://example.com/about"
 *
 * extractDomain("http://example.com:8080/page");
 * // => "example.com:8080"
 * ```
 */

import { InvalidUrlError } from "./errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/** URL schemes the crawler can fetch. */
const FETCHABLE_SCHEMES: ReadonlySet<string> = new Set(["http:", "https:"]);

/* ────────────────────────────────────────────────────────────────────────────
 * Canonicalization
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Turn a (possibly relative) reference into the crawler's canonical URL.
 *
 * Pure and idempotent: `canonicalizeUrl(canonicalizeUrl(u)) === canonicalizeUrl(u)`.
 *
 * @param ref  - Absolute or relative URL reference.
 * @param base - Base URL used to resolve `ref` when it is relative.
 * @returns Absolute http(s) URL without query or fragment.
 * @throws {InvalidUrlError} If the reference does not resolve to an http(s) URL.
 *
 * @example
 * ```ts
 * canonicalizeUrl("https://example.com/page?x=1#top");  // => "https://example.com/page"
 * canonicalizeUrl("/login", "https://example.com/");    // => "https://example.com/login"
 * canonicalizeUrl("mailto:team@example.com");           // throws InvalidUrlError
 * ```
 */
export function canonicalizeUrl(ref: string, base?: string): string {
  let parsed: URL;
  try {
    parsed = base === undefined ? new URL(ref) : new URL(ref, base);
  } catch (error) {
    throw new InvalidUrlError(
      ref,
      error instanceof Error ? error.message : String(error),
    );
  }

  if (!FETCHABLE_SCHEMES.has(parsed.protocol)) {
    throw new InvalidUrlError(ref, `unsupported scheme ${parsed.protocol}`);
  }

  parsed.hash = "";
  parsed.search = "";
  return parsed.href;
}

/**
 * Like {@link canonicalizeUrl}, but returns `null` instead of throwing.
 * Used where a bad link should be dropped quietly.
 */
export function tryCanonicalizeUrl(ref: string, base?: string): string | null {
  try {
    return canonicalizeUrl(ref, base);
  } catch (error) {
    if (error instanceof InvalidUrlError) {
      return null;
    }
    throw error;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Domain Extraction
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extract the domain key of a URL: lowercased hostname plus a non-default
 * port, if any.
 *
 * This key scopes robots.txt policies, rate-limit state and the external hop
 * budget, so `example.com:8080` and `example.com` are different domains.
 *
 * @throws {InvalidUrlError} If the input is not an absolute URL.
 *
 * @example
 * ```ts
 * extractDomain("https://Sub.Example.COM/path");   // => "sub.example.com"
 * extractDomain("http://localhost:3000/api");      // => "localhost:3000"
 * extractDomain("https://example.com:443/");       // => "example.com"
 * ```
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).host;
  } catch (error) {
    throw new InvalidUrlError(
      url,
      error instanceof Error ? error.message : String(error),
    );
  }
}

/**
 * Resolve a potentially relative URL against a base URL.
 *
 * @throws {TypeError} If the combination does not produce a valid URL.
 *
 * @example
 * ```ts
 * resolveUrl("https://example.com/docs/intro", "../blog");
 * // => "https://example.com/blog"
 * ```
 */
export function resolveUrl(base: string, relative: string): string {
  return new URL(relative, base).href;
}

/* ────────────────────────────────────────────────────────────────────────────
 * URL Scheme Validation
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Check whether a URL uses a scheme the crawler can fetch (`http:` or `https:`).
 *
 * Invalid URLs are not fetchable, so this never throws.
 */
export function isFetchableUrl(url: string): boolean {
  try {
    return FETCHABLE_SCHEMES.has(new URL(url).protocol);
  } catch {
    return false;
  }
}
