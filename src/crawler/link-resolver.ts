/**
 * @module crawler/link-resolver
 * @fileoverview Outgoing-link discovery for the crawl engine.
 *
 * Given a fetched page, finds every `<a href>` and resolves it to an
 * absolute URL against the page's final URL (after redirects). The crawl
 * engine canonicalizes and filters the result; this module only discovers.
 *
 * ## Skipped References
 * - empty hrefs and fragment-only hrefs (`#top`)
 * - non-fetchable schemes: `javascript:`, `mailto:`, `tel:`, `data:` and
 *   friends
 * - hrefs the URL parser rejects
 *
 * @example
 * ```ts
 * const html = '<a href="/about">About</a><a href="mailto:team@example.com">Mail</a>';
 * extractLinks(html, "https://example.com/");
 * // => ["https://example.com/about"]
 * ```
 */

import * as cheerio from "cheerio";
import { isFetchableUrl, resolveUrl } from "../utils/url.js";

/** Signature of a link-discovery collaborator. */
export type LinkExtractor = (html: string, baseUrl: string) => string[];

/* ────────────────────────────────────────────────────────────────────────────
 * Non-Fetchable Scheme Filtering
 * ──────────────────────────────────────────────────────────────────────────── */

const NON_FETCHABLE_SCHEMES = [
  "javascript:",
  "mailto:",
  "tel:",
  "data:",
  "blob:",
  "ftp:",
  "file:",
];

/**
 * Check the raw href before resolution; `new URL()` accepts most of these
 * schemes but they are never worth resolving.
 */
function hasNonFetchableScheme(href: string): boolean {
  const lower = href.toLowerCase();
  return NON_FETCHABLE_SCHEMES.some((scheme) => lower.startsWith(scheme));
}

/* ────────────────────────────────────────────────────────────────────────────
 * Link Extraction
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extract absolute http(s) link targets from an HTML document.
 *
 * @param html - Raw HTML of the page.
 * @param baseUrl - Final URL of the page, used to resolve relative hrefs.
 * @returns Absolute URLs in document order, first occurrence kept.
 */
export const extractLinks: LinkExtractor = (html, baseUrl) => {
  const $ = cheerio.load(html);
  const seen = new Set<string>();
  const links: string[] = [];

  $("a[href]").each((_index, element) => {
    const href = $(element).attr("href")?.trim();

    if (!href || href.startsWith("#") || hasNonFetchableScheme(href)) {
      return;
    }

    let absoluteUrl: string;
    try {
      absoluteUrl = resolveUrl(baseUrl, href);
    } catch {
      // Malformed href such as "http://" or "//[bad"
      return;
    }

    if (!isFetchableUrl(absoluteUrl) || seen.has(absoluteUrl)) {
      return;
    }
    seen.add(absoluteUrl);
    links.push(absoluteUrl);
  });

  return links;
};
