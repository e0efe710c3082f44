/**
 * @fileoverview Structured field extraction for crawled pages.
 *
 * Produces the per-page record stored in every crawl result: title, meta
 * description and keywords, the first headings of each level, a sample of
 * link targets and images, and the length of the visible text.
 *
 * Lists are capped so a single huge page cannot dominate the output:
 *
 * | Field        | Cap                          |
 * |--------------|------------------------------|
 * | headings.hN  | first 5 elements, empty ones dropped |
 * | links        | first 50 `<a href>`          |
 * | images       | first 20 `<img src>`         |
 *
 * @module extractor/page-fields
 */

import * as cheerio from "cheerio";
import { resolveUrl } from "../utils/url.js";

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/** Signature of a field-extraction collaborator. */
export type FieldExtractor<F> = (html: string, url: string) => F;

export interface PageImage {
  /** Absolute image URL. */
  src: string;
  /** Trimmed `alt` text, empty when absent. */
  alt: string;
}

export interface PageFields {
  title: string;
  metaDescription: string;
  metaKeywords: string;
  headings: {
    h1: string[];
    h2: string[];
    h3: string[];
  };
  /** Absolute link targets in document order. */
  links: string[];
  images: PageImage[];
  /** Character count of the document's trimmed text content. */
  textLength: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const MAX_HEADINGS_PER_LEVEL = 5;
export const MAX_LINKS = 50;
export const MAX_IMAGES = 20;

const HEADING_LEVELS = ["h1", "h2", "h3"] as const;

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

function metaContent($: cheerio.CheerioAPI, name: string): string {
  return ($(`meta[name="${name}"]`).first().attr("content") ?? "").trim();
}

/** Resolve `ref` against `base`, or `null` if it does not form a URL. */
function tryResolve(base: string, ref: string): string | null {
  try {
    return resolveUrl(base, ref);
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Main Export
// ---------------------------------------------------------------------------

/**
 * Extract {@link PageFields} from an HTML document.
 *
 * @param html - Raw HTML of the page.
 * @param url - URL the page was fetched from; relative links and image
 *   sources resolve against it.
 *
 * @example
 * ```typescript
 * const fields = extractPageFields(
 *   '<title> Docs </title><h1>Intro</h1><img src="/logo.png" alt="Logo">',
 *   "https://example.com/docs",
 * );
 * fields.title;       // => "Docs"
 * fields.headings.h1; // => ["Intro"]
 * fields.images;      // => [{ src: "https://example.com/logo.png", alt: "Logo" }]
 * ```
 */
export const extractPageFields: FieldExtractor<PageFields> = (html, url) => {
  const $ = cheerio.load(html);

  const headings: PageFields["headings"] = { h1: [], h2: [], h3: [] };
  for (const level of HEADING_LEVELS) {
    headings[level] = $(level)
      .slice(0, MAX_HEADINGS_PER_LEVEL)
      .map((_index, element) => $(element).text().trim())
      .get()
      .filter((text) => text.length > 0);
  }

  const links: string[] = [];
  $("a[href]")
    .slice(0, MAX_LINKS)
    .each((_index, element) => {
      const resolved = tryResolve(url, $(element).attr("href") ?? "");
      if (resolved !== null) {
        links.push(resolved);
      }
    });

  const images: PageImage[] = [];
  $("img[src]")
    .slice(0, MAX_IMAGES)
    .each((_index, element) => {
      const src = tryResolve(url, $(element).attr("src") ?? "");
      if (src !== null) {
        images.push({ src, alt: ($(element).attr("alt") ?? "").trim() });
      }
    });

  return {
    title: $("title").first().text().trim(),
    metaDescription: metaContent($, "description"),
    metaKeywords: metaContent($, "keywords"),
    headings,
    links,
    images,
    textLength: $.root().text().trim().length,
  };
};
