import type { CrawlReport, CrawlResult } from "../../src/crawler/frontier.js";
import type { PageFields } from "../../src/extractor/page-fields.js";

export function makeFields(overrides: Partial<PageFields> = {}): PageFields {
  return {
    title: "Home",
    metaDescription: "Welcome page",
    metaKeywords: "",
    headings: { h1: ["First", "Second"], h2: [], h3: [] },
    links: ["https://example.com/a", "https://example.com/b"],
    images: [{ src: "https://example.com/logo.png", alt: "Logo" }],
    textLength: 42,
    ...overrides,
  };
}

export function makeResult(overrides: Partial<CrawlResult> = {}): CrawlResult {
  return {
    url: "https://example.com/",
    domain: "example.com",
    depth: 0,
    statusCode: 200,
    fetchedAt: "2024-01-01T00:00:00.000Z",
    fields: makeFields(),
    ...overrides,
  };
}

export function makeReport(overrides: Partial<CrawlReport> = {}): CrawlReport {
  return {
    status: "completed",
    stoppedReason: "frontier_exhausted",
    startUrl: "https://example.com/",
    respectRobots: true,
    results: [makeResult()],
    visitedCount: 1,
    hopsUsed: 0,
    admittedExternalDomains: [],
    crawlDelays: {},
    ...overrides,
  };
}
