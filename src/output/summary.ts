/**
 * @module output/summary
 * @fileoverview End-of-crawl statistics.
 *
 * ```
 * ==================================================
 * CRAWL SUMMARY
 * ==================================================
 * Pages scraped: 12
 * URLs visited: 14
 * Domains: example.com, docs.example.com
 * Total links found: 210
 * Total images found: 31
 * Robots.txt compliance: Enabled
 * Custom crawl delays: example.com=5s
 * Stopped: frontier_exhausted
 * ```
 */

import type { CrawlReport, StoppedReason } from "../crawler/frontier.js";

export interface CrawlSummary {
  status: CrawlReport["status"];
  stoppedReason: StoppedReason;
  pagesScraped: number;
  urlsVisited: number;
  /** Domains with at least one result, in first-result order. */
  domains: string[];
  totalLinks: number;
  totalImages: number;
  respectRobots: boolean;
  crawlDelays: Record<string, number>;
}

const RULE = "=".repeat(50);

export function buildSummary(report: CrawlReport): CrawlSummary {
  const domains = new Set<string>();
  let totalLinks = 0;
  let totalImages = 0;

  for (const result of report.results) {
    domains.add(result.domain);
    totalLinks += result.fields.links.length;
    totalImages += result.fields.images.length;
  }

  return {
    status: report.status,
    stoppedReason: report.stoppedReason,
    pagesScraped: report.results.length,
    urlsVisited: report.visitedCount,
    domains: [...domains],
    totalLinks,
    totalImages,
    respectRobots: report.respectRobots,
    crawlDelays: { ...report.crawlDelays },
  };
}

/**
 * Render a summary as the multi-line block shown above. The crawl-delay
 * line appears only when robots.txt declared one.
 */
export function formatSummary(summary: CrawlSummary): string {
  const lines = [
    RULE,
    "CRAWL SUMMARY",
    RULE,
    `Pages scraped: ${summary.pagesScraped}`,
    `URLs visited: ${summary.urlsVisited}`,
    `Domains: ${summary.domains.join(", ")}`,
    `Total links found: ${summary.totalLinks}`,
    `Total images found: ${summary.totalImages}`,
    `Robots.txt compliance: ${summary.respectRobots ? "Enabled" : "Disabled"}`,
  ];

  const delays = Object.entries(summary.crawlDelays);
  if (delays.length > 0) {
    lines.push(
      `Custom crawl delays: ${delays.map(([domain, seconds]) => `${domain}=${seconds}s`).join(", ")}`,
    );
  }

  lines.push(`Stopped: ${summary.stoppedReason}`);
  return lines.join("\n");
}
