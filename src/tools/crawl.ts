/**
 * @module tools/crawl
 * @fileoverview MCP Tool: crawl -- polite breadth-first crawl from a URL.
 *
 * Runs one {@link CrawlSession} with the given arguments and returns the
 * crawl summary followed by the results rendered in the requested format.
 *
 * ## Usage Example (from MCP client)
 * ```json
 * {
 *   "tool": "crawl",
 *   "arguments": {
 *     "url": "https://docs.example.com",
 *     "depth": 2,
 *     "exclude_patterns": ["*login*", "*.pdf"],
 *     "format": "csv"
 *   }
 * }
 * ```
 *
 * Cancelling the request from the client aborts the session; the results
 * collected up to that point are still returned.
 */

import { z } from "zod";
import { config } from "../config.js";
import { CrawlSession, type CrawlDependencies } from "../crawler/frontier.js";
import { buildSummary, formatSummary } from "../output/summary.js";
import { renderResults } from "../output/writers.js";
import { InvalidOptionsError, formatError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";

/** Default page ceiling for tool calls, which return everything in one response. */
export const DEFAULT_TOOL_MAX_PAGES = 50;

/**
 * Zod shape for the `crawl` tool parameters. A plain object, as
 * `server.tool()` expects.
 */
export const CrawlSchema = {
  url: z.string().url().describe("Starting URL for the crawl"),

  depth: z
    .number()
    .int()
    .min(0)
    .optional()
    .default(config.maxDepth)
    .describe(`Maximum link depth; the start URL is depth 0 (default: ${config.maxDepth})`),

  allow_external: z
    .boolean()
    .optional()
    .default(false)
    .describe("Allow following links to other domains"),

  external_links_depth: z
    .number()
    .int()
    .min(0)
    .optional()
    .default(0)
    .describe("How many external domains may be entered (requires allow_external)"),

  delay: z
    .number()
    .min(0)
    .optional()
    .default(config.defaultDelayMs / 1000)
    .describe("Minimum seconds between requests to one domain; a larger robots.txt Crawl-delay wins"),

  exclude_patterns: z
    .array(z.string())
    .optional()
    .describe("Wildcard patterns for URLs to skip (e.g. '*login*', '*.pdf')"),

  include_patterns: z
    .array(z.string())
    .optional()
    .describe("Only crawl URLs matching at least one of these wildcard patterns"),

  respect_robots: z
    .boolean()
    .optional()
    .default(config.respectRobots)
    .describe("Obey robots.txt (default: true)"),

  bot_name: z
    .string()
    .min(1)
    .optional()
    .default(config.botName)
    .describe("User-agent token matched against robots.txt rules"),

  max_pages: z
    .number()
    .int()
    .min(0)
    .optional()
    .default(DEFAULT_TOOL_MAX_PAGES)
    .describe(`Stop after this many pages, 0 for no limit (default: ${DEFAULT_TOOL_MAX_PAGES})`),

  format: z
    .enum(["json", "csv", "print"])
    .optional()
    .default("json")
    .describe("How results are rendered (default: json)"),
};

/** Parameters after zod parsing and defaults. */
export interface CrawlParams {
  url: string;
  depth: number;
  allow_external: boolean;
  external_links_depth: number;
  delay: number;
  exclude_patterns?: string[];
  include_patterns?: string[];
  respect_robots: boolean;
  bot_name: string;
  max_pages: number;
  format: "json" | "csv" | "print";
}

/** The part of the SDK's request context the handler uses. */
export interface ToolCallContext {
  signal?: AbortSignal;
}

/**
 * Build the `crawl` handler over the given collaborators. Tests pass a fake
 * fetcher and clock; the server uses the defaults.
 */
export function createCrawlHandler(dependencies: CrawlDependencies = {}) {
  return async (params: CrawlParams, context: ToolCallContext = {}) => {
    try {
      if (params.external_links_depth > 0 && !params.allow_external) {
        throw new InvalidOptionsError("external_links_depth requires allow_external to be true");
      }

      const session = new CrawlSession(
        {
          startUrl: params.url,
          maxDepth: params.depth,
          allowExternal: params.allow_external,
          externalHopBudget: params.external_links_depth,
          delayMs: Math.round(params.delay * 1000),
          exclude: params.exclude_patterns,
          include: params.include_patterns,
          respectRobots: params.respect_robots,
          botName: params.bot_name,
          maxPages: params.max_pages,
        },
        { logger: createLogger("crawl-tool"), ...dependencies },
      );

      const report = await session.run(context.signal);
      const summary = formatSummary(buildSummary(report));
      const body =
        report.results.length > 0
          ? await renderResults(report.results, params.format)
          : "No pages were scraped.";

      return {
        content: [{ type: "text" as const, text: `${summary}\n\n${body}` }],
      };
    } catch (error) {
      return {
        content: [{ type: "text" as const, text: formatError(error) }],
        isError: true,
      };
    }
  };
}

export const handleCrawl = createCrawlHandler();
