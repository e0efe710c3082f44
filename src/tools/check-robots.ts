/**
 * @module tools/check-robots
 * @fileoverview MCP Tool: check_robots -- may a bot fetch this URL?
 *
 * Fetches the robots.txt of the URL's domain and reports the verdict for the
 * given bot token and any declared crawl-delay. Nothing but robots.txt is
 * requested.
 *
 * ```
 * URL: https://example.com/private/page
 * robots.txt: https://example.com/robots.txt (rules)
 * Bot: *
 * Allowed: no
 * Crawl-delay: 5s
 * ```
 */

import { z } from "zod";
import { config } from "../config.js";
import { RobotsPolicyCache, type RobotsPolicy } from "../services/robots.js";
import { httpFetch, type Fetcher } from "../services/fetch.js";
import { formatError } from "../utils/errors.js";
import { canonicalizeUrl, extractDomain } from "../utils/url.js";
import { createLogger } from "../utils/logger.js";

export const CheckRobotsSchema = {
  url: z.string().url().describe("URL to check against its domain's robots.txt"),
  bot_name: z
    .string()
    .min(1)
    .optional()
    .default(config.botName)
    .describe("User-agent token matched against robots.txt rules (default: *)"),
};

export interface CheckRobotsParams {
  url: string;
  bot_name: string;
}

function describePolicy(policy: RobotsPolicy): string {
  if (policy.kind === "rules") {
    return "rules";
  }
  switch (policy.reason) {
    case "missing":
      return "not found, everything allowed";
    case "unavailable":
      return "could not be fetched, everything allowed";
    case "disabled":
      return "not consulted";
  }
}

export function createCheckRobotsHandler(fetcher: Fetcher = httpFetch) {
  return async (params: CheckRobotsParams) => {
    try {
      const url = canonicalizeUrl(params.url);
      const domain = extractDomain(url);
      const robots = new RobotsPolicyCache({
        fetcher,
        scheme: new URL(url).protocol,
        botName: params.bot_name,
        headers: { "User-Agent": config.userAgent },
        timeoutMs: config.robotsTimeout,
        respectRobots: true,
        logger: createLogger("check-robots"),
      });

      const policy = await robots.policyFor(domain);
      // Rules may match on the query string; check the URL as given.
      const allowed = await robots.canFetch(params.url);
      const delay = robots.crawlDelayFor(domain);

      const text = [
        `URL: ${params.url}`,
        `robots.txt: ${robots.robotsUrlFor(domain)} (${describePolicy(policy)})`,
        `Bot: ${params.bot_name}`,
        `Allowed: ${allowed ? "yes" : "no"}`,
        `Crawl-delay: ${delay === null ? "none" : `${delay}s`}`,
      ].join("\n");

      return { content: [{ type: "text" as const, text }] };
    } catch (error) {
      return {
        content: [{ type: "text" as const, text: formatError(error) }],
        isError: true,
      };
    }
  };
}

export const handleCheckRobots = createCheckRobotsHandler();
