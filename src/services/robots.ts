/**
 * @fileoverview Per-session robots.txt policy cache.
 *
 * For every domain the crawler touches, this module fetches
 * `{scheme}//{domain}/robots.txt` once, parses it with `robots-parser`, and
 * keeps the result for the rest of the session: rules, the crawl-delay
 * declared for our bot token, or an "allow all" marker when there is no
 * usable robots.txt.
 *
 * ## Policy Outcomes
 *
 * | robots.txt fetch              | Cached policy                       |
 * |-------------------------------|-------------------------------------|
 * | HTTP 200                      | `rules` (+ crawl-delay if declared) |
 * | any other status              | `allow-all` / `missing`             |
 * | timeout, connection error...  | `allow-all` / `unavailable`         |
 * | compliance disabled           | `allow-all` / `disabled` (no fetch) |
 *
 * A missing robots.txt means unrestricted access; it is not an error.
 *
 * ## Caching
 *
 * Settled policies live in a `node-cache` instance owned by the session (no
 * TTL: a crawl session is short-lived). Lookups that are still in flight are
 * shared through a promise map, so a domain's robots.txt is requested at
 * most once per session even when several URLs on it are checked at the
 * same time.
 *
 * @module services/robots
 */

import NodeCache from "node-cache";
import robotsParser from "robots-parser";
import type { Fetcher } from "./fetch.js";
import { extractDomain } from "../utils/url.js";
import { formatError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Parsed robots.txt as returned by `robots-parser`. */
export type RobotsRules = ReturnType<typeof robotsParser>;

/** Why a domain has no rules to apply. */
export type AllowAllReason = "disabled" | "missing" | "unavailable";

/**
 * The cached outcome of a robots.txt lookup for one domain.
 */
export type RobotsPolicy =
  | { kind: "allow-all"; reason: AllowAllReason }
  | { kind: "rules"; rules: RobotsRules; crawlDelaySeconds: number | null };

export interface RobotsPolicyCacheOptions {
  /** Transport used for robots.txt requests. */
  fetcher: Fetcher;

  /**
   * Scheme used to build robots.txt URLs, taken from the start URL
   * (`"https:"` or `"http:"`).
   */
  scheme: string;

  /** Token matched against `User-agent` lines, e.g. `"*"` or `"PoliteCrawl"`. */
  botName: string;

  /** Headers sent with robots.txt requests. */
  headers: Record<string, string>;

  /** Timeout for one robots.txt request, in milliseconds. */
  timeoutMs: number;

  /** When false, every URL is allowed and nothing is fetched. */
  respectRobots: boolean;

  logger?: Logger;
}

// ---------------------------------------------------------------------------
// RobotsPolicyCache
// ---------------------------------------------------------------------------

/**
 * Lazily populated, per-session map from domain to {@link RobotsPolicy}.
 *
 * @example
 * ```typescript
 * const robots = new RobotsPolicyCache({
 *   fetcher: httpFetch,
 *   scheme: "https:",
 *   botName: "*",
 *   headers: { "User-Agent": config.userAgent },
 *   timeoutMs: config.robotsTimeout,
 *   respectRobots: true,
 * });
 *
 * if (await robots.canFetch("https://example.com/private/page")) {
 *   // fetch it
 * }
 * robots.crawlDelayFor("example.com"); // => 5 when robots.txt says "Crawl-delay: 5"
 * ```
 */
export class RobotsPolicyCache {
  private readonly options: RobotsPolicyCacheOptions;
  private readonly logger: Logger;

  /** Settled policies keyed by domain. */
  private readonly policies: NodeCache;

  /** Lookups that have started but not settled yet. */
  private readonly pending = new Map<string, Promise<RobotsPolicy>>();

  constructor(options: RobotsPolicyCacheOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.policies = new NodeCache({
      stdTTL: 0,
      // checkperiod 0 disables the expiry timer, so the cache never keeps
      // the process alive.
      checkperiod: 0,
      // Policies hold parser instances; store them by reference.
      useClones: false,
    });
  }

  /** Whether robots.txt is consulted at all. */
  get respectRobots(): boolean {
    return this.options.respectRobots;
  }

  /** URL of the robots.txt consulted for `domain`. */
  robotsUrlFor(domain: string): string {
    return `${this.options.scheme}//${domain}/robots.txt`;
  }

  /**
   * Return the policy for `domain`, fetching robots.txt on first use.
   * Never rejects: every failure becomes an allow-all policy.
   */
  async policyFor(domain: string): Promise<RobotsPolicy> {
    if (!this.options.respectRobots) {
      return { kind: "allow-all", reason: "disabled" };
    }

    const cached = this.policies.get<RobotsPolicy>(domain);
    if (cached) {
      return cached;
    }

    let lookup = this.pending.get(domain);
    if (!lookup) {
      lookup = this.loadPolicy(domain).finally(() => {
        this.pending.delete(domain);
      });
      this.pending.set(domain, lookup);
    }
    return lookup;
  }

  /**
   * Check whether the bot may fetch `url`.
   *
   * The URL is matched on its path and query against the robots.txt of its
   * host: an `http:` link on an `https:` crawl obeys the same rules. An
   * `undefined` verdict from `robots-parser` counts as allowed.
   */
  async canFetch(url: string): Promise<boolean> {
    if (!this.options.respectRobots) {
      return true;
    }

    const policy = await this.policyFor(extractDomain(url));
    if (policy.kind === "allow-all") {
      return true;
    }

    // Policies are per host, whatever the link's scheme.
    const target = new URL(url);
    target.protocol = this.options.scheme;
    const allowed = policy.rules.isAllowed(target.href, this.options.botName) !== false;
    if (!allowed) {
      this.logger.debug(`Robots.txt disallows: ${url}`);
    }
    return allowed;
  }

  /**
   * The crawl-delay robots.txt declared for `domain`, in seconds, or `null`
   * when none was declared or the policy is not loaded yet.
   */
  crawlDelayFor(domain: string): number | null {
    const policy = this.policies.get<RobotsPolicy>(domain);
    if (!policy || policy.kind === "allow-all") {
      return null;
    }
    return policy.crawlDelaySeconds;
  }

  /** Every robots-declared crawl-delay discovered in this session, by domain. */
  crawlDelays(): Record<string, number> {
    const delays: Record<string, number> = {};
    for (const domain of this.policies.keys()) {
      const delay = this.crawlDelayFor(domain);
      if (delay !== null) {
        delays[domain] = delay;
      }
    }
    return delays;
  }

  /**
   * Fetch and parse robots.txt for `domain` and store the outcome.
   */
  private async loadPolicy(domain: string): Promise<RobotsPolicy> {
    const robotsUrl = this.robotsUrlFor(domain);
    let policy: RobotsPolicy;

    try {
      const response = await this.options.fetcher({
        url: robotsUrl,
        headers: this.options.headers,
        timeoutMs: this.options.timeoutMs,
        followRedirects: true,
      });

      if (response.statusCode === 200) {
        const rules = robotsParser(robotsUrl, response.body);
        const declared = rules.getCrawlDelay(this.options.botName);
        const crawlDelaySeconds =
          declared !== undefined && declared > 0 ? declared : null;

        if (crawlDelaySeconds !== null) {
          this.logger.info(`Found crawl-delay of ${crawlDelaySeconds}s for ${domain}`);
        }
        this.logger.info(`Loaded robots.txt for ${domain}`);
        policy = { kind: "rules", rules, crawlDelaySeconds };
      } else {
        this.logger.debug(
          `No robots.txt found for ${domain} (HTTP ${response.statusCode})`,
        );
        policy = { kind: "allow-all", reason: "missing" };
      }
    } catch (error) {
      this.logger.debug(`Error loading robots.txt for ${domain}: ${formatError(error)}`);
      policy = { kind: "allow-all", reason: "unavailable" };
    }

    this.policies.set(domain, policy);
    return policy;
  }
}
