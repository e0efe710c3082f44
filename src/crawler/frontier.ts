/**
 * @module crawler/frontier
 * @fileoverview Breadth-first crawl engine with robots.txt, rate-limit and
 * scope enforcement.
 *
 * ## Algorithm Overview
 *
 * ```
 *   Seed URL
 *      |
 *      v
 *   [probe seed] --> [robots check on seed] --disallowed--> abort
 *      |
 *      v
 *   [Queue] --dequeue--> visited? too deep? --yes--> drop
 *      ^                       |
 *      |                       v
 *      |               [Admission: robots -> patterns -> scope]
 *      |                       |
 *      |                       v
 *      |               [Rate limiter: wait for the domain]
 *      |                       |
 *      |                       v
 *      |               [Fetch] --429--> back off, skip
 *      |                       --4xx/5xx, non-HTML--> skip
 *      |                       |
 *      |                       v
 *      |               [Record CrawlResult]
 *      |                       |
 *      +--enqueue (depth+1)----+ (only while depth < maxDepth)
 * ```
 *
 * The queue is FIFO, so every page at depth `d` is fetched before any page
 * at depth `d + 1` that was discovered after it.
 *
 * ## Session Lifecycle
 *
 * `idle -> running -> completed | aborted`. A session runs once. Aborting
 * through the `AbortSignal` given to {@link CrawlSession.run} keeps what was
 * collected: the returned report holds every result stored so far.
 *
 * ## Error Handling Strategy
 * Page-level failures (timeouts, refused connections, oversized bodies,
 * extractor exceptions) are logged and the crawl moves on. The only fatal
 * outcome is a seed disallowed by robots.txt while compliance is on.
 *
 * @example
 * ```ts
 * const session = new CrawlSession({
 *   startUrl: "https://example.com/",
 *   maxDepth: 2,
 *   exclude: ["*login*"],
 * });
 *
 * const report = await session.run();
 * console.log(report.stoppedReason, report.results.length);
 * ```
 */

import { config } from "../config.js";
import { AdmissionPipeline } from "./admission.js";
import { extractLinks as defaultExtractLinks, type LinkExtractor } from "./link-resolver.js";
import { PatternFilter, type UrlPattern } from "./pattern-filter.js";
import { ScopeGuard } from "./scope-guard.js";
import {
  extractPageFields,
  type FieldExtractor,
  type PageFields,
} from "../extractor/page-fields.js";
import {
  httpFetch,
  isHtmlContentType,
  probeUrl,
  type FetchResponse,
  type Fetcher,
} from "../services/fetch.js";
import { RateLimiter, systemClock, type Clock } from "../services/rate-limiter.js";
import { RobotsPolicyCache } from "../services/robots.js";
import {
  ConnectionError,
  CrawlerError,
  InvalidOptionsError,
  SeedDisallowedError,
  TimeoutError,
  formatError,
} from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { canonicalizeUrl, extractDomain, tryCanonicalizeUrl } from "../utils/url.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Options for one crawl session. Everything except `startUrl` falls back to
 * {@link config}.
 */
export interface CrawlOptions {
  /** Where the crawl starts. Canonicalized before use. */
  startUrl: string;

  /**
   * Maximum link depth; the seed is depth 0.
   *
   * @default config.maxDepth
   */
  maxDepth?: number;

  /**
   * Whether links to other domains may be followed at all.
   *
   * @default false
   */
  allowExternal?: boolean;

  /**
   * How many distinct external domains may be entered. Only meaningful with
   * `allowExternal`.
   *
   * @default 0
   */
  externalHopBudget?: number;

  /**
   * Minimum spacing between request starts on one domain, in milliseconds.
   *
   * @default config.defaultDelayMs
   */
  delayMs?: number;

  /** @default config.backoffMultiplier */
  backoffMultiplier?: number;

  /** @default config.respectRobots */
  respectRobots?: boolean;

  /** robots.txt user-agent token. @default config.botName */
  botName?: string;

  /** User-Agent header. @default config.userAgent */
  userAgent?: string;

  /** URLs matching any of these are never fetched. */
  exclude?: readonly UrlPattern[];

  /** When non-empty, only URLs matching one of these are fetched. */
  include?: readonly UrlPattern[];

  /**
   * Stop after this many results. `0` means no limit.
   *
   * @default config.maxPages
   */
  maxPages?: number;

  /**
   * Run admission when links are discovered as well as when they are
   * dequeued. When false, every unvisited link is queued and admission runs
   * only at dequeue time.
   *
   * @default true
   */
  admitOnDiscovery?: boolean;

  /**
   * Probe the seed with HEAD/GET before crawling and log its status.
   *
   * @default true
   */
  probeSeed?: boolean;

  /** @default config.fetchTimeout */
  fetchTimeoutMs?: number;

  /** @default config.robotsTimeout */
  robotsTimeoutMs?: number;

  /** @default config.probeTimeout */
  probeTimeoutMs?: number;
}

/** Collaborators a session talks to. All have production defaults. */
export interface CrawlDependencies {
  fetcher?: Fetcher;
  extractLinks?: LinkExtractor;
  extractFields?: FieldExtractor<PageFields>;
  clock?: Clock;
  logger?: Logger;
}

/** One queued unit of work. */
export interface FrontierEntry {
  /** Canonical URL. */
  readonly url: string;
  readonly depth: number;
}

/** One successfully fetched, in-scope HTML page. */
export interface CrawlResult {
  url: string;
  domain: string;
  depth: number;
  statusCode: number;
  /** ISO 8601 time the response was processed. */
  fetchedAt: string;
  fields: PageFields;
}

export type CrawlState = "idle" | "running" | "completed" | "aborted";

export type StoppedReason = "frontier_exhausted" | "page_limit" | "cancelled";

/** What a finished or cancelled session hands to the output layer. */
export interface CrawlReport {
  status: "completed" | "aborted";
  stoppedReason: StoppedReason;
  startUrl: string;
  respectRobots: boolean;
  /** In fetch-completion order. */
  results: CrawlResult[];
  visitedCount: number;
  hopsUsed: number;
  admittedExternalDomains: string[];
  /** robots.txt crawl-delays discovered during the session, in seconds. */
  crawlDelays: Record<string, number>;
}

/** {@link CrawlOptions} with every default applied. */
interface CrawlSettings {
  maxDepth: number;
  allowExternal: boolean;
  externalHopBudget: number;
  delayMs: number;
  backoffMultiplier: number;
  respectRobots: boolean;
  botName: string;
  userAgent: string;
  exclude: readonly UrlPattern[];
  include: readonly UrlPattern[];
  maxPages: number;
  admitOnDiscovery: boolean;
  probeSeed: boolean;
  fetchTimeoutMs: number;
  robotsTimeoutMs: number;
  probeTimeoutMs: number;
}

/** Results between two progress log lines. */
const PROGRESS_INTERVAL = 10;

/* ────────────────────────────────────────────────────────────────────────────
 * Option Resolution
 * ──────────────────────────────────────────────────────────────────────────── */

function requireNonNegative(name: string, value: number, integer: boolean): number {
  if (!Number.isFinite(value) || value < 0 || (integer && !Number.isInteger(value))) {
    throw new InvalidOptionsError(
      `${name} must be a non-negative ${integer ? "integer" : "number"}, got ${value}`,
    );
  }
  return value;
}

function resolveSettings(options: CrawlOptions): CrawlSettings {
  return {
    maxDepth: requireNonNegative("maxDepth", options.maxDepth ?? config.maxDepth, true),
    allowExternal: options.allowExternal ?? false,
    externalHopBudget: requireNonNegative(
      "externalHopBudget",
      options.externalHopBudget ?? 0,
      true,
    ),
    delayMs: requireNonNegative("delayMs", options.delayMs ?? config.defaultDelayMs, false),
    backoffMultiplier: requireNonNegative(
      "backoffMultiplier",
      options.backoffMultiplier ?? config.backoffMultiplier,
      false,
    ),
    respectRobots: options.respectRobots ?? config.respectRobots,
    botName: options.botName ?? config.botName,
    userAgent: options.userAgent ?? config.userAgent,
    exclude: options.exclude ?? [],
    include: options.include ?? [],
    maxPages: requireNonNegative("maxPages", options.maxPages ?? config.maxPages, true),
    admitOnDiscovery: options.admitOnDiscovery ?? true,
    probeSeed: options.probeSeed ?? true,
    fetchTimeoutMs: options.fetchTimeoutMs ?? config.fetchTimeout,
    robotsTimeoutMs: options.robotsTimeoutMs ?? config.robotsTimeout,
    probeTimeoutMs: options.probeTimeoutMs ?? config.probeTimeout,
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * CrawlSession
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * One crawl: its frontier, visited set, results and politeness state.
 *
 * The robots cache, rate limiter, scope guard and pattern filter are built
 * per session, so concurrent sessions in one process never share state.
 */
export class CrawlSession {
  /** Canonical seed URL. */
  readonly startUrl: string;
  readonly startDomain: string;

  readonly robots: RobotsPolicyCache;
  readonly rateLimiter: RateLimiter;
  readonly scope: ScopeGuard;
  readonly patterns: PatternFilter;
  readonly admission: AdmissionPipeline;

  private readonly settings: CrawlSettings;
  private readonly headers: Record<string, string>;
  private readonly fetcher: Fetcher;
  private readonly extractLinks: LinkExtractor;
  private readonly extractFields: FieldExtractor<PageFields>;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private readonly queue: FrontierEntry[] = [];
  private readonly visited = new Set<string>();
  private readonly collected: CrawlResult[] = [];
  private currentState: CrawlState = "idle";

  /**
   * @throws {InvalidUrlError} If the start URL is not an http(s) URL.
   * @throws {InvalidOptionsError} If a numeric option is out of range or a
   *   pattern does not compile.
   */
  constructor(options: CrawlOptions, dependencies: CrawlDependencies = {}) {
    this.startUrl = canonicalizeUrl(options.startUrl);
    this.startDomain = extractDomain(this.startUrl);
    this.settings = resolveSettings(options);
    this.headers = { "User-Agent": this.settings.userAgent };

    this.fetcher = dependencies.fetcher ?? httpFetch;
    this.extractLinks = dependencies.extractLinks ?? defaultExtractLinks;
    this.extractFields = dependencies.extractFields ?? extractPageFields;
    this.clock = dependencies.clock ?? systemClock;
    this.logger = dependencies.logger ?? createLogger("crawler");

    this.robots = new RobotsPolicyCache({
      fetcher: this.fetcher,
      scheme: new URL(this.startUrl).protocol,
      botName: this.settings.botName,
      headers: this.headers,
      timeoutMs: this.settings.robotsTimeoutMs,
      respectRobots: this.settings.respectRobots,
      logger: this.logger.child("robots"),
    });
    this.rateLimiter = new RateLimiter({
      defaultDelayMs: this.settings.delayMs,
      backoffMultiplier: this.settings.backoffMultiplier,
      robotsDelaySeconds: (domain) => this.robots.crawlDelayFor(domain),
      clock: this.clock,
      logger: this.logger.child("rate-limiter"),
    });
    this.scope = new ScopeGuard({
      startDomain: this.startDomain,
      allowExternal: this.settings.allowExternal,
      externalHopBudget: this.settings.externalHopBudget,
      logger: this.logger.child("scope"),
    });
    this.patterns = new PatternFilter({
      exclude: this.settings.exclude,
      include: this.settings.include,
      logger: this.logger.child("patterns"),
    });
    this.admission = new AdmissionPipeline({
      robots: this.robots,
      patterns: this.patterns,
      scope: this.scope,
      logger: this.logger.child("admission"),
    });
  }

  // -------------------------------------------------------------------------
  // Read-only accessors
  // -------------------------------------------------------------------------

  get state(): CrawlState {
    return this.currentState;
  }

  /** Results stored so far, in fetch-completion order. */
  get results(): readonly CrawlResult[] {
    return this.collected;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  // -------------------------------------------------------------------------
  // Main loop
  // -------------------------------------------------------------------------

  /**
   * Crawl until the frontier is empty, the page limit is reached or
   * `signal` aborts.
   *
   * @throws {SeedDisallowedError} If robots.txt disallows the seed while
   *   compliance is on. The session is then `aborted`.
   */
  async run(signal?: AbortSignal): Promise<CrawlReport> {
    if (this.currentState !== "idle") {
      throw new CrawlerError(
        `Crawl session is ${this.currentState}; a session runs only once`,
        "INVALID_STATE",
      );
    }
    this.currentState = "running";

    if (this.settings.probeSeed) {
      await this.probeSeed(signal);
    }

    if (this.settings.respectRobots && !(await this.robots.canFetch(this.startUrl))) {
      this.logger.error(
        `Robots.txt disallows crawling start URL: ${this.startUrl}. Use --no-robots to override (not recommended).`,
      );
      this.currentState = "aborted";
      throw new SeedDisallowedError(this.startUrl);
    }

    this.queue.push({ url: this.startUrl, depth: 0 });
    this.logger.info(`Starting crawl from: ${this.startUrl}`);
    this.logger.info(
      `Robots.txt compliance: ${this.settings.respectRobots ? "Enabled" : "Disabled"}`,
    );

    let stoppedReason: StoppedReason = "frontier_exhausted";

    while (true) {
      if (signal?.aborted) {
        stoppedReason = "cancelled";
        this.logger.warn(
          `Crawl cancelled with ${this.collected.length} pages scraped, ${this.queue.length} in queue`,
        );
        break;
      }

      const entry = this.queue.shift();
      if (entry === undefined) {
        break;
      }

      try {
        await this.processEntry(entry, signal);
      } catch (error) {
        this.logger.error(`Unexpected error processing ${entry.url}: ${formatError(error)}`);
      }

      if (this.settings.maxPages > 0 && this.collected.length >= this.settings.maxPages) {
        stoppedReason = "page_limit";
        this.logger.info(`Page limit of ${this.settings.maxPages} reached`);
        break;
      }
    }

    this.currentState = stoppedReason === "cancelled" ? "aborted" : "completed";
    this.logger.info(
      `Crawling complete. Scraped ${this.collected.length} pages from ${this.visited.size} URLs`,
    );

    return this.buildReport(stoppedReason);
  }

  /**
   * Log the seed's reachability. Best effort: a failure here never stops
   * the crawl.
   */
  private async probeSeed(signal?: AbortSignal): Promise<void> {
    this.logger.info(`Testing accessibility of start URL: ${this.startUrl}`);
    try {
      const probe = await probeUrl(this.fetcher, this.startUrl, {
        headers: this.headers,
        timeoutMs: this.settings.probeTimeoutMs,
        signal,
      });
      this.logger.info(`Start URL returned status: ${probe.statusCode} (${probe.method})`);
    } catch (error) {
      this.logger.warn(`Could not test start URL accessibility: ${formatError(error)}`);
    }
  }

  /**
   * Dequeue-side handling of one entry: filter, fetch, record, expand.
   */
  private async processEntry(entry: FrontierEntry, signal?: AbortSignal): Promise<void> {
    if (this.visited.has(entry.url)) {
      return;
    }

    if (entry.depth > this.settings.maxDepth) {
      this.logger.debug(`Max depth reached for: ${entry.url}`);
      return;
    }

    const seed = entry.depth === 0 && entry.url === this.startUrl;
    if (!(await this.admission.admit(entry.url, { seed }))) {
      return;
    }

    this.visited.add(entry.url);
    const domain = extractDomain(entry.url);

    await this.rateLimiter.waitIfNeeded(domain);

    const response = await this.fetchPage(entry.url, signal);
    if (response === null) {
      return;
    }

    if (response.statusCode === 429) {
      this.logger.warn(`Rate limited on ${entry.url}, waiting extra time...`);
      await this.rateLimiter.backoff(domain);
      return;
    }

    if (response.statusCode >= 400) {
      this.logger.warn(`HTTP ${response.statusCode} for ${entry.url}`);
      return;
    }

    if (!isHtmlContentType(response.contentType)) {
      this.logger.debug(`Skipping non-HTML content: ${entry.url} (${response.contentType})`);
      return;
    }

    this.collected.push({
      url: entry.url,
      domain,
      depth: entry.depth,
      statusCode: response.statusCode,
      fetchedAt: new Date(this.clock.now()).toISOString(),
      fields: this.extractFields(response.body, response.url),
    });

    if (this.collected.length % PROGRESS_INTERVAL === 0) {
      this.logger.info(
        `Progress: ${this.collected.length} pages scraped, ${this.queue.length} in queue`,
      );
    }

    if (entry.depth < this.settings.maxDepth) {
      await this.enqueueLinks(response, entry.depth + 1);
    }
  }

  /**
   * Fetch one page, logging and swallowing transport failures so the crawl
   * can continue. Resolves `null` when there is no response.
   */
  private async fetchPage(url: string, signal?: AbortSignal): Promise<FetchResponse | null> {
    this.logger.info(`Scraping: ${url}`);
    try {
      return await this.fetcher({
        url,
        headers: this.headers,
        timeoutMs: this.settings.fetchTimeoutMs,
        followRedirects: true,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        this.logger.debug(`Fetch of ${url} abandoned after cancellation`);
      } else if (error instanceof TimeoutError) {
        this.logger.warn(`Timeout scraping ${url}`);
      } else if (error instanceof ConnectionError) {
        this.logger.warn(`Connection error for ${url}`);
      } else {
        this.logger.error(`Error scraping ${url}: ${formatError(error)}`);
      }
      return null;
    }
  }

  /**
   * Discover links on a fetched page and queue the new ones at `depth`.
   * Relative links resolve against the final response URL.
   */
  private async enqueueLinks(response: FetchResponse, depth: number): Promise<void> {
    const fresh: string[] = [];
    const seen = new Set<string>();

    for (const link of this.extractLinks(response.body, response.url)) {
      const url = tryCanonicalizeUrl(link);
      if (url === null || seen.has(url) || this.visited.has(url)) {
        continue;
      }
      seen.add(url);
      fresh.push(url);
    }

    let queued = 0;
    for (const url of fresh) {
      if (this.settings.admitOnDiscovery && !(await this.admission.admit(url))) {
        continue;
      }
      this.queue.push({ url, depth });
      queued += 1;
    }

    this.logger.debug(`Found ${queued} valid links on ${response.url}`);
  }

  private buildReport(stoppedReason: StoppedReason): CrawlReport {
    const scope = this.scope.snapshot();
    return {
      status: stoppedReason === "cancelled" ? "aborted" : "completed",
      stoppedReason,
      startUrl: this.startUrl,
      respectRobots: this.settings.respectRobots,
      results: [...this.collected],
      visitedCount: this.visited.size,
      hopsUsed: scope.hopsUsed,
      admittedExternalDomains: scope.admittedExternalDomains,
      crawlDelays: this.robots.crawlDelays(),
    };
  }
}
