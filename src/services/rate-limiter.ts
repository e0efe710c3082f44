/**
 * @fileoverview Per-domain request spacing for one crawl session.
 *
 * Before every fetch the crawl engine calls {@link RateLimiter.waitIfNeeded}
 * for the target domain. The limiter sleeps until at least the domain's
 * effective delay has passed since the previous request *started*, then
 * stamps the new start time.
 *
 * ```
 *   waitIfNeeded("example.com")
 *         |
 *         v
 *   [ Per-Domain Queue ]   <-- concurrency 1: callers for one domain
 *         |                    never read the same stale timestamp
 *         v
 *   elapsed = now - lastFetch
 *   elapsed < delay ?  sleep(delay - elapsed)
 *         |
 *         v
 *   lastFetch = now
 * ```
 *
 * The effective delay is the larger of the configured default and the
 * robots.txt `Crawl-delay` for the domain. Domains are independent: a long
 * delay on one never holds back another.
 *
 * @module services/rate-limiter
 */

import PQueue from "p-queue";
import { silentLogger, type Logger } from "../utils/logger.js";

// ---------------------------------------------------------------------------
// Clock
// ---------------------------------------------------------------------------

/** Time source used by the limiter. Tests pass a fake one. */
export interface Clock {
  /** Milliseconds since the epoch. */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Rate-limit state of one domain, as reported by {@link RateLimiter.snapshot}. */
export interface DomainRateState {
  domain: string;
  /** Start time of the most recent request, or `null` before the first one. */
  lastFetchTimestamp: number | null;
  effectiveDelaySeconds: number;
}

export interface RateLimiterOptions {
  /** Minimum spacing between request starts on one domain, in milliseconds. */
  defaultDelayMs: number;

  /**
   * Factor applied to `defaultDelayMs` by {@link RateLimiter.backoff}.
   *
   * @default 3
   */
  backoffMultiplier?: number;

  /** Robots-declared crawl-delay lookup, in seconds. */
  robotsDelaySeconds?: (domain: string) => number | null;

  clock?: Clock;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// RateLimiter
// ---------------------------------------------------------------------------

/**
 * Enforces a minimum interval between request starts per domain.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({
 *   defaultDelayMs: 1000,
 *   robotsDelaySeconds: (domain) => robots.crawlDelayFor(domain),
 * });
 *
 * await limiter.waitIfNeeded("example.com"); // returns at once
 * await limiter.waitIfNeeded("example.com"); // sleeps about a second
 * ```
 */
export class RateLimiter {
  private readonly defaultDelayMs: number;
  private readonly backoffMultiplier: number;
  private readonly robotsDelaySeconds: (domain: string) => number | null;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private readonly domainQueues = new Map<string, PQueue>();
  private readonly lastFetch = new Map<string, number>();

  constructor(options: RateLimiterOptions) {
    this.defaultDelayMs = options.defaultDelayMs;
    this.backoffMultiplier = options.backoffMultiplier ?? 3;
    this.robotsDelaySeconds = options.robotsDelaySeconds ?? (() => null);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * The spacing enforced for `domain`: the default delay, or the robots
   * crawl-delay when that is longer.
   */
  effectiveDelayMs(domain: string): number {
    const robotsDelay = this.robotsDelaySeconds(domain);
    if (robotsDelay === null) {
      return this.defaultDelayMs;
    }
    return Math.max(this.defaultDelayMs, robotsDelay * 1000);
  }

  /**
   * Sleep until `domain` may be requested again, then record the request
   * start. Resolves with the number of milliseconds slept.
   */
  async waitIfNeeded(domain: string): Promise<number> {
    return this.getDomainQueue(domain).add(
      async () => {
        const delayMs = this.effectiveDelayMs(domain);
        const last = this.lastFetch.get(domain);
        let waited = 0;

        if (last !== undefined) {
          const elapsed = this.clock.now() - last;
          if (elapsed < delayMs) {
            waited = delayMs - elapsed;
            this.logger.debug(
              `Rate limiting: sleeping ${(waited / 1000).toFixed(2)}s for ${domain}`,
            );
            await this.clock.sleep(waited);
          }
        }

        this.lastFetch.set(domain, this.clock.now());
        return waited;
      },
      { throwOnTimeout: true },
    );
  }

  /**
   * Back off from `domain` after it answered HTTP 429: sleep
   * `defaultDelay × backoffMultiplier`. Other callers for the domain wait
   * behind the backoff. Resolves with the milliseconds slept.
   */
  async backoff(domain: string): Promise<number> {
    const backoffMs = this.defaultDelayMs * this.backoffMultiplier;
    return this.getDomainQueue(domain).add(
      async () => {
        this.logger.debug(
          `Backing off ${domain} for ${(backoffMs / 1000).toFixed(2)}s`,
        );
        await this.clock.sleep(backoffMs);
        return backoffMs;
      },
      { throwOnTimeout: true },
    );
  }

  /** Rate-limit state of every domain seen so far. */
  snapshot(): DomainRateState[] {
    return Array.from(this.domainQueues.keys(), (domain) => ({
      domain,
      lastFetchTimestamp: this.lastFetch.get(domain) ?? null,
      effectiveDelaySeconds: this.effectiveDelayMs(domain) / 1000,
    }));
  }

  private getDomainQueue(domain: string): PQueue {
    let queue = this.domainQueues.get(domain);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.domainQueues.set(domain, queue);
    }
    return queue;
  }
}
