/**
 * @module crawler/scope-guard
 * @fileoverview Decides which domains a crawl may enter.
 *
 * The start domain is always in scope. Other domains are admitted only when
 * external crawling is enabled, and each new one spends one hop from a fixed
 * budget. Once admitted, a domain stays admitted for the rest of the session.
 *
 * ```
 *   isInScope(url)
 *     domain == start                    -> true
 *     domain already admitted            -> true   (no hop spent)
 *     external crawling disabled         -> false
 *     hopsUsed < budget                  -> admit, hopsUsed++, true
 *     otherwise                          -> false
 * ```
 */

import { extractDomain } from "../utils/url.js";
import { silentLogger, type Logger } from "../utils/logger.js";

/** Scope state of a session. Only {@link ScopeGuard} mutates it. */
export interface DomainScope {
  startDomain: string;
  allowExternal: boolean;
  externalHopBudget: number;
  hopsUsed: number;
  /** External domains admitted so far, in admission order. */
  admittedExternalDomains: string[];
}

export interface ScopeGuardOptions {
  startDomain: string;
  allowExternal: boolean;
  /** Number of distinct external domains that may be admitted. */
  externalHopBudget: number;
  logger?: Logger;
}

export class ScopeGuard {
  private readonly startDomain: string;
  private readonly allowExternal: boolean;
  private readonly externalHopBudget: number;
  private readonly logger: Logger;

  private readonly admitted = new Set<string>();
  private hopsUsed = 0;

  constructor(options: ScopeGuardOptions) {
    this.startDomain = options.startDomain;
    this.allowExternal = options.allowExternal;
    this.externalHopBudget = options.externalHopBudget;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Check `url` against the scope, admitting its domain when the hop budget
   * allows. Synchronous, so the check and the hop increment can never
   * interleave with another caller.
   */
  isInScope(url: string): boolean {
    const domain = extractDomain(url);

    if (domain === this.startDomain || this.admitted.has(domain)) {
      return true;
    }

    if (!this.allowExternal) {
      return false;
    }

    if (this.hopsUsed < this.externalHopBudget) {
      this.hopsUsed += 1;
      this.admitted.add(domain);
      this.logger.info(
        `Admitted external domain ${domain} (hop ${this.hopsUsed}/${this.externalHopBudget})`,
      );
      return true;
    }

    this.logger.debug(`External hop budget exhausted, skipping ${domain}`);
    return false;
  }

  snapshot(): DomainScope {
    return {
      startDomain: this.startDomain,
      allowExternal: this.allowExternal,
      externalHopBudget: this.externalHopBudget,
      hopsUsed: this.hopsUsed,
      admittedExternalDomains: [...this.admitted],
    };
  }
}
