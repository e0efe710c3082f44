/**
 * @module crawler/admission
 * @fileoverview The gate every URL passes before it is fetched.
 *
 * Checks run in a fixed order and stop at the first rejection:
 *
 * 1. robots.txt
 * 2. include/exclude patterns (skipped for the seed)
 * 3. domain scope
 *
 * Scope comes last because admitting a new external domain spends a hop;
 * a URL rejected by robots or patterns must not spend one.
 */

import type { RobotsPolicyCache } from "../services/robots.js";
import type { PatternFilter } from "./pattern-filter.js";
import type { ScopeGuard } from "./scope-guard.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export interface AdmissionPipelineOptions {
  robots: Pick<RobotsPolicyCache, "canFetch">;
  patterns: Pick<PatternFilter, "isAllowed">;
  scope: Pick<ScopeGuard, "isInScope">;
  logger?: Logger;
}

export interface AdmitOptions {
  /** The start URL of the crawl, which is exempt from pattern filtering. */
  seed?: boolean;
}

export class AdmissionPipeline {
  private readonly robots: Pick<RobotsPolicyCache, "canFetch">;
  private readonly patterns: Pick<PatternFilter, "isAllowed">;
  private readonly scope: Pick<ScopeGuard, "isInScope">;
  private readonly logger: Logger;

  constructor(options: AdmissionPipelineOptions) {
    this.robots = options.robots;
    this.patterns = options.patterns;
    this.scope = options.scope;
    this.logger = options.logger ?? silentLogger;
  }

  async admit(url: string, options: AdmitOptions = {}): Promise<boolean> {
    if (!(await this.robots.canFetch(url))) {
      this.logger.debug(`Skipping (robots.txt): ${url}`);
      return false;
    }

    if (!options.seed && !this.patterns.isAllowed(url)) {
      this.logger.debug(`Skipping (pattern): ${url}`);
      return false;
    }

    if (!this.scope.isInScope(url)) {
      this.logger.debug(`Skipping (out of scope): ${url}`);
      return false;
    }

    return true;
  }
}
