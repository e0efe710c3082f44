/**
 * @module crawler/pattern-filter
 * @fileoverview URL include/exclude filtering with shell-style globs.
 *
 * Users write patterns the way they would on a command line:
 *
 * ```
 * --exclude "*login*" "*.pdf" --include "*://example.com/docs/*"
 * ```
 *
 * Each glob is compiled once into an anchored, case-insensitive `RegExp`
 * and matched against the full canonical URL.
 *
 * ## Decision Order
 * 1. Any exclude pattern matches → rejected.
 * 2. Include list non-empty and no include pattern matches → rejected.
 * 3. Otherwise → allowed.
 */

import { InvalidOptionsError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";

/** A glob string, a raw regex string (`^...` or `...$`), or a compiled RegExp. */
export type UrlPattern = string | RegExp;

/* ────────────────────────────────────────────────────────────────────────────
 * Glob Translation
 * ──────────────────────────────────────────────────────────────────────────── */

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\/-]/g;

function escapeRegExp(text: string): string {
  return text.replace(REGEX_SPECIALS, "\\$&");
}

/**
 * Translate an `fnmatch`-style glob into a RegExp.
 *
 * | Glob      | Meaning                          |
 * |-----------|----------------------------------|
 * | `*`       | any run of characters (incl. /)  |
 * | `?`       | exactly one character            |
 * | `[abc]`   | one of the listed characters     |
 * | `[!abc]`  | any character not listed         |
 *
 * An unterminated `[` is literal. A pattern starting with `^` or ending with
 * `$` is compiled as a regular expression instead.
 *
 * @throws {InvalidOptionsError} If a regex-style pattern does not compile.
 *
 * @example
 * ```ts
 * globToRegExp("*login*").test("https://example.com/login");   // true
 * globToRegExp("*.pdf").test("https://example.com/a.PDF");     // true
 * globToRegExp("^https://example\\.com/blog/").source;         // kept as is
 * ```
 */
export function globToRegExp(pattern: string): RegExp {
  if (pattern.startsWith("^") || pattern.endsWith("$")) {
    try {
      return new RegExp(pattern, "i");
    } catch (error) {
      throw new InvalidOptionsError(
        `Invalid pattern "${pattern}": ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  let source = "";
  let i = 0;

  while (i < pattern.length) {
    const char = pattern[i];
    i += 1;

    if (char === "*") {
      source += "[\\s\\S]*";
    } else if (char === "?") {
      source += "[\\s\\S]";
    } else if (char === "[") {
      // A "]" right after "[" or "[!" belongs to the set.
      let j = i;
      if (pattern[j] === "!") j += 1;
      if (pattern[j] === "]") j += 1;
      while (j < pattern.length && pattern[j] !== "]") j += 1;

      if (j >= pattern.length) {
        source += "\\[";
      } else {
        const negated = pattern[i] === "!";
        const members = pattern
          .slice(negated ? i + 1 : i, j)
          .replace(/[\\\]^]/g, "\\$&");
        source += `[${negated ? "^" : ""}${members}]`;
        i = j + 1;
      }
    } else {
      source += escapeRegExp(char);
    }
  }

  return new RegExp(`^${source}$`, "i");
}

function compilePattern(pattern: UrlPattern): RegExp {
  return typeof pattern === "string" ? globToRegExp(pattern) : pattern;
}

/* ────────────────────────────────────────────────────────────────────────────
 * PatternFilter
 * ──────────────────────────────────────────────────────────────────────────── */

export interface PatternFilterOptions {
  exclude?: readonly UrlPattern[];
  include?: readonly UrlPattern[];
  logger?: Logger;
}

/**
 * Applies exclude and include pattern lists to URLs.
 *
 * @example
 * ```ts
 * const filter = new PatternFilter({ exclude: ["*login*"] });
 * filter.isAllowed("https://example.com/login");  // false
 * filter.isAllowed("https://example.com/about");  // true
 * ```
 */
export class PatternFilter {
  private readonly exclude: RegExp[];
  private readonly include: RegExp[];
  private readonly logger: Logger;

  constructor(options: PatternFilterOptions = {}) {
    this.exclude = (options.exclude ?? []).map(compilePattern);
    this.include = (options.include ?? []).map(compilePattern);
    this.logger = options.logger ?? silentLogger;
  }

  isAllowed(url: string): boolean {
    const excludedBy = this.exclude.find((re) => matches(re, url));
    if (excludedBy) {
      this.logger.debug(`Excluded by pattern ${excludedBy.source}: ${url}`);
      return false;
    }

    if (this.include.length > 0 && !this.include.some((re) => matches(re, url))) {
      this.logger.debug(`Not matched by any include pattern: ${url}`);
      return false;
    }

    return true;
  }
}

function matches(re: RegExp, url: string): boolean {
  // Global and sticky regexes carry state between test() calls.
  re.lastIndex = 0;
  return re.test(url);
}
