/**
 * @module cli/args
 * @fileoverview Command-line parsing for `polite-crawl`.
 *
 * Parsing happens in two steps:
 *
 * 1. {@link parseArgs} walks `argv` by hand into a {@link RawArgs} record of
 *    strings and flags, rejecting unknown options.
 * 2. {@link validateArgs} runs the record through a zod schema that applies
 *    defaults, coerces numbers and enforces cross-flag rules.
 *
 * @example
 * ```ts
 * const options = validateArgs(
 *   parseArgs(["--url", "https://example.com", "--depth", "2", "--exclude", "*login*"]),
 * );
 * options.depth;   // => 2
 * options.exclude; // => ["*login*"]
 * ```
 */

import { z } from "zod";
import { config } from "../config.js";
import type { CrawlOptions } from "../crawler/frontier.js";
import { OUTPUT_FORMATS, type OutputFormat } from "../output/writers.js";
import { InvalidOptionsError } from "../utils/errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Raw Parsing
 * ──────────────────────────────────────────────────────────────────────────── */

/** Flags as they appeared on the command line, before validation. */
export interface RawArgs {
  url?: string;
  allowExit?: boolean;
  externalLinksDepth?: string;
  depth?: string;
  delay?: string;
  noRobots?: boolean;
  botName?: string;
  output?: string;
  format?: string;
  exclude?: string[];
  include?: string[];
  verbose?: boolean;
  userAgent?: string;
  maxPages?: string;
  help?: boolean;
}

type ValueFlag =
  | "url"
  | "externalLinksDepth"
  | "depth"
  | "delay"
  | "botName"
  | "output"
  | "format"
  | "userAgent"
  | "maxPages";

type BooleanFlag = "allowExit" | "noRobots" | "verbose" | "help";

type ListFlag = "exclude" | "include";

const VALUE_FLAGS: Record<string, ValueFlag> = {
  "--url": "url",
  "--external-links-depth": "externalLinksDepth",
  "--depth": "depth",
  "--delay": "delay",
  "--bot-name": "botName",
  "--output": "output",
  "-o": "output",
  "--format": "format",
  "--user-agent": "userAgent",
  "--max-pages": "maxPages",
};

const BOOLEAN_FLAGS: Record<string, BooleanFlag> = {
  "--allow-exit": "allowExit",
  "--no-robots": "noRobots",
  "--verbose": "verbose",
  "-v": "verbose",
  "--help": "help",
  "-h": "help",
};

const LIST_FLAGS: Record<string, ListFlag> = {
  "--exclude": "exclude",
  "--include": "include",
};

/**
 * Split `argv` (pass `process.argv.slice(2)`) into a {@link RawArgs} record.
 *
 * `--exclude` and `--include` take every following argument up to the next
 * one that starts with `-`, and may be repeated.
 *
 * @throws {InvalidOptionsError} On an unknown option, a stray positional
 *   argument or a missing value.
 */
export function parseArgs(argv: readonly string[]): RawArgs {
  const raw: RawArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    const valueFlag = VALUE_FLAGS[arg];
    if (valueFlag !== undefined) {
      const value = argv[i + 1];
      if (value === undefined || (value.startsWith("-") && value.length > 1)) {
        throw new InvalidOptionsError(`${arg} requires a value`);
      }
      raw[valueFlag] = value;
      i += 1;
      continue;
    }

    const booleanFlag = BOOLEAN_FLAGS[arg];
    if (booleanFlag !== undefined) {
      raw[booleanFlag] = true;
      continue;
    }

    const listFlag = LIST_FLAGS[arg];
    if (listFlag !== undefined) {
      const values = raw[listFlag] ?? [];
      while (i + 1 < argv.length && !argv[i + 1].startsWith("-")) {
        values.push(argv[i + 1]);
        i += 1;
      }
      raw[listFlag] = values;
      continue;
    }

    throw new InvalidOptionsError(
      arg.startsWith("-") ? `Unknown option: ${arg}` : `Unexpected argument: ${arg}`,
    );
  }

  return raw;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Validation
 * ──────────────────────────────────────────────────────────────────────────── */

const CliSchema = z
  .object({
    url: z
      .string({ required_error: "--url is required" })
      .url("--url must be an absolute URL"),
    allowExit: z.boolean().default(false),
    externalLinksDepth: z.coerce
      .number()
      .int("--external-links-depth must be an integer")
      .min(0, "--external-links-depth must not be negative")
      .default(0),
    depth: z.coerce
      .number()
      .int("--depth must be an integer")
      .min(0, "--depth must not be negative")
      .default(config.maxDepth),
    delay: z.coerce
      .number()
      .min(0, "--delay must not be negative")
      .default(config.defaultDelayMs / 1000),
    noRobots: z.boolean().default(!config.respectRobots),
    botName: z.string().min(1).default(config.botName),
    output: z.string().min(1).default("output.json"),
    format: z
      .enum(["json", "csv", "print"], {
        errorMap: () => ({ message: `--format must be one of ${OUTPUT_FORMATS.join(", ")}` }),
      })
      .default("json"),
    exclude: z.array(z.string()).default([]),
    include: z.array(z.string()).default([]),
    verbose: z.boolean().default(false),
    userAgent: z.string().min(1).optional(),
    maxPages: z.coerce
      .number()
      .int("--max-pages must be an integer")
      .min(0, "--max-pages must not be negative")
      .default(config.maxPages),
    help: z.boolean().default(false),
  })
  .refine((args) => args.externalLinksDepth === 0 || args.allowExit, {
    message: "--external-links-depth requires --allow-exit to be set",
  });

/** Validated command-line options. */
export interface CliOptions {
  url: string;
  allowExit: boolean;
  externalLinksDepth: number;
  depth: number;
  /** Seconds between requests to one domain. */
  delay: number;
  respectRobots: boolean;
  botName: string;
  /** Results file; `null` means stdout (`--format print`). */
  output: string | null;
  format: OutputFormat;
  exclude: string[];
  include: string[];
  verbose: boolean;
  userAgent?: string;
  maxPages: number;
}

/**
 * Apply defaults and rules to a {@link RawArgs} record.
 *
 * @throws {InvalidOptionsError} Listing every violated rule, `; `-separated.
 */
export function validateArgs(raw: RawArgs): CliOptions {
  const parsed = CliSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map((issue) => issue.message).join("; "),
    );
  }

  const args = parsed.data;
  return {
    url: args.url,
    allowExit: args.allowExit,
    externalLinksDepth: args.externalLinksDepth,
    depth: args.depth,
    delay: args.delay,
    respectRobots: !args.noRobots,
    botName: args.botName,
    output: args.format === "print" ? null : args.output,
    format: args.format,
    exclude: args.exclude,
    include: args.include,
    verbose: args.verbose,
    userAgent: args.userAgent,
    maxPages: args.maxPages,
  };
}

/** Map CLI options onto crawl session options. */
export function toCrawlOptions(options: CliOptions): CrawlOptions {
  return {
    startUrl: options.url,
    maxDepth: options.depth,
    allowExternal: options.allowExit,
    externalHopBudget: options.externalLinksDepth,
    delayMs: Math.round(options.delay * 1000),
    respectRobots: options.respectRobots,
    botName: options.botName,
    userAgent: options.userAgent,
    exclude: options.exclude,
    include: options.include,
    maxPages: options.maxPages,
  };
}

export const USAGE = `Usage: polite-crawl --url URL [options]

Navigation:
  --allow-exit                 Follow links to external domains
  --external-links-depth N     External domains that may be entered (requires --allow-exit)
  --depth N                    Maximum crawl depth (default: ${config.maxDepth})
  --delay SECONDS              Minimum delay between requests to one domain (default: ${config.defaultDelayMs / 1000})
  --max-pages N                Stop after N pages, 0 for no limit (default: ${config.maxPages})

Robots.txt:
  --no-robots                  Disable robots.txt compliance (not recommended)
  --bot-name NAME              User-agent token for robots.txt rules (default: ${config.botName})

Output:
  -o, --output FILE            Output file (default: output.json)
  --format json|csv|print      Output format; print writes to stdout (default: json)

Filtering:
  --exclude PATTERN...         Skip URLs matching these wildcard patterns
  --include PATTERN...         Only crawl URLs matching these wildcard patterns

Other:
  --user-agent UA              User-Agent header
  -v, --verbose                Debug logging and a crawl summary
  -h, --help                   Show this help
`;
