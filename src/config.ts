/**
 * @module config
 * @fileoverview Centralized application configuration loaded from environment variables.
 *
 * All settings have defaults, so both front ends (CLI and MCP server) start
 * with zero configuration. Per-crawl values given on the command line or as
 * tool arguments override the values here; this module only supplies the
 * baseline.
 *
 * ## Architecture Position
 * This module sits at the bottom of the dependency graph. It is imported by
 * the front ends and the logger but imports nothing from the application.
 *
 * ```
 *  +-----------+   +-----------+   +-----------+
 *  |    cli    |   |   tools   |   |  logger   |
 *  +-----+-----+   +-----+-----+   +-----+-----+
 *        |               |               |
 *        +-------+-------+-------+-------+
 *                |
 *          +-----v-----+
 *          |   config   |
 *          +-----------+
 * ```
 *
 * ## Environment Variable Naming Convention
 * - All uppercase with underscores (SCREAMING_SNAKE_CASE).
 * - Numeric values are parsed with `parseInt(..., 10)` or `parseFloat`.
 * - Boolean values use `"true"` / `"false"` strings.
 *
 * @example
 * ```ts
 * import { config } from "./config.js";
 * config.robotsTimeout; // 5000
 *
 * // For testing, loadConfig() gives a fresh snapshot:
 * process.env.CRAWL_DELAY = "2500";
 * loadConfig().defaultDelayMs; // 2500
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/** Log levels understood by {@link createLogger}, most verbose first. */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

/**
 * Complete application configuration.
 *
 * Every field is required and has a default.
 */
export interface AppConfig {
  /**
   * Timeout for a page fetch, in milliseconds.
   *
   * @default 15000
   */
  fetchTimeout: number;

  /**
   * Timeout for a robots.txt fetch, in milliseconds. Independent of
   * {@link fetchTimeout} so a slow robots.txt never holds a crawl for the
   * full page timeout.
   *
   * @default 5000
   */
  robotsTimeout: number;

  /**
   * Timeout for the seed reachability probe (HEAD, then GET), in milliseconds.
   *
   * @default 10000
   */
  probeTimeout: number;

  /**
   * Minimum interval between request starts on the same domain, in
   * milliseconds. A larger robots.txt `Crawl-delay` wins over this value.
   *
   * @default 1000
   */
  defaultDelayMs: number;

  /**
   * Factor applied to {@link defaultDelayMs} when a server answers HTTP 429.
   *
   * @default 3
   */
  backoffMultiplier: number;

  /**
   * Default maximum link depth (the seed is depth 0).
   *
   * @default 3
   */
  maxDepth: number;

  /**
   * Result ceiling per crawl. `0` means unlimited.
   *
   * @default 0
   */
  maxPages: number;

  /**
   * Maximum allowed response body size in bytes.
   *
   * @default 10485760
   */
  maxResponseSize: number;

  /**
   * User-Agent header sent with every outbound request.
   *
   * @default "Mozilla/5.0 (compatible; PoliteCrawl/1.0)"
   */
  userAgent: string;

  /**
   * Token matched against `User-agent` groups in robots.txt. `*` selects the
   * wildcard group.
   *
   * @default "*"
   */
  botName: string;

  /**
   * Whether robots.txt is fetched and obeyed.
   *
   * @default true
   */
  respectRobots: boolean;

  /**
   * Minimum level written to stderr.
   *
   * @default "info"
   */
  logLevel: LogLevel;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Parsing Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  return value.trim().toLowerCase() !== "false";
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value?.trim().toLowerCase());
  return level ?? "info";
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Read environment variables and build a complete {@link AppConfig}.
 *
 * Reads `process.env` at call time and returns a plain object, so tests can
 * set variables and call it again.
 */
export function loadConfig(): AppConfig {
  return {
    fetchTimeout: parseInt(process.env.FETCH_TIMEOUT ?? "15000", 10),
    robotsTimeout: parseInt(process.env.ROBOTS_TIMEOUT ?? "5000", 10),
    probeTimeout: parseInt(process.env.PROBE_TIMEOUT ?? "10000", 10),
    defaultDelayMs: parseInt(process.env.CRAWL_DELAY ?? "1000", 10),
    backoffMultiplier: parseFloat(process.env.BACKOFF_MULTIPLIER ?? "3"),
    maxDepth: parseInt(process.env.MAX_DEPTH ?? "3", 10),
    maxPages: parseInt(process.env.MAX_PAGES ?? "0", 10),
    maxResponseSize: parseInt(process.env.MAX_RESPONSE_SIZE ?? "10485760", 10),
    userAgent:
      process.env.USER_AGENT ?? "Mozilla/5.0 (compatible; PoliteCrawl/1.0)",
    botName: process.env.BOT_NAME ?? "*",
    respectRobots: parseBoolean(process.env.RESPECT_ROBOTS, true),
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Singleton Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Pre-loaded configuration snapshot, evaluated once at module load time.
 *
 * If you need a fresh config (e.g., in tests), call {@link loadConfig} directly.
 */
export const config: AppConfig = loadConfig();
