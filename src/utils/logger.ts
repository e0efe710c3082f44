/**
 * @module utils/logger
 * @fileoverview Leveled stderr logger shared by every crawl component.
 *
 * Output goes through `console.error` only: stdout carries crawl results in
 * the CLI and the JSON-RPC stream in the MCP server, so nothing else may be
 * written there. Lines look like
 *
 * ```
 * [frontier] INFO Starting crawl from: https://example.com/
 * ```
 *
 * Components receive a {@link Logger} through their options instead of
 * importing a global one, so two crawl sessions in one process can log at
 * different levels and tests can capture output.
 */

import { config, type LogLevel } from "../config.js";

export type { LogLevel };

/** Minimal logging surface used across the crawler. */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** A logger writing with a different `[scope]` prefix at the same level. */
  child(scope: string): Logger;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Create a logger for `scope` that drops messages below `level`.
 *
 * @example
 * ```ts
 * const log = createLogger("robots", "debug");
 * log.debug("Loaded robots.txt for example.com");
 * // stderr: [robots] DEBUG Loaded robots.txt for example.com
 * ```
 */
export function createLogger(
  scope: string,
  level: LogLevel = config.logLevel,
): Logger {
  const threshold = SEVERITY[level];

  const write = (messageLevel: Exclude<LogLevel, "silent">, message: string) => {
    if (SEVERITY[messageLevel] < threshold) {
      return;
    }
    console.error(`[${scope}] ${messageLevel.toUpperCase()} ${message}`);
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
    child: (childScope) => createLogger(childScope, level),
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = createLogger("silent", "silent");
