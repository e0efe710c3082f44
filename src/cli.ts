/**
 * @fileoverview Entry point of the `polite-crawl` command.
 *
 * ```
 *   argv --> parseArgs --> validateArgs --> CrawlSession.run(signal)
 *                                                 |
 *                        SIGINT --> abort --------+
 *                                                 v
 *                                  summary (verbose / print)
 *                                  saveResults (file or stdout)
 * ```
 *
 * Logging goes to stderr, so `--format print` output on stdout can be piped.
 * The first Ctrl+C stops the crawl after the page in flight and saves the
 * partial results; a second one exits immediately.
 *
 * @module cli
 */

import { config } from "./config.js";
import {
  USAGE,
  parseArgs,
  toCrawlOptions,
  validateArgs,
  type CliOptions,
} from "./cli/args.js";
import { CrawlSession, type CrawlReport } from "./crawler/frontier.js";
import { saveResults } from "./output/writers.js";
import { buildSummary, formatSummary } from "./output/summary.js";
import { formatError } from "./utils/errors.js";
import { createLogger, type Logger } from "./utils/logger.js";

// ---------------------------------------------------------------------------
// Result handling
// ---------------------------------------------------------------------------

async function savePartialResults(
  report: CrawlReport,
  options: CliOptions,
  logger: Logger,
): Promise<void> {
  console.error("\nCrawling interrupted by user");
  if (report.results.length === 0) {
    return;
  }

  console.error(`Partial results: ${report.results.length} pages scraped`);
  const output = options.output ?? `partial-${Math.floor(Date.now() / 1000)}.json`;
  const format = options.output === null ? "json" : options.format;
  await saveResults(report.results, { output, format, logger });
  console.error(`Partial results saved to ${output}`);
}

async function printDiagnostics(session: CrawlSession, report: CrawlReport): Promise<void> {
  console.log("No data was scraped. Check your URL and settings.");
  console.log(`Visited URLs: ${report.visitedCount}`);
  const accessible = report.respectRobots
    ? String(await session.robots.canFetch(session.startUrl))
    : "Not checked";
  console.log(`Start URL accessible: ${accessible}`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/**
 * Run the command and resolve with the process exit code.
 */
async function main(argv: readonly string[]): Promise<number> {
  try {
    const raw = parseArgs(argv);
    if (raw.help) {
      console.log(USAGE);
      return 0;
    }

    const options = validateArgs(raw);
    const logger = createLogger("polite-crawl", options.verbose ? "debug" : config.logLevel);
    const session = new CrawlSession(toCrawlOptions(options), { logger });

    const controller = new AbortController();
    const onSigint = () => {
      if (controller.signal.aborted) {
        process.exit(130);
      }
      logger.warn("Interrupt received, stopping after the current page (Ctrl+C again to quit)");
      controller.abort();
    };
    process.on("SIGINT", onSigint);

    let report: CrawlReport;
    try {
      report = await session.run(controller.signal);
    } finally {
      process.off("SIGINT", onSigint);
    }

    if (report.stoppedReason === "cancelled") {
      await savePartialResults(report, options, logger);
      return 130;
    }

    if (options.verbose || options.format === "print") {
      console.log(formatSummary(buildSummary(report)));
    }

    if (report.results.length === 0) {
      await printDiagnostics(session, report);
      return 0;
    }

    await saveResults(report.results, {
      output: options.output,
      format: options.format,
      logger,
    });
    return 0;
  } catch (error) {
    console.error(`Error: ${formatError(error)}`);
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  },
);
