/**
 * @module output/writers
 * @fileoverview Result sinks: JSON, CSV and plain text.
 *
 * | Format  | File                         | No output path        |
 * |---------|------------------------------|-----------------------|
 * | `json`  | array of results, 2-space    | same, on stdout       |
 * | `csv`   | one flattened row per result | same, on stdout       |
 * | `print` | text blocks, one per result  | same, on stdout       |
 *
 * CSV files are streamed through `fast-csv`; the column set is fixed
 * ({@link CSV_COLUMNS}) so every export has the same header.
 */

import fs from "node:fs";
import { writeFile } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { format, writeToString } from "fast-csv";
import type { CrawlResult } from "../crawler/frontier.js";
import { OutputError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export type OutputFormat = "json" | "csv" | "print";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "csv", "print"];

const FORMAT_LABELS: Record<OutputFormat, string> = {
  json: "JSON",
  csv: "CSV",
  print: "text",
};

/** One flattened CSV row. A type alias, so it satisfies fast-csv's row map. */
export type CsvRow = {
  url: string;
  domain: string;
  title: string;
  meta_description: string;
  meta_keywords: string;
  text_length: number;
  status_code: number;
  timestamp: string;
  num_links: number;
  num_images: number;
  h1_count: number;
  h2_count: number;
  h3_count: number;
  /** First three h1 texts joined with `" | "`. */
  h1_text: string;
};

export const CSV_COLUMNS: readonly (keyof CsvRow)[] = [
  "url",
  "domain",
  "title",
  "meta_description",
  "meta_keywords",
  "text_length",
  "status_code",
  "timestamp",
  "num_links",
  "num_images",
  "h1_count",
  "h2_count",
  "h3_count",
  "h1_text",
];

export interface SaveOptions {
  /** Destination file. `null` or absent writes to `stdout`. */
  output?: string | null;
  format: OutputFormat;
  /** @default process.stdout */
  stdout?: NodeJS.WritableStream;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Renderers: pure, no I/O
// ---------------------------------------------------------------------------

export function toCsvRow(result: CrawlResult): CsvRow {
  const { fields } = result;
  return {
    url: result.url,
    domain: result.domain,
    title: fields.title,
    meta_description: fields.metaDescription,
    meta_keywords: fields.metaKeywords,
    text_length: fields.textLength,
    status_code: result.statusCode,
    timestamp: result.fetchedAt,
    num_links: fields.links.length,
    num_images: fields.images.length,
    h1_count: fields.headings.h1.length,
    h2_count: fields.headings.h2.length,
    h3_count: fields.headings.h3.length,
    h1_text: fields.headings.h1.slice(0, 3).join(" | "),
  };
}

export function renderJson(results: readonly CrawlResult[]): string {
  return JSON.stringify(results, null, 2);
}

/**
 * Plain-text rendering, one block per result:
 *
 * ```
 * URL: https://example.com/
 * Title: Example
 * Description: An example page
 * Text length: 1234
 * Links found: 12
 * Status: 200
 * --------------------------------------------------
 * ```
 */
export function renderText(results: readonly CrawlResult[]): string {
  return results
    .map((result) =>
      [
        `URL: ${result.url}`,
        `Title: ${result.fields.title}`,
        `Description: ${result.fields.metaDescription}`,
        `Text length: ${result.fields.textLength}`,
        `Links found: ${result.fields.links.length}`,
        `Status: ${result.statusCode}`,
        "-".repeat(50),
        "",
      ].join("\n"),
    )
    .join("\n");
}

/** CSV document with header row. */
export async function renderCsv(results: readonly CrawlResult[]): Promise<string> {
  return writeToString(results.map(toCsvRow), { headers: [...CSV_COLUMNS] });
}

// ---------------------------------------------------------------------------
// File output
// ---------------------------------------------------------------------------

async function writeCsvFile(filePath: string, rows: CsvRow[]): Promise<void> {
  await pipeline(
    Readable.from(rows),
    format({ headers: [...CSV_COLUMNS] }),
    fs.createWriteStream(filePath),
  );
}

async function writeToFile(
  filePath: string,
  results: readonly CrawlResult[],
  outputFormat: OutputFormat,
): Promise<void> {
  switch (outputFormat) {
    case "json":
      await writeFile(filePath, renderJson(results), "utf-8");
      return;
    case "csv":
      await writeCsvFile(filePath, results.map(toCsvRow));
      return;
    case "print":
      await writeFile(filePath, renderText(results), "utf-8");
      return;
  }
}

/** Render results in `outputFormat` as one string, newline-terminated. */
export async function renderResults(
  results: readonly CrawlResult[],
  outputFormat: OutputFormat,
): Promise<string> {
  switch (outputFormat) {
    case "json":
      return `${renderJson(results)}\n`;
    case "csv":
      return `${await renderCsv(results)}\n`;
    case "print":
      return renderText(results);
  }
}

// ---------------------------------------------------------------------------
// Main Export
// ---------------------------------------------------------------------------

/**
 * Write crawl results to a file or stdout.
 *
 * Resolves `false` without writing anything when there are no results.
 *
 * @throws {OutputError} If the destination cannot be written.
 *
 * @example
 * ```ts
 * await saveResults(report.results, { output: "pages.csv", format: "csv" });
 * await saveResults(report.results, { format: "print" }); // stdout
 * ```
 */
export async function saveResults(
  results: readonly CrawlResult[],
  options: SaveOptions,
): Promise<boolean> {
  const logger = options.logger ?? silentLogger;

  if (results.length === 0) {
    logger.warn("No data to save");
    return false;
  }

  const destination = options.output ?? null;

  try {
    if (destination === null) {
      const stdout = options.stdout ?? process.stdout;
      stdout.write(await renderResults(results, options.format));
      return true;
    }

    logger.info(`Attempting to save ${results.length} items to ${destination}`);
    await writeToFile(destination, results, options.format);
    logger.info(`Successfully saved ${FORMAT_LABELS[options.format]} data to ${destination}`);
    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Error saving results: ${message}`);
    throw new OutputError(
      `Could not write results to ${destination ?? "stdout"}: ${message}`,
    );
  }
}
