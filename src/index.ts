/**
 * @module index
 * @fileoverview polite-crawl MCP server entry point.
 *
 * Creates an {@link McpServer}, registers the crawler's tools and serves them
 * over stdio.
 *
 * ## Available Tools
 * | Tool           | Description                                        | Module                     |
 * |----------------|----------------------------------------------------|----------------------------|
 * | `crawl`        | Polite BFS crawl with robots.txt and rate limits    | `./tools/crawl.js`         |
 * | `check_robots` | robots.txt verdict and crawl-delay for one URL      | `./tools/check-robots.js`  |
 *
 * ## Architecture
 * ```
 * MCP Client
 *   |
 *   | stdio (JSON-RPC over stdin/stdout)
 *   v
 * index.ts (this file) -- McpServer
 *   |
 *   +-- crawl        --> crawler/frontier.ts --> services/{robots,rate-limiter,fetch}.ts
 *   +-- check_robots --> services/robots.ts  --> services/fetch.ts
 * ```
 *
 * stdout carries the JSON-RPC stream; all logging goes to stderr.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { CrawlSchema, handleCrawl } from "./tools/crawl.js";
import { CheckRobotsSchema, handleCheckRobots } from "./tools/check-robots.js";

// ---------------------------------------------------------------------------
// Server Initialization
// ---------------------------------------------------------------------------

const server = new McpServer(
  {
    name: "polite-crawl",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

// ---------------------------------------------------------------------------
// Tool Registration
// ---------------------------------------------------------------------------

server.tool(
  "crawl",
  "Crawl a website breadth-first from a URL, obeying robots.txt and per-domain rate limits. Returns a crawl summary and per-page fields (title, meta description, headings, links, images) as JSON, CSV or text.",
  CrawlSchema,
  handleCrawl,
);

server.tool(
  "check_robots",
  "Check whether robots.txt allows a bot to fetch a URL, and report the crawl-delay it declares.",
  CheckRobotsSchema,
  handleCheckRobots,
);

// ---------------------------------------------------------------------------
// Server Startup
// ---------------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Server error:", error);
  process.exit(1);
});
