/**
 * @fileoverview Tests for the crawl engine.
 *
 * Every session runs against a FakeWeb (canned responses keyed by URL) and a
 * FakeClock whose sleeps advance time instantly, so request spacing can be
 * asserted exactly.
 */

import { describe, it, expect } from "vitest";
import { CrawlSession, type CrawlOptions } from "../../src/crawler/frontier.js";
import {
  ConnectionError,
  InvalidOptionsError,
  InvalidUrlError,
  SeedDisallowedError,
} from "../../src/utils/errors.js";
import {
  FakeClock,
  FakeWeb,
  createRecordingLogger,
  linkPage,
} from "../helpers/fake-web.js";

const ORIGIN = "https://example.com";
const START = `${ORIGIN}/`;
const T0 = Date.UTC(2024, 0, 1);

function harness() {
  const clock = new FakeClock(T0);
  const web = new FakeWeb(clock);
  const logger = createRecordingLogger();

  const session = (options: Partial<CrawlOptions> = {}) =>
    new CrawlSession(
      {
        startUrl: START,
        maxDepth: 3,
        delayMs: 1000,
        respectRobots: true,
        botName: "*",
        userAgent: "test-agent",
        maxPages: 0,
        probeSeed: false,
        ...options,
      },
      { fetcher: web.fetch, clock, logger },
    );

  return { clock, web, logger, session };
}

/** Times of page GETs, robots.txt excluded. */
function pageGetTimes(web: FakeWeb): number[] {
  return web.requests
    .filter((r) => (r.method ?? "GET") === "GET" && !r.url.endsWith("/robots.txt"))
    .map((r) => r.at ?? Number.NaN);
}

function gaps(times: number[]): number[] {
  return times.slice(1).map((t, i) => t - times[i]);
}

// ---------------------------------------------------------------------------
// Traversal
// ---------------------------------------------------------------------------

describe("CrawlSession traversal", () => {
  it("fetches each canonical URL once, breadth first", async () => {
    const { web, session } = harness();
    web
      .html(START, linkPage("Home", ["/a", "/b", "/a#x", "/a?q=1"]))
      .html(`${ORIGIN}/a`, linkPage("A", ["/", "/b"]))
      .html(`${ORIGIN}/b`, linkPage("B", ["/c"]))
      .html(`${ORIGIN}/c`, linkPage("C", []));

    const report = await session().run();

    expect(report.results.map((r) => r.url)).toEqual([
      START,
      `${ORIGIN}/a`,
      `${ORIGIN}/b`,
      `${ORIGIN}/c`,
    ]);
    expect(report.results.map((r) => r.depth)).toEqual([0, 1, 1, 2]);
    expect(web.pageGets()).toEqual([START, `${ORIGIN}/a`, `${ORIGIN}/b`, `${ORIGIN}/c`]);
    expect(report.visitedCount).toBe(4);
    expect(report.status).toBe("completed");
    expect(report.stoppedReason).toBe("frontier_exhausted");
  });

  it("records status, domain, fetch time and page fields", async () => {
    const { web, session } = harness();
    web.html(START, linkPage("Home", ["/a"])).html(`${ORIGIN}/a`, linkPage("A", []));

    const [first] = (await session().run()).results;

    expect(first.statusCode).toBe(200);
    expect(first.domain).toBe("example.com");
    expect(first.fetchedAt).toBe("2024-01-01T00:00:00.000Z");
    expect(first.fields.title).toBe("Home");
    expect(first.fields.headings.h1).toEqual(["Home"]);
    expect(first.fields.links).toEqual([`${ORIGIN}/a`]);
  });

  it("canonicalizes the start URL", async () => {
    const { web, session } = harness();
    web.html(START, linkPage("Home", []));

    const crawl = session({ startUrl: "https://Example.com/?utm_source=x#top" });
    const report = await crawl.run();

    expect(crawl.startUrl).toBe(START);
    expect(report.results.map((r) => r.url)).toEqual([START]);
  });

  it("does not go past maxDepth", async () => {
    const { web, session } = harness();
    web
      .html(START, linkPage("Home", ["/a"]))
      .html(`${ORIGIN}/a`, linkPage("A", ["/b"]))
      .html(`${ORIGIN}/b`, linkPage("B", []));

    const report = await session({ maxDepth: 1 }).run();

    expect(report.results.map((r) => r.url)).toEqual([START, `${ORIGIN}/a`]);
    expect(web.count(`${ORIGIN}/b`)).toBe(0);
  });

  it("fetches only the seed at depth 0", async () => {
    const { web, session } = harness();
    web.html(START, linkPage("Home", ["/a"])).html(`${ORIGIN}/a`, linkPage("A", []));

    const report = await session({ maxDepth: 0 }).run();

    expect(web.pageGets()).toEqual([START]);
    expect(report.results).toHaveLength(1);
  });

  it("resolves links against the final URL after a redirect", async () => {
    const { web, session } = harness();
    web
      .html(START, linkPage("Home", ["/old"]))
      .page(`${ORIGIN}/old`, { redirectTo: "/new/" })
      .html(`${ORIGIN}/new/`, linkPage("New", ["child"]))
      .html(`${ORIGIN}/new/child`, linkPage("Child", []));

    const report = await session().run();

    expect(report.results.map((r) => r.url)).toEqual([
      START,
      `${ORIGIN}/old`,
      `${ORIGIN}/new/child`,
    ]);
  });

  it("skips error statuses and non-HTML responses", async () => {
    const { web, logger, session } = harness();
    web
      .html(START, linkPage("Home", ["/broken", "/file.pdf"]))
      .page(`${ORIGIN}/broken`, { status: 500, body: "oops" })
      .page(`${ORIGIN}/file.pdf`, { contentType: "application/pdf", body: "%PDF" });

    const report = await session().run();

    expect(report.results.map((r) => r.url)).toEqual([START]);
    expect(report.visitedCount).toBe(3);
    expect(logger.messages("warn")).toContain(`HTTP 500 for ${ORIGIN}/broken`);
    expect(logger.messages("debug")).toContain(
      `Skipping non-HTML content: ${ORIGIN}/file.pdf (application/pdf)`,
    );
  });

  it("moves on after a connection failure", async () => {
    const { web, logger, session } = harness();
    web
      .html(START, linkPage("Home", ["/down", "/up"]))
      .page(`${ORIGIN}/down`, { error: new ConnectionError("refused") })
      .html(`${ORIGIN}/up`, linkPage("Up", []));

    const report = await session().run();

    expect(report.results.map((r) => r.url)).toEqual([START, `${ORIGIN}/up`]);
    expect(logger.messages("warn")).toContain(`Connection error for ${ORIGIN}/down`);
  });
});

// ---------------------------------------------------------------------------
// Politeness
// ---------------------------------------------------------------------------

describe("CrawlSession politeness", () => {
  it("spaces requests to one domain by the default delay", async () => {
    const { web, session } = harness();
    web
      .html(START, linkPage("Home", ["/a", "/b"]))
      .html(`${ORIGIN}/a`, linkPage("A", []))
      .html(`${ORIGIN}/b`, linkPage("B", []));

    await session().run();

    expect(pageGetTimes(web)).toEqual([T0, T0 + 1000, T0 + 2000]);
  });

  it("uses a longer robots.txt crawl-delay", async () => {
    const { web, session } = harness();
    web
      .robots(ORIGIN, "User-agent: *\nCrawl-delay: 5\n")
      .html(START, linkPage("Home", ["/a"]))
      .html(`${ORIGIN}/a`, linkPage("A", ["/b"]))
      .html(`${ORIGIN}/b`, linkPage("B", []));

    const report = await session().run();

    expect(gaps(pageGetTimes(web))).toEqual([5000, 5000]);
    expect(report.crawlDelays).toEqual({ "example.com": 5 });
  });

  it("requests robots.txt once per domain", async () => {
    const { web, session } = harness();
    web
      .html(START, linkPage("Home", ["/a", "/b"]))
      .html(`${ORIGIN}/a`, linkPage("A", []))
      .html(`${ORIGIN}/b`, linkPage("B", []));

    await session().run();

    expect(web.count(`${ORIGIN}/robots.txt`)).toBe(1);
  });

  it("never fetches a URL robots.txt disallows, whatever the include patterns say", async () => {
    const { web, session } = harness();
    web
      .robots(ORIGIN, "User-agent: *\nDisallow: /private\n")
      .html(START, linkPage("Home", ["/private/x", "/public"]))
      .html(`${ORIGIN}/private/x`, linkPage("Secret", []))
      .html(`${ORIGIN}/public`, linkPage("Public", []));

    const report = await session({ include: ["*"] }).run();

    expect(report.results.map((r) => r.url)).toEqual([START, `${ORIGIN}/public`]);
    expect(web.count(`${ORIGIN}/private/x`)).toBe(0);
  });

  it("applies robots.txt to same-host links on another scheme", async () => {
    const { web, session } = harness();
    web
      .robots(ORIGIN, "User-agent: *\nDisallow: /private\n")
      .html(START, linkPage("Home", ["http://example.com/private/x", "http://example.com/open"]))
      .html("http://example.com/private/x", linkPage("Secret", []))
      .html("http://example.com/open", linkPage("Open", []));

    const report = await session().run();

    expect(report.results.map((r) => r.url)).toEqual([START, "http://example.com/open"]);
    expect(web.count("http://example.com/private/x")).toBe(0);
  });

  it("backs off after HTTP 429 and skips the page", async () => {
    const { web, clock, logger, session } = harness();
    web
      .html(START, linkPage("Home", ["/a"]))
      .page(`${ORIGIN}/a`, { status: 429, body: "slow down" });

    const report = await session().run();

    expect(report.results.map((r) => r.url)).toEqual([START]);
    expect(clock.sleeps).toEqual([1000, 3000]);
    expect(logger.messages("warn")).toContain(
      `Rate limited on ${ORIGIN}/a, waiting extra time...`,
    );
  });

  it("aborts when robots.txt disallows the seed", async () => {
    const { web, session } = harness();
    web.robots(ORIGIN, "User-agent: *\nDisallow: /\n").html(START, linkPage("Home", []));

    const crawl = session();
    await expect(crawl.run()).rejects.toBeInstanceOf(SeedDisallowedError);
    expect(crawl.state).toBe("aborted");
    expect(web.pageGets()).toEqual([]);
  });

  it("ignores robots.txt entirely when compliance is off", async () => {
    const { web, session } = harness();
    web
      .robots(ORIGIN, "User-agent: *\nDisallow: /\n")
      .html(START, linkPage("Home", ["/a"]))
      .html(`${ORIGIN}/a`, linkPage("A", []));

    const report = await session({ respectRobots: false }).run();

    expect(report.results.map((r) => r.url)).toEqual([START, `${ORIGIN}/a`]);
    expect(report.respectRobots).toBe(false);
    expect(web.count(`${ORIGIN}/robots.txt`)).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Filtering and scope
// ---------------------------------------------------------------------------

describe("CrawlSession filtering and scope", () => {
  it("skips URLs matching an exclude pattern", async () => {
    const { web, session } = harness();
    web
      .html(START, linkPage("Home", ["/login", "/about"]))
      .html(`${ORIGIN}/login`, linkPage("Login", []))
      .html(`${ORIGIN}/about`, linkPage("About", []));

    const report = await session({ exclude: ["*login*"] }).run();

    expect(report.results.map((r) => r.url)).toEqual([START, `${ORIGIN}/about`]);
    expect(web.count(`${ORIGIN}/login`)).toBe(0);
  });

  it("stays on the start domain by default", async () => {
    const { web, session } = harness();
    web
      .html(START, linkPage("Home", ["https://other.test/"]))
      .html("https://other.test/", linkPage("Other", []));

    const report = await session().run();

    expect(report.results.map((r) => r.url)).toEqual([START]);
    expect(report.hopsUsed).toBe(0);
  });

  it("enters at most externalHopBudget external domains", async () => {
    const { web, session } = harness();
    web
      .html(START, linkPage("Home", ["https://ext1.test/", "https://ext2.test/"]))
      .html("https://ext1.test/", linkPage("Ext1", ["/more"]))
      .html("https://ext1.test/more", linkPage("More", []))
      .html("https://ext2.test/", linkPage("Ext2", []));

    const report = await session({ allowExternal: true, externalHopBudget: 1 }).run();

    expect(report.results.map((r) => r.url)).toEqual([
      START,
      "https://ext1.test/",
      "https://ext1.test/more",
    ]);
    expect(report.hopsUsed).toBe(1);
    expect(report.admittedExternalDomains).toEqual(["ext1.test"]);
    expect(web.count("https://ext2.test/")).toBe(0);
  });

  it("queues every unvisited link when admission is deferred to dequeue", async () => {
    const eager = harness();
    eager.web.html(START, linkPage("Home", ["/login"]));
    await eager.session({ exclude: ["*login*"] }).run();

    const lazy = harness();
    lazy.web.html(START, linkPage("Home", ["/login"]));
    await lazy.session({ exclude: ["*login*"], admitOnDiscovery: false }).run();

    expect(eager.logger.messages("debug")).toContain(`Found 0 valid links on ${START}`);
    expect(lazy.logger.messages("debug")).toContain(`Found 1 valid links on ${START}`);
    expect(lazy.web.count(`${ORIGIN}/login`)).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

describe("CrawlSession lifecycle", () => {
  it("stops at the page limit", async () => {
    const { web, session } = harness();
    web
      .html(START, linkPage("Home", ["/a", "/b", "/c"]))
      .html(`${ORIGIN}/a`, linkPage("A", []))
      .html(`${ORIGIN}/b`, linkPage("B", []))
      .html(`${ORIGIN}/c`, linkPage("C", []));

    const report = await session({ maxPages: 2 }).run();

    expect(report.results.map((r) => r.url)).toEqual([START, `${ORIGIN}/a`]);
    expect(report.stoppedReason).toBe("page_limit");
    expect(report.status).toBe("completed");
  });

  it("keeps collected results when cancelled", async () => {
    const { web, session } = harness();
    const controller = new AbortController();
    web
      .html(START, linkPage("Home", ["/a", "/b"]))
      .page(`${ORIGIN}/a`, () => {
        controller.abort();
        return { body: linkPage("A", []) };
      })
      .html(`${ORIGIN}/b`, linkPage("B", []));

    const crawl = session();
    const report = await crawl.run(controller.signal);

    expect(report.results.map((r) => r.url)).toEqual([START, `${ORIGIN}/a`]);
    expect(report.status).toBe("aborted");
    expect(report.stoppedReason).toBe("cancelled");
    expect(crawl.state).toBe("aborted");
    expect(web.count(`${ORIGIN}/b`)).toBe(0);
  });

  it("runs only once", async () => {
    const { web, session } = harness();
    web.html(START, linkPage("Home", []));

    const crawl = session();
    await crawl.run();

    expect(crawl.state).toBe("completed");
    await expect(crawl.run()).rejects.toMatchObject({ code: "INVALID_STATE" });
  });

  it("probes the seed with HEAD before crawling", async () => {
    const { web, logger, session } = harness();
    web.html(START, linkPage("Home", []));

    await session({ probeSeed: true }).run();

    expect(web.requests[0]).toMatchObject({ url: START, method: "HEAD" });
    expect(logger.messages("info")).toContain("Start URL returned status: 200 (HEAD)");
  });

  it("crawls on when the seed probe fails", async () => {
    const { web, logger, session } = harness();
    web.page(START, (request) =>
      request.readBody === false
        ? { error: new ConnectionError("refused") }
        : { body: linkPage("Home", []) },
    );

    const report = await session({ probeSeed: true }).run();

    expect(logger.messages("warn")).toContain(
      "Could not test start URL accessibility: [CONNECTION_FAILED] refused",
    );
    expect(report.results.map((r) => r.url)).toEqual([START]);
  });

  it("rejects invalid options at construction", () => {
    const { session } = harness();
    expect(() => session({ maxDepth: -1 })).toThrow(InvalidOptionsError);
    expect(() => session({ startUrl: "ftp://example.com/" })).toThrow(InvalidUrlError);
    expect(() => session({ exclude: ["^(broken"] })).toThrow(InvalidOptionsError);
  });
});
