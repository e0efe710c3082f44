import { describe, it, expect } from "vitest";
import { createCheckRobotsHandler } from "../../src/tools/check-robots.js";
import { FakeWeb } from "../helpers/fake-web.js";

describe("check_robots tool", () => {
  it("reports a disallowed URL and the crawl-delay", async () => {
    const web = new FakeWeb().robots(
      "https://example.com",
      "User-agent: *\nDisallow: /private\nCrawl-delay: 2\n",
    );

    const result = await createCheckRobotsHandler(web.fetch)({
      url: "https://example.com/private/page",
      bot_name: "*",
    });

    expect(result.content[0].text).toBe(
      [
        "URL: https://example.com/private/page",
        "robots.txt: https://example.com/robots.txt (rules)",
        "Bot: *",
        "Allowed: no",
        "Crawl-delay: 2s",
      ].join("\n"),
    );
  });

  it("allows everything when there is no robots.txt", async () => {
    const web = new FakeWeb();

    const result = await createCheckRobotsHandler(web.fetch)({
      url: "https://example.com/page",
      bot_name: "PoliteBot",
    });

    expect(result.content[0].text).toBe(
      [
        "URL: https://example.com/page",
        "robots.txt: https://example.com/robots.txt (not found, everything allowed)",
        "Bot: PoliteBot",
        "Allowed: yes",
        "Crawl-delay: none",
      ].join("\n"),
    );
    expect(web.requests.map((r) => r.url)).toEqual(["https://example.com/robots.txt"]);
  });

  it("returns an error result for a non-http URL", async () => {
    const result = await createCheckRobotsHandler(new FakeWeb().fetch)({
      url: "ftp://example.com/file",
      bot_name: "*",
    });

    expect(result.isError).toBe(true);
    expect(result.content[0].text.startsWith("[INVALID_URL]")).toBe(true);
  });
});
