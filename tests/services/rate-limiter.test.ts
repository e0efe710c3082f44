import { describe, it, expect } from "vitest";
import { RateLimiter } from "../../src/services/rate-limiter.js";
import { FakeClock } from "../helpers/fake-web.js";

const T0 = Date.UTC(2024, 0, 1);

function limiter(robotsDelay: number | null = null, backoffMultiplier?: number) {
  const clock = new FakeClock(T0);
  const rateLimiter = new RateLimiter({
    defaultDelayMs: 1000,
    backoffMultiplier,
    robotsDelaySeconds: () => robotsDelay,
    clock,
  });
  return { clock, rateLimiter };
}

describe("RateLimiter.effectiveDelayMs", () => {
  it("uses the default delay without a robots crawl-delay", () => {
    expect(limiter(null).rateLimiter.effectiveDelayMs("example.com")).toBe(1000);
  });

  it("uses the longer of the default and the robots crawl-delay", () => {
    expect(limiter(5).rateLimiter.effectiveDelayMs("example.com")).toBe(5000);
    expect(limiter(0.5).rateLimiter.effectiveDelayMs("example.com")).toBe(1000);
  });
});

describe("RateLimiter.waitIfNeeded", () => {
  it("does not wait before the first request to a domain", async () => {
    const { clock, rateLimiter } = limiter();
    await expect(rateLimiter.waitIfNeeded("example.com")).resolves.toBe(0);
    expect(clock.sleeps).toEqual([]);
  });

  it("sleeps the remainder of the delay", async () => {
    const { clock, rateLimiter } = limiter();
    await rateLimiter.waitIfNeeded("example.com");

    await expect(rateLimiter.waitIfNeeded("example.com")).resolves.toBe(1000);

    clock.advance(400);
    await expect(rateLimiter.waitIfNeeded("example.com")).resolves.toBe(600);

    clock.advance(5000);
    await expect(rateLimiter.waitIfNeeded("example.com")).resolves.toBe(0);

    expect(clock.sleeps).toEqual([1000, 600]);
  });

  it("keeps request starts at least the delay apart", async () => {
    const { clock, rateLimiter } = limiter(2);
    const starts: number[] = [];

    for (const idle of [0, 250, 1999, 2000, 3000]) {
      clock.advance(idle);
      await rateLimiter.waitIfNeeded("example.com");
      starts.push(clock.now());
    }

    for (let i = 1; i < starts.length; i++) {
      expect(starts[i] - starts[i - 1]).toBeGreaterThanOrEqual(2000);
    }
  });

  it("serializes concurrent callers for one domain", async () => {
    const { clock, rateLimiter } = limiter();

    const waits = await Promise.all([
      rateLimiter.waitIfNeeded("example.com"),
      rateLimiter.waitIfNeeded("example.com"),
      rateLimiter.waitIfNeeded("example.com"),
    ]);

    expect(waits).toEqual([0, 1000, 1000]);
    expect(clock.now()).toBe(T0 + 2000);
  });

  it("tracks domains independently", async () => {
    const { rateLimiter } = limiter();
    await rateLimiter.waitIfNeeded("a.test");
    await expect(rateLimiter.waitIfNeeded("b.test")).resolves.toBe(0);
  });
});

describe("RateLimiter.backoff", () => {
  it("sleeps the default delay times the multiplier", async () => {
    const { clock, rateLimiter } = limiter();
    await expect(rateLimiter.backoff("example.com")).resolves.toBe(3000);
    expect(clock.sleeps).toEqual([3000]);
  });

  it("honours a custom multiplier", async () => {
    const { rateLimiter } = limiter(null, 2);
    await expect(rateLimiter.backoff("example.com")).resolves.toBe(2000);
  });
});

describe("RateLimiter.snapshot", () => {
  it("reports the last request start and effective delay per domain", async () => {
    const { rateLimiter } = limiter(5);
    await rateLimiter.waitIfNeeded("example.com");

    expect(rateLimiter.snapshot()).toEqual([
      { domain: "example.com", lastFetchTimestamp: T0, effectiveDelaySeconds: 5 },
    ]);
  });
});
