import { describe, it, expect } from "vitest";
import { ScopeGuard } from "../../src/crawler/scope-guard.js";

function guard(allowExternal: boolean, externalHopBudget: number): ScopeGuard {
  return new ScopeGuard({ startDomain: "example.com", allowExternal, externalHopBudget });
}

describe("ScopeGuard", () => {
  it("always admits the start domain", () => {
    const scope = guard(false, 0);
    expect(scope.isInScope("https://example.com/")).toBe(true);
    expect(scope.isInScope("http://example.com/other")).toBe(true);
    expect(scope.snapshot().hopsUsed).toBe(0);
  });

  it("rejects other domains when external crawling is disabled", () => {
    const scope = guard(false, 5);
    expect(scope.isInScope("https://other.test/")).toBe(false);
    expect(scope.isInScope("https://docs.example.com/")).toBe(false);
    expect(scope.snapshot().hopsUsed).toBe(0);
  });

  it("treats a different port as a different domain", () => {
    expect(guard(false, 0).isInScope("https://example.com:8443/")).toBe(false);
  });

  it("spends one hop per new external domain, up to the budget", () => {
    const scope = guard(true, 1);

    expect(scope.isInScope("https://ext1.test/a")).toBe(true);
    expect(scope.isInScope("https://ext1.test/b")).toBe(true);
    expect(scope.isInScope("https://ext2.test/")).toBe(false);

    expect(scope.snapshot()).toEqual({
      startDomain: "example.com",
      allowExternal: true,
      externalHopBudget: 1,
      hopsUsed: 1,
      admittedExternalDomains: ["ext1.test"],
    });
  });

  it("admits nothing external with a zero budget", () => {
    expect(guard(true, 0).isInScope("https://ext1.test/")).toBe(false);
  });

  it("never lets hopsUsed exceed the budget or shrink", () => {
    const scope = guard(true, 3);
    let previous = 0;
    for (let i = 0; i < 10; i++) {
      scope.isInScope(`https://ext${i % 5}.test/`);
      const { hopsUsed } = scope.snapshot();
      expect(hopsUsed).toBeGreaterThanOrEqual(previous);
      expect(hopsUsed).toBeLessThanOrEqual(3);
      previous = hopsUsed;
    }
    expect(scope.snapshot().admittedExternalDomains).toEqual([
      "ext0.test",
      "ext1.test",
      "ext2.test",
    ]);
  });
});
