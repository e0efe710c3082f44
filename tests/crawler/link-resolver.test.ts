/**
 * @fileoverview Tests for outgoing-link discovery.
 *
 * extractLinks resolves with `new URL(href, base)`, so absolute hrefs keep
 * their own origin and relative ones take the base's directory.
 */

import { describe, it, expect } from "vitest";
import { extractLinks } from "../../src/crawler/link-resolver.js";

const BASE = "https://example.com/docs/";

function anchors(...hrefs: string[]): string {
  return `<html><body>${hrefs.map((h) => `<a href="${h}">x</a>`).join("")}</body></html>`;
}

describe("extractLinks", () => {
  it("resolves relative hrefs against the base URL, in document order", () => {
    expect(extractLinks(anchors("/about", "page", "../up", "https://other.test/x"), BASE)).toEqual([
      "https://example.com/about",
      "https://example.com/docs/page",
      "https://example.com/up",
      "https://other.test/x",
    ]);
  });

  it("keeps the first occurrence of a repeated href", () => {
    expect(extractLinks(anchors("/a", "/b", "/a"), BASE)).toEqual([
      "https://example.com/a",
      "https://example.com/b",
    ]);
  });

  it("leaves query strings and fragments for the caller to canonicalize", () => {
    expect(extractLinks(anchors("/a?x=1", "/a#part"), BASE)).toEqual([
      "https://example.com/a?x=1",
      "https://example.com/a#part",
    ]);
  });

  it("skips fragment-only, empty and whitespace hrefs", () => {
    expect(extractLinks(anchors("#top", "", "   "), BASE)).toEqual([]);
  });

  it("skips non-fetchable schemes", () => {
    const html = anchors(
      "javascript:void(0)",
      "mailto:team@example.com",
      "tel:+100",
      "data:text/plain,hi",
      "ftp://files.example.com/a",
      "JAVASCRIPT:alert(1)",
    );
    expect(extractLinks(html, BASE)).toEqual([]);
  });

  it("skips hrefs the URL parser rejects", () => {
    expect(extractLinks(anchors("http://", "/ok"), BASE)).toEqual(["https://example.com/ok"]);
  });

  it("ignores anchors without an href", () => {
    expect(extractLinks('<a name="x">x</a><a href="/y">y</a>', BASE)).toEqual([
      "https://example.com/y",
    ]);
  });
});
