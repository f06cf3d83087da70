import { describe, expect, it } from "vitest";
import { contentHash, getHost, normalizeUrl, resolveUrl } from "../urls";

describe("normalizeUrl", () => {
  it("lowercases, trims and strips query and fragment", () => {
    expect(normalizeUrl("  HTTPS://Example.com/Story?utm_source=x#top ")).toBe("https://example.com/story");
    expect(normalizeUrl("https://example.com/a#frag")).toBe("https://example.com/a");
  });
});

describe("contentHash", () => {
  it("gives URL variants of one article the same identity", () => {
    expect(contentHash("https://example.com/a?ref=rss")).toBe(contentHash("HTTPS://EXAMPLE.COM/a"));
    expect(contentHash("https://example.com/a")).not.toBe(contentHash("https://example.com/b"));
    expect(contentHash("https://example.com/a")).toMatch(/^[0-9a-f]{40}$/);
  });
});

describe("resolveUrl", () => {
  it("resolves relative links against the base", () => {
    expect(resolveUrl("https://example.com/news/", "/feed")).toBe("https://example.com/feed");
    expect(resolveUrl("https://example.com/news/", "story")).toBe("https://example.com/news/story");
  });
});

describe("getHost", () => {
  it("returns the lowercased host with port", () => {
    expect(getHost("https://News.Example.com:8080/x")).toBe("news.example.com:8080");
    expect(getHost("not a url")).toBe("");
  });
});
