import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError, DataIntegrityViolation, type Outlet } from "@cadence/core";
import { harvestOutlets } from "../jobs/harvest_outlets";
import { RobotsPolicy } from "../lib/robots";
import { createHttp, createMemoryStore, stubFetch, xml } from "./helpers/fixtures";

const NOW = new Date("2024-03-01T00:00:00.000Z");

const OUTLETS: Outlet[] = [
  {
    id: "gazette",
    name: "Valley Gazette",
    homepageUrl: "https://gazette.example/",
    feedUrl: null,
    category: "newspaper",
    owner: "Independent",
    regionIds: ["06001"]
  },
  {
    id: "radio",
    name: "Radio One",
    homepageUrl: "https://radio.example/",
    feedUrl: "https://radio.example/news.rss",
    category: "radio",
    owner: "Public",
    regionIds: ["06001", "06013"]
  },
  {
    id: "newsletter",
    name: "Bay Letter",
    homepageUrl: null,
    feedUrl: null,
    category: "digital",
    owner: "Independent",
    regionIds: []
  }
];

const RADIO_FEED = `<?xml version="1.0"?>
<rss version="2.0"><channel><title>Radio One</title>
  <item><title>Morning report</title><link>https://radio.example/morning</link><pubDate>Tue, 27 Feb 2024 07:00:00 GMT</pubDate></item>
  <item><title>Evening report</title><link>https://radio.example/evening</link><pubDate>Tue, 27 Feb 2024 19:00:00 GMT</pubDate></item>
</channel></rss>`;

function setup() {
  const fetchImpl = stubFetch({ "https://radio.example/news.rss": xml(RADIO_FEED) });
  const http = createHttp(fetchImpl);
  const store = createMemoryStore();
  return {
    fetchImpl,
    store,
    context: { http, robots: new RobotsPolicy(http, "CadenceTest/1.0"), store }
  };
}

describe("harvestOutlets", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("records a status for every outlet and keeps going past failures", async () => {
    const { context, store } = setup();

    const summary = await harvestOutlets(OUTLETS, context, {
      days: 30,
      maxPerOutlet: 50,
      now: () => NOW
    });

    expect(summary.windowStart).toBe("2024-01-31T00:00:00.000Z");
    expect(summary.outlets).toBe(3);
    expect(summary.processed).toBe(1);
    expect(summary.inserted).toBe(2);
    expect(summary.aborted).toBe(false);
    expect(summary.counts).toEqual({ ok: 1, "skipped-policy": 0, "skipped-config": 1, failed: 1 });
    expect(summary.statuses).toEqual({
      gazette: { status: "failed", method: null, inserted: 0 },
      radio: { status: "ok", method: "feed", inserted: 2 },
      newsletter: { status: "skipped-config", method: null, inserted: 0 }
    });
    expect(store.articles.map((article) => article.outletId)).toEqual(["radio", "radio"]);
  });

  it("probes every feed location and the site map for an outlet without a declared feed", async () => {
    const { context, fetchImpl } = setup();

    await harvestOutlets(OUTLETS, context, {
      days: 30,
      maxPerOutlet: 50,
      onlyOutletId: "gazette",
      now: () => NOW
    });

    expect(fetchImpl.mock.calls.map(([url]) => url)).toEqual([
      "https://gazette.example/robots.txt",
      "https://gazette.example/feed",
      "https://gazette.example/rss",
      "https://gazette.example/rss.xml",
      "https://gazette.example/feed.xml",
      "https://gazette.example/index.xml",
      "https://gazette.example/",
      "https://gazette.example/sitemap.xml"
    ]);
  });

  it("marks an outlet failed when its store call rejects and carries on with the rest", async () => {
    const { context, store } = setup();
    const knownHashes = store.knownHashes;
    store.knownHashes = async (outletId, hashes) => {
      if (outletId === "radio") throw new Error("connection terminated unexpectedly");
      return knownHashes(outletId, hashes);
    };
    const outlets: Outlet[] = [OUTLETS[1], { ...OUTLETS[1], id: "radio-2" }];

    const summary = await harvestOutlets(outlets, context, { days: 30, maxPerOutlet: 50, now: () => NOW });

    expect(summary.statuses).toEqual({
      radio: { status: "failed", method: null, inserted: 0 },
      "radio-2": { status: "ok", method: "feed", inserted: 2 }
    });
    expect(store.articles.map((article) => article.outletId)).toEqual(["radio-2", "radio-2"]);
  });

  it("ends the run on a data integrity violation", async () => {
    const { context, store } = setup();
    store.insertArticlesIfAbsent = async () => 0;

    await expect(
      harvestOutlets([OUTLETS[1]], context, { days: 30, maxPerOutlet: 50, now: () => NOW })
    ).rejects.toBeInstanceOf(DataIntegrityViolation);
  });

  it("rejects an unknown outlet filter", async () => {
    const { context } = setup();

    await expect(
      harvestOutlets(OUTLETS, context, { days: 30, maxPerOutlet: 50, onlyOutletId: "missing" })
    ).rejects.toThrow(new ConfigurationError("Outlet missing not found"));
  });

  it("starts no outlet once the run is aborted", async () => {
    const { context, fetchImpl } = setup();
    const controller = new AbortController();
    controller.abort();

    const summary = await harvestOutlets(OUTLETS, context, {
      days: 30,
      maxPerOutlet: 50,
      signal: controller.signal,
      now: () => NOW
    });

    expect(summary.aborted).toBe(true);
    expect(summary.statuses).toEqual({});
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
