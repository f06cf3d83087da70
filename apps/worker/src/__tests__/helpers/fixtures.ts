import { vi } from "vitest";
import type { ArticleRecord, OutletMetric, RegionMetric } from "@cadence/core";
import type { ArticleStore, MetricsWriter } from "../../lib/store";
import { HttpClient, type FetchLike } from "../../lib/http";
import type { SourceContext } from "../../lib/sources";
import { HostThrottle } from "../../lib/throttle";

export type MemoryStore = ArticleStore & {
  articles: ArticleRecord[];
  outletMetrics: Map<string, OutletMetric>;
  regionMetrics: Map<string, RegionMetric>;
};

function latest<T extends { metricDate: string }>(rows: T[], metricDate?: string) {
  const date = metricDate ?? rows.map((row) => row.metricDate).sort().pop();
  return rows.filter((row) => row.metricDate === date);
}

/** In-process stand-in for the PostgreSQL store with the same uniqueness rules. */
export function createMemoryStore(): MemoryStore {
  const articles: ArticleRecord[] = [];
  const outletMetrics = new Map<string, OutletMetric>();
  const regionMetrics = new Map<string, RegionMetric>();

  const writerFor = (
    outlets: Map<string, OutletMetric>,
    regions: Map<string, RegionMetric>
  ): MetricsWriter => ({
    async writeOutletMetrics(rows) {
      for (const row of rows) outlets.set(`${row.outletId}|${row.metricDate}`, row);
    },
    async writeRegionMetrics(rows) {
      for (const row of rows) regions.set(`${row.regionId}|${row.metricDate}`, row);
    }
  });

  return {
    articles,
    outletMetrics,
    regionMetrics,
    ...writerFor(outletMetrics, regionMetrics),

    async insertArticlesIfAbsent(records) {
      let inserted = 0;
      for (const record of records) {
        const exists = articles.some(
          (existing) => existing.outletId === record.outletId && existing.hash === record.hash
        );
        if (exists) continue;
        articles.push(record);
        inserted += 1;
      }
      return inserted;
    },

    async knownHashes(outletId, hashes) {
      const wanted = new Set(hashes);
      return new Set(
        articles
          .filter((article) => article.outletId === outletId && wanted.has(article.hash))
          .map((article) => article.hash)
      );
    },

    async articlesInWindow(outletId, start, end) {
      return articles.filter(
        (article) =>
          article.outletId === outletId &&
          article.publishedAt.getTime() >= start.getTime() &&
          article.publishedAt.getTime() <= end.getTime()
      );
    },

    async withTransaction(fn) {
      const stagedOutlets = new Map<string, OutletMetric>();
      const stagedRegions = new Map<string, RegionMetric>();
      const value = await fn(writerFor(stagedOutlets, stagedRegions));
      for (const [key, row] of stagedOutlets) outletMetrics.set(key, row);
      for (const [key, row] of stagedRegions) regionMetrics.set(key, row);
      return value;
    },

    async readOutletMetrics(metricDate) {
      return latest(Array.from(outletMetrics.values()), metricDate);
    },

    async readRegionMetrics(metricDate) {
      return latest(Array.from(regionMetrics.values()), metricDate);
    }
  };
}

export type Route = () => Response;

/** `fetch` stand-in answering from a URL table; anything else is a 404. */
export function stubFetch(routes: Record<string, Route>) {
  return vi.fn<FetchLike>(async (input) => {
    const route = routes[input];
    return route ? route() : new Response("not found", { status: 404 });
  });
}

export function xml(body: string, contentType = "application/xml") {
  return () => new Response(body, { status: 200, headers: { "content-type": contentType } });
}

export function html(body: string) {
  return () => new Response(body, { status: 200, headers: { "content-type": "text/html; charset=utf-8" } });
}

export function createHttp(fetchImpl: FetchLike) {
  return new HttpClient({
    userAgent: "CadenceTest/1.0",
    timeoutMs: 5_000,
    throttle: new HostThrottle(0),
    fetchImpl
  });
}

export function sourceFor(
  fetchImpl: FetchLike,
  isAllowed: (url: string) => Promise<boolean> = async () => true
): SourceContext {
  return { http: createHttp(fetchImpl), isAllowed };
}
