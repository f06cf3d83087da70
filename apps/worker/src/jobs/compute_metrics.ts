import { computeMetrics, type ArticleRecord, type MetricsResult, type Outlet } from "@cadence/core";
import type { ArticleStore } from "../lib/store";

const DAY_MS = 24 * 60 * 60 * 1000;

export type MetricsRunOptions = {
  days: number;
  now?: () => Date;
};

export type MetricsRunSummary = {
  metricDate: string;
  windowStart: string;
  windowEnd: string;
  outlets: number;
  regions: number;
  articles: number;
  unattributed: string[];
};

/** Reads the window's articles, computes every metric, then writes both tables in one transaction. */
export async function computeAndStoreMetrics(
  outlets: Outlet[],
  store: ArticleStore,
  options: MetricsRunOptions
): Promise<MetricsRunSummary> {
  const windowEnd = options.now ? options.now() : new Date();
  const windowStart = new Date(windowEnd.getTime() - options.days * DAY_MS);

  const articles: ArticleRecord[] = [];
  for (const outlet of outlets) {
    articles.push(...(await store.articlesInWindow(outlet.id, windowStart, windowEnd)));
  }

  const result: MetricsResult = computeMetrics(windowStart, windowEnd, outlets, articles);
  for (const outletId of result.unattributed) {
    console.info(`[metrics] outlet=${outletId} covers no regions; unattributed`);
  }

  await store.withTransaction(async (writer) => {
    await writer.writeOutletMetrics(result.outletMetrics);
    await writer.writeRegionMetrics(result.regionMetrics);
  });

  const metricDate = result.outletMetrics[0]?.metricDate ?? windowEnd.toISOString().slice(0, 10);
  console.log(
    `[metrics] date=${metricDate} outlets=${result.outletMetrics.length} regions=${result.regionMetrics.length} articles=${articles.length}`
  );

  return {
    metricDate,
    windowStart: windowStart.toISOString(),
    windowEnd: windowEnd.toISOString(),
    outlets: result.outletMetrics.length,
    regions: result.regionMetrics.length,
    articles: articles.length,
    unattributed: result.unattributed
  };
}
