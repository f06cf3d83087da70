import { ConfigurationError } from "./errors";
import type { ArticleRecord, Outlet, OutletMetric, RegionMetric } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export type MetricsResult = {
  outletMetrics: OutletMetric[];
  regionMetrics: RegionMetric[];
  unattributed: string[];
};

export function toMetricDate(date: Date) {
  return date.toISOString().slice(0, 10);
}

export function median(values: number[]) {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

function uniqueRegions(outlet: Outlet) {
  return Array.from(new Set(outlet.regionIds.map((id) => id.trim()).filter(Boolean)));
}

export function computeOutletMetric(
  outlet: Outlet,
  articles: ArticleRecord[],
  windowStart: Date,
  windowEnd: Date
): OutletMetric {
  const windowDays = (windowEnd.getTime() - windowStart.getTime()) / DAY_MS;
  if (!(windowDays > 0)) {
    throw new ConfigurationError(
      `Metrics window must be longer than zero days (got ${windowStart.toISOString()} .. ${windowEnd.toISOString()})`
    );
  }

  const startMs = windowStart.getTime();
  const endMs = windowEnd.getTime();
  const inWindow = articles.filter((article) => {
    const t = article.publishedAt.getTime();
    return article.outletId === outlet.id && t >= startMs && t <= endMs;
  });

  const days = new Set(inWindow.map((article) => toMetricDate(article.publishedAt)));
  const reliable = inWindow
    .filter((article) => !article.publishedApprox)
    .map((article) => article.publishedAt.getTime())
    .sort((a, b) => a - b);

  const gaps: number[] = [];
  for (let i = 1; i < reliable.length; i++) {
    gaps.push((reliable[i] - reliable[i - 1]) / DAY_MS);
  }

  const latest = reliable.length > 0 ? reliable[reliable.length - 1] : null;

  return {
    outletId: outlet.id,
    metricDate: toMetricDate(windowEnd),
    windowStart,
    windowEnd,
    totalArticles: inWindow.length,
    daysActive: days.size,
    postsPerDay: inWindow.length / windowDays,
    freshnessDays: latest === null ? null : (endMs - latest) / DAY_MS,
    medianGapDays: median(gaps)
  };
}

type RegionAccumulator = {
  compositeIndex: number;
  totalArticles: number;
  rates: number[];
  freshness: number[];
  active: Set<string>;
  covering: Set<string>;
};

export function computeMetrics(
  windowStart: Date,
  windowEnd: Date,
  outlets: Outlet[],
  articles: ArticleRecord[]
): MetricsResult {
  const byOutlet = new Map<string, ArticleRecord[]>();
  for (const article of articles) {
    const list = byOutlet.get(article.outletId) ?? [];
    list.push(article);
    byOutlet.set(article.outletId, list);
  }

  const outletMetrics: OutletMetric[] = [];
  const regions = new Map<string, RegionAccumulator>();
  const unattributed: string[] = [];

  for (const outlet of outlets) {
    const metric = computeOutletMetric(outlet, byOutlet.get(outlet.id) ?? [], windowStart, windowEnd);
    outletMetrics.push(metric);

    const regionIds = uniqueRegions(outlet);
    if (regionIds.length === 0) {
      unattributed.push(outlet.id);
      continue;
    }

    const share = 1 / regionIds.length;
    for (const regionId of regionIds) {
      const acc = regions.get(regionId) ?? {
        compositeIndex: 0,
        totalArticles: 0,
        rates: [],
        freshness: [],
        active: new Set<string>(),
        covering: new Set<string>()
      };
      acc.compositeIndex += metric.postsPerDay * share;
      acc.totalArticles += metric.totalArticles * share;
      acc.rates.push(metric.postsPerDay);
      if (metric.freshnessDays !== null) acc.freshness.push(metric.freshnessDays);
      if (metric.postsPerDay > 0) acc.active.add(outlet.id);
      acc.covering.add(outlet.id);
      regions.set(regionId, acc);
    }
  }

  const metricDate = toMetricDate(windowEnd);
  const regionMetrics: RegionMetric[] = Array.from(regions.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([regionId, acc]) => ({
      regionId,
      metricDate,
      compositeIndex: acc.compositeIndex,
      totalArticles: acc.totalArticles,
      activeOutlets: acc.active.size,
      coveringOutlets: acc.covering.size,
      freshnessMedianDays: median(acc.freshness),
      avgPostsPerDay: acc.rates.reduce((sum, rate) => sum + rate, 0) / acc.rates.length
    }));

  outletMetrics.sort((a, b) => a.outletId.localeCompare(b.outletId));

  return { outletMetrics, regionMetrics, unattributed };
}
