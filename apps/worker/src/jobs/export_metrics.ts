import { mkdirSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import type { OutletMetric, RegionMetric } from "@cadence/core";
import type { ArticleStore } from "../lib/store";

type Cell = string | number | null;

function csvCell(value: Cell) {
  if (value === null) return "";
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(header: string[], rows: Cell[][]) {
  return [header, ...rows].map((row) => row.map(csvCell).join(",")).join("\n") + "\n";
}

export function outletMetricsCsv(rows: OutletMetric[]) {
  return toCsv(
    [
      "outlet_id",
      "metric_date",
      "window_start",
      "window_end",
      "total_articles",
      "days_active",
      "avg_posts_per_day",
      "freshness_days",
      "median_gap_days"
    ],
    rows.map((row) => [
      row.outletId,
      row.metricDate,
      row.windowStart.toISOString(),
      row.windowEnd.toISOString(),
      row.totalArticles,
      row.daysActive,
      row.postsPerDay,
      row.freshnessDays,
      row.medianGapDays
    ])
  );
}

export function regionMetricsCsv(rows: RegionMetric[]) {
  return toCsv(
    [
      "region_id",
      "metric_date",
      "cfi",
      "total_articles",
      "outlets_active",
      "outlets_covering",
      "freshness_p50_days",
      "avg_posts_per_day"
    ],
    rows.map((row) => [
      row.regionId,
      row.metricDate,
      row.compositeIndex,
      row.totalArticles,
      row.activeOutlets,
      row.coveringOutlets,
      row.freshnessMedianDays,
      row.avgPostsPerDay
    ])
  );
}

export async function exportMetrics(
  store: Pick<ArticleStore, "readOutletMetrics" | "readRegionMetrics">,
  outDir: string,
  metricDate?: string
) {
  const outlets = await store.readOutletMetrics(metricDate);
  const regions = await store.readRegionMetrics(metricDate);

  mkdirSync(outDir, { recursive: true });
  const outletPath = resolve(outDir, "outlet_metrics.csv");
  const regionPath = resolve(outDir, "region_metrics.csv");
  writeFileSync(outletPath, outletMetricsCsv(outlets), "utf-8");
  writeFileSync(regionPath, regionMetricsCsv(regions), "utf-8");

  console.log(`[export] wrote ${outletPath} (${outlets.length} rows) and ${regionPath} (${regions.length} rows)`);
  return { outletPath, regionPath, outlets: outlets.length, regions: regions.length };
}
