import type { Pool } from "pg";
import type { ArticleRecord, OutletMetric, RegionMetric } from "@cadence/core";
import { withClient } from "./db";

export type MetricsWriter = {
  writeOutletMetrics(rows: OutletMetric[]): Promise<void>;
  writeRegionMetrics(rows: RegionMetric[]): Promise<void>;
};

export type ArticleStore = MetricsWriter & {
  insertArticlesIfAbsent(records: ArticleRecord[]): Promise<number>;
  knownHashes(outletId: string, hashes: string[]): Promise<Set<string>>;
  articlesInWindow(outletId: string, start: Date, end: Date): Promise<ArticleRecord[]>;
  withTransaction<T>(fn: (writer: MetricsWriter) => Promise<T>): Promise<T>;
  readOutletMetrics(metricDate?: string): Promise<OutletMetric[]>;
  readRegionMetrics(metricDate?: string): Promise<RegionMetric[]>;
};

type Execute = (text: string, values: unknown[]) => Promise<unknown>;

type ArticleRow = {
  outlet_id: string;
  url: string;
  title: string;
  published_at: Date;
  published_approx: boolean;
  source: "feed" | "sitemap";
  retrieved_at: Date;
  hash: string;
};

type OutletMetricRow = {
  outlet_id: string;
  metric_date: string;
  window_start: Date;
  window_end: Date;
  total_articles: number;
  days_active: number;
  posts_per_day: number;
  freshness_days: number | null;
  median_gap_days: number | null;
};

type RegionMetricRow = {
  region_id: string;
  metric_date: string;
  composite_index: number;
  total_articles: number;
  active_outlets: number;
  covering_outlets: number;
  freshness_median_days: number | null;
  avg_posts_per_day: number;
};

function metricsWriter(execute: Execute): MetricsWriter {
  return {
    async writeOutletMetrics(rows) {
      for (const row of rows) {
        await execute(
          `insert into outlet_metrics (
             outlet_id, metric_date, window_start, window_end, total_articles,
             days_active, posts_per_day, freshness_days, median_gap_days
           )
           values ($1, $2, $3, $4, $5, $6, $7, $8, $9)
           on conflict (outlet_id, metric_date)
           do update set
             window_start = excluded.window_start,
             window_end = excluded.window_end,
             total_articles = excluded.total_articles,
             days_active = excluded.days_active,
             posts_per_day = excluded.posts_per_day,
             freshness_days = excluded.freshness_days,
             median_gap_days = excluded.median_gap_days`,
          [
            row.outletId,
            row.metricDate,
            row.windowStart,
            row.windowEnd,
            row.totalArticles,
            row.daysActive,
            row.postsPerDay,
            row.freshnessDays,
            row.medianGapDays
          ]
        );
      }
    },

    async writeRegionMetrics(rows) {
      for (const row of rows) {
        await execute(
          `insert into region_metrics (
             region_id, metric_date, composite_index, total_articles, active_outlets,
             covering_outlets, freshness_median_days, avg_posts_per_day
           )
           values ($1, $2, $3, $4, $5, $6, $7, $8)
           on conflict (region_id, metric_date)
           do update set
             composite_index = excluded.composite_index,
             total_articles = excluded.total_articles,
             active_outlets = excluded.active_outlets,
             covering_outlets = excluded.covering_outlets,
             freshness_median_days = excluded.freshness_median_days,
             avg_posts_per_day = excluded.avg_posts_per_day`,
          [
            row.regionId,
            row.metricDate,
            row.compositeIndex,
            row.totalArticles,
            row.activeOutlets,
            row.coveringOutlets,
            row.freshnessMedianDays,
            row.avgPostsPerDay
          ]
        );
      }
    }
  };
}

function toArticle(row: ArticleRow): ArticleRecord {
  return {
    outletId: row.outlet_id,
    url: row.url,
    title: row.title,
    publishedAt: new Date(row.published_at),
    publishedApprox: row.published_approx,
    source: row.source,
    retrievedAt: new Date(row.retrieved_at),
    hash: row.hash
  };
}

export function createPgStore(pool: Pool): ArticleStore {
  const writer = metricsWriter((text, values) => pool.query(text, values));

  return {
    ...writer,

    async insertArticlesIfAbsent(records) {
      if (records.length === 0) return 0;
      let inserted = 0;
      for (const record of records) {
        const result = await pool.query(
          `insert into articles (
             outlet_id, url, title, published_at, published_approx, source, retrieved_at, hash
           )
           values ($1, $2, $3, $4, $5, $6, $7, $8)
           on conflict (outlet_id, hash) do nothing`,
          [
            record.outletId,
            record.url,
            record.title,
            record.publishedAt,
            record.publishedApprox,
            record.source,
            record.retrievedAt,
            record.hash
          ]
        );
        inserted += result.rowCount ?? 0;
      }
      return inserted;
    },

    async knownHashes(outletId, hashes) {
      if (hashes.length === 0) return new Set();
      const result = await pool.query<{ hash: string }>(
        "select hash from articles where outlet_id = $1 and hash = any($2::text[])",
        [outletId, hashes]
      );
      return new Set(result.rows.map((row) => row.hash));
    },

    async articlesInWindow(outletId, start, end) {
      const result = await pool.query<ArticleRow>(
        `select outlet_id, url, title, published_at, published_approx, source, retrieved_at, hash
         from articles
         where outlet_id = $1
           and published_at >= $2
           and published_at <= $3
         order by published_at`,
        [outletId, start, end]
      );
      return result.rows.map(toArticle);
    },

    async withTransaction(fn) {
      return withClient(pool, async (client) => {
        await client.query("begin");
        try {
          const value = await fn(metricsWriter((text, values) => client.query(text, values)));
          await client.query("commit");
          return value;
        } catch (error) {
          await client.query("rollback");
          throw error;
        }
      });
    },

    async readOutletMetrics(metricDate) {
      const result = await pool.query<OutletMetricRow>(
        `select outlet_id, to_char(metric_date, 'YYYY-MM-DD') as metric_date, window_start, window_end,
                total_articles, days_active, posts_per_day, freshness_days, median_gap_days
         from outlet_metrics
         where metric_date = coalesce($1::date, (select max(metric_date) from outlet_metrics))
         order by total_articles desc, outlet_id`,
        [metricDate ?? null]
      );
      return result.rows.map((row) => ({
        outletId: row.outlet_id,
        metricDate: row.metric_date,
        windowStart: new Date(row.window_start),
        windowEnd: new Date(row.window_end),
        totalArticles: row.total_articles,
        daysActive: row.days_active,
        postsPerDay: row.posts_per_day,
        freshnessDays: row.freshness_days,
        medianGapDays: row.median_gap_days
      }));
    },

    async readRegionMetrics(metricDate) {
      const result = await pool.query<RegionMetricRow>(
        `select region_id, to_char(metric_date, 'YYYY-MM-DD') as metric_date, composite_index,
                total_articles, active_outlets, covering_outlets, freshness_median_days, avg_posts_per_day
         from region_metrics
         where metric_date = coalesce($1::date, (select max(metric_date) from region_metrics))
         order by region_id`,
        [metricDate ?? null]
      );
      return result.rows.map((row) => ({
        regionId: row.region_id,
        metricDate: row.metric_date,
        compositeIndex: row.composite_index,
        totalArticles: row.total_articles,
        activeOutlets: row.active_outlets,
        coveringOutlets: row.covering_outlets,
        freshnessMedianDays: row.freshness_median_days,
        avgPostsPerDay: row.avg_posts_per_day
      }));
    }
  };
}
