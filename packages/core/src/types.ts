export type AcquisitionMethod = "feed" | "sitemap";

export type OutletStatus = "ok" | "skipped-policy" | "skipped-config" | "failed";

export type Outlet = {
  id: string;
  name: string;
  homepageUrl: string | null;
  feedUrl: string | null;
  category: string;
  owner: string;
  regionIds: string[];
};

export type ArticleCandidate = {
  title: string;
  link: string;
  publishedAt: Date | null;
};

export type ArticleRecord = {
  outletId: string;
  url: string;
  title: string;
  publishedAt: Date;
  publishedApprox: boolean;
  source: AcquisitionMethod;
  retrievedAt: Date;
  hash: string;
};

export type OutletMetric = {
  outletId: string;
  metricDate: string;
  windowStart: Date;
  windowEnd: Date;
  totalArticles: number;
  daysActive: number;
  postsPerDay: number;
  freshnessDays: number | null;
  medianGapDays: number | null;
};

export type RegionMetric = {
  regionId: string;
  metricDate: string;
  compositeIndex: number;
  totalArticles: number;
  activeOutlets: number;
  coveringOutlets: number;
  freshnessMedianDays: number | null;
  avgPostsPerDay: number;
};
