import { resolveUrl, type AcquisitionMethod, type Outlet } from "@cadence/core";

export const FEED_PROBE_PATHS = ["/feed", "/rss", "/rss.xml", "/feed.xml", "/index.xml"];
export const DEFAULT_SITEMAP_PATH = "/sitemap.xml";

export type FeedOrigin = "declared" | "probe" | "homepage";
export type SitemapOrigin = "robots" | "default";

export type AcquisitionAttempt =
  | { method: "feed"; url: string; origin: FeedOrigin }
  | { method: "sitemap"; url: string; origin: SitemapOrigin };

export type AttemptFor<M extends AcquisitionMethod> = Extract<AcquisitionAttempt, { method: M }>;

function absoluteUrl(value: string | null) {
  if (!value) return null;
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:" ? url.toString() : null;
  } catch {
    return null;
  }
}

/** The URL relative locations resolve against: the homepage, else an absolute declared feed. */
export function siteBase(outlet: Outlet) {
  return outlet.homepageUrl || absoluteUrl(outlet.feedUrl);
}

/**
 * Ordered acquisition plan for one outlet: feed attempts first, then a single
 * site-map fallback. An outlet with neither a homepage nor an absolute feed
 * URL gets an empty plan.
 */
export function resolveAcquisition(
  outlet: Outlet,
  declaredSitemaps: string[] = []
): AcquisitionAttempt[] {
  const base = siteBase(outlet);
  if (!base) return [];

  const attempts: AcquisitionAttempt[] = [];
  if (outlet.feedUrl) {
    attempts.push({ method: "feed", url: resolveUrl(base, outlet.feedUrl), origin: "declared" });
  } else {
    for (const path of FEED_PROBE_PATHS) {
      attempts.push({ method: "feed", url: resolveUrl(base, path), origin: "probe" });
    }
    attempts.push({ method: "feed", url: base, origin: "homepage" });
  }

  const declared = declaredSitemaps.find((url) => url.trim());
  attempts.push(
    declared
      ? { method: "sitemap", url: resolveUrl(base, declared.trim()), origin: "robots" }
      : { method: "sitemap", url: resolveUrl(base, DEFAULT_SITEMAP_PATH), origin: "default" }
  );

  return attempts;
}
