import * as cheerio from "cheerio";
import { PolicySkip, errorMessage, resolveUrl, type ArticleCandidate } from "@cadence/core";
import type { AttemptFor } from "../resolver";
import { parseDate } from "./dates";
import type { SourceContext } from "./index";

const SITEMAP_ACCEPT = "application/xml, text/xml, */*";
export const MAX_CHILD_SITEMAPS = 25;

export type ParsedSitemap =
  | { kind: "index"; sitemaps: string[] }
  | { kind: "urlset"; entries: ArticleCandidate[] };

export function parseSitemap(xml: string, baseUrl: string): ParsedSitemap {
  const $ = cheerio.load(xml, { xml: true });

  if ($("sitemapindex").length > 0) {
    const sitemaps = $("sitemapindex > sitemap > loc")
      .toArray()
      .map((element) => $(element).text().trim())
      .filter(Boolean)
      .map((loc) => resolveUrl(baseUrl, loc));
    return { kind: "index", sitemaps };
  }

  if ($("urlset").length === 0) {
    throw new Error(`${baseUrl} is not a sitemap`);
  }

  const entries: ArticleCandidate[] = [];
  for (const element of $("urlset > url").toArray()) {
    const node = $(element);
    const loc = node.children("loc").first().text().trim();
    if (!loc) continue;
    const newsTitle = node.find("news\\:title").first().text().trim();
    const newsDate = node.find("news\\:publication_date").first().text();
    entries.push({
      title: newsTitle,
      link: resolveUrl(baseUrl, loc),
      publishedAt: parseDate(newsDate) ?? parseDate(node.children("lastmod").first().text())
    });
  }
  return { kind: "urlset", entries };
}

/**
 * Entries of one site map. An index is followed to its first
 * `MAX_CHILD_SITEMAPS` children; unreadable or disallowed children are skipped.
 * Throws `PolicySkip` when every child was disallowed.
 */
export async function acquireSitemap(attempt: AttemptFor<"sitemap">, source: SourceContext) {
  const root = await source.http.get(attempt.url, SITEMAP_ACCEPT);
  const parsed = parseSitemap(root.body, root.url);
  if (parsed.kind === "urlset") return parsed.entries;

  const children = parsed.sitemaps.slice(0, MAX_CHILD_SITEMAPS);
  const blocked: string[] = [];
  const entries: ArticleCandidate[] = [];
  for (const child of children) {
    if (!(await source.isAllowed(child))) {
      console.info(`[sitemap] skipped ${child}: disallowed by robots rules`);
      blocked.push(child);
      continue;
    }
    try {
      const response = await source.http.get(child, SITEMAP_ACCEPT);
      const nested = parseSitemap(response.body, response.url);
      if (nested.kind === "urlset") entries.push(...nested.entries);
    } catch (error) {
      console.warn(`[sitemap] skipped ${child}: ${errorMessage(error)}`);
    }
  }
  if (children.length > 0 && blocked.length === children.length) {
    throw new PolicySkip(blocked[0]);
  }
  return entries;
}
