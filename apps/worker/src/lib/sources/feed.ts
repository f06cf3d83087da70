import Parser from "rss-parser";
import * as cheerio from "cheerio";
import { PolicySkip, resolveUrl, type ArticleCandidate } from "@cadence/core";
import type { HttpResponse } from "../http";
import type { AttemptFor } from "../resolver";
import { parseDate } from "./dates";
import type { SourceContext } from "./index";

const FEED_ACCEPT = "application/rss+xml, application/atom+xml, application/xml, text/xml, */*";
const HTML_ACCEPT = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

const parser = new Parser();

function looksLikeFeed(response: HttpResponse) {
  if (response.contentType.includes("xml")) return true;
  const head = response.body.trimStart().slice(0, 200).toLowerCase();
  return head.startsWith("<?xml") || head.startsWith("<rss") || head.startsWith("<feed");
}

/** RSS/Atom `<link rel="alternate">` targets declared in an HTML page, absolute. */
export function discoverFeedLinks(html: string, pageUrl: string) {
  const $ = cheerio.load(html);
  const links: string[] = [];
  for (const element of $("link").toArray()) {
    const rel = ($(element).attr("rel") ?? "").toLowerCase().split(/\s+/);
    const type = ($(element).attr("type") ?? "").toLowerCase();
    const href = ($(element).attr("href") ?? "").trim();
    if (!href || !rel.includes("alternate")) continue;
    if (!type.includes("rss") && !type.includes("atom")) continue;
    links.push(resolveUrl(pageUrl, href));
  }
  return Array.from(new Set(links));
}

export async function parseFeed(xml: string, baseUrl: string): Promise<ArticleCandidate[]> {
  const feed = await parser.parseString(xml);
  const candidates: ArticleCandidate[] = [];
  for (const item of feed.items ?? []) {
    const link = (item.link ?? item.guid ?? "").trim();
    if (!link) continue;
    candidates.push({
      title: (item.title ?? "").trim(),
      link: resolveUrl(baseUrl, link),
      publishedAt: parseDate(item.isoDate) ?? parseDate(item.pubDate)
    });
  }
  return candidates;
}

export async function acquireFeed(attempt: AttemptFor<"feed">, source: SourceContext) {
  let feedUrl = attempt.url;
  if (attempt.origin === "homepage") {
    const page = await source.http.get(attempt.url, HTML_ACCEPT);
    const [discovered] = discoverFeedLinks(page.body, page.url);
    if (!discovered) {
      throw new Error(`No alternate feed link on ${attempt.url}`);
    }
    if (!(await source.isAllowed(discovered))) {
      throw new PolicySkip(discovered);
    }
    feedUrl = discovered;
  }

  const response = await source.http.get(feedUrl, FEED_ACCEPT);
  if (attempt.origin === "probe" && !looksLikeFeed(response)) {
    throw new Error(`${feedUrl} did not return a feed (${response.contentType || "no content type"})`);
  }
  return parseFeed(response.body, response.url);
}
