import {
  AcquisitionFailure,
  ConfigurationError,
  DataIntegrityViolation,
  PolicySkip,
  contentHash,
  errorMessage,
  type AcquisitionMethod,
  type ArticleCandidate,
  type ArticleRecord,
  type CadenceError,
  type Outlet,
  type OutletStatus
} from "@cadence/core";
import { HttpError, type HttpClient } from "./http";
import { resolveAcquisition, siteBase, type AcquisitionAttempt, type AttemptFor } from "./resolver";
import type { RobotsPolicy } from "./robots";
import type { ArticleStore } from "./store";
import { defaultAcquirers, type Acquirers, type SourceContext } from "./sources";

export type HarvestContext = {
  http: HttpClient;
  robots: Pick<RobotsPolicy, "isAllowed" | "sitemapsFor">;
  store: Pick<ArticleStore, "knownHashes" | "insertArticlesIfAbsent">;
  acquirers?: Acquirers;
  now?: () => Date;
};

export type HarvestResult = {
  outletId: string;
  status: OutletStatus;
  method: AcquisitionMethod | null;
  newRecords: ArticleRecord[];
  errors: CadenceError[];
  candidates: number;
  duplicates: number;
};

type Acquired = {
  method: AcquisitionMethod;
  candidates: ArticleCandidate[];
};

function isFeed(attempt: AcquisitionAttempt): attempt is AttemptFor<"feed"> {
  return attempt.method === "feed";
}

function isSitemap(attempt: AcquisitionAttempt): attempt is AttemptFor<"sitemap"> {
  return attempt.method === "sitemap";
}

function toFailure(method: AcquisitionMethod, url: string, error: unknown): CadenceError {
  if (error instanceof AcquisitionFailure || error instanceof PolicySkip) return error;
  const status = error instanceof HttpError ? error.status : null;
  return new AcquisitionFailure(method, url, `${method} ${url}: ${errorMessage(error)}`, status, {
    cause: error
  });
}

/**
 * Primary feed attempts in plan order, then the site-map fallback exactly
 * once. Returns null when neither produced an entry.
 */
async function acquire(
  attempts: AcquisitionAttempt[],
  context: HarvestContext,
  errors: CadenceError[]
): Promise<Acquired | null> {
  const acquirers = context.acquirers ?? defaultAcquirers;
  const source: SourceContext = {
    http: context.http,
    isAllowed: (url) => context.robots.isAllowed(url)
  };

  for (const attempt of attempts.filter(isFeed)) {
    try {
      const candidates = await acquirers.feed(attempt, source);
      if (candidates.length > 0) return { method: "feed", candidates };
      errors.push(new AcquisitionFailure("feed", attempt.url, `feed ${attempt.url}: no entries`));
    } catch (error) {
      errors.push(toFailure("feed", attempt.url, error));
    }
  }

  const fallback = attempts.find(isSitemap);
  if (!fallback) return null;

  try {
    const candidates = await acquirers.sitemap(fallback, source);
    if (candidates.length > 0) return { method: "sitemap", candidates };
    errors.push(new AcquisitionFailure("sitemap", fallback.url, `sitemap ${fallback.url}: no entries`));
  } catch (error) {
    errors.push(toFailure("sitemap", fallback.url, error));
  }
  return null;
}

type Dated = {
  candidate: ArticleCandidate;
  publishedAt: Date;
  approximate: boolean;
};

/** In-window entries, newest reliable timestamps first, approximate ones after in source order. */
export function selectCandidates(
  candidates: ArticleCandidate[],
  windowStart: Date,
  maxItems: number,
  retrievedAt: Date
): Dated[] {
  const dated = candidates
    .map((candidate) => ({
      candidate,
      publishedAt: candidate.publishedAt ?? retrievedAt,
      approximate: candidate.publishedAt === null
    }))
    .filter((entry) => entry.approximate || entry.publishedAt.getTime() >= windowStart.getTime());

  const reliable = dated
    .filter((entry) => !entry.approximate)
    .sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime());
  const approximate = dated.filter((entry) => entry.approximate);

  return [...reliable, ...approximate].slice(0, Math.max(0, maxItems));
}

export async function harvest(
  outlet: Outlet,
  windowStart: Date,
  maxItems: number,
  context: HarvestContext
): Promise<HarvestResult> {
  const result: HarvestResult = {
    outletId: outlet.id,
    status: "failed",
    method: null,
    newRecords: [],
    errors: [],
    candidates: 0,
    duplicates: 0
  };

  const base = siteBase(outlet);
  const sitemaps = base ? await context.robots.sitemapsFor(base) : [];
  const plan = resolveAcquisition(outlet, sitemaps);
  if (plan.length === 0) {
    const error = new ConfigurationError(
      `Outlet ${outlet.id} has no homepage or absolute feed URL configured`
    );
    console.warn(`[harvest] ${error.message}; skipping`);
    return { ...result, status: "skipped-config", errors: [error] };
  }

  const allowed: AcquisitionAttempt[] = [];
  for (const attempt of plan) {
    if (await context.robots.isAllowed(attempt.url)) allowed.push(attempt);
  }
  if (allowed.length === 0) {
    const skip = new PolicySkip(plan[0].url);
    console.info(`[harvest] outlet=${outlet.id} skipped: ${skip.message}`);
    return { ...result, status: "skipped-policy", errors: [skip] };
  }

  const acquired = await acquire(allowed, context, result.errors);
  if (!acquired) {
    const blocked = result.errors.filter((error) => error instanceof PolicySkip);
    if (blocked.length > 0 && blocked.length === result.errors.length) {
      console.info(`[harvest] outlet=${outlet.id} skipped: every discovered location is disallowed`);
      return { ...result, status: "skipped-policy" };
    }
    const last = result.errors[result.errors.length - 1];
    console.error(
      `[harvest] outlet=${outlet.id} failed: ${last ? last.message : "no acquisition attempts"}`
    );
    return result;
  }

  const retrievedAt = context.now ? context.now() : new Date();
  const selected = selectCandidates(acquired.candidates, windowStart, maxItems, retrievedAt);

  const seen = new Set<string>();
  const unique: ArticleRecord[] = [];
  for (const entry of selected) {
    const hash = contentHash(entry.candidate.link);
    if (seen.has(hash)) continue;
    seen.add(hash);
    unique.push({
      outletId: outlet.id,
      url: entry.candidate.link,
      title: entry.candidate.title,
      publishedAt: entry.publishedAt,
      publishedApprox: entry.approximate,
      source: acquired.method,
      retrievedAt,
      hash
    });
  }

  const known = await context.store.knownHashes(
    outlet.id,
    unique.map((record) => record.hash)
  );
  const fresh = unique.filter((record) => !known.has(record.hash));
  const inserted = await context.store.insertArticlesIfAbsent(fresh);
  if (inserted !== fresh.length) {
    throw new DataIntegrityViolation(
      `Outlet ${outlet.id}: expected to insert ${fresh.length} deduplicated articles, store inserted ${inserted}`
    );
  }

  console.log(
    `[harvest] outlet=${outlet.id} method=${acquired.method} candidates=${acquired.candidates.length} inserted=${inserted} duplicates=${selected.length - fresh.length}`
  );

  return {
    ...result,
    status: "ok",
    method: acquired.method,
    newRecords: fresh,
    candidates: acquired.candidates.length,
    duplicates: selected.length - fresh.length
  };
}
