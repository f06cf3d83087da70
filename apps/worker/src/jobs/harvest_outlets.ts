import {
  CadenceError,
  ConfigurationError,
  DataIntegrityViolation,
  errorMessage,
  type Outlet,
  type OutletStatus
} from "@cadence/core";
import { harvest, type HarvestContext, type HarvestResult } from "../lib/harvester";
import { runPool } from "../lib/pool";

const DAY_MS = 24 * 60 * 60 * 1000;

export type HarvestRunOptions = {
  days: number;
  maxPerOutlet: number;
  concurrency?: number;
  onlyOutletId?: string | null;
  signal?: AbortSignal;
  now?: () => Date;
};

export type HarvestRunSummary = {
  windowStart: string;
  outlets: number;
  processed: number;
  inserted: number;
  aborted: boolean;
  counts: Record<OutletStatus, number>;
  statuses: Record<string, { status: OutletStatus; method: string | null; inserted: number }>;
};

export function selectOutlets(outlets: Outlet[], onlyOutletId?: string | null) {
  if (!onlyOutletId) return outlets;
  const matched = outlets.filter((outlet) => outlet.id === onlyOutletId);
  if (matched.length === 0) {
    throw new ConfigurationError(`Outlet ${onlyOutletId} not found`);
  }
  return matched;
}

export function summarize(
  windowStart: Date,
  total: number,
  results: HarvestResult[],
  aborted: boolean
): HarvestRunSummary {
  const counts: Record<OutletStatus, number> = {
    ok: 0,
    "skipped-policy": 0,
    "skipped-config": 0,
    failed: 0
  };
  const statuses: HarvestRunSummary["statuses"] = {};
  let inserted = 0;

  for (const result of results) {
    counts[result.status] += 1;
    inserted += result.newRecords.length;
    statuses[result.outletId] = {
      status: result.status,
      method: result.method,
      inserted: result.newRecords.length
    };
  }

  return {
    windowStart: windowStart.toISOString(),
    outlets: total,
    processed: counts.ok,
    inserted,
    aborted,
    counts,
    statuses
  };
}

/**
 * One outlet's harvest as a result. Any error other than a
 * `DataIntegrityViolation` marks only this outlet as failed.
 */
export async function harvestOne(
  outlet: Outlet,
  windowStart: Date,
  maxItems: number,
  context: HarvestContext
): Promise<HarvestResult> {
  try {
    return await harvest(outlet, windowStart, maxItems, context);
  } catch (error) {
    if (error instanceof DataIntegrityViolation) throw error;
    const failure = new CadenceError(`Outlet ${outlet.id}: ${errorMessage(error)}`, { cause: error });
    console.error(`[harvest] outlet=${outlet.id} failed: ${failure.message}`);
    return {
      outletId: outlet.id,
      status: "failed",
      method: null,
      newRecords: [],
      errors: [failure],
      candidates: 0,
      duplicates: 0
    };
  }
}

export async function harvestOutlets(
  outlets: Outlet[],
  context: HarvestContext,
  options: HarvestRunOptions
): Promise<HarvestRunSummary> {
  const selected = selectOutlets(outlets, options.onlyOutletId);
  const now = options.now ? options.now() : new Date();
  const windowStart = new Date(now.getTime() - options.days * DAY_MS);

  const { results, aborted } = await runPool(
    selected,
    options.concurrency ?? 1,
    (outlet) => harvestOne(outlet, windowStart, options.maxPerOutlet, context),
    options.signal
  );

  if (aborted) {
    console.warn(`[harvest] run aborted after ${results.length}/${selected.length} outlets`);
  }

  return summarize(windowStart, selected.length, results, aborted);
}
