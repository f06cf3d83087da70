import type { Pool } from "pg";
import { readOutletSeed, upsertOutlets } from "../lib/registry";

export async function loadOutlets(pool: Pool, path: string) {
  const outlets = readOutletSeed(path);
  const written = await upsertOutlets(pool, outlets);
  const unattributed = outlets.filter((outlet) => outlet.regionIds.length === 0).length;
  console.log(`[outlets] loaded ${written} outlets from ${path} (${unattributed} without regions)`);
  return { loaded: written, unattributed };
}
