import { readFileSync } from "node:fs";
import type { Pool } from "pg";
import { z } from "zod";
import { ConfigurationError, type Outlet } from "@cadence/core";

export type OutletRegistry = {
  listOutlets(): Promise<Outlet[]>;
};

type OutletRow = {
  outlet_id: string;
  name: string;
  homepage_url: string | null;
  rss_url: string | null;
  outlet_type: string;
  owner: string;
  region_ids: string[];
};

function blankToNull(value: string | null | undefined) {
  const trimmed = (value ?? "").trim();
  return trimmed ? trimmed : null;
}

export function splitRegions(value: string) {
  return Array.from(
    new Set(
      value
        .split("|")
        .map((part) => part.trim())
        .filter(Boolean)
    )
  );
}

export function createPgRegistry(pool: Pool): OutletRegistry {
  return {
    async listOutlets() {
      const result = await pool.query<OutletRow>(
        `select outlet_id, name, homepage_url, rss_url, outlet_type, owner, region_ids
         from outlets
         order by position, outlet_id`
      );
      return result.rows.map((row) => ({
        id: row.outlet_id,
        name: row.name,
        homepageUrl: blankToNull(row.homepage_url),
        feedUrl: blankToNull(row.rss_url),
        category: row.outlet_type,
        owner: row.owner,
        regionIds: row.region_ids ?? []
      }));
    }
  };
}

const SeedOutletSchema = z.object({
  outlet_id: z.string().trim().min(1, "outlet_id is required"),
  name: z.string().trim().min(1, "name is required"),
  homepage_url: z.string().optional().default(""),
  rss_url: z.string().optional().default(""),
  outlet_type: z.string().optional().default(""),
  owner: z.string().optional().default(""),
  counties_fips: z.union([z.string(), z.array(z.string())]).optional().default("")
});

const SEED_COLUMNS = [
  "outlet_id",
  "name",
  "homepage_url",
  "rss_url",
  "outlet_type",
  "owner",
  "counties_fips"
];

export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (quoted) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
      continue;
    }
    if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      row.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += char;
    }
  }
  if (field || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows.filter((cells) => cells.some((cell) => cell.trim()));
}

function csvRecords(text: string) {
  const [header, ...rows] = parseCsv(text);
  if (!header) return [];
  const columns = header.map((cell) => cell.trim());
  for (const column of SEED_COLUMNS) {
    if (!columns.includes(column)) {
      throw new ConfigurationError(`Missing column in outlet seed: ${column}`);
    }
  }
  return rows.map((cells) =>
    Object.fromEntries(columns.map((column, index) => [column, cells[index] ?? ""]))
  );
}

export function parseOutletSeed(text: string, format: "json" | "csv"): Outlet[] {
  const records: unknown = format === "json" ? JSON.parse(text) : csvRecords(text);
  const parsed = z.array(SeedOutletSchema).safeParse(records);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Invalid outlet seed at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "unknown"}`
    );
  }

  const seen = new Set<string>();
  return parsed.data.map((entry) => {
    if (seen.has(entry.outlet_id)) {
      throw new ConfigurationError(`Duplicate outlet_id in seed: ${entry.outlet_id}`);
    }
    seen.add(entry.outlet_id);
    const regions = Array.isArray(entry.counties_fips)
      ? splitRegions(entry.counties_fips.join("|"))
      : splitRegions(entry.counties_fips);
    return {
      id: entry.outlet_id,
      name: entry.name,
      homepageUrl: blankToNull(entry.homepage_url),
      feedUrl: blankToNull(entry.rss_url),
      category: entry.outlet_type.trim(),
      owner: entry.owner.trim(),
      regionIds: regions
    };
  });
}

export function readOutletSeed(path: string): Outlet[] {
  const format = path.toLowerCase().endsWith(".csv") ? "csv" : "json";
  return parseOutletSeed(readFileSync(path, "utf-8"), format);
}

export async function upsertOutlets(pool: Pool, outlets: Outlet[]) {
  let written = 0;
  for (const outlet of outlets) {
    await pool.query(
      `insert into outlets (outlet_id, name, homepage_url, rss_url, outlet_type, owner, region_ids)
       values ($1, $2, $3, $4, $5, $6, $7)
       on conflict (outlet_id)
       do update set
         name = excluded.name,
         homepage_url = excluded.homepage_url,
         rss_url = excluded.rss_url,
         outlet_type = excluded.outlet_type,
         owner = excluded.owner,
         region_ids = excluded.region_ids`,
      [
        outlet.id,
        outlet.name,
        outlet.homepageUrl,
        outlet.feedUrl,
        outlet.category,
        outlet.owner,
        outlet.regionIds
      ]
    );
    written += 1;
  }
  return written;
}
