import { pathToFileURL } from "node:url";
import { ConfigurationError } from "@cadence/core";
import { loadConfig, type WorkerConfig } from "./lib/config";
import { closePool, ensureSchema, getPool } from "./lib/db";
import { HttpClient } from "./lib/http";
import { createPgRegistry } from "./lib/registry";
import { RobotsPolicy } from "./lib/robots";
import { createPgStore } from "./lib/store";
import { HostThrottle } from "./lib/throttle";
import { computeAndStoreMetrics } from "./jobs/compute_metrics";
import { exportMetrics } from "./jobs/export_metrics";
import { harvestOutlets } from "./jobs/harvest_outlets";
import { loadOutlets } from "./jobs/load_outlets";

const USAGE = `Usage: cadence <command> [options]

Commands:
  harvest       --days N --max-per-outlet N [--concurrency N] [--throttle SECONDS] [--only-outlet-id ID]
  metrics       --days N
  load-outlets  --file PATH (.json or .csv)
  export        [--out DIR] [--date YYYY-MM-DD]`;

export function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) continue;
    const key = arg.slice(2);
    const value = argv[i + 1];
    if (value !== undefined && !value.startsWith("--")) {
      out[key] = value;
      i++;
    } else {
      out[key] = "true";
    }
  }
  return out;
}

export function positiveInt(args: Record<string, string>, key: string, fallback: number) {
  const raw = args[key];
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`--${key} must be a positive integer (got "${raw}")`);
  }
  return value;
}

function throttleMs(args: Record<string, string>, config: WorkerConfig) {
  const raw = args.throttle;
  if (raw === undefined) return config.throttleMs;
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigurationError(`--throttle must be a non-negative number of seconds (got "${raw}")`);
  }
  return Math.round(seconds * 1000);
}

async function runHarvest(args: Record<string, string>, config: WorkerConfig) {
  const pool = getPool(config.databaseUrl);
  await ensureSchema(pool);
  const outlets = await createPgRegistry(pool).listOutlets();

  const throttle = new HostThrottle(throttleMs(args, config));
  const http = new HttpClient({
    userAgent: config.userAgent,
    timeoutMs: config.fetchTimeoutMs,
    throttle
  });

  const controller = new AbortController();
  const onSigint = () => {
    console.warn("[harvest] interrupt received; stopping after in-flight outlets");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const summary = await harvestOutlets(
      outlets,
      {
        http,
        robots: new RobotsPolicy(http, config.userAgent),
        store: createPgStore(pool)
      },
      {
        days: positiveInt(args, "days", 365),
        maxPerOutlet: positiveInt(args, "max-per-outlet", 2000),
        concurrency: positiveInt(args, "concurrency", config.concurrency),
        onlyOutletId: args["only-outlet-id"] ?? null,
        signal: controller.signal
      }
    );
    console.log(JSON.stringify(summary, null, 2));
    return summary.processed > 0 ? 0 : 1;
  } finally {
    process.off("SIGINT", onSigint);
  }
}

async function runMetrics(args: Record<string, string>, config: WorkerConfig) {
  const pool = getPool(config.databaseUrl);
  await ensureSchema(pool);
  const outlets = await createPgRegistry(pool).listOutlets();
  const summary = await computeAndStoreMetrics(outlets, createPgStore(pool), {
    days: positiveInt(args, "days", 365)
  });
  console.log(JSON.stringify(summary, null, 2));
  return 0;
}

async function runLoadOutlets(args: Record<string, string>, config: WorkerConfig) {
  const file = args.file;
  if (!file || file === "true") {
    throw new ConfigurationError("--file is required");
  }
  const pool = getPool(config.databaseUrl);
  await ensureSchema(pool);
  await loadOutlets(pool, file);
  return 0;
}

async function runExport(args: Record<string, string>, config: WorkerConfig) {
  const date = args.date;
  if (date !== undefined && !/^\d{4}-\d{2}-\d{2}$/.test(date)) {
    throw new ConfigurationError(`--date must be YYYY-MM-DD (got "${date}")`);
  }
  const pool = getPool(config.databaseUrl);
  await ensureSchema(pool);
  await exportMetrics(createPgStore(pool), args.out ?? "outputs", date);
  return 0;
}

async function main() {
  const [command, ...rest] = process.argv.slice(2);
  const args = parseArgs(rest);
  const config = loadConfig();

  switch (command) {
    case "harvest":
      return runHarvest(args, config);
    case "metrics":
      return runMetrics(args, config);
    case "load-outlets":
      return runLoadOutlets(args, config);
    case "export":
      return runExport(args, config);
    default:
      console.error(USAGE);
      return 1;
  }
}

async function run() {
  try {
    process.exitCode = await main();
  } catch (error) {
    console.error(error);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  run().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
