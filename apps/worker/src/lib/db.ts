import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Pool, type PoolClient } from "pg";
import { ConfigurationError } from "@cadence/core";

let pool: Pool | null = null;

export function getPool(databaseUrl: string | null) {
  if (!databaseUrl) {
    throw new ConfigurationError("DATABASE_URL is not set");
  }
  pool ??= new Pool({
    connectionString: databaseUrl,
    max: 5
  });
  return pool;
}

export async function closePool() {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}

export async function withClient<T>(db: Pool, fn: (client: PoolClient) => Promise<T>) {
  const client = await db.connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

const SCHEMA_PATH = fileURLToPath(new URL("./schema.sql", import.meta.url));

export async function ensureSchema(db: Pool) {
  await db.query(readFileSync(SCHEMA_PATH, "utf-8"));
}
