import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "@cadence/core";

dotenv.config();

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  CADENCE_USER_AGENT: z.string().min(1).default("Cadence/0.1 (+https://example.org/cadence)"),
  CADENCE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(12_000),
  CADENCE_THROTTLE_MS: z.coerce.number().int().nonnegative().default(1_000),
  CADENCE_CONCURRENCY: z.coerce.number().int().positive().default(1)
});

export type WorkerConfig = {
  databaseUrl: string | null;
  userAgent: string;
  fetchTimeoutMs: number;
  throttleMs: number;
  concurrency: number;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): WorkerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }

  return {
    databaseUrl: parsed.data.DATABASE_URL ?? null,
    userAgent: parsed.data.CADENCE_USER_AGENT,
    fetchTimeoutMs: parsed.data.CADENCE_FETCH_TIMEOUT_MS,
    throttleMs: parsed.data.CADENCE_THROTTLE_MS,
    concurrency: parsed.data.CADENCE_CONCURRENCY
  };
}
