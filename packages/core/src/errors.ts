import type { AcquisitionMethod } from "./types";

export class CadenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Outlet or run settings that cannot be acted on. Recovered per outlet. */
export class ConfigurationError extends CadenceError {}

/** Robots rules forbid every planned location. Expected, never logged as an error. */
export class PolicySkip extends CadenceError {
  constructor(readonly url: string) {
    super(`Fetching ${url} is disallowed by robots rules`);
  }
}

export class AcquisitionFailure extends CadenceError {
  constructor(
    readonly method: AcquisitionMethod,
    readonly url: string,
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A write hit the (outlet, hash) uniqueness constraint after deduplication
 * had already run. Aborts the whole run.
 */
export class DataIntegrityViolation extends CadenceError {}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
