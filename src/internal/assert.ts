/**
 * sheetmotion - Contract Checks
 *
 * Caller-side sequencing bugs (using bounds before the sheet is measured,
 * unbalanced dimension batches, calls after dispose) fail fast here.
 * The checks are skipped when NODE_ENV is "production", so bundlers that
 * inline NODE_ENV drop them from release builds.
 */

import { LOG_PREFIX } from "../constants";

export const DEV =
  typeof process === "undefined" || process.env.NODE_ENV !== "production";

/** Build an error carrying the package prefix */
export const contractError = (message: string): Error =>
  new Error(`[${LOG_PREFIX}] ${message}`);

/** Throw a contract error when `condition` is false (development only) */
export function assert(condition: boolean, message: string): asserts condition {
  if (DEV && !condition) {
    throw contractError(message);
  }
}

/**
 * Unwrap a value the caller promised is present.
 * Always checks: the return type depends on it.
 */
export const required = <T>(value: T | null, name: string): T => {
  if (value === null) {
    throw contractError(
      `${name} is not available yet. Check isMeasured before reading metrics.`,
    );
  }
  return value;
};

/** Reject NaN and infinities in constructor arguments */
export const requireFinite = (value: number, name: string): number => {
  if (!Number.isFinite(value)) {
    throw contractError(`${name} must be a finite number, got ${value}`);
  }
  return value;
};
