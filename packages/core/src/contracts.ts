/**
 * Runtime contract checks
 *
 * Gated by `contracts.mode`: with "none" every check is skipped and the
 * operation proceeds as if the precondition held.
 */

import { config } from "./config.js";
import { PreconditionError } from "./errors.js";

/** True unless `contracts.mode` is "none". */
export function contractsEnabled(): boolean {
  return config.get("contracts.mode") !== "none";
}

/**
 * Throw a `PreconditionError` carrying `message` when `condition` is false.
 *
 * @example
 * ```typescript
 * requires(index < capacity, `output has ${capacity} slots`);
 * ```
 */
export function requires(condition: boolean, message: string): void {
  if (!condition && contractsEnabled()) {
    throw new PreconditionError(message);
  }
}
