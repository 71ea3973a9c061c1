/**
 * Debug logging, gated behind `debug` (POLYLOOP_DEBUG=1).
 */

import { config } from "./config.js";

/** Whether debug logging is currently on. */
export function isDebugEnabled(): boolean {
  return config.get("debug") === true;
}

/**
 * Write `[polyloop:<scope>] <message>` to `console.debug` when debugging.
 */
export function debugLog(scope: string, message: string): void {
  if (!isDebugEnabled()) return;
  console.debug(`[polyloop:${scope}] ${message}`);
}
