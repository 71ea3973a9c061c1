/**
 * polyloop - policy-based traversals and callable combinators
 *
 * A traversal is a shaping policy (what the result container is) paired with
 * an execution policy (how the input is walked into it). `map`, `filter`,
 * `reject` and friends are just named pairings.
 *
 * ## Quick Start
 *
 * ```ts
 * import { arrays, sets, once, concat, guarded } from "polyloop";
 *
 * arrays.map([1, 2, 3], (x) => x * 2);                    // [2, 4, 6]
 * sets.filter(new Set([1, 2, 3, 4]), (x) => x % 2 === 0); // Set {2, 4}
 *
 * const loadOnce = once(() => expensiveLookup());
 *
 * const show = concat(
 *   guarded(isNumber)((n) => n.toFixed(2)),
 *   guarded(isString)((s) => s.trim())
 * );
 * ```
 *
 * ## Configuration
 *
 * ```json
 * // .polylooprc.json
 * { "debug": true, "contracts": { "mode": "none" } }
 * ```
 *
 * `POLYLOOP_DEBUG=1` and `POLYLOOP_CONTRACTS_MODE=none` override the file.
 *
 * @module
 */

// ============================================================================
// Core: kinds, configuration, errors, contracts, logging
// ============================================================================

export * from "@polyloop/core";

// ============================================================================
// Combinators
// ============================================================================

export * from "@polyloop/combinators";

// ============================================================================
// Traversals
// ============================================================================

export * from "@polyloop/traversal";
