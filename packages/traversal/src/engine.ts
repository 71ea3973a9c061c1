/**
 * Traversal engine
 *
 * A traversal is the composition of two stateless policies: a shaping policy
 * decides what the result container is, an execution policy walks the input
 * and populates it. `bloop` only wires them together; it iterates nothing
 * itself.
 *
 * ```
 *   input, fn ──▶ shaping.shape ──▶ output ──▶ execution.execute ──▶ result
 * ```
 */

import { debugLog } from "@polyloop/core";

// ============================================================================
// Policy roles
// ============================================================================

/** A predicate over elements. */
export type Predicate<A> = (a: A) => boolean;

/** Produces the container a traversal writes into. Never mutates `input`. */
export interface ShapingPolicy<In, Fn, Out> {
  readonly role: "shaping";
  readonly name: string;
  readonly shape: (input: In, fn: Fn) => Out;
}

/** Walks `input`, applying `fn` and writing into `output`. */
export interface ExecutionPolicy<In, Fn, Out, R> {
  readonly role: "execution";
  readonly name: string;
  readonly execute: (output: Out, input: In, fn: Fn) => R;
}

export type Traversal<In, Fn, R> = (input: In, fn: Fn) => R;

// ============================================================================
// bloop
// ============================================================================

/**
 * Compose a shaping and an execution policy into a traversal.
 *
 * Both policies must agree on the input, callable and output types; a pair
 * that disagrees, or a policy in the wrong slot, does not compile.
 *
 * @example
 * ```typescript
 * const double = bloop(preallocSized(arrayKind), transformAssign(arrayKind));
 * double([1, 2, 3], (x: number) => x * 2); // [2, 4, 6]
 * ```
 */
export function bloop<In, Fn, Out, R>(
  shaping: ShapingPolicy<In, Fn, Out>,
  execution: ExecutionPolicy<In, Fn, Out, R>
): Traversal<In, Fn, R> {
  const label = `${shaping.name}+${execution.name}`;
  return (input, fn) => {
    debugLog("bloop", label);
    return execution.execute(shaping.shape(input, fn), input, fn);
  };
}
