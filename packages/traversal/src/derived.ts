/**
 * Derived operations: each one a particular pairing of policies.
 *
 * Kind-dependent operations take the kind instance first and return the
 * operation, so the element types infer from the sequence at the call:
 *
 * ```typescript
 * map(arrayKind)([1, 2, 3], (x) => x * 2); // [2, 4, 6]
 * ```
 */

import type { Apply, TypeFunction } from "@polyloop/core";
import { negate } from "@polyloop/combinators";
import type { Filterable, InPlaceTransformable, Mappable } from "./capabilities.js";
import { bloop, type Predicate } from "./engine.js";
import { freshEmpty, inPlace, preallocSized } from "./policies/shaping.js";
import { filterAppend, transformAssign } from "./policies/execution.js";

// ============================================================================
// Kind-independent
// ============================================================================

/** Call `fn` on every element, in order. */
export function each<A>(seq: Iterable<A>, fn: (a: A) => unknown): void {
  for (const a of seq) fn(a);
}

/** A short-circuiting scan, as produced by `quantifier`. */
export type Quantifier = <A>(seq: Iterable<A>, pred: Predicate<A>) => boolean;

/**
 * Scan until the truthiness of `pred(x)` equals `trigger` and return
 * `result`; return `!result` if the sequence runs out first.
 */
export function quantifier(trigger: boolean, result: boolean): Quantifier {
  return (seq, pred) => {
    for (const a of seq) {
      if (Boolean(pred(a)) === trigger) return result;
    }
    return !result;
  };
}

export const some: Quantifier = quantifier(true, true);
export const every: Quantifier = quantifier(false, false);
export const none: Quantifier = quantifier(true, false);

// ============================================================================
// Kind-dependent
// ============================================================================

/**
 * A same-kind, same-size container holding `fn` of each element.
 *
 * `fn` must return a value; a callback returning `void` is rejected.
 */
export function map<F extends TypeFunction>(K: Mappable<F>) {
  return <A, B>(
    seq: Apply<F, A>,
    fn: (a: A) => B,
    ..._check: [B] extends [void] ? [mapCallbackMustReturnAValue: never] : []
  ): Apply<F, B> => bloop(preallocSized<F, A, B>(K), transformAssign<F, A, B>(K))(seq, fn);
}

/** A new container of the elements `pred` accepts, in iteration order. */
export function filter<F extends TypeFunction>(K: Filterable<F>) {
  return <A>(seq: Apply<F, A>, pred: Predicate<A>): Apply<F, A> =>
    bloop(freshEmpty<F, A, Predicate<A>>(K), filterAppend<F, A>(K))(seq, pred);
}

/** `filter` with the predicate fixed first. */
export function filterWith<F extends TypeFunction>(K: Filterable<F>) {
  const run = filter(K);
  return <A>(pred: Predicate<A>) =>
    (seq: Apply<F, A>): Apply<F, A> =>
      run(seq, pred);
}

/** The elements `pred` rejects. */
export function reject<F extends TypeFunction>(K: Filterable<F>) {
  const run = filter(K);
  return <A>(seq: Apply<F, A>, pred: Predicate<A>): Apply<F, A> => run(seq, negate(pred));
}

/** Overwrite every element with `fn(element)`; returns the same container. */
export function transformInPlace<F extends TypeFunction>(K: InPlaceTransformable<F>) {
  return <A>(seq: Apply<F, A>, fn: (a: A) => A): Apply<F, A> =>
    bloop(inPlace<Apply<F, A>, (a: A) => A>(), transformAssign<F, A, A>(K))(seq, fn);
}
