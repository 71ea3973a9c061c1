/**
 * Result-shaping policies
 */

import type { Apply, TypeFunction } from "@polyloop/core";
import type { DefaultConstructible, Sized, SizeConstructible } from "../capabilities.js";
import type { ShapingPolicy } from "../engine.js";

/**
 * A new container of the input's kind and size. Its slots are unset until the
 * execution policy assigns them.
 */
export function preallocSized<F extends TypeFunction, A, B>(
  K: Sized<F> & SizeConstructible<F>
): ShapingPolicy<Apply<F, A>, (a: A) => B, Apply<F, B>> {
  return {
    role: "shaping",
    name: `preallocSized(${K.name})`,
    shape: (input) => K.allocate<B>(K.size<A>(input)),
  };
}

/** A new, empty container of the input's kind; the callable is not consulted. */
export function freshEmpty<F extends TypeFunction, A, Fn>(
  K: DefaultConstructible<F>
): ShapingPolicy<Apply<F, A>, Fn, Apply<F, A>> {
  return {
    role: "shaping",
    name: `freshEmpty(${K.name})`,
    shape: () => K.empty<A>(),
  };
}

/** The input itself: the execution policy writes back into it. */
export function inPlace<S, Fn>(): ShapingPolicy<S, Fn, S> {
  return {
    role: "shaping",
    name: "inPlace",
    shape: (input) => input,
  };
}
