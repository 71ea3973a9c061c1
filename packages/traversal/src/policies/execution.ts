/**
 * Execution policies
 *
 * Both walk the input in its iteration order and let whatever the callable
 * throws propagate; slots written before the throw keep their values.
 */

import { requires, type Apply, type TypeFunction } from "@polyloop/core";
import type { Assignable, Filterable, IterableKind, Sized } from "../capabilities.js";
import type { ExecutionPolicy, Predicate } from "../engine.js";

/**
 * Assign `transform(element)` to output slot i for the i-th input element.
 *
 * Throws `PreconditionError` before writing past the output's last slot.
 */
export function transformAssign<F extends TypeFunction, A, B>(
  K: IterableKind<F> & Sized<F> & Assignable<F>
): ExecutionPolicy<Apply<F, A>, (a: A) => B, Apply<F, B>, Apply<F, B>> {
  return {
    role: "execution",
    name: `transformAssign(${K.name})`,
    execute: (output, input, transform) => {
      const capacity = K.size<B>(output);
      let index = 0;
      for (const a of K.iterate<A>(input)) {
        requires(
          index < capacity,
          `transformAssign: output has ${capacity} slot(s), input has more elements`
        );
        K.assign<B>(output, index, transform(a));
        index++;
      }
      return output;
    },
  };
}

type Add<F extends TypeFunction> = <A>(fa: Apply<F, A>, a: A) => void;

// End-append when the kind has it, generic insertion otherwise.
function adder<F extends TypeFunction>(K: Filterable<F>): Add<F> {
  if ("append" in K) {
    const appendable = K;
    return (fa, a) => appendable.append(fa, a);
  }
  const insertable = K;
  return (fa, a) => insertable.insert(fa, a);
}

/** Add every element `predicate` accepts to the output, by reference. */
export function filterAppend<F extends TypeFunction, A>(
  K: Filterable<F>
): ExecutionPolicy<Apply<F, A>, Predicate<A>, Apply<F, A>, Apply<F, A>> {
  const add = adder(K);
  return {
    role: "execution",
    name: `filterAppend(${K.name})`,
    execute: (output, input, predicate) => {
      for (const a of K.iterate<A>(input)) {
        if (predicate(a)) add<A>(output, a);
      }
      return output;
    },
  };
}
