/**
 * Ordered fallback composition
 *
 * `concat(f, g)` behaves as `f` for the arguments `f` accepts and as `g` for
 * the rest. Acceptance is decided by parameter types: the composite's type is
 * the ordered overload list `F & G`, so the type checker picks the first
 * component whose signature fits and rejects calls no component fits. At run
 * time the same decision is replayed with the type guards each component was
 * built from.
 *
 * @example
 * ```typescript
 * const isNumber = (v: unknown): v is number => typeof v === "number";
 * const isString = (v: unknown): v is string => typeof v === "string";
 *
 * const describe = concat(
 *   guarded(isNumber)((n) => `number ${n}`),
 *   guarded(isString)((s) => `string ${s}`)
 * );
 * describe(1);     // "number 1"
 * describe("a");   // "string a"
 * describe(true);  // type error: no overload matches this call
 * ```
 */

import { NoMatchingComponentError, contractsEnabled, unsafeCoerce } from "@polyloop/core";

// ============================================================================
// Types
// ============================================================================

/** A runtime check standing for a parameter type. */
export type Guard<T> = (value: unknown) => value is T;

/** The argument tuple a tuple of guards proves. */
export type GuardedArgs<G extends readonly Guard<unknown>[]> = {
  -readonly [K in keyof G]: G[K] extends Guard<infer T> ? T : never;
};

/** Outcome of offering an argument list to a component. */
export type Attempt =
  | { readonly matched: true; readonly value: unknown }
  | { readonly matched: false };

/** Runtime side of a composable callable. */
export interface Dispatch {
  /** Number of leaf callables behind this one. */
  readonly componentCount: number;
  /** Whether some component takes `args`. Never invokes anything. */
  readonly accepts: (args: readonly unknown[]) => boolean;
  /** Invoke the first component that takes `args`. */
  readonly attempt: (args: readonly unknown[]) => Attempt;
}

/** A typed callable that can also check its own arguments at run time. */
export type Candidate<F extends (...args: never) => unknown> = F & Dispatch;

type AnyCandidate = Candidate<(...args: never) => unknown>;

/** Ordered overloads of every candidate in `Cs`. */
export type ConcatAll<Cs extends readonly AnyCandidate[]> = Cs extends readonly [
  infer Head,
  ...infer Tail extends readonly AnyCandidate[],
]
  ? Head & ConcatAll<Tail>
  : unknown;

// ============================================================================
// Components
// ============================================================================

/**
 * Build a component whose parameters are the types `guards` prove, one guard
 * per parameter. It accepts an argument list of exactly that length on which
 * every guard passes.
 */
export function guarded<G extends Guard<unknown>[]>(
  ...guards: G
): <R>(fn: (...args: GuardedArgs<G>) => R) => Candidate<(...args: GuardedArgs<G>) => R> {
  const matches = (args: readonly unknown[]): args is GuardedArgs<G> =>
    args.length === guards.length && guards.every((guard, i) => guard(args[i]));

  return (fn) =>
    Object.assign((...args: GuardedArgs<G>) => fn(...args), {
      componentCount: 1,
      accepts: matches,
      attempt: (args: readonly unknown[]): Attempt =>
        matches(args) ? { matched: true, value: fn(...args) } : { matched: false },
    });
}

/** A component accepting every argument list; a final fallback. */
export function catchAll<R>(
  fn: (...args: unknown[]) => R
): Candidate<(...args: unknown[]) => R> {
  return Object.assign((...args: unknown[]) => fn(...args), {
    componentCount: 1,
    accepts: (_args: readonly unknown[]) => true,
    attempt: (args: readonly unknown[]): Attempt => ({ matched: true, value: fn(...args) }),
  });
}

// ============================================================================
// Composition
// ============================================================================

function compose(components: readonly Dispatch[]): ((...args: unknown[]) => unknown) & Dispatch {
  const order = Object.freeze([...components]);
  const componentCount = order.reduce((n, component) => n + component.componentCount, 0);

  const attempt = (args: readonly unknown[]): Attempt => {
    for (const component of order) {
      const outcome = component.attempt(args);
      if (outcome.matched) return outcome;
    }
    return { matched: false };
  };

  const dispatch = (...args: unknown[]): unknown => {
    const outcome = attempt(args);
    if (outcome.matched) return outcome.value;
    if (contractsEnabled()) {
      throw new NoMatchingComponentError(componentCount, args.length);
    }
    return undefined;
  };

  return Object.assign(dispatch, {
    componentCount,
    accepts: (args: readonly unknown[]) => order.some((component) => component.accepts(args)),
    attempt,
  });
}

/**
 * Compose two candidates; `first` wins wherever both accept.
 */
export function concat<C1 extends AnyCandidate, C2 extends AnyCandidate>(
  first: C1,
  second: C2
): C1 & C2 {
  // The dispatcher returns exactly what the selected component returns.
  return unsafeCoerce(compose([first, second]));
}

/**
 * Compose two or more candidates left to right, as the right fold
 * `concat(f1, concat(f2, ... concat(fn-1, fn)))`.
 */
export function makeConcat<Cs extends [AnyCandidate, AnyCandidate, ...AnyCandidate[]]>(
  ...candidates: Cs
): ConcatAll<Cs> {
  const last: Dispatch = candidates[candidates.length - 1];
  const folded = candidates
    .slice(0, -1)
    .reduceRight<Dispatch>((rest, candidate) => compose([candidate, rest]), last);
  return unsafeCoerce(folded);
}
