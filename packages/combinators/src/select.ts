/**
 * Positional selectors
 *
 * `identityAt(n)` hands back the n-th argument it is called with (0-indexed),
 * `copyAt(n)` an independent copy of it. The argument list must reach index
 * `n`; a shorter one does not type-check.
 *
 * @example
 * ```typescript
 * identityAt(2)(10, 20, 30, 40); // 30
 * identityAt(2)(10, 20);         // type error: expected at least 3 arguments
 * ```
 */

import { requires, unsafeCoerce } from "@polyloop/core";

// ============================================================================
// Type-Level Arity
// ============================================================================

/** `N` unknowns, accumulated one element per step until the length reaches `N`. */
type Repeat<N extends number, Acc extends unknown[] = []> = Acc["length"] extends N
  ? Acc
  : Repeat<N, [...Acc, unknown]>;

/** An argument list with at least `N + 1` entries. */
export type ArgsReaching<N extends number> = readonly [...Repeat<N>, unknown, ...unknown[]];

/**
 * The `N`-th element of `Args`: drop the head and decrement until `N` is 0.
 *
 * @example
 * ```typescript
 * type C = ArgAt<2, [number, string, boolean]>; // boolean
 * ```
 */
export type ArgAt<
  N extends number,
  Args extends readonly unknown[],
  Dropped extends unknown[] = [],
> = Dropped["length"] extends N
  ? Args extends readonly [infer Head, ...unknown[]]
    ? Head
    : never
  : Args extends readonly [unknown, ...infer Rest]
    ? ArgAt<N, Rest, [...Dropped, unknown]>
    : never;

/** A callable returning its `N`-th argument. */
export type Selector<N extends number> = <Args extends ArgsReaching<N>>(...args: Args) => Args[N];

// ============================================================================
// Selectors
// ============================================================================

function checkPosition(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`selector position must be a non-negative integer, got ${n}`);
  }
}

/**
 * Select the `n`-th argument, returning the very value passed in.
 */
export function identityAt<N extends number>(n: N): Selector<N> {
  checkPosition(n);
  return (...args) => {
    requires(args.length > n, `identityAt(${n}) called with ${args.length} argument(s)`);
    return args[n];
  };
}

// ============================================================================
// Deep copy
// ============================================================================

// Built-in value types structuredClone reproduces exactly.
function isCloneableBuiltin(value: object): boolean {
  return (
    value instanceof Date ||
    value instanceof RegExp ||
    value instanceof ArrayBuffer ||
    ArrayBuffer.isView(value)
  );
}

/**
 * Deep copy that keeps what `structuredClone` drops: functions are shared
 * rather than rejected, and objects are rebuilt on their own prototype so
 * class instances keep their methods. Cycles and shared references are
 * reproduced. Accessor properties are copied as accessors.
 */
function copyValue<T>(value: T, seen: WeakMap<object, unknown>): T {
  if (typeof value !== "object" || value === null) return value;

  const known = seen.get(value);
  if (known !== undefined) return unsafeCoerce(known);

  if (isCloneableBuiltin(value)) return structuredClone(value);

  if (value instanceof Map) {
    const copied = new Map<unknown, unknown>();
    seen.set(value, copied);
    for (const [k, v] of value) copied.set(copyValue(k, seen), copyValue(v, seen));
    return unsafeCoerce(copied);
  }

  if (value instanceof Set) {
    const copied = new Set<unknown>();
    seen.set(value, copied);
    for (const v of value) copied.add(copyValue(v, seen));
    return unsafeCoerce(copied);
  }

  const copied: object = Array.isArray(value)
    ? new Array<unknown>(value.length)
    : Object.create(Object.getPrototypeOf(value));
  seen.set(value, copied);

  for (const key of Reflect.ownKeys(value)) {
    if (Array.isArray(value) && key === "length") continue;
    const descriptor = Object.getOwnPropertyDescriptor(value, key);
    if (descriptor === undefined) continue;
    if ("value" in descriptor) {
      descriptor.value = copyValue<unknown>(descriptor.value, seen);
    }
    Object.defineProperty(copied, key, descriptor);
  }

  return unsafeCoerce(copied);
}

/**
 * Select the `n`-th argument, returning a deep copy. Mutating the result never
 * touches the caller's value. Functions inside the value are shared, class
 * instances keep their prototype, and dates, regexps and binary buffers go
 * through `structuredClone`.
 */
export function copyAt<N extends number>(n: N): Selector<N> {
  checkPosition(n);
  return (...args) => {
    requires(args.length > n, `copyAt(${n}) called with ${args.length} argument(s)`);
    return copyValue(args[n], new WeakMap());
  };
}

export const identity: Selector<0> = identityAt(0);
export const copy: Selector<0> = copyAt(0);
