/**
 * Constant, no-op and negation combinators
 */

// ============================================================================
// Constants
// ============================================================================

/** A callable that ignores its arguments. */
export type Constant<T> = (...args: readonly unknown[]) => T;

/**
 * Ignore all arguments and return `value`.
 *
 * @example
 * ```typescript
 * [1, 2, 3].map(alwaysConstant("x")); // ["x", "x", "x"]
 * ```
 */
export function alwaysConstant<T>(value: T): Constant<T> {
  return () => value;
}

export const alwaysPositive: Constant<true> = alwaysConstant<true>(true);
export const alwaysNegative: Constant<false> = alwaysConstant<false>(false);

/** Ignore all arguments; do nothing. */
export function noop(..._args: readonly unknown[]): void {}

// ============================================================================
// Negation
// ============================================================================

/** The logical complement of `pred`, with the same parameters. */
export function negate<A extends readonly unknown[]>(
  pred: (...args: A) => boolean
): (...args: A) => boolean {
  return (...args) => !pred(...args);
}
