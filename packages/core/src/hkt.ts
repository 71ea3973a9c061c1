/**
 * Higher-Kinded Types via `this`-typed type functions
 *
 * Generic traversal code talks about "a container of kind `F` holding `A`s"
 * without knowing whether `F` is `Array`, `Set` or a user container. A type
 * function records the container shape once; `Apply<F, A>` fills in the
 * element type:
 *
 * ```typescript
 * interface ArrayF extends TypeFunction {
 *   readonly _: Array<this["__kind__"]>;
 * }
 *
 * type Numbers = Apply<ArrayF, number>; // number[]
 * ```
 *
 * When `F` is a concrete type function the application resolves eagerly, so
 * `Apply<ArrayF, A>` is `A[]` and element types infer from plain arrays. When
 * `F` is still a type parameter the application stays deferred and generic
 * code lines its types up by `F` alone.
 */

// ============================================================================
// Core HKT Encoding
// ============================================================================

/**
 * Base interface for type-level functions.
 *
 * `__kind__` is the argument slot; `_` is the result, written in terms of
 * `this["__kind__"]`.
 */
export interface TypeFunction {
  readonly __kind__: unknown;
  readonly _: unknown;
}

/**
 * Apply a type-level function to an element type.
 *
 * @example
 * ```typescript
 * type S = Apply<SetF, string>; // Set<string>
 * ```
 */
export type Apply<F extends TypeFunction, A> = (F & { readonly __kind__: A })["_"];

// ============================================================================
// Built-in Type-Level Functions
// ============================================================================

/** Type-level function for `Array<A>`. */
export interface ArrayF extends TypeFunction {
  readonly _: Array<this["__kind__"]>;
}

/** Type-level function for `Set<A>`. */
export interface SetF extends TypeFunction {
  readonly _: Set<this["__kind__"]>;
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Unsafe coercion between types.
 *
 * Only for values whose runtime shape is guaranteed by construction but which
 * the type system cannot follow, such as a dispatcher assembled from several
 * typed callables.
 */
export function unsafeCoerce<A, B>(a: A): B {
  return a as unknown as B;
}
