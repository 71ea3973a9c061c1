/**
 * Capability Typeclasses
 *
 * What a container kind can do, one capability per interface. A kind
 * instance implements the ones its container supports; operations ask for
 * exactly the set they use. Handing an operation a kind that lacks one fails
 * to type-check, and the diagnostic names the missing member, e.g.
 *
 *   Property 'allocate' is missing in type 'SetKind' but required in
 *   type 'SizeConstructible<SetF>'.
 *
 * Hierarchy:
 *   KindTag<F>
 *     ├── IterableKind<F>          iterate
 *     ├── Sized<F>                 size
 *     ├── DefaultConstructible<F>  empty
 *     ├── SizeConstructible<F>     allocate
 *     ├── Assignable<F>            assign
 *     ├── EndAppendable<F>         append
 *     └── Insertable<F>            insert
 */

import type { Apply, TypeFunction } from "@polyloop/core";

// ============================================================================
// KindTag
// ============================================================================

export interface KindTag<F extends TypeFunction> {
  /** Shown in debug output. */
  readonly name: string;
  /** Type-level only, never present at runtime; pins `F` for inference. */
  readonly __kind?: F;
}

// ============================================================================
// Observation
// ============================================================================

/** Forward iteration over the elements. */
export interface IterableKind<F extends TypeFunction> extends KindTag<F> {
  readonly iterate: <A>(fa: Apply<F, A>) => Iterable<A>;
}

/** Element count. */
export interface Sized<F extends TypeFunction> extends KindTag<F> {
  readonly size: <A>(fa: Apply<F, A>) => number;
}

// ============================================================================
// Construction
// ============================================================================

/** A new, empty container. */
export interface DefaultConstructible<F extends TypeFunction> extends KindTag<F> {
  readonly empty: <A>() => Apply<F, A>;
}

/**
 * A new container with `size` slots. The slots hold no value until assigned;
 * whoever allocates is responsible for filling every one.
 */
export interface SizeConstructible<F extends TypeFunction> extends KindTag<F> {
  readonly allocate: <A>(size: number) => Apply<F, A>;
}

// ============================================================================
// Population
// ============================================================================

/** Overwrite the slot at `index`. */
export interface Assignable<F extends TypeFunction> extends KindTag<F> {
  readonly assign: <A>(fa: Apply<F, A>, index: number, a: A) => void;
}

/** Add at the end, keeping insertion order. */
export interface EndAppendable<F extends TypeFunction> extends KindTag<F> {
  readonly append: <A>(fa: Apply<F, A>, a: A) => void;
}

/** Add wherever the container places it (e.g. a set). */
export interface Insertable<F extends TypeFunction> extends KindTag<F> {
  readonly insert: <A>(fa: Apply<F, A>, a: A) => void;
}

// ============================================================================
// Bundles, one per derived operation
// ============================================================================

/** `map`: size-shaped output filled slot by slot. */
export type Mappable<F extends TypeFunction> = IterableKind<F> &
  Sized<F> &
  SizeConstructible<F> &
  Assignable<F>;

/** `filter` / `reject`: empty output grown by append or insert. */
export type Filterable<F extends TypeFunction> = IterableKind<F> &
  DefaultConstructible<F> &
  (EndAppendable<F> | Insertable<F>);

/** `transformInPlace`: the input's own slots overwritten. */
export type InPlaceTransformable<F extends TypeFunction> = IterableKind<F> &
  Sized<F> &
  Assignable<F>;
