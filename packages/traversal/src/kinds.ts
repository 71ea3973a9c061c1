/**
 * Container kind instances for the built-in collections.
 */

import type { ArrayF, SetF } from "@polyloop/core";
import type {
  IterableKind,
  Sized,
  DefaultConstructible,
  SizeConstructible,
  Assignable,
  EndAppendable,
  Insertable,
} from "./capabilities.js";

// ============================================================================
// Array
// ============================================================================

export type ArrayKind = IterableKind<ArrayF> &
  Sized<ArrayF> &
  DefaultConstructible<ArrayF> &
  SizeConstructible<ArrayF> &
  Assignable<ArrayF> &
  EndAppendable<ArrayF>;

export const arrayKind: ArrayKind = {
  name: "array",
  iterate: (fa) => fa,
  size: (fa) => fa.length,
  empty: () => [],
  allocate: (size) => new Array(size),
  assign: (fa, index, a) => {
    fa[index] = a;
  },
  append: (fa, a) => {
    fa.push(a);
  },
};

// ============================================================================
// Set (no size construction, no positional slots)
// ============================================================================

export type SetKind = IterableKind<SetF> & Sized<SetF> & DefaultConstructible<SetF> & Insertable<SetF>;

export const setKind: SetKind = {
  name: "set",
  iterate: (fa) => fa,
  size: (fa) => fa.size,
  empty: () => new Set(),
  insert: (fa, a) => {
    fa.add(a);
  },
};
