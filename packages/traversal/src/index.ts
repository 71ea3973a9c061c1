/**
 * @polyloop/traversal: policy-based traversals over container kinds
 *
 * ```typescript
 * import { arrays, sets } from "@polyloop/traversal";
 *
 * arrays.map([1, 2, 3], (x) => x * 2);                  // [2, 4, 6]
 * sets.filter(new Set([1, 2, 3, 4]), (x) => x % 2 === 0); // Set {2, 4}
 * arrays.some([1, 2, 3], (x) => x > 2);                 // true
 * ```
 */

export type {
  KindTag,
  IterableKind,
  Sized,
  DefaultConstructible,
  SizeConstructible,
  Assignable,
  EndAppendable,
  Insertable,
  Mappable,
  Filterable,
  InPlaceTransformable,
} from "./capabilities.js";

export type { ArrayKind, SetKind } from "./kinds.js";
export { arrayKind, setKind } from "./kinds.js";

export type { Predicate, ShapingPolicy, ExecutionPolicy, Traversal } from "./engine.js";
export { bloop } from "./engine.js";

export { preallocSized, freshEmpty, inPlace, transformAssign, filterAppend } from "./policies/index.js";

export type { Quantifier } from "./derived.js";
export {
  each,
  quantifier,
  some,
  every,
  none,
  map,
  filter,
  filterWith,
  reject,
  transformInPlace,
} from "./derived.js";

export { arrays, sets } from "./bundles.js";
