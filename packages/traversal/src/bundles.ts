/**
 * Every operation a built-in kind supports, bound to that kind.
 */

import { arrayKind, setKind } from "./kinds.js";
import {
  each,
  every,
  filter,
  filterWith,
  map,
  none,
  reject,
  some,
  transformInPlace,
} from "./derived.js";

export const arrays = {
  each,
  map: map(arrayKind),
  filter: filter(arrayKind),
  filterWith: filterWith(arrayKind),
  reject: reject(arrayKind),
  transformInPlace: transformInPlace(arrayKind),
  some,
  every,
  none,
} as const;

// No map or transformInPlace: a set has no positional slots.
export const sets = {
  each,
  filter: filter(setKind),
  filterWith: filterWith(setKind),
  reject: reject(setKind),
  some,
  every,
  none,
} as const;
