/**
 * @polyloop/combinators: building blocks for callables
 *
 * Positional selectors, constants, negation, one-shot memoization and ordered
 * fallback composition. Every combinator is a plain function; only `once`
 * wrappers carry state between calls.
 */

export type { ArgsReaching, ArgAt, Selector } from "./select.js";
export { identityAt, copyAt, identity, copy } from "./select.js";

export type { Constant } from "./constant.js";
export { alwaysConstant, alwaysPositive, alwaysNegative, noop, negate } from "./constant.js";

export { once, onceEffect } from "./once.js";

export type { Guard, GuardedArgs, Attempt, Dispatch, Candidate, ConcatAll } from "./concat.js";
export { guarded, catchAll, concat, makeConcat } from "./concat.js";
