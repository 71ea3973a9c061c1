/**
 * One-shot invocation
 *
 * `once(fn)` runs `fn` on the first call and replays its result afterwards.
 * A first call that throws leaves the wrapper unrun: the error propagates and
 * the next call tries again. Only a successful run is remembered.
 *
 * The wrapper's state is shared by every caller holding it. `fn` calling its
 * own wrapper before returning runs `fn` again, since nothing has been
 * recorded yet; code that can re-enter must guard the wrapper itself.
 */

type OnceState<R> = { readonly ran: false } | { readonly ran: true; readonly value: R };

/**
 * Memoize a value-returning thunk.
 *
 * @example
 * ```typescript
 * const loadTable = once(() => buildLookupTable());
 * loadTable(); // builds
 * loadTable(); // cached
 * ```
 */
export function once<R>(fn: () => R): () => R {
  let state: OnceState<R> = { ran: false };
  return () => {
    if (state.ran) return state.value;
    const value = fn();
    state = { ran: true, value };
    return value;
  };
}

/**
 * Run an effect-only thunk at most once. Nothing is cached; later calls
 * return immediately.
 */
export function onceEffect(fn: () => void): () => void {
  let ran = false;
  return () => {
    if (ran) return;
    fn();
    ran = true;
  };
}
