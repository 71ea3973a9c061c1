import { describe, it, expect, afterEach } from "vitest";
import {
  arrays,
  sets,
  bloop,
  preallocSized,
  transformAssign,
  arrayKind,
  once,
  concat,
  guarded,
  negate,
  config,
  PreconditionError,
  type ArrayF,
} from "../src/index.js";

afterEach(() => {
  config.reset();
});

describe("polyloop", () => {
  it("re-exports traversals", () => {
    expect(arrays.map([1, 2], (x) => x + 1)).toEqual([2, 3]);
    expect(sets.filter(new Set(["a", "b"]), (s) => s === "b")).toEqual(new Set(["b"]));
  });

  it("composes combinators with traversals", () => {
    const isOdd = (x: number): boolean => x % 2 === 1;
    expect(arrays.filter([1, 2, 3], negate(isOdd))).toEqual([2]);
  });

  it("re-exports the engine and policies", () => {
    const square = bloop(
      preallocSized<ArrayF, number, number>(arrayKind),
      transformAssign<ArrayF, number, number>(arrayKind)
    );
    expect(square([2, 3], (x) => x * x)).toEqual([4, 9]);
  });

  it("re-exports once and concat", () => {
    let runs = 0;
    const init = once(() => ++runs);
    init();
    expect(init()).toBe(1);

    const describeValue = concat(
      guarded((v: unknown): v is number => typeof v === "number")((n) => `n:${n}`),
      guarded((v: unknown): v is string => typeof v === "string")((s) => `s:${s}`)
    );
    expect(describeValue("x")).toBe("s:x");
  });

  it("re-exports configuration and errors", () => {
    expect(config.get("contracts.mode")).toBe("full");
    expect(new PreconditionError("p").contractType).toBe("precondition");
  });
});
