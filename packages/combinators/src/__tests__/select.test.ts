import { describe, it, expect, afterEach } from "vitest";
import { config, PreconditionError } from "@polyloop/core";
import { identityAt, copyAt, identity, copy } from "../select.js";
import type { ArgAt } from "../select.js";

// Compile-time equality check
type Equals<A, B> = [A] extends [B] ? ([B] extends [A] ? true : false) : false;

afterEach(() => {
  config.reset();
});

describe("identityAt", () => {
  it("returns the n-th argument", () => {
    expect(identityAt(2)(10, 20, 30, 40)).toBe(30);
    expect(identityAt(0)("only")).toBe("only");
  });

  it("returns the same reference", () => {
    const target = { id: 1 };
    expect(identityAt(1)("a", target)).toBe(target);
    expect(identity(target)).toBe(target);
  });

  it("types the result as the selected parameter", () => {
    const selected: string = identityAt(1)(0, "b", true);
    expect(selected).toBe("b");
  });

  it("rejects positions that are not non-negative integers", () => {
    expect(() => identityAt(-1)).toThrow(RangeError);
    expect(() => identityAt(1.5)).toThrow("selector position must be a non-negative integer, got 1.5");
  });

  it("throws PreconditionError when called with too few arguments past the type checker", () => {
    expect(() => Reflect.apply(identityAt(3), undefined, [1, 2])).toThrow(PreconditionError);
    expect(() => Reflect.apply(identityAt(3), undefined, [1, 2])).toThrow(
      "identityAt(3) called with 2 argument(s)"
    );
  });

  it("returns undefined for short argument lists when contract checks are off", () => {
    config.set({ contracts: { mode: "none" } });
    expect(Reflect.apply(identityAt(3), undefined, [1, 2])).toBeUndefined();
  });

  it("rejects short argument lists at compile time", () => {
    function tooFewArguments() {
      // @ts-expect-error: identityAt(2) needs at least three arguments
      identityAt(2)(10, 20);
    }
    expect(typeof tooFewArguments).toBe("function");
  });
});

describe("copyAt", () => {
  it("returns an equal but independent value", () => {
    const original = { tags: ["a", "b"] };
    const copied = copyAt(1)(0, original);
    expect(copied).toEqual(original);
    expect(copied).not.toBe(original);

    copied.tags.push("c");
    expect(original.tags).toEqual(["a", "b"]);
  });

  it("passes primitives through", () => {
    expect(copy(5)).toBe(5);
    expect(copyAt(2)("x", "y", "z")).toBe("z");
  });

  it("shares functions instead of rejecting them", () => {
    const increment = (n: number): number => n + 1;
    expect(copyAt(1)(0, increment)).toBe(increment);

    const handlers = { onChange: increment };
    const copied = copy(handlers);
    expect(copied).not.toBe(handlers);
    expect(copied.onChange).toBe(increment);
  });

  it("keeps the prototype of class instances", () => {
    class Point {
      constructor(public x: number) {}
      norm(): number {
        return Math.abs(this.x);
      }
    }
    const original = new Point(-3);
    const copied = copy(original);

    expect(copied).toBeInstanceOf(Point);
    expect(copied).not.toBe(original);
    expect(copied.norm()).toBe(3);

    copied.x = 10;
    expect(original.x).toBe(-3);
  });

  it("copies nested instances, maps and sets", () => {
    class Tag {
      constructor(readonly label: string) {}
    }
    const original = {
      tags: [new Tag("a")],
      index: new Map([["a", { hits: 1 }]]),
      seen: new Set([new Tag("b")]),
      at: new Date(0),
    };
    const copied = copy(original);

    expect(copied.tags[0]).toBeInstanceOf(Tag);
    expect(copied.tags[0]).not.toBe(original.tags[0]);
    expect(copied.index.get("a")).toEqual({ hits: 1 });
    expect(copied.index.get("a")).not.toBe(original.index.get("a"));
    expect([...copied.seen][0]).toBeInstanceOf(Tag);
    expect(copied.at).toEqual(new Date(0));
    expect(copied.at).not.toBe(original.at);
  });

  it("reproduces cycles", () => {
    const node: { name: string; self?: unknown } = { name: "n" };
    node.self = node;
    const copied = copy(node);
    expect(copied.self).toBe(copied);
    expect(copied.self).not.toBe(node);
  });

  it("keeps array holes and length", () => {
    const sparse = [1, , 3];
    const copied = copy(sparse);
    expect(copied).toHaveLength(3);
    expect(1 in copied).toBe(false);
    expect(copied[2]).toBe(3);
  });
});

describe("ArgAt", () => {
  it("peels arguments down to the requested position", () => {
    const third: Equals<ArgAt<2, [number, string, boolean]>, boolean> = true;
    const first: Equals<ArgAt<0, [number, string]>, number> = true;
    const pastEnd: Equals<ArgAt<3, [number]>, never> = true;
    expect([third, first, pastEnd]).toEqual([true, true, true]);
  });
});
