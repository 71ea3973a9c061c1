import { describe, it, expect, vi } from "vitest";
import { once, onceEffect } from "../once.js";

describe("once", () => {
  it("runs the thunk on the first call only", () => {
    let calls = 0;
    const next = once(() => {
      calls++;
      return { id: calls };
    });

    const first = next();
    const second = next();
    next();

    expect(calls).toBe(1);
    expect(first).toEqual({ id: 1 });
    expect(second).toBe(first);
  });

  it("does not run before the first call", () => {
    const thunk = vi.fn(() => 1);
    once(thunk);
    expect(thunk).not.toHaveBeenCalled();
  });

  it("caches falsy results", () => {
    const thunk = vi.fn(() => 0);
    const cached = once(thunk);
    expect(cached()).toBe(0);
    expect(cached()).toBe(0);
    expect(thunk).toHaveBeenCalledTimes(1);
  });

  it("retries after a failed first call", () => {
    let attempts = 0;
    const flaky = once(() => {
      attempts++;
      if (attempts === 1) throw new Error("flaky");
      return "ok";
    });

    expect(() => flaky()).toThrow("flaky");
    expect(flaky()).toBe("ok");
    expect(flaky()).toBe("ok");
    expect(attempts).toBe(2);
  });
});

describe("onceEffect", () => {
  it("performs the effect once", () => {
    const effect = vi.fn();
    const run = onceEffect(effect);

    expect(run()).toBeUndefined();
    run();
    run();

    expect(effect).toHaveBeenCalledTimes(1);
  });

  it("retries after a failed first call", () => {
    const effect = vi
      .fn<() => void>()
      .mockImplementationOnce(() => {
        throw new Error("boom");
      })
      .mockImplementation(() => {});
    const run = onceEffect(effect);

    expect(() => run()).toThrow("boom");
    run();
    run();

    expect(effect).toHaveBeenCalledTimes(2);
  });
});
