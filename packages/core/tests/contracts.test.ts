import { describe, it, expect, afterEach, vi } from "vitest";
import {
  config,
  contractsEnabled,
  requires,
  debugLog,
  isDebugEnabled,
  ContractError,
  PreconditionError,
  NoMatchingComponentError,
} from "../src/index.js";

afterEach(() => {
  vi.restoreAllMocks();
  config.reset();
});

describe("requires", () => {
  it("passes when the condition holds", () => {
    expect(() => requires(true, "unused")).not.toThrow();
  });

  it("throws PreconditionError otherwise", () => {
    let caught: unknown;
    try {
      requires(false, "output too short");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PreconditionError);
    expect(caught).toBeInstanceOf(ContractError);
    expect(caught).toMatchObject({
      name: "PreconditionError",
      message: "output too short",
      contractType: "precondition",
    });
  });

  it("is skipped when contracts.mode is none", () => {
    config.set({ contracts: { mode: "none" } });
    expect(contractsEnabled()).toBe(false);
    expect(() => requires(false, "ignored")).not.toThrow();
  });
});

describe("NoMatchingComponentError", () => {
  it("describes the failed dispatch", () => {
    const error = new NoMatchingComponentError(2, 3);
    expect(error.message).toBe("none of 2 composed callables accepts 3 argument(s)");
    expect(error.contractType).toBe("dispatch");
    expect(error.componentCount).toBe(2);
    expect(error.argumentCount).toBe(3);
  });
});

describe("debugLog", () => {
  it("stays silent by default", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    debugLog("engine", "hello");
    expect(isDebugEnabled()).toBe(false);
    expect(spy).not.toHaveBeenCalled();
  });

  it("writes a prefixed line when debug is on", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    config.set({ debug: true });
    debugLog("engine", "hello");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith("[polyloop:engine] hello");
  });
});
