/**
 * Contract Error Types
 *
 * Runtime counterparts of the checks the type checker normally performs.
 * They only fire for calls that reached the library with types bypassed
 * (casts, `any`, untyped callers) and only while contract checks are enabled.
 */

export type ContractType = "precondition" | "dispatch";

/**
 * Base class for all contract violations.
 */
export class ContractError extends Error {
  constructor(
    message: string,
    public readonly contractType: ContractType
  ) {
    super(message);
    this.name = "ContractError";
  }
}

/**
 * Thrown when an operation is called outside its precondition, e.g. a
 * selector given too few arguments or an output shorter than its input.
 */
export class PreconditionError extends ContractError {
  constructor(message: string) {
    super(message, "precondition");
    this.name = "PreconditionError";
  }
}

/**
 * Thrown when no component of a fallback-composed callable accepts the
 * arguments it was called with.
 */
export class NoMatchingComponentError extends ContractError {
  constructor(
    readonly componentCount: number,
    readonly argumentCount: number
  ) {
    super(
      `none of ${componentCount} composed callables accepts ${argumentCount} argument(s)`,
      "dispatch"
    );
    this.name = "NoMatchingComponentError";
  }
}
