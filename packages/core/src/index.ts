/**
 * @polyloop/core: shared foundations
 *
 * The HKT encoding container kinds are written in, configuration, contract
 * errors and the runtime checks that raise them, and debug logging.
 */

export type { TypeFunction, Apply, ArrayF, SetF } from "./hkt.js";
export { unsafeCoerce } from "./hkt.js";

export type { ContractsMode, ContractsConfig, PolyloopConfig } from "./config.js";
export { config, defineConfig } from "./config.js";

export type { ContractType } from "./errors.js";
export { ContractError, PreconditionError, NoMatchingComponentError } from "./errors.js";

export { contractsEnabled, requires } from "./contracts.js";
export { isDebugEnabled, debugLog } from "./debug.js";
