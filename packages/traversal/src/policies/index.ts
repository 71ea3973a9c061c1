export { preallocSized, freshEmpty, inPlace } from "./shaping.js";
export { transformAssign, filterAppend } from "./execution.js";
