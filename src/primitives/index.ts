/**
 * @module primitives
 * @description The state manager plus the Iteration constructors and
 * boundary guards it relies on.
 */

export { StateManager } from "./state-manager.js";
export type { StateManagerConfig } from "./state-manager.js";
export { iteration, unchanged, isIteration } from "./iteration.js";
export type { IterationShape } from "./iteration.js";
export {
  isStateValue,
  isPlainData,
  isTagged,
  taggedGuard,
  defaultGuards,
  deepFreeze,
} from "./guards.js";
