/**
 * @module interfaces
 * @description Public interface exports for the state core.
 */

export * from "./state-manager.js";
