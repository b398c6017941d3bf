/**
 * @module types
 * @description Public type exports for the state core.
 */

export * from "./branded.js";
export * from "./contracts.js";
