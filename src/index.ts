/**
 * @module state-core
 * @description Deterministic, replayable state-transition core.
 *
 * A StateManager holds one authoritative state and changes it only by
 * applying typed StateChanges through a pure transition function. Each
 * dispatch returns the ordered Events of the transition, which the caller
 * routes to networking, persistence and logging collaborators.
 *
 * @version 0.1.0
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Replay ─────────────────────────────────────────────────────────
export { replay, replaysMatch } from "./replay.js";
export type { ReplayResult } from "./replay.js";

// ─── Logging ────────────────────────────────────────────────────────
export { logger, createLogger, parseLogLevel, isLogLevel } from "./logger.js";
export type { Logger, LoggerConfig, LogLevel, LogSink } from "./logger.js";
