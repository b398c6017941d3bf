/**
 * @module types/branded
 * @description Branded types for compile-time safety across the state core.
 *
 * Branded types prevent accidental misuse of raw primitives as engine-level
 * counters. A raw number can never be passed where a DispatchSequence
 * is expected without going through the helper that creates one.
 *
 * @example
 * ```ts
 * const raw = 3;
 * // Type error: number is not assignable to DispatchSequence
 * const seq: DispatchSequence = raw;
 * // Correct:
 * const seq = toDispatchSequence(3);
 * ```
 */

/** Unique symbol for branding. Not exported; internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Engine Brands ──────────────────────────────────────────────────

/**
 * Number of dispatches a StateManager has committed since construction.
 * Starts at 0 and increases by exactly one per committed StateChange.
 */
export type DispatchSequence = Brand<number, "DispatchSequence">;

/**
 * Brand a non-negative integer as a DispatchSequence.
 * @throws {RangeError} if `value` is negative or not an integer.
 */
export function toDispatchSequence(value: number): DispatchSequence {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`DispatchSequence must be a non-negative integer, got ${value}`);
  }
  return value as DispatchSequence;
}
