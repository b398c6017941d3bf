/**
 * @module primitives/iteration
 * @description Constructors and the shape check for Iteration values.
 */

import type { Event, Iteration, State } from "../types/contracts.js";

/**
 * What an unvalidated transition result must look like before its state and
 * events are checked individually.
 */
export interface IterationShape {
  readonly newState: unknown;
  readonly events: readonly unknown[];
}

/**
 * Build an Iteration. The events array is copied and both the array and the
 * Iteration are frozen, so later pushes by the transition cannot leak in.
 *
 * @example
 * ```ts
 * return iteration({ ...state, balance: state.balance + change.amount }, [
 *   { type: "DEPOSIT_ACCEPTED", amount: change.amount },
 * ]);
 * ```
 */
export function iteration<S extends State, E extends Event>(
  newState: S | null,
  events: readonly E[] = []
): Iteration<S, E> {
  return Object.freeze({
    newState,
    events: Object.freeze([...events]),
  });
}

/**
 * The no-op Iteration: the same state and no events. Transitions return this
 * for changes they do not recognise.
 */
export function unchanged<S extends State, E extends Event>(state: S | null): Iteration<S, E> {
  return iteration<S, E>(state, []);
}

export function isIteration(value: unknown): value is IterationShape {
  return (
    typeof value === "object" &&
    value !== null &&
    "newState" in value &&
    "events" in value &&
    Array.isArray(value.events)
  );
}
