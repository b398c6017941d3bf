/**
 * @module replay
 * @description Rebuild a state from a recorded sequence of StateChanges.
 *
 * Replaying the same changes against the same initial state must always end
 * in an equal state with an equal event history. `replaysMatch` is the check
 * a persistence layer runs after restoring from its journal.
 */

import { isDeepStrictEqual } from "node:util";
import { StateManager } from "./primitives/state-manager.js";
import type { StateManagerConfig } from "./primitives/state-manager.js";
import type { Event, State, StateChange, StateTransition } from "./types/contracts.js";
import type { DispatchSequence } from "./types/branded.js";

export interface ReplayResult<S extends State, E extends Event> {
  /** Committed state after the last change, or `null` if absent. */
  readonly finalState: S | null;
  /** Every event produced, in dispatch order. */
  readonly events: readonly E[];
  /** Number of changes applied. */
  readonly dispatched: DispatchSequence;
}

/**
 * Apply `changes` in order to a fresh manager seeded with `initialState`.
 *
 * @throws {ConfigurationError} if `transition` is not callable.
 * @throws {ContractViolation} if any change or transition result breaks the
 *   contract. Nothing is returned for a partial replay.
 */
export function replay<S extends State, C extends StateChange, E extends Event>(
  transition: StateTransition<S, C, E>,
  initialState: S | null,
  changes: Iterable<C>,
  config?: StateManagerConfig<S, C, E>
): ReplayResult<S, E> {
  const manager = new StateManager(transition, initialState, config);
  const events = manager.dispatchAll(changes);
  return {
    finalState: manager.currentState(),
    events,
    dispatched: manager.dispatchCount(),
  };
}

/**
 * `true` when two replays ended in value-equal states with value-equal
 * event histories.
 */
export function replaysMatch<S extends State, E extends Event>(
  a: ReplayResult<S, E>,
  b: ReplayResult<S, E>
): boolean {
  return (
    a.dispatched === b.dispatched &&
    isDeepStrictEqual(a.finalState, b.finalState) &&
    isDeepStrictEqual(a.events, b.events)
  );
}
