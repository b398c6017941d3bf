/**
 * @module interfaces/state-manager
 * @description IStateManager: the single authoritative holder of state.
 *
 * A manager owns exactly one current state, accepts StateChanges one at a
 * time and applies them through the transition function registered at
 * construction. The events of each transition are returned to the caller,
 * who routes them to networking, persistence or logging collaborators.
 *
 * Dispatch is synchronous and assumes a single logical writer. Callers that
 * receive changes concurrently serialize them before they reach the manager.
 */

import type { State, StateChange, Event } from "../types/contracts.js";
import type { DispatchSequence } from "../types/branded.js";

/**
 * Thrown at construction when the manager cannot be configured.
 * The manager is never usable after this error.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly code: "TRANSITION_NOT_CALLABLE" | "INVALID_INITIAL_STATE",
    public readonly details?: Readonly<Record<string, unknown>>
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Thrown by dispatch when the caller or the transition function breaks the
 * State / StateChange / Event / Iteration contract. Always fatal: the
 * owning session is expected to stop, since replay can no longer be trusted.
 */
export class ContractViolation extends Error {
  constructor(
    message: string,
    public readonly code:
      | "INVALID_STATE_CHANGE"
      | "INVALID_ITERATION"
      | "INVALID_STATE"
      | "INVALID_EVENT"
      | "STATE_NOT_CLONEABLE"
      | "CHANGE_NOT_CLONEABLE"
      | "REENTRANT_DISPATCH",
    public readonly details?: Readonly<Record<string, unknown>>
  ) {
    super(message);
    this.name = "ContractViolation";
  }
}

/**
 * @interface IStateManager
 * @description Applies StateChanges to the current State and hands back the
 * resulting Events.
 */
export interface IStateManager<S extends State, C extends StateChange, E extends Event> {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Applies one StateChange to a private copy of the current
   * state and commits the transition's result.
   *
   * @param change - The change to apply.
   * @returns The transition's events, in the order they were produced.
   * @postcondition The committed state is the Iteration's `newState`.
   *               Nothing is committed when an error is thrown.
   * @throws {ContractViolation} code=INVALID_STATE_CHANGE before the
   *   transition runs if `change` is not a StateChange.
   * @throws {ContractViolation} code=INVALID_ITERATION / INVALID_STATE /
   *   INVALID_EVENT if the transition returns a malformed result.
   */
  dispatch(change: C): readonly E[];

  /**
   * @command
   * @description Dispatches `changes` in order as one all-or-nothing step.
   *
   * @returns The concatenated events of every dispatch.
   * @postcondition If any dispatch throws, the pre-batch state is restored
   *               and the error propagates.
   */
  dispatchAll(changes: Iterable<C>): readonly E[];

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @description Read-only snapshot of the committed state, or `null` when
   * the manager is absent.
   */
  currentState(): S | null;

  /**
   * @query
   * @description `true` in the has-state phase, `false` when absent.
   */
  hasState(): boolean;

  /**
   * @query
   * @description Number of dispatches committed since construction.
   */
  dispatchCount(): DispatchSequence;
}
