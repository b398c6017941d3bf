/**
 * @module primitives/state-manager
 * @description StateManager: the mutable storage for application state.
 *
 * Holds one committed state, applies StateChanges to a private deep copy of
 * it through the registered transition function and commits the result as a
 * single step. The committed state is deep-frozen by default. When it holds
 * only records, arrays and primitives, freezing locks it completely and
 * `currentState()` hands it out directly; otherwise every read is a copy.
 */

import { trace, SpanKind, SpanStatusCode } from "@opentelemetry/api";
import type { IStateManager } from "../interfaces/state-manager.js";
import { ConfigurationError, ContractViolation } from "../interfaces/state-manager.js";
import type {
  ContractGuards,
  Event,
  State,
  StateChange,
  StateTransition,
} from "../types/contracts.js";
import type { DispatchSequence } from "../types/branded.js";
import { toDispatchSequence } from "../types/branded.js";
import { logger as defaultLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { defaultGuards, deepFreeze, isPlainData } from "./guards.js";
import { isIteration } from "./iteration.js";

const tracer = trace.getTracer("state-core");

// ─── Configuration ────────────────────────────────────────────────

export interface StateManagerConfig<S extends State, C extends StateChange, E extends Event> {
  /** Name used in log entries and span names. Default: "state-manager" */
  name?: string;
  /** Boundary checks for changes, states and events. Default: structural guards */
  guards?: ContractGuards<S, C, E>;
  /** Deep-freeze every committed state. Default: true */
  freeze?: boolean;
  /** Destination for diagnostics. Default: the package logger */
  logger?: Logger;
}

// ─── Manager ──────────────────────────────────────────────────────

/**
 * @example
 * ```ts
 * const manager = new StateManager(channelTransition, { balance: 0 });
 * const events = manager.dispatch({ type: "DEPOSIT", amount: 10 });
 * for (const event of events) router.handle(event);
 * ```
 */
export class StateManager<S extends State, C extends StateChange, E extends Event>
  implements IStateManager<S, C, E>
{
  private readonly transition: StateTransition<S, C, E>;
  private readonly config: Required<StateManagerConfig<S, C, E>>;
  private state: S | null = null;
  private snapshotSafe = false;
  private committed = 0;
  private dispatching = false;

  constructor(
    transition: StateTransition<S, C, E>,
    initialState: S | null,
    config: StateManagerConfig<S, C, E> = {}
  ) {
    this.config = {
      name: config.name ?? "state-manager",
      guards: config.guards ?? defaultGuards<S, C, E>(),
      freeze: config.freeze ?? true,
      logger: config.logger ?? defaultLogger,
    };

    if (typeof transition !== "function") {
      throw new ConfigurationError(
        `state transition must be callable, got ${typeof transition}`,
        "TRANSITION_NOT_CALLABLE"
      );
    }
    this.transition = transition;
    this.commit(this.adoptInitialState(initialState));

    this.config.logger.debug("state manager created", {
      manager: this.config.name,
      hasState: this.state !== null,
    });
  }

  // ─── Commands ───────────────────────────────────────────────────

  dispatch(change: C): readonly E[] {
    if (this.dispatching) {
      throw this.violation(
        "REENTRANT_DISPATCH",
        "dispatch called while a transition is running"
      );
    }

    return tracer.startActiveSpan(
      `${this.config.name}.dispatch`,
      { kind: SpanKind.INTERNAL },
      (span) => {
        try {
          if (!this.config.guards.isStateChange(change)) {
            throw this.violation(
              "INVALID_STATE_CHANGE",
              "dispatch requires a StateChange",
              { received: describeValue(change) }
            );
          }
          span.setAttribute("state.change.type", change.type);

          const events = this.apply(change);

          span.setAttributes({
            "state.dispatch.sequence": this.committed,
            "state.events.count": events.length,
            "state.absent": this.state === null,
          });
          span.setStatus({ code: SpanStatusCode.OK });
          return events;
        } catch (error) {
          span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
          if (error instanceof Error) {
            span.recordException(error);
          }
          throw error;
        } finally {
          span.end();
        }
      }
    );
  }

  dispatchAll(changes: Iterable<C>): readonly E[] {
    const checkpointState = this.state;
    const checkpointSafe = this.snapshotSafe;
    const checkpointCommitted = this.committed;
    const events: E[] = [];

    try {
      for (const change of changes) {
        events.push(...this.dispatch(change));
      }
    } catch (error) {
      const rolledBack = this.committed - checkpointCommitted;
      this.state = checkpointState;
      this.snapshotSafe = checkpointSafe;
      this.committed = checkpointCommitted;
      this.config.logger.warn("batch dispatch rolled back", {
        manager: this.config.name,
        rolledBack,
      });
      throw error;
    }

    return Object.freeze(events);
  }

  // ─── Queries ────────────────────────────────────────────────────

  currentState(): S | null {
    // A fully frozen state is its own snapshot.
    return this.snapshotSafe ? this.state : this.copyState(this.state);
  }

  hasState(): boolean {
    return this.state !== null;
  }

  dispatchCount(): DispatchSequence {
    return toDispatchSequence(this.committed);
  }

  // ─── Internal ───────────────────────────────────────────────────

  /**
   * Run the transition on copies of the state and the change, then commit.
   * Nothing before `commit` touches `this.state` or `this.committed`.
   */
  private apply(change: C): readonly E[] {
    const working = this.copyState(this.state);
    const owned = this.copyChange(change);

    let result: unknown;
    this.dispatching = true;
    try {
      result = this.transition(working, owned);
    } finally {
      this.dispatching = false;
    }

    if (!isIteration(result)) {
      throw this.violation(
        "INVALID_ITERATION",
        "state transition must return an Iteration",
        { change: change.type, received: describeValue(result) }
      );
    }

    const nextState = this.checkState(result.newState, change);
    const events = this.checkEvents(result.events, change);

    this.commit(nextState);
    this.committed += 1;

    this.config.logger.debug("state change committed", {
      manager: this.config.name,
      change: change.type,
      sequence: this.committed,
      events: events.length,
      absent: this.state === null,
    });

    return events;
  }

  private checkState(value: unknown, change: C): S | null {
    if (value === null) {
      return null;
    }
    if (this.config.guards.isState(value)) {
      return value;
    }
    throw this.violation(
      "INVALID_STATE",
      "state transition returned a value that is not a State",
      { change: change.type, received: describeValue(value) }
    );
  }

  private checkEvents(values: readonly unknown[], change: C): readonly E[] {
    const events: E[] = [];
    values.forEach((value, index) => {
      if (!this.config.guards.isEvent(value)) {
        throw this.violation(
          "INVALID_EVENT",
          `state transition returned a non-Event at index ${index}`,
          { change: change.type, index, received: describeValue(value) }
        );
      }
      events.push(value);
    });
    return Object.freeze(events);
  }

  private adoptInitialState(initialState: S | null): S | null {
    if (initialState === null) {
      return null;
    }
    if (!this.config.guards.isState(initialState)) {
      throw new ConfigurationError(
        "initial state must be null or a State",
        "INVALID_INITIAL_STATE",
        { received: describeValue(initialState) }
      );
    }

    let copy: S;
    try {
      copy = structuredClone(initialState);
    } catch (error) {
      throw new ConfigurationError(
        `initial state cannot be copied: ${String(error)}`,
        "INVALID_INITIAL_STATE"
      );
    }
    return copy;
  }

  private commit(state: S | null): void {
    const safe = this.config.freeze && isPlainData(state);
    this.state = this.config.freeze ? deepFreeze(state) : state;
    this.snapshotSafe = safe;
  }

  private copyChange(change: C): C {
    try {
      return structuredClone(change);
    } catch (error) {
      throw this.violation(
        "CHANGE_NOT_CLONEABLE",
        `state change cannot be copied: ${String(error)}`,
        { change: change.type }
      );
    }
  }

  private copyState(state: S | null): S | null {
    if (state === null) {
      return null;
    }
    try {
      return structuredClone(state);
    } catch (error) {
      throw this.violation(
        "STATE_NOT_CLONEABLE",
        `committed state cannot be copied: ${String(error)}`
      );
    }
  }

  private violation(
    code: ContractViolation["code"],
    message: string,
    details?: Record<string, unknown>
  ): ContractViolation {
    const violation = new ContractViolation(message, code, details);
    this.config.logger.error("contract violation", violation, {
      manager: this.config.name,
      ...details,
    });
    return violation;
  }
}

/**
 * Short description of an offending value for error details and logs.
 */
function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") {
    const name = value.constructor?.name;
    return name && name !== "Object" ? name : "object";
  }
  return typeof value;
}
