/**
 * @module types/contracts
 * @description Marker contracts for everything that flows through the core.
 *
 * The core never looks inside a State, StateChange or Event. Domains declare
 * closed unions of concrete variants (discriminated by `type`) and the
 * transition function switches over them exhaustively. The shapes below are
 * the minimum the dispatch boundary can check at runtime, for values that
 * arrive from outside the type system (deserialized journals, wire input).
 */

// ─── Markers ────────────────────────────────────────────────────────

/**
 * An isolated, value-semantic snapshot of domain data.
 *
 * - Must survive `structuredClone` intact: plain objects, arrays, primitives,
 *   Maps, Sets, Dates, typed arrays. No functions, no class instances relying
 *   on prototypes. States holding only records, arrays and primitives are read
 *   without a copy; the other kinds are copied on every `currentState()`.
 * - Nested sub-states are referenced by identifier, never shared by pointer.
 * - Never mutated in place once committed.
 */
export type State = object;

/**
 * An incoming occurrence that may change the state (a received message, a
 * ledger event, a timeout firing). Re-applying the same change to the same
 * state must produce an equal Iteration.
 */
export interface StateChange {
  readonly type: string;
}

/**
 * An externally observable consequence of a transition. The core is
 * oblivious to event kinds; it only guarantees order and completeness.
 */
export interface Event {
  readonly type: string;
}

/**
 * Extracts the variant with tag `T` from a discriminated union.
 *
 * @example
 * ```ts
 * type Deposit = VariantOf<ChannelChange, "DEPOSIT">;
 * ```
 */
export type VariantOf<U extends { readonly type: string }, T extends U["type"]> =
  Extract<U, { readonly type: T }>;

// ─── Iteration ──────────────────────────────────────────────────────

/**
 * The result of one transition: the next state (or `null` once the state has
 * been torn down) and the ordered events the transition produced.
 */
export interface Iteration<S extends State, E extends Event> {
  readonly newState: S | null;
  readonly events: readonly E[];
}

/**
 * Pure mapping from (state, change) to Iteration, supplied by the domain.
 *
 * The `state` argument is a private copy owned by this call. It may be
 * mutated and returned, but must not be retained. It is `null` when the
 * manager is absent; whether a change may re-seed it is the domain's call.
 */
export type StateTransition<S extends State, C extends StateChange, E extends Event> = (
  state: S | null,
  change: C
) => Iteration<S, E>;

// ─── Boundary Guards ────────────────────────────────────────────────

/**
 * Runtime checks applied at the dispatch boundary.
 */
export interface ContractGuards<S extends State, C extends StateChange, E extends Event> {
  isState(value: unknown): value is S;
  isStateChange(value: unknown): value is C;
  isEvent(value: unknown): value is E;
}

/**
 * A tag set declared by a domain, used to build closed-union guards.
 */
export type TagSet<U extends { readonly type: string }> = readonly U["type"][];

