/**
 * @module primitives/guards
 * @description Runtime contract checks for the dispatch boundary, and the
 * deep-freeze applied to committed states.
 */

import type {
  ContractGuards,
  Event,
  State,
  StateChange,
  TagSet,
} from "../types/contracts.js";

/**
 * A State is any non-null object other than an array.
 */
export function isStateValue(value: unknown): value is State {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * A record carrying a non-empty string `type` tag. Both StateChange and
 * Event satisfy this.
 */
export function isTagged(value: unknown): value is { readonly type: string } {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    value.type.length > 0
  );
}

/**
 * Build a guard for a closed union of tagged variants.
 *
 * @example
 * ```ts
 * const isChannelChange = taggedGuard<ChannelChange>(["DEPOSIT", "WITHDRAW"]);
 * ```
 */
export function taggedGuard<U extends { readonly type: string }>(
  tags: TagSet<U>
): (value: unknown) => value is U {
  const known = new Set<string>(tags);
  return (value: unknown): value is U => isTagged(value) && known.has(value.type);
}

/**
 * Structural guards used when a manager is configured without its own.
 * They check category membership only, not the domain's variant set.
 */
export function defaultGuards<
  S extends State,
  C extends StateChange,
  E extends Event,
>(): ContractGuards<S, C, E> {
  return {
    isState: (value: unknown): value is S => isStateValue(value),
    isStateChange: (value: unknown): value is C => isTagged(value),
    isEvent: (value: unknown): value is E => isTagged(value),
  };
}

/**
 * `true` when `value` holds only primitives, arrays and objects whose
 * prototype is `Object.prototype` or `null`. Freezing such a value locks it
 * completely; Maps, Sets, Dates and typed arrays stay mutable through their
 * methods or indices even when frozen.
 */
export function isPlainData(value: unknown, seen: WeakSet<object> = new WeakSet()): boolean {
  if (typeof value !== "object" || value === null) {
    return typeof value !== "function";
  }
  if (seen.has(value)) {
    return true;
  }
  seen.add(value);

  if (!Array.isArray(value)) {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
      return false;
    }
  }
  return Reflect.ownKeys(value).every((key) => isPlainData(Reflect.get(value, key), seen));
}

/**
 * Recursively freeze objects and arrays, and the keys and values held by
 * Maps and Sets. Already-frozen containers are still walked, since a value
 * frozen only at the top keeps mutable children. Typed arrays cannot be
 * frozen and are left as they are.
 */
export function deepFreeze<T>(value: T, seen: WeakSet<object> = new WeakSet()): T {
  if (typeof value !== "object" || value === null || seen.has(value)) {
    return value;
  }
  seen.add(value);

  if (value instanceof Map) {
    for (const [key, entry] of value) {
      deepFreeze(key, seen);
      deepFreeze(entry, seen);
    }
  } else if (value instanceof Set) {
    for (const entry of value) {
      deepFreeze(entry, seen);
    }
  }
  if (ArrayBuffer.isView(value)) {
    return value;
  }
  for (const key of Reflect.ownKeys(value)) {
    deepFreeze(Reflect.get(value, key), seen);
  }
  Object.freeze(value);
  return value;
}
