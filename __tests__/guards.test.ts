import { describe, it, expect } from "vitest";
import {
  deepFreeze,
  defaultGuards,
  isPlainData,
  isStateValue,
  isTagged,
  taggedGuard,
} from "../src/primitives/guards.js";
import { isIteration, iteration, unchanged } from "../src/primitives/iteration.js";
import { toDispatchSequence } from "../src/types/branded.js";
import type { Event, State, StateChange } from "../src/types/contracts.js";
import type { ChannelChange } from "./fixtures/channel.js";

describe("guards", () => {
  describe("isStateValue()", () => {
    it("should accept plain objects", () => {
      expect(isStateValue({ balance: 1 })).toBe(true);
      expect(isStateValue(new Map())).toBe(true);
    });

    it("should reject null, arrays, functions and primitives", () => {
      expect(isStateValue(null)).toBe(false);
      expect(isStateValue([1, 2])).toBe(false);
      expect(isStateValue(() => ({}))).toBe(false);
      expect(isStateValue("state")).toBe(false);
      expect(isStateValue(undefined)).toBe(false);
    });
  });

  describe("isPlainData()", () => {
    it("should accept records, arrays and primitives", () => {
      expect(isPlainData({ a: [1, "x", null, { b: true }] })).toBe(true);
      expect(isPlainData(Object.create(null))).toBe(true);
      expect(isPlainData(7)).toBe(true);
    });

    it("should reject values that stay mutable when frozen", () => {
      expect(isPlainData({ peers: new Map() })).toBe(false);
      expect(isPlainData({ tags: new Set() })).toBe(false);
      expect(isPlainData({ at: new Date(0) })).toBe(false);
      expect(isPlainData({ bytes: new Uint8Array(2) })).toBe(false);
      expect(isPlainData({ nested: [{ fn: () => 1 }] })).toBe(false);
    });
  });

  describe("isTagged()", () => {
    it("should require a non-empty string type", () => {
      expect(isTagged({ type: "DEPOSIT" })).toBe(true);
      expect(isTagged({ type: "" })).toBe(false);
      expect(isTagged({ type: 3 })).toBe(false);
      expect(isTagged({ kind: "DEPOSIT" })).toBe(false);
      expect(isTagged("DEPOSIT")).toBe(false);
    });
  });

  describe("taggedGuard()", () => {
    const isChange = taggedGuard<ChannelChange>(["DEPOSIT", "CLOSE"]);

    it("should accept only tags from the declared set", () => {
      expect(isChange({ type: "DEPOSIT", amount: 1 })).toBe(true);
      expect(isChange({ type: "CLOSE" })).toBe(true);
      expect(isChange({ type: "WITHDRAW", amount: 1 })).toBe(false);
      expect(isChange(null)).toBe(false);
    });
  });

  describe("defaultGuards()", () => {
    const guards = defaultGuards<State, StateChange, Event>();

    it("should check category membership only", () => {
      expect(guards.isState({})).toBe(true);
      expect(guards.isStateChange({ type: "ANYTHING" })).toBe(true);
      expect(guards.isEvent({ type: "ANYTHING" })).toBe(true);
      expect(guards.isEvent({})).toBe(false);
      expect(guards.isState(42)).toBe(false);
    });
  });

  describe("deepFreeze()", () => {
    it("should freeze nested objects and arrays", () => {
      const value = deepFreeze({ outer: { inner: [1, { leaf: true }] } });
      expect(Object.isFrozen(value)).toBe(true);
      expect(Object.isFrozen(value.outer)).toBe(true);
      expect(Object.isFrozen(value.outer.inner)).toBe(true);
      expect(Object.isFrozen(value.outer.inner[1])).toBe(true);
    });

    it("should freeze values held in Maps and Sets", () => {
      const entry = { amount: 3 };
      const member = { id: "peer-1" };
      deepFreeze({ locks: new Map([["lock-1", entry]]), peers: new Set([member]) });
      expect(Object.isFrozen(entry)).toBe(true);
      expect(Object.isFrozen(member)).toBe(true);
    });

    it("should walk into values frozen only at the top", () => {
      const inner = { list: [1] };
      deepFreeze(Object.freeze({ inner }));
      expect(Object.isFrozen(inner)).toBe(true);
      expect(Object.isFrozen(inner.list)).toBe(true);
    });

    it("should terminate on cyclic values", () => {
      const node: { self?: unknown; label: string } = { label: "root" };
      node.self = node;
      expect(deepFreeze(node)).toBe(node);
      expect(Object.isFrozen(node)).toBe(true);
    });

    it("should leave typed arrays writable", () => {
      const bytes = new Uint8Array([1, 2, 3]);
      deepFreeze({ bytes });
      bytes[0] = 9;
      expect(bytes[0]).toBe(9);
    });

    it("should return primitives unchanged", () => {
      expect(deepFreeze(5)).toBe(5);
      expect(deepFreeze(null)).toBeNull();
    });
  });
});

describe("iteration", () => {
  describe("iteration()", () => {
    it("should copy and freeze the event list", () => {
      const events: Event[] = [{ type: "A" }];
      const result = iteration<State, Event>({ n: 1 }, events);
      events.push({ type: "B" });

      expect(result.events).toEqual([{ type: "A" }]);
      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.events)).toBe(true);
    });

    it("should default to no events", () => {
      expect(iteration<State, Event>(null)).toEqual({ newState: null, events: [] });
    });
  });

  describe("unchanged()", () => {
    it("should carry the same state and no events", () => {
      const state = { n: 1 };
      const result = unchanged<State, Event>(state);
      expect(result.newState).toBe(state);
      expect(result.events).toEqual([]);
    });
  });

  describe("isIteration()", () => {
    it("should recognise the Iteration shape", () => {
      expect(isIteration({ newState: null, events: [] })).toBe(true);
      expect(isIteration(iteration<State, Event>({}, [{ type: "A" }]))).toBe(true);
    });

    it("should reject anything else", () => {
      expect(isIteration({ events: [] })).toBe(false);
      expect(isIteration({ newState: {}, events: "none" })).toBe(false);
      expect(isIteration([{}, []])).toBe(false);
      expect(isIteration(undefined)).toBe(false);
    });
  });
});

describe("toDispatchSequence()", () => {
  it("should brand non-negative integers", () => {
    expect(toDispatchSequence(0)).toBe(0);
    expect(toDispatchSequence(12)).toBe(12);
  });

  it("should throw RangeError otherwise", () => {
    expect(() => toDispatchSequence(-1)).toThrow(RangeError);
    expect(() => toDispatchSequence(1.5)).toThrow(RangeError);
  });
});
