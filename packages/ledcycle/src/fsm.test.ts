import { describe, test, expect } from "vitest";
import type { FsmState } from "./types.js";
import { STATES } from "./types.js";
import { decodeLeds, nextState, stateCode, successor } from "./fsm.js";

/** A register value outside the enumeration, as read from untyped data. */
const UNDEFINED_STATE: FsmState = JSON.parse('"E"');

describe("successor", () => {
  test("cycles A→B→C→D→A", () => {
    expect(successor("A")).toBe("B");
    expect(successor("B")).toBe("C");
    expect(successor("C")).toBe("D");
    expect(successor("D")).toBe("A");
  });

  test("falls back to A for an undefined state", () => {
    expect(successor(UNDEFINED_STATE)).toBe("A");
  });
});

describe("nextState", () => {
  test("press (false) advances, no press holds", () => {
    for (const s of STATES) {
      expect(nextState(s, false)).toBe(successor(s));
      expect(nextState(s, true)).toBe(s);
    }
  });
});

describe("decodeLeds", () => {
  test("one-hot per state", () => {
    expect(decodeLeds("A")).toEqual([true, false, false, false]);
    expect(decodeLeds("B")).toEqual([false, true, false, false]);
    expect(decodeLeds("C")).toEqual([false, false, true, false]);
    expect(decodeLeds("D")).toEqual([false, false, false, true]);
  });

  test("all off for an undefined state", () => {
    expect(decodeLeds(UNDEFINED_STATE)).toEqual([false, false, false, false]);
  });
});

describe("stateCode", () => {
  test("2-bit encoding in cyclic order", () => {
    expect(STATES.map(stateCode)).toEqual([0, 1, 2, 3]);
  });
});
