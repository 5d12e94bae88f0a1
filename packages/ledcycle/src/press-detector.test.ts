import { describe, test, expect } from "vitest";
import { detectPress } from "./press-detector.js";

describe("detectPress", () => {
  test("fires when the debounced level is low and stage1 is back high", () => {
    expect(detectPress(false, { stage0: true, stage1: true })).toBe(false);
  });

  test("does not fire while the button is held", () => {
    expect(detectPress(false, { stage0: false, stage1: false })).toBe(true);
  });

  test("does not fire while idle", () => {
    expect(detectPress(true, { stage0: true, stage1: true })).toBe(true);
  });

  test("does not fire on the leading edge", () => {
    expect(detectPress(true, { stage0: false, stage1: false })).toBe(true);
  });
});
