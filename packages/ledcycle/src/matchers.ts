/**
 * vitest custom matchers for the indicator outputs.
 *
 * Usage:
 *   import { setupMatchers } from "ledcycle/matchers";
 *   setupMatchers();
 *
 *   expect(sim.dut).toLight(2);
 *   expect(sim.leds()).not.toBeDark();
 */

import { expect } from "vitest";
import type { Leds } from "./types.js";

// ---------------------------------------------------------------------------
// Matcher declarations (augment vitest's Assertion interface)
// ---------------------------------------------------------------------------

interface LedMatchers<R = unknown> {
  /** Assert that output `n` (1–4) is the only one lit. */
  toLight(n: number): R;
  /** Assert that every output is off. */
  toBeDark(): R;
}

declare module "vitest" {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any, @typescript-eslint/no-empty-object-type
  interface Assertion<T = any> extends LedMatchers<T> {}
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface AsymmetricMatchersContaining extends LedMatchers {}
}

// ---------------------------------------------------------------------------
// Matcher implementations
// ---------------------------------------------------------------------------

function readLed(received: object, key: string): boolean | undefined {
  const value: unknown = Reflect.get(received, key);
  return typeof value === "boolean" ? value : undefined;
}

/** Accept a `Leds` tuple or anything exposing `led1..led4`. */
function toLeds(received: unknown): Leds {
  if (Array.isArray(received) && received.length === 4) {
    const [a, b, c, d]: unknown[] = received;
    if (
      typeof a === "boolean" &&
      typeof b === "boolean" &&
      typeof c === "boolean" &&
      typeof d === "boolean"
    ) {
      return [a, b, c, d];
    }
  }
  if (typeof received === "object" && received !== null) {
    const a = readLed(received, "led1");
    const b = readLed(received, "led2");
    const c = readLed(received, "led3");
    const d = readLed(received, "led4");
    if (a !== undefined && b !== undefined && c !== undefined && d !== undefined) {
      return [a, b, c, d];
    }
  }
  throw new TypeError(
    "toLight/toBeDark matchers require a Leds tuple or an object with led1..led4.",
  );
}

function format(leds: Leds): string {
  return `(${leds.map((on) => (on ? 1 : 0)).join(",")})`;
}

const customMatchers = {
  toLight(received: unknown, n: number) {
    const leds = toLeds(received);
    const pass = leds.every((on, i) => on === (i + 1 === n));
    return {
      pass,
      message: () =>
        pass
          ? `expected outputs not to be only led${n}, but got ${format(leds)}`
          : `expected only led${n} to be lit, but got ${format(leds)}`,
    };
  },

  toBeDark(received: unknown) {
    const leds = toLeds(received);
    const pass = leds.every((on) => !on);
    return {
      pass,
      message: () =>
        pass
          ? `expected some output to be lit, but got ${format(leds)}`
          : `expected all outputs off, but got ${format(leds)}`,
    };
  },
};

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

/**
 * Register custom matchers with vitest.
 * Call once in a setup file or at the top of your test:
 *
 * ```ts
 * import { setupMatchers } from "ledcycle/matchers";
 * setupMatchers();
 * ```
 */
export function setupMatchers(): void {
  expect.extend(customMatchers);
}
