/**
 * State register transition function and output decoder.
 */

import type { FsmState, Leds } from "./types.js";
import { STATES } from "./types.js";

/** State entered on reset and on any value outside the enumeration. */
export const RESET_STATE: FsmState = "A";

const ALL_OFF: Leds = [false, false, false, false];

/** Cyclic successor A→B→C→D→A. */
export function successor(state: FsmState): FsmState {
  switch (state) {
    case "A":
      return "B";
    case "B":
      return "C";
    case "C":
      return "D";
    case "D":
      return "A";
    default:
      return RESET_STATE;
  }
}

/**
 * Clocked next-state function. `pressed` is active-low: `false` advances,
 * `true` holds.
 */
export function nextState(state: FsmState, pressed: boolean): FsmState {
  return pressed ? state : successor(state);
}

/** Moore output decoder. Exactly one LED per state; all off otherwise. */
export function decodeLeds(state: FsmState): Leds {
  switch (state) {
    case "A":
      return [true, false, false, false];
    case "B":
      return [false, true, false, false];
    case "C":
      return [false, false, true, false];
    case "D":
      return [false, false, false, true];
    default:
      return ALL_OFF;
  }
}

/** 2-bit state code used in waveform dumps (A=00 … D=11). */
export function stateCode(state: FsmState): number {
  return STATES.indexOf(state);
}
