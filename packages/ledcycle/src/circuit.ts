/**
 * Register-transfer core of the push-button circuit.
 *
 * A tick is evaluated in two phases:
 *   1. `clockEdge()`: every register computes its clocked next value from
 *      the pre-edge snapshot. Registers whose asynchronous clear is asserted
 *      at the edge keep their clear level.
 *   2. `settle()`: asynchronous clears are re-evaluated against the
 *      committed values, reset-dominant first, so a reset detected on this
 *      tick takes effect on this tick.
 */

import type { ChannelState } from "./channel.js";
import type { Leds, RawInputs, Registers } from "./types.js";
import {
  BUTTON_CHANNEL,
  RESET_CHANNEL,
  clockChannel,
  settleChannel,
} from "./channel.js";
import { NO_PRESS, detectPress } from "./press-detector.js";
import { RESET_STATE, decodeLeds, nextState } from "./fsm.js";
import { IDLE_SYNC } from "./synchronizer.js";

/** Register values at construction: reset state, every level inactive. */
export const POWER_ON: Registers = {
  buttonSync: IDLE_SYNC,
  resetSync: IDLE_SYNC,
  buttonDebounced: true,
  resetDebounced: true,
  buttonPressed: NO_PRESS,
  state: RESET_STATE,
};

/** Both raw pins released. */
export const IDLE_INPUTS: RawInputs = { rawButton: true, rawReset: true };

function buttonChannel(regs: Registers): ChannelState {
  return { sync: regs.buttonSync, level: regs.buttonDebounced };
}

function resetChannel(regs: Registers): ChannelState {
  return { sync: regs.resetSync, level: regs.resetDebounced };
}

/** Clocked update of every register from the pre-edge snapshot. */
export function clockEdge(prev: Registers, inputs: RawInputs): Registers {
  const button = clockChannel(BUTTON_CHANNEL, buttonChannel(prev), inputs);
  const reset = clockChannel(RESET_CHANNEL, resetChannel(prev), inputs);

  // Press detector and state register share the debounced reset as their
  // asynchronous clear.
  const running = prev.resetDebounced;
  return {
    buttonSync: button.sync,
    resetSync: reset.sync,
    buttonDebounced: button.level,
    resetDebounced: reset.level,
    buttonPressed: running
      ? detectPress(prev.buttonDebounced, prev.buttonSync)
      : NO_PRESS,
    state: running ? nextState(prev.state, prev.buttonPressed) : RESET_STATE,
  };
}

/** Apply asynchronous clears to a committed snapshot. */
export function settle(cur: Registers, inputs: RawInputs): Registers {
  const button = settleChannel(BUTTON_CHANNEL, buttonChannel(cur), inputs);
  const reset = settleChannel(RESET_CHANNEL, resetChannel(cur), inputs);
  const inReset = !reset.level;
  return {
    buttonSync: button.sync,
    resetSync: reset.sync,
    buttonDebounced: button.level,
    resetDebounced: reset.level,
    buttonPressed: inReset ? NO_PRESS : cur.buttonPressed,
    state: inReset ? RESET_STATE : cur.state,
  };
}

/** One full tick: clock edge, then settle. Pure. */
export function evaluate(prev: Registers, inputs: RawInputs): Registers {
  return settle(clockEdge(prev, inputs), inputs);
}

/**
 * Owned register set. `advance()` is the only way to move the circuit
 * forward; `applyAsync()` lets a harness observe the asynchronous reset
 * paths react to new pin values between edges.
 */
export class Circuit {
  private _regs: Registers;
  private _ticks = 0;

  constructor(initial?: Partial<Registers>) {
    this._regs = settle({ ...POWER_ON, ...initial }, IDLE_INPUTS);
  }

  /** Current register snapshot. Snapshots are replaced, never mutated. */
  get registers(): Registers {
    return this._regs;
  }

  /** Number of clock ticks evaluated so far. */
  get ticks(): number {
    return this._ticks;
  }

  get leds(): Leds {
    return decodeLeds(this._regs.state);
  }

  /** Evaluate one clock tick with the given raw samples. */
  advance(rawButton: boolean, rawReset: boolean): Leds {
    this._regs = evaluate(this._regs, { rawButton, rawReset });
    this._ticks++;
    return this.leds;
  }

  /** Settle asynchronous clears without a clock edge. */
  applyAsync(rawButton: boolean, rawReset: boolean): void {
    this._regs = settle(this._regs, { rawButton, rawReset });
  }
}
