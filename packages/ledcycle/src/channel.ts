/**
 * Synchronize + debounce unit.
 *
 * One channel owns a two-stage synchronizer and the debounced level derived
 * from it. The button and reset paths are two instances of the same unit,
 * differing only in their asynchronous clear.
 */

import type { RawInputs, SyncRegister } from "./types.js";
import { shift } from "./synchronizer.js";

export interface ChannelState {
  readonly sync: SyncRegister;
  readonly level: boolean;
}

export interface ChannelConfig {
  readonly name: string;
  /** Pick this channel's raw sample out of the tick inputs. */
  readonly sample: (inputs: RawInputs) => boolean;
  /** Level held while the asynchronous clear is asserted. */
  readonly clearLevel: boolean;
  /** Whether the asynchronous clear is asserted. */
  readonly clearActive: (sync: SyncRegister, inputs: RawInputs) => boolean;
}

/**
 * Button channel. Raw reset low forces "not pressed"; otherwise the level
 * follows synchronizer stage 1 with one tick of lag.
 */
export const BUTTON_CHANNEL: ChannelConfig = {
  name: "button",
  sample: (inputs) => inputs.rawButton,
  clearLevel: true,
  clearActive: (_sync, inputs) => !inputs.rawReset,
};

/**
 * Reset channel. Synchronizer stage 1 low drives the level low at once;
 * release is registered and lands one tick after stage 1 goes high.
 */
export const RESET_CHANNEL: ChannelConfig = {
  name: "reset",
  sample: (inputs) => inputs.rawReset,
  clearLevel: false,
  clearActive: (sync) => !sync.stage1,
};

/**
 * Clock edge. Both the synchronizer shift and the level capture read the
 * pre-edge register values; a clear asserted at the edge suppresses the
 * capture.
 */
export function clockChannel(
  config: ChannelConfig,
  prev: ChannelState,
  inputs: RawInputs,
): ChannelState {
  const sync = shift(prev.sync, config.sample(inputs));
  const level = config.clearActive(prev.sync, inputs)
    ? config.clearLevel
    : prev.sync.stage1;
  return { sync, level };
}

/** Apply the asynchronous clear to the current values, outside any edge. */
export function settleChannel(
  config: ChannelConfig,
  cur: ChannelState,
  inputs: RawInputs,
): ChannelState {
  if (config.clearActive(cur.sync, inputs) && cur.level !== config.clearLevel) {
    return { sync: cur.sync, level: config.clearLevel };
  }
  return cur;
}
