/**
 * Two-stage synchronizer.
 *
 * Moves an asynchronous sample into the clock domain through two register
 * stages so that every consumer in a tick reads the same settled value.
 */

import type { SyncRegister } from "./types.js";

/** Both stages at the inactive (high) level of an active-low signal. */
export const IDLE_SYNC: SyncRegister = { stage0: true, stage1: true };

/** Shift a new raw sample into the register. */
export function shift(prev: SyncRegister, sample: boolean): SyncRegister {
  return { stage0: sample, stage1: prev.stage0 };
}

/** Encode as a 2-bit vector, `stage1` being the most significant bit. */
export function syncBits(reg: SyncRegister): number {
  return (reg.stage1 ? 2 : 0) | (reg.stage0 ? 1 : 0);
}
