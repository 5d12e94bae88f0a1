/**
 * Press detector.
 *
 * Fires (drives `false`) for one tick on the trailing edge of a debounced
 * press: the registered button level is still low while synchronizer
 * stage 1 has already returned high. Holding the button never fires.
 */

import type { SyncRegister } from "./types.js";

/** Level held while the debounced reset is active: no press. */
export const NO_PRESS = true;

/** Clocked branch; `prev*` are pre-edge register values. */
export function detectPress(
  prevButtonLevel: boolean,
  prevButtonSync: SyncRegister,
): boolean {
  return !(!prevButtonLevel && prevButtonSync.stage1);
}
