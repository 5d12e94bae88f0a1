/**
 * DUT (Device Under Test) accessor factory.
 *
 * Builds a plain object with Object.defineProperty getter/setters that
 * read and write the circuit's pins through a `DutHandle`.
 * No Proxy is used; every port becomes a concrete property.
 */

import type { PortInfo } from "./types.js";
import type { DutHandle } from "./handle.js";

// ---------------------------------------------------------------------------
// Internal dirty-tracking state shared between DUT and Simulator/Simulation
// ---------------------------------------------------------------------------

/**
 * Mutable state shared between the DUT accessor and its owning
 * Simulator/Simulation instance.  The Simulator clears `dirty` after
 * tick()/runUntil(); the DUT sets it on any input write and checks it
 * before any output read.
 * @internal
 */
export interface DirtyState {
  dirty: boolean;
}

/** Value accepted by a 1-bit input port. */
export type BitValue = boolean | number | bigint;

/** Normalize a port write to a level. Throws for values wider than 1 bit. */
export function toBit(name: string, value: BitValue): boolean {
  if (typeof value === "boolean") return value;
  if (value === 0 || value === 0n) return false;
  if (value === 1 || value === 1n) return true;
  throw new Error(`Value ${value} does not fit 1-bit port '${name}'`);
}

// ---------------------------------------------------------------------------
// DUT factory
// ---------------------------------------------------------------------------

/**
 * Create a DUT accessor object with defineProperty-based getters/setters.
 *
 * @param portDefs  Port metadata from the ModuleDefinition
 * @param handle    Port access and asynchronous settle
 * @param state     Shared dirty-tracking state
 */
export function createDut<P>(
  portDefs: Record<string, PortInfo>,
  handle: DutHandle,
  state: DirtyState,
): P {
  const obj = Object.create(null) as P;

  for (const [name, port] of Object.entries(portDefs)) {
    // Skip clock ports, they are controlled via tick()/addClock()
    if (port.type === "clock") continue;
    defineSignalProperty(obj as object, name, port, handle, state);
  }

  return obj;
}

/** Define a single scalar signal property on the target object. */
function defineSignalProperty(
  target: object,
  name: string,
  port: PortInfo,
  handle: DutHandle,
  state: DirtyState,
): void {
  const isOutput = port.direction === "output";

  Object.defineProperty(target, name, {
    get(): boolean {
      // Output reads: settle asynchronous paths if dirty
      if (state.dirty && isOutput) {
        handle.evalComb();
        state.dirty = false;
      }
      return handle.read(name);
    },

    set(value: BitValue) {
      if (isOutput) {
        throw new Error(`Cannot write to output port '${name}'`);
      }
      handle.write(name, toBit(name, value));
      state.dirty = true;
    },

    enumerable: true,
    configurable: false,
  });
}
