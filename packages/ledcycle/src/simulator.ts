/**
 * Event-based Simulator.
 *
 * Wraps a CircuitHandle and provides a high-level TypeScript API
 * for manually controlling clock edges via `tick()`.
 */

import type {
  EventHandle,
  Leds,
  Registers,
  SimulatorOptions,
} from "./types.js";
import type { PushButtonPorts } from "./module.js";
import { PushButtonFsm } from "./module.js";
import { createDut, type DirtyState } from "./dut.js";
import { CircuitHandle } from "./handle.js";

// ---------------------------------------------------------------------------
// Simulator
// ---------------------------------------------------------------------------

export class Simulator {
  private readonly _handle: CircuitHandle;
  private readonly _dut: PushButtonPorts;
  private readonly _events: Record<string, number>;
  private readonly _state: DirtyState;
  private _disposed = false;

  private constructor(
    handle: CircuitHandle,
    dut: PushButtonPorts,
    events: Record<string, number>,
    state: DirtyState,
  ) {
    this._handle = handle;
    this._dut = dut;
    this._events = events;
    this._state = state;
  }

  /**
   * Create a Simulator for the push-button circuit.
   *
   * ```ts
   * const sim = Simulator.create();
   * sim.dut.btn = false;
   * sim.tick(3);
   * ```
   */
  static create(options?: SimulatorOptions): Simulator {
    const handle = new CircuitHandle(options);
    const state: DirtyState = { dirty: false };
    const dut = createDut<PushButtonPorts>(PushButtonFsm.ports, handle, state);
    const events = Object.fromEntries(
      PushButtonFsm.events.map((name, id) => [name, id]),
    );
    return new Simulator(handle, dut, events, state);
  }

  /** The DUT accessor object. Ports read and write as plain properties. */
  get dut(): PushButtonPorts {
    return this._dut;
  }

  /**
   * Trigger a clock edge.
   *
   * @param event  Optional event handle from `this.event()`.
   *               If omitted, ticks the first (default) event.
   * @param count  Number of ticks. Default: 1.
   */
  tick(event?: EventHandle, count?: number): void;
  tick(count?: number): void;
  tick(eventOrCount?: EventHandle | number, count?: number): void {
    this.ensureAlive();

    let ticks: number;
    if (typeof eventOrCount === "object") {
      // tick(eventHandle, count?)
      this.resolveEvent(eventOrCount.name);
      ticks = count ?? 1;
    } else {
      // tick(count?) on the default event
      ticks = eventOrCount ?? 1;
    }

    for (let i = 0; i < ticks; i++) {
      this._handle.tick();
    }
    this._state.dirty = false;
  }

  /** Resolve an event name to a handle for use with `tick()`. */
  event(name: string): EventHandle {
    return { name, id: this.resolveEvent(name) };
  }

  /** Snapshot of every internal register. */
  registers(): Registers {
    this.ensureAlive();
    this.settleIfDirty();
    return this._handle.registers;
  }

  /** The four outputs as a tuple. */
  leds(): Leds {
    this.ensureAlive();
    this.settleIfDirty();
    return this._handle.leds;
  }

  /** Number of clock ticks evaluated so far. */
  cycle(): number {
    this.ensureAlive();
    return this._handle.ticks;
  }

  /** Write current signal values to VCD at the given timestamp. */
  dump(timestamp: number): void {
    this.ensureAlive();
    this.settleIfDirty();
    this._handle.dump(timestamp);
  }

  /** Release resources (closes the VCD file). */
  dispose(): void {
    if (!this._disposed) {
      this._disposed = true;
      this._handle.dispose();
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private resolveEvent(name: string): number {
    const id = this._events[name];
    if (id === undefined) {
      throw new Error(
        `Unknown event '${name}'. Available: ${Object.keys(this._events).join(", ")}`,
      );
    }
    return id;
  }

  private settleIfDirty(): void {
    if (this._state.dirty) {
      this._handle.evalComb();
      this._state.dirty = false;
    }
  }

  private ensureAlive(): void {
    if (this._disposed) {
      throw new Error("Simulator has been disposed");
    }
  }
}
