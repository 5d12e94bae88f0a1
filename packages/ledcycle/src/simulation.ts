/**
 * Time-based Simulation.
 *
 * Wraps a CircuitHandle and provides a high-level TypeScript API
 * for clock-driven simulation with automatic scheduling.
 */

import type {
  ClockOptions,
  EventHandle,
  Leds,
  Registers,
  SimulatorOptions,
} from "./types.js";
import { SimulationTimeoutError } from "./types.js";
import type { PushButtonPorts } from "./module.js";
import { PushButtonFsm } from "./module.js";
import { createDut, toBit, type BitValue, type DirtyState } from "./dut.js";
import { CircuitHandle } from "./handle.js";
import { logger } from "./logger.js";

/** Period of the 50 MHz reference clock, in nanoseconds. */
export const DEFAULT_CLOCK_PERIOD = 20;

interface ClockState {
  readonly name: string;
  readonly period: number;
  nextRise: number;
  nextFall: number;
  level: boolean;
}

interface ScheduledChange {
  readonly time: number;
  readonly port: string;
  readonly value: boolean;
}

// ---------------------------------------------------------------------------
// Simulation
// ---------------------------------------------------------------------------

export class Simulation {
  private readonly _handle: CircuitHandle;
  private readonly _dut: PushButtonPorts;
  private readonly _state: DirtyState;
  private readonly _queue: ScheduledChange[] = [];
  private _clock: ClockState | undefined;
  private _time = 0;
  private _disposed = false;

  private constructor(handle: CircuitHandle, dut: PushButtonPorts, state: DirtyState) {
    this._handle = handle;
    this._dut = dut;
    this._state = state;
  }

  /**
   * Create a Simulation for the push-button circuit.
   *
   * ```ts
   * const sim = Simulation.create();
   * sim.addClock("clk", { period: 20 });
   * sim.reset("rst_n");
   * sim.runUntil(1_000);
   * ```
   */
  static create(options?: SimulatorOptions): Simulation {
    const handle = new CircuitHandle(options);
    const state: DirtyState = { dirty: false };
    const dut = createDut<PushButtonPorts>(PushButtonFsm.ports, handle, state);
    return new Simulation(handle, dut, state);
  }

  /** The DUT accessor object. Ports read and write as plain properties. */
  get dut(): PushButtonPorts {
    return this._dut;
  }

  /**
   * Register the periodic clock.
   *
   * @param name    Clock event name (must match a `clock` port).
   * @param opts    `period` in ns (default 20); optional `initialDelay`.
   */
  addClock(name: string, opts?: Partial<ClockOptions>): void {
    this.ensureAlive();
    this.resolveEvent(name);
    const period = opts?.period ?? DEFAULT_CLOCK_PERIOD;
    if (!(period > 0)) {
      throw new Error(`Clock period must be positive, got ${period}`);
    }
    const first = this._time + (opts?.initialDelay ?? 0);
    this._clock = {
      name,
      period,
      nextRise: first,
      nextFall: first + period / 2,
      level: false,
    };
  }

  /**
   * Schedule a one-shot value change for an input port.
   *
   * @param name  Input port name.
   * @param opts  `time` is the absolute time to apply, `value` the level to set.
   */
  schedule(name: string, opts: { time: number; value: BitValue }): void {
    this.ensureAlive();
    const port = this.resolveInput(name);
    if (opts.time < this._time) {
      throw new Error(
        `Cannot schedule '${name}' at ${opts.time}: simulation time is already ${this._time}`,
      );
    }
    const change: ScheduledChange = {
      time: opts.time,
      port,
      value: toBit(name, opts.value),
    };
    // Stable insert: equal times keep scheduling order
    const at = this._queue.findIndex((c) => c.time > change.time);
    if (at < 0) {
      this._queue.push(change);
    } else {
      this._queue.splice(at, 0, change);
    }
  }

  /**
   * Run the simulation until the given time.
   * Processes all scheduled events up to and including `endTime`.
   *
   * When `maxSteps` is provided, a `SimulationTimeoutError` is thrown if
   * the budget is exhausted before reaching `endTime`.
   */
  runUntil(endTime: number, opts?: { maxSteps?: number }): void {
    this.ensureAlive();
    const max = opts?.maxSteps ?? Infinity;
    let steps = 0;
    for (;;) {
      const next = this.nextEventTime();
      if (next === null || next > endTime) break;
      if (steps >= max) {
        throw new SimulationTimeoutError(
          `runUntil: exceeded ${max} steps at time ${this._time} (target ${endTime})`,
          this._time,
          steps,
        );
      }
      this.processNext();
      steps++;
    }
    if (endTime > this._time) {
      this._time = endTime;
    }
    this._state.dirty = false;
  }

  /**
   * Advance to the next scheduled event.
   *
   * @returns The time of the processed event, or `null` if no events remain.
   */
  step(): number | null {
    this.ensureAlive();
    const t = this.processNext();
    this._state.dirty = false;
    return t;
  }

  /** Current simulation time. */
  time(): number {
    this.ensureAlive();
    return this._time;
  }

  /**
   * Peek at the time of the next scheduled event without advancing.
   *
   * @returns The time of the next event, or `null` if no events are scheduled.
   */
  nextEventTime(): number | null {
    this.ensureAlive();
    const times: number[] = [];
    const head = this._queue[0];
    if (head) times.push(head.time);
    if (this._clock) times.push(this._clock.nextRise, this._clock.nextFall);
    return times.length > 0 ? Math.min(...times) : null;
  }

  /**
   * Step until `condition()` returns true.
   *
   * @returns The simulation time when the condition became true.
   * @throws SimulationTimeoutError if `maxSteps` is exceeded or no events remain.
   */
  waitUntil(condition: () => boolean, opts?: { maxSteps?: number }): number {
    this.ensureAlive();
    const max = opts?.maxSteps ?? 100_000;
    let steps = 0;
    while (!condition()) {
      if (steps >= max) {
        throw new SimulationTimeoutError(
          `waitUntil: condition not met after ${max} steps at time ${this._time}`,
          this._time,
          steps,
        );
      }
      const t = this.processNext();
      this._state.dirty = false;
      if (t === null) {
        throw new SimulationTimeoutError(
          `waitUntil: no events remain at time ${this._time}`,
          this._time,
          steps,
        );
      }
      steps++;
    }
    return this._time;
  }

  /**
   * Wait for `count` rising edges of the given clock.
   *
   * Two steps are scheduled per clock cycle (rising + falling edge), so
   * this returns right after the `count`-th rising edge.
   *
   * @returns The simulation time after the cycles complete.
   * @throws SimulationTimeoutError if `maxSteps` is exceeded.
   */
  waitForCycles(
    event: string | EventHandle,
    count: number,
    opts?: { maxSteps?: number },
  ): number {
    this.ensureAlive();
    const clock = this.requireClock(typeof event === "string" ? event : event.name);
    const max = opts?.maxSteps ?? 100_000;
    let rises = 0;
    let steps = 0;
    while (rises < count) {
      if (steps >= max) {
        throw new SimulationTimeoutError(
          `waitForCycles: exceeded ${max} steps at time ${this._time}`,
          this._time,
          steps,
        );
      }
      const wasLow = !clock.level;
      this.processNext();
      steps++;
      if (wasLow && clock.level) rises++;
    }
    this._state.dirty = false;
    return this._time;
  }

  /**
   * Assert and release a reset signal.
   *
   * `rst_n` is active-low: writes 0, advances `activeCycles` clock cycles
   * (default 2) or `duration` time units, then writes 1.
   */
  reset(
    signal: string,
    opts?: { activeCycles?: number; duration?: number },
  ): void {
    this.ensureAlive();
    const port = PushButtonFsm.ports[signal];
    if (!port) {
      throw new Error(
        `Unknown port '${signal}'. Available: ${Object.keys(PushButtonFsm.ports).join(", ")}`,
      );
    }
    if (port.type !== "reset_async_low") {
      throw new Error(`Port '${signal}' is not a reset signal (type: '${port.type}').`);
    }

    const duration = opts?.duration;
    const clockName = PushButtonFsm.events[0] ?? "clk";
    if (duration === undefined) this.requireClock(clockName);

    const start = this._time;
    this._handle.write(signal, false);
    if (duration !== undefined) {
      this.runUntil(start + duration);
    } else {
      this.waitForCycles(clockName, opts?.activeCycles ?? 2);
    }
    this._handle.write(signal, true);
    this._state.dirty = false;
    logger.info("reset sequence complete", { signal, start, end: this._time });
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

  /** Write current signal values to VCD. Defaults to the current time. */
  dump(timestamp?: number): void {
    this.ensureAlive();
    this.settleIfDirty();
    this._handle.dump(timestamp ?? this._time);
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

  /** Apply every change due at the next event time, then the clock edge. */
  private processNext(): number | null {
    const t = this.nextEventTime();
    if (t === null) return null;

    while (this._queue.length > 0 && this._queue[0]?.time === t) {
      const change = this._queue.shift();
      if (change) this._handle.write(change.port, change.value);
    }

    const clock = this._clock;
    if (clock && clock.nextRise === t) {
      clock.level = true;
      clock.nextRise += clock.period;
      this._handle.tick();
    } else if (clock && clock.nextFall === t) {
      clock.level = false;
      clock.nextFall += clock.period;
    }

    this._time = t;
    return t;
  }

  private requireClock(name: string): ClockState {
    const clock = this._clock;
    if (!clock || clock.name !== name) {
      throw new Error(`No clock registered for '${name}'`);
    }
    return clock;
  }

  private resolveEvent(name: string): void {
    if (!PushButtonFsm.events.includes(name)) {
      throw new Error(
        `Unknown event '${name}'. Available: ${PushButtonFsm.events.join(", ")}`,
      );
    }
  }

  private resolveInput(name: string): string {
    const port = PushButtonFsm.ports[name];
    if (!port || port.direction !== "input" || port.type === "clock") {
      throw new Error(`Unknown input port '${name}'`);
    }
    return name;
  }

  private settleIfDirty(): void {
    if (this._state.dirty) {
      this._handle.evalComb();
      this._state.dirty = false;
    }
  }

  private ensureAlive(): void {
    if (this._disposed) {
      throw new Error("Simulation has been disposed");
    }
  }
}
