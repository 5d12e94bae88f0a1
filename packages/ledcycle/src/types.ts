/**
 * ledcycle core type definitions
 *
 * These types define the contract between:
 *   - the register-transfer core (synchronizers, debouncers, FSM)
 *   - the harness (DUT accessor, Simulator, Simulation)
 */

// ---------------------------------------------------------------------------
// Register set
// ---------------------------------------------------------------------------

/** The four states of the push-button FSM, in cyclic order. */
export const STATES = ["A", "B", "C", "D"] as const;

export type FsmState = (typeof STATES)[number];

/**
 * Two-stage synchronizer register.
 * `stage1` always holds the sample taken two ticks before the current one.
 */
export interface SyncRegister {
  readonly stage0: boolean;
  readonly stage1: boolean;
}

/**
 * Full register snapshot of the circuit.
 *
 * All levels are active-low, matching the pin polarity:
 *   - `buttonDebounced`: `true` = not pressed
 *   - `resetDebounced`:  `true` = reset inactive
 *   - `buttonPressed`:   `false` = press event
 */
export interface Registers {
  readonly buttonSync: SyncRegister;
  readonly resetSync: SyncRegister;
  readonly buttonDebounced: boolean;
  readonly resetDebounced: boolean;
  readonly buttonPressed: boolean;
  readonly state: FsmState;
}

/** Raw, unsynchronized samples presented to one clock tick. Active-low. */
export interface RawInputs {
  readonly rawButton: boolean;
  readonly rawReset: boolean;
}

/** The four indicator outputs, `led1..led4`. */
export type Leds = readonly [boolean, boolean, boolean, boolean];

// ---------------------------------------------------------------------------
// Module definition
// ---------------------------------------------------------------------------

/**
 * Static descriptor of a simulated module.
 * The type parameter `Ports` carries the port interface so that
 * `createDut()` returns a correctly-typed accessor.
 */
export interface ModuleDefinition<Ports = Record<string, unknown>> {
  readonly name: string;
  readonly ports: Record<string, PortInfo>;
  readonly events: readonly string[];
  /** Phantom field, never set at runtime. Carries the `Ports` type. */
  readonly __ports?: Ports;
}

/** Metadata for a single port. */
export interface PortInfo {
  readonly direction: "input" | "output";
  readonly type: "clock" | "reset_async_low" | "logic";
  readonly width: number;
}

// ---------------------------------------------------------------------------
// User-facing options
// ---------------------------------------------------------------------------

export interface SimulatorOptions {
  /** Path to write VCD waveform output. */
  vcd?: string;
  /** Registers to preload over the power-on values. */
  initial?: Partial<Registers>;
}

export interface ClockOptions {
  /** Clock period in nanoseconds. */
  period: number;
  /** Time of the first rising edge. Default: 0. */
  initialDelay?: number;
}

// ---------------------------------------------------------------------------
// Event handle (returned by Simulator.event())
// ---------------------------------------------------------------------------

/** A resolved event reference for use with `tick()`. */
export interface EventHandle {
  readonly name: string;
  readonly id: number;
}

// ---------------------------------------------------------------------------
// Simulation timeout error
// ---------------------------------------------------------------------------

/**
 * Thrown when a simulation helper exceeds its step budget.
 */
export class SimulationTimeoutError extends Error {
  readonly time: number;
  readonly steps: number;

  constructor(message: string, time: number, steps: number) {
    super(message);
    this.name = "SimulationTimeoutError";
    this.time = time;
    this.steps = steps;
  }
}
