/**
 * ledcycle
 *
 * Cycle-exact simulation of a push-button driven four-state FSM:
 * two-stage input synchronizers, debounce, press detection, state register
 * and one-hot output decoding, evaluated with register-transfer semantics.
 */

// Core types
export type {
  FsmState,
  SyncRegister,
  Registers,
  RawInputs,
  Leds,
  ModuleDefinition,
  PortInfo,
  SimulatorOptions,
  ClockOptions,
  EventHandle,
} from "./types.js";
export { STATES, SimulationTimeoutError } from "./types.js";

// Register-transfer core
export { shift, syncBits, IDLE_SYNC } from "./synchronizer.js";
export {
  BUTTON_CHANNEL,
  RESET_CHANNEL,
  clockChannel,
  settleChannel,
} from "./channel.js";
export type { ChannelConfig, ChannelState } from "./channel.js";
export { detectPress, NO_PRESS } from "./press-detector.js";
export { successor, nextState, decodeLeds, stateCode, RESET_STATE } from "./fsm.js";
export {
  Circuit,
  POWER_ON,
  IDLE_INPUTS,
  clockEdge,
  settle,
  evaluate,
} from "./circuit.js";

// Module definition
export { PushButtonFsm } from "./module.js";
export type { PushButtonPorts } from "./module.js";

// Simulator (event-based)
export { Simulator } from "./simulator.js";

// Simulation (time-based)
export { Simulation, DEFAULT_CLOCK_PERIOD } from "./simulation.js";

// DUT accessor (advanced / internal use)
export { createDut, toBit } from "./dut.js";
export type { DirtyState, BitValue } from "./dut.js";

// Waveform output
export { VcdWriter, CIRCUIT_SIGNALS, sampleCircuit } from "./vcd.js";
export type { VcdSignal, SignalValues } from "./vcd.js";

export { logger } from "./logger.js";
export type { LogLevel } from "./logger.js";
