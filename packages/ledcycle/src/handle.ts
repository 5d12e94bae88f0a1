/**
 * Control handle shared by `Simulator` and `Simulation`.
 *
 * Owns the circuit, the raw pin levels presented to the next tick and the
 * optional waveform writer. The DUT accessor reads and writes ports through
 * it; the owning simulator drives clock edges through it.
 */

import type {
  Leds,
  RawInputs,
  Registers,
  SimulatorOptions,
} from "./types.js";
import { Circuit, IDLE_INPUTS } from "./circuit.js";
import { PushButtonFsm } from "./module.js";
import { CIRCUIT_SIGNALS, VcdWriter, sampleCircuit } from "./vcd.js";
import { logger } from "./logger.js";

/**
 * Port-level access used by the DUT accessor.
 * @internal
 */
export interface DutHandle {
  /** Settle asynchronous paths after input writes. */
  evalComb(): void;
  read(port: string): boolean;
  write(port: string, value: boolean): void;
}

/** @internal */
export class CircuitHandle implements DutHandle {
  private readonly _circuit: Circuit;
  private readonly _vcd: VcdWriter | undefined;
  private _pins: RawInputs = IDLE_INPUTS;
  private _warnedNoVcd = false;

  constructor(options?: SimulatorOptions) {
    this._circuit = new Circuit(options?.initial);
    this._vcd = options?.vcd
      ? new VcdWriter(options.vcd, PushButtonFsm.name, CIRCUIT_SIGNALS)
      : undefined;
  }

  get registers(): Registers {
    return this._circuit.registers;
  }

  get pins(): RawInputs {
    return this._pins;
  }

  get leds(): Leds {
    return this._circuit.leds;
  }

  get ticks(): number {
    return this._circuit.ticks;
  }

  /** Rising clock edge with the current pin levels. */
  tick(): void {
    const from = this._circuit.registers.state;
    this._circuit.advance(this._pins.rawButton, this._pins.rawReset);
    const to = this._circuit.registers.state;
    if (from !== to) {
      logger.debug("state transition", { from, to, tick: this._circuit.ticks });
    }
  }

  evalComb(): void {
    this._circuit.applyAsync(this._pins.rawButton, this._pins.rawReset);
  }

  read(port: string): boolean {
    const leds = this._circuit.leds;
    switch (port) {
      case "rst_n":
        return this._pins.rawReset;
      case "btn":
        return this._pins.rawButton;
      case "led1":
        return leds[0];
      case "led2":
        return leds[1];
      case "led3":
        return leds[2];
      case "led4":
        return leds[3];
      default:
        throw new Error(`Unknown port '${port}'`);
    }
  }

  /** Set a pin level. Asynchronous clears follow the new level at once. */
  write(port: string, value: boolean): void {
    switch (port) {
      case "rst_n":
        this._pins = { ...this._pins, rawReset: value };
        break;
      case "btn":
        this._pins = { ...this._pins, rawButton: value };
        break;
      default:
        throw new Error(`Unknown input port '${port}'`);
    }
    this.evalComb();
  }

  /** Write current signal values to VCD at the given timestamp. */
  dump(timestamp: number): void {
    if (!this._vcd) {
      if (!this._warnedNoVcd) {
        logger.warn("dump() ignored: no VCD path configured");
        this._warnedNoVcd = true;
      }
      return;
    }
    this._vcd.dump(timestamp, sampleCircuit(this._circuit.registers, this._pins));
  }

  dispose(): void {
    try {
      this._vcd?.close();
    } catch (err) {
      logger.error("failed to close VCD output", err);
      throw err;
    }
  }
}
