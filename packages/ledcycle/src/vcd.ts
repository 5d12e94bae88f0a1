/**
 * Value Change Dump writer.
 *
 * The header is written on the first `dump()`, followed by a `$dumpvars`
 * block with every signal. Later dumps emit only the signals whose value
 * changed.
 */

import { closeSync, openSync, writeSync } from "node:fs";
import type { RawInputs, Registers } from "./types.js";
import { decodeLeds, stateCode } from "./fsm.js";
import { syncBits } from "./synchronizer.js";
import { logger } from "./logger.js";

export interface VcdSignal {
  readonly name: string;
  readonly width: number;
  /** `true` for internal registers, dumped under a nested `core` scope. */
  readonly internal?: boolean;
}

/** Signal values by name. A negative value is dumped as X. */
export type SignalValues = Record<string, number>;

export const CIRCUIT_SIGNALS: readonly VcdSignal[] = [
  { name: "rst_n", width: 1 },
  { name: "btn", width: 1 },
  { name: "led1", width: 1 },
  { name: "led2", width: 1 },
  { name: "led3", width: 1 },
  { name: "led4", width: 1 },
  { name: "btn_sync", width: 2, internal: true },
  { name: "rst_sync", width: 2, internal: true },
  { name: "btn_db", width: 1, internal: true },
  { name: "rst_db", width: 1, internal: true },
  { name: "btn_pressed", width: 1, internal: true },
  { name: "state", width: 2, internal: true },
];

const bit = (b: boolean): number => (b ? 1 : 0);

/** Project the circuit's pins and registers onto `CIRCUIT_SIGNALS`. */
export function sampleCircuit(regs: Registers, inputs: RawInputs): SignalValues {
  const [led1, led2, led3, led4] = decodeLeds(regs.state);
  return {
    rst_n: bit(inputs.rawReset),
    btn: bit(inputs.rawButton),
    led1: bit(led1),
    led2: bit(led2),
    led3: bit(led3),
    led4: bit(led4),
    btn_sync: syncBits(regs.buttonSync),
    rst_sync: syncBits(regs.resetSync),
    btn_db: bit(regs.buttonDebounced),
    rst_db: bit(regs.resetDebounced),
    btn_pressed: bit(regs.buttonPressed),
    state: stateCode(regs.state),
  };
}

/** Identifier code for the n-th signal: `!`, `"`, `#`, … */
function idCode(index: number): string {
  return String.fromCharCode(33 + index);
}

function formatValue(value: number, width: number, id: string): string {
  if (width === 1) {
    return `${value < 0 ? "x" : value}${id}`;
  }
  const bits = value < 0 ? "x".repeat(width) : value.toString(2).padStart(width, "0");
  return `b${bits} ${id}`;
}

export class VcdWriter {
  private readonly _path: string;
  private readonly _module: string;
  private readonly _signals: readonly VcdSignal[];
  private readonly _last = new Map<string, number>();
  private _fd: number | undefined;
  private _lastTime = -1;
  private _closed = false;

  constructor(path: string, module: string, signals: readonly VcdSignal[]) {
    this._path = path;
    this._module = module;
    this._signals = signals;
  }

  /** Record the values at `timestamp`. Timestamps must not decrease. */
  dump(timestamp: number, values: SignalValues): void {
    if (this._closed) {
      throw new Error(`VCD writer for '${this._path}' is closed`);
    }
    if (timestamp < this._lastTime) {
      throw new Error(
        `VCD timestamp ${timestamp} is earlier than previous dump at ${this._lastTime}`,
      );
    }

    const first = this._fd === undefined;
    const lines: string[] = [];
    if (first) {
      this._fd = openSync(this._path, "w");
      logger.info("VCD output opened", { path: this._path });
      lines.push(...this.header());
    }

    const changes: string[] = [];
    this._signals.forEach((sig, i) => {
      const value = values[sig.name] ?? -1;
      if (first || this._last.get(sig.name) !== value) {
        changes.push(formatValue(value, sig.width, idCode(i)));
        this._last.set(sig.name, value);
      }
    });

    if (first) {
      lines.push(`#${timestamp}`, "$dumpvars", ...changes, "$end");
    } else if (changes.length > 0) {
      lines.push(`#${timestamp}`, ...changes);
    }
    this._lastTime = timestamp;

    if (lines.length > 0 && this._fd !== undefined) {
      writeSync(this._fd, lines.join("\n") + "\n");
    }
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    if (this._fd !== undefined) {
      closeSync(this._fd);
      this._fd = undefined;
    }
  }

  private header(): string[] {
    const lines = [
      "$version ledcycle $end",
      "$timescale 1ns $end",
      `$scope module ${this._module} $end`,
    ];
    let inCore = false;
    for (const [i, sig] of this._signals.entries()) {
      if (sig.internal && !inCore) {
        lines.push("$scope module core $end");
        inCore = true;
      }
      const kind = sig.internal ? "reg" : "wire";
      lines.push(`$var ${kind} ${sig.width} ${idCode(i)} ${sig.name} $end`);
    }
    if (inCore) lines.push("$upscope $end");
    lines.push("$upscope $end", "$enddefinitions $end");
    return lines;
  }
}
