/**
 * Throughput benchmarks.
 *
 *   1. Bare `Circuit.advance()` per tick
 *   2. `Simulator.tick()` through the DUT accessor
 *   3. `Simulation.runUntil()` with a scheduled clock
 */

import { bench, describe } from "vitest";
import { Circuit } from "./circuit.js";
import { Simulator } from "./simulator.js";
import { Simulation } from "./simulation.js";

describe("tick", () => {
  const circuit = new Circuit();
  let i = 0;

  bench("circuit_advance_x1", () => {
    circuit.advance((i++ & 8) === 0, true);
  });

  bench(
    "simulator_tick_x1000000",
    () => {
      const sim = Simulator.create();
      for (let n = 0; n < 1_000_000; n++) {
        if ((n & 15) === 0) sim.dut.btn = !sim.dut.btn;
        sim.tick();
      }
      sim.dispose();
    },
    { iterations: 3, time: 0 },
  );

  bench(
    "simulation_run_until_1ms",
    () => {
      const sim = Simulation.create();
      sim.addClock("clk");
      sim.reset("rst_n");
      sim.runUntil(1_000_000);
      sim.dispose();
    },
    { iterations: 3, time: 0 },
  );
});
