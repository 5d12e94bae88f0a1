import { describe, test, expect, afterEach } from "vitest";
import { Simulator } from "ledcycle";
import { setupMatchers } from "ledcycle/matchers";

setupMatchers();

describe("Reset", () => {
  let sim: Simulator | undefined;

  afterEach(() => {
    sim?.dispose();
    sim = undefined;
  });

  function pressAndRelease(s: Simulator): void {
    s.dut.btn = false;
    s.tick(3);
    s.dut.btn = true;
    s.tick(5);
  }

  test("reset in state C returns to A regardless of the button", () => {
    sim = Simulator.create();
    pressAndRelease(sim);
    pressAndRelease(sim);
    expect(sim.dut).toLight(3);

    sim.dut.btn = false;
    sim.dut.rst_n = false;
    sim.tick();
    // Still passing through the synchronizer
    expect(sim.dut).toLight(3);
    sim.tick();
    expect(sim.dut).toLight(1);
    expect(sim.registers().state).toBe("A");

    sim.tick(10);
    expect(sim.dut).toLight(1);
  });

  test("a press completed while reset is held is ignored", () => {
    sim = Simulator.create();
    sim.dut.rst_n = false;
    pressAndRelease(sim);
    expect(sim.dut).toLight(1);

    sim.dut.rst_n = true;
    sim.tick(10);
    expect(sim.dut).toLight(1);
  });

  test("the first press after release is counted", () => {
    sim = Simulator.create();
    sim.dut.rst_n = false;
    sim.tick(2);
    sim.dut.rst_n = true;
    sim.tick(3);
    expect(sim.registers().resetDebounced).toBe(true);
    pressAndRelease(sim);
    expect(sim.dut).toLight(2);
  });
});
