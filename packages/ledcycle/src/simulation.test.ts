import { describe, test, expect, afterEach } from "vitest";
import { Simulation, DEFAULT_CLOCK_PERIOD } from "./simulation.js";
import { SimulationTimeoutError } from "./types.js";

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Simulation", () => {
  let sim: Simulation | undefined;

  afterEach(() => {
    sim?.dispose();
    sim = undefined;
  });

  function create(...args: Parameters<typeof Simulation.create>): Simulation {
    sim = Simulation.create(...args);
    return sim;
  }

  test("addClock schedules rising then falling edges", () => {
    const s = create();
    s.addClock("clk", { period: 10 });
    expect(s.nextEventTime()).toBe(0);
    expect(s.step()).toBe(0);
    expect(s.nextEventTime()).toBe(5);
    expect(s.step()).toBe(5);
    expect(s.step()).toBe(10);
  });

  test("addClock with initialDelay", () => {
    const s = create();
    s.addClock("clk", { period: 10, initialDelay: 3 });
    expect(s.nextEventTime()).toBe(3);
  });

  test("addClock defaults to the 50 MHz period", () => {
    const s = create();
    s.addClock("clk");
    s.step();
    expect(s.nextEventTime()).toBe(DEFAULT_CLOCK_PERIOD / 2);
  });

  test("addClock validates its arguments", () => {
    const s = create();
    expect(() => s.addClock("bad", { period: 10 })).toThrow("Unknown event 'bad'");
    expect(() => s.addClock("clk", { period: 0 })).toThrow(
      "Clock period must be positive, got 0",
    );
  });

  test("time advances to runUntil target without events", () => {
    const s = create();
    expect(s.time()).toBe(0);
    expect(s.nextEventTime()).toBeNull();
    s.runUntil(100);
    expect(s.time()).toBe(100);
    expect(s.step()).toBeNull();
  });

  test("scheduled press advances the FSM", () => {
    const s = create();
    s.addClock("clk", { period: 10 });
    s.schedule("btn", { time: 1, value: 0 });
    s.schedule("btn", { time: 31, value: 1 });

    // Rising edges at 0,10,…; low samples at 10,20,30; advance on the
    // fourth edge after the first high sample at 40.
    const t = s.waitUntil(() => s.dut.led2);
    expect(t).toBe(70);
    expect(s.leds()).toEqual([false, true, false, false]);
  });

  test("a change at an edge time is applied before the edge", () => {
    const s = create();
    s.addClock("clk", { period: 10 });
    s.schedule("btn", { time: 0, value: false });
    s.step();
    expect(s.registers().buttonSync.stage0).toBe(false);
  });

  test("an input change between edges settles asynchronous paths", () => {
    const s = create({ initial: { buttonDebounced: false } });
    s.schedule("rst_n", { time: 5, value: 0 });
    expect(s.step()).toBe(5);
    expect(s.registers().buttonDebounced).toBe(true);
  });

  test("a DUT write and a scheduled write settle alike", () => {
    const initial = { buttonDebounced: false };
    const s = create({ initial });
    s.dut.rst_n = false;
    s.runUntil(10);

    const scheduled = Simulation.create({ initial });
    try {
      scheduled.schedule("rst_n", { time: 5, value: 0 });
      scheduled.runUntil(10);

      expect(s.registers().buttonDebounced).toBe(true);
      expect(scheduled.registers()).toEqual(s.registers());
      expect(scheduled.time()).toBe(s.time());
    } finally {
      scheduled.dispose();
    }
  });

  test("schedule validates port and time", () => {
    const s = create();
    expect(() => s.schedule("led1", { time: 1, value: 1 })).toThrow(
      "Unknown input port 'led1'",
    );
    expect(() => s.schedule("clk", { time: 1, value: 1 })).toThrow(
      "Unknown input port 'clk'",
    );
    s.runUntil(100);
    expect(() => s.schedule("btn", { time: 50, value: 0 })).toThrow(
      "Cannot schedule 'btn' at 50: simulation time is already 100",
    );
  });

  test("runUntil with maxSteps: timeout error has correct properties", () => {
    const s = create();
    s.addClock("clk", { period: 10 });
    try {
      s.runUntil(10_000, { maxSteps: 5 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(SimulationTimeoutError);
      if (e instanceof SimulationTimeoutError) {
        expect(e.steps).toBe(5);
        expect(e.time).toBe(20);
      }
    }
  });

  test("runUntil with maxSteps within budget", () => {
    const s = create();
    s.addClock("clk", { period: 10 });
    s.runUntil(20, { maxSteps: 5 });
    expect(s.time()).toBe(20);
  });

  test("waitForCycles: counts rising edges", () => {
    const s = create();
    s.addClock("clk", { period: 10 });
    expect(s.waitForCycles("clk", 3)).toBe(20);
    expect(s.waitForCycles({ name: "clk", id: 0 }, 1)).toBe(30);
  });

  test("waitForCycles: throws without addClock", () => {
    const s = create();
    expect(() => s.waitForCycles("clk", 3)).toThrow("No clock registered for 'clk'");
  });

  test("waitUntil: throws on timeout", () => {
    const s = create();
    s.addClock("clk", { period: 10 });
    expect(() => s.waitUntil(() => false, { maxSteps: 5 })).toThrow(
      SimulationTimeoutError,
    );
  });

  test("waitUntil: throws when no events remain", () => {
    const s = create();
    expect(() => s.waitUntil(() => false)).toThrow("waitUntil: no events remain at time 0");
  });

  test("reset: asserts rst_n for two cycles and releases", () => {
    const s = create({ initial: { state: "C" } });
    s.addClock("clk", { period: 20 });
    expect(s.dut.led3).toBe(true);

    s.reset("rst_n");
    expect(s.time()).toBe(20);
    expect(s.dut.rst_n).toBe(true);
    expect(s.dut.led1).toBe(true);
    expect(s.registers().resetDebounced).toBe(false);
  });

  test("reset: explicit duration", () => {
    const s = create({ initial: { state: "B" } });
    s.addClock("clk", { period: 20 });
    s.reset("rst_n", { duration: 50 });
    expect(s.time()).toBe(50);
    expect(s.registers().state).toBe("A");
  });

  test("reset: throws without a clock or duration, leaving rst_n released", () => {
    const s = create();
    expect(() => s.reset("rst_n")).toThrow("No clock registered for 'clk'");
    expect(s.dut.rst_n).toBe(true);
  });

  test("reset: throws on non-reset or unknown port", () => {
    const s = create();
    expect(() => s.reset("btn")).toThrow(
      "Port 'btn' is not a reset signal (type: 'logic').",
    );
    expect(() => s.reset("nonexistent")).toThrow("Unknown port 'nonexistent'");
  });

  test("dispose prevents further operations", () => {
    const s = create();
    s.dispose();
    expect(() => s.runUntil(100)).toThrow("Simulation has been disposed");
  });
});
