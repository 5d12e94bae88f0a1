import type { ModuleDefinition } from "./types.js";

/** Port interface of the push-button FSM. Inputs are raw, active-low pins. */
export interface PushButtonPorts {
  rst_n: boolean;
  btn: boolean;
  readonly led1: boolean;
  readonly led2: boolean;
  readonly led3: boolean;
  readonly led4: boolean;
}

export const PushButtonFsm: ModuleDefinition<PushButtonPorts> = {
  name: "PushButtonFsm",
  ports: {
    clk:   { direction: "input", type: "clock", width: 1 },
    rst_n: { direction: "input", type: "reset_async_low", width: 1 },
    btn:   { direction: "input", type: "logic", width: 1 },
    led1:  { direction: "output", type: "logic", width: 1 },
    led2:  { direction: "output", type: "logic", width: 1 },
    led3:  { direction: "output", type: "logic", width: 1 },
    led4:  { direction: "output", type: "logic", width: 1 },
  },
  events: ["clk"],
};
