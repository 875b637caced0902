import type { SimulationPreset } from "./types";

export const defaultPreset: SimulationPreset = {
  id: "default",
  name: "Default",
  description: "Mixed flock with a few predators, leaders and obstacles",
  config: {},
};
