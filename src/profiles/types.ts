import type { SimulationConfigPatch } from "../flock/vocabulary/schemas/config";

/**
 * A named starting point. Only the fields that differ from the defaults
 * are listed.
 */
export type SimulationPreset = {
  id: string;
  name: string;
  description: string;
  config: SimulationConfigPatch;
};
