/**
 * Preset Registry - named starting configs
 *
 * To add a preset, create a file in this directory and register it below.
 */

import { defaultPreset } from "./default";
import { denseFlockPreset } from "./dense-flock";
import { obstacleCoursePreset } from "./obstacle-course";
import { predatorPressurePreset } from "./predator-pressure";
import type { SimulationPreset } from "./types";
import { ConfigurationError } from "../flock/errors";
import { resolveSimulationConfig } from "../flock/vocabulary/schemas/config";
import type { SimulationConfig } from "../flock/vocabulary/schemas/config";

export type { SimulationPreset } from "./types";

export const presets: Record<string, SimulationPreset> = {
  [defaultPreset.id]: defaultPreset,
  [denseFlockPreset.id]: denseFlockPreset,
  [predatorPressurePreset.id]: predatorPressurePreset,
  [obstacleCoursePreset.id]: obstacleCoursePreset,
};

export const defaultPresetId = defaultPreset.id;

export function getPreset(presetId: string): SimulationPreset {
  const preset = presets[presetId];
  if (!preset) {
    throw new ConfigurationError(
      `Preset not found: ${presetId}. Available presets: ${getPresetIds().join(
        ", "
      )}`
    );
  }
  return preset;
}

export function getPresetIds(): string[] {
  return Object.keys(presets);
}

export function getPresetList(): Array<{
  id: string;
  name: string;
  description: string;
}> {
  return Object.values(presets).map((preset) => ({
    id: preset.id,
    name: preset.name,
    description: preset.description,
  }));
}

/**
 * Full config for a preset, over the defaults
 */
export function resolvePresetConfig(presetId: string): SimulationConfig {
  return resolveSimulationConfig(getPreset(presetId).config);
}
