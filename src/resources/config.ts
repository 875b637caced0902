import { defineResource, type StartedResource } from "braided";
import { createStore, type StoreApi } from "zustand/vanilla";
import type { SimulationConfig } from "../flock/vocabulary/schemas/config";
import type { RuntimeStore } from "../flock/vocabulary/schemas/state";

export type RuntimeStoreApi = StoreApi<RuntimeStore>;

export type ConfigResourceOptions = {
  config: SimulationConfig; // Already validated
  presetId?: string | null;
};

/**
 * Config Resource - holds the active simulation config
 *
 * The zustand store is the single source of truth for the controller;
 * the engine receives changes as staged commands.
 */
export const createConfigResource = (options: ConfigResourceOptions) => {
  return defineResource({
    dependencies: [],
    start: () => {
      const store = createStore<RuntimeStore>()(() => ({
        config: options.config,
        presetId: options.presetId ?? null,
      }));

      console.log(
        `[config] Loaded ${options.presetId ?? "custom"} config (seed "${options.config.seed}")`
      );

      return {
        store,
        getConfig: (): SimulationConfig => store.getState().config,
        getPresetId: () => store.getState().presetId,
        subscribe: store.subscribe,
      };
    },
    halt: () => {
      console.log("[config] Halted");
    },
  });
};

export type ConfigResource = StartedResource<
  ReturnType<typeof createConfigResource>
>;
