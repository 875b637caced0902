import { haltSystem, startSystem, type StartedSystem } from "braided";
import type { AgentSpec } from "../flock/agent";
import type { SimulationConfig } from "../flock/vocabulary/schemas/config";
import { createConfigResource } from "../resources/config";
import { createEngineResource } from "../resources/engine";
import { profiler } from "../resources/profiler";
import { randomness } from "../resources/randomness";
import { runtimeController } from "../resources/runtimeController";
import { time } from "../resources/time";

export type StandardSystemOptions = {
  config: SimulationConfig;
  presetId?: string | null;
  agents?: AgentSpec[];
};

/**
 * Resources for one headless simulation. Every call builds a fresh set,
 * so several systems can run side by side.
 */
export const createStandardSystemConfig = (options: StandardSystemOptions) => ({
  config: createConfigResource({
    config: options.config,
    presetId: options.presetId,
  }),
  time,
  profiler,
  randomness,
  engine: createEngineResource({ agents: options.agents }),
  runtimeController,
});

export type StandardSystemConfig = ReturnType<
  typeof createStandardSystemConfig
>;

export type StandardSystem = StartedSystem<StandardSystemConfig>;

export type RunningSystem = {
  system: StandardSystem;
  halt: () => Promise<void>;
};

/**
 * Start every resource, failing if any of them did not come up
 */
export async function startStandardSystem(
  options: StandardSystemOptions
): Promise<RunningSystem> {
  const systemConfig = createStandardSystemConfig(options);
  const { system, errors } = await startSystem(systemConfig);

  if (errors.size > 0) {
    const failures: string[] = [];
    errors.forEach((error, resourceId) => {
      console.error(`[system] ${resourceId} failed to start:`, error);
      failures.push(`${resourceId}: ${error.message}`);
    });
    await haltSystem(systemConfig, system);
    throw new Error(`System started with errors: ${failures.join("; ")}`);
  }

  return {
    system,
    halt: async () => {
      await haltSystem(systemConfig, system);
    },
  };
}
