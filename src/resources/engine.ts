import { defineResource } from "braided";
import { createFlockEngine } from "../flock/engine/stepper";
import type { FlockEngine } from "../flock/engine/stepper";
import type { AgentSpec } from "../flock/agent";
import type { ConfigResource } from "./config";
import type { Profiler } from "./profiler";
import type { RandomnessResource } from "./randomness";
import type { TimeResource } from "./time";

export type EngineResourceOptions = {
  agents?: AgentSpec[]; // Explicit population instead of config counts
};

export type EngineResource = FlockEngine;

/**
 * Engine Resource - the stepper, wired to the profiler and clocks
 *
 * Every completed frame feeds its metrics to the profiler and its frame
 * number and simulated time to the time resource.
 */
export const createEngineResource = (options: EngineResourceOptions = {}) =>
  defineResource({
    dependencies: ["config", "randomness", "profiler", "time"],
    start: ({
      config,
      randomness,
      profiler,
      time,
    }: {
      config: ConfigResource;
      randomness: RandomnessResource;
      profiler: Profiler;
      time: TimeResource;
    }): EngineResource => {
      const engine = createFlockEngine({
        config: config.getConfig(),
        rng: randomness.domain("spawning"),
        agents: options.agents,
      });

      engine.subscribe((snapshot) => {
        profiler.recordFrame(snapshot.metrics);
        time.recordFrame(snapshot.frame, snapshot.simulatedTimeMs);
      });

      console.log(
        `[engine] Initialized with ${engine.getAgents().length} agents`
      );

      return engine;
    },
    halt: (engine) => {
      engine.stop();
      console.log(`[engine] Stopped after ${engine.getFrame()} frames`);
    },
  });
