import { defineResource } from "braided";
import { createAtom } from "@/lib/state";

/**
 * Time Resource - simulation and real-world clocks
 *
 * Simulation time advances only when the engine completes a frame, by the
 * nominal frames that frame covered. Real-world time advances with the
 * update loop, paused or not.
 */

export type TimeState = {
  simulationFrame: number; // Completed engine frames
  simulationElapsedMs: number;
  realWorldElapsedMs: number;
};

export type TimeAPI = {
  getFrame: () => number;
  getSimulationTime: () => number; // Seconds
  getRealWorldTime: () => number; // Seconds
  now: () => number; // Simulation time, ms

  // Called by the engine resource after each completed frame
  recordFrame: (frame: number, simulatedTimeMs: number) => void;
  // Called by the update loop with wall-clock deltas
  update: (realDeltaMs: number) => void;
};

export type TimeResource = TimeAPI;

export const time = defineResource({
  start: (): TimeAPI => {
    const stateAtom = createAtom<TimeState>({
      simulationFrame: 0,
      simulationElapsedMs: 0,
      realWorldElapsedMs: 0,
    });

    return {
      getFrame: () => stateAtom.get().simulationFrame,
      getSimulationTime: () => stateAtom.get().simulationElapsedMs / 1000,
      getRealWorldTime: () => stateAtom.get().realWorldElapsedMs / 1000,
      now: () => stateAtom.get().simulationElapsedMs,

      recordFrame: (frame, simulatedTimeMs) => {
        stateAtom.update((state) => ({
          ...state,
          simulationFrame: frame,
          simulationElapsedMs: simulatedTimeMs,
        }));
      },

      update: (realDeltaMs) => {
        stateAtom.update((state) => ({
          ...state,
          realWorldElapsedMs: state.realWorldElapsedMs + realDeltaMs,
        }));
      },
    };
  },
  halt: () => {},
});
