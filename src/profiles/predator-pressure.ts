import type { SimulationPreset } from "./types";

/**
 * Predator Pressure
 *
 * Faster predators with a long hunt radius; boids react early.
 */
export const predatorPressurePreset: SimulationPreset = {
  id: "predator-pressure",
  name: "Predator Pressure",
  description: "Fast predators hunting a medium flock",
  config: {
    boidCount: 220,
    predatorCount: 16,
    obstacleCount: 0,
    leaderCount: 6,
    predatorSpeedFactor: 1.35,
    huntRadius: 160,
    predatorAvoidRadius: 110,
    weights: { predatorEvasion: 4, predation: 1.5 },
  },
};
