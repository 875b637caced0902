import type { SimulationPreset } from "./types";

/**
 * Dense Flock - stress test for the grid
 *
 * Many boids in a small arena, no predators. Smaller cells keep the
 * candidate count per query low at this density.
 */
export const denseFlockPreset: SimulationPreset = {
  id: "dense-flock",
  name: "Dense Flock",
  description: "400 boids packed into a small arena",
  config: {
    boidCount: 400,
    predatorCount: 0,
    obstacleCount: 0,
    leaderCount: 12,
    arena: { minX: 0, minY: 0, maxX: 800, maxY: 600 },
    gridCellSize: 50,
    separationRadius: 15,
    weights: { separation: 2 },
  },
};
