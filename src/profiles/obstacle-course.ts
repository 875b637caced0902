import type { SimulationPreset } from "./types";

export const obstacleCoursePreset: SimulationPreset = {
  id: "obstacle-course",
  name: "Obstacle Course",
  description: "A flock threading through a field of large obstacles",
  config: {
    boidCount: 200,
    predatorCount: 4,
    obstacleCount: 40,
    leaderCount: 8,
    obstacleRadiusRange: { min: 12, max: 30 },
    obstacleAvoidRadius: 50,
    weights: { obstacleAvoidance: 3 },
  },
};
