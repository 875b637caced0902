import { allBehaviors } from "./vocabulary/schemas/primitives";
import type { Behavior } from "./vocabulary/schemas/primitives";

/**
 * Frame metrics and the totals the auto-test harness reads.
 */

export type BehaviorCounts = Record<Behavior, number>;

export type FrameMetrics = {
  frame: number;
  agentCount: number;
  neighborQueries: number;
  collisionChecks: number; // Candidate distance checks done by the grid
  checksAvoided: number; // Brute-force checks the grid saved
  frameDurationMs: number;
  behaviors: BehaviorCounts; // Agents for which each behavior fired
};

export type MetricsTotals = {
  frames: number;
  totalDurationMs: number;
  averageFps: number;
  neighborQueries: number;
  collisionChecks: number;
  checksAvoided: number;
  checkReduction: number; // checksAvoided / (collisionChecks + checksAvoided)
  behaviorsFired: Behavior[];
  behaviorTotals: BehaviorCounts;
  lastAgentCount: number;
};

export function createBehaviorCounts(): BehaviorCounts {
  return {
    predatorEvasion: 0,
    obstacleAvoidance: 0,
    boundary: 0,
    separation: 0,
    predation: 0,
    leaderInfluence: 0,
    alignment: 0,
    cohesion: 0,
  };
}

/**
 * Checks a naive all-pairs scan would have made for the same queries,
 * minus the ones the grid actually made
 */
export function computeChecksAvoided(
  queries: number,
  agentCount: number,
  checks: number
): number {
  const bruteForce = queries * Math.max(0, agentCount - 1);
  return Math.max(0, bruteForce - checks);
}

export function createEmptyFrameMetrics(frame = 0): FrameMetrics {
  return {
    frame,
    agentCount: 0,
    neighborQueries: 0,
    collisionChecks: 0,
    checksAvoided: 0,
    frameDurationMs: 0,
    behaviors: createBehaviorCounts(),
  };
}

export type MetricsAccumulator = {
  record: (metrics: FrameMetrics) => void;
  getTotals: () => MetricsTotals;
  reset: () => void;
};

export function createMetricsAccumulator(): MetricsAccumulator {
  let frames = 0;
  let totalDurationMs = 0;
  let neighborQueries = 0;
  let collisionChecks = 0;
  let checksAvoided = 0;
  let lastAgentCount = 0;
  let behaviorTotals = createBehaviorCounts();

  return {
    record: (metrics) => {
      frames++;
      totalDurationMs += metrics.frameDurationMs;
      neighborQueries += metrics.neighborQueries;
      collisionChecks += metrics.collisionChecks;
      checksAvoided += metrics.checksAvoided;
      lastAgentCount = metrics.agentCount;
      for (const behavior of allBehaviors) {
        behaviorTotals[behavior] += metrics.behaviors[behavior];
      }
    },

    getTotals: () => {
      const possible = collisionChecks + checksAvoided;
      return {
        frames,
        totalDurationMs,
        averageFps: totalDurationMs > 0 ? (frames * 1000) / totalDurationMs : 0,
        neighborQueries,
        collisionChecks,
        checksAvoided,
        checkReduction: possible > 0 ? checksAvoided / possible : 0,
        behaviorsFired: allBehaviors.filter(
          (behavior) => behaviorTotals[behavior] > 0
        ),
        behaviorTotals: { ...behaviorTotals },
        lastAgentCount,
      };
    },

    reset: () => {
      frames = 0;
      totalDurationMs = 0;
      neighborQueries = 0;
      collisionChecks = 0;
      checksAvoided = 0;
      lastAgentCount = 0;
      behaviorTotals = createBehaviorCounts();
    },
  };
}
