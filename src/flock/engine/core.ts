import { adaptMaxForce, integrate, isObstacle } from "../agent";
import { confineToArena, enforceInvariants } from "../invariants";
import { computeChecksAvoided, createBehaviorCounts } from "../metrics";
import type { FrameMetrics } from "../metrics";
import {
  queryAgentsInRadius,
  rebuildSpatialHash,
  resetQueryStats,
} from "../spatialHash";
import type { SpatialHash } from "../spatialHash";
import { computeSteering } from "../steering";
import { agentKindKeywords } from "../vocabulary/keywords";
import type { Agent } from "../vocabulary/schemas/entities";
import type { SimulationConfig } from "../vocabulary/schemas/config";
import type { AgentKind, Vector2 } from "../vocabulary/schemas/primitives";

/**
 * Core frame pipeline - pure apart from the agents and grid it is handed
 *
 * 1. rebuild the grid from current positions
 * 2. query neighbors and compute every force from that same snapshot
 * 3. integrate every agent
 * 4. clamp into the arena, enforce invariants, adapt boid force limits
 * 5. report metrics
 */

export type FrameInput = {
  agents: Agent[];
  hash: SpatialHash;
  config: SimulationConfig;
  dt: number; // Effective nominal frames (speed multiplier already applied)
  frame: number; // Number the completed frame will carry
  now: () => number; // Clock for frameDurationMs, in ms
};

/**
 * How far an agent of this kind needs to see, given the largest obstacle
 * currently in the arena
 */
export function getInteractionRadius(
  kind: AgentKind,
  config: SimulationConfig,
  largestObstacleRadius: number
): number {
  const obstacleReach = config.obstacleAvoidRadius + largestObstacleRadius;

  switch (kind) {
    case agentKindKeywords.obstacle:
      return 0;
    case agentKindKeywords.predator:
      return Math.max(config.separationRadius, config.huntRadius, obstacleReach);
    case agentKindKeywords.leader:
      return Math.max(
        config.neighborRadius,
        config.separationRadius,
        config.predatorAvoidRadius,
        obstacleReach
      );
    case agentKindKeywords.boid:
      return Math.max(
        config.neighborRadius,
        config.separationRadius,
        config.predatorAvoidRadius,
        config.leaderInfluenceRadius,
        obstacleReach
      );
  }
}

export function runFrame(input: FrameInput): FrameMetrics {
  const { agents, hash, config, dt } = input;
  const startedAt = input.now();

  rebuildSpatialHash(hash, agents);
  resetQueryStats(hash);

  let largestObstacleRadius = 0;
  for (const agent of agents) {
    if (isObstacle(agent) && agent.radius > largestObstacleRadius) {
      largestObstacleRadius = agent.radius;
    }
  }

  // Forces first, all from the pre-update snapshot
  const behaviors = createBehaviorCounts();
  const forces: Vector2[] = agents.map((agent) => {
    if (isObstacle(agent)) return { x: 0, y: 0 };

    const radius = getInteractionRadius(
      agent.kind,
      config,
      largestObstacleRadius
    );
    const neighbors = queryAgentsInRadius(
      hash,
      agent.position,
      radius,
      agent.id
    );
    const steering = computeSteering(agent, neighbors, config);
    for (const behavior of steering.fired) {
      behaviors[behavior]++;
    }
    return steering.force;
  });

  agents.forEach((agent, index) => {
    integrate(agent, forces[index], dt);
    confineToArena(agent, config.arena);
    enforceInvariants(agent, config.arena, config.strictInvariants);
    if (config.adaptiveForce && agent.kind === agentKindKeywords.boid) {
      adaptMaxForce(agent, config);
    }
  });

  const { queries, candidateChecks } = hash.stats;
  return {
    frame: input.frame,
    agentCount: agents.length,
    neighborQueries: queries,
    collisionChecks: candidateChecks,
    checksAvoided: computeChecksAvoided(
      queries,
      agents.length,
      candidateChecks
    ),
    frameDurationMs: Math.max(0, input.now() - startedAt),
    behaviors,
  };
}
