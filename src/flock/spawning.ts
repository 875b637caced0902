import * as vec from "./vector";
import { createAgent } from "./agent";
import type { AgentSpec } from "./agent";
import { agentKindKeywords } from "./vocabulary/keywords";
import type { Agent } from "./vocabulary/schemas/entities";
import type { SimulationConfig } from "./vocabulary/schemas/config";
import type { AgentKind } from "./vocabulary/schemas/primitives";
import type { DomainRNG } from "@/lib/seededRandom";

/**
 * Population spawning and resizing
 *
 * Ids come from the caller so that every engine keeps its own sequence.
 */

export type IdSource = () => number;

export const spawnOrder: readonly AgentKind[] = [
  agentKindKeywords.obstacle,
  agentKindKeywords.leader,
  agentKindKeywords.boid,
  agentKindKeywords.predator,
];

export function getTargetCount(
  kind: AgentKind,
  config: SimulationConfig
): number {
  switch (kind) {
    case agentKindKeywords.boid:
      return config.boidCount;
    case agentKindKeywords.predator:
      return config.predatorCount;
    case agentKindKeywords.obstacle:
      return config.obstacleCount;
    case agentKindKeywords.leader:
      return config.leaderCount;
  }
}

/**
 * Random placement inside the arena (outside the boundary margin when it
 * leaves room). Movers start with a heading and a speed between 1 and
 * maxSpeed; obstacles get a radius from obstacleRadiusRange.
 */
export function randomSpec(
  kind: AgentKind,
  config: SimulationConfig,
  rng: DomainRNG
): AgentSpec {
  const { arena } = config;
  const width = arena.maxX - arena.minX;
  const height = arena.maxY - arena.minY;
  const inset = Math.min(config.boundaryMargin, width / 4, height / 4);
  const position = {
    x: rng.range(arena.minX + inset, arena.maxX - inset),
    y: rng.range(arena.minY + inset, arena.maxY - inset),
  };

  if (kind === agentKindKeywords.obstacle) {
    const { min, max } = config.obstacleRadiusRange;
    return { kind, position, radius: rng.range(min, max) };
  }

  const speedLimit =
    kind === agentKindKeywords.predator
      ? config.maxSpeed * config.predatorSpeedFactor
      : config.maxSpeed;
  const speed = rng.range(Math.min(1, speedLimit), speedLimit);
  return {
    kind,
    position,
    velocity: vec.multiply(rng.direction(), speed),
  };
}

export function spawnAgents(
  kind: AgentKind,
  count: number,
  config: SimulationConfig,
  rng: DomainRNG,
  nextId: IdSource
): Agent[] {
  const agents: Agent[] = [];
  for (let i = 0; i < count; i++) {
    agents.push(createAgent(nextId(), randomSpec(kind, config, rng), config));
  }
  return agents;
}

/**
 * Initial population for every kind, in spawn order
 */
export function spawnPopulation(
  config: SimulationConfig,
  rng: DomainRNG,
  nextId: IdSource
): Agent[] {
  return spawnOrder.flatMap((kind) =>
    spawnAgents(kind, getTargetCount(kind, config), config, rng, nextId)
  );
}

/**
 * Grow or shrink each kind to the config's counts. Surplus agents of a kind
 * are removed highest id first; missing ones are spawned. Survivors pick up
 * the new motion limits. The result stays ordered by id.
 */
export function adjustPopulation(
  agents: readonly Agent[],
  config: SimulationConfig,
  rng: DomainRNG,
  nextId: IdSource
): Agent[] {
  const kept: Agent[] = [];
  const added: Agent[] = [];

  for (const kind of spawnOrder) {
    const ofKind = agents
      .filter((agent) => agent.kind === kind)
      .sort((a, b) => a.id - b.id);
    const target = getTargetCount(kind, config);

    for (const agent of ofKind.slice(0, target)) {
      const refreshed = createAgent(agent.id, agent, config);
      kept.push(refreshed);
    }
    if (ofKind.length < target) {
      added.push(
        ...spawnAgents(kind, target - ofKind.length, config, rng, nextId)
      );
    }
  }

  return [...kept, ...added].sort((a, b) => a.id - b.id);
}
