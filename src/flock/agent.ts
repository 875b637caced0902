import * as vec from "./vector";
import { agentKindKeywords } from "./vocabulary/keywords";
import type { Agent, AgentView } from "./vocabulary/schemas/entities";
import type { SimulationConfig } from "./vocabulary/schemas/config";
import type {
  AgentKind,
  Arena,
  Vector2,
} from "./vocabulary/schemas/primitives";

/**
 * Agent primitives - construction, integration and arena helpers
 *
 * Everything here is pure apart from integrate(), which mutates only the
 * agent it is given.
 */

export type AgentSpec = {
  kind: AgentKind;
  position: Vector2;
  velocity?: Vector2;
  radius?: number;
};

/**
 * Motion limits for a kind under the given config
 */
export function getMotionLimits(
  kind: AgentKind,
  config: SimulationConfig
): { maxSpeed: number; maxForce: number } {
  switch (kind) {
    case agentKindKeywords.obstacle:
      return { maxSpeed: 0, maxForce: 0 };
    case agentKindKeywords.predator:
      return {
        maxSpeed: config.maxSpeed * config.predatorSpeedFactor,
        maxForce: config.maxForce * config.predatorForceFactor,
      };
    case agentKindKeywords.boid:
    case agentKindKeywords.leader:
      return { maxSpeed: config.maxSpeed, maxForce: config.maxForce };
  }
}

function getDefaultRadius(kind: AgentKind, config: SimulationConfig): number {
  switch (kind) {
    case agentKindKeywords.obstacle:
      return config.obstacleRadiusRange.min;
    case agentKindKeywords.boid:
    case agentKindKeywords.predator:
    case agentKindKeywords.leader:
      return config.agentRadius[kind];
  }
}

/**
 * Build an agent with the limits its kind gets under the config.
 * Initial velocity is clamped to the kind's max speed; obstacles start at rest.
 */
export function createAgent(
  id: number,
  spec: AgentSpec,
  config: SimulationConfig
): Agent {
  const limits = getMotionLimits(spec.kind, config);
  const velocity =
    spec.kind === agentKindKeywords.obstacle || !spec.velocity
      ? { x: 0, y: 0 }
      : vec.limit(spec.velocity, limits.maxSpeed);

  return {
    id,
    kind: spec.kind,
    position: { x: spec.position.x, y: spec.position.y },
    velocity,
    radius: spec.radius ?? getDefaultRadius(spec.kind, config),
    maxSpeed: limits.maxSpeed,
    maxForce: limits.maxForce,
  };
}

export function isObstacle(agent: AgentView): boolean {
  return agent.kind === agentKindKeywords.obstacle;
}

/**
 * Boids and leaders flock together
 */
export function isFlockMember(agent: AgentView): boolean {
  return (
    agent.kind === agentKindKeywords.boid ||
    agent.kind === agentKindKeywords.leader
  );
}

/**
 * Apply a steering force for dt frames.
 *
 * Force is clamped to maxForce, velocity to maxSpeed, then the position
 * advances by velocity * dt. Returns the force that was actually applied.
 */
export function integrate(agent: Agent, force: Vector2, dt: number): Vector2 {
  if (agent.kind === agentKindKeywords.obstacle) {
    agent.velocity = { x: 0, y: 0 };
    return { x: 0, y: 0 };
  }

  const applied = vec.limit(force, agent.maxForce);
  const velocity = vec.limit(
    vec.add(agent.velocity, vec.multiply(applied, dt)),
    agent.maxSpeed
  );

  agent.velocity = velocity;
  agent.position = vec.add(agent.position, vec.multiply(velocity, dt));
  return applied;
}

// Per-frame change of an adapting boid's maxForce
export const ADAPTIVE_FORCE_RATE = 0.05;

/**
 * Adaptive force: a boid below half its max speed steers harder next frame,
 * a faster one eases off. Stays within half and double the configured
 * maxForce.
 */
export function adaptMaxForce(agent: Agent, config: SimulationConfig): void {
  const speed = vec.magnitude(agent.velocity);
  const factor =
    speed < agent.maxSpeed * 0.5
      ? 1 + ADAPTIVE_FORCE_RATE
      : 1 - ADAPTIVE_FORCE_RATE;
  agent.maxForce = Math.min(
    config.maxForce * 2,
    Math.max(config.maxForce * 0.5, agent.maxForce * factor)
  );
}

export function isInsideArena(position: Vector2, arena: Arena): boolean {
  return (
    position.x >= arena.minX &&
    position.x <= arena.maxX &&
    position.y >= arena.minY &&
    position.y <= arena.maxY
  );
}

export function clampToArena(position: Vector2, arena: Arena): Vector2 {
  return {
    x: Math.min(arena.maxX, Math.max(arena.minX, position.x)),
    y: Math.min(arena.maxY, Math.max(arena.minY, position.y)),
  };
}

export function copyAgent(agent: AgentView): Agent {
  return {
    id: agent.id,
    kind: agent.kind,
    position: { x: agent.position.x, y: agent.position.y },
    velocity: { x: agent.velocity.x, y: agent.velocity.y },
    radius: agent.radius,
    maxSpeed: agent.maxSpeed,
    maxForce: agent.maxForce,
  };
}
