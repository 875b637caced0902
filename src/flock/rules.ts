import * as vec from "./vector";
import { isFlockMember } from "./agent";
import { agentKindKeywords } from "./vocabulary/keywords";
import type { AgentView } from "./vocabulary/schemas/entities";
import type { SimulationConfig } from "./vocabulary/schemas/config";
import type { Arena, Vector2 } from "./vocabulary/schemas/primitives";

/**
 * Steering rules
 *
 * Every rule returns either a steering term (desired - velocity, limited)
 * or null when nothing in range triggered it. A null term counts as "not
 * fired" for the frame metrics; a zero vector still counts as fired.
 *
 * Neighbors arrive sorted by ascending id, which the tie-breaks rely on.
 */

// Repulsion weight used when an agent is inside an obstacle's body
const INSIDE_OBSTACLE_WEIGHT = 1000;

/**
 * Steer toward desired velocity, limited to maxForce * forceScale
 */
function steerTowards(
  agent: AgentView,
  desired: Vector2,
  forceScale = 1
): Vector2 {
  const steer = vec.subtract(desired, agent.velocity);
  return vec.limit(steer, agent.maxForce * forceScale);
}

/**
 * Seek: steer toward a target point at full speed.
 * Already at the target means no steering.
 */
export function seek(agent: AgentView, target: Vector2): Vector2 {
  const offset = vec.subtract(target, agent.position);
  if (vec.magnitudeSquared(offset) === 0) {
    return { x: 0, y: 0 };
  }
  return steerTowards(agent, vec.setMagnitude(offset, agent.maxSpeed));
}

/**
 * Boids and leaders keep apart from each other; predators only from predators
 */
function isCompatible(agent: AgentView, other: AgentView): boolean {
  if (isFlockMember(agent)) return isFlockMember(other);
  return agent.kind === other.kind;
}

/**
 * Separation: steer away from crowding compatible neighbors
 * Each neighbor contributes (self - other) / d², so closer ones push harder.
 */
export function separation(
  agent: AgentView,
  neighbors: readonly AgentView[],
  config: SimulationConfig
): Vector2 | null {
  const push: Vector2 = { x: 0, y: 0 };
  let total = 0;

  for (const other of neighbors) {
    if (!isCompatible(agent, other)) continue;
    const dist = vec.distance(agent.position, other.position);
    if (dist > 0 && dist < config.separationRadius) {
      const diff = vec.divide(
        vec.subtract(agent.position, other.position),
        dist * dist
      );
      push.x += diff.x;
      push.y += diff.y;
      total++;
    }
  }

  if (total === 0) return null;
  return steerTowards(agent, vec.setMagnitude(push, agent.maxSpeed));
}

/**
 * Alignment: steer toward the average heading of nearby flockmates
 */
export function alignment(
  agent: AgentView,
  neighbors: readonly AgentView[],
  config: SimulationConfig
): Vector2 | null {
  const sum: Vector2 = { x: 0, y: 0 };
  let total = 0;

  for (const other of neighbors) {
    if (!isFlockMember(other)) continue;
    const dist = vec.distance(agent.position, other.position);
    if (dist > 0 && dist < config.neighborRadius) {
      sum.x += other.velocity.x;
      sum.y += other.velocity.y;
      total++;
    }
  }

  if (total === 0) return null;
  const avg = vec.divide(sum, total);
  if (vec.magnitudeSquared(avg) === 0) return null;
  return steerTowards(agent, vec.setMagnitude(avg, agent.maxSpeed));
}

/**
 * Cohesion: seek the centroid of nearby flockmates
 */
export function cohesion(
  agent: AgentView,
  neighbors: readonly AgentView[],
  config: SimulationConfig
): Vector2 | null {
  const sum: Vector2 = { x: 0, y: 0 };
  let total = 0;

  for (const other of neighbors) {
    if (!isFlockMember(other)) continue;
    const dist = vec.distance(agent.position, other.position);
    if (dist > 0 && dist < config.neighborRadius) {
      sum.x += other.position.x;
      sum.y += other.position.y;
      total++;
    }
  }

  if (total === 0) return null;
  return seek(agent, vec.divide(sum, total));
}

/**
 * Obstacle avoidance: repulsion from every obstacle whose avoidance zone
 * (obstacleAvoidRadius past its surface) contains the agent.
 * Weight grows with 1 / distanceFromSurface²; inside the body it is fixed.
 */
export function avoidObstacles(
  agent: AgentView,
  neighbors: readonly AgentView[],
  config: SimulationConfig
): Vector2 | null {
  const push: Vector2 = { x: 0, y: 0 };
  let total = 0;

  for (const obstacle of neighbors) {
    if (obstacle.kind !== agentKindKeywords.obstacle) continue;
    const dist = vec.distance(agent.position, obstacle.position);
    if (dist > config.obstacleAvoidRadius + obstacle.radius) continue;

    const fromSurface = dist - obstacle.radius;
    const weight =
      fromSurface > 0
        ? 1 / (fromSurface * fromSurface)
        : INSIDE_OBSTACLE_WEIGHT;
    const away = vec.normalize(vec.subtract(agent.position, obstacle.position));
    push.x += away.x * weight;
    push.y += away.y * weight;
    total++;
  }

  if (total === 0) return null;
  if (vec.magnitudeSquared(push) === 0) return { x: 0, y: 0 };
  return steerTowards(agent, vec.setMagnitude(push, agent.maxSpeed), 2);
}

/**
 * Predator evasion: flee every predator inside predatorAvoidRadius at
 * double speed. Closer predators weigh more (1/d).
 */
export function evadePredators(
  agent: AgentView,
  neighbors: readonly AgentView[],
  config: SimulationConfig
): Vector2 | null {
  const flee: Vector2 = { x: 0, y: 0 };
  let total = 0;

  for (const predator of neighbors) {
    if (predator.kind !== agentKindKeywords.predator) continue;
    const dist = vec.distance(agent.position, predator.position);
    if (dist > 0 && dist < config.predatorAvoidRadius) {
      const diff = vec.divide(
        vec.subtract(agent.position, predator.position),
        dist * dist
      );
      flee.x += diff.x;
      flee.y += diff.y;
      total++;
    }
  }

  if (total === 0) return null;
  return steerTowards(agent, vec.setMagnitude(flee, agent.maxSpeed * 2), 3);
}

/**
 * Nearest boid or leader within huntRadius. Equal distances go to the
 * lowest id.
 */
export function findPrey(
  predator: AgentView,
  neighbors: readonly AgentView[],
  config: SimulationConfig
): AgentView | null {
  let nearest: AgentView | null = null;
  let nearestDist = Infinity;

  for (const other of neighbors) {
    if (!isFlockMember(other)) continue;
    const dist = vec.distance(predator.position, other.position);
    if (dist > config.huntRadius) continue;
    const closer =
      dist < nearestDist ||
      (dist === nearestDist && nearest !== null && other.id < nearest.id);
    if (closer) {
      nearest = other;
      nearestDist = dist;
    }
  }

  return nearest;
}

/**
 * Predation: seek the nearest prey
 */
export function pursuePrey(
  predator: AgentView,
  neighbors: readonly AgentView[],
  config: SimulationConfig
): Vector2 | null {
  const prey = findPrey(predator, neighbors, config);
  if (!prey) return null;
  return seek(predator, prey.position);
}

/**
 * Leader influence: boids near leaders seek their centroid and match
 * their average velocity, in equal parts.
 */
export function followLeaders(
  agent: AgentView,
  neighbors: readonly AgentView[],
  config: SimulationConfig
): Vector2 | null {
  const positions: Vector2 = { x: 0, y: 0 };
  const velocities: Vector2 = { x: 0, y: 0 };
  let total = 0;

  for (const leader of neighbors) {
    if (leader.kind !== agentKindKeywords.leader) continue;
    const dist = vec.distance(agent.position, leader.position);
    if (dist <= config.leaderInfluenceRadius) {
      positions.x += leader.position.x;
      positions.y += leader.position.y;
      velocities.x += leader.velocity.x;
      velocities.y += leader.velocity.y;
      total++;
    }
  }

  if (total === 0) return null;

  const toward = seek(agent, vec.divide(positions, total));
  const avgVelocity = vec.divide(velocities, total);
  const match =
    vec.magnitudeSquared(avgVelocity) === 0
      ? { x: 0, y: 0 }
      : steerTowards(agent, vec.setMagnitude(avgVelocity, agent.maxSpeed));

  return vec.limit(vec.multiply(vec.add(toward, match), 0.5), agent.maxForce);
}

/**
 * How deep a coordinate sits in the margin: 0 at the margin, 1 at or past
 * the edge. A zero margin only reacts at the edge itself.
 */
function edgeProximity(distanceToEdge: number, margin: number): number {
  if (margin <= 0) return distanceToEdge <= 0 ? 1 : 0;
  return Math.min(1, Math.max(0, (margin - distanceToEdge) / margin));
}

/**
 * Boundary containment: inward push near the arena walls
 */
export function containWithinArena(
  agent: AgentView,
  arena: Arena,
  margin: number
): Vector2 | null {
  const { x, y } = agent.position;
  const push = {
    x:
      edgeProximity(x - arena.minX, margin) -
      edgeProximity(arena.maxX - x, margin),
    y:
      edgeProximity(y - arena.minY, margin) -
      edgeProximity(arena.maxY - y, margin),
  };

  if (push.x === 0 && push.y === 0) return null;
  return vec.multiply(push, agent.maxForce);
}
