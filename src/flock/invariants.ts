import * as vec from "./vector";
import { clampToArena, isInsideArena } from "./agent";
import { InvariantViolationError } from "./errors";
import type { Agent } from "./vocabulary/schemas/entities";
import type { Arena } from "./vocabulary/schemas/primitives";

// Slack for floating point when comparing speeds against their limit
export const SPEED_TOLERANCE = 1e-9;

/**
 * Keep an agent inside the arena. Axes that were clamped lose the velocity
 * component pointing out of the arena.
 */
export function confineToArena(agent: Agent, arena: Arena): void {
  const { x, y } = agent.position;
  if (isInsideArena(agent.position, arena)) return;

  agent.position = clampToArena(agent.position, arena);
  const { x: vx, y: vy } = agent.velocity;
  const leavingX = (x < arena.minX && vx < 0) || (x > arena.maxX && vx > 0);
  const leavingY = (y < arena.minY && vy < 0) || (y > arena.maxY && vy > 0);
  agent.velocity = { x: leavingX ? 0 : vx, y: leavingY ? 0 : vy };
}

/**
 * Check one agent after integration and the arena clamp.
 *
 * Strict mode throws on the first violation. Otherwise the agent is
 * corrected in place: non-finite velocity resets to zero, a non-finite
 * position to the arena center, overspeed is clamped.
 */
export function enforceInvariants(
  agent: Agent,
  arena: Arena,
  strict: boolean
): void {
  if (!vec.isFiniteVector(agent.position)) {
    if (strict) {
      throw new InvariantViolationError(agent.id, "position is not finite");
    }
    agent.position = {
      x: (arena.minX + arena.maxX) / 2,
      y: (arena.minY + arena.maxY) / 2,
    };
  }

  if (!vec.isFiniteVector(agent.velocity)) {
    if (strict) {
      throw new InvariantViolationError(agent.id, "velocity is not finite");
    }
    agent.velocity = { x: 0, y: 0 };
  }

  if (!isInsideArena(agent.position, arena)) {
    if (strict) {
      throw new InvariantViolationError(
        agent.id,
        `position (${agent.position.x}, ${agent.position.y}) is outside the arena`
      );
    }
    confineToArena(agent, arena);
  }

  const speed = vec.magnitude(agent.velocity);
  if (speed > agent.maxSpeed + SPEED_TOLERANCE) {
    if (strict) {
      throw new InvariantViolationError(
        agent.id,
        `speed ${speed} exceeds max speed ${agent.maxSpeed}`
      );
    }
    agent.velocity = vec.limit(agent.velocity, agent.maxSpeed);
  }
}
