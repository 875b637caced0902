import { z } from "zod";
import {
  agentKindKeywords,
  behaviorKeywords,
  statusKeywords,
} from "../keywords";

/**
 * Primitive Schemas - Foundational types with zero dependencies
 *
 * No imports from other schema files - only from keywords.
 */

/**
 * Vector2 - 2D position, velocity or force
 */
export const vectorSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export type Vector2 = z.infer<typeof vectorSchema>;

/**
 * Axis-aligned arena rectangle. Agents must stay inside it.
 */
export const arenaSchema = z
  .object({
    minX: z.number(),
    minY: z.number(),
    maxX: z.number(),
    maxY: z.number(),
  })
  .refine((arena) => arena.maxX > arena.minX && arena.maxY > arena.minY, {
    message: "arena max bounds must be greater than min bounds",
  });

export type Arena = z.infer<typeof arenaSchema>;

/**
 * Agent Kind - closed set of agent variants
 */
export const agentKindSchema = z.enum([
  agentKindKeywords.boid,
  agentKindKeywords.predator,
  agentKindKeywords.obstacle,
  agentKindKeywords.leader,
]);

export type AgentKind = z.infer<typeof agentKindSchema>;

export const behaviorSchema = z.enum([
  behaviorKeywords.predatorEvasion,
  behaviorKeywords.obstacleAvoidance,
  behaviorKeywords.boundary,
  behaviorKeywords.separation,
  behaviorKeywords.predation,
  behaviorKeywords.leaderInfluence,
  behaviorKeywords.alignment,
  behaviorKeywords.cohesion,
]);

export type Behavior = z.infer<typeof behaviorSchema>;

export const allBehaviors: readonly Behavior[] = behaviorSchema.options;

export const simulationStatusSchema = z.enum([
  statusKeywords.idle,
  statusKeywords.running,
  statusKeywords.paused,
  statusKeywords.stopped,
]);

export type SimulationStatus = z.infer<typeof simulationStatusSchema>;
