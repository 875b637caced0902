import { z } from "zod";
import { agentKindSchema, vectorSchema } from "./primitives";

/**
 * Entity Schemas - Agents that live in the arena
 *
 * Dependencies: primitives
 */

// ============================================
// Agent Schema
// ============================================

/**
 * Agent - one participant of the flock
 *
 * Obstacles share the record: their velocity stays at zero and their
 * speed/force limits are zero, so integration never moves them.
 */
export const agentSchema = z.object({
  id: z.number().int().positive(), // Stable for the agent's lifetime, unique per engine
  kind: agentKindSchema,
  position: vectorSchema,
  velocity: vectorSchema,
  radius: z.number().positive(), // Body radius (obstacles: avoidance core)
  maxSpeed: z.number().nonnegative(),
  maxForce: z.number().nonnegative(),
});

export type Agent = z.infer<typeof agentSchema>;

/**
 * Read-only view handed to rules and renderers
 */
export type AgentView = Readonly<
  Omit<Agent, "position" | "velocity"> & {
    position: Readonly<Agent["position"]>;
    velocity: Readonly<Agent["velocity"]>;
  }
>;
