import { z } from "zod";
import { ConfigurationError } from "../../errors";
import { arenaSchema } from "./primitives";

/**
 * Config Schemas - Parameters that govern one simulation
 *
 * A config is validated once when it is built (startup or reconfiguration)
 * and never mutated while a frame runs.
 *
 * Dependencies: primitives
 */

// ============================================
// Nested Parameter Groups
// ============================================

/**
 * Behavior weights - multiply each steering term before it claims
 * its share of the force budget
 */
export const behaviorWeightsSchema = z.object({
  separation: z.number().nonnegative(),
  alignment: z.number().nonnegative(),
  cohesion: z.number().nonnegative(),
  obstacleAvoidance: z.number().nonnegative(),
  predatorEvasion: z.number().nonnegative(),
  predation: z.number().nonnegative(),
  leaderInfluence: z.number().nonnegative(),
  boundary: z.number().nonnegative(),
});

export type BehaviorWeights = z.infer<typeof behaviorWeightsSchema>;

export const agentRadiusSchema = z.object({
  boid: z.number().positive(),
  predator: z.number().positive(),
  leader: z.number().positive(),
});

export const radiusRangeSchema = z.object({
  min: z.number().positive(),
  max: z.number().positive(),
});

// ============================================
// Simulation Config Schema
// ============================================

export const simulationConfigSchema = z
  .object({
    // Populations
    boidCount: z.number().int().nonnegative(),
    predatorCount: z.number().int().nonnegative(),
    obstacleCount: z.number().int().nonnegative(),
    leaderCount: z.number().int().nonnegative(),

    // Motion limits (predators scale these by their factors)
    maxSpeed: z.number().positive(),
    maxForce: z.number().positive(),
    predatorSpeedFactor: z.number().positive(),
    predatorForceFactor: z.number().positive(),

    // Spatial index
    gridCellSize: z.number().positive(),
    visualizeGrid: z.boolean(), // Consumed by the renderer only

    // Time
    speedMultiplier: z.number().positive().max(10),
    fpsTarget: z.number().int().positive(),

    // World
    arena: arenaSchema,
    boundaryMargin: z.number().nonnegative(),

    // Perception radii
    neighborRadius: z.number().positive(), // Alignment + cohesion
    separationRadius: z.number().positive(),
    predatorAvoidRadius: z.number().positive(), // Boids/leaders sense predators
    obstacleAvoidRadius: z.number().positive(), // Added to the obstacle radius
    huntRadius: z.number().positive(), // Predators sense prey
    leaderInfluenceRadius: z.number().positive(),

    // Behavior tuning
    weights: behaviorWeightsSchema,
    leaderCohesionBoost: z.number().positive(),

    // Bodies
    agentRadius: agentRadiusSchema,
    obstacleRadiusRange: radiusRangeSchema,

    // Reproducibility and diagnostics
    seed: z.string().min(1),
    strictInvariants: z.boolean(), // Debug builds: invariant violations throw
    adaptiveForce: z.boolean(), // Boids tune their own maxForce to their speed
  })
  .refine(
    (config) => config.obstacleRadiusRange.min <= config.obstacleRadiusRange.max,
    {
      message: "obstacleRadiusRange.min must not exceed obstacleRadiusRange.max",
      path: ["obstacleRadiusRange"],
    }
  );

export type SimulationConfig = z.infer<typeof simulationConfigSchema>;

/**
 * Partial config used by config files, presets and live reconfiguration.
 * Nested groups may be given partially; the arena is replaced as a whole.
 */
export const simulationConfigPatchSchema = z
  .object({
    boidCount: z.number(),
    predatorCount: z.number(),
    obstacleCount: z.number(),
    leaderCount: z.number(),
    maxSpeed: z.number(),
    maxForce: z.number(),
    predatorSpeedFactor: z.number(),
    predatorForceFactor: z.number(),
    gridCellSize: z.number(),
    visualizeGrid: z.boolean(),
    speedMultiplier: z.number(),
    fpsTarget: z.number(),
    arena: z.object({
      minX: z.number(),
      minY: z.number(),
      maxX: z.number(),
      maxY: z.number(),
    }),
    boundaryMargin: z.number(),
    neighborRadius: z.number(),
    separationRadius: z.number(),
    predatorAvoidRadius: z.number(),
    obstacleAvoidRadius: z.number(),
    huntRadius: z.number(),
    leaderInfluenceRadius: z.number(),
    weights: behaviorWeightsSchema.partial(),
    leaderCohesionBoost: z.number(),
    agentRadius: agentRadiusSchema.partial(),
    obstacleRadiusRange: radiusRangeSchema.partial(),
    seed: z.string(),
    strictInvariants: z.boolean(),
    adaptiveForce: z.boolean(),
  })
  .partial()
  .strict();

export type SimulationConfigPatch = z.infer<typeof simulationConfigPatchSchema>;

// ============================================
// Defaults
// ============================================

export const defaultSimulationConfig: SimulationConfig = {
  boidCount: 160,
  predatorCount: 10,
  obstacleCount: 20,
  leaderCount: 10,
  maxSpeed: 4,
  maxForce: 0.1,
  predatorSpeedFactor: 1.2,
  predatorForceFactor: 1.5,
  gridCellSize: 80,
  visualizeGrid: false,
  speedMultiplier: 1,
  fpsTarget: 60,
  arena: { minX: 0, minY: 0, maxX: 1200, maxY: 800 },
  boundaryMargin: 50,
  neighborRadius: 50,
  separationRadius: 20,
  predatorAvoidRadius: 80,
  obstacleAvoidRadius: 40,
  huntRadius: 120,
  leaderInfluenceRadius: 120,
  weights: {
    separation: 1.5,
    alignment: 1,
    cohesion: 1,
    obstacleAvoidance: 2,
    predatorEvasion: 3,
    predation: 1,
    leaderInfluence: 1.5,
    boundary: 1,
  },
  leaderCohesionBoost: 1.5,
  agentRadius: { boid: 5, predator: 7, leader: 6 },
  obstacleRadiusRange: { min: 10, max: 20 },
  seed: "flock-42",
  strictInvariants: false,
  adaptiveForce: false,
};

// ============================================
// Parsing
// ============================================

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a complete config. Missing or invalid fields throw a
 * ConfigurationError listing every issue; nothing is clamped.
 */
export function parseSimulationConfig(input: unknown): SimulationConfig {
  const result = simulationConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid simulation config",
      formatIssues(result.error)
    );
  }
  return result.data;
}

/**
 * Validate the shape of a partial config without applying it.
 */
export function parseSimulationConfigPatch(
  input: unknown
): SimulationConfigPatch {
  const result = simulationConfigPatchSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      "Invalid simulation config patch",
      formatIssues(result.error)
    );
  }
  return result.data;
}

/**
 * Overlay a patch on a base config. Nested groups merge key by key.
 */
export function mergeSimulationConfig(
  base: SimulationConfig,
  patch: SimulationConfigPatch
): SimulationConfig {
  return {
    ...base,
    ...patch,
    arena: patch.arena ?? base.arena,
    weights: { ...base.weights, ...patch.weights },
    agentRadius: { ...base.agentRadius, ...patch.agentRadius },
    obstacleRadiusRange: {
      ...base.obstacleRadiusRange,
      ...patch.obstacleRadiusRange,
    },
  };
}

/**
 * Build a config from a partial one: validate the patch, lay it over the
 * base (defaults unless given) and validate the result.
 */
export function resolveSimulationConfig(
  patch: unknown,
  base: SimulationConfig = defaultSimulationConfig
): SimulationConfig {
  const parsedPatch = parseSimulationConfigPatch(patch);
  return parseSimulationConfig(mergeSimulationConfig(base, parsedPatch));
}
