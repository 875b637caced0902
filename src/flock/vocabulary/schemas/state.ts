import { z } from "zod";
import { agentSchema } from "./entities";
import { simulationConfigSchema } from "./config";
import { behaviorSchema, simulationStatusSchema } from "./primitives";

/**
 * State Schemas - what readers of the engine get to see
 *
 * Dependencies: primitives, entities, config
 */

export const frameMetricsSchema = z.object({
  frame: z.number().int().nonnegative(),
  agentCount: z.number().int().nonnegative(),
  neighborQueries: z.number().int().nonnegative(),
  collisionChecks: z.number().int().nonnegative(),
  checksAvoided: z.number().int().nonnegative(),
  frameDurationMs: z.number().nonnegative(),
  behaviors: z.record(behaviorSchema, z.number().int().nonnegative()),
});

export const gridOccupancySchema = z.object({
  cellSize: z.number().positive(),
  cells: z.array(
    z.object({
      col: z.number().int(),
      row: z.number().int(),
      count: z.number().int().positive(),
    })
  ),
});

export type GridOccupancy = z.infer<typeof gridOccupancySchema>;

/**
 * Frame Snapshot - deep copy emitted after every completed frame
 */
export const frameSnapshotSchema = z.object({
  frame: z.number().int().nonnegative(),
  status: simulationStatusSchema,
  simulatedTimeMs: z.number().nonnegative(), // Nominal frames * 1000 / fpsTarget
  agents: z.array(agentSchema),
  metrics: frameMetricsSchema,
  grid: gridOccupancySchema.nullable(), // Only while visualizeGrid is on
});

/**
 * Runtime store - the controller's view of the live configuration
 */
export const runtimeStoreSchema = z.object({
  config: simulationConfigSchema,
  presetId: z.string().nullable(),
});

export type RuntimeStore = z.infer<typeof runtimeStoreSchema>;
