import { z } from "zod";
import { commandKeywords } from "../keywords";
import { simulationConfigSchema } from "./config";

/**
 * Staged Commands - control requests the engine applies at the next
 * frame boundary, in the order they were staged
 *
 * Dependencies: config
 */

export const stagedCommandSchemas = {
  pause: z.object({
    type: z.literal(commandKeywords.pause),
  }),
  resume: z.object({
    type: z.literal(commandKeywords.resume),
  }),
  setSpeedMultiplier: z.object({
    type: z.literal(commandKeywords.setSpeedMultiplier),
    value: z.number().positive().max(10),
  }),
  setGridVisualization: z.object({
    type: z.literal(commandKeywords.setGridVisualization),
    enabled: z.boolean(),
  }),
  reconfigure: z.object({
    type: z.literal(commandKeywords.reconfigure),
    config: simulationConfigSchema, // Complete, already validated
  }),
};

export const stagedCommandSchema = z.discriminatedUnion("type", [
  stagedCommandSchemas.pause,
  stagedCommandSchemas.resume,
  stagedCommandSchemas.setSpeedMultiplier,
  stagedCommandSchemas.setGridVisualization,
  stagedCommandSchemas.reconfigure,
]);

export type StagedCommand = z.infer<typeof stagedCommandSchema>;
