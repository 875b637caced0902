import { z } from "zod";
import { effectKeywords } from "../keywords";
import { stagedCommandSchema } from "./commands";
import { runtimeStoreSchema } from "./state";

/**
 * Effect Schemas - side effects produced by event handlers
 *
 * Handlers stay pure and return effects; executors touch the store and
 * the engine.
 *
 * Dependencies: commands, state
 */

export const controlEffectSchemas = {
  // Merge into the runtime store
  configUpdate: z.object({
    type: z.literal(effectKeywords.config.update),
    state: runtimeStoreSchema.partial(),
  }),
  // Hand a command to the engine for the next frame boundary
  engineStage: z.object({
    type: z.literal(effectKeywords.engine.stage),
    command: stagedCommandSchema,
  }),
  engineStop: z.object({
    type: z.literal(effectKeywords.engine.stop),
  }),
  logWarning: z.object({
    type: z.literal(effectKeywords.log.warn),
    message: z.string(),
  }),
};

export const controlEffectSchema = z.discriminatedUnion("type", [
  controlEffectSchemas.configUpdate,
  controlEffectSchemas.engineStage,
  controlEffectSchemas.engineStop,
  controlEffectSchemas.logWarning,
]);

export type ControlEffect = z.infer<typeof controlEffectSchema>;
