import { z } from "zod";
import { eventKeywords } from "../keywords";
import { simulationConfigSchema } from "./config";

/**
 * Event Schemas - control input handled by the runtime controller
 *
 * Dependencies: config
 */

export const controlEventSchemas = {
  pause: z.object({
    type: z.literal(eventKeywords.controls.paused),
  }),
  resume: z.object({
    type: z.literal(eventKeywords.controls.resumed),
  }),
  setSpeedMultiplier: z.object({
    type: z.literal(eventKeywords.controls.speedMultiplierChanged),
    value: z.number().positive().max(10),
  }),
  stepSpeed: z.object({
    type: z.literal(eventKeywords.controls.speedStepped),
    direction: z.enum(["up", "down"]), // +/- 0.1
  }),
  toggleGridVisualization: z.object({
    type: z.literal(eventKeywords.controls.gridVisualizationToggled),
  }),
  reconfigure: z.object({
    type: z.literal(eventKeywords.controls.reconfigured),
    config: simulationConfigSchema, // Resolved before dispatch
    presetId: z.string().nullable(),
  }),
};

export const simulationEventSchemas = {
  stop: z.object({
    type: z.literal(eventKeywords.simulation.stopped),
  }),
};

export const controlEventSchema = z.discriminatedUnion("type", [
  controlEventSchemas.pause,
  controlEventSchemas.resume,
  controlEventSchemas.setSpeedMultiplier,
  controlEventSchemas.stepSpeed,
  controlEventSchemas.toggleGridVisualization,
  controlEventSchemas.reconfigure,
]);

export const simulationEventSchema = z.discriminatedUnion("type", [
  simulationEventSchemas.stop,
]);

export const allEventSchema = z.union([
  controlEventSchema,
  simulationEventSchema,
]);

export type ControlEvent = z.infer<typeof controlEventSchema>;
export type SimulationEvent = z.infer<typeof simulationEventSchema>;
export type AllEvents = z.infer<typeof allEventSchema>;
