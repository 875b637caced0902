import { statusKeywords } from "../vocabulary/keywords";
import type { SimulationStatus } from "../vocabulary/schemas/primitives";

/**
 * Engine lifecycle: idle -> running <-> paused, any live state -> stopped.
 * Stopped is terminal.
 */

export type LifecycleTransition = "start" | "pause" | "resume" | "stop";

const transitions: Record<
  SimulationStatus,
  Partial<Record<LifecycleTransition, SimulationStatus>>
> = {
  [statusKeywords.idle]: {
    start: statusKeywords.running,
    stop: statusKeywords.stopped,
  },
  [statusKeywords.running]: {
    pause: statusKeywords.paused,
    stop: statusKeywords.stopped,
  },
  [statusKeywords.paused]: {
    resume: statusKeywords.running,
    stop: statusKeywords.stopped,
  },
  [statusKeywords.stopped]: {},
};

/**
 * Status after a transition, or null when it is not allowed from here
 */
export function nextStatus(
  status: SimulationStatus,
  transition: LifecycleTransition
): SimulationStatus | null {
  return transitions[status][transition] ?? null;
}

export function canTransition(
  status: SimulationStatus,
  transition: LifecycleTransition
): boolean {
  return nextStatus(status, transition) !== null;
}
