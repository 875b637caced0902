import { defineResource } from "braided";
import { createMetricsAccumulator } from "../flock/metrics";
import type { FrameMetrics, MetricsTotals } from "../flock/metrics";

// ============================================================================
// Types
// ============================================================================

export type ProfilerState = {
  enabled: boolean;
  lastFrame: FrameMetrics | null;
};

// ============================================================================
// Pure Functions
// ============================================================================

/**
 * Render totals as a boxed summary for the console
 */
export function formatSummary(totals: MetricsTotals): string {
  const rows: Array<[string, string]> = [
    ["Frames", String(totals.frames)],
    ["Average FPS", totals.averageFps.toFixed(1)],
    ["Agents", String(totals.lastAgentCount)],
    ["Neighbor queries", String(totals.neighborQueries)],
    ["Collision checks", String(totals.collisionChecks)],
    ["Checks avoided", String(totals.checksAvoided)],
    ["Check reduction", `${(totals.checkReduction * 100).toFixed(1)}%`],
    ["Behaviors fired", totals.behaviorsFired.join(", ") || "none"],
  ];

  const labelWidth = Math.max(...rows.map(([label]) => label.length));
  const lines = rows.map(
    ([label, value]) => `│ ${label.padEnd(labelWidth)}  ${value}`
  );
  const width = Math.max(...lines.map((line) => line.length)) + 1;

  return [
    `┌${"─".repeat(width - 1)}`,
    "│ Flock Metrics",
    `├${"─".repeat(width - 1)}`,
    ...lines,
    `└${"─".repeat(width - 1)}`,
  ].join("\n");
}

// ============================================================================
// Resource
// ============================================================================

export type Profiler = {
  enable: () => void;
  disable: () => void;
  recordFrame: (metrics: FrameMetrics) => void;
  getState: () => ProfilerState;
  getTotals: () => MetricsTotals;
  printSummary: () => void;
};

/**
 * Profiler Resource - aggregates the engine's frame metrics
 *
 * Enabled by default. Disabling stops recording without clearing totals.
 */
export const profiler = defineResource({
  start: (): Profiler => {
    const accumulator = createMetricsAccumulator();
    let state: ProfilerState = {
      enabled: true,
      lastFrame: null,
    };

    return {
      enable: () => {
        state = { ...state, enabled: true };
      },
      disable: () => {
        state = { ...state, enabled: false };
      },

      recordFrame: (metrics) => {
        if (!state.enabled) return;
        accumulator.record(metrics);
        state = { ...state, lastFrame: metrics };
      },

      getState: () => state,
      getTotals: () => accumulator.getTotals(),

      printSummary: () => {
        console.log(formatSummary(accumulator.getTotals()));
      },
    };
  },
  halt: () => {},
});
