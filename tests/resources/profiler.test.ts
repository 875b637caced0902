import { describe, expect, it } from "vitest";
import {
  createEmptyFrameMetrics,
  createMetricsAccumulator,
} from "@/flock/metrics";
import { formatSummary } from "@/resources/profiler";

describe("formatSummary", () => {
  it("boxes the totals with aligned labels", () => {
    const accumulator = createMetricsAccumulator();
    accumulator.record({
      ...createEmptyFrameMetrics(1),
      agentCount: 3,
      neighborQueries: 3,
      collisionChecks: 1,
      checksAvoided: 5,
      frameDurationMs: 20,
    });

    const lines = formatSummary(accumulator.getTotals()).split("\n");

    expect(lines).toEqual([
      "┌" + "─".repeat(25),
      "│ Flock Metrics",
      "├" + "─".repeat(25),
      "│ Frames            1",
      "│ Average FPS       50.0",
      "│ Agents            3",
      "│ Neighbor queries  3",
      "│ Collision checks  1",
      "│ Checks avoided    5",
      "│ Check reduction   83.3%",
      "│ Behaviors fired   none",
      "└" + "─".repeat(25),
    ]);
  });
});
