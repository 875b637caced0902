import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { startStandardSystem } from "@/systems/standard";
import { makeConfig } from "../helpers";

describe("startStandardSystem", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("seeds the engine from the config", async () => {
    const config = makeConfig({ boidCount: 12, seed: "system-seed" });
    const first = await startStandardSystem({ config });
    const second = await startStandardSystem({ config });

    expect(first.system.randomness.getMasterSeed()).toBe("system-seed");
    expect(first.system.engine.getAgents()).toHaveLength(12);
    expect(second.system.engine.getAgents()).toEqual(
      first.system.engine.getAgents()
    );

    await first.halt();
    await second.halt();
  });

  it("feeds completed frames to the profiler and clock", async () => {
    const { system, halt } = await startStandardSystem({
      config: makeConfig({ boidCount: 5, speedMultiplier: 3 }),
    });
    const { engine, profiler, time } = system;

    engine.start();
    engine.step();
    engine.step();

    expect(profiler.getTotals().frames).toBe(2);
    expect(profiler.getState().lastFrame?.frame).toBe(2);
    expect(time.getFrame()).toBe(2);
    expect(time.now()).toBeCloseTo(100);

    profiler.disable();
    engine.step();
    expect(profiler.getTotals().frames).toBe(2);
    expect(time.getFrame()).toBe(3);

    profiler.enable();
    engine.step();
    expect(profiler.getTotals().frames).toBe(3);

    await halt();
  });

  it("places explicit agents instead of spawning", async () => {
    const { system, halt } = await startStandardSystem({
      config: makeConfig({ boidCount: 50 }),
      agents: [{ kind: "leader", position: { x: 10, y: 20 } }],
    });

    expect(system.engine.getAgents().map((agent) => agent.kind)).toEqual([
      "leader",
    ]);

    await halt();
  });

  it("stops the engine when halted", async () => {
    const { system, halt } = await startStandardSystem({ config: makeConfig() });
    system.engine.start();

    await halt();

    expect(system.engine.getStatus()).toBe("stopped");
  });
});
