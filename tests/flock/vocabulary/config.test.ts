import { describe, expect, it } from "vitest";
import { ConfigurationError } from "@/flock/errors";
import {
  defaultSimulationConfig,
  parseSimulationConfig,
  parseSimulationConfigPatch,
  resolveSimulationConfig,
} from "@/flock/vocabulary/schemas/config";

describe("parseSimulationConfig", () => {
  it("accepts the defaults", () => {
    expect(parseSimulationConfig(defaultSimulationConfig)).toEqual(
      defaultSimulationConfig
    );
  });

  it("lists every missing or invalid field", () => {
    const { maxSpeed: _maxSpeed, ...missing } = defaultSimulationConfig;

    expect(() =>
      parseSimulationConfig({ ...missing, gridCellSize: 0 })
    ).toThrow(ConfigurationError);

    try {
      parseSimulationConfig({ ...missing, gridCellSize: 0 });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toMatch(/^maxSpeed: /);
        expect(error.issues[1]).toMatch(/^gridCellSize: /);
      }
    }
  });

  it("rejects an inverted obstacle radius range", () => {
    expect(() =>
      parseSimulationConfig({
        ...defaultSimulationConfig,
        obstacleRadiusRange: { min: 30, max: 10 },
      })
    ).toThrow("obstacleRadiusRange.min must not exceed obstacleRadiusRange.max");
  });
});

describe("resolveSimulationConfig", () => {
  it("merges nested groups key by key", () => {
    const config = resolveSimulationConfig({
      boidCount: 12,
      weights: { separation: 4 },
      agentRadius: { predator: 9 },
    });

    expect(config.boidCount).toBe(12);
    expect(config.weights).toEqual({
      ...defaultSimulationConfig.weights,
      separation: 4,
    });
    expect(config.agentRadius).toEqual({ boid: 5, predator: 9, leader: 6 });
  });

  it("builds on the given base", () => {
    const base = resolveSimulationConfig({ seed: "base-seed" });
    expect(resolveSimulationConfig({ maxSpeed: 2 }, base)).toMatchObject({
      seed: "base-seed",
      maxSpeed: 2,
    });
  });

  it("validates the merged result", () => {
    expect(() => resolveSimulationConfig({ speedMultiplier: 12 })).toThrow(
      ConfigurationError
    );
    expect(() => resolveSimulationConfig({ boidCount: 1.5 })).toThrow(
      ConfigurationError
    );
  });

  it("rejects unknown keys", () => {
    expect(() => parseSimulationConfigPatch({ boids: 10 })).toThrow(
      ConfigurationError
    );
    expect(() => resolveSimulationConfig("not a config")).toThrow(
      "Invalid simulation config patch"
    );
  });
});
