import { describe, expect, it } from "vitest";
import {
  adaptMaxForce,
  clampToArena,
  createAgent,
  getMotionLimits,
  integrate,
  isInsideArena,
} from "@/flock/agent";
import { magnitude } from "@/flock/vector";
import { makeConfig } from "../helpers";

describe("createAgent", () => {
  const config = makeConfig();

  it("gives predators scaled motion limits", () => {
    expect(getMotionLimits("predator", config)).toEqual({
      maxSpeed: 4 * 1.2,
      maxForce: 0.1 * 1.5,
    });
    expect(getMotionLimits("obstacle", config)).toEqual({
      maxSpeed: 0,
      maxForce: 0,
    });
  });

  it("clamps the initial velocity and defaults the radius", () => {
    const boid = createAgent(
      1,
      { kind: "boid", position: { x: 10, y: 10 }, velocity: { x: 30, y: 40 } },
      config
    );
    expect(magnitude(boid.velocity)).toBeCloseTo(4, 12);
    expect(boid.radius).toBe(5);
  });

  it("keeps obstacles at rest", () => {
    const obstacle = createAgent(
      7,
      { kind: "obstacle", position: { x: 0, y: 0 }, velocity: { x: 1, y: 1 } },
      config
    );
    expect(obstacle.velocity).toEqual({ x: 0, y: 0 });
    expect(obstacle.maxSpeed).toBe(0);
    expect(obstacle.radius).toBe(config.obstacleRadiusRange.min);
  });
});

describe("integrate", () => {
  const config = makeConfig();

  it("clamps force, then velocity, then moves by velocity * dt", () => {
    const boid = createAgent(
      1,
      { kind: "boid", position: { x: 0, y: 0 }, velocity: { x: 3.95, y: 0 } },
      config
    );
    const applied = integrate(boid, { x: 5, y: 0 }, 1);

    expect(applied).toEqual({ x: 0.1, y: 0 });
    expect(boid.velocity).toEqual({ x: 4, y: 0 });
    expect(boid.position).toEqual({ x: 4, y: 0 });
  });

  it("scales the step by dt", () => {
    const boid = createAgent(
      1,
      { kind: "boid", position: { x: 0, y: 0 }, velocity: { x: 1, y: 0 } },
      config
    );
    integrate(boid, { x: 0, y: 0 }, 2.5);
    expect(boid.position).toEqual({ x: 2.5, y: 0 });
  });

  it("never moves obstacles", () => {
    const obstacle = createAgent(
      1,
      { kind: "obstacle", position: { x: 5, y: 5 } },
      config
    );
    expect(integrate(obstacle, { x: 1, y: 1 }, 1)).toEqual({ x: 0, y: 0 });
    expect(obstacle.position).toEqual({ x: 5, y: 5 });
  });
});

describe("adaptMaxForce", () => {
  const config = makeConfig();

  it("raises the limit for a slow boid and lowers it for a fast one", () => {
    const slow = createAgent(
      1,
      { kind: "boid", position: { x: 0, y: 0 }, velocity: { x: 1, y: 0 } },
      config
    );
    const fast = createAgent(
      2,
      { kind: "boid", position: { x: 0, y: 0 }, velocity: { x: 0, y: 2 } },
      config
    );

    adaptMaxForce(slow, config);
    adaptMaxForce(fast, config);

    expect(slow.maxForce).toBeCloseTo(0.105);
    expect(fast.maxForce).toBeCloseTo(0.095);
  });

  it("stays within half and double the configured limit", () => {
    const slow = createAgent(1, { kind: "boid", position: { x: 0, y: 0 } }, config);
    const fast = createAgent(
      2,
      { kind: "boid", position: { x: 0, y: 0 }, velocity: { x: 4, y: 0 } },
      config
    );

    for (let i = 0; i < 100; i++) {
      adaptMaxForce(slow, config);
      adaptMaxForce(fast, config);
    }

    expect(slow.maxForce).toBe(0.2);
    expect(fast.maxForce).toBe(0.05);
  });
});

describe("arena helpers", () => {
  const arena = { minX: 0, minY: 0, maxX: 100, maxY: 50 };

  it("treats the edges as inside", () => {
    expect(isInsideArena({ x: 0, y: 50 }, arena)).toBe(true);
    expect(isInsideArena({ x: -0.1, y: 10 }, arena)).toBe(false);
  });

  it("clamps each axis independently", () => {
    expect(clampToArena({ x: -5, y: 70 }, arena)).toEqual({ x: 0, y: 50 });
  });
});
