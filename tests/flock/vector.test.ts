import { describe, expect, it } from "vitest";
import * as vec from "@/flock/vector";

describe("vector", () => {
  it("adds, subtracts and scales", () => {
    expect(vec.add({ x: 1, y: 2 }, { x: 3, y: -4 })).toEqual({ x: 4, y: -2 });
    expect(vec.subtract({ x: 1, y: 2 }, { x: 3, y: -4 })).toEqual({
      x: -2,
      y: 6,
    });
    expect(vec.multiply({ x: 1.5, y: -2 }, 2)).toEqual({ x: 3, y: -4 });
    expect(vec.dot({ x: 2, y: 3 }, { x: 4, y: -1 })).toBe(5);
  });

  it("divides by zero into the zero vector", () => {
    expect(vec.divide({ x: 3, y: 4 }, 0)).toEqual({ x: 0, y: 0 });
    expect(vec.divide({ x: 3, y: 4 }, 2)).toEqual({ x: 1.5, y: 2 });
  });

  it("normalizes without producing NaN", () => {
    expect(vec.normalize({ x: 0, y: 0 })).toEqual({ x: 0, y: 0 });
    expect(vec.normalize({ x: 3, y: 4 })).toEqual({ x: 0.6, y: 0.8 });
  });

  it("limits only vectors longer than the maximum", () => {
    expect(vec.limit({ x: 3, y: 4 }, 10)).toEqual({ x: 3, y: 4 });
    const limited = vec.limit({ x: 3, y: 4 }, 1);
    expect(limited.x).toBeCloseTo(0.6, 12);
    expect(limited.y).toBeCloseTo(0.8, 12);
    expect(vec.limit({ x: 3, y: 4 }, 0)).toEqual({ x: 0, y: 0 });
  });

  it("sets magnitude and measures distance", () => {
    const v = vec.setMagnitude({ x: 0, y: -2 }, 5);
    expect(v).toEqual({ x: 0, y: -5 });
    expect(vec.setMagnitude({ x: 0, y: 0 }, 5)).toEqual({ x: 0, y: 0 });
    expect(vec.distance({ x: 1, y: 1 }, { x: 4, y: 5 })).toBe(5);
    expect(vec.distanceSquared({ x: 1, y: 1 }, { x: 4, y: 5 })).toBe(25);
  });

  it("detects non-finite components", () => {
    expect(vec.isFiniteVector({ x: 1, y: 2 })).toBe(true);
    expect(vec.isFiniteVector({ x: NaN, y: 2 })).toBe(false);
    expect(vec.isFiniteVector({ x: 1, y: Infinity })).toBe(false);
  });
});
