import { describe, expect, it } from "vitest";
import {
  createSpatialHash,
  getCellContents,
  getCellOf,
  getOccupiedCells,
  getQueryStats,
  queryRadius,
  rebuildSpatialHash,
  resetQueryStats,
} from "@/flock/spatialHash";
import type { AgentSpec } from "@/flock/agent";
import type { Agent } from "@/flock/vocabulary/schemas/entities";
import { makeAgents, makeRng } from "../helpers";

function boidsAt(points: Array<[number, number]>): Agent[] {
  return makeAgents(
    points.map(([x, y]): AgentSpec => ({ kind: "boid", position: { x, y } }))
  );
}

function bruteForce(
  agents: Agent[],
  point: { x: number; y: number },
  radius: number,
  excludeId?: number
): number[] {
  return agents
    .filter((agent) => agent.id !== excludeId)
    .filter((agent) => {
      const dx = agent.position.x - point.x;
      const dy = agent.position.y - point.y;
      return dx * dx + dy * dy <= radius * radius;
    })
    .map((agent) => agent.id)
    .sort((a, b) => a - b);
}

describe("createSpatialHash", () => {
  it("rejects non-positive cell sizes", () => {
    expect(() => createSpatialHash(0)).toThrow(RangeError);
    expect(() => createSpatialHash(-5)).toThrow(RangeError);
    expect(() => createSpatialHash(Number.NaN)).toThrow(RangeError);
  });
});

describe("rebuildSpatialHash", () => {
  it("puts every agent in exactly the cell containing it", () => {
    const rng = makeRng("rebuild");
    const points: Array<[number, number]> = [];
    for (let i = 0; i < 200; i++) {
      points.push([rng.range(-300, 300), rng.range(-300, 300)]);
    }
    const agents = boidsAt(points);
    const hash = createSpatialHash(37);
    rebuildSpatialHash(hash, agents);

    for (const agent of agents) {
      const cell = getCellOf(hash, agent.position);
      expect(cell.col).toBe(Math.floor(agent.position.x / 37));
      expect(cell.row).toBe(Math.floor(agent.position.y / 37));
      const contents = getCellContents(hash, cell);
      expect(contents.filter((id) => id === agent.id)).toHaveLength(1);
    }

    const total = getOccupiedCells(hash).reduce(
      (sum, cell) => sum + cell.count,
      0
    );
    expect(total).toBe(agents.length);
    expect(hash.size).toBe(agents.length);
  });

  it("assigns points on a cell edge to the cell floor gives", () => {
    const hash = createSpatialHash(10);
    expect(getCellOf(hash, { x: 10, y: 0 })).toEqual({ col: 1, row: 0 });
    expect(getCellOf(hash, { x: -0.5, y: -10 })).toEqual({ col: -1, row: -1 });
  });

  it("drops agents from the previous rebuild", () => {
    const hash = createSpatialHash(10);
    rebuildSpatialHash(hash, boidsAt([[5, 5]]));
    rebuildSpatialHash(hash, boidsAt([[25, 25]]));
    expect(getCellContents(hash, { col: 0, row: 0 })).toEqual([]);
    expect(getCellContents(hash, { col: 2, row: 2 })).toEqual([1]);
  });
});

describe("queryRadius", () => {
  it("matches a brute-force scan for random placements", () => {
    const rng = makeRng("query-property");

    for (let trial = 0; trial < 40; trial++) {
      const cellSize = rng.range(1, 60);
      const points: Array<[number, number]> = [];
      const count = rng.intRange(0, 80);
      for (let i = 0; i < count; i++) {
        points.push([rng.range(-200, 200), rng.range(-200, 200)]);
      }
      const agents = boidsAt(points);
      const hash = createSpatialHash(cellSize);
      rebuildSpatialHash(hash, agents);

      const point = { x: rng.range(-250, 250), y: rng.range(-250, 250) };
      const radius = rng.range(0, 120);
      const excludeId = count > 0 ? rng.intRange(1, count + 1) : undefined;

      expect(queryRadius(hash, point, radius, excludeId)).toEqual(
        bruteForce(agents, point, radius, excludeId)
      );
    }
  });

  it("finds a neighbor just across a cell edge", () => {
    const agents = boidsAt([
      [9.9, 0],
      [10.1, 0],
    ]);
    const hash = createSpatialHash(10);
    rebuildSpatialHash(hash, agents);

    expect(queryRadius(hash, { x: 9.9, y: 0 }, 1, 1)).toEqual([2]);
    expect(queryRadius(hash, { x: 9.9, y: 0 }, 1)).toEqual([1, 2]);
  });

  it("includes agents exactly at the radius", () => {
    const hash = createSpatialHash(4);
    rebuildSpatialHash(hash, boidsAt([[3, 4]]));
    expect(queryRadius(hash, { x: 0, y: 0 }, 5)).toEqual([1]);
  });

  it("returns nothing for a negative radius", () => {
    const hash = createSpatialHash(10);
    rebuildSpatialHash(hash, boidsAt([[0, 0]]));
    expect(queryRadius(hash, { x: 0, y: 0 }, -1)).toEqual([]);
  });

  it("accepts query points outside any occupied area", () => {
    const hash = createSpatialHash(10);
    rebuildSpatialHash(hash, boidsAt([[0, 0]]));
    expect(queryRadius(hash, { x: -1e6, y: 1e6 }, 50)).toEqual([]);
  });

  it("returns every agent for an infinite radius", () => {
    const hash = createSpatialHash(10);
    rebuildSpatialHash(
      hash,
      boidsAt([
        [0, 0],
        [-5000, 7000],
      ])
    );
    expect(queryRadius(hash, { x: 0, y: 0 }, Infinity)).toEqual([1, 2]);
    expect(queryRadius(hash, { x: 0, y: 0 }, Infinity, 1)).toEqual([2]);
  });

  it("only checks occupied cells when the radius dwarfs the populated area", () => {
    const hash = createSpatialHash(1);
    rebuildSpatialHash(
      hash,
      boidsAt([
        [0, 0],
        [2000, 0],
        [4000, 0],
      ])
    );

    expect(queryRadius(hash, { x: 0, y: 0 }, 3000)).toEqual([1, 2]);
    // Three occupied cells, one agent each; (4000, 0) is out of reach
    expect(getQueryStats(hash)).toEqual({ queries: 1, candidateChecks: 2 });
  });

  it("counts queries and candidate checks until reset", () => {
    const agents = boidsAt([
      [1, 1],
      [2, 2],
      [95, 95],
    ]);
    const hash = createSpatialHash(10);
    rebuildSpatialHash(hash, agents);

    queryRadius(hash, { x: 1, y: 1 }, 5, 1);
    queryRadius(hash, { x: 2, y: 2 }, 5, 2);

    // Each query scans cells (-1..1, -1..1) and sees one other agent
    expect(getQueryStats(hash)).toEqual({ queries: 2, candidateChecks: 2 });

    resetQueryStats(hash);
    expect(getQueryStats(hash)).toEqual({ queries: 0, candidateChecks: 0 });
  });
});
