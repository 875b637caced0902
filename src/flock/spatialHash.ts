import type { AgentView } from "./vocabulary/schemas/entities";
import type { Vector2 } from "./vocabulary/schemas/primitives";

export type CellCoordinate = {
  col: number;
  row: number;
};

type Cell = CellCoordinate & {
  agents: AgentView[];
};

export type QueryStats = {
  queries: number; // radius queries issued since the last reset
  candidateChecks: number; // distance checks performed on cell candidates
};

export type SpatialHash = {
  cellSize: number;
  cells: Map<string, Cell>;
  size: number; // agents inserted by the last rebuild
  stats: QueryStats;
};

/**
 * Create an empty spatial hash grid for radius-bounded neighbor queries.
 * The grid is unbounded: cells exist wherever agents are, including outside
 * the arena.
 */
export function createSpatialHash(cellSize: number): SpatialHash {
  if (!(cellSize > 0) || !Number.isFinite(cellSize)) {
    throw new RangeError(`Cell size must be a positive number, got ${cellSize}`);
  }
  return {
    cellSize,
    cells: new Map(),
    size: 0,
    stats: { queries: 0, candidateChecks: 0 },
  };
}

function getCellKey(col: number, row: number): string {
  return `${col},${row}`;
}

/**
 * Cell containing a position. Points on a cell edge belong to the cell
 * whose lower edge they lie on.
 */
export function getCellOf(hash: SpatialHash, position: Vector2): CellCoordinate {
  return {
    col: Math.floor(position.x / hash.cellSize),
    row: Math.floor(position.y / hash.cellSize),
  };
}

/**
 * Clear every cell and insert all agents at their current positions.
 * Call once per frame before querying neighbors.
 */
export function rebuildSpatialHash(
  hash: SpatialHash,
  agents: readonly AgentView[]
): void {
  hash.cells.clear();
  hash.size = 0;

  for (const agent of agents) {
    const { col, row } = getCellOf(hash, agent.position);
    const key = getCellKey(col, row);
    const cell = hash.cells.get(key);
    if (cell) {
      cell.agents.push(agent);
    } else {
      hash.cells.set(key, { col, row, agents: [agent] });
    }
    hash.size++;
  }
}

/**
 * Ids of all agents within radius (inclusive) of a point, ascending.
 *
 * Considers every cell within ceil(radius / cellSize) of the point's cell
 * on both axes, so neighbors across cell edges are never missed. When that
 * window holds more cells than are occupied, the occupied cells are walked
 * instead.
 *
 * @param excludeId - agent to leave out (usually the querying agent)
 */
export function queryRadius(
  hash: SpatialHash,
  point: Vector2,
  radius: number,
  excludeId?: number
): number[] {
  return queryAgentsInRadius(hash, point, radius, excludeId).map(
    (agent) => agent.id
  );
}

/**
 * Same contract as queryRadius, returning the agents themselves
 */
export function queryAgentsInRadius(
  hash: SpatialHash,
  point: Vector2,
  radius: number,
  excludeId?: number
): AgentView[] {
  hash.stats.queries++;
  if (!(radius >= 0)) return [];

  const { col, row } = getCellOf(hash, point);
  const reach = Math.ceil(radius / hash.cellSize);
  const radiusSq = radius * radius;
  const found: AgentView[] = [];
  let checks = 0;

  const scanCell = (cell: Cell) => {
    for (const agent of cell.agents) {
      if (agent.id === excludeId) continue;
      checks++;
      const dx = agent.position.x - point.x;
      const dy = agent.position.y - point.y;
      if (dx * dx + dy * dy <= radiusSq) {
        found.push(agent);
      }
    }
  };

  const span = 2 * reach + 1;
  if (!Number.isFinite(reach) || span * span > hash.cells.size) {
    // Window larger than the occupied set: walk the occupied cells instead
    for (const cell of hash.cells.values()) {
      if (Math.abs(cell.col - col) > reach) continue;
      if (Math.abs(cell.row - row) > reach) continue;
      scanCell(cell);
    }
  } else {
    for (let dc = -reach; dc <= reach; dc++) {
      for (let dr = -reach; dr <= reach; dr++) {
        const cell = hash.cells.get(getCellKey(col + dc, row + dr));
        if (cell) scanCell(cell);
      }
    }
  }

  hash.stats.candidateChecks += checks;
  found.sort((a, b) => a.id - b.id);
  return found;
}

/**
 * Ids stored in one cell, in insertion order
 */
export function getCellContents(
  hash: SpatialHash,
  cell: CellCoordinate
): number[] {
  const entry = hash.cells.get(getCellKey(cell.col, cell.row));
  return entry ? entry.agents.map((agent) => agent.id) : [];
}

/**
 * Non-empty cells with their occupancy, ordered by row then column
 */
export function getOccupiedCells(
  hash: SpatialHash
): Array<CellCoordinate & { count: number }> {
  const cells: Array<CellCoordinate & { count: number }> = [];
  for (const cell of hash.cells.values()) {
    cells.push({ col: cell.col, row: cell.row, count: cell.agents.length });
  }
  return cells.sort((a, b) => a.row - b.row || a.col - b.col);
}

export function getQueryStats(hash: SpatialHash): QueryStats {
  return { ...hash.stats };
}

export function resetQueryStats(hash: SpatialHash): void {
  hash.stats.queries = 0;
  hash.stats.candidateChecks = 0;
}
