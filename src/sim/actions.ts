import type { Grid, Position } from "../shared/types.js";
import { CellKind, Direction } from "../shared/types.js";

const DIRECTION_DELTAS: Record<Direction, Position> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

/** Fixed neighbour order; drone choices depend on it. */
export const ORTHOGONAL: readonly Position[] = [
  DIRECTION_DELTAS.up,
  DIRECTION_DELTAS.down,
  DIRECTION_DELTAS.left,
  DIRECTION_DELTAS.right,
];

const ALL_DIRECTIONS = new Set<string>(Object.values(Direction));

export function isDirection(value: unknown): value is Direction {
  return typeof value === "string" && ALL_DIRECTIONS.has(value);
}

export function getDirectionDelta(dir: Direction): Position {
  return DIRECTION_DELTAS[dir];
}

export function inBounds(grid: Grid, pos: Position): boolean {
  return pos.y >= 0 && pos.y < grid.length && pos.x >= 0 && pos.x < grid[pos.y].length;
}

export function isPassable(grid: Grid, pos: Position): boolean {
  return inBounds(grid, pos) && grid[pos.y][pos.x] !== CellKind.Wall;
}

/** In-bounds orthogonal neighbours, in ORTHOGONAL order. */
export function neighbors(grid: Grid, pos: Position): Position[] {
  const result: Position[] = [];
  for (const d of ORTHOGONAL) {
    const next = { x: pos.x + d.x, y: pos.y + d.y };
    if (inBounds(grid, next)) result.push(next);
  }
  return result;
}

export function samePos(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function manhattan(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}
