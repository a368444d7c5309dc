import type { DifficultyConfig, Grid, Position } from "../shared/types.js";
import { CellKind } from "../shared/types.js";
import { MAX_GENERATION_ATTEMPTS } from "../shared/constants.js";
import { UnsolvableLayoutError } from "../shared/errors.js";
import { validateDifficulty } from "../shared/config.js";
import { isPassable, neighbors, samePos } from "./actions.js";
import { randomIndex } from "./rng.js";
import type { Rng } from "./rng.js";

/** Start is always the top-left corner. */
export function startOf(): Position {
  return { x: 0, y: 0 };
}

export function exitOf(config: Pick<DifficultyConfig, "width" | "height">): Position {
  return { x: config.width - 1, y: config.height - 1 };
}

/**
 * Breadth-first search over non-wall cells. Traps, medkits, helpers and
 * drones do not block.
 */
export function isReachable(grid: Grid, from: Position, to: Position): boolean {
  if (!isPassable(grid, from) || !isPassable(grid, to)) return false;

  const visited = new Set<string>([`${from.x},${from.y}`]);
  const queue: Position[] = [from];

  for (let head = 0; head < queue.length; head++) {
    const curr = queue[head];
    if (samePos(curr, to)) return true;

    for (const next of neighbors(grid, curr)) {
      const key = `${next.x},${next.y}`;
      if (visited.has(key)) continue;
      if (!isPassable(grid, next)) continue;
      visited.add(key);
      queue.push(next);
    }
  }
  return false;
}

export function findCells(grid: Grid, kind: CellKind): Position[] {
  const result: Position[] = [];
  for (let y = 0; y < grid.length; y++) {
    for (let x = 0; x < grid[y].length; x++) {
      if (grid[y][x] === kind) result.push({ x, y });
    }
  }
  return result;
}

/**
 * One placement pass: every feature lands on a distinct free cell,
 * start and exit excluded.
 */
function placeFeatures(config: DifficultyConfig, rng: Rng): Grid {
  const grid: Grid = [];
  for (let y = 0; y < config.height; y++) {
    grid.push(new Array<CellKind>(config.width).fill(CellKind.Empty));
  }
  const start = startOf();
  const exit = exitOf(config);
  grid[exit.y][exit.x] = CellKind.Exit;

  const free: Position[] = [];
  for (let y = 0; y < config.height; y++) {
    for (let x = 0; x < config.width; x++) {
      const pos = { x, y };
      if (samePos(pos, start) || samePos(pos, exit)) continue;
      free.push(pos);
    }
  }

  const take = (kind: CellKind, n: number, avoid: readonly Position[] = []): void => {
    for (let i = 0; i < n; i++) {
      const allowed: number[] = [];
      free.forEach((pos, idx) => {
        if (!avoid.some((a) => samePos(a, pos))) allowed.push(idx);
      });
      // Swap-remove keeps the draw uniform over what is left
      const idx = allowed.length > 0
        ? allowed[randomIndex(rng, allowed.length)]
        : randomIndex(rng, free.length);
      const pos = free[idx];
      free[idx] = free[free.length - 1];
      free.pop();
      grid[pos.y][pos.x] = kind;
    }
  };

  take(CellKind.Wall, config.wallCount);
  take(CellKind.Trap, config.trapCount);
  // Medkits stay off the cells next to start and exit while any other cell is free
  take(CellKind.Medkit, config.medkitCount, [...neighbors(grid, start), ...neighbors(grid, exit)]);
  take(CellKind.Helper, config.helperCount);
  take(CellKind.Drone, config.droneCount);

  return grid;
}

/**
 * Generate a vault layout for a difficulty.
 *
 * Re-rolls the whole placement until the exit is reachable from the start,
 * up to MAX_GENERATION_ATTEMPTS times.
 *
 * @throws InvalidConfigurationError when the counts cannot fit the grid
 * @throws UnsolvableLayoutError when every attempt walls off the exit
 */
export function generate(config: DifficultyConfig, rng: Rng, maxAttempts = MAX_GENERATION_ATTEMPTS): Grid {
  const valid = validateDifficulty(config);
  const start = startOf();
  const exit = exitOf(valid);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const grid = placeFeatures(valid, rng);
    if (isReachable(grid, start, exit)) return grid;
  }
  throw new UnsolvableLayoutError(maxAttempts);
}
