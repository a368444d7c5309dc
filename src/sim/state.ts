import type { DifficultyConfig, Drone, GameState, Grid } from "../shared/types.js";
import { CellKind } from "../shared/types.js";
import { validateDifficulty } from "../shared/config.js";
import { InvalidConfigurationError } from "../shared/errors.js";
import { exitOf, findCells, generate, startOf } from "./procgen.js";
import type { Rng } from "./rng.js";

/**
 * Build the initial state for a run from a generated grid.
 *
 * Drone cells are lifted into the drone roster and cleared, so during play
 * drones exist only as entities. The grid is copied; the caller's grid is
 * left untouched.
 */
export function createGameState(config: DifficultyConfig, layout: Grid): GameState {
  const valid = validateDifficulty(config);
  if (layout.length !== valid.height || layout.some((row) => row.length !== valid.width)) {
    throw new InvalidConfigurationError(
      `Grid does not match ${valid.width}x${valid.height}`,
    );
  }

  const grid = layout.map((row) => [...row]);
  const drones: Drone[] = findCells(grid, CellKind.Drone).map((pos, i) => {
    grid[pos.y][pos.x] = CellKind.Empty;
    return { id: `drone_${i + 1}`, pos, frozenTurns: 0 };
  });

  const start = startOf();
  if (grid[start.y][start.x] === CellKind.Wall) {
    throw new InvalidConfigurationError("Start cell is a wall");
  }

  return {
    config: valid,
    turn: 0,
    width: valid.width,
    height: valid.height,
    grid,
    start,
    exit: exitOf(valid),
    player: {
      pos: { ...start },
      health: Math.min(valid.startHealth, valid.maxHealth),
      maxHealth: valid.maxHealth,
    },
    drones,
    logs: [],
    gameOver: false,
    victory: false,
  };
}

/** Generate a layout and place the player on it in one go. */
export function newRun(config: DifficultyConfig, rng: Rng): GameState {
  return createGameState(config, generate(config, rng));
}
