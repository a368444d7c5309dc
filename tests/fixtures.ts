import type { DifficultyConfig, GameState, Grid, Position } from "../src/shared/types.js";
import { CellKind } from "../src/shared/types.js";
import { createGameState } from "../src/sim/state.js";
import type { Rng } from "../src/sim/rng.js";

/** Rng that replays fixed draws and fails loudly when it runs dry. */
export function scriptedRng(values: number[]): Rng & { remaining(): number } {
  let i = 0;
  return {
    getUniform() {
      if (i >= values.length) throw new Error(`scriptedRng exhausted after ${values.length} draws`);
      return values[i++];
    },
    remaining() {
      return values.length - i;
    },
  };
}

export function constantRng(value: number): Rng {
  return { getUniform: () => value };
}

export function testConfig(width: number, height: number, overrides: Partial<DifficultyConfig> = {}): DifficultyConfig {
  return {
    key: "test",
    name: "Test",
    blurb: "",
    width,
    height,
    startHealth: 4,
    maxHealth: 5,
    wallCount: 0,
    trapCount: 0,
    medkitCount: 0,
    droneCount: 0,
    helperCount: 0,
    helperFreezeTurns: 2,
    ...overrides,
  };
}

const CHAR_KINDS: Record<string, CellKind> = {
  ".": CellKind.Empty,
  " ": CellKind.Empty,
  "P": CellKind.Empty,
  "#": CellKind.Wall,
  "^": CellKind.Trap,
  "+": CellKind.Medkit,
  "E": CellKind.Exit,
  "D": CellKind.Drone,
  "H": CellKind.Helper,
};

export function gridFromRows(rows: string[]): Grid {
  return rows.map((row) =>
    [...row].map((ch) => {
      const kind = CHAR_KINDS[ch];
      if (kind === undefined) throw new Error(`Unknown cell char "${ch}"`);
      return kind;
    }),
  );
}

/**
 * Build a state from an ASCII layout. "P" marks the player, "D" drones
 * (numbered in row-major order).
 */
export function stateFromRows(
  rows: string[],
  opts: { health?: number; config?: Partial<DifficultyConfig> } = {},
): GameState {
  const grid = gridFromRows(rows);
  const config = testConfig(grid[0].length, grid.length, opts.config);
  const state = createGameState(config, grid);

  let pos: Position = { ...state.start };
  rows.forEach((row, y) => {
    const x = row.indexOf("P");
    if (x >= 0) pos = { x, y };
  });

  return {
    ...state,
    player: { ...state.player, pos, health: opts.health ?? state.player.health },
  };
}
