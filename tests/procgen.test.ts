import { describe, it, expect } from "vitest";
import { generate, isReachable, findCells, exitOf, startOf } from "../src/sim/procgen.js";
import { createRng } from "../src/sim/rng.js";
import { DIFFICULTY_ORDER, DIFFICULTY_SETTINGS, MAX_GENERATION_ATTEMPTS } from "../src/shared/constants.js";
import { InvalidConfigurationError, UnsolvableLayoutError } from "../src/shared/errors.js";
import { CellKind } from "../src/shared/types.js";
import { gridFromRows, testConfig } from "./fixtures.js";

describe("generate", () => {
  for (const key of DIFFICULTY_ORDER) {
    const config = DIFFICULTY_SETTINGS[key];

    it(`${key}: places exact counts on a solvable grid across seeds`, () => {
      for (let seed = 1; seed <= 40; seed++) {
        const grid = generate(config, createRng(seed));
        const exit = exitOf(config);

        expect(grid).toHaveLength(config.height);
        expect(grid.every((row) => row.length === config.width)).toBe(true);
        expect(grid[0][0]).toBe(CellKind.Empty);
        expect(grid[exit.y][exit.x]).toBe(CellKind.Exit);
        expect(findCells(grid, CellKind.Wall)).toHaveLength(config.wallCount);
        expect(findCells(grid, CellKind.Trap)).toHaveLength(config.trapCount);
        expect(findCells(grid, CellKind.Medkit)).toHaveLength(config.medkitCount);
        expect(findCells(grid, CellKind.Helper)).toHaveLength(config.helperCount);
        expect(findCells(grid, CellKind.Drone)).toHaveLength(config.droneCount);
        expect(isReachable(grid, startOf(), exit)).toBe(true);
      }
    });
  }

  it("keeps medkits off the cells next to start and exit", () => {
    for (const key of DIFFICULTY_ORDER) {
      const config = DIFFICULTY_SETTINGS[key];
      const exit = exitOf(config);
      for (let seed = 1; seed <= 40; seed++) {
        const grid = generate(config, createRng(seed));
        const nearEnds = [{ x: 1, y: 0 }, { x: 0, y: 1 }, { x: exit.x - 1, y: exit.y }, { x: exit.x, y: exit.y - 1 }];
        for (const pos of nearEnds) {
          expect(grid[pos.y][pos.x], `${key} seed ${seed} at (${pos.x},${pos.y})`).not.toBe(CellKind.Medkit);
        }
      }
    }
  });

  it("medkits fill the cells away from start and exit first", () => {
    // 3x3: the only cells not touching start or exit are (2,0), (1,1), (0,2)
    const config = testConfig(3, 3, { medkitCount: 3 });
    for (let seed = 1; seed <= 10; seed++) {
      expect(findCells(generate(config, createRng(seed)), CellKind.Medkit))
        .toEqual([{ x: 2, y: 0 }, { x: 1, y: 1 }, { x: 0, y: 2 }]);
    }
  });

  it("medkits fall back to any free cell when the others run out", () => {
    const config = testConfig(3, 3, { medkitCount: 7 });
    expect(findCells(generate(config, createRng(8)), CellKind.Medkit)).toHaveLength(7);
  });

  it("same seed, same grid", () => {
    const config = DIFFICULTY_SETTINGS.hard;
    expect(generate(config, createRng(1234))).toEqual(generate(config, createRng(1234)));
  });

  it("rejects counts that cannot fit the free cells", () => {
    // 3x3 has 7 free cells once start and exit are reserved
    const config = testConfig(3, 3, { wallCount: 5, trapCount: 3 });
    expect(() => generate(config, createRng(1))).toThrow(InvalidConfigurationError);
  });

  it("rejects start health above max", () => {
    const config = testConfig(3, 3, { startHealth: 6, maxHealth: 5 });
    expect(() => generate(config, createRng(1))).toThrow(/startHealth: startHealth 6 exceeds maxHealth 5/);
  });

  it("gives up with UnsolvableLayoutError when every attempt is blocked", () => {
    // every free cell walled: the exit can never be reached
    const config = testConfig(3, 3, { wallCount: 7 });
    let caught: unknown;
    try {
      generate(config, createRng(5));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(UnsolvableLayoutError);
    if (caught instanceof UnsolvableLayoutError) {
      expect(caught.attempts).toBe(MAX_GENERATION_ATTEMPTS);
      expect(caught.message).toBe("Unable to create a solvable layout after 50 attempts");
      expect(caught.code).toBe("unsolvable_layout");
    }
  });

  it("honours a custom attempt limit", () => {
    const config = testConfig(3, 3, { wallCount: 7 });
    expect(() => generate(config, createRng(5), 3)).toThrow("after 3 attempts");
  });
});

describe("isReachable", () => {
  it("walks around walls", () => {
    const grid = gridFromRows([
      ".#.",
      ".#.",
      "...",
    ]);
    expect(isReachable(grid, { x: 0, y: 0 }, { x: 2, y: 0 })).toBe(true);
  });

  it("is blocked by a full wall line", () => {
    const grid = gridFromRows([
      ".#.",
      ".#.",
      ".#.",
    ]);
    expect(isReachable(grid, { x: 0, y: 0 }, { x: 2, y: 2 })).toBe(false);
  });

  it("treats traps, medkits, helpers and drones as open", () => {
    const grid = gridFromRows([
      "^+H",
      "##D",
      "..E",
    ]);
    expect(isReachable(grid, { x: 0, y: 0 }, { x: 2, y: 2 })).toBe(true);
  });

  it("a wall endpoint is never reachable", () => {
    const grid = gridFromRows(["..", ".#"]);
    expect(isReachable(grid, { x: 0, y: 0 }, { x: 1, y: 1 })).toBe(false);
  });
});
