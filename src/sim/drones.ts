import type { Drone, Grid, Position } from "../shared/types.js";
import { isPassable, neighbors, samePos } from "./actions.js";
import { pickOne } from "./rng.js";
import type { Rng } from "./rng.js";

/**
 * Advance every drone one step, in list order.
 *
 * A frozen drone burns one frozen turn and stays put. A free drone picks
 * uniformly among in-bounds, non-wall neighbours that no other drone holds.
 * Occupancy is checked against the positions already decided this turn for
 * earlier drones and the current positions of later ones. No candidate
 * means the drone stays.
 *
 * Returns new drone records; the input is not mutated.
 */
export function advanceDrones(drones: readonly Drone[], grid: Grid, rng: Rng): Drone[] {
  const occupied: Position[] = drones.map((d) => d.pos);
  const result: Drone[] = [];

  drones.forEach((drone, i) => {
    if (drone.frozenTurns > 0) {
      result.push({ ...drone, frozenTurns: drone.frozenTurns - 1 });
      return;
    }

    const candidates: Position[] = [];
    for (const next of neighbors(grid, drone.pos)) {
      if (!isPassable(grid, next)) continue;
      if (occupied.some((p, j) => j !== i && samePos(p, next))) continue;
      candidates.push(next);
    }

    const pos = pickOne(rng, candidates) ?? drone.pos;
    occupied[i] = pos;
    result.push({ ...drone, pos });
  });

  return result;
}

/** Freeze every drone for `turns` turns (helper jam). */
export function freezeDrones(drones: readonly Drone[], turns: number): Drone[] {
  return drones.map((d) => ({ ...d, frozenTurns: turns }));
}
