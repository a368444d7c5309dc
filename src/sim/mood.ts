import type { GameState, Mood, Position } from "../shared/types.js";
import { OutcomeTag, TensionLevel } from "../shared/types.js";
import {
  TENSION_HIGH_HEALTH_RATIO, TENSION_MID_HEALTH_RATIO,
  TENSION_HIGH_DRONE_DISTANCE, TENSION_MID_DRONE_DISTANCE,
} from "../shared/constants.js";
import { manhattan } from "./actions.js";

export function nearestDroneDistance(state: Pick<GameState, "player" | "drones">, from: Position = state.player.pos): number | null {
  if (state.drones.length === 0) return null;
  return Math.min(...state.drones.map((d) => manhattan(from, d.pos)));
}

/**
 * Tension from health ratio and drone proximity:
 *   High: ratio ≤ 1/3 or nearest drone ≤ 1
 *   Mid: ratio ≤ 2/3 or nearest drone ≤ 2
 *   Low: otherwise
 */
export function tensionFor(health: number, maxHealth: number, nearest: number | null): TensionLevel {
  const ratio = maxHealth <= 0 ? 1 : Math.max(0, Math.min(1, health / maxHealth));
  const near = nearest ?? Number.POSITIVE_INFINITY;

  if (ratio <= TENSION_HIGH_HEALTH_RATIO || near <= TENSION_HIGH_DRONE_DISTANCE) {
    return TensionLevel.High;
  }
  if (ratio <= TENSION_MID_HEALTH_RATIO || near <= TENSION_MID_DRONE_DISTANCE) {
    return TensionLevel.Mid;
  }
  return TensionLevel.Low;
}

/**
 * Classify the state for narration. Pure: reads the state, touches nothing.
 * The event mirrors the last turn's tag; plain moves carry no event.
 */
export function classify(state: GameState): Mood {
  const nearestDrone = nearestDroneDistance(state);
  const tension = tensionFor(state.player.health, state.player.maxHealth, nearestDrone);
  const last = state.lastOutcome;
  const event = last !== undefined && last !== OutcomeTag.Moved ? last : undefined;
  return { tension, event, nearestDrone };
}
