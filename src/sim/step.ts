import type { Direction, Drone, GameState, Grid, LogEntry, Position, TurnOutcome, TurnResult } from "../shared/types.js";
import { CellKind, OutcomeTag } from "../shared/types.js";
import { ContractViolationError } from "../shared/errors.js";
import { getDirectionDelta, isDirection, isPassable, samePos } from "./actions.js";
import { advanceDrones, freezeDrones } from "./drones.js";
import type { Rng } from "./rng.js";

export function isTerminal(tag: OutcomeTag): boolean {
  return tag === OutcomeTag.Victory || tag === OutcomeTag.Defeat;
}

function clampHealth(health: number, maxHealth: number): number {
  return Math.max(0, Math.min(maxHealth, health));
}

function systemLog(turn: number, kind: string, text: string): LogEntry {
  return { id: `log_${kind}_${turn}`, turn, source: "system", text };
}

/** Copy-on-write: clone the grid and clear one consumed cell. */
function consumeCell(grid: Grid, pos: Position): Grid {
  const next = grid.map((row) => [...row]);
  next[pos.y][pos.x] = CellKind.Empty;
  return next;
}

/**
 * Resolve one turn.
 *
 * Order is fixed: player move (or bump), cell effect, drone motion, catch
 * check, health check, turn counter. Drone motion and the catch check are
 * skipped once the player stands on the exit. The input state is never
 * mutated; the returned state replaces it.
 *
 * @throws ContractViolationError for a non-direction or a finished run
 */
export function step(state: GameState, direction: Direction, rng: Rng): TurnResult {
  if (!isDirection(direction)) {
    throw new ContractViolationError(`Not a direction: ${String(direction)}`);
  }
  if (state.gameOver) {
    throw new ContractViolationError(`Run already ended on turn ${state.turn}`);
  }

  const turn = state.turn + 1;
  const from = state.player.pos;
  const maxHealth = state.player.maxHealth;
  const healthBefore = state.player.health;
  const logs = [...state.logs];

  let grid = state.grid;
  let drones: Drone[] = state.drones;
  let pos = from;
  let health = healthBefore;
  let cell: CellKind | undefined;
  let tag: OutcomeTag = OutcomeTag.Moved;

  // ── 1. Movement ──
  const delta = getDirectionDelta(direction);
  const candidate = { x: from.x + delta.x, y: from.y + delta.y };

  if (!isPassable(grid, candidate)) {
    tag = OutcomeTag.Bump;
    const outside = candidate.y < 0 || candidate.y >= state.height || candidate.x < 0 || candidate.x >= state.width;
    logs.push(systemLog(turn, "bump", outside ? "You bump into the perimeter." : "That way is sealed by a wall."));
  } else {
    // ── 2. Cell effect ──
    pos = candidate;
    cell = grid[pos.y][pos.x];

    switch (cell) {
      case CellKind.Trap:
        health = clampHealth(health - 1, maxHealth);
        grid = consumeCell(grid, pos);
        tag = OutcomeTag.Trapped;
        logs.push(systemLog(turn, "trap", "A hidden spike nicks you. (-1 hp)"));
        break;
      case CellKind.Medkit:
        health = clampHealth(health + 1, maxHealth);
        grid = consumeCell(grid, pos);
        tag = OutcomeTag.Healed;
        logs.push(systemLog(turn, "medkit", `You patch yourself up. (${health}/${maxHealth} hp)`));
        break;
      case CellKind.Helper:
        health = clampHealth(health + 1, maxHealth);
        drones = freezeDrones(drones, state.config.helperFreezeTurns);
        grid = consumeCell(grid, pos);
        tag = OutcomeTag.Helped;
        logs.push(systemLog(
          turn,
          "helper",
          `A friendly runner patches you up and jams drone signals for ${state.config.helperFreezeTurns} turns.`,
        ));
        break;
      case CellKind.Exit:
        tag = OutcomeTag.Victory;
        break;
      case CellKind.Empty:
      case CellKind.Drone:
        tag = OutcomeTag.Moved;
        break;
      case CellKind.Wall:
        // isPassable() already turned walls into a bump
        throw new ContractViolationError(`Player moved onto a wall at (${pos.x},${pos.y})`);
    }
  }

  let caught = false;
  if (tag !== OutcomeTag.Victory) {
    // ── 3. Drone motion ──
    drones = advanceDrones(drones, grid, rng);

    // ── 4. Catch ──
    caught = drones.some((d) => samePos(d.pos, pos));
    if (caught) {
      health = 0;
      tag = OutcomeTag.Caught;
      logs.push(systemLog(turn, "caught", "A drone slams into you!"));
    }
  }

  // ── 5. Health ──
  if (health <= 0) {
    tag = OutcomeTag.Defeat;
    logs.push(systemLog(turn, "defeat", "You collapse before reaching the exit. Game over."));
  } else if (tag === OutcomeTag.Victory) {
    logs.push(systemLog(turn, "victory", "You crack the vault core and slip away. Victory!"));
  }

  const terminal = isTerminal(tag);
  const outcome: TurnOutcome = {
    tag,
    turn,
    from,
    to: pos,
    cell,
    healthBefore,
    healthAfter: health,
    caught,
    terminal,
  };

  // ── 6. Turn counter ──
  return {
    state: {
      ...state,
      turn,
      grid,
      drones,
      player: { ...state.player, pos, health },
      logs,
      lastOutcome: tag,
      gameOver: terminal,
      victory: tag === OutcomeTag.Victory,
    },
    outcome,
  };
}
