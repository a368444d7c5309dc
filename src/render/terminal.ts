import type { GameState, Position } from "../shared/types.js";
import { CellKind } from "../shared/types.js";
import { GLYPHS, LEGEND, MESSAGE_BUFFER_SIZE } from "../shared/constants.js";
import { samePos } from "../sim/actions.js";

const CELL_GLYPHS: Record<CellKind, string> = {
  [CellKind.Empty]: GLYPHS.empty,
  [CellKind.Wall]: GLYPHS.wall,
  [CellKind.Trap]: GLYPHS.trap,
  [CellKind.Medkit]: GLYPHS.medkit,
  [CellKind.Exit]: GLYPHS.exit,
  [CellKind.Drone]: GLYPHS.drone,
  [CellKind.Helper]: GLYPHS.helper,
};

export function glyphAt(state: GameState, pos: Position): string {
  if (samePos(state.player.pos, pos)) return GLYPHS.player;
  if (state.drones.some((d) => samePos(d.pos, pos))) return GLYPHS.drone;
  return CELL_GLYPHS[state.grid[pos.y][pos.x]];
}

/** Just the grid rows with a column header, no chrome. */
export function renderGrid(state: GameState): string[] {
  const lines: string[] = [];
  const header = Array.from({ length: state.width }, (_, x) => String(x % 10)).join(" ");
  lines.push(`     ${header}`);

  for (let y = 0; y < state.height; y++) {
    const row: string[] = [];
    for (let x = 0; x < state.width; x++) {
      row.push(glyphAt(state, { x, y }));
    }
    lines.push(`${String(y).padStart(2)} | ${row.join(" ")}`);
  }
  return lines;
}

/**
 * Render game state to a plain-text string (legend, status, grid, and
 * exactly MESSAGE_BUFFER_SIZE recent-event lines).
 */
export function renderToString(state: GameState, messages: readonly string[] = []): string {
  const lines: string[] = [];

  lines.push(LEGEND);
  lines.push(
    `Difficulty: ${state.config.name}   ` +
    `Health: ${state.player.health}/${state.player.maxHealth}   ` +
    `Turn: ${state.turn}`,
  );
  lines.push(...renderGrid(state));

  lines.push("=== Recent Events ===");
  const recent = messages.slice(-MESSAGE_BUFFER_SIZE);
  if (recent.length === 0) recent.push("(No recent events)");
  while (recent.length < MESSAGE_BUFFER_SIZE) recent.push("");
  lines.push(...recent);

  return lines.join("\n");
}
