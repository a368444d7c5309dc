import { Direction } from "../shared/types.js";

// ── Input mapping ────────────────────────────────────────────

export type PlayerInput = { kind: "move"; direction: Direction } | { kind: "quit" };

const KEY_MAP = new Map<string, Direction>([
  ["w", Direction.Up],
  ["k", Direction.Up],
  ["up", Direction.Up],
  ["s", Direction.Down],
  ["j", Direction.Down],
  ["down", Direction.Down],
  ["a", Direction.Left],
  ["h", Direction.Left],
  ["left", Direction.Left],
  ["d", Direction.Right],
  ["l", Direction.Right],
  ["right", Direction.Right],
]);

// ANSI cursor keys as sent by most terminals
const ARROW_MAP = new Map<string, Direction>([
  ["\x1b[A", Direction.Up],
  ["\x1b[B", Direction.Down],
  ["\x1b[C", Direction.Right],
  ["\x1b[D", Direction.Left],
]);

const QUIT_WORDS = new Set(["q", "quit", "exit"]);

/**
 * Parse one line or keypress into a move or quit.
 *
 * Accepts WASD, vi keys (hjkl), direction words, and arrow escape
 * sequences, case-insensitive. Quit never reaches the engine.
 */
export function parseInput(raw: string): PlayerInput | { error: string } {
  const arrow = ARROW_MAP.get(raw) ?? ARROW_MAP.get(raw.trim());
  if (arrow) return { kind: "move", direction: arrow };

  const key = raw.trim().toLowerCase();
  if (key === "") return { error: "No input. Use w/a/s/d or q." };
  if (QUIT_WORDS.has(key)) return { kind: "quit" };

  const direction = KEY_MAP.get(key);
  if (direction) return { kind: "move", direction };

  return { error: `Invalid input "${key}". Use w/a/s/d or q.` };
}

export function isInputError(value: PlayerInput | { error: string }): value is { error: string } {
  return "error" in value;
}

/** Seed flag value: digits only, so `12abc`, `1e3` and `0` are rejected. */
export function parseSeed(raw: string): number | null {
  const value = raw.trim();
  if (!/^\d+$/.test(value)) return null;
  const seed = Number(value);
  return Number.isSafeInteger(seed) && seed >= 1 ? seed : null;
}
