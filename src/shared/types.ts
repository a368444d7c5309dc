// ── Coordinates ──────────────────────────────────────────────
export interface Position {
  x: number; // column
  y: number; // row
}

// ── Cells ────────────────────────────────────────────────────
export enum CellKind {
  Empty = "empty",
  Wall = "wall",
  Trap = "trap",
  Medkit = "medkit",
  Exit = "exit",
  Drone = "drone",
  Helper = "helper",
}

/** Row-major: grid[y][x]. Fixed size for the lifetime of a run. */
export type Grid = CellKind[][];

// ── Difficulty ───────────────────────────────────────────────
export type DifficultyKey = "easy" | "normal" | "hard";

export interface DifficultyConfig {
  key: string;
  name: string;
  blurb: string;
  width: number;
  height: number;
  startHealth: number;
  maxHealth: number;
  wallCount: number;
  trapCount: number;
  medkitCount: number;
  droneCount: number;
  helperCount: number;
  helperFreezeTurns: number; // turns every drone stays put after a helper is reached
}

// ── Entities ─────────────────────────────────────────────────
export interface Player {
  pos: Position;
  health: number;
  maxHealth: number;
}

export interface Drone {
  id: string;
  pos: Position;
  frozenTurns: number;
}

// ── Actions ──────────────────────────────────────────────────
export enum Direction {
  Up = "up",
  Down = "down",
  Left = "left",
  Right = "right",
}

// ── Turn outcomes ────────────────────────────────────────────
export enum OutcomeTag {
  Bump = "bump",
  Moved = "moved",
  Trapped = "trapped",
  Healed = "healed",
  Helped = "helped",
  Caught = "caught",
  Victory = "victory",
  Defeat = "defeat",
}

export interface TurnOutcome {
  tag: OutcomeTag;
  turn: number; // turn counter after the step
  from: Position;
  to: Position;
  cell?: CellKind; // kind resolved at the destination; absent on a bump
  healthBefore: number;
  healthAfter: number;
  caught: boolean;
  terminal: boolean;
}

export interface TurnResult {
  state: GameState;
  outcome: TurnOutcome;
}

export type RunResult = "victory" | "defeat" | "quit";

// ── Mood ─────────────────────────────────────────────────────
export enum TensionLevel {
  Low = "low",
  Mid = "mid",
  High = "high",
}

export interface Mood {
  tension: TensionLevel;
  event?: OutcomeTag;
  nearestDrone: number | null; // manhattan distance, null without drones
}

// ── Game state ───────────────────────────────────────────────
export interface GameState {
  config: DifficultyConfig;
  turn: number;
  width: number;
  height: number;
  grid: Grid;
  start: Position;
  exit: Position;
  player: Player;
  drones: Drone[];
  logs: LogEntry[];
  lastOutcome?: OutcomeTag;
  gameOver: boolean;
  victory: boolean;
}

// ── Logs ─────────────────────────────────────────────────────
export interface LogEntry {
  id: string;
  turn: number;
  source: "system" | "narrator";
  text: string;
}
