import type { DifficultyConfig, DifficultyKey } from "./types.js";

// ── Golden seed ──────────────────────────────────────────────
export const GOLDEN_SEED = 184201;

// ── Map generation ───────────────────────────────────────────
export const MAX_GENERATION_ATTEMPTS = 50; // full regenerations before giving up on a layout

// ── Helper ───────────────────────────────────────────────────
export const HELPER_FREEZE_TURNS = 2;

// ── Mood thresholds ──────────────────────────────────────────
export const TENSION_HIGH_HEALTH_RATIO = 1 / 3;
export const TENSION_MID_HEALTH_RATIO = 2 / 3;
export const TENSION_HIGH_DRONE_DISTANCE = 1;
export const TENSION_MID_DRONE_DISTANCE = 2;

// ── Narration pacing ────────────────────────────────────────
export const STATUS_COOLDOWN_TURNS = 3; // turns between ambient status lines
export const NEAR_MISS_DISTANCE = 1;
export const STREAK_NARRATION_MIN = 3; // win streak length that earns a streak line

// ── Message buffer ───────────────────────────────────────────
export const MESSAGE_BUFFER_SIZE = 5;

// ── Difficulties ─────────────────────────────────────────────
export const DIFFICULTY_ORDER: readonly DifficultyKey[] = ["easy", "normal", "hard"];
export const DEFAULT_DIFFICULTY: DifficultyKey = "normal";

export const DIFFICULTY_SETTINGS: Record<DifficultyKey, DifficultyConfig> = {
  easy: {
    key: "easy",
    name: "Easy",
    blurb: "Compact map, extra health, single drone.",
    width: 7,
    height: 7,
    startHealth: 6,
    maxHealth: 6,
    wallCount: 7,
    trapCount: 5,
    medkitCount: 5,
    droneCount: 1,
    helperCount: 1,
    helperFreezeTurns: HELPER_FREEZE_TURNS,
  },
  normal: {
    key: "normal",
    name: "Normal",
    blurb: "Standard balance: 2 drones, moderate hazards.",
    width: 9,
    height: 9,
    startHealth: 4,
    maxHealth: 5,
    wallCount: 11,
    trapCount: 8,
    medkitCount: 3,
    droneCount: 2,
    helperCount: 1,
    helperFreezeTurns: HELPER_FREEZE_TURNS,
  },
  hard: {
    key: "hard",
    name: "Hard",
    blurb: "Bigger map, more walls and traps, extra drone.",
    width: 10,
    height: 10,
    startHealth: 4,
    maxHealth: 5,
    wallCount: 16,
    trapCount: 14,
    medkitCount: 3,
    droneCount: 3,
    helperCount: 1,
    helperFreezeTurns: HELPER_FREEZE_TURNS,
  },
};

// ── Glyphs ───────────────────────────────────────────────────
export const GLYPHS = {
  player: "P",
  empty: " ",
  wall: "#",
  trap: "^",
  medkit: "+",
  exit: "E",
  drone: "D",
  helper: "H",
} as const;

export const LEGEND =
  "[P] you  [E] exit  [#] wall  [^] trap (-1 hp)  [+] medkit (+1 hp)  " +
  "[D] drone  [H] helper  •  Controls: WASD or Arrow Keys, Q to quit";
