/**
 * Difficulty configuration: runtime validation with zod.
 *
 * Presets live in constants.ts; anything coming from outside (CLI flags,
 * custom layouts in tests) goes through validateDifficulty() first.
 */

import { z } from "zod";
import type { DifficultyConfig, DifficultyKey } from "./types.js";
import { DIFFICULTY_SETTINGS, DIFFICULTY_ORDER } from "./constants.js";
import { InvalidConfigurationError } from "./errors.js";

const count = z.number().int().nonnegative();

export const DifficultyKeySchema = z.enum(["easy", "normal", "hard"]);

export const DifficultyConfigSchema = z
  .object({
    key: z.string().min(1),
    name: z.string().min(1),
    blurb: z.string(),
    width: z.number().int().min(2),
    height: z.number().int().min(2),
    startHealth: z.number().int().positive(),
    maxHealth: z.number().int().positive(),
    wallCount: count,
    trapCount: count,
    medkitCount: count,
    droneCount: count,
    helperCount: count,
    helperFreezeTurns: count,
  })
  .superRefine((cfg, ctx) => {
    if (cfg.startHealth > cfg.maxHealth) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["startHealth"],
        message: `startHealth ${cfg.startHealth} exceeds maxHealth ${cfg.maxHealth}`,
      });
    }
    const placed = placedCount(cfg);
    const available = cfg.width * cfg.height - 2;
    if (placed > available) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["wallCount"],
        message: `${placed} features do not fit in ${available} free cells`,
      });
    }
  });

/** Number of cells the generator must fill, start and exit excluded. */
export function placedCount(cfg: Pick<DifficultyConfig, "wallCount" | "trapCount" | "medkitCount" | "droneCount" | "helperCount">): number {
  return cfg.wallCount + cfg.trapCount + cfg.medkitCount + cfg.droneCount + cfg.helperCount;
}

export function validateDifficulty(input: unknown): DifficultyConfig {
  const parsed = DifficultyConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      "Invalid difficulty configuration",
      parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)),
    );
  }
  return parsed.data;
}

export function isDifficultyKey(value: string): value is DifficultyKey {
  return DifficultyKeySchema.safeParse(value).success;
}

/**
 * Resolve a user-facing difficulty name. Accepts the key or its first
 * letter ("e", "n", "h"), case-insensitive.
 */
export function resolveDifficulty(raw: string): DifficultyConfig {
  const value = raw.trim().toLowerCase();
  if (isDifficultyKey(value)) return DIFFICULTY_SETTINGS[value];

  const key = value.length === 1 ? DIFFICULTY_ORDER.find((k) => k[0] === value) : undefined;
  if (!key) {
    throw new InvalidConfigurationError(`Unknown difficulty "${raw}"`, [
      `expected one of ${DIFFICULTY_ORDER.join(", ")}`,
    ]);
  }
  return DIFFICULTY_SETTINGS[key];
}
