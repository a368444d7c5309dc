/**
 * Stats store: per-difficulty run records persisted as JSON.
 *
 * The engine never reads these back; a failed load starts from empty
 * records and a failed save is reported, not thrown.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import type { RunResult } from "../shared/types.js";

export const DifficultyStatsSchema = z.object({
  runs: z.number().int().nonnegative().default(0),
  wins: z.number().int().nonnegative().default(0),
  defeats: z.number().int().nonnegative().default(0),
  quits: z.number().int().nonnegative().default(0),
  bestTurns: z.number().int().nonnegative().nullable().default(null),
  winStreak: z.number().int().nonnegative().default(0),
  bestStreak: z.number().int().nonnegative().default(0),
});
export type DifficultyStats = z.infer<typeof DifficultyStatsSchema>;

export interface StatsResult {
  newBest: boolean;
  streak: number;
  bestStreak: number;
}

function emptyStats(): DifficultyStats {
  return DifficultyStatsSchema.parse({});
}

export class StatsStore {
  private readonly stats = new Map<string, DifficultyStats>();
  /** Message from the last failed load or save, if any. */
  lastError: string | null = null;

  constructor(readonly path: string, difficultyKeys: readonly string[]) {
    for (const key of difficultyKeys) this.stats.set(key, emptyStats());
    this.load();
  }

  /** Read the file, keeping well-formed entries for known difficulties. */
  private load(): void {
    if (!existsSync(this.path)) return;

    let payload: unknown;
    try {
      payload = JSON.parse(readFileSync(this.path, "utf8"));
    } catch (err) {
      this.lastError = `Could not read stats from ${this.path}: ${err instanceof Error ? err.message : String(err)}`;
      return;
    }
    if (!payload || typeof payload !== "object") return;

    for (const [key, raw] of Object.entries(payload)) {
      if (!this.stats.has(key)) continue;
      const parsed = DifficultyStatsSchema.safeParse(raw);
      if (parsed.success) this.stats.set(key, parsed.data);
    }
  }

  save(): boolean {
    const payload = Object.fromEntries(this.stats.entries());
    try {
      writeFileSync(this.path, JSON.stringify(payload, null, 2));
      this.lastError = null;
      return true;
    } catch (err) {
      this.lastError = `Could not save stats to ${this.path}: ${err instanceof Error ? err.message : String(err)}`;
      return false;
    }
  }

  get(key: string): DifficultyStats | undefined {
    const s = this.stats.get(key);
    return s ? { ...s } : undefined;
  }

  recordRun(key: string, turns: number, result: RunResult): StatsResult {
    const s = this.stats.get(key) ?? emptyStats();
    s.runs += 1;
    let newBest = false;

    if (result === "victory") {
      s.wins += 1;
      s.winStreak += 1;
      s.bestStreak = Math.max(s.bestStreak, s.winStreak);
      if (s.bestTurns === null || turns < s.bestTurns) {
        s.bestTurns = turns;
        newBest = true;
      }
    } else {
      if (result === "defeat") s.defeats += 1;
      else s.quits += 1;
      s.winStreak = 0;
    }

    this.stats.set(key, s);
    this.save();
    return { newBest, streak: s.winStreak, bestStreak: s.bestStreak };
  }

  summaryLine(key: string): string {
    const s = this.stats.get(key);
    if (!s) return "No data yet.";
    const rate = s.runs > 0 ? Math.round((s.wins / s.runs) * 100) : 0;
    const best = s.bestTurns ?? "—";
    return `runs ${s.runs}, wins ${s.wins} (${rate}% rate), best ${best} turns, streak ${s.winStreak} (best ${s.bestStreak})`;
  }
}
