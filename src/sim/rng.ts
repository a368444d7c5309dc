import * as ROT from "rot-js";

/**
 * Random source threaded through generation, drone motion and narration.
 * Anything with getUniform() in [0, 1) works; tests pass scripted sequences.
 */
export interface Rng {
  getUniform(): number;
}

/**
 * Independent seeded generator. Cloned from ROT.RNG so runs never share the
 * global stream: two generators with the same seed replay the same draws.
 */
export function createRng(seed: number): Rng {
  return ROT.RNG.clone().setSeed(seed);
}

/** Uniform integer in [0, n). */
export function randomIndex(rng: Rng, n: number): number {
  return Math.min(n - 1, Math.floor(rng.getUniform() * n));
}

/** Uniform pick; null for an empty list. */
export function pickOne<T>(rng: Rng, items: readonly T[]): T | null {
  if (items.length === 0) return null;
  return items[randomIndex(rng, items.length)];
}
