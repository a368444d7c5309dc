import type { GameState, Mood, TurnOutcome } from "../shared/types.js";
import { CellKind, OutcomeTag, TensionLevel } from "../shared/types.js";
import { NEAR_MISS_DISTANCE, STATUS_COOLDOWN_TURNS } from "../shared/constants.js";
import { tensionFor } from "../sim/mood.js";
import { pickOne } from "../sim/rng.js";
import type { Rng } from "../sim/rng.js";
import type { NarrationBeat, Persona } from "./personas.js";

export type SoundCue = "wall" | "trap" | "medkit" | "helper" | "drone_hit" | "victory" | "defeat";

const BEAT_CUES: Partial<Record<NarrationBeat, SoundCue>> = {
  wall: "wall",
  trap: "trap",
  medkit: "medkit",
  helper: "helper",
  drone_hit: "drone_hit",
  victory: "victory",
  defeat: "defeat",
};

export interface NarrationContext {
  health: number;
  maxHealth: number;
  proximity?: number | null;
  turns?: number;
  streak?: number;
}

export interface NarrationLine {
  beat: NarrationBeat;
  text: string;
  tension: TensionLevel;
  cue?: SoundCue;
}

/**
 * Narration collaborator. Receives what happened, never the ability to
 * change it: implementations get copies of numbers, not the game state.
 */
export interface Narrator {
  describe(beat: NarrationBeat, ctx: NarrationContext): NarrationLine | null;
  ambientStatus(ctx: NarrationContext & { turn: number }): NarrationLine | null;
  reset(): void;
}

/** Low-health threshold: half of max, at least 1. */
export function isLowHealth(health: number, maxHealth: number): boolean {
  return health > 0 && health <= Math.max(1, Math.floor(maxHealth / 2));
}

/** Replace {name} placeholders; unknown names are left in place. */
export function fillTemplate(template: string, vars: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (whole, name: string) =>
    Object.prototype.hasOwnProperty.call(vars, name) ? String(vars[name]) : whole,
  );
}

/**
 * The narration beats a resolved turn produces, in the order they are told.
 */
export function beatsForTurn(outcome: TurnOutcome, mood: Mood, state: GameState): NarrationBeat[] {
  const beats: NarrationBeat[] = [];

  if (outcome.tag === OutcomeTag.Bump) {
    beats.push("wall");
  } else {
    switch (outcome.cell) {
      case CellKind.Trap:
        beats.push("trap");
        break;
      case CellKind.Medkit:
        beats.push("medkit");
        break;
      case CellKind.Helper:
        beats.push("helper");
        break;
      default:
        break;
    }
  }

  if (isLowHealth(state.player.health, state.player.maxHealth)) {
    beats.push("low_health");
  }
  if (outcome.caught) {
    beats.push("drone_hit");
  }
  if (
    !outcome.terminal &&
    mood.nearestDrone !== null &&
    mood.nearestDrone <= NEAR_MISS_DISTANCE
  ) {
    beats.push("near_miss");
  }
  if (outcome.tag === OutcomeTag.Victory) beats.push("victory");
  if (outcome.tag === OutcomeTag.Defeat) beats.push("defeat");

  return beats;
}

/**
 * Templated narration from a persona's line pools. Each line is a base
 * line for the beat followed by a tension line for the current mood.
 */
export class OfflineNarrator implements Narrator {
  private lowHealthNoted = false;
  private lastStatusTurn = -STATUS_COOLDOWN_TURNS * 10;
  private lastTension: TensionLevel = TensionLevel.Low;

  constructor(
    readonly persona: Persona,
    private readonly rng: Rng,
    readonly enabled = true,
  ) {}

  describe(beat: NarrationBeat, ctx: NarrationContext): NarrationLine | null {
    if (!this.enabled) return null;
    if (beat === "low_health") {
      if (this.lowHealthNoted) return null;
      this.lowHealthNoted = true;
    }

    const base = pickOne(this.rng, this.persona.events[beat] ?? []);
    if (base === null) return null;

    const tension = tensionFor(ctx.health, ctx.maxHealth, ctx.proximity ?? null);
    const vars: Record<string, string | number> = {
      health: ctx.health,
      max_health: ctx.maxHealth,
      proximity: ctx.proximity ?? "n/a",
    };
    if (ctx.turns !== undefined) vars.turns = ctx.turns;
    if (ctx.streak !== undefined) vars.streak = ctx.streak;

    const extra = pickOne(this.rng, this.persona.tension[tension]);
    const text = extra === null
      ? fillTemplate(base, vars)
      : `${fillTemplate(base, vars)} ${fillTemplate(extra, vars)}`;

    return { beat, text, tension, cue: BEAT_CUES[beat] };
  }

  /**
   * Occasional atmosphere: fires after a cooldown, or straight away when
   * tension climbs into mid/high.
   */
  ambientStatus(ctx: NarrationContext & { turn: number }): NarrationLine | null {
    if (!this.enabled) return null;
    const tension = tensionFor(ctx.health, ctx.maxHealth, ctx.proximity ?? null);
    const cooldownReady = ctx.turn - this.lastStatusTurn >= STATUS_COOLDOWN_TURNS;
    const tensionRose = tension !== this.lastTension && tension !== TensionLevel.Low;
    this.lastTension = tension;
    if (!cooldownReady && !tensionRose) return null;

    this.lastStatusTurn = ctx.turn;
    return this.describe("status", ctx);
  }

  reset(): void {
    this.lowHealthNoted = false;
    this.lastStatusTurn = -STATUS_COOLDOWN_TURNS * 10;
    this.lastTension = TensionLevel.Low;
  }
}
