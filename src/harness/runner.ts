import type { DifficultyConfig, GameState, Mood, RunResult, TurnOutcome } from "../shared/types.js";
import { MESSAGE_BUFFER_SIZE, STREAK_NARRATION_MIN } from "../shared/constants.js";
import { newRun } from "../sim/state.js";
import { step } from "../sim/step.js";
import { classify } from "../sim/mood.js";
import type { Rng } from "../sim/rng.js";
import { beatsForTurn } from "../narration/narrator.js";
import type { NarrationContext, NarrationLine, Narrator } from "../narration/narrator.js";
import type { NarrationBeat } from "../narration/personas.js";
import type { StatsResult, StatsStore } from "../stats/statsStore.js";
import { isInputError, parseInput } from "./inputParser.js";

export interface RoundOptions {
  config: DifficultyConfig;
  rng: Rng;
  narrator: Narrator;
  stats?: StatsStore;
  /** Start from a prepared state instead of generating one. */
  state?: GameState;
}

export interface TurnReport {
  accepted: boolean;
  error?: string;
  outcome?: TurnOutcome;
  mood?: Mood;
  lines: NarrationLine[];
  finished: boolean;
}

/**
 * Drives one round: input → step → mood → narration, and records the
 * result once the round ends. Owns the only live GameState.
 */
export class RoundRunner {
  private current: GameState;
  private readonly buffer: string[] = [];
  private finishedWith: RunResult | null = null;
  statsResult: StatsResult | null = null;

  constructor(private readonly opts: RoundOptions) {
    this.current = opts.state ?? newRun(opts.config, opts.rng);
    opts.narrator.reset();
  }

  get state(): GameState {
    return this.current;
  }

  get result(): RunResult | null {
    return this.finishedWith;
  }

  /** Last MESSAGE_BUFFER_SIZE messages, oldest first. */
  get messages(): string[] {
    return this.buffer.slice(-MESSAGE_BUFFER_SIZE);
  }

  private pushMessage(text: string): void {
    this.buffer.push(text);
    if (this.buffer.length > MESSAGE_BUFFER_SIZE) {
      this.buffer.splice(0, this.buffer.length - MESSAGE_BUFFER_SIZE);
    }
  }

  private context(mood?: Mood): NarrationContext {
    return {
      health: this.current.player.health,
      maxHealth: this.current.player.maxHealth,
      proximity: mood ? mood.nearestDrone : classify(this.current).nearestDrone,
    };
  }

  private narrate(beat: NarrationBeat, ctx: NarrationContext): NarrationLine | null {
    const line = this.opts.narrator.describe(beat, ctx);
    if (line) this.pushMessage(line.text);
    return line;
  }

  start(): NarrationLine[] {
    const line = this.narrate("start", this.context());
    return line ? [line] : [];
  }

  /** Handle one raw input line. Bad input is reported and costs no turn. */
  handle(raw: string): TurnReport {
    if (this.finishedWith) {
      return { accepted: false, error: "Round is over.", lines: [], finished: true };
    }

    const input = parseInput(raw);
    if (isInputError(input)) {
      this.pushMessage(input.error);
      return { accepted: false, error: input.error, lines: [], finished: false };
    }

    if (input.kind === "quit") {
      this.pushMessage("You abandon the run.");
      const lines: NarrationLine[] = [];
      const line = this.narrate("quit", this.context());
      if (line) lines.push(line);
      lines.push(...this.finish("quit"));
      return { accepted: true, lines, finished: true };
    }

    const logCount = this.current.logs.length;
    const { state, outcome } = step(this.current, input.direction, this.opts.rng);
    this.current = state;
    for (const log of state.logs.slice(logCount)) this.pushMessage(log.text);

    const mood = classify(state);
    const ctx = this.context(mood);
    const lines: NarrationLine[] = [];
    for (const beat of beatsForTurn(outcome, mood, state)) {
      const line = this.narrate(beat, ctx);
      if (line) lines.push(line);
    }

    if (!outcome.terminal) {
      const status = this.opts.narrator.ambientStatus({ ...ctx, turn: state.turn });
      if (status) {
        this.pushMessage(status.text);
        lines.push(status);
      }
      return { accepted: true, outcome, mood, lines, finished: false };
    }

    lines.push(...this.finish(state.victory ? "victory" : "defeat"));
    return { accepted: true, outcome, mood, lines, finished: true };
  }

  /** Record the run; victories may earn record and streak lines. */
  private finish(result: RunResult): NarrationLine[] {
    this.finishedWith = result;
    const lines: NarrationLine[] = [];
    if (!this.opts.stats) return lines;

    const turns = this.current.turn;
    const recorded = this.opts.stats.recordRun(this.current.config.key, turns, result);
    this.statsResult = recorded;

    if (result === "victory") {
      const ctx = this.context();
      if (recorded.newBest) {
        const line = this.narrate("record", { ...ctx, turns });
        if (line) lines.push(line);
      }
      if (recorded.streak >= STREAK_NARRATION_MIN) {
        const line = this.narrate("streak", { ...ctx, streak: recorded.streak });
        if (line) lines.push(line);
      }
    }
    return lines;
  }
}
