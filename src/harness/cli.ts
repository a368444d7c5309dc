#!/usr/bin/env node
import { createInterface } from "node:readline";
import { readFileSync } from "node:fs";
import type { DifficultyConfig } from "../shared/types.js";
import { DEFAULT_DIFFICULTY, DIFFICULTY_ORDER, DIFFICULTY_SETTINGS } from "../shared/constants.js";
import { resolveDifficulty } from "../shared/config.js";
import { GameError, InvalidConfigurationError, UnsolvableLayoutError } from "../shared/errors.js";
import { createRng } from "../sim/rng.js";
import type { Rng } from "../sim/rng.js";
import { renderToString } from "../render/terminal.js";
import { OfflineNarrator } from "../narration/narrator.js";
import { DEFAULT_PERSONA, getPersona, listPersonas } from "../narration/personas.js";
import { StatsStore } from "../stats/statsStore.js";
import { RoundRunner } from "./runner.js";
import { parseSeed } from "./inputParser.js";

// ── Arg parsing ──────────────────────────────────────────────

interface CliArgs {
  difficulty: DifficultyConfig | null;
  seed: number | null;
  persona: string | null;
  statsPath: string;
  script: string | null;
  quiet: boolean;
}

function fail(message: string): never {
  console.error(`ERROR: ${message}`);
  process.exit(1);
}

function parseArgs(argv: string[]): CliArgs {
  const opts: CliArgs = {
    difficulty: null,
    seed: null,
    persona: null,
    statsPath: "stats.json",
    script: null,
    quiet: false,
  };

  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--difficulty":
        try {
          opts.difficulty = resolveDifficulty(argv[++i] ?? "");
        } catch (err) {
          fail(err instanceof Error ? err.message : String(err));
        }
        break;
      case "--seed":
        opts.seed = parseSeed(argv[++i] ?? "");
        if (opts.seed === null) fail("--seed requires a positive integer");
        break;
      case "--persona":
        opts.persona = argv[++i] ?? null;
        break;
      case "--stats":
        opts.statsPath = argv[++i] ?? fail("--stats requires a path");
        break;
      case "--script":
        opts.script = argv[++i] ?? fail("--script requires a path");
        break;
      case "--quiet":
        opts.quiet = true;
        break;
      default:
        console.error(`WARNING: Unknown argument "${argv[i]}"`);
        break;
    }
  }

  return opts;
}

// ── Terminal helpers ─────────────────────────────────────────

function clearScreen(): void {
  if (process.stdout.isTTY) process.stdout.write("\x1b[2J\x1b[H");
}

function draw(runner: RoundRunner): void {
  clearScreen();
  console.log(renderToString(runner.state, runner.messages));
}

function printRoundEnd(runner: RoundRunner, stats: StatsStore): void {
  const cfg = runner.state.config;
  console.log("");
  console.log(`Result: ${(runner.result ?? "quit").toUpperCase()}   Turns: ${runner.state.turn}`);
  console.log(`Stats [${cfg.name}]: ${stats.summaryLine(cfg.key)}`);
  if (stats.lastError) console.error(`WARNING: ${stats.lastError}`);
}

type LineSource = () => Promise<string | null>;

async function ask(next: LineSource, prompt: string): Promise<string | null> {
  process.stdout.write(prompt);
  return next();
}

async function chooseDifficulty(next: LineSource): Promise<DifficultyConfig | null> {
  console.log("Choose difficulty:");
  for (const key of DIFFICULTY_ORDER) {
    const d = DIFFICULTY_SETTINGS[key];
    console.log(`  [${key[0]}] ${d.name}: ${d.blurb}`);
  }
  for (;;) {
    const raw = await ask(next, "Select difficulty (e/n/h, Enter for normal): ");
    if (raw === null) return null;
    if (raw.trim() === "") return DIFFICULTY_SETTINGS[DEFAULT_DIFFICULTY];
    try {
      return resolveDifficulty(raw);
    } catch (err) {
      if (!(err instanceof InvalidConfigurationError)) throw err;
      console.log("Invalid choice. Use e/n/h or type the name.");
    }
  }
}

async function choosePersona(next: LineSource): Promise<string | null> {
  const personas = listPersonas();
  console.log("Choose narrator style:");
  personas.forEach((p, i) => console.log(`  [${i + 1}] ${p.label} (${p.key}) - ${p.style}`));
  for (;;) {
    const raw = await ask(next, "Select narrator (number/key, Enter for default): ");
    if (raw === null) return null;
    const value = raw.trim().toLowerCase();
    if (value === "") return DEFAULT_PERSONA;
    const idx = parseInt(value, 10);
    if (!Number.isNaN(idx) && idx >= 1 && idx <= personas.length) return personas[idx - 1].key;
    if (personas.some((p) => p.key === value)) return value;
    console.log("Invalid choice. Use the number or persona key.");
  }
}

function makeRunner(config: DifficultyConfig, engineRng: Rng, narrationRng: Rng, persona: string, args: CliArgs, stats: StatsStore): RoundRunner {
  const narrator = new OfflineNarrator(getPersona(persona), narrationRng, !args.quiet);
  return new RoundRunner({ config, rng: engineRng, narrator, stats });
}

// ── Script mode ──────────────────────────────────────────────

function runScript(scriptPath: string, args: CliArgs, stats: StatsStore): void {
  let rawLines: string[];
  try {
    rawLines = readFileSync(scriptPath, "utf-8")
      .split("\n")
      .map((l) => l.trim())
      .filter((l) => l.length > 0 && !l.startsWith("//"));
  } catch (err) {
    fail(`Could not read script file "${scriptPath}": ${err instanceof Error ? err.message : String(err)}`);
  }

  const seed = args.seed ?? Date.now();
  const config = args.difficulty ?? DIFFICULTY_SETTINGS[DEFAULT_DIFFICULTY];
  const runner = makeRunner(config, createRng(seed), createRng(seed + 1), args.persona ?? DEFAULT_PERSONA, args, stats);
  console.log(`Seed: ${seed}  Difficulty: ${config.name}`);
  runner.start();

  for (const line of rawLines) {
    const report = runner.handle(line);
    if (report.error) console.log(`===ERROR=== ${report.error}`);
    if (report.outcome) console.log(`turn ${report.outcome.turn}: ${report.outcome.tag} (${report.mood?.tension ?? "?"})`);
    for (const l of report.lines) console.log(`  > ${l.text}`);
    if (report.finished) break;
  }

  console.log(renderToString(runner.state, runner.messages));
  printRoundEnd(runner, stats);
}

// ── Interactive mode ─────────────────────────────────────────

async function runInteractive(args: CliArgs, stats: StatsStore): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  const next: LineSource = async () => {
    const r = await lines.next();
    return r.done ? null : r.value;
  };

  console.log("=== SIGNAL VAULT ===");
  console.log("Slip through the vault, avoid drones, grab medkits, and reach the exit at the far corner.");
  console.log("Controls: w/a/s/d or arrows to move, q to quit. Walls block movement.");

  try {
    const config = args.difficulty ?? await chooseDifficulty(next);
    if (!config) return;
    console.log(`Stats [${config.name}]: ${stats.summaryLine(config.key)}`);
    const persona = args.persona ?? await choosePersona(next);
    if (!persona) return;

    const seed = args.seed ?? Date.now();
    const engineRng = createRng(seed);
    const narrationRng = createRng(seed + 1);

    for (;;) {
      const runner = makeRunner(config, engineRng, narrationRng, persona, args, stats);
      runner.start();
      draw(runner);

      while (runner.result === null) {
        const raw = await ask(next, "Move (w/a/s/d) or q: ");
        if (raw === null) {
          runner.handle("q");
          break;
        }
        runner.handle(raw);
        draw(runner);
      }

      printRoundEnd(runner, stats);
      const again = await ask(next, "Play again? (y/n): ");
      if (again === null || !["y", "yes"].includes(again.trim().toLowerCase())) {
        console.log("Thanks for running the vault.");
        return;
      }
    }
  } finally {
    rl.close();
  }
}

// ── Main ─────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const stats = new StatsStore(args.statsPath, DIFFICULTY_ORDER);
  if (stats.lastError) console.error(`WARNING: ${stats.lastError}`);

  if (args.script) {
    runScript(args.script, args, stats);
  } else {
    await runInteractive(args, stats);
  }
}

main().catch((err: unknown) => {
  if (err instanceof InvalidConfigurationError || err instanceof UnsolvableLayoutError) {
    console.error(`ERROR: ${err.message}`);
  } else if (err instanceof GameError) {
    console.error(`Fatal (${err.code}): ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
