import { newRun } from "./sim/state.js";
import { createRng } from "./sim/rng.js";
import { renderToString } from "./render/terminal.js";
import { DIFFICULTY_SETTINGS, GOLDEN_SEED } from "./shared/constants.js";

const seed = GOLDEN_SEED;
const state = newRun(DIFFICULTY_SETTINGS.normal, createRng(seed));
console.log(renderToString(state));
console.log("\nSignal Vault — v0.1.0");
console.log("Seed:", seed);
