import { z } from "zod";
import PERSONA_DATA from "../data/personas.json" with { type: "json" };

export const NARRATION_BEATS = [
  "start", "status", "low_health", "trap", "medkit", "helper", "near_miss",
  "wall", "drone_hit", "quit", "victory", "defeat", "record", "streak",
] as const;

export const NarrationBeatSchema = z.enum(NARRATION_BEATS);
export type NarrationBeat = z.infer<typeof NarrationBeatSchema>;

const Lines = z.array(z.string().min(1));

export const PersonaSchema = z.object({
  key: z.string().min(1),
  label: z.string(),
  style: z.string(),
  events: z.record(NarrationBeatSchema, Lines),
  tension: z.object({
    low: Lines,
    mid: Lines,
    high: Lines,
  }),
});
export type Persona = z.infer<typeof PersonaSchema>;

const PERSONAS: Map<string, Persona> = new Map(
  Object.entries(z.record(z.string(), PersonaSchema).parse(PERSONA_DATA)),
);

export const DEFAULT_PERSONA = "dramatic";

export function listPersonas(): Persona[] {
  return Array.from(PERSONAS.values());
}

/** Look up a persona by key; unknown keys fall back to the default persona. */
export function getPersona(key: string): Persona {
  const persona = PERSONAS.get(key.trim().toLowerCase()) ?? PERSONAS.get(DEFAULT_PERSONA);
  if (!persona) {
    throw new Error(`Persona data is missing the "${DEFAULT_PERSONA}" persona`);
  }
  return persona;
}
