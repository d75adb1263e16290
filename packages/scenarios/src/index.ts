import { readFileSync, existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { resolve, dirname } from "node:path";
import { GoalCatalogSchema, GoalSchema, PersonaCatalogSchema, PersonaSchema } from "@convosim/shared";
import type { Goal, Persona } from "@convosim/shared";

const DATA_DIR = resolve(dirname(fileURLToPath(import.meta.url)), "../data");

export type PersonaCatalog = Record<string, Persona>;
export type GoalCatalog = Record<string, Goal>;

export function loadPersonas(filePath: string = resolve(DATA_DIR, "personas.json")): PersonaCatalog {
  return PersonaCatalogSchema.parse(readJson(filePath));
}

export function loadGoals(filePath: string = resolve(DATA_DIR, "goals.json")): GoalCatalog {
  return GoalCatalogSchema.parse(readJson(filePath));
}

/** Looks up a persona by catalog key; throws listing the known keys. */
export function getPersona(key: string, catalog: PersonaCatalog = loadPersonas()): Persona {
  const persona = Object.hasOwn(catalog, key) ? catalog[key] : undefined;
  if (!persona) {
    throw new Error(`Unknown persona: ${key}\nAvailable personas: ${Object.keys(catalog).join(", ")}`);
  }
  return persona;
}

export function getGoal(key: string, catalog: GoalCatalog = loadGoals()): Goal {
  const goal = Object.hasOwn(catalog, key) ? catalog[key] : undefined;
  if (!goal) {
    throw new Error(`Unknown goal: ${key}\nAvailable goals: ${Object.keys(catalog).join(", ")}`);
  }
  return goal;
}

/**
 * Builds a persona from a base persona plus overrides. Without an explicit id
 * the result gets a `custom-<epoch ms>` id.
 */
export function createCustomPersona(base: Persona, overrides: Partial<Persona>): Persona {
  return PersonaSchema.parse({
    ...base,
    ...overrides,
    id: overrides.id ?? `custom-${Date.now()}`,
  });
}

export function createCustomGoal(base: Goal, overrides: Partial<Goal>): Goal {
  return GoalSchema.parse({
    ...base,
    ...overrides,
    id: overrides.id ?? `custom-goal-${Date.now()}`,
  });
}

function readJson(filePath: string): unknown {
  if (!existsSync(filePath)) {
    throw new Error(`Scenario file not found: ${filePath}`);
  }
  return JSON.parse(readFileSync(filePath, "utf-8"));
}
