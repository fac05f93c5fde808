/**
 * Persona catalog loading.
 *
 * The catalog lives in data/personas.json: canonical names with their
 * aliases, and the groups (units) each persona belongs to.
 */

import catalogJson from "../../data/personas.json";
import type { Persona, PersonaCatalog, PersonaGroup } from "../types/persona";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Validate raw catalog data.
 * Every group member must be a known persona, and names must be unique.
 */
export function parsePersonaCatalog(raw: unknown): PersonaCatalog {
  if (!isRecord(raw) || !Array.isArray(raw.personas) || !Array.isArray(raw.groups)) {
    throw new Error("Persona catalog must have 'personas' and 'groups' arrays");
  }

  const personas: Persona[] = raw.personas.map((entry: unknown, index: number) => {
    if (!isRecord(entry) || typeof entry.name !== "string" || !entry.name.trim()) {
      throw new Error(`Persona #${index + 1} is missing a name`);
    }
    if (!isStringArray(entry.aliases)) {
      throw new Error(`Persona "${entry.name}" must list its aliases as strings`);
    }
    return { name: entry.name.trim(), aliases: entry.aliases };
  });

  const names = new Set<string>();
  for (const persona of personas) {
    if (names.has(persona.name)) {
      throw new Error(`Duplicate persona name: ${persona.name}`);
    }
    names.add(persona.name);
  }
  if (names.size === 0) {
    throw new Error("Persona catalog is empty");
  }

  const groups: PersonaGroup[] = raw.groups.map((entry: unknown, index: number) => {
    if (!isRecord(entry) || typeof entry.name !== "string" || !isStringArray(entry.members)) {
      throw new Error(`Persona group #${index + 1} must have a name and a members list`);
    }
    for (const member of entry.members) {
      if (!names.has(member)) {
        throw new Error(`Group "${entry.name}" lists unknown persona "${member}"`);
      }
    }
    return { name: entry.name, members: entry.members };
  });

  return { groups, personas };
}

export const DEFAULT_PERSONA_CATALOG: PersonaCatalog = parsePersonaCatalog(catalogJson);
