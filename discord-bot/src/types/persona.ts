/**
 * Persona catalog types matching data/personas.json.
 */

export interface Persona {
  name: string;
  aliases: string[];
}

export interface PersonaGroup {
  name: string;
  members: string[];
}

export interface PersonaCatalog {
  groups: PersonaGroup[];
  personas: Persona[];
}
