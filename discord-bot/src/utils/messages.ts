/**
 * Reply text for the card commands.
 */

import type { RenderConfig } from "../types/card";
import type { Persona, PersonaCatalog } from "../types/persona";

export const QUICK_ACTION_LINE =
  "Quick actions: `/card adjust` font.up | font.down | spacing.up | spacing.down | " +
  "position.up | position.down | position.left | position.right | curve toggle";

export function formatStateLines(config: RenderConfig): string[] {
  return [
    `Text: ${config.text}`,
    `Font size: ${config.fontSize}px`,
    `Line spacing: ${config.lineSpacing.toFixed(2)}`,
    `Curve: ${config.curveEnabled ? "on" : "off"}`,
    `Position: X ${config.offsetX} / Y ${config.offsetY}`,
    `Persona: ${config.role}`,
  ];
}

export function formatSummary(config: RenderConfig, headline: string): string {
  return [headline, "", ...formatStateLines(config), "", QUICK_ACTION_LINE].join("\n");
}

export function formatGuidance(): string {
  return [
    "**/card adjust** commands:",
    "• `text <content>`: replace the card text.",
    "• `font <size>`: set the font size; `font.up` / `font.down` step it.",
    "• `spacing <value>`: set the line spacing; `spacing.up` / `spacing.down` step it.",
    "• `curve [on|off|toggle]`: switch the curved text effect.",
    "• `position.<up|down|left|right> [pixels]`: move the text.",
    "• `persona <name>`: switch persona; `persona -r` picks one at random.",
    "",
    QUICK_ACTION_LINE,
  ].join("\n");
}

export function formatError(message: string): string {
  return [
    `⚠️ ${message}`,
    "",
    "Use `/card draw` to create or refresh a card, or `/card adjust` with no command for help.",
    "",
    QUICK_ACTION_LINE,
  ].join("\n");
}

function groupOf(catalog: PersonaCatalog, name: string): string | undefined {
  return catalog.groups.find((group) => group.members.includes(name))?.name;
}

export function formatPersonaList(catalog: PersonaCatalog): string {
  const lines = [`**Personas** (${catalog.personas.length})`];
  for (const persona of catalog.personas) {
    lines.push(`• ${persona.name}`);
  }
  return lines.join("\n");
}

export function formatPersonaGroups(catalog: PersonaCatalog): string {
  const lines = ["**Personas by group**"];
  for (const group of catalog.groups) {
    lines.push("", `__${group.name}__`, ...group.members.map((member) => `• ${member}`));
  }

  const ungrouped = catalog.personas.filter((persona) => groupOf(catalog, persona.name) === undefined);
  if (ungrouped.length > 0) {
    lines.push("", "__Other__", ...ungrouped.map((persona) => `• ${persona.name}`));
  }
  return lines.join("\n");
}

export function formatPersonaDetail(catalog: PersonaCatalog, persona: Persona): string {
  return [
    `**${persona.name}**`,
    `Group: ${groupOf(catalog, persona.name) ?? "none"}`,
    `Aliases: ${persona.aliases.length > 0 ? persona.aliases.join(", ") : "none"}`,
  ].join("\n");
}
