/**
 * Card vocabulary (alias tables) and RenderConfig construction.
 */

import { DEFAULT_PERSONA_CATALOG } from "../config/personas";
import type { CardLimits, CardSettings, RenderConfig } from "../types/card";
import type { PersonaCatalog } from "../types/persona";
import { type AliasTable, buildAliasTable } from "../utils/aliases";
import { ValidationError } from "../utils/errors";
import { calculateFontSize } from "../utils/layout";
import { charLength, collapseWhitespace, type DrawFlags, takeChars } from "../utils/tokenizer";

export type CommandName = "text" | "font_size" | "line_spacing" | "curve" | "position" | "role";
export type SizeVariant = "increase" | "decrease";
export type CurveVariant = "on" | "off" | "toggle";
export type Direction = "up" | "down" | "left" | "right";

/**
 * Every alias table the interpreter needs, built once at startup.
 */
export interface CardVocabulary {
  readonly commands: AliasTable<CommandName>;
  readonly sizeVariants: AliasTable<SizeVariant>;
  readonly curveVariants: AliasTable<CurveVariant>;
  readonly directions: AliasTable<Direction>;
  readonly personas: AliasTable<string>;
  readonly catalog: PersonaCatalog;
}

export function createCardVocabulary(catalog: PersonaCatalog = DEFAULT_PERSONA_CATALOG): CardVocabulary {
  return Object.freeze({
    commands: buildAliasTable<CommandName>([
      ["text", ["text", "message", "文本", "文字", "内容"]],
      ["font_size", ["font", "fontsize", "font-size", "size", "字号", "字体", "字"]],
      ["line_spacing", ["spacing", "lines", "line-spacing", "行距", "间距", "行间距"]],
      ["curve", ["curve", "arc", "曲线", "弧线", "曲线模式"]],
      ["position", ["position", "pos", "offset", "move", "位置", "坐标"]],
      ["role", ["role", "persona", "avatar", "character", "人物", "角色", "立绘"]],
    ]),
    sizeVariants: buildAliasTable<SizeVariant>([
      ["increase", ["increase", "up", "plus", "+", "大", "增", "加"]],
      ["decrease", ["decrease", "down", "minus", "-", "小", "减", "降"]],
    ]),
    curveVariants: buildAliasTable<CurveVariant>([
      ["on", ["on", "true", "enable", "开", "开启"]],
      ["off", ["off", "false", "disable", "关", "关闭"]],
      ["toggle", ["toggle", "switch", "切换"]],
    ]),
    directions: buildAliasTable<Direction>([
      ["up", ["up", "u", "↑", "上"]],
      ["down", ["down", "d", "↓", "下"]],
      ["left", ["left", "l", "←", "左"]],
      ["right", ["right", "r", "→", "右"]],
    ]),
    personas: buildAliasTable(catalog.personas.map((persona) => [persona.name, [persona.name, ...persona.aliases]] as const)),
    catalog,
  });
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function createDefaultConfig(settings: CardSettings, text?: string): RenderConfig {
  const { defaults } = settings;
  return {
    text: text ?? defaults.text,
    fontSize: defaults.fontSize,
    lineSpacing: roundTo2(defaults.lineSpacing),
    curveEnabled: false,
    offsetX: 0,
    offsetY: 0,
    role: defaults.role,
  };
}

/**
 * Collapse whitespace and cut to maxLength, marking the cut with "...".
 */
export function sanitizeText(text: string, maxLength: number): string {
  const collapsed = collapseWhitespace(text);
  if (charLength(collapsed) <= maxLength) return collapsed;
  if (maxLength <= 3) return takeChars(collapsed, maxLength);
  return `${takeChars(collapsed, maxLength - 3)}...`;
}

/**
 * Pick a persona other than `exclude`, or any persona when no other exists.
 */
export function pickRandomPersona(
  names: readonly string[],
  exclude: string | undefined,
  random: () => number
): string {
  const others = names.filter((name) => name !== exclude);
  const candidates = others.length > 0 ? others : names;
  const index = Math.min(candidates.length - 1, Math.floor(random() * candidates.length));
  return candidates[index];
}

/**
 * Clamp every numeric field into its range.
 */
export function clampConfig(config: RenderConfig, limits: CardLimits): RenderConfig {
  return {
    ...config,
    fontSize: Math.trunc(clamp(config.fontSize, limits.fontSizeMin, limits.fontSizeMax)),
    lineSpacing: roundTo2(clamp(config.lineSpacing, limits.lineSpacingMin, limits.lineSpacingMax)),
    offsetX: Math.trunc(clamp(config.offsetX, limits.offsetMin, limits.offsetMax)),
    offsetY: Math.trunc(clamp(config.offsetY, limits.offsetMin, limits.offsetMax)),
  };
}

/**
 * Build a fresh config for the one-shot draw command.
 *
 * Flags override defaults and numeric values are clamped. `-r -r` picks a
 * random persona. Adaptive sizing shrinks the default font size for long
 * text unless `-s` or `--daf` was given.
 */
export function configFromFlags(
  flags: DrawFlags,
  settings: CardSettings,
  vocabulary: CardVocabulary,
  random: () => number = Math.random
): RenderConfig {
  const { limits } = settings;
  const base = createDefaultConfig(settings);

  const text = flags.text !== undefined ? sanitizeText(flags.text, limits.maxTextLength) : base.text;
  if (!text) {
    throw new ValidationError("Provide the text to display.", flags.text);
  }

  let role = base.role;
  if (flags.role !== undefined) {
    if (flags.role.toLowerCase() === settings.randomPersonaFlag.toLowerCase()) {
      role = pickRandomPersona(vocabulary.personas.canonicalNames, undefined, random);
    } else {
      const resolved = vocabulary.personas.resolve(flags.role);
      if (resolved === undefined) {
        throw new ValidationError(`Unrecognized persona: ${flags.role}`, flags.role);
      }
      role = resolved;
    }
  }

  let fontSize = flags.fontSize ?? base.fontSize;
  if (settings.adaptiveTextSizing && flags.fontSize === undefined && !flags.defaultFont) {
    fontSize = calculateFontSize(text, limits.fontSizeMin, base.fontSize);
  }

  return clampConfig(
    {
      text,
      fontSize,
      lineSpacing: flags.lineSpacing ?? base.lineSpacing,
      curveEnabled: flags.curve,
      offsetX: flags.offsetX ?? base.offsetX,
      offsetY: flags.offsetY ?? base.offsetY,
      role,
    },
    limits
  );
}
