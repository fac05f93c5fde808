/**
 * Command text tokenizing and numeric parsing.
 *
 * Adjustment commands look like `<command[.variant]...> <remainder>`,
 * e.g. "font.up", "position left 24", "role hatsune miku".
 */

import { ValidationError } from "./errors";

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Split a message into its first token and the rest.
 * "font.up  2" -> ["font.up", "2"]; blank input -> ["", ""].
 */
export function extractFirstToken(message: string): [string, string] {
  const sanitized = message.trim();
  if (!sanitized) return ["", ""];

  const match = /\s+/.exec(sanitized);
  if (!match) return [sanitized, ""];
  return [sanitized.slice(0, match.index), sanitized.slice(match.index + match[0].length)];
}

/**
 * Split a dotted command token into head and variants, dropping empty segments.
 * "position.left" -> ["position", ["left"]]; "..." -> ["", []].
 */
export function splitDotted(token: string): [string, string[]] {
  const pieces = token.split(".").filter((segment) => segment.length > 0);
  if (pieces.length === 0) return ["", []];
  return [pieces[0], pieces.slice(1)];
}

export function splitArgs(text: string): string[] {
  if (!text) return [];
  return text.split(/\s+/).filter((part) => part.length > 0);
}

/**
 * Whitespace split that keeps double-quoted substrings together.
 * Quotes stay on the token; callers strip them.
 */
export function splitQuoted(text: string): string[] {
  if (!text) return [];
  return text.match(/(?:[^\s"]+|"[^"]*")+/g) ?? [];
}

export function stripQuotes(token: string): string {
  return token.replace(/^"+|"+$/g, "");
}

/**
 * Length in characters (code points), so an emoji counts once.
 */
export function charLength(text: string): number {
  return [...text].length;
}

/**
 * First `count` characters, never splitting a surrogate pair.
 */
export function takeChars(text: string, count: number): string {
  return [...text].slice(0, count).join("");
}

/**
 * Collapse whitespace runs to single spaces and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

/**
 * Parse an integer, tolerating a "px" unit and full-width signs.
 * Decimal input is truncated toward zero ("12.9" -> 12).
 */
export function parseInteger(raw: string): number {
  const sanitized = raw
    .trim()
    .toLowerCase()
    .replace(/px$/, "")
    .replace(/＋/g, "+")
    .replace(/－/g, "-")
    .trim();

  if (!DECIMAL_PATTERN.test(sanitized)) {
    throw new ValidationError(`Could not parse a number from: ${raw}`, raw);
  }
  const value = Math.trunc(Number(sanitized));
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Could not parse a number from: ${raw}`, raw);
  }
  return value === 0 ? 0 : value; // no -0
}

export function parsePositiveInteger(raw: string): number {
  const value = parseInteger(raw);
  if (value <= 0) {
    throw new ValidationError("Step amount must be a positive integer.", raw);
  }
  return value;
}

/**
 * Parse a decimal, tolerating a multiplier marker ("1.5x", "1.5倍")
 * and a decimal comma ("1,5").
 */
export function parseDecimal(raw: string): number {
  const sanitized = raw
    .trim()
    .toLowerCase()
    .replace(/[x×倍]/g, "")
    .replace(/,/g, ".")
    .trim();

  if (!DECIMAL_PATTERN.test(sanitized)) {
    throw new ValidationError(`Could not parse a number from: ${raw}`, raw);
  }
  const value = Number(sanitized);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Could not parse a number from: ${raw}`, raw);
  }
  return value;
}

/**
 * Options accepted by the one-shot draw command.
 * Fields left undefined fall back to defaults.
 */
export interface DrawFlags {
  text?: string;
  offsetX?: number;
  offsetY?: number;
  role?: string;
  fontSize?: number;
  lineSpacing?: number;
  curve: boolean;
  defaultFont: boolean;
}

/**
 * Parse `-n "text" -s 48 -c -x 12 -y -6 -r miku -l 1.8 --daf`.
 * Value flags with an unparsable value are ignored, as are unknown flags.
 */
export function parseDrawFlags(args: string): DrawFlags {
  const flags: DrawFlags = { curve: false, defaultFont: false };
  const parts = splitQuoted(args);

  const strictInt = (value: string): number | undefined =>
    INTEGER_PATTERN.test(value) ? Number(value) : undefined;
  const strictDecimal = (value: string): number | undefined =>
    DECIMAL_PATTERN.test(value) ? Number(value) : undefined;

  let i = 0;
  while (i < parts.length) {
    const part = stripQuotes(parts[i]);
    const next = i + 1 < parts.length ? parts[i + 1] : undefined;

    if (next !== undefined && part === "-n") {
      flags.text = stripQuotes(next);
      i += 2;
    } else if (next !== undefined && part === "-x") {
      flags.offsetX = strictInt(next) ?? flags.offsetX;
      i += 2;
    } else if (next !== undefined && part === "-y") {
      flags.offsetY = strictInt(next) ?? flags.offsetY;
      i += 2;
    } else if (next !== undefined && part === "-r") {
      flags.role = stripQuotes(next);
      i += 2;
    } else if (next !== undefined && part === "-s") {
      flags.fontSize = strictInt(next) ?? flags.fontSize;
      i += 2;
    } else if (next !== undefined && part === "-l") {
      flags.lineSpacing = strictDecimal(next) ?? flags.lineSpacing;
      i += 2;
    } else if (part === "-c") {
      flags.curve = true;
      i += 1;
    } else if (part === "--daf") {
      flags.defaultFont = true;
      i += 1;
    } else {
      i += 1;
    }
  }

  return flags;
}

const DRAW_FLAGS: ReadonlySet<string> = new Set(["-n", "-s", "-l", "-c", "-x", "-y", "-r", "--daf"]);

/**
 * True when the input opens with a known draw flag. Text such as "-_-" or
 * "- hello" is plain card text.
 */
export function looksLikeFlags(args: string): boolean {
  const [first] = extractFirstToken(args);
  return DRAW_FLAGS.has(first);
}
