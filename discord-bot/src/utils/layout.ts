/**
 * Text layout estimates used for adaptive font sizing.
 */

import { charLength } from "./tokenizer";

// Average glyph width as a fraction of the font size
const CHAR_WIDTH_RATIO = 0.6;

export const DEFAULT_TARGET_WIDTH = 400;

/**
 * Longest non-blank line of a multi-line text ("" when there is none).
 */
export function findLongestLine(text: string): string {
  if (!text) return "";

  const lines = text.split("\n").filter((line) => line.trim().length > 0);
  let longest = "";
  for (const line of lines) {
    if (charLength(line) > charLength(longest)) longest = line;
  }
  return longest;
}

/**
 * Largest font size in [minSize, maxSize] at which the longest line is
 * estimated to fit within targetWidth pixels.
 */
export function calculateFontSize(
  text: string,
  minSize: number,
  maxSize: number,
  targetWidth: number = DEFAULT_TARGET_WIDTH
): number {
  const longestLine = findLongestLine(text);
  if (!longestLine) return maxSize;

  const estimatedWidth = charLength(longestLine) * CHAR_WIDTH_RATIO * maxSize;
  if (estimatedWidth <= targetWidth) return maxSize;

  const scaled = Math.trunc(maxSize * (targetWidth / estimatedWidth));
  return Math.max(minSize, Math.min(maxSize, scaled));
}
