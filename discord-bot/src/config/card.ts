/**
 * Card limits and defaults.
 */

import type { CardSettings } from "../types/card";

export const DEFAULT_CARD_SETTINGS: CardSettings = {
  limits: {
    fontSizeMin: 18,
    fontSizeMax: 84,
    fontSizeStep: 4,
    lineSpacingMin: 0.6,
    lineSpacingMax: 3.0,
    lineSpacingStep: 0.1,
    offsetMin: -240,
    offsetMax: 240,
    offsetStep: 12,
    maxTextLength: 120,
  },
  defaults: {
    text: "This is a new card",
    fontSize: 42,
    lineSpacing: 1.2,
    role: "Hatsune Miku",
  },
  render: {
    curveIntensity: 0.5,
    shadowEnabled: true,
    emojiSet: "apple",
  },
  adaptiveTextSizing: true,
  showSuccessMessages: true,
  randomPersonaFlag: "-r",
};

/**
 * Check that ranges are ordered, steps positive, and defaults in range.
 * Throws on the first problem.
 */
export function validateCardSettings(settings: CardSettings, personaNames: readonly string[]): CardSettings {
  const { limits, defaults, render } = settings;

  const requireRange = (name: string, min: number, max: number, step: number): void => {
    if (!(min <= max)) {
      throw new Error(`Invalid ${name} range: ${min} > ${max}`);
    }
    if (!(step > 0)) {
      throw new Error(`Invalid ${name} step: ${step} (must be positive)`);
    }
  };

  requireRange("font size", limits.fontSizeMin, limits.fontSizeMax, limits.fontSizeStep);
  requireRange("line spacing", limits.lineSpacingMin, limits.lineSpacingMax, limits.lineSpacingStep);
  requireRange("offset", limits.offsetMin, limits.offsetMax, limits.offsetStep);

  if (!Number.isInteger(limits.maxTextLength) || limits.maxTextLength < 1) {
    throw new Error(`Invalid max text length: ${limits.maxTextLength}`);
  }
  if (defaults.fontSize < limits.fontSizeMin || defaults.fontSize > limits.fontSizeMax) {
    throw new Error(`Default font size ${defaults.fontSize} is outside ${limits.fontSizeMin}-${limits.fontSizeMax}`);
  }
  if (defaults.lineSpacing < limits.lineSpacingMin || defaults.lineSpacing > limits.lineSpacingMax) {
    throw new Error(
      `Default line spacing ${defaults.lineSpacing} is outside ${limits.lineSpacingMin}-${limits.lineSpacingMax}`
    );
  }
  if (!defaults.text.trim()) {
    throw new Error("Default card text cannot be empty");
  }
  if (!personaNames.includes(defaults.role)) {
    throw new Error(`Default persona "${defaults.role}" is not in the persona catalog`);
  }
  if (render.curveIntensity < 0 || render.curveIntensity > 1) {
    throw new Error(`Curve intensity must be between 0 and 1, got ${render.curveIntensity}`);
  }

  return settings;
}
