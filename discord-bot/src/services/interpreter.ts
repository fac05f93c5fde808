/**
 * Adjustment command interpreter.
 *
 * Turns `<command[.variant]> <remainder>` into a mutation of a RenderConfig.
 * Each rule reads the current value, computes the new one, and assigns once,
 * so a rule that throws leaves the config untouched.
 */

import type { CardLimits, CardSettings, RenderConfig } from "../types/card";
import { ValidationError } from "../utils/errors";
import { logger } from "../utils/logger";
import {
  charLength,
  collapseWhitespace,
  extractFirstToken,
  parseDecimal,
  parseInteger,
  parsePositiveInteger,
  splitArgs,
  splitDotted,
} from "../utils/tokenizer";
import { type CardVocabulary, type CommandName, type Direction, clamp, pickRandomPersona } from "./card-factory";

// Line spacing is compared in hundredths so float noise never reads as a change
const toHundredths = (value: number): number => Math.round(value * 100);
const CLAMP_EPSILON = 1e-6;

function formatSpacing(value: number): string {
  return value.toFixed(2);
}

export class CommandInterpreter {
  private readonly vocabulary: CardVocabulary;
  private readonly limits: CardLimits;
  private readonly randomFlag: string;
  private readonly random: () => number;

  constructor(vocabulary: CardVocabulary, settings: CardSettings, random: () => number = Math.random) {
    this.vocabulary = vocabulary;
    this.limits = settings.limits;
    this.randomFlag = settings.randomPersonaFlag.toLowerCase();
    this.random = random;
  }

  /**
   * Parse and apply a raw adjustment message such as "font.up" or "position left 24".
   * Returns the confirmation line.
   */
  execute(config: RenderConfig, message: string): string {
    const [first, remainder] = extractFirstToken(message);
    const [head, variants] = splitDotted(first);
    return this.apply(config, head, variants, remainder);
  }

  apply(config: RenderConfig, commandToken: string, variants: string[], remainder: string): string {
    const command = this.vocabulary.commands.resolve(commandToken);
    if (command === undefined) {
      throw new ValidationError(`Unrecognized subcommand: ${commandToken}`, commandToken);
    }

    const result = this.dispatch(command, config, variants, remainder);
    logger.debug(`Card adjusted (${command}): ${result}`);
    return result;
  }

  private dispatch(command: CommandName, config: RenderConfig, variants: string[], remainder: string): string {
    const args = splitArgs(remainder);
    const variant = variants.length > 0 ? variants[0] : undefined;

    switch (command) {
      case "text":
        return this.applyText(config, remainder);
      case "font_size":
        return this.applyFontSize(config, variant, args);
      case "line_spacing":
        return this.applyLineSpacing(config, variant, args);
      case "curve":
        return this.applyCurve(config, variant, args);
      case "position":
        return this.applyPosition(config, variant, args);
      case "role":
        return this.applyRole(config, remainder, args);
    }
  }

  private applyText(config: RenderConfig, remainder: string): string {
    const text = collapseWhitespace(remainder);
    if (!text) {
      throw new ValidationError("Provide the text to display.");
    }
    if (charLength(text) > this.limits.maxTextLength) {
      throw new ValidationError(`Text cannot be longer than ${this.limits.maxTextLength} characters.`, text);
    }
    config.text = text;
    return "📝 Text updated";
  }

  private applyFontSize(config: RenderConfig, variant: string | undefined, args: string[]): string {
    const { fontSizeMin: min, fontSizeMax: max, fontSizeStep: step } = this.limits;

    if (variant !== undefined) {
      const action = this.vocabulary.sizeVariants.resolve(variant);
      if (action === undefined) {
        throw new ValidationError(`Unrecognized font size adjustment: ${variant}`, variant);
      }
      const previous = config.fontSize;
      const next = Math.trunc(clamp(action === "increase" ? previous + step : previous - step, min, max));
      config.fontSize = next;
      if (next === previous) {
        const bound = action === "increase" ? "upper" : "lower";
        return `🔠 Font size is already at the ${bound} bound (${next}px)`;
      }
      return `🔠 Font size ${action === "increase" ? "increased" : "decreased"} to ${next}px`;
    }

    if (args.length === 0) {
      throw new ValidationError("Provide a font size, e.g. `font 48`.");
    }
    const requested = parseInteger(args[0]);
    const next = clamp(requested, min, max);
    config.fontSize = next;
    if (next !== requested) {
      return `🔠 Font size set to ${next}px (range ${min}-${max})`;
    }
    return `🔠 Font size set to ${next}px`;
  }

  private applyLineSpacing(config: RenderConfig, variant: string | undefined, args: string[]): string {
    const { lineSpacingMin: min, lineSpacingMax: max, lineSpacingStep: step } = this.limits;

    if (variant !== undefined) {
      const action = this.vocabulary.sizeVariants.resolve(variant);
      if (action === undefined) {
        throw new ValidationError(`Unrecognized line spacing adjustment: ${variant}`, variant);
      }
      const previous = toHundredths(config.lineSpacing);
      const delta = action === "increase" ? toHundredths(step) : -toHundredths(step);
      const next = clamp(previous + delta, toHundredths(min), toHundredths(max));
      config.lineSpacing = next / 100;
      if (next === previous) {
        const bound = action === "increase" ? "upper" : "lower";
        return `📏 Line spacing is already at the ${bound} bound (${formatSpacing(config.lineSpacing)})`;
      }
      const verb = action === "increase" ? "increased" : "decreased";
      return `📏 Line spacing ${verb} to ${formatSpacing(config.lineSpacing)}`;
    }

    if (args.length === 0) {
      throw new ValidationError("Provide a line spacing, e.g. `spacing 1.8`.");
    }
    const requested = parseDecimal(args[0]);
    const bounded = clamp(requested, min, max);
    config.lineSpacing = toHundredths(bounded) / 100;
    if (Math.abs(bounded - requested) > CLAMP_EPSILON) {
      return `📏 Line spacing set to ${formatSpacing(config.lineSpacing)} (range ${formatSpacing(min)}-${formatSpacing(max)})`;
    }
    return `📏 Line spacing set to ${formatSpacing(config.lineSpacing)}`;
  }

  private applyCurve(config: RenderConfig, variant: string | undefined, args: string[]): string {
    const { curveVariants } = this.vocabulary;
    const action = curveVariants.resolve(variant) ?? (args.length > 0 ? curveVariants.resolve(args[0]) : undefined) ?? "toggle";

    const next = action === "on" ? true : action === "off" ? false : !config.curveEnabled;
    config.curveEnabled = next;
    return next ? "〰️ Curve enabled" : "〰️ Curve disabled";
  }

  private applyPosition(config: RenderConfig, variant: string | undefined, args: string[]): string {
    const { directions } = this.vocabulary;
    let remaining = args;
    let direction: Direction | undefined = directions.resolve(variant);

    if (direction === undefined && remaining.length > 0) {
      direction = directions.resolve(remaining[0]);
      if (direction !== undefined) remaining = remaining.slice(1);
    }
    if (direction === undefined) {
      throw new ValidationError("Specify a direction, e.g. `position.up` or `position left 24`.", variant ?? args[0]);
    }

    const amount = remaining.length > 0 ? parsePositiveInteger(remaining[0]) : this.limits.offsetStep;
    const { offsetMin: min, offsetMax: max } = this.limits;

    const vertical = direction === "up" || direction === "down";
    const sign = direction === "up" || direction === "left" ? -1 : 1;
    const axis = vertical ? "Y" : "X";
    const previous = vertical ? config.offsetY : config.offsetX;
    const next = clamp(previous + sign * amount, min, max);
    const applied = Math.abs(next - previous);

    if (vertical) {
      config.offsetY = next;
    } else {
      config.offsetX = next;
    }

    if (applied === 0) {
      const edge = { up: "top", down: "bottom", left: "left", right: "right" }[direction];
      return `📍 Reached the ${edge} boundary (${axis}=${next})`;
    }
    return `📍 Moved ${direction} ${applied}px, now ${axis}=${next}`;
  }

  private applyRole(config: RenderConfig, remainder: string, args: string[]): string {
    const { personas } = this.vocabulary;

    if (args.length > 0 && args[0].toLowerCase() === this.randomFlag) {
      const next = pickRandomPersona(personas.canonicalNames, config.role, this.random);
      config.role = next;
      return `🧑‍🎤 Persona randomly switched to ${next}`;
    }

    const candidate = remainder.trim();
    if (!candidate) {
      throw new ValidationError("Provide a persona name, or use -r for a random one.");
    }
    const resolved = personas.resolve(candidate);
    if (resolved === undefined) {
      throw new ValidationError(`Unrecognized persona: ${candidate}`, candidate);
    }
    config.role = resolved;
    return `🧑‍🎤 Persona switched to ${resolved}`;
  }
}
