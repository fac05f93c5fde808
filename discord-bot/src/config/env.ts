/**
 * Environment configuration for the card bot.
 */

import type { CardSettings } from "../types/card";
import { DEFAULT_CARD_SETTINGS, validateCardSettings } from "./card";
import { DEFAULT_PERSONA_CATALOG } from "./personas";

export type SessionScope = "user" | "channel";

export interface Config {
  discord: {
    token: string;
    applicationId: string;
    sessionScope: SessionScope; // "channel": everyone in a channel edits one card
  };
  renderer: {
    url: string;
    timeoutMs: number;
  };
  storage: {
    path: string;
    persistenceEnabled: boolean;
    ttlHours: number;
    cleanupIntervalMinutes: number; // 0 disables the sweep
  };
  card: CardSettings;
  health: {
    port: number;
  };
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, name: string, defaultValue?: string): string {
  const value = env[name] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function getNumber(env: Env, name: string, defaultValue: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return defaultValue;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${name} must be a number, got "${raw}"`);
  }
  return value;
}

function getInteger(env: Env, name: string, defaultValue: number): number {
  const value = getNumber(env, name, defaultValue);
  if (!Number.isInteger(value)) {
    throw new Error(`Environment variable ${name} must be an integer, got "${env[name]}"`);
  }
  return value;
}

function getNonNegative(env: Env, name: string, defaultValue: number): number {
  const value = getNumber(env, name, defaultValue);
  if (value < 0) {
    throw new Error(`Environment variable ${name} cannot be negative, got "${env[name]}"`);
  }
  return value;
}

function getBoolean(env: Env, name: string, defaultValue: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return defaultValue;
  switch (raw.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
    case "on":
      return true;
    case "false":
    case "0":
    case "no":
    case "off":
      return false;
    default:
      throw new Error(`Environment variable ${name} must be true or false, got "${raw}"`);
  }
}

function getSessionScope(env: Env): SessionScope {
  const raw = getEnvVar(env, "CARD_SESSION_SCOPE", "user").trim().toLowerCase();
  if (raw === "user" || raw === "channel") return raw;
  throw new Error(`CARD_SESSION_SCOPE must be "user" or "channel", got "${raw}"`);
}

function loadCardSettings(env: Env): CardSettings {
  const base = DEFAULT_CARD_SETTINGS;
  const settings: CardSettings = {
    limits: {
      fontSizeMin: getInteger(env, "CARD_FONT_SIZE_MIN", base.limits.fontSizeMin),
      fontSizeMax: getInteger(env, "CARD_FONT_SIZE_MAX", base.limits.fontSizeMax),
      fontSizeStep: getInteger(env, "CARD_FONT_SIZE_STEP", base.limits.fontSizeStep),
      lineSpacingMin: getNumber(env, "CARD_LINE_SPACING_MIN", base.limits.lineSpacingMin),
      lineSpacingMax: getNumber(env, "CARD_LINE_SPACING_MAX", base.limits.lineSpacingMax),
      lineSpacingStep: getNumber(env, "CARD_LINE_SPACING_STEP", base.limits.lineSpacingStep),
      offsetMin: getInteger(env, "CARD_OFFSET_MIN", base.limits.offsetMin),
      offsetMax: getInteger(env, "CARD_OFFSET_MAX", base.limits.offsetMax),
      offsetStep: getInteger(env, "CARD_OFFSET_STEP", base.limits.offsetStep),
      maxTextLength: getInteger(env, "CARD_MAX_TEXT_LENGTH", base.limits.maxTextLength),
    },
    defaults: {
      text: getEnvVar(env, "CARD_DEFAULT_TEXT", base.defaults.text),
      fontSize: getInteger(env, "CARD_DEFAULT_FONT_SIZE", base.defaults.fontSize),
      lineSpacing: getNumber(env, "CARD_DEFAULT_LINE_SPACING", base.defaults.lineSpacing),
      role: getEnvVar(env, "CARD_DEFAULT_PERSONA", base.defaults.role),
    },
    render: {
      curveIntensity: getNumber(env, "CARD_CURVE_INTENSITY", base.render.curveIntensity),
      shadowEnabled: getBoolean(env, "CARD_TEXT_SHADOW", base.render.shadowEnabled),
      emojiSet: getEnvVar(env, "CARD_EMOJI_SET", base.render.emojiSet),
    },
    adaptiveTextSizing: getBoolean(env, "CARD_ADAPTIVE_TEXT_SIZING", base.adaptiveTextSizing),
    showSuccessMessages: getBoolean(env, "CARD_SHOW_SUCCESS_MESSAGES", base.showSuccessMessages),
    randomPersonaFlag: base.randomPersonaFlag,
  };

  return validateCardSettings(
    settings,
    DEFAULT_PERSONA_CATALOG.personas.map((persona) => persona.name)
  );
}

export function loadConfig(env: Env = process.env): Config {
  const timeoutMs = getInteger(env, "RENDER_TIMEOUT_MS", 30000);
  if (timeoutMs <= 0) {
    throw new Error(`RENDER_TIMEOUT_MS must be positive, got ${timeoutMs}`);
  }
  const ttlHours = getNumber(env, "CARD_STATE_TTL_HOURS", 24);
  if (ttlHours <= 0) {
    throw new Error(`CARD_STATE_TTL_HOURS must be positive, got ${ttlHours}`);
  }

  return {
    discord: {
      token: getEnvVar(env, "DISCORD_BOT_TOKEN"),
      applicationId: getEnvVar(env, "DISCORD_APPLICATION_ID"),
      sessionScope: getSessionScope(env),
    },
    renderer: {
      url: getEnvVar(env, "RENDER_SERVICE_URL", "http://localhost:8000"),
      timeoutMs,
    },
    storage: {
      path: getEnvVar(env, "CARD_STATE_PATH", "data/card-states.json"),
      persistenceEnabled: getBoolean(env, "CARD_PERSISTENCE_ENABLED", true),
      ttlHours,
      cleanupIntervalMinutes: getNonNegative(env, "CARD_CLEANUP_INTERVAL_MINUTES", 15),
    },
    card: loadCardSettings(env),
    health: {
      port: getInteger(env, "PORT", 8080),
    },
  };
}
