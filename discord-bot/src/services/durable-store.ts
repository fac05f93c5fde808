/**
 * File-backed card state with TTL expiry.
 *
 * One JSON document holds every session:
 *   { "states": { "<channel>:<identity>": { "config": {...}, "timestamp": 1700000000.5 } },
 *     "last_updated": 1700000000.5 }
 *
 * A missing or corrupt document reads as empty. Write failures are logged
 * and dropped; the session tier still holds the state.
 */

import fs from "node:fs";
import path from "node:path";
import type { RenderConfig, SessionKey, StoredRenderConfig, StoredStateEntry } from "../types/card";
import { errorMessage } from "../utils/errors";
import { sessionKeyString } from "../utils/identity";
import { logger } from "../utils/logger";

const SECONDS_PER_HOUR = 3600;

type RawStates = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function toStoredConfig(config: RenderConfig): StoredRenderConfig {
  return {
    text: config.text,
    font_size: config.fontSize,
    line_spacing: config.lineSpacing,
    curve_enabled: config.curveEnabled,
    offset_x: config.offsetX,
    offset_y: config.offsetY,
    role: config.role,
  };
}

export function fromStoredConfig(raw: unknown): RenderConfig | undefined {
  if (!isRecord(raw)) return undefined;
  const { text, font_size, line_spacing, curve_enabled, offset_x, offset_y, role } = raw;
  if (
    typeof text !== "string" ||
    !isFiniteNumber(font_size) ||
    !isFiniteNumber(line_spacing) ||
    typeof curve_enabled !== "boolean" ||
    !isFiniteNumber(offset_x) ||
    !isFiniteNumber(offset_y) ||
    typeof role !== "string"
  ) {
    return undefined;
  }
  return {
    text,
    fontSize: font_size,
    lineSpacing: line_spacing,
    curveEnabled: curve_enabled,
    offsetX: offset_x,
    offsetY: offset_y,
    role,
  };
}

function readEntry(raw: unknown): { config: RenderConfig; timestamp: number } | undefined {
  if (!isRecord(raw) || !isFiniteNumber(raw.timestamp)) return undefined;
  const config = fromStoredConfig(raw.config);
  return config ? { config, timestamp: raw.timestamp } : undefined;
}

export interface DurableStoreOptions {
  filePath: string;
  // unix seconds
  now?: () => number;
}

export class DurableStore {
  readonly filePath: string;
  private readonly now: () => number;

  constructor(options: DurableStoreOptions) {
    this.filePath = options.filePath;
    this.now = options.now ?? (() => Date.now() / 1000);
  }

  /**
   * Stored config for the key, or undefined when absent, invalid or expired.
   * Expired entries are removed from the document.
   */
  get(key: SessionKey, ttlHours: number): RenderConfig | undefined {
    const storeKey = sessionKeyString(key);
    const states = this.load();
    if (!(storeKey in states)) return undefined;

    const entry = readEntry(states[storeKey]);
    if (!entry) return undefined;

    if (this.isExpired(entry.timestamp, ttlHours)) {
      delete states[storeKey];
      this.save(states);
      logger.debug(`Expired card state removed: ${storeKey}`);
      return undefined;
    }
    return entry.config;
  }

  set(key: SessionKey, config: RenderConfig): void {
    const storeKey = sessionKeyString(key);
    const states = this.load();
    const entry: StoredStateEntry = { config: toStoredConfig(config), timestamp: this.now() };
    states[storeKey] = entry;
    this.save(states);
  }

  delete(key: SessionKey): boolean {
    const storeKey = sessionKeyString(key);
    const states = this.load();
    if (!(storeKey in states)) return false;

    delete states[storeKey];
    this.save(states);
    return true;
  }

  /**
   * Remove every entry older than ttlHours. Returns the number removed.
   */
  cleanupExpired(ttlHours: number): number {
    const states = this.load();
    let removed = 0;

    for (const [storeKey, raw] of Object.entries(states)) {
      if (isRecord(raw) && isFiniteNumber(raw.timestamp) && this.isExpired(raw.timestamp, ttlHours)) {
        delete states[storeKey];
        removed += 1;
      }
    }

    if (removed > 0) this.save(states);
    return removed;
  }

  /**
   * Every structurally valid entry, expired or not.
   */
  getAll(): Map<string, RenderConfig> {
    const result = new Map<string, RenderConfig>();
    for (const [storeKey, raw] of Object.entries(this.load())) {
      const entry = readEntry(raw);
      if (entry) result.set(storeKey, entry.config);
    }
    return result;
  }

  private isExpired(timestamp: number, ttlHours: number): boolean {
    return this.now() - timestamp > ttlHours * SECONDS_PER_HOUR;
  }

  private load(): RawStates {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, "utf-8");
    } catch (error) {
      if (isRecord(error) && error.code === "ENOENT") return {};
      logger.warn(`Could not read card state file ${this.filePath}: ${errorMessage(error)}`);
      return {};
    }

    try {
      const document: unknown = JSON.parse(content);
      if (isRecord(document) && isRecord(document.states)) {
        return { ...document.states };
      }
      logger.warn(`Card state file ${this.filePath} has no 'states' map, treating as empty`);
    } catch (error) {
      logger.warn(`Card state file ${this.filePath} is not valid JSON: ${errorMessage(error)}`);
    }
    return {};
  }

  private save(states: RawStates): void {
    const document = { states, last_updated: this.now() };
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, JSON.stringify(document, null, 2), "utf-8");
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      logger.warn(`Could not write card state file ${this.filePath}: ${errorMessage(error)}`);
    }
  }
}
