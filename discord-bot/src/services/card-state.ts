/**
 * Two-tier card state: the session tier first, the durable tier behind it.
 */

import type { CardLimits, RenderConfig, SessionKey } from "../types/card";
import { MissingStateError } from "../utils/errors";
import { logger } from "../utils/logger";
import { clampConfig } from "./card-factory";
import type { DurableStore } from "./durable-store";
import type { SessionStore } from "./session-store";

export interface CardStateOptions {
  sessions: SessionStore;
  // undefined when persistence is disabled
  durable?: DurableStore;
  ttlHours: number;
  // stored cards are clamped into these on load
  limits: CardLimits;
}

export class CardStateRepository {
  private readonly sessions: SessionStore;
  private readonly durable?: DurableStore;
  private readonly ttlHours: number;
  private readonly limits: CardLimits;

  constructor(options: CardStateOptions) {
    this.sessions = options.sessions;
    this.durable = options.durable;
    this.ttlHours = options.ttlHours;
    this.limits = options.limits;
  }

  get persistenceEnabled(): boolean {
    return this.durable !== undefined;
  }

  /**
   * Current config, or undefined when neither tier has one.
   * A durable hit is clamped into the current limits, which may have changed
   * since it was written, and promoted into the session tier.
   */
  find(key: SessionKey): RenderConfig | undefined {
    const cached = this.sessions.get(key);
    if (cached) return cached;

    const stored = this.durable?.get(key, this.ttlHours);
    if (!stored) return undefined;

    const restored = clampConfig(stored, this.limits);
    logger.debug(`Card state restored from disk: ${key.channel}:${key.identity}`);
    this.sessions.set(key, restored);
    return restored;
  }

  require(key: SessionKey): RenderConfig {
    const config = this.find(key);
    if (!config) {
      throw new MissingStateError();
    }
    return config;
  }

  save(key: SessionKey, config: RenderConfig): void {
    this.sessions.set(key, config);
    this.durable?.set(key, config);
  }

  /**
   * Remove the key from both tiers. True when either tier had it.
   */
  delete(key: SessionKey): boolean {
    const fromSession = this.sessions.delete(key);
    const fromDisk = this.durable?.delete(key) ?? false;
    return fromSession || fromDisk;
  }
}
