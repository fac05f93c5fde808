/**
 * In-memory card state for the current process.
 */

import type { RenderConfig, SessionKey } from "../types/card";
import { sessionKeyString } from "../utils/identity";

interface SessionEntry {
  config: RenderConfig;
  updatedAtMs: number;
}

export class SessionStore {
  private readonly entries = new Map<string, SessionEntry>();

  get(key: SessionKey): RenderConfig | undefined {
    const entry = this.entries.get(sessionKeyString(key));
    return entry ? { ...entry.config } : undefined;
  }

  set(key: SessionKey, config: RenderConfig, nowMs = Date.now()): void {
    this.entries.set(sessionKeyString(key), { config: { ...config }, updatedAtMs: nowMs });
  }

  exists(key: SessionKey): boolean {
    return this.entries.has(sessionKeyString(key));
  }

  delete(key: SessionKey): boolean {
    return this.entries.delete(sessionKeyString(key));
  }

  /**
   * Drop entries not written for maxAgeMs. Returns how many were dropped.
   */
  evictIdle(maxAgeMs: number, nowMs = Date.now()): number {
    let evicted = 0;
    for (const [key, entry] of this.entries) {
      if (nowMs - entry.updatedAtMs >= maxAgeMs) {
        this.entries.delete(key);
        evicted += 1;
      }
    }
    return evicted;
  }

  get size(): number {
    return this.entries.size;
  }
}
