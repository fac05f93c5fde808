/**
 * Periodic card state cleanup.
 *
 * Expiry is already checked on every read; this sweep only keeps the state
 * file and the session map from growing with abandoned cards.
 */

import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import type { DurableStore } from "./durable-store";
import type { SessionStore } from "./session-store";

const MS_PER_HOUR = 60 * 60 * 1000;

export interface CleanupTargets {
  sessions: SessionStore;
  durable?: DurableStore;
  ttlHours: number;
}

export interface CleanupResult {
  evictedSessions: number;
  expiredStates: number;
}

/**
 * Run one cleanup cycle. Sessions idle for longer than the TTL are evicted
 * from memory; expired entries are removed from the state file.
 */
export function runCleanup(targets: CleanupTargets, nowMs = Date.now()): CleanupResult {
  const evictedSessions = targets.sessions.evictIdle(targets.ttlHours * MS_PER_HOUR, nowMs);
  const expiredStates = targets.durable?.cleanupExpired(targets.ttlHours) ?? 0;

  if (evictedSessions > 0 || expiredStates > 0) {
    logger.info(`Cleanup evicted ${evictedSessions} idle sessions, removed ${expiredStates} expired card states`);
  }
  return { evictedSessions, expiredStates };
}

/**
 * Start the cleanup schedule. Returns a stop function.
 */
export function startCleanupSchedule(targets: CleanupTargets, intervalMs: number): () => void {
  const timer = setInterval(() => {
    try {
      runCleanup(targets);
    } catch (error) {
      logger.error(`Card state cleanup failed: ${errorMessage(error)}`);
    }
  }, intervalMs);
  timer.unref();

  logger.info(`Card state cleanup scheduled every ${Math.round(intervalMs / 60000)} minutes`);
  return () => clearInterval(timer);
}
