/**
 * Per-session exclusivity: commands for one session key run one at a time,
 * in arrival order. Different keys never wait on each other.
 */

import type { SessionKey } from "../types/card";
import { sessionKeyString } from "../utils/identity";
import { logger } from "../utils/logger";

interface SessionQueue {
  // settles when the last queued command has finished
  tail: Promise<void>;
  // running plus waiting
  pending: number;
}

export interface SessionLockStats {
  lockedSessions: number;
  pendingCommands: number;
}

export class SessionLocks {
  private readonly queues = new Map<string, SessionQueue>();

  async run<T>(key: SessionKey, fn: () => Promise<T>): Promise<T> {
    const queueKey = sessionKeyString(key);
    const queue = this.queues.get(queueKey) ?? { tail: Promise.resolve(), pending: 0 };
    const previous = queue.tail;

    let release = (): void => {};
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    queue.tail = previous.then(() => done);
    queue.pending += 1;
    this.queues.set(queueKey, queue);

    if (queue.pending > 1) {
      logger.debug(`Session ${queueKey} busy, ${queue.pending - 1} command(s) ahead`);
    }

    await previous;
    try {
      return await fn();
    } finally {
      release();
      queue.pending -= 1;
      if (queue.pending === 0) {
        this.queues.delete(queueKey);
      }
    }
  }

  get stats(): SessionLockStats {
    let pendingCommands = 0;
    for (const queue of this.queues.values()) {
      pendingCommands += queue.pending;
    }
    return { lockedSessions: this.queues.size, pendingCommands };
  }
}
