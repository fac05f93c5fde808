/**
 * Session key resolution.
 */

import type { RequesterIdentity, SessionKey } from "../types/card";

export const DISCORD_CHANNEL = "discord";

function present(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Pick the best available identity: explicit session id, then sender id,
 * then sender display name.
 */
export function resolveSessionKey(channel: string, requester: RequesterIdentity): SessionKey {
  const identity = [requester.sessionId, requester.senderId, requester.senderName].find(present);
  if (identity === undefined) {
    throw new TypeError("Requester has no session id, sender id or sender name");
  }
  return assertSessionKey({ channel, identity: identity.trim() });
}

export function assertSessionKey(key: SessionKey): SessionKey {
  if (!present(key.channel) || !present(key.identity)) {
    throw new TypeError(`Malformed session key: ${JSON.stringify(key)}`);
  }
  return key;
}

/**
 * "<channel>:<identity>", the key used by both store tiers.
 */
export function sessionKeyString(key: SessionKey): string {
  assertSessionKey(key);
  return `${key.channel}:${key.identity}`;
}
