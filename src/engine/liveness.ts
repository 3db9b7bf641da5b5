import type { Sender } from '../db/adapter.js';

export const DEFAULT_OFFLINE_THRESHOLD_MS = 30_000;

export interface Liveness {
  isOnline: boolean;
  /** Milliseconds since the last heartbeat, null if none was ever received */
  lastSeenMs: number | null;
}

/**
 * Online iff a heartbeat arrived less than `thresholdMs` ago. Computed
 * from the stored timestamp on every read; nothing ever marks a sender
 * offline.
 */
export function isOnline(
  sender: Pick<Sender, 'lastHeartbeatAt'>,
  now: Date,
  thresholdMs: number = DEFAULT_OFFLINE_THRESHOLD_MS,
): boolean {
  if (!sender.lastHeartbeatAt) return false;
  return now.getTime() - sender.lastHeartbeatAt.getTime() < thresholdMs;
}

export function livenessOf(
  sender: Pick<Sender, 'lastHeartbeatAt'>,
  now: Date,
  thresholdMs: number = DEFAULT_OFFLINE_THRESHOLD_MS,
): Liveness {
  return {
    isOnline: isOnline(sender, now, thresholdMs),
    lastSeenMs: sender.lastHeartbeatAt ? now.getTime() - sender.lastHeartbeatAt.getTime() : null,
  };
}
