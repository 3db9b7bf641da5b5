/**
 * Implicit idempotency keys.
 *
 * When a requester sends no key, one is derived from the message itself
 * and a coarse time bucket: a double click or a retried POST inside the
 * same bucket collapses onto the first row, while the same text sent
 * again later (next bucket) goes through.
 */

import { createHash } from 'crypto';

export const DEFAULT_DEDUPE_WINDOW_MS = 2 * 60_000;

/** CRLF to LF, Unicode NFC, trimmed, runs of spaces/tabs collapsed. */
export function normalizeBody(body: string): string {
  return body
    .replace(/\r\n?/g, '\n')
    .normalize('NFC')
    .trim()
    .replace(/[ \t]+/g, ' ');
}

export function timeBucket(now: Date, windowMs: number): number {
  return Math.floor(now.getTime() / windowMs);
}

export function deriveIdempotencyKey(
  msg: { senderId: string; destination: string; body: string },
  now: Date,
  windowMs: number = DEFAULT_DEDUPE_WINDOW_MS,
): string {
  const material = JSON.stringify([
    msg.senderId,
    msg.destination,
    normalizeBody(msg.body),
    timeBucket(now, windowMs),
  ]);
  return createHash('sha256').update(material, 'utf8').digest('hex');
}
