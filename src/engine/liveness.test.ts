import { describe, it, expect } from 'vitest';
import { isOnline, livenessOf } from './liveness.js';

const seen = new Date('2026-01-05T09:00:00.000Z');
const after = (ms: number) => new Date(seen.getTime() + ms);

describe('liveness', () => {
  it('treats a sender that never sent a heartbeat as offline', () => {
    expect(livenessOf({ lastHeartbeatAt: null }, seen)).toEqual({ isOnline: false, lastSeenMs: null });
  });

  it('is online strictly inside the threshold', () => {
    expect(isOnline({ lastHeartbeatAt: seen }, after(29_999))).toBe(true);
    expect(livenessOf({ lastHeartbeatAt: seen }, after(30_000))).toEqual({ isOnline: false, lastSeenMs: 30_000 });
  });

  it('takes a custom threshold', () => {
    expect(isOnline({ lastHeartbeatAt: seen }, after(45_000), 60_000)).toBe(true);
  });
});
