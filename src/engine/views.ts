/**
 * JSON shapes returned by the HTTP API. Secret hashes never leave the
 * store layer; lease tokens only go to the agent holding the lease.
 */

import type { PermissionGrant, QueuedMessage } from '../db/adapter.js';
import type { SenderView } from './registry.js';
import type { EnqueueResult, BatchItemResult } from './queue.js';

const iso = (d: Date | null): string | null => (d ? d.toISOString() : null);

export function senderJson(s: SenderView) {
  return {
    id: s.id,
    displayName: s.displayName,
    destinationAddress: s.destinationAddress,
    role: s.role,
    principalId: s.principalId,
    isLocal: s.isLocal,
    isOnline: s.isOnline,
    lastSeenMs: s.lastSeenMs,
    lastHeartbeatAt: iso(s.lastHeartbeatAt),
    registeredAt: s.registeredAt.toISOString(),
    disabledAt: iso(s.disabledAt),
  };
}

export function grantJson(g: PermissionGrant) {
  return {
    id: g.id,
    principalId: g.principalId,
    senderId: g.senderId,
    status: g.status,
    reason: g.reason,
    requestedAt: g.requestedAt.toISOString(),
    grantedBy: g.grantedBy,
    grantedAt: iso(g.grantedAt),
    revokedAt: iso(g.revokedAt),
  };
}

export function messageJson(m: QueuedMessage) {
  return {
    id: m.id,
    senderId: m.senderId,
    destination: m.destination,
    body: m.body,
    requestedBy: m.requestedBy,
    idempotencyKey: m.idempotencyKey,
    status: m.status,
    attemptCount: m.attemptCount,
    maxAttempts: m.maxAttempts,
    notBefore: iso(m.notBefore),
    createdAt: m.createdAt.toISOString(),
    leasedAt: iso(m.leasedAt),
    leaseExpiresAt: iso(m.leaseExpiresAt),
    terminalAt: iso(m.terminalAt),
    errorDetail: m.errorDetail,
    cancelRequested: m.cancelRequestedAt !== null,
    retryOf: m.retryOf,
  };
}

/** What an agent needs to deliver and report one leased message. */
export function leasedMessageJson(m: QueuedMessage) {
  return {
    id: m.id,
    destination: m.destination,
    body: m.body,
    leaseToken: m.leaseToken ?? '',
    leaseExpiresAt: iso(m.leaseExpiresAt),
    attemptCount: m.attemptCount,
  };
}

export function enqueueResultJson(r: EnqueueResult | BatchItemResult) {
  switch (r.status) {
    case 'queued':
      return { status: r.status, message: messageJson(r.message) };
    case 'duplicate':
      return { status: r.status, existingId: r.existingId };
    case 'rejected':
      return { status: r.status, code: r.code, error: r.error };
  }
}
