/**
 * Delivery Runtime — Core Types
 *
 * Everything the agent-side loop talks to: the queue (over HTTP or in
 * process), the delivery executor and the credential store.
 */

import type { Role } from '../db/adapter.js';
import type { Outcome } from '../engine/queue.js';

// ─── Delivery ────────────────────────────────────────────

export type DeliveryResult =
  | { status: 'success' }
  | { status: 'transient_failure'; reason: string }
  | { status: 'permanent_failure'; reason: string };

/**
 * The mechanism that actually hands a message to its destination.
 * `signal` aborts when the delivery timeout elapses.
 */
export interface DeliveryExecutor {
  deliver(destination: string, body: string, signal: AbortSignal): Promise<DeliveryResult>;
}

// ─── Queue Access ────────────────────────────────────────

export interface SenderCredentials {
  senderId: string;
  secret: string;
}

export interface RegistrationRequest {
  code: string;
  displayName: string;
  destinationAddress: string;
  role: Role;
}

export interface LeasedMessage {
  id: string;
  destination: string;
  body: string;
  leaseToken: string;
  leaseExpiresAt: string | null;
  attemptCount: number;
}

export interface DequeueBatch {
  messages: LeasedMessage[];
  hasMore: boolean;
}

export interface OutcomeReport {
  messageId: string;
  leaseToken: string;
  outcome: Outcome;
  errorDetail?: string | null;
}

/** Agent's view of the queue. Clients hold no credentials of their own. */
export interface QueueClient {
  register(req: RegistrationRequest): Promise<SenderCredentials>;
  heartbeat(creds: SenderCredentials): Promise<void>;
  dequeue(creds: SenderCredentials, req: { maxBatch: number; leaseSeconds?: number }): Promise<DequeueBatch>;
  reportOutcome(creds: SenderCredentials, report: OutcomeReport): Promise<void>;
}

export interface CredentialStore {
  load(): Promise<SenderCredentials | null>;
  save(creds: SenderCredentials): Promise<void>;
}

// ─── Coordinator ─────────────────────────────────────────

export type CoordinatorState = 'starting' | 'registering' | 'polling' | 'delivering' | 'stopped';

export interface CoordinatorStats {
  delivered: number;
  failed: number;
  /** Leases skipped or whose report was given up on; the server reclaims them on expiry */
  leasesAbandoned: number;
  polls: number;
}
