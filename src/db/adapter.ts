/**
 * Database Adapter Interface
 *
 * All durable state goes through this interface: senders, one-time
 * registration codes, permission grants and queued messages.
 *
 * Every method that touches more than one invariant (dedupe + insert,
 * select + lease flip, code consumption + sender insert) runs as one
 * write transaction inside the adapter. Policy decisions are made by the
 * engine and handed in as values or synchronous callbacks that run inside
 * that transaction; throwing from a callback rolls the transaction back.
 */

import type { RetryOptions } from '../lib/resilience.js';

// ─── Types ───────────────────────────────────────────────────

export type DatabaseType = 'sqlite';

export interface DatabaseConfig {
  type: DatabaseType;
  /** File path, or ':memory:' */
  connectionString?: string;
  database?: string;
  /** How long SQLite waits on a locked database before reporting contention */
  busyTimeoutMs?: number;
  /** Backoff used when a write still hits contention */
  contentionRetry?: Partial<RetryOptions>;
}

export type Role = 'base' | 'lead' | 'senior' | 'admin';

export const ROLES: readonly Role[] = ['base', 'lead', 'senior', 'admin'];

/** Seniority used by the role matrix and role-gated routes */
export const ROLE_RANK: Record<Role, number> = {
  base: 0,
  lead: 1,
  senior: 2,
  admin: 3,
};

export function isRole(value: unknown): value is Role {
  return ROLES.some(role => role === value);
}

export interface Sender {
  id: string;
  displayName: string;
  destinationAddress: string;
  role: Role;
  /** The principal whose own identity this sender represents */
  principalId: string;
  /** Co-located with the requester-facing service rather than polled remotely */
  isLocal: boolean;
  lastHeartbeatAt: Date | null;
  registeredAt: Date;
  disabledAt: Date | null;
}

export interface SenderRecord extends Sender {
  secretHash: string;
}

export interface RegistrationCode {
  id: string;
  principalId: string;
  maxRole: Role;
  isLocal: boolean;
  issuedBy: string;
  createdAt: Date;
  expiresAt: Date;
  usedAt: Date | null;
  usedBySenderId: string | null;
}

export interface RegistrationCodeInput {
  id: string;
  codeHash: string;
  principalId: string;
  maxRole: Role;
  isLocal: boolean;
  issuedBy: string;
  createdAt: Date;
  expiresAt: Date;
}

export interface RegisterSenderInput {
  id: string;
  codeHash: string;
  displayName: string;
  destinationAddress: string;
  role: Role;
  secretHash: string;
  now: Date;
  /** Runs against the unused, unexpired code inside the transaction; throw to refuse */
  checkCode: (code: RegistrationCode) => void;
}

export type GrantStatus = 'pending' | 'active' | 'revoked';

export interface PermissionGrant {
  id: string;
  principalId: string;
  senderId: string;
  status: GrantStatus;
  reason: string | null;
  requestedAt: Date;
  grantedBy: string | null;
  grantedAt: Date | null;
  revokedAt: Date | null;
}

export interface GrantInput {
  id: string;
  principalId: string;
  senderId: string;
  reason?: string | null;
  now: Date;
}

export interface GrantFilters {
  status?: GrantStatus;
  principalId?: string;
  senderId?: string;
}

export type MessageStatus = 'queued' | 'leased' | 'sent' | 'failed';

export interface QueuedMessage {
  id: string;
  senderId: string;
  destination: string;
  body: string;
  requestedBy: string;
  idempotencyKey: string;
  status: MessageStatus;
  leaseToken: string | null;
  leaseExpiresAt: Date | null;
  /** Earliest time a retried row may be leased again */
  notBefore: Date | null;
  attemptCount: number;
  maxAttempts: number;
  createdAt: Date;
  leasedAt: Date | null;
  terminalAt: Date | null;
  errorDetail: string | null;
  cancelRequestedAt: Date | null;
  /** Failed row this one was requeued from */
  retryOf: string | null;
}

export interface NewMessageInput {
  id: string;
  senderId: string;
  destination: string;
  body: string;
  requestedBy: string;
  idempotencyKey: string;
  maxAttempts: number;
  attemptCount?: number;
  retryOf?: string | null;
  now: Date;
}

export type InsertMessageResult =
  | { inserted: true; message: QueuedMessage }
  | { inserted: false; existing: QueuedMessage };

export interface LeaseInput {
  senderId: string;
  maxBatch: number;
  leaseMs: number;
  now: Date;
  /** Eligible rows created before this instant are failed as "expired" first */
  expireBefore?: Date | null;
  newLeaseToken: () => string;
}

export interface LeaseResult {
  messages: QueuedMessage[];
  hasMore: boolean;
  expired: number;
  cancelled: number;
}

export type MessagePatch = Partial<Pick<QueuedMessage,
  | 'status' | 'leaseToken' | 'leaseExpiresAt' | 'notBefore' | 'attemptCount'
  | 'terminalAt' | 'errorDetail' | 'cancelRequestedAt'>>;

export interface MessageFilters {
  senderId?: string;
  status?: MessageStatus;
  limit?: number;
  offset?: number;
}

export interface QueueStats {
  total: number;
  queued: number;
  leased: number;
  sent: number;
  failed: number;
}

// ─── Abstract Adapter ────────────────────────────────────────

export abstract class DatabaseAdapter {
  abstract readonly type: DatabaseType;

  // Connection lifecycle
  abstract connect(config: DatabaseConfig): Promise<void>;
  abstract disconnect(): Promise<void>;
  abstract migrate(): Promise<void>;
  abstract isConnected(): boolean;
  /** Cheap round trip for health checks */
  abstract ping(): Promise<void>;

  // Registration codes
  abstract createRegistrationCode(input: RegistrationCodeInput): Promise<RegistrationCode>;

  // Senders
  /** Consumes the code and inserts the sender atomically. */
  abstract registerSender(input: RegisterSenderInput): Promise<SenderRecord>;
  abstract getSender(id: string): Promise<SenderRecord | null>;
  abstract listSenders(options?: { includeDisabled?: boolean }): Promise<Sender[]>;
  abstract touchHeartbeat(id: string, at: Date): Promise<void>;
  abstract disableSender(id: string, at: Date): Promise<Sender | null>;

  // Permission grants
  /** Returns the principal's live (pending or active) grant for the sender, inserting a pending one if none exists. */
  abstract requestGrant(input: GrantInput): Promise<PermissionGrant>;
  /** Activates a pending grant or inserts an active one. */
  abstract activateGrant(input: GrantInput & { grantedBy: string }): Promise<PermissionGrant>;
  abstract approveGrant(id: string, grantedBy: string, now: Date): Promise<PermissionGrant | null>;
  abstract revokeGrant(id: string, now: Date): Promise<PermissionGrant | null>;
  abstract getGrant(id: string): Promise<PermissionGrant | null>;
  abstract findActiveGrant(principalId: string, senderId: string): Promise<PermissionGrant | null>;
  abstract listGrants(filters?: GrantFilters): Promise<PermissionGrant[]>;

  // Messages
  /** Rejects unknown or disabled senders, then dedupes on (sender, key) among non-terminal rows. */
  abstract insertMessage(input: NewMessageInput): Promise<InsertMessageResult>;
  abstract leaseMessages(input: LeaseInput): Promise<LeaseResult>;
  /** Loads the row under the write lock and applies the patch `fn` returns (null = no change). */
  abstract transitionMessage(
    id: string,
    fn: (current: QueuedMessage | null) => MessagePatch | null,
  ): Promise<QueuedMessage | null>;
  abstract expireMessages(senderId: string, createdBefore: Date, now: Date): Promise<number>;
  abstract getMessage(id: string): Promise<QueuedMessage | null>;
  abstract listMessages(filters?: MessageFilters): Promise<QueuedMessage[]>;
  abstract getQueueStats(senderId?: string): Promise<QueueStats>;
}
