/**
 * Message Queue
 *
 * Durable per-sender queue between requesters and delivery agents.
 *
 *   queued ──dequeue──▶ leased ──success──▶ sent
 *     ▲                   │
 *     └──transient, under─┤──otherwise──▶ failed
 *        max_attempts     │
 *                         └──lease expires──▶ eligible again
 *
 * Every transition is one store transaction; nothing here holds state
 * between calls, so any number of server processes may share a store.
 */

import { nanoid } from 'nanoid';
import type {
  DatabaseAdapter, MessageFilters, MessagePatch, QueuedMessage, QueueStats,
} from '../db/adapter.js';
import {
  ExpiredError, ForbiddenError, InvalidLeaseError, InvalidStateError,
  MessageTooLargeError, NotFoundError, UnknownSenderError, ValidationError,
} from '../lib/errors.js';
import { backoffDelay } from '../lib/resilience.js';
import { DEFAULT_DEDUPE_WINDOW_MS, deriveIdempotencyKey } from './idempotency.js';
import { requireAdmin, type Principal } from './authorization.js';

// ─── Policy ──────────────────────────────────────────────

export interface QueuePolicy {
  maxAttempts: number;
  defaultLeaseMs: number;
  /** Upper bound on one dequeue batch */
  maxBatch: number;
  maxBodyLength: number;
  /** Width of the time bucket in implicit idempotency keys */
  dedupeWindowMs: number;
  /** Rows older than this are failed as "expired" at dequeue; null disables */
  maxAgeMs: number | null;
  retryBaseMs: number;
  retryMaxMs: number;
}

export const DEFAULT_QUEUE_POLICY: QueuePolicy = {
  maxAttempts: 3,
  defaultLeaseMs: 60_000,
  maxBatch: 100,
  maxBodyLength: 10_000,
  dedupeWindowMs: DEFAULT_DEDUPE_WINDOW_MS,
  maxAgeMs: null,
  retryBaseMs: 30_000,
  retryMaxMs: 15 * 60_000,
};

export const ERROR_EXPIRED = 'expired';
export const ERROR_CANCELLED = 'cancelled';

// ─── Types ───────────────────────────────────────────────

export interface EnqueueInput {
  senderId: string;
  destination: string;
  body: string;
  requestedBy: string;
  idempotencyKey?: string | null;
}

export type EnqueueResult =
  | { status: 'queued'; message: QueuedMessage }
  | { status: 'duplicate'; existingId: string };

export interface BatchItem {
  destination: string;
  body: string;
  idempotencyKey?: string | null;
}

export type BatchItemResult =
  | EnqueueResult
  | { status: 'rejected'; code: string; error: string };

export interface DequeueOptions {
  maxBatch: number;
  leaseMs?: number;
}

export interface DequeueResult {
  messages: QueuedMessage[];
  hasMore: boolean;
}

export type Outcome = 'success' | 'transient_failure' | 'permanent_failure';

export const OUTCOMES: readonly Outcome[] = ['success', 'transient_failure', 'permanent_failure'];

export function isOutcome(value: unknown): value is Outcome {
  return OUTCOMES.some(outcome => outcome === value);
}

export interface ReportInput {
  senderId: string;
  messageId: string;
  leaseToken: string;
  outcome: Outcome;
  errorDetail?: string | null;
}

export interface MessageQueueOptions {
  policy?: Partial<QueuePolicy>;
  clock?: () => Date;
}

// ─── Queue ───────────────────────────────────────────────

export class MessageQueue {
  readonly policy: QueuePolicy;
  private readonly clock: () => Date;

  constructor(private readonly db: DatabaseAdapter, opts: MessageQueueOptions = {}) {
    this.policy = { ...DEFAULT_QUEUE_POLICY, ...opts.policy };
    this.clock = opts.clock ?? (() => new Date());
  }

  /**
   * Queues a message, or returns the live row that already carries the
   * same idempotency key. Unknown or disabled senders fail before any
   * write.
   */
  async enqueue(input: EnqueueInput): Promise<EnqueueResult> {
    const destination = input.destination.trim();
    this.checkMessage(destination, input.body);

    const now = this.clock();
    const idempotencyKey = input.idempotencyKey?.trim()
      || deriveIdempotencyKey({ senderId: input.senderId, destination, body: input.body }, now, this.policy.dedupeWindowMs);

    const result = await this.db.insertMessage({
      id: nanoid(),
      senderId: input.senderId,
      destination,
      body: input.body,
      requestedBy: input.requestedBy,
      idempotencyKey,
      maxAttempts: this.policy.maxAttempts,
      now,
    });

    if (!result.inserted) {
      console.log(`[${now.toISOString()}] INFO [queue] Duplicate enqueue for sender ${input.senderId} collapsed onto ${result.existing.id}`);
      return { status: 'duplicate', existingId: result.existing.id };
    }
    return { status: 'queued', message: result.message };
  }

  /**
   * Queues pre-rendered (destination, body) pairs for one sender. Items
   * that fail validation are reported individually; an unknown sender
   * fails the whole batch.
   */
  async enqueueBatch(senderId: string, items: BatchItem[], requestedBy: string): Promise<BatchItemResult[]> {
    const sender = await this.db.getSender(senderId);
    if (!sender || sender.disabledAt) throw new UnknownSenderError(senderId);

    const results: BatchItemResult[] = [];
    for (const item of items) {
      try {
        results.push(await this.enqueue({ ...item, senderId, requestedBy }));
      } catch (err) {
        if (err instanceof MessageTooLargeError || err instanceof ValidationError) {
          results.push({ status: 'rejected', code: err.code, error: err.message });
          continue;
        }
        throw err;
      }
    }

    const queued = results.filter(r => r.status === 'queued').length;
    console.log(`[${this.clock().toISOString()}] INFO [queue] Batch for sender ${senderId}: ${queued}/${items.length} queued`);
    return results;
  }

  /**
   * Leases up to `maxBatch` eligible rows, oldest first. Callers keep
   * polling while `hasMore` is true to drain a backlog.
   */
  async dequeue(senderId: string, opts: DequeueOptions): Promise<DequeueResult> {
    const maxBatch = Math.floor(opts.maxBatch);
    if (!Number.isFinite(maxBatch) || maxBatch < 1 || maxBatch > this.policy.maxBatch) {
      throw new ValidationError({ maxBatch: `Must be between 1 and ${this.policy.maxBatch}` });
    }
    const leaseMs = opts.leaseMs ?? this.policy.defaultLeaseMs;
    if (!Number.isFinite(leaseMs) || leaseMs <= 0) {
      throw new ValidationError({ leaseMs: 'Must be a positive duration' });
    }

    const now = this.clock();
    const result = await this.db.leaseMessages({
      senderId,
      maxBatch,
      leaseMs,
      now,
      expireBefore: this.policy.maxAgeMs !== null ? new Date(now.getTime() - this.policy.maxAgeMs) : null,
      newLeaseToken: () => nanoid(32),
    });

    if (result.expired > 0) {
      console.log(`[${now.toISOString()}] INFO [queue] Expired ${result.expired} stale message(s) for sender ${senderId}`);
    }
    if (result.cancelled > 0) {
      console.log(`[${now.toISOString()}] INFO [queue] Applied ${result.cancelled} deferred cancellation(s) for sender ${senderId}`);
    }
    return { messages: result.messages, hasMore: result.hasMore };
  }

  /**
   * Resolves a lease. Reports against a lease that is not held (expired,
   * reclaimed, already resolved, wrong token) fail with InvalidLease.
   */
  async reportOutcome(input: ReportInput): Promise<QueuedMessage> {
    const now = this.clock();
    const policy = this.policy;

    const updated = await this.db.transitionMessage(input.messageId, (current): MessagePatch => {
      if (!current || current.senderId !== input.senderId) {
        throw new InvalidLeaseError(input.messageId);
      }
      if (current.status === 'failed' && current.errorDetail === ERROR_EXPIRED) {
        throw new ExpiredError(input.messageId);
      }
      if (
        current.status !== 'leased'
        || current.leaseToken !== input.leaseToken
        || !current.leaseExpiresAt
        || current.leaseExpiresAt.getTime() <= now.getTime()
      ) {
        throw new InvalidLeaseError(input.messageId);
      }

      const released = { leaseToken: null, leaseExpiresAt: null };
      if (input.outcome === 'success') {
        return { ...released, status: 'sent', terminalAt: now };
      }

      const attemptCount = current.attemptCount + 1;
      const detail = input.errorDetail?.trim() || input.outcome;
      const retry = input.outcome === 'transient_failure' && attemptCount < current.maxAttempts;

      if (retry && current.cancelRequestedAt) {
        return { ...released, attemptCount, status: 'failed', errorDetail: ERROR_CANCELLED, terminalAt: now };
      }
      if (retry) {
        const delay = backoffDelay(attemptCount, {
          baseDelayMs: policy.retryBaseMs,
          maxDelayMs: policy.retryMaxMs,
          backoffMultiplier: 2,
        });
        return { ...released, attemptCount, status: 'queued', notBefore: new Date(now.getTime() + delay), errorDetail: detail };
      }
      return { ...released, attemptCount, status: 'failed', errorDetail: detail, terminalAt: now };
    });

    // transitionMessage only returns null for a missing row, which threw above
    if (!updated) throw new InvalidLeaseError(input.messageId);

    const level = updated.status === 'failed' ? 'WARN' : 'INFO';
    console.log(`[${now.toISOString()}] ${level} [queue] Message ${updated.id} ${input.outcome} → ${updated.status} (attempt ${updated.attemptCount}/${updated.maxAttempts})`);
    return updated;
  }

  /** Fails every eligible row older than `maxAgeMs` as "expired". */
  async expireStale(senderId: string, maxAgeMs: number): Promise<number> {
    if (!Number.isFinite(maxAgeMs) || maxAgeMs <= 0) {
      throw new ValidationError({ maxAgeMs: 'Must be a positive duration' });
    }
    const now = this.clock();
    const count = await this.db.expireMessages(senderId, new Date(now.getTime() - maxAgeMs), now);
    if (count > 0) {
      console.log(`[${now.toISOString()}] INFO [queue] Expired ${count} stale message(s) for sender ${senderId}`);
    }
    return count;
  }

  /**
   * Queued rows fail as "cancelled" at once. Leased rows are marked and
   * the cancellation lands when the lease resolves: a retry becomes a
   * cancellation, a success still counts as sent. Terminal rows are
   * returned unchanged.
   */
  async cancel(messageId: string, principal: Principal): Promise<QueuedMessage> {
    const now = this.clock();
    const updated = await this.db.transitionMessage(messageId, (current): MessagePatch | null => {
      if (!current) throw new NotFoundError(`Message ${messageId} not found`);
      if (current.requestedBy !== principal.id && principal.role !== 'admin') {
        throw new ForbiddenError('forbidden', 'Only the requester or an admin may cancel a message');
      }
      if (current.status === 'queued') {
        return { status: 'failed', errorDetail: ERROR_CANCELLED, terminalAt: now, notBefore: null };
      }
      if (current.status === 'leased' && !current.cancelRequestedAt) {
        return { cancelRequestedAt: now };
      }
      return null;
    });
    if (!updated) throw new NotFoundError(`Message ${messageId} not found`);
    return updated;
  }

  /**
   * Puts a failed message back on the queue as a new row that keeps the
   * attempt count, so the retry bound still holds across requeues.
   */
  async requeue(messageId: string, operator: Principal): Promise<EnqueueResult> {
    requireAdmin(operator, 'requeue messages');
    const original = await this.getMessage(messageId);
    if (original.status !== 'failed') {
      throw new InvalidStateError(`Message ${messageId} is ${original.status}; only failed messages can be requeued`);
    }
    if (original.attemptCount >= original.maxAttempts) {
      throw new InvalidStateError(`Message ${messageId} has used all ${original.maxAttempts} attempts`);
    }

    const now = this.clock();
    const result = await this.db.insertMessage({
      id: nanoid(),
      senderId: original.senderId,
      destination: original.destination,
      body: original.body,
      requestedBy: original.requestedBy,
      idempotencyKey: original.idempotencyKey,
      maxAttempts: original.maxAttempts,
      attemptCount: original.attemptCount,
      retryOf: original.id,
      now,
    });

    if (!result.inserted) return { status: 'duplicate', existingId: result.existing.id };
    console.log(`[${now.toISOString()}] INFO [queue] Message ${messageId} requeued as ${result.message.id} by ${operator.id}`);
    return { status: 'queued', message: result.message };
  }

  async getMessage(messageId: string): Promise<QueuedMessage> {
    const message = await this.db.getMessage(messageId);
    if (!message) throw new NotFoundError(`Message ${messageId} not found`);
    return message;
  }

  async listMessages(filters: MessageFilters = {}): Promise<QueuedMessage[]> {
    return this.db.listMessages(filters);
  }

  async stats(senderId?: string): Promise<QueueStats> {
    return this.db.getQueueStats(senderId);
  }

  private checkMessage(destination: string, body: string): void {
    const errors: Record<string, string> = {};
    if (!destination) errors.destination = 'Required';
    if (!body.trim()) errors.body = 'Required';
    if (Object.keys(errors).length > 0) throw new ValidationError(errors);
    if (body.length > this.policy.maxBodyLength) {
      throw new MessageTooLargeError(body.length, this.policy.maxBodyLength);
    }
  }
}
