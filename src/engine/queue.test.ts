import { describe, it, expect, beforeEach } from 'vitest';
import { addSender, createRelay, expectQueued, type Relay } from '../test-helpers.js';
import type { QueuedMessage } from '../db/adapter.js';
import {
  ExpiredError, ForbiddenError, InvalidLeaseError, InvalidStateError,
  MessageTooLargeError, NotFoundError, UnknownSenderError, ValidationError,
} from '../lib/errors.js';
import type { Outcome } from './queue.js';

const ALICE = { id: 'alice', role: 'lead' } as const;
const ADMIN = { id: 'admin-1', role: 'admin' } as const;

async function leaseOne(relay: Relay, senderId: string, leaseMs?: number): Promise<QueuedMessage> {
  const { messages } = await relay.queue.dequeue(senderId, { maxBatch: 1, leaseMs });
  expect(messages).toHaveLength(1);
  return messages[0];
}

function report(relay: Relay, senderId: string, message: QueuedMessage, outcome: Outcome, errorDetail?: string) {
  return relay.queue.reportOutcome({
    senderId,
    messageId: message.id,
    leaseToken: message.leaseToken ?? '',
    outcome,
    errorDetail,
  });
}

describe('MessageQueue', () => {
  let relay: Relay;
  let senderId: string;

  beforeEach(async () => {
    relay = await createRelay();
    ({ senderId } = await addSender(relay.registry, { principalId: 'alice', role: 'lead' }));
  });

  function enqueue(body: string, extra: { destination?: string; idempotencyKey?: string } = {}) {
    return relay.queue.enqueue({
      senderId,
      destination: extra.destination ?? '+15550111',
      body,
      requestedBy: ALICE.id,
      idempotencyKey: extra.idempotencyKey,
    });
  }

  describe('enqueue', () => {
    it('collapses a repeat inside the dedupe window onto the first row', async () => {
      const first = expectQueued(await enqueue('Hi Sam, see you at 6'));
      relay.clock.advance(60_000);
      const second = await enqueue('Hi Sam,  see you at 6 ');

      expect(second).toEqual({ status: 'duplicate', existingId: first.id });
      expect(await relay.queue.stats(senderId)).toEqual({ total: 1, queued: 1, leased: 0, sent: 0, failed: 0 });
    });

    it('lets the same text through once the time bucket has moved on', async () => {
      const first = expectQueued(await enqueue('Reminder: rehearsal tonight'));
      relay.clock.advance(120_000);
      const second = expectQueued(await enqueue('Reminder: rehearsal tonight'));

      expect(second.id).not.toBe(first.id);
      expect(second.idempotencyKey).not.toBe(first.idempotencyKey);
    });

    it('dedupes on a caller key regardless of content', async () => {
      const first = expectQueued(await enqueue('Version one', { idempotencyKey: 'order-17' }));
      const second = await enqueue('Version two', { idempotencyKey: 'order-17' });

      expect(second).toEqual({ status: 'duplicate', existingId: first.id });
    });

    it('accepts a reused key once the earlier row is terminal', async () => {
      const first = expectQueued(await enqueue('Your table is ready', { idempotencyKey: 'order-18' }));
      await report(relay, senderId, await leaseOne(relay, senderId), 'success');

      const again = expectQueued(await enqueue('Your table is ready', { idempotencyKey: 'order-18' }));
      expect(again.id).not.toBe(first.id);
    });

    it('keeps exactly one row under concurrent enqueues of one key', async () => {
      const results = await Promise.all(
        Array.from({ length: 5 }, () => enqueue('Concurrent hello', { idempotencyKey: 'burst-1' })),
      );

      const queued = results.filter(r => r.status === 'queued');
      expect(queued).toHaveLength(1);
      const id = expectQueued(queued[0]).id;
      for (const r of results) {
        if (r.status === 'duplicate') expect(r.existingId).toBe(id);
      }
      expect((await relay.queue.stats(senderId)).total).toBe(1);
    });

    it('rejects unknown and disabled senders before writing', async () => {
      await expect(relay.queue.enqueue({
        senderId: 'no-such-sender', destination: '+15550111', body: 'Hello', requestedBy: ALICE.id,
      })).rejects.toBeInstanceOf(UnknownSenderError);

      await relay.registry.disable(senderId);
      await expect(enqueue('Hello')).rejects.toBeInstanceOf(UnknownSenderError);
      expect((await relay.queue.stats()).total).toBe(0);
    });

    it('bounds the body length at enqueue time', async () => {
      await expect(enqueue('x'.repeat(10_001))).rejects.toBeInstanceOf(MessageTooLargeError);
      expectQueued(await enqueue('x'.repeat(10_000)));
      expect((await relay.queue.stats(senderId)).total).toBe(1);
    });

    it('requires a destination and a body', async () => {
      await expect(enqueue('Hello', { destination: '   ' })).rejects.toBeInstanceOf(ValidationError);
      await expect(enqueue('  ')).rejects.toBeInstanceOf(ValidationError);
    });

    it('reports rejected batch items one by one', async () => {
      const results = await relay.queue.enqueueBatch(senderId, [
        { destination: '+15550111', body: 'First' },
        { destination: '+15550112', body: 'y'.repeat(10_001) },
        { destination: '', body: 'No address' },
      ], ALICE.id);

      expect(results.map(r => r.status)).toEqual(['queued', 'rejected', 'rejected']);
      expect(results[1]).toMatchObject({ status: 'rejected', code: 'MESSAGE_TOO_LARGE' });
      expect(results[2]).toMatchObject({ status: 'rejected', code: 'VALIDATION_ERROR' });
    });
  });

  describe('dequeue', () => {
    it('drains a 100-row backlog in ten batches, each row once, oldest first', async () => {
      const results = await relay.queue.enqueueBatch(
        senderId,
        Array.from({ length: 100 }, (_, i) => ({ destination: `+1555${String(i).padStart(4, '0')}`, body: `Message ${i}` })),
        ALICE.id,
      );
      const enqueued = results.map(r => expectQueued(r).id);

      const seen: string[] = [];
      const hasMore: boolean[] = [];
      for (let i = 0; i < 10; i++) {
        const batch = await relay.queue.dequeue(senderId, { maxBatch: 10 });
        expect(batch.messages).toHaveLength(10);
        seen.push(...batch.messages.map(m => m.id));
        hasMore.push(batch.hasMore);
      }

      expect(hasMore).toEqual([true, true, true, true, true, true, true, true, true, false]);
      expect(seen).toEqual(enqueued);
      expect((await relay.queue.dequeue(senderId, { maxBatch: 10 })).messages).toEqual([]);
    });

    it('never hands one row to two concurrent pollers', async () => {
      for (let i = 0; i < 10; i++) await enqueue(`Row ${i}`);

      const batches = await Promise.all(
        Array.from({ length: 5 }, () => relay.queue.dequeue(senderId, { maxBatch: 3 })),
      );
      const ids = batches.flatMap(b => b.messages.map(m => m.id));

      expect(ids).toHaveLength(10);
      expect(new Set(ids).size).toBe(10);
    });

    it('gives each lease a fresh token and expiry', async () => {
      await enqueue('Token check');
      const m = await leaseOne(relay, senderId, 45_000);

      expect(m.status).toBe('leased');
      expect(m.leaseToken).toMatch(/^[A-Za-z0-9_-]{32}$/);
      expect(m.leaseExpiresAt?.toISOString()).toBe('2026-01-05T09:00:45.000Z');
      expect(m.leasedAt?.toISOString()).toBe('2026-01-05T09:00:00.000Z');
    });

    it('bounds the batch size', async () => {
      await expect(relay.queue.dequeue(senderId, { maxBatch: 0 })).rejects.toBeInstanceOf(ValidationError);
      await expect(relay.queue.dequeue(senderId, { maxBatch: 101 })).rejects.toBeInstanceOf(ValidationError);
    });

    it('hands a disabled sender nothing but lets its open lease finish', async () => {
      await enqueue('Leased before disable');
      await enqueue('Still queued');
      const m = await leaseOne(relay, senderId);

      await relay.registry.disable(senderId);
      expect(await relay.queue.dequeue(senderId, { maxBatch: 10 })).toEqual({ messages: [], hasMore: false });

      const sent = await report(relay, senderId, m, 'success');
      expect(sent.status).toBe('sent');
    });
  });

  describe('lease reclamation', () => {
    it('re-leases a crashed agent\'s message and rejects its late report', async () => {
      const queued = expectQueued(await enqueue('Crash test'));
      const leasedByA = await leaseOne(relay, senderId, 30_000);

      relay.clock.advance(30_001);
      const leasedByB = await leaseOne(relay, senderId, 30_000);

      expect(leasedByB.id).toBe(queued.id);
      expect(leasedByB.leaseToken).not.toBe(leasedByA.leaseToken);
      expect(leasedByB.attemptCount).toBe(0);

      await expect(report(relay, senderId, leasedByA, 'success')).rejects.toBeInstanceOf(InvalidLeaseError);
      expect((await report(relay, senderId, leasedByB, 'success')).status).toBe('sent');
    });

    it('keeps a lease until strictly after its expiry', async () => {
      await enqueue('Boundary');
      const m = await leaseOne(relay, senderId, 30_000);

      relay.clock.advance(30_000);
      expect((await relay.queue.dequeue(senderId, { maxBatch: 1 })).messages).toEqual([]);
      // the holder cannot report at the expiry instant either
      await expect(report(relay, senderId, m, 'success')).rejects.toBeInstanceOf(InvalidLeaseError);
    });
  });

  describe('reportOutcome', () => {
    it('walks queued → leased → queued twice, then succeeds on the third attempt', async () => {
      const id = expectQueued(await enqueue('Third time lucky')).id;
      const statuses = [(await relay.queue.getMessage(id)).status];

      let m = await leaseOne(relay, senderId);
      statuses.push(m.status);
      let after = await report(relay, senderId, m, 'transient_failure', 'carrier busy');
      statuses.push(after.status);
      expect(after.attemptCount).toBe(1);
      expect(after.notBefore?.toISOString()).toBe('2026-01-05T09:00:30.000Z');
      expect(after.errorDetail).toBe('carrier busy');

      // backoff holds the row back until not_before
      expect((await relay.queue.dequeue(senderId, { maxBatch: 1 })).messages).toEqual([]);

      relay.clock.advance(30_000);
      m = await leaseOne(relay, senderId);
      statuses.push(m.status);
      after = await report(relay, senderId, m, 'transient_failure', 'carrier busy');
      statuses.push(after.status);
      expect(after.attemptCount).toBe(2);
      expect(after.notBefore?.toISOString()).toBe('2026-01-05T09:01:30.000Z');

      relay.clock.advance(60_000);
      m = await leaseOne(relay, senderId);
      statuses.push(m.status);
      after = await report(relay, senderId, m, 'success');
      statuses.push(after.status);

      expect(statuses).toEqual(['queued', 'leased', 'queued', 'leased', 'queued', 'leased', 'sent']);
      expect(after.attemptCount).toBe(2);
      expect(after.terminalAt?.toISOString()).toBe('2026-01-05T09:01:30.000Z');
      expect(after.leaseToken).toBeNull();
    });

    it('fails a message for good once max_attempts is spent', async () => {
      relay = await createRelay({ maxAttempts: 2 });
      ({ senderId } = await addSender(relay.registry, { principalId: 'alice', role: 'lead' }));
      const id = expectQueued(await enqueue('Doomed')).id;

      await report(relay, senderId, await leaseOne(relay, senderId), 'transient_failure', 'no signal');
      relay.clock.advance(30_000);
      const last = await report(relay, senderId, await leaseOne(relay, senderId), 'transient_failure', 'no signal');

      expect(last.status).toBe('failed');
      expect(last.attemptCount).toBe(2);
      expect(last.errorDetail).toBe('no signal');

      relay.clock.advance(3_600_000);
      expect((await relay.queue.dequeue(senderId, { maxBatch: 10 })).messages).toEqual([]);
      expect((await relay.queue.getMessage(id)).status).toBe('failed');
    });

    it('fails a permanent failure at once, naming the outcome when no detail is given', async () => {
      await enqueue('Bad number');
      const failed = await report(relay, senderId, await leaseOne(relay, senderId), 'permanent_failure');

      expect(failed.status).toBe('failed');
      expect(failed.attemptCount).toBe(1);
      expect(failed.errorDetail).toBe('permanent_failure');
    });

    it('rejects a second report for the same lease', async () => {
      await enqueue('Once only');
      const m = await leaseOne(relay, senderId);
      await report(relay, senderId, m, 'success');

      await expect(report(relay, senderId, m, 'success')).rejects.toBeInstanceOf(InvalidLeaseError);
    });

    it('rejects a report from a sender that does not own the message', async () => {
      await enqueue('Mine');
      const m = await leaseOne(relay, senderId);
      const other = await addSender(relay.registry, { principalId: 'bob', role: 'lead', destinationAddress: '+15550199' });

      await expect(report(relay, other.senderId, m, 'success')).rejects.toBeInstanceOf(InvalidLeaseError);
    });
  });

  describe('expiry', () => {
    it('fails old rows as expired and leaves fresh ones queued', async () => {
      const old = expectQueued(await enqueue('From this morning'));
      relay.clock.advance(2 * 3_600_000);
      const fresh = expectQueued(await enqueue('Just now'));

      expect(await relay.queue.expireStale(senderId, 3_600_000)).toBe(1);

      const expired = await relay.queue.getMessage(old.id);
      expect(expired.status).toBe('failed');
      expect(expired.errorDetail).toBe('expired');

      const { messages } = await relay.queue.dequeue(senderId, { maxBatch: 10 });
      expect(messages.map(m => m.id)).toEqual([fresh.id]);
    });

    it('answers a report on an expired row with Expired', async () => {
      await enqueue('Too late');
      const m = await leaseOne(relay, senderId);
      relay.clock.advance(2 * 3_600_000);
      await relay.queue.expireStale(senderId, 3_600_000);

      await expect(report(relay, senderId, m, 'success')).rejects.toBeInstanceOf(ExpiredError);
    });

    it('expires at dequeue when the policy sets a maximum age', async () => {
      relay = await createRelay({ maxAgeMs: 3_600_000 });
      ({ senderId } = await addSender(relay.registry, { principalId: 'alice', role: 'lead' }));
      const id = expectQueued(await enqueue('Forgotten')).id;

      relay.clock.advance(2 * 3_600_000);
      expect((await relay.queue.dequeue(senderId, { maxBatch: 10 })).messages).toEqual([]);
      expect((await relay.queue.getMessage(id)).errorDetail).toBe('expired');
    });

    it('rejects a non-positive age', async () => {
      await expect(relay.queue.expireStale(senderId, 0)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('cancel', () => {
    it('fails a queued message as cancelled right away', async () => {
      const id = expectQueued(await enqueue('Never mind')).id;
      const cancelled = await relay.queue.cancel(id, ALICE);

      expect(cancelled.status).toBe('failed');
      expect(cancelled.errorDetail).toBe('cancelled');
      expect((await relay.queue.dequeue(senderId, { maxBatch: 1 })).messages).toEqual([]);
    });

    it('lets only the requester or an admin cancel', async () => {
      const id = expectQueued(await enqueue('Private')).id;

      await expect(relay.queue.cancel(id, { id: 'bob', role: 'senior' })).rejects.toBeInstanceOf(ForbiddenError);
      expect((await relay.queue.cancel(id, ADMIN)).status).toBe('failed');
    });

    it('defers a cancel on a leased message and turns the retry into a cancellation', async () => {
      const id = expectQueued(await enqueue('In flight')).id;
      const m = await leaseOne(relay, senderId);

      const marked = await relay.queue.cancel(id, ALICE);
      expect(marked.status).toBe('leased');
      expect(marked.cancelRequestedAt?.toISOString()).toBe('2026-01-05T09:00:00.000Z');

      const after = await report(relay, senderId, m, 'transient_failure', 'busy');
      expect(after.status).toBe('failed');
      expect(after.errorDetail).toBe('cancelled');
      expect(after.attemptCount).toBe(1);
    });

    it('still records a success that lands after the cancel', async () => {
      const id = expectQueued(await enqueue('Already sending')).id;
      const m = await leaseOne(relay, senderId);
      await relay.queue.cancel(id, ALICE);

      expect((await report(relay, senderId, m, 'success')).status).toBe('sent');
    });

    it('applies a deferred cancel when the lease lapses', async () => {
      const id = expectQueued(await enqueue('Agent vanished')).id;
      await leaseOne(relay, senderId, 30_000);
      await relay.queue.cancel(id, ALICE);

      relay.clock.advance(30_001);
      expect((await relay.queue.dequeue(senderId, { maxBatch: 1 })).messages).toEqual([]);

      const row = await relay.queue.getMessage(id);
      expect(row.status).toBe('failed');
      expect(row.errorDetail).toBe('cancelled');
    });

    it('leaves terminal messages unchanged', async () => {
      const id = expectQueued(await enqueue('Delivered')).id;
      await report(relay, senderId, await leaseOne(relay, senderId), 'success');

      expect((await relay.queue.cancel(id, ALICE)).status).toBe('sent');
    });
  });

  describe('requeue', () => {
    it('puts a failed message back as a new row that keeps its attempts', async () => {
      const original = expectQueued(await enqueue('Try again later'));
      await report(relay, senderId, await leaseOne(relay, senderId), 'permanent_failure', 'handset off');

      const copy = expectQueued(await relay.queue.requeue(original.id, ADMIN));

      expect(copy.id).not.toBe(original.id);
      expect(copy.status).toBe('queued');
      expect(copy.attemptCount).toBe(1);
      expect(copy.retryOf).toBe(original.id);
      expect(copy.idempotencyKey).toBe(original.idempotencyKey);
    });

    it('is admin only', async () => {
      const original = expectQueued(await enqueue('Nope'));
      await report(relay, senderId, await leaseOne(relay, senderId), 'permanent_failure');

      await expect(relay.queue.requeue(original.id, ALICE)).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('refuses live messages and messages with no attempts left', async () => {
      const live = expectQueued(await enqueue('Still queued'));
      await expect(relay.queue.requeue(live.id, ADMIN)).rejects.toBeInstanceOf(InvalidStateError);

      const spent = expectQueued(await enqueue('Out of attempts'));
      await relay.queue.cancel(live.id, ADMIN);
      await report(relay, senderId, await leaseOne(relay, senderId), 'transient_failure');
      relay.clock.advance(30_000);
      await report(relay, senderId, await leaseOne(relay, senderId), 'transient_failure');
      relay.clock.advance(60_000);
      const last = await report(relay, senderId, await leaseOne(relay, senderId), 'transient_failure');
      expect(last.id).toBe(spent.id);
      expect(last.status).toBe('failed');

      await expect(relay.queue.requeue(spent.id, ADMIN)).rejects.toBeInstanceOf(InvalidStateError);
    });
  });

  describe('inspection', () => {
    it('counts and lists messages by status', async () => {
      const first = expectQueued(await enqueue('One'));
      const second = expectQueued(await enqueue('Two'));
      const third = expectQueued(await enqueue('Three'));
      await report(relay, senderId, await leaseOne(relay, senderId), 'success');
      expect((await leaseOne(relay, senderId)).id).toBe(second.id);

      expect(await relay.queue.stats(senderId)).toEqual({ total: 3, queued: 1, leased: 1, sent: 1, failed: 0 });
      expect((await relay.queue.listMessages({ status: 'queued' })).map(m => m.id)).toEqual([third.id]);
      expect((await relay.queue.getMessage(first.id)).status).toBe('sent');
    });

    it('reports an unknown message as not found', async () => {
      await expect(relay.queue.getMessage('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
