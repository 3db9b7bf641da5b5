import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DeliveryCoordinator } from './coordinator.js';
import { LocalQueueClient, RemoteError } from './client.js';
import { MemoryCredentialStore } from './credentials.js';
import type {
  CoordinatorState, DeliveryExecutor, DeliveryResult, LeasedMessage, QueueClient,
} from './types.js';
import { InvalidLeaseError, UnauthorizedError, ValidationError } from '../lib/errors.js';
import {
  ManualClock, addSender, createRelay, expectQueued, type Relay,
} from '../test-helpers.js';

const WAIT = { timeout: 5_000, interval: 10 };
const creds = { senderId: 's1', secret: 'test-secret' };

function recordingExecutor(result: DeliveryResult = { status: 'success' }) {
  const sent: { destination: string; body: string }[] = [];
  const executor: DeliveryExecutor = {
    deliver: async (destination, body) => {
      sent.push({ destination, body });
      return result;
    },
  };
  return { executor, sent };
}

function leased(id: string, leaseExpiresAt = '2026-01-05T09:01:00.000Z'): LeasedMessage {
  return { id, destination: '+15550111', body: `Body ${id}`, leaseToken: `tok-${id}`, leaseExpiresAt, attemptCount: 0 };
}

function fakeClient() {
  return {
    register: vi.fn<QueueClient['register']>().mockResolvedValue(creds),
    heartbeat: vi.fn<QueueClient['heartbeat']>().mockResolvedValue(undefined),
    dequeue: vi.fn<QueueClient['dequeue']>().mockResolvedValue({ messages: [], hasMore: false }),
    reportOutcome: vi.fn<QueueClient['reportOutcome']>().mockResolvedValue(undefined),
  } satisfies QueueClient;
}

describe('DeliveryCoordinator against the in-process queue', () => {
  let relay: Relay;

  beforeEach(async () => {
    relay = await createRelay();
  });

  it('registers, then delivers and reports what it leases', async () => {
    const issued = await relay.registry.issueRegistrationCode({ principalId: 'alice', maxRole: 'lead', issuedBy: 'admin-1' });
    const store = new MemoryCredentialStore();
    const { executor, sent } = recordingExecutor();
    const states: CoordinatorState[] = [];

    const coordinator = new DeliveryCoordinator({
      client: new LocalQueueClient(relay.registry, relay.queue),
      executor,
      credentials: store,
      registration: { code: issued.code, displayName: 'Desk phone', destinationAddress: '+15550100', role: 'lead' },
      pollIntervalMs: 10,
      clock: relay.clock.now,
      onStateChange: state => states.push(state),
    });
    const running = coordinator.run();

    const senderId = await vi.waitFor(async () => {
      const saved = await store.load();
      if (!saved) throw new Error('not registered yet');
      return saved.senderId;
    }, WAIT);
    const first = expectQueued(await relay.queue.enqueue({ senderId, destination: '+15550111', body: 'Running late', requestedBy: 'alice' }));
    const second = expectQueued(await relay.queue.enqueue({ senderId, destination: '+15550112', body: 'On my way', requestedBy: 'alice' }));

    await vi.waitFor(async () => {
      expect((await relay.queue.getMessage(first.id)).status).toBe('sent');
      expect((await relay.queue.getMessage(second.id)).status).toBe('sent');
    }, WAIT);
    await coordinator.stop();
    await running;

    expect(sent).toEqual([
      { destination: '+15550111', body: 'Running late' },
      { destination: '+15550112', body: 'On my way' },
    ]);
    expect(states.slice(0, 3)).toEqual(['starting', 'registering', 'polling']);
    expect(coordinator.getState()).toBe('stopped');
    expect(coordinator.getStats()).toMatchObject({ delivered: 2, failed: 0, leasesAbandoned: 0 });
    expect((await relay.registry.getSender(senderId))?.isOnline).toBe(true);
  });

  it('hands a transient failure back to the queue', async () => {
    const issued = await relay.registry.issueRegistrationCode({ principalId: 'alice', maxRole: 'lead', issuedBy: 'admin-1' });
    const sender = await relay.registry.register({ code: issued.code, displayName: 'Desk phone', destinationAddress: '+15550100', requestedRole: 'lead' });
    const message = expectQueued(await relay.queue.enqueue({ senderId: sender.senderId, destination: '+15550111', body: 'Hi', requestedBy: 'alice' }));
    const { executor, sent } = recordingExecutor({ status: 'transient_failure', reason: 'no signal' });

    const coordinator = new DeliveryCoordinator({
      client: new LocalQueueClient(relay.registry, relay.queue),
      executor,
      credentials: new MemoryCredentialStore(sender),
      pollIntervalMs: 10,
      clock: relay.clock.now,
    });
    const running = coordinator.run();

    await vi.waitFor(async () => {
      expect(await relay.queue.getMessage(message.id)).toMatchObject({
        status: 'queued', attemptCount: 1, errorDetail: 'no signal',
      });
    }, WAIT);
    await coordinator.stop();
    await running;

    // backoff keeps it out of reach while the clock stands still
    expect(sent).toHaveLength(1);
    expect(coordinator.getStats()).toMatchObject({ delivered: 0, failed: 1 });
  });

  it('leaves a message whose lease ends before the delivery timeout to be reclaimed', async () => {
    const sender = await addSender(relay.registry, { principalId: 'alice', role: 'lead' });
    const first = expectQueued(await relay.queue.enqueue({ senderId: sender.senderId, destination: '+15550111', body: 'One', requestedBy: 'alice' }));
    const second = expectQueued(await relay.queue.enqueue({ senderId: sender.senderId, destination: '+15550112', body: 'Two', requestedBy: 'alice' }));
    const sent: string[] = [];
    const executor: DeliveryExecutor = {
      deliver: async (destination) => {
        sent.push(destination);
        relay.clock.advance(31_000);
        return { status: 'success' };
      },
    };

    const coordinator = new DeliveryCoordinator({
      client: new LocalQueueClient(relay.registry, relay.queue),
      executor,
      credentials: new MemoryCredentialStore(sender),
      pollIntervalMs: 60_000,
      maxBatch: 2,
      leaseSeconds: 60,
      deliveryTimeoutMs: 30_000,
      clock: relay.clock.now,
    });
    const running = coordinator.run();
    await vi.waitFor(() => expect(coordinator.getStats().leasesAbandoned).toBe(1), WAIT);
    await coordinator.stop();
    await running;

    expect(sent).toEqual(['+15550111']);
    expect((await relay.queue.getMessage(first.id)).status).toBe('sent');

    relay.clock.advance(30_000);
    const again = await relay.queue.dequeue(sender.senderId, { maxBatch: 10 });
    expect(again.messages.map(m => [m.id, m.attemptCount])).toEqual([[second.id, 0]]);
  });
});

describe('DeliveryCoordinator', () => {
  it('drops the outcome when the lease is no longer held', async () => {
    const client = fakeClient();
    client.dequeue.mockResolvedValueOnce({ messages: [leased('m1')], hasMore: false });
    client.reportOutcome.mockRejectedValue(new InvalidLeaseError('m1'));
    const coordinator = new DeliveryCoordinator({
      client, executor: recordingExecutor().executor, credentials: new MemoryCredentialStore(creds), pollIntervalMs: 10,
      clock: new ManualClock().now,
    });

    const running = coordinator.run();
    await vi.waitFor(() => expect(coordinator.getStats().leasesAbandoned).toBe(1), WAIT);
    await coordinator.stop();
    await running;

    expect(client.reportOutcome).toHaveBeenCalledTimes(1);
  });

  it('retries a report through a network error', async () => {
    const client = fakeClient();
    client.dequeue.mockResolvedValueOnce({ messages: [leased('m1')], hasMore: false });
    client.reportOutcome.mockRejectedValueOnce(new TypeError('fetch failed'));
    const coordinator = new DeliveryCoordinator({
      client,
      executor: recordingExecutor().executor,
      credentials: new MemoryCredentialStore(creds),
      pollIntervalMs: 10,
      reportRetry: { baseDelayMs: 1, maxDelayMs: 1, jitterMs: 0 },
      clock: new ManualClock().now,
    });

    const running = coordinator.run();
    await vi.waitFor(() => expect(client.reportOutcome).toHaveBeenCalledTimes(2), WAIT);
    await coordinator.stop();
    await running;

    expect(client.reportOutcome).toHaveBeenLastCalledWith(creds, {
      messageId: 'm1', leaseToken: 'tok-m1', outcome: 'success', errorDetail: null,
    });
    expect(coordinator.getStats()).toMatchObject({ delivered: 1, leasesAbandoned: 0 });
  });

  it('dequeues again at once while the server reports more', async () => {
    const client = fakeClient();
    client.dequeue
      .mockResolvedValueOnce({ messages: [leased('m1')], hasMore: true })
      .mockResolvedValueOnce({ messages: [leased('m2')], hasMore: false });
    const { executor, sent } = recordingExecutor();
    const coordinator = new DeliveryCoordinator({
      client, executor, credentials: new MemoryCredentialStore(creds), pollIntervalMs: 60_000, maxBatch: 1, leaseSeconds: 45,
      clock: new ManualClock().now,
    });

    const running = coordinator.run();
    await vi.waitFor(() => expect(sent).toHaveLength(2), WAIT);
    await coordinator.stop();
    await running;

    expect(client.dequeue).toHaveBeenCalledWith(creds, { maxBatch: 1, leaseSeconds: 45 });
    expect(sent.map(s => s.body)).toEqual(['Body m1', 'Body m2']);
  });

  it('caps the batch to what the lease can cover', async () => {
    const client = fakeClient();
    const coordinator = new DeliveryCoordinator({
      client, executor: recordingExecutor().executor, credentials: new MemoryCredentialStore(creds),
      pollIntervalMs: 60_000, maxBatch: 10, leaseSeconds: 60, deliveryTimeoutMs: 30_000,
    });

    const running = coordinator.run();
    await vi.waitFor(() => expect(client.dequeue).toHaveBeenCalledTimes(1), WAIT);
    await coordinator.stop();
    await running;

    expect(client.dequeue).toHaveBeenCalledWith(creds, { maxBatch: 2, leaseSeconds: 60 });
  });

  it('rejects a lease shorter than the delivery timeout', () => {
    expect(() => new DeliveryCoordinator({
      client: fakeClient(), executor: recordingExecutor().executor, credentials: new MemoryCredentialStore(creds),
      leaseSeconds: 20, deliveryTimeoutMs: 30_000,
    })).toThrow(ValidationError);
  });

  it('heartbeats between sends of a long batch', async () => {
    const clock = new ManualClock();
    const client = fakeClient();
    const lease = '2026-01-05T10:00:00.000Z';
    client.dequeue.mockResolvedValueOnce({ messages: [leased('m1', lease), leased('m2', lease), leased('m3', lease)], hasMore: false });
    const sent: string[] = [];
    const executor: DeliveryExecutor = {
      deliver: async (_destination, body) => {
        sent.push(body);
        clock.advance(3_000);
        return { status: 'success' };
      },
    };
    const coordinator = new DeliveryCoordinator({
      client, executor, credentials: new MemoryCredentialStore(creds),
      pollIntervalMs: 4_000, maxBatch: 3, leaseSeconds: 60, deliveryTimeoutMs: 1_000, clock: clock.now,
    });

    const running = coordinator.run();
    await vi.waitFor(() => expect(sent).toHaveLength(3), WAIT);
    await coordinator.stop();
    await running;

    // one with the poll, then one before each later send
    expect(client.heartbeat).toHaveBeenCalledTimes(3);
  });

  it('stops when the server refuses the dequeue request', async () => {
    const client = fakeClient();
    client.dequeue.mockRejectedValue(new RemoteError(400, 'VALIDATION_ERROR', 'maxBatch: Must be between 1 and 100'));
    const coordinator = new DeliveryCoordinator({
      client, executor: recordingExecutor().executor, credentials: new MemoryCredentialStore(creds), pollIntervalMs: 5,
    });

    await expect(coordinator.run()).rejects.toMatchObject({ status: 400, code: 'VALIDATION_ERROR' });
    expect(client.dequeue).toHaveBeenCalledTimes(1);
  });

  it('keeps polling after a failed poll', async () => {
    const client = fakeClient();
    client.heartbeat.mockRejectedValueOnce(new TypeError('fetch failed'));
    const coordinator = new DeliveryCoordinator({
      client, executor: recordingExecutor().executor, credentials: new MemoryCredentialStore(creds), pollIntervalMs: 5,
    });

    const running = coordinator.run();
    await vi.waitFor(() => expect(coordinator.getStats().polls).toBeGreaterThanOrEqual(1), WAIT);
    await coordinator.stop();
    await running;

    expect(client.heartbeat.mock.calls.length).toBeGreaterThanOrEqual(2);
  });

  it('fails without credentials or a registration code', async () => {
    const coordinator = new DeliveryCoordinator({
      client: fakeClient(), executor: recordingExecutor().executor, credentials: new MemoryCredentialStore(),
    });

    await expect(coordinator.run()).rejects.toThrow('No stored sender credentials and no registration code to obtain them');
    expect(coordinator.getState()).toBe('stopped');
  });

  it('stops when the server rejects its credentials', async () => {
    const client = fakeClient();
    client.heartbeat.mockRejectedValue(new UnauthorizedError());
    const coordinator = new DeliveryCoordinator({
      client, executor: recordingExecutor().executor, credentials: new MemoryCredentialStore(creds),
    });

    await expect(coordinator.run()).rejects.toBeInstanceOf(UnauthorizedError);
  });
});
