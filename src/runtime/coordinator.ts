/**
 * Delivery Coordinator
 *
 * The agent-side loop:
 *
 *   starting → registering → polling ⇄ delivering → … → stopped
 *
 * Polling heartbeats and dequeues. An empty batch sleeps for the poll
 * interval; a batch with `hasMore` is followed by the next dequeue right
 * away. Each leased message goes to the executor under a deadline and
 * its result is reported with the lease token it came with. A message
 * whose lease would lapse before the deadline is skipped, and reports
 * that keep failing are abandoned: either way the lease expires and the
 * server hands the message out again.
 */

import { withRetry, sleep, type RetryOptions } from '../lib/resilience.js';
import {
  ExpiredError, InvalidLeaseError, UnauthorizedError, ValidationError, errorMessage,
} from '../lib/errors.js';
import { runDelivery } from './executor.js';
import { isRetryableClientError } from './client.js';
import type {
  CoordinatorState, CoordinatorStats, CredentialStore, DequeueBatch, DeliveryExecutor,
  LeasedMessage, QueueClient, RegistrationRequest, SenderCredentials,
} from './types.js';

export interface CoordinatorOptions {
  client: QueueClient;
  executor: DeliveryExecutor;
  credentials: CredentialStore;
  /** Used when the credential store is empty */
  registration?: RegistrationRequest;
  pollIntervalMs?: number;
  maxBatch?: number;
  leaseSeconds?: number;
  deliveryTimeoutMs?: number;
  /** Pause between two sends */
  sendDelayMs?: number;
  reportRetry?: Partial<RetryOptions>;
  clock?: () => Date;
  onStateChange?: (state: CoordinatorState, previous: CoordinatorState) => void;
}

const DEFAULT_REPORT_RETRY: Partial<RetryOptions> = {
  maxAttempts: 5,
  baseDelayMs: 1_000,
  maxDelayMs: 15_000,
  jitterMs: 250,
};

export class DeliveryCoordinator {
  private state: CoordinatorState = 'stopped';
  private stopController = new AbortController();
  private running: Promise<void> | null = null;
  private readonly stats: CoordinatorStats = { delivered: 0, failed: 0, leasesAbandoned: 0, polls: 0 };
  private lastHeartbeatMs = 0;

  private readonly pollIntervalMs: number;
  private readonly maxBatch: number;
  private readonly leaseSeconds: number;
  private readonly deliveryTimeoutMs: number;
  private readonly sendDelayMs: number;
  private readonly clock: () => Date;

  constructor(private readonly opts: CoordinatorOptions) {
    this.pollIntervalMs = opts.pollIntervalMs ?? 5_000;
    this.leaseSeconds = opts.leaseSeconds ?? 60;
    this.deliveryTimeoutMs = opts.deliveryTimeoutMs ?? 30_000;
    this.sendDelayMs = opts.sendDelayMs ?? 0;
    this.clock = opts.clock ?? (() => new Date());

    const leaseMs = this.leaseSeconds * 1000;
    if (leaseMs < this.deliveryTimeoutMs) {
      throw new ValidationError({ leaseSeconds: `Must cover the delivery timeout of ${this.deliveryTimeoutMs}ms` });
    }
    // every message of a batch must be able to finish inside the lease
    this.maxBatch = Math.min(opts.maxBatch ?? 10, Math.floor(leaseMs / this.deliveryTimeoutMs));
  }

  getState(): CoordinatorState { return this.state; }
  getStats(): CoordinatorStats { return { ...this.stats }; }

  /** Runs until `stop()`; resolves once the loop has exited. */
  run(): Promise<void> {
    if (this.running) return this.running;
    this.stopController = new AbortController();
    this.running = this.loop().finally(() => {
      this.setState('stopped');
      this.running = null;
    });
    return this.running;
  }

  /** Ends the loop after the message in flight; resolves when stopped. */
  async stop(): Promise<void> {
    this.stopController.abort();
    if (this.running) await this.running;
  }

  private get stopping(): boolean {
    return this.stopController.signal.aborted;
  }

  private async loop(): Promise<void> {
    this.setState('starting');
    const creds = await this.obtainCredentials();
    if (this.stopping) return;

    this.setState('polling');
    while (!this.stopping) {
      const batch = await this.poll(creds);
      if (!batch || batch.messages.length === 0) {
        await sleep(this.pollIntervalMs, this.stopController.signal);
        continue;
      }

      this.setState('delivering');
      for (const [i, message] of batch.messages.entries()) {
        if (this.stopping) break;
        if (i > 0 && this.sendDelayMs > 0) await sleep(this.sendDelayMs, this.stopController.signal);
        if (i > 0) await this.keepAlive(creds);
        if (!this.leaseCoversDelivery(message)) {
          this.stats.leasesAbandoned++;
          log('WARN', `Lease on ${message.id} ends too soon to deliver; leaving it to expire`);
          continue;
        }
        await this.deliver(creds, message);
      }
      if (this.stopping) break;
      this.setState('polling');

      if (!batch.hasMore) await sleep(this.pollIntervalMs, this.stopController.signal);
    }
  }

  /** Heartbeat then dequeue. Null when the server could not be reached. */
  private async poll(creds: SenderCredentials): Promise<DequeueBatch | null> {
    try {
      await this.heartbeat(creds);
      const batch = await this.opts.client.dequeue(creds, { maxBatch: this.maxBatch, leaseSeconds: this.leaseSeconds });
      this.stats.polls++;
      return batch;
    } catch (err) {
      // a request the server refuses will be refused again
      if (err instanceof UnauthorizedError || !isRetryableClientError(err)) throw err;
      log('WARN', `Poll failed: ${errorMessage(err)}`);
      return null;
    }
  }

  private async heartbeat(creds: SenderCredentials): Promise<void> {
    await this.opts.client.heartbeat(creds);
    this.lastHeartbeatMs = this.clock().getTime();
  }

  /** Heartbeat between sends so a long batch does not read as offline. */
  private async keepAlive(creds: SenderCredentials): Promise<void> {
    if (this.clock().getTime() - this.lastHeartbeatMs < this.pollIntervalMs / 2) return;
    try {
      await this.heartbeat(creds);
    } catch (err) {
      if (err instanceof UnauthorizedError) throw err;
      log('WARN', `Heartbeat failed: ${errorMessage(err)}`);
    }
  }

  private leaseCoversDelivery(message: LeasedMessage): boolean {
    if (!message.leaseExpiresAt) return false;
    const remainingMs = Date.parse(message.leaseExpiresAt) - this.clock().getTime();
    return remainingMs >= this.deliveryTimeoutMs;
  }

  private async obtainCredentials(): Promise<SenderCredentials> {
    const stored = await this.opts.credentials.load();
    if (stored) return stored;

    const registration = this.opts.registration;
    if (!registration) {
      throw new Error('No stored sender credentials and no registration code to obtain them');
    }
    this.setState('registering');
    const creds = await this.opts.client.register(registration);
    await this.opts.credentials.save(creds);
    log('INFO', `Registered as sender ${creds.senderId}`);
    return creds;
  }

  private async deliver(creds: SenderCredentials, message: LeasedMessage): Promise<void> {
    const result = await runDelivery(this.opts.executor, message.destination, message.body, this.deliveryTimeoutMs);
    const report = {
      messageId: message.id,
      leaseToken: message.leaseToken,
      outcome: result.status,
      errorDetail: result.status === 'success' ? null : result.reason,
    };

    if (result.status === 'success') this.stats.delivered++;
    else this.stats.failed++;

    try {
      await withRetry(() => this.opts.client.reportOutcome(creds, report), {
        ...DEFAULT_REPORT_RETRY,
        ...this.opts.reportRetry,
        retryableErrors: isRetryableClientError,
        onRetry: (attempt, err, delayMs) => {
          log('WARN', `Report for ${message.id} failed (${errorMessage(err)}), retry ${attempt} in ${Math.round(delayMs)}ms`);
        },
      });
    } catch (err) {
      this.stats.leasesAbandoned++;
      if (err instanceof InvalidLeaseError || err instanceof ExpiredError) {
        log('WARN', `Lease on ${message.id} no longer held; outcome ${result.status} dropped`);
      } else {
        log('ERROR', `Abandoning report for ${message.id} (${errorMessage(err)}); the lease will expire and the message will be retried`);
      }
    }
  }

  private setState(next: CoordinatorState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    this.opts.onStateChange?.(next, previous);
  }
}

function log(level: 'INFO' | 'WARN' | 'ERROR', message: string): void {
  const line = `[${new Date().toISOString()}] ${level} [agent] ${message}`;
  if (level === 'ERROR') console.error(line);
  else console.log(line);
}
