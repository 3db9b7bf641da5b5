/**
 * Queue clients for the delivery coordinator.
 *
 * `HttpQueueClient` talks to a remote server's agent API.
 * `LocalQueueClient` calls the engine directly, for senders that run in
 * the same process as the server.
 */

import type { SenderRegistry } from '../engine/registry.js';
import type { MessageQueue } from '../engine/queue.js';
import { leasedMessageJson } from '../engine/views.js';
import {
  ExpiredError, InvalidLeaseError, UnauthorizedError, isRelayError,
} from '../lib/errors.js';
import { TimeoutError, withTimeout } from '../lib/resilience.js';
import { isRecord } from '../middleware/index.js';
import type {
  DequeueBatch, LeasedMessage, OutcomeReport, QueueClient, RegistrationRequest, SenderCredentials,
} from './types.js';

/** Non-2xx answer from the agent API that maps to no local error class. */
export class RemoteError extends Error {
  constructor(readonly status: number, readonly code: string, message: string) {
    super(message);
    this.name = 'RemoteError';
  }
}

/**
 * Network trouble and server-side failures are worth retrying; a request
 * the server rejected (4xx, bad lease, bad credentials) is not.
 */
export function isRetryableClientError(err: unknown): boolean {
  if (err instanceof RemoteError) return err.status >= 500 || err.status === 429;
  if (isRelayError(err)) return err.status >= 500;
  return true;
}

// ─── HTTP ────────────────────────────────────────────────

export interface HttpQueueClientOptions {
  /** Per-request timeout (default 15s) */
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class HttpQueueClient implements QueueClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(baseUrl: string, opts: HttpQueueClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? 15_000;
    this.fetchFn = opts.fetch ?? fetch;
  }

  async register(req: RegistrationRequest): Promise<SenderCredentials> {
    const body = await this.post('/agent/register', req, null);
    if (!isRecord(body) || typeof body.senderId !== 'string' || typeof body.secret !== 'string') {
      throw new RemoteError(502, 'BAD_RESPONSE', 'Registration response is missing senderId or secret');
    }
    return { senderId: body.senderId, secret: body.secret };
  }

  async heartbeat(creds: SenderCredentials): Promise<void> {
    await this.post('/agent/heartbeat', {}, creds);
  }

  async dequeue(creds: SenderCredentials, req: { maxBatch: number; leaseSeconds?: number }): Promise<DequeueBatch> {
    const body = await this.post('/agent/dequeue', req, creds);
    if (!isRecord(body) || !Array.isArray(body.messages)) {
      throw new RemoteError(502, 'BAD_RESPONSE', 'Dequeue response is missing messages');
    }
    return {
      messages: body.messages.filter(isLeasedMessage),
      hasMore: body.hasMore === true,
    };
  }

  async reportOutcome(creds: SenderCredentials, report: OutcomeReport): Promise<void> {
    await this.post('/agent/report-outcome', report, creds);
  }

  private async post(path: string, payload: object, creds: SenderCredentials | null): Promise<unknown> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (creds) {
      headers.Authorization = `Basic ${Buffer.from(`${creds.senderId}:${creds.secret}`, 'utf8').toString('base64')}`;
    }

    const controller = new AbortController();
    let res: Response;
    try {
      res = await withTimeout(this.fetchFn(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      }), this.timeoutMs);
    } catch (err) {
      if (err instanceof TimeoutError) controller.abort();
      throw err;
    }

    const text = await res.text();
    let body: unknown = null;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        body = null;
      }
    }
    if (res.ok) return body;

    const code = isRecord(body) && typeof body.code === 'string' ? body.code : 'HTTP_ERROR';
    const message = isRecord(body) && typeof body.error === 'string' ? body.error : `${res.status} ${res.statusText}`;
    const messageId = 'messageId' in payload && typeof payload.messageId === 'string' ? payload.messageId : '';

    switch (code) {
      case 'UNAUTHORIZED': throw new UnauthorizedError(message);
      case 'INVALID_LEASE': throw new InvalidLeaseError(messageId);
      case 'EXPIRED': throw new ExpiredError(messageId);
      default: throw new RemoteError(res.status, code, message);
    }
  }
}

// ─── In-Process ──────────────────────────────────────────

export class LocalQueueClient implements QueueClient {
  constructor(
    private readonly registry: SenderRegistry,
    private readonly queue: MessageQueue,
  ) {}

  async register(req: RegistrationRequest): Promise<SenderCredentials> {
    return this.registry.register({
      code: req.code,
      displayName: req.displayName,
      destinationAddress: req.destinationAddress,
      requestedRole: req.role,
    });
  }

  async heartbeat(creds: SenderCredentials): Promise<void> {
    await this.registry.heartbeat(creds.senderId, creds.secret);
  }

  async dequeue(creds: SenderCredentials, req: { maxBatch: number; leaseSeconds?: number }): Promise<DequeueBatch> {
    const sender = await this.registry.authenticate(creds.senderId, creds.secret);
    const result = await this.queue.dequeue(sender.id, {
      maxBatch: req.maxBatch,
      leaseMs: req.leaseSeconds !== undefined ? req.leaseSeconds * 1000 : undefined,
    });
    return { messages: result.messages.map(leasedMessageJson), hasMore: result.hasMore };
  }

  async reportOutcome(creds: SenderCredentials, report: OutcomeReport): Promise<void> {
    const sender = await this.registry.authenticate(creds.senderId, creds.secret);
    await this.queue.reportOutcome({ ...report, senderId: sender.id });
  }
}

// ─── Helpers ─────────────────────────────────────────────

function isLeasedMessage(value: unknown): value is LeasedMessage {
  return isRecord(value)
    && typeof value.id === 'string'
    && typeof value.destination === 'string'
    && typeof value.body === 'string'
    && typeof value.leaseToken === 'string'
    && (typeof value.leaseExpiresAt === 'string' || value.leaseExpiresAt === null)
    && typeof value.attemptCount === 'number';
}
