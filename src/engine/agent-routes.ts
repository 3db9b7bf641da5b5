/**
 * Agent API
 * Mounted at /agent. Registration is open to anyone holding a one-time
 * code; every other route takes HTTP Basic credentials `senderId:secret`.
 */

import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types/hono-env.js';
import type { SenderRegistry } from './registry.js';
import { isOutcome, type MessageQueue } from './queue.js';
import { isRole } from '../db/adapter.js';
import { isRelayError, UnauthorizedError, ValidationError } from '../lib/errors.js';
import type { CircuitBreaker } from '../lib/resilience.js';
import { numberField, readJson, stringField, validate } from '../middleware/index.js';
import { leasedMessageJson } from './views.js';

export interface AgentRouteDeps {
  registry: SenderRegistry;
  queue: MessageQueue;
  /** Wraps store calls made while authenticating */
  breaker?: CircuitBreaker;
}

/** Splits an `Authorization: Basic …` header into id and secret. */
export function parseBasicAuth(header: string | undefined): { senderId: string; secret: string } | null {
  if (!header?.startsWith('Basic ')) return null;
  const decoded = Buffer.from(header.slice(6).trim(), 'base64').toString('utf8');
  const sep = decoded.indexOf(':');
  if (sep <= 0) return null;
  return { senderId: decoded.slice(0, sep), secret: decoded.slice(sep + 1) };
}

export function senderAuth(registry: SenderRegistry, breaker?: CircuitBreaker): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const creds = parseBasicAuth(c.req.header('Authorization'));
    if (!creds) {
      c.header('WWW-Authenticate', 'Basic realm="sendrelay-agent"');
      throw new UnauthorizedError('Sender credentials required');
    }
    const check = () => registry.authenticate(creds.senderId, creds.secret);
    const sender = breaker ? await breaker.execute(check) : await check();
    c.set('senderId', sender.id);
    await next();
  };
}

export function createAgentRoutes(deps: AgentRouteDeps) {
  const { registry, queue } = deps;
  const router = new Hono<AppEnv>();
  const auth = senderAuth(registry, deps.breaker);

  router.post('/register', async (c) => {
    const body = await readJson(c);
    validate(body, [
      { field: 'code', type: 'string', required: true, maxLength: 64 },
      { field: 'displayName', type: 'string', required: true, maxLength: 100 },
      { field: 'destinationAddress', type: 'string', required: true, maxLength: 320 },
      { field: 'role', type: 'role', required: true },
    ]);
    const role = body.role;
    if (!isRole(role)) throw new ValidationError({ role: 'Invalid role' });

    const creds = await registry.register({
      code: stringField(body, 'code') ?? '',
      displayName: stringField(body, 'displayName') ?? '',
      destinationAddress: stringField(body, 'destinationAddress') ?? '',
      requestedRole: role,
    });
    return c.json(creds, 201);
  });

  router.post('/heartbeat', auth, async (c) => {
    const senderId = c.get('senderId');
    const at = await registry.recordHeartbeat(senderId);
    return c.json({ senderId, lastHeartbeatAt: at.toISOString() });
  });

  router.post('/dequeue', auth, async (c) => {
    const body = await readJson(c);
    validate(body, [
      { field: 'maxBatch', type: 'integer', required: true, min: 1, max: queue.policy.maxBatch },
      { field: 'leaseSeconds', type: 'integer', min: 1, max: 3600 },
    ]);
    const leaseSeconds = numberField(body, 'leaseSeconds');
    const result = await queue.dequeue(c.get('senderId'), {
      maxBatch: numberField(body, 'maxBatch') ?? 1,
      leaseMs: leaseSeconds !== undefined ? leaseSeconds * 1000 : undefined,
    });
    return c.json({ messages: result.messages.map(leasedMessageJson), hasMore: result.hasMore });
  });

  router.post('/report-outcome', auth, async (c) => {
    const body = await readJson(c);
    validate(body, [
      { field: 'messageId', type: 'string', required: true },
      { field: 'leaseToken', type: 'string', required: true },
      { field: 'outcome', type: 'string', required: true },
      { field: 'errorDetail', type: 'string', maxLength: 2000 },
    ]);
    const outcome = body.outcome;
    if (!isOutcome(outcome)) {
      throw new ValidationError({ outcome: 'Must be one of: success, transient_failure, permanent_failure' });
    }

    const message = await queue.reportOutcome({
      senderId: c.get('senderId'),
      messageId: stringField(body, 'messageId') ?? '',
      leaseToken: stringField(body, 'leaseToken') ?? '',
      outcome,
      errorDetail: stringField(body, 'errorDetail') ?? null,
    });
    return c.json({ messageId: message.id, status: message.status, attemptCount: message.attemptCount });
  });

  return router;
}

/** Credential failures say nothing about the store's health. */
export function isStoreFailure(err: unknown): boolean {
  return !isRelayError(err) || err.status >= 500;
}
