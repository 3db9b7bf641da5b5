/**
 * Requester API
 * Mounted at /api behind bearer-token auth; `principalId` and
 * `principalRole` are set on the context before any handler runs.
 */

import { Hono, type Context } from 'hono';
import type { AppEnv } from '../types/hono-env.js';
import type { SenderRegistry } from './registry.js';
import type { AuthorizationEngine, Principal } from './authorization.js';
import type { BatchItem, MessageQueue } from './queue.js';
import { isRole, type GrantStatus, type MessageStatus } from '../db/adapter.js';
import { ForbiddenError, ValidationError } from '../lib/errors.js';
import {
  booleanField, isRecord, numberField, readJson, requireRole, stringField, validate,
} from '../middleware/index.js';
import { enqueueResultJson, grantJson, messageJson, senderJson } from './views.js';

const MAX_BATCH_ITEMS = 1_000;
const GRANT_STATUSES: readonly GrantStatus[] = ['pending', 'active', 'revoked'];
const MESSAGE_STATUSES: readonly MessageStatus[] = ['queued', 'leased', 'sent', 'failed'];

export interface RequesterRouteDeps {
  registry: SenderRegistry;
  authz: AuthorizationEngine;
  queue: MessageQueue;
}

function principalOf(c: Context<AppEnv>): Principal {
  return { id: c.get('principalId'), role: c.get('principalRole') };
}

function parseBatch(raw: unknown[]): BatchItem[] {
  if (raw.length === 0 || raw.length > MAX_BATCH_ITEMS) {
    throw new ValidationError({ messages: `Must hold between 1 and ${MAX_BATCH_ITEMS} items` });
  }
  const errors: Record<string, string> = {};
  const items: BatchItem[] = [];
  raw.forEach((entry, i) => {
    const destination = isRecord(entry) ? stringField(entry, 'destination') : undefined;
    const body = isRecord(entry) ? stringField(entry, 'body') : undefined;
    if (!isRecord(entry) || destination === undefined || body === undefined) {
      errors[`messages[${i}]`] = 'Must have string destination and body';
      return;
    }
    items.push({ destination, body, idempotencyKey: stringField(entry, 'idempotencyKey') ?? null });
  });
  if (Object.keys(errors).length > 0) throw new ValidationError(errors);
  return items;
}

export function createRequesterRoutes(deps: RequesterRouteDeps) {
  const { registry, authz, queue } = deps;
  const router = new Hono<AppEnv>();

  // ─── Enqueue ────────────────────────────────────────────

  router.post('/enqueue', async (c) => {
    const body = await readJson(c);
    validate(body, [
      { field: 'senderId', type: 'string', required: true },
      { field: 'idempotencyKey', type: 'string', maxLength: 200 },
    ]);
    const senderId = stringField(body, 'senderId') ?? '';
    const principal = principalOf(c);
    await authz.assertCanActAs(principal, senderId);

    if (Array.isArray(body.messages)) {
      const results = await queue.enqueueBatch(senderId, parseBatch(body.messages), principal.id);
      return c.json({ results: results.map(enqueueResultJson) });
    }

    validate(body, [
      { field: 'destination', type: 'string', required: true, maxLength: 320 },
      { field: 'body', type: 'string', required: true },
    ]);
    const result = await queue.enqueue({
      senderId,
      destination: stringField(body, 'destination') ?? '',
      body: stringField(body, 'body') ?? '',
      requestedBy: principal.id,
      idempotencyKey: stringField(body, 'idempotencyKey') ?? null,
    });
    return c.json(enqueueResultJson(result), result.status === 'queued' ? 201 : 200);
  });

  // ─── Senders ────────────────────────────────────────────

  router.get('/senders', async (c) => {
    const senders = await registry.listAvailable();
    return c.json({ senders: senders.map(senderJson), total: senders.length });
  });

  router.get('/senders/:id/access', async (c) => {
    const senderId = c.req.param('id');
    const decision = await authz.decide(principalOf(c), senderId);
    return c.json({ senderId, access: decision.access, via: decision.via });
  });

  router.post('/senders/:id/disable', requireRole('admin'), async (c) => {
    await registry.disable(c.req.param('id'));
    const sender = await registry.getSender(c.req.param('id'));
    return c.json({ sender: sender ? senderJson(sender) : null });
  });

  router.post('/senders/:id/expire-stale', requireRole('admin'), async (c) => {
    const body = await readJson(c);
    validate(body, [{ field: 'maxAgeSeconds', type: 'integer', required: true, min: 1 }]);
    const maxAgeSeconds = numberField(body, 'maxAgeSeconds') ?? 0;
    const expired = await queue.expireStale(c.req.param('id'), maxAgeSeconds * 1000);
    return c.json({ expired });
  });

  // ─── Registration Codes ─────────────────────────────────

  router.post('/registration-codes', requireRole('admin'), async (c) => {
    const body = await readJson(c);
    validate(body, [
      { field: 'principalId', type: 'string', required: true, maxLength: 200 },
      { field: 'maxRole', type: 'role', required: true },
      { field: 'isLocal', type: 'boolean' },
      { field: 'ttlSeconds', type: 'integer', min: 60, max: 30 * 24 * 3600 },
    ]);
    const maxRole = body.maxRole;
    if (!isRole(maxRole)) throw new ValidationError({ maxRole: 'Invalid role' });
    const ttlSeconds = numberField(body, 'ttlSeconds');

    const issued = await registry.issueRegistrationCode({
      principalId: stringField(body, 'principalId') ?? '',
      maxRole,
      isLocal: booleanField(body, 'isLocal') ?? false,
      issuedBy: principalOf(c).id,
      ttlMs: ttlSeconds !== undefined ? ttlSeconds * 1000 : undefined,
    });
    return c.json({ codeId: issued.codeId, code: issued.code, expiresAt: issued.expiresAt.toISOString() }, 201);
  });

  // ─── Permission Requests & Grants ───────────────────────

  router.post('/permission-requests', async (c) => {
    const body = await readJson(c);
    validate(body, [
      { field: 'senderId', type: 'string', required: true },
      { field: 'reason', type: 'string', maxLength: 500 },
    ]);
    const request = await authz.requestPermission(
      principalOf(c),
      stringField(body, 'senderId') ?? '',
      stringField(body, 'reason') ?? null,
    );
    return c.json({ request: grantJson(request) });
  });

  router.get('/permission-requests', requireRole('admin'), async (c) => {
    const status = c.req.query('status') ?? 'pending';
    const match = GRANT_STATUSES.find(s => s === status);
    if (!match) throw new ValidationError({ status: `Must be one of: ${GRANT_STATUSES.join(', ')}` });
    const requests = await authz.listPermissionRequests({ status: match, senderId: c.req.query('senderId') });
    return c.json({ requests: requests.map(grantJson), total: requests.length });
  });

  router.post('/permission-requests/:id/approve', requireRole('admin'), async (c) => {
    const grant = await authz.approvePermission(c.req.param('id'), principalOf(c));
    return c.json({ grant: grantJson(grant) });
  });

  router.post('/grants', requireRole('admin'), async (c) => {
    const body = await readJson(c);
    validate(body, [
      { field: 'principalId', type: 'string', required: true, maxLength: 200 },
      { field: 'senderId', type: 'string', required: true },
      { field: 'reason', type: 'string', maxLength: 500 },
    ]);
    const grant = await authz.grant(
      stringField(body, 'principalId') ?? '',
      stringField(body, 'senderId') ?? '',
      principalOf(c),
      stringField(body, 'reason') ?? null,
    );
    return c.json({ grant: grantJson(grant) }, 201);
  });

  router.delete('/grants/:id', requireRole('admin'), async (c) => {
    const grant = await authz.revoke(c.req.param('id'), principalOf(c));
    return c.json({ grant: grantJson(grant) });
  });

  // ─── Messages ───────────────────────────────────────────

  router.get('/messages', requireRole('admin'), async (c) => {
    const status = c.req.query('status');
    const match = status === undefined ? undefined : MESSAGE_STATUSES.find(s => s === status);
    if (status !== undefined && !match) {
      throw new ValidationError({ status: `Must be one of: ${MESSAGE_STATUSES.join(', ')}` });
    }
    const limit = Math.min(Math.max(parseInt(c.req.query('limit') || '100', 10) || 100, 1), 1000);
    const offset = Math.max(parseInt(c.req.query('offset') || '0', 10) || 0, 0);
    const messages = await queue.listMessages({ senderId: c.req.query('senderId'), status: match, limit, offset });
    return c.json({ messages: messages.map(messageJson), total: messages.length });
  });

  router.get('/messages/:id', async (c) => {
    const principal = principalOf(c);
    const message = await queue.getMessage(c.req.param('id'));
    if (message.requestedBy !== principal.id && principal.role !== 'admin') {
      throw new ForbiddenError('forbidden', 'Only the requester or an admin may view a message');
    }
    return c.json({ message: messageJson(message) });
  });

  router.post('/messages/:id/cancel', async (c) => {
    const message = await queue.cancel(c.req.param('id'), principalOf(c));
    return c.json({ message: messageJson(message) });
  });

  router.post('/messages/:id/requeue', requireRole('admin'), async (c) => {
    const result = await queue.requeue(c.req.param('id'), principalOf(c));
    return c.json(enqueueResultJson(result), result.status === 'queued' ? 201 : 200);
  });

  // Unscoped totals span every sender, so they are for admins only
  router.get('/queue/stats', async (c) => {
    const principal = principalOf(c);
    const senderId = c.req.query('senderId');
    if (principal.role !== 'admin') {
      if (!senderId) throw new ForbiddenError('forbidden', 'Only admins may read stats across all senders');
      await authz.assertCanActAs(principal, senderId);
    }
    const stats = await queue.stats(senderId);
    return c.json({ stats });
  });

  return router;
}
