import { describe, it, expect, beforeEach } from 'vitest';
import { addSender, createRelay, type Relay } from '../test-helpers.js';
import type { Role } from '../db/adapter.js';
import {
  ForbiddenError, InvalidStateError, NotFoundError, UnknownSenderError,
} from '../lib/errors.js';
import { ROLE_MATRIX, type Principal } from './authorization.js';

const ADMIN: Principal = { id: 'admin-1', role: 'admin' };

describe('AuthorizationEngine', () => {
  let relay: Relay;
  const senders: Record<Role, string> = { base: '', lead: '', senior: '', admin: '' };

  beforeEach(async () => {
    relay = await createRelay();
    for (const role of ['base', 'lead', 'senior', 'admin'] as const) {
      const { senderId } = await addSender(relay.registry, {
        principalId: `owner-${role}`,
        role,
        destinationAddress: `+1555000${role.length}`,
      });
      senders[role] = senderId;
    }
  });

  it('falls back to the role matrix for other principals\' senders', async () => {
    const table: Record<string, string> = {};
    for (const principalRole of ['base', 'lead', 'senior', 'admin'] as const) {
      for (const target of ['base', 'lead', 'senior', 'admin'] as const) {
        const decision = await relay.authz.decide({ id: `someone-${principalRole}`, role: principalRole }, senders[target]);
        expect(decision.via).toBe('matrix');
        table[`${principalRole}→${target}`] = decision.access;
      }
    }

    expect(table).toEqual({
      'base→base': 'forbidden', 'base→lead': 'forbidden', 'base→senior': 'forbidden', 'base→admin': 'forbidden',
      'lead→base': 'allowed', 'lead→lead': 'allowed', 'lead→senior': 'forbidden', 'lead→admin': 'forbidden',
      'senior→base': 'allowed', 'senior→lead': 'allowed', 'senior→senior': 'pending_approval', 'senior→admin': 'forbidden',
      'admin→base': 'allowed', 'admin→lead': 'allowed', 'admin→senior': 'allowed', 'admin→admin': 'allowed',
    });
    expect(ROLE_MATRIX.base.senior).toBe('forbidden');
  });

  it('always lets a principal act as their own sender', async () => {
    const owner: Principal = { id: 'owner-base', role: 'base' };

    expect(await relay.authz.decide(owner, senders.base)).toMatchObject({ access: 'allowed', via: 'own' });
    expect(await relay.authz.canActAs(owner, senders.senior)).toBe('forbidden');
  });

  it('never coerces pending approval into an allow', async () => {
    const sam: Principal = { id: 'sam', role: 'senior' };

    expect(await relay.authz.canActAs(sam, senders.senior)).toBe('pending_approval');
    await expect(relay.authz.assertCanActAs(sam, senders.senior)).rejects.toMatchObject({
      status: 403,
      code: 'PENDING_APPROVAL',
    });
  });

  it('turns an approved request into a grant and back again on revoke', async () => {
    const sam: Principal = { id: 'sam', role: 'senior' };

    const request = await relay.authz.requestPermission(sam, senders.senior, 'covering for Carol');
    expect(request).toMatchObject({ status: 'pending', principalId: 'sam', reason: 'covering for Carol' });
    expect((await relay.authz.requestPermission(sam, senders.senior)).id).toBe(request.id);
    expect((await relay.authz.listPermissionRequests()).map(g => g.id)).toEqual([request.id]);

    await expect(relay.authz.approvePermission(request.id, sam)).rejects.toBeInstanceOf(ForbiddenError);

    const grant = await relay.authz.approvePermission(request.id, ADMIN);
    expect(grant).toMatchObject({ id: request.id, status: 'active', grantedBy: 'admin-1' });
    expect(await relay.authz.decide(sam, senders.senior)).toMatchObject({ access: 'allowed', via: 'grant' });
    expect(await relay.authz.listPermissionRequests()).toEqual([]);

    await relay.authz.revoke(grant.id, ADMIN);
    expect(await relay.authz.canActAs(sam, senders.senior)).toBe('pending_approval');
    await expect(relay.authz.approvePermission(grant.id, ADMIN)).rejects.toBeInstanceOf(InvalidStateError);
  });

  it('lets an admin grant access directly, even past a forbidden matrix cell', async () => {
    const bob: Principal = { id: 'bob', role: 'base' };

    const grant = await relay.authz.grant('bob', senders.senior, ADMIN, 'night shift');
    expect(grant.status).toBe('active');
    expect(await relay.authz.canActAs(bob, senders.senior)).toBe('allowed');

    const again = await relay.authz.grant('bob', senders.senior, ADMIN);
    expect(again.id).toBe(grant.id);
  });

  it('restricts grant administration to admins', async () => {
    const lead: Principal = { id: 'lee', role: 'lead' };

    await expect(relay.authz.grant('bob', senders.base, lead)).rejects.toBeInstanceOf(ForbiddenError);
    await expect(relay.authz.revoke('any', lead)).rejects.toBeInstanceOf(ForbiddenError);
  });

  it('reports unknown requests and grants', async () => {
    await expect(relay.authz.approvePermission('missing', ADMIN)).rejects.toBeInstanceOf(NotFoundError);
    await expect(relay.authz.revoke('missing', ADMIN)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('treats unknown and disabled senders as UnknownSender', async () => {
    await expect(relay.authz.canActAs(ADMIN, 'no-such-sender')).rejects.toBeInstanceOf(UnknownSenderError);

    await relay.registry.disable(senders.lead);
    await expect(relay.authz.canActAs(ADMIN, senders.lead)).rejects.toBeInstanceOf(UnknownSenderError);
    await expect(relay.authz.requestPermission({ id: 'sam', role: 'senior' }, senders.lead))
      .rejects.toBeInstanceOf(UnknownSenderError);
  });
});
