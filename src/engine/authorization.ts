/**
 * Authorization Engine
 *
 * Decides whether a principal may queue messages as a sender. Resolution
 * order: the principal's own sender, then an active explicit grant, then
 * the role matrix. A `pending_approval` outcome is its own answer and is
 * never treated as allowed; the way out is a permission request that an
 * admin approves into a grant.
 */

import { nanoid } from 'nanoid';
import type {
  DatabaseAdapter, GrantFilters, PermissionGrant, Role, Sender,
} from '../db/adapter.js';
import {
  ForbiddenError, InvalidStateError, NotFoundError, UnknownSenderError,
} from '../lib/errors.js';

export type Access = 'allowed' | 'forbidden' | 'pending_approval';

/** A requester identity as carried by its bearer token */
export interface Principal {
  id: string;
  role: Role;
}

/** principal role → target sender role → default outcome */
export const ROLE_MATRIX: Record<Role, Record<Role, Access>> = {
  base:   { base: 'forbidden', lead: 'forbidden', senior: 'forbidden',        admin: 'forbidden' },
  lead:   { base: 'allowed',   lead: 'allowed',   senior: 'forbidden',        admin: 'forbidden' },
  senior: { base: 'allowed',   lead: 'allowed',   senior: 'pending_approval', admin: 'forbidden' },
  admin:  { base: 'allowed',   lead: 'allowed',   senior: 'allowed',          admin: 'allowed' },
};

export interface AccessDecision {
  access: Access;
  via: 'own' | 'grant' | 'matrix';
  sender: Sender;
}

export interface AuthorizationOptions {
  clock?: () => Date;
}

export class AuthorizationEngine {
  private readonly clock: () => Date;

  constructor(private readonly db: DatabaseAdapter, opts: AuthorizationOptions = {}) {
    this.clock = opts.clock ?? (() => new Date());
  }

  async canActAs(principal: Principal, senderId: string): Promise<Access> {
    return (await this.decide(principal, senderId)).access;
  }

  /** Same resolution as `canActAs`, with the sender and the rule that decided. */
  async decide(principal: Principal, senderId: string): Promise<AccessDecision> {
    const sender = await this.loadEnabledSender(senderId);

    if (sender.principalId === principal.id) {
      return { access: 'allowed', via: 'own', sender };
    }
    const grant = await this.db.findActiveGrant(principal.id, senderId);
    if (grant) {
      return { access: 'allowed', via: 'grant', sender };
    }
    return { access: ROLE_MATRIX[principal.role][sender.role], via: 'matrix', sender };
  }

  /** Throws ForbiddenError (code FORBIDDEN or PENDING_APPROVAL) unless allowed. */
  async assertCanActAs(principal: Principal, senderId: string): Promise<Sender> {
    const decision = await this.decide(principal, senderId);
    if (decision.access === 'allowed') return decision.sender;
    throw new ForbiddenError(decision.access);
  }

  // ─── Permission Requests & Grants ───────────────────────

  /**
   * Files (or returns the already filed) request to act as a sender.
   * An existing active grant is returned as is.
   */
  async requestPermission(principal: Principal, senderId: string, reason?: string | null): Promise<PermissionGrant> {
    await this.loadEnabledSender(senderId);
    const grant = await this.db.requestGrant({
      id: nanoid(),
      principalId: principal.id,
      senderId,
      reason: reason ?? null,
      now: this.clock(),
    });
    if (grant.status === 'pending') {
      console.log(`[${this.clock().toISOString()}] INFO [auth] Permission request ${grant.id}: ${principal.id} → sender ${senderId}`);
    }
    return grant;
  }

  async listPermissionRequests(filters: GrantFilters = { status: 'pending' }): Promise<PermissionGrant[]> {
    return this.db.listGrants(filters);
  }

  async approvePermission(requestId: string, approver: Principal): Promise<PermissionGrant> {
    requireAdmin(approver, 'approve permission requests');
    const grant = await this.db.approveGrant(requestId, approver.id, this.clock());
    if (!grant) throw new NotFoundError(`Permission request ${requestId} not found`);
    if (grant.status === 'revoked') {
      throw new InvalidStateError(`Permission request ${requestId} was revoked`);
    }
    console.log(`[${this.clock().toISOString()}] INFO [auth] Permission request ${requestId} approved by ${approver.id}`);
    return grant;
  }

  /** Direct grant without a prior request. */
  async grant(principalId: string, senderId: string, grantedBy: Principal, reason?: string | null): Promise<PermissionGrant> {
    requireAdmin(grantedBy, 'grant access');
    await this.loadEnabledSender(senderId);
    return this.db.activateGrant({
      id: nanoid(),
      principalId,
      senderId,
      reason: reason ?? null,
      grantedBy: grantedBy.id,
      now: this.clock(),
    });
  }

  async revoke(grantId: string, revokedBy: Principal): Promise<PermissionGrant> {
    requireAdmin(revokedBy, 'revoke access');
    const grant = await this.db.revokeGrant(grantId, this.clock());
    if (!grant) throw new NotFoundError(`Grant ${grantId} not found`);
    console.log(`[${this.clock().toISOString()}] INFO [auth] Grant ${grantId} revoked by ${revokedBy.id}`);
    return grant;
  }

  private async loadEnabledSender(senderId: string): Promise<Sender> {
    const sender = await this.db.getSender(senderId);
    if (!sender || sender.disabledAt) throw new UnknownSenderError(senderId);
    return sender;
  }
}

export function requireAdmin(principal: Principal, action: string): void {
  if (principal.role !== 'admin') {
    throw new ForbiddenError('forbidden', `Only admins may ${action}`);
  }
}
