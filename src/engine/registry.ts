/**
 * Sender Registry
 *
 * Senders join through a one-time registration code issued by an admin.
 * The code fixes the principal the sender belongs to, the highest role it
 * may claim and whether it is co-located with the server. Registration
 * hands back a secret exactly once; only its bcrypt hash is kept.
 */

import { createHash } from 'crypto';
import { customAlphabet, nanoid } from 'nanoid';
import { ROLE_RANK, type DatabaseAdapter, type Role, type Sender, type SenderRecord } from '../db/adapter.js';
import { ForbiddenError, UnauthorizedError, UnknownSenderError, ValidationError } from '../lib/errors.js';
import { validate } from '../middleware/index.js';
import { DEFAULT_OFFLINE_THRESHOLD_MS, livenessOf, type Liveness } from './liveness.js';

// No 0/O or 1/I: codes get read out and typed by hand
const CODE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
const generateCode = customAlphabet(CODE_ALPHABET, 12);

export const DEFAULT_CODE_TTL_MS = 24 * 60 * 60_000;

export type SenderView = Sender & Liveness;

export interface IssueCodeInput {
  principalId: string;
  maxRole: Role;
  isLocal?: boolean;
  issuedBy: string;
  ttlMs?: number;
}

export interface IssuedCode {
  codeId: string;
  /** Clear code; shown once, stored only as a digest */
  code: string;
  expiresAt: Date;
}

export interface RegisterInput {
  code: string;
  displayName: string;
  destinationAddress: string;
  requestedRole: Role;
}

export interface SenderCredentials {
  senderId: string;
  /** Shown once; only the hash is persisted */
  secret: string;
}

export interface RegistryOptions {
  clock?: () => Date;
  offlineThresholdMs?: number;
  /** bcrypt cost factor (default 12) */
  hashRounds?: number;
}

export function hashRegistrationCode(code: string): string {
  const canonical = code.toUpperCase().replace(/[^A-Z0-9]/g, '');
  return createHash('sha256').update(canonical, 'utf8').digest('hex');
}

export class SenderRegistry {
  private readonly clock: () => Date;
  private readonly offlineThresholdMs: number;
  private readonly hashRounds: number;
  private dummyHash: string | null = null;

  constructor(private readonly db: DatabaseAdapter, opts: RegistryOptions = {}) {
    this.clock = opts.clock ?? (() => new Date());
    this.offlineThresholdMs = opts.offlineThresholdMs ?? DEFAULT_OFFLINE_THRESHOLD_MS;
    this.hashRounds = opts.hashRounds ?? 12;
  }

  async issueRegistrationCode(input: IssueCodeInput): Promise<IssuedCode> {
    const ttlMs = input.ttlMs ?? DEFAULT_CODE_TTL_MS;
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new ValidationError({ ttlMs: 'Must be a positive duration' });
    }
    if (!input.principalId.trim()) {
      throw new ValidationError({ principalId: 'Required' });
    }

    const raw = generateCode();
    const code = `${raw.slice(0, 4)}-${raw.slice(4, 8)}-${raw.slice(8)}`;
    const now = this.clock();
    const record = await this.db.createRegistrationCode({
      id: nanoid(),
      codeHash: hashRegistrationCode(code),
      principalId: input.principalId,
      maxRole: input.maxRole,
      isLocal: input.isLocal ?? false,
      issuedBy: input.issuedBy,
      createdAt: now,
      expiresAt: new Date(now.getTime() + ttlMs),
    });

    console.log(`[${now.toISOString()}] INFO [registry] Registration code ${record.id} issued by ${input.issuedBy} for ${input.principalId} (max role ${input.maxRole})`);
    return { codeId: record.id, code, expiresAt: record.expiresAt };
  }

  /**
   * Consumes the code and creates the sender in one transaction. A code
   * that is unknown, used or expired is reported as Unauthorized without
   * saying which.
   */
  async register(input: RegisterInput): Promise<SenderCredentials> {
    validate({ ...input }, [
      { field: 'code', type: 'string', required: true, maxLength: 64 },
      { field: 'displayName', type: 'string', required: true, maxLength: 100 },
      { field: 'destinationAddress', type: 'string', required: true, maxLength: 320 },
      { field: 'requestedRole', type: 'role', required: true },
    ]);
    const displayName = input.displayName.trim();
    const destinationAddress = input.destinationAddress.trim();
    if (!displayName || !destinationAddress) {
      throw new ValidationError({
        ...(displayName ? {} : { displayName: 'Required' }),
        ...(destinationAddress ? {} : { destinationAddress: 'Required' }),
      });
    }

    const { default: bcrypt } = await import('bcryptjs');
    const secret = nanoid(32);
    const secretHash = await bcrypt.hash(secret, this.hashRounds);
    const id = nanoid();

    const sender = await this.db.registerSender({
      id,
      codeHash: hashRegistrationCode(input.code),
      displayName,
      destinationAddress,
      role: input.requestedRole,
      secretHash,
      now: this.clock(),
      checkCode: (code) => {
        if (ROLE_RANK[input.requestedRole] > ROLE_RANK[code.maxRole]) {
          throw new ForbiddenError('forbidden', `Registration code allows at most role "${code.maxRole}"`);
        }
      },
    });

    console.log(`[${this.clock().toISOString()}] INFO [registry] Sender ${sender.id} registered as ${sender.role} for ${sender.principalId}${sender.isLocal ? ' (local)' : ''}`);
    return { senderId: sender.id, secret };
  }

  /**
   * Constant-time check of a sender secret. Unknown ids are compared
   * against a dummy hash so both failure cases cost and look the same.
   * Disabled senders still authenticate so they can finish open leases.
   */
  async authenticate(senderId: string, secret: string): Promise<Sender> {
    const { default: bcrypt } = await import('bcryptjs');
    const record = senderId ? await this.db.getSender(senderId) : null;
    const hash = record?.secretHash ?? await this.getDummyHash();
    const ok = await bcrypt.compare(secret, hash);
    if (!record || !ok) throw new UnauthorizedError();
    return toSender(record);
  }

  async heartbeat(senderId: string, secret: string): Promise<Date> {
    await this.authenticate(senderId, secret);
    return this.recordHeartbeat(senderId);
  }

  /** Heartbeat for a caller the agent API has already authenticated. */
  async recordHeartbeat(senderId: string): Promise<Date> {
    const now = this.clock();
    await this.db.touchHeartbeat(senderId, now);
    return now;
  }

  async disable(senderId: string): Promise<Sender> {
    const sender = await this.db.disableSender(senderId, this.clock());
    if (!sender) throw new UnknownSenderError(senderId);
    console.log(`[${this.clock().toISOString()}] INFO [registry] Sender ${senderId} disabled`);
    return sender;
  }

  async listAvailable(): Promise<SenderView[]> {
    const now = this.clock();
    const senders = await this.db.listSenders();
    return senders.map(s => ({ ...s, ...livenessOf(s, now, this.offlineThresholdMs) }));
  }

  async getSender(senderId: string): Promise<SenderView | null> {
    const record = await this.db.getSender(senderId);
    if (!record) return null;
    const sender = toSender(record);
    return { ...sender, ...livenessOf(sender, this.clock(), this.offlineThresholdMs) };
  }

  private async getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      const { default: bcrypt } = await import('bcryptjs');
      this.dummyHash = await bcrypt.hash(nanoid(32), this.hashRounds);
    }
    return this.dummyHash;
  }
}

function toSender(record: SenderRecord): Sender {
  return {
    id: record.id,
    displayName: record.displayName,
    destinationAddress: record.destinationAddress,
    role: record.role,
    principalId: record.principalId,
    isLocal: record.isLocal,
    lastHeartbeatAt: record.lastHeartbeatAt,
    registeredAt: record.registeredAt,
    disabledAt: record.disabledAt,
  };
}
