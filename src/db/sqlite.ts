/**
 * SQLite Database Adapter
 *
 * Default store for single-server deployments and tests (':memory:').
 * Uses better-sqlite3: every write runs as a synchronous `BEGIN IMMEDIATE`
 * transaction, which takes the database write lock up front and gives each
 * logical operation serializable isolation, across processes sharing the
 * same file as well as within one process.
 */

import type BetterSqlite3 from 'better-sqlite3';
import {
  DatabaseAdapter, isRole,
  type DatabaseConfig, type Role, type Sender, type SenderRecord,
  type RegistrationCode, type RegistrationCodeInput, type RegisterSenderInput,
  type PermissionGrant, type GrantInput, type GrantFilters, type GrantStatus,
  type QueuedMessage, type MessageStatus, type NewMessageInput, type InsertMessageResult,
  type LeaseInput, type LeaseResult, type MessagePatch, type MessageFilters, type QueueStats,
} from './adapter.js';
import { getAllCreateStatements } from './sql-schema.js';
import { withRetry, type RetryOptions } from '../lib/resilience.js';
import {
  ContentionError, InvalidStateError, UnauthorizedError, UnknownSenderError,
} from '../lib/errors.js';

type SqliteDatabase = BetterSqlite3.Database;
type SqlValue = string | number | null;

let Driver: typeof BetterSqlite3 | null = null;

async function getSqlite(): Promise<typeof BetterSqlite3> {
  if (!Driver) {
    try {
      const mod = await import('better-sqlite3');
      Driver = mod.default;
    } catch {
      throw new Error('SQLite driver not found. Install it: npm install better-sqlite3');
    }
  }
  return Driver;
}

// ─── Row Shapes ──────────────────────────────────────────────

interface SenderRow {
  id: string;
  display_name: string;
  destination_address: string;
  role: string;
  principal_id: string;
  is_local: number;
  secret_hash: string;
  last_heartbeat_at: string | null;
  registered_at: string;
  disabled_at: string | null;
}

interface CodeRow {
  id: string;
  code_hash: string;
  principal_id: string;
  max_role: string;
  is_local: number;
  issued_by: string;
  created_at: string;
  expires_at: string;
  used_at: string | null;
  used_by_sender_id: string | null;
}

interface GrantRow {
  id: string;
  principal_id: string;
  sender_id: string;
  status: string;
  reason: string | null;
  requested_at: string;
  granted_by: string | null;
  granted_at: string | null;
  revoked_at: string | null;
}

interface MessageRow {
  id: string;
  sender_id: string;
  destination: string;
  body: string;
  requested_by: string;
  idempotency_key: string;
  status: string;
  lease_token: string | null;
  lease_expires_at: string | null;
  not_before: string | null;
  attempt_count: number;
  max_attempts: number;
  created_at: string;
  leased_at: string | null;
  terminal_at: string | null;
  error_detail: string | null;
  cancel_requested_at: string | null;
  retry_of: string | null;
}

interface StatsRow {
  total: number;
  queued: number;
  leased: number;
  sent: number;
  failed: number;
}

// Rows a dequeue may hand out: due queued rows, or leases that ran out
const ELIGIBLE = `(
  (status = 'queued' AND (not_before IS NULL OR not_before <= @now))
  OR (status = 'leased' AND lease_expires_at < @now)
)`;

const DEFAULT_CONTENTION_RETRY: Partial<RetryOptions> = {
  maxAttempts: 6,
  baseDelayMs: 25,
  maxDelayMs: 1_000,
  jitterMs: 25,
};

export class SqliteAdapter extends DatabaseAdapter {
  readonly type = 'sqlite' as const;
  private db: SqliteDatabase | null = null;
  private contentionRetry: Partial<RetryOptions> = DEFAULT_CONTENTION_RETRY;

  async connect(config: DatabaseConfig): Promise<void> {
    const Db = await getSqlite();
    const path = config.connectionString || config.database || './sendrelay.db';
    const db = new Db(path);
    if (path !== ':memory:') db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma(`busy_timeout = ${Math.max(0, Math.floor(config.busyTimeoutMs ?? 5_000))}`);
    this.db = db;
    this.contentionRetry = { ...DEFAULT_CONTENTION_RETRY, ...config.contentionRetry };
  }

  async disconnect(): Promise<void> {
    if (this.db) this.db.close();
    this.db = null;
  }

  isConnected(): boolean {
    return this.db !== null;
  }

  async migrate(): Promise<void> {
    const db = this.conn();
    const stmts = getAllCreateStatements();
    db.transaction(() => {
      for (const stmt of stmts) db.exec(stmt);
    })();
  }

  async ping(): Promise<void> {
    this.conn().prepare('SELECT 1').get();
  }

  // ─── Registration Codes ──────────────────────────────────

  async createRegistrationCode(input: RegistrationCodeInput): Promise<RegistrationCode> {
    return this.write(db => {
      db.prepare(
        `INSERT INTO registration_codes (id, code_hash, principal_id, max_role, is_local, issued_by, created_at, expires_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(input.id, input.codeHash, input.principalId, input.maxRole, input.isLocal ? 1 : 0,
        input.issuedBy, iso(input.createdAt), iso(input.expiresAt));
      return this.mapCode(this.mustGet<CodeRow>(db, 'SELECT * FROM registration_codes WHERE id = ?', input.id));
    });
  }

  // ─── Senders ─────────────────────────────────────────────

  async registerSender(input: RegisterSenderInput): Promise<SenderRecord> {
    return this.write(db => {
      const now = iso(input.now);
      const row = db.prepare<[string], CodeRow>('SELECT * FROM registration_codes WHERE code_hash = ?').get(input.codeHash);
      if (!row || row.used_at !== null || row.expires_at <= now) {
        throw new UnauthorizedError('Invalid or expired registration code');
      }
      const code = this.mapCode(row);
      input.checkCode(code);

      db.prepare(
        `INSERT INTO senders (id, display_name, destination_address, role, principal_id, is_local, secret_hash, registered_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(input.id, input.displayName, input.destinationAddress, input.role, code.principalId,
        code.isLocal ? 1 : 0, input.secretHash, now);
      db.prepare('UPDATE registration_codes SET used_at = ?, used_by_sender_id = ? WHERE id = ?')
        .run(now, input.id, code.id);

      return this.mapSenderRecord(this.mustGet<SenderRow>(db, 'SELECT * FROM senders WHERE id = ?', input.id));
    });
  }

  async getSender(id: string): Promise<SenderRecord | null> {
    const r = this.conn().prepare<[string], SenderRow>('SELECT * FROM senders WHERE id = ?').get(id);
    return r ? this.mapSenderRecord(r) : null;
  }

  async listSenders(opts?: { includeDisabled?: boolean }): Promise<Sender[]> {
    let q = 'SELECT * FROM senders';
    if (!opts?.includeDisabled) q += ' WHERE disabled_at IS NULL';
    q += ' ORDER BY display_name, registered_at';
    return this.conn().prepare<[], SenderRow>(q).all().map(r => this.mapSender(r));
  }

  async touchHeartbeat(id: string, at: Date): Promise<void> {
    await this.write(db => {
      db.prepare('UPDATE senders SET last_heartbeat_at = ? WHERE id = ?').run(iso(at), id);
    });
  }

  async disableSender(id: string, at: Date): Promise<Sender | null> {
    return this.write(db => {
      db.prepare('UPDATE senders SET disabled_at = COALESCE(disabled_at, ?) WHERE id = ?').run(iso(at), id);
      const r = db.prepare<[string], SenderRow>('SELECT * FROM senders WHERE id = ?').get(id);
      return r ? this.mapSender(r) : null;
    });
  }

  // ─── Permission Grants ───────────────────────────────────

  async requestGrant(input: GrantInput): Promise<PermissionGrant> {
    return this.write(db => {
      this.assertSenderExists(db, input.senderId);
      const live = this.findLiveGrant(db, input.principalId, input.senderId);
      if (live) return live;
      db.prepare(
        `INSERT INTO permission_grants (id, principal_id, sender_id, status, reason, requested_at)
         VALUES (?, ?, ?, 'pending', ?, ?)`
      ).run(input.id, input.principalId, input.senderId, input.reason ?? null, iso(input.now));
      return this.mapGrant(this.mustGet<GrantRow>(db, 'SELECT * FROM permission_grants WHERE id = ?', input.id));
    });
  }

  async activateGrant(input: GrantInput & { grantedBy: string }): Promise<PermissionGrant> {
    return this.write(db => {
      this.assertSenderExists(db, input.senderId);
      const now = iso(input.now);
      const live = this.findLiveGrant(db, input.principalId, input.senderId);
      if (live?.status === 'active') return live;
      if (live) {
        db.prepare(`UPDATE permission_grants SET status = 'active', granted_by = ?, granted_at = ? WHERE id = ?`)
          .run(input.grantedBy, now, live.id);
        return this.mapGrant(this.mustGet<GrantRow>(db, 'SELECT * FROM permission_grants WHERE id = ?', live.id));
      }
      db.prepare(
        `INSERT INTO permission_grants (id, principal_id, sender_id, status, reason, requested_at, granted_by, granted_at)
         VALUES (?, ?, ?, 'active', ?, ?, ?, ?)`
      ).run(input.id, input.principalId, input.senderId, input.reason ?? null, now, input.grantedBy, now);
      return this.mapGrant(this.mustGet<GrantRow>(db, 'SELECT * FROM permission_grants WHERE id = ?', input.id));
    });
  }

  async approveGrant(id: string, grantedBy: string, now: Date): Promise<PermissionGrant | null> {
    return this.write(db => {
      db.prepare(`UPDATE permission_grants SET status = 'active', granted_by = ?, granted_at = ? WHERE id = ? AND status = 'pending'`)
        .run(grantedBy, iso(now), id);
      const r = db.prepare<[string], GrantRow>('SELECT * FROM permission_grants WHERE id = ?').get(id);
      return r ? this.mapGrant(r) : null;
    });
  }

  async revokeGrant(id: string, now: Date): Promise<PermissionGrant | null> {
    return this.write(db => {
      db.prepare(`UPDATE permission_grants SET status = 'revoked', revoked_at = ? WHERE id = ? AND status != 'revoked'`)
        .run(iso(now), id);
      const r = db.prepare<[string], GrantRow>('SELECT * FROM permission_grants WHERE id = ?').get(id);
      return r ? this.mapGrant(r) : null;
    });
  }

  async getGrant(id: string): Promise<PermissionGrant | null> {
    const r = this.conn().prepare<[string], GrantRow>('SELECT * FROM permission_grants WHERE id = ?').get(id);
    return r ? this.mapGrant(r) : null;
  }

  async findActiveGrant(principalId: string, senderId: string): Promise<PermissionGrant | null> {
    const r = this.conn().prepare<[string, string], GrantRow>(
      `SELECT * FROM permission_grants WHERE principal_id = ? AND sender_id = ? AND status = 'active' LIMIT 1`
    ).get(principalId, senderId);
    return r ? this.mapGrant(r) : null;
  }

  async listGrants(filters: GrantFilters = {}): Promise<PermissionGrant[]> {
    const where: string[] = [];
    const params: SqlValue[] = [];
    if (filters.status) { where.push('status = ?'); params.push(filters.status); }
    if (filters.principalId) { where.push('principal_id = ?'); params.push(filters.principalId); }
    if (filters.senderId) { where.push('sender_id = ?'); params.push(filters.senderId); }
    const wc = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
    return this.conn().prepare<SqlValue[], GrantRow>(`SELECT * FROM permission_grants ${wc} ORDER BY requested_at, rowid`)
      .all(...params).map(r => this.mapGrant(r));
  }

  // ─── Messages ────────────────────────────────────────────

  async insertMessage(input: NewMessageInput): Promise<InsertMessageResult> {
    return this.write((db): InsertMessageResult => {
      const sender = db.prepare<[string], Pick<SenderRow, 'disabled_at'>>('SELECT disabled_at FROM senders WHERE id = ?').get(input.senderId);
      if (!sender || sender.disabled_at !== null) throw new UnknownSenderError(input.senderId);

      const existing = db.prepare<[string, string], MessageRow>(
        `SELECT * FROM queued_messages
         WHERE sender_id = ? AND idempotency_key = ? AND status IN ('queued', 'leased') LIMIT 1`
      ).get(input.senderId, input.idempotencyKey);
      if (existing) return { inserted: false, existing: this.mapMessage(existing) };

      db.prepare(
        `INSERT INTO queued_messages
           (id, sender_id, destination, body, requested_by, idempotency_key, status, attempt_count, max_attempts, created_at, retry_of)
         VALUES (?, ?, ?, ?, ?, ?, 'queued', ?, ?, ?, ?)`
      ).run(input.id, input.senderId, input.destination, input.body, input.requestedBy, input.idempotencyKey,
        input.attemptCount ?? 0, input.maxAttempts, iso(input.now), input.retryOf ?? null);
      return { inserted: true, message: this.mapMessage(this.mustGet<MessageRow>(db, 'SELECT * FROM queued_messages WHERE id = ?', input.id)) };
    });
  }

  async leaseMessages(input: LeaseInput): Promise<LeaseResult> {
    return this.write((db): LeaseResult => {
      const now = iso(input.now);
      const scope = { sender: input.senderId, now };

      let expired = 0;
      if (input.expireBefore) {
        expired = this.expireEligible(db, input.senderId, iso(input.expireBefore), now);
      }

      // Cancellations deferred while leased take effect once the lease lapses
      const cancelled = db.prepare(
        `UPDATE queued_messages
         SET status = 'failed', error_detail = 'cancelled', terminal_at = @now, lease_token = NULL, lease_expires_at = NULL
         WHERE sender_id = @sender AND status = 'leased' AND lease_expires_at < @now AND cancel_requested_at IS NOT NULL`
      ).run(scope).changes;

      const sender = db.prepare<[string], Pick<SenderRow, 'disabled_at'>>('SELECT disabled_at FROM senders WHERE id = ?').get(input.senderId);
      if (!sender || sender.disabled_at !== null) {
        return { messages: [], hasMore: false, expired, cancelled };
      }

      const limit = Math.max(0, Math.floor(input.maxBatch));
      const picked = db.prepare<{ sender: string; now: string; limit: number }, { id: string }>(
        `SELECT id FROM queued_messages
         WHERE sender_id = @sender AND ${ELIGIBLE}
         ORDER BY created_at, rowid
         LIMIT @limit`
      ).all({ ...scope, limit });

      const leaseExpiresAt = iso(new Date(input.now.getTime() + input.leaseMs));
      const flip = db.prepare(
        `UPDATE queued_messages
         SET status = 'leased', lease_token = ?, lease_expires_at = ?, leased_at = ?
         WHERE id = ?`
      );
      const load = db.prepare<[string], MessageRow>('SELECT * FROM queued_messages WHERE id = ?');
      const messages: QueuedMessage[] = [];
      for (const { id } of picked) {
        flip.run(input.newLeaseToken(), leaseExpiresAt, now, id);
        const row = load.get(id);
        if (row) messages.push(this.mapMessage(row));
      }

      const more = db.prepare<{ sender: string; now: string }, { n: number }>(
        `SELECT EXISTS (SELECT 1 FROM queued_messages WHERE sender_id = @sender AND ${ELIGIBLE}) AS n`
      ).get(scope);

      return { messages, hasMore: (more?.n ?? 0) === 1, expired, cancelled };
    });
  }

  async transitionMessage(
    id: string,
    fn: (current: QueuedMessage | null) => MessagePatch | null,
  ): Promise<QueuedMessage | null> {
    return this.write(db => {
      const load = db.prepare<[string], MessageRow>('SELECT * FROM queued_messages WHERE id = ?');
      const row = load.get(id);
      const current = row ? this.mapMessage(row) : null;
      const patch = fn(current);
      if (!current || !patch) return current;

      const sets: string[] = [];
      const vals: SqlValue[] = [];
      if (patch.status !== undefined) { sets.push('status = ?'); vals.push(patch.status); }
      if (patch.leaseToken !== undefined) { sets.push('lease_token = ?'); vals.push(patch.leaseToken); }
      if (patch.leaseExpiresAt !== undefined) { sets.push('lease_expires_at = ?'); vals.push(isoOrNull(patch.leaseExpiresAt)); }
      if (patch.notBefore !== undefined) { sets.push('not_before = ?'); vals.push(isoOrNull(patch.notBefore)); }
      if (patch.attemptCount !== undefined) { sets.push('attempt_count = ?'); vals.push(patch.attemptCount); }
      if (patch.terminalAt !== undefined) { sets.push('terminal_at = ?'); vals.push(isoOrNull(patch.terminalAt)); }
      if (patch.errorDetail !== undefined) { sets.push('error_detail = ?'); vals.push(patch.errorDetail); }
      if (patch.cancelRequestedAt !== undefined) { sets.push('cancel_requested_at = ?'); vals.push(isoOrNull(patch.cancelRequestedAt)); }
      if (sets.length === 0) return current;

      vals.push(id);
      db.prepare<SqlValue[]>(`UPDATE queued_messages SET ${sets.join(', ')} WHERE id = ?`).run(...vals);
      const updated = load.get(id);
      return updated ? this.mapMessage(updated) : null;
    });
  }

  async expireMessages(senderId: string, createdBefore: Date, now: Date): Promise<number> {
    return this.write(db => this.expireEligible(db, senderId, iso(createdBefore), iso(now)));
  }

  async getMessage(id: string): Promise<QueuedMessage | null> {
    const r = this.conn().prepare<[string], MessageRow>('SELECT * FROM queued_messages WHERE id = ?').get(id);
    return r ? this.mapMessage(r) : null;
  }

  async listMessages(filters: MessageFilters = {}): Promise<QueuedMessage[]> {
    const where: string[] = [];
    const params: SqlValue[] = [];
    if (filters.senderId) { where.push('sender_id = ?'); params.push(filters.senderId); }
    if (filters.status) { where.push('status = ?'); params.push(filters.status); }
    const wc = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
    let q = `SELECT * FROM queued_messages ${wc} ORDER BY created_at, rowid`;
    if (filters.limit) { q += ' LIMIT ?'; params.push(filters.limit); }
    if (filters.offset) { q += `${filters.limit ? '' : ' LIMIT -1'} OFFSET ?`; params.push(filters.offset); }
    return this.conn().prepare<SqlValue[], MessageRow>(q).all(...params).map(r => this.mapMessage(r));
  }

  async getQueueStats(senderId?: string): Promise<QueueStats> {
    const select = `SELECT
        COUNT(*) AS total,
        COALESCE(SUM(CASE WHEN status = 'queued' THEN 1 ELSE 0 END), 0) AS queued,
        COALESCE(SUM(CASE WHEN status = 'leased' THEN 1 ELSE 0 END), 0) AS leased,
        COALESCE(SUM(CASE WHEN status = 'sent' THEN 1 ELSE 0 END), 0) AS sent,
        COALESCE(SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END), 0) AS failed
      FROM queued_messages`;
    const r = senderId
      ? this.conn().prepare<[string], StatsRow>(`${select} WHERE sender_id = ?`).get(senderId)
      : this.conn().prepare<[], StatsRow>(select).get();
    return {
      total: r?.total ?? 0, queued: r?.queued ?? 0, leased: r?.leased ?? 0,
      sent: r?.sent ?? 0, failed: r?.failed ?? 0,
    };
  }

  // ─── Internals ───────────────────────────────────────────

  private conn(): SqliteDatabase {
    if (!this.db) throw new Error('SQLite adapter is not connected');
    return this.db;
  }

  /**
   * Runs `fn` as one BEGIN IMMEDIATE transaction. Lock contention is
   * retried with backoff and only surfaces once the budget is spent.
   */
  private write<T>(fn: (db: SqliteDatabase) => T): Promise<T> {
    const db = this.conn();
    return withRetry(async () => {
      try {
        return db.transaction(() => fn(db)).immediate();
      } catch (err) {
        throw translateError(err);
      }
    }, {
      ...this.contentionRetry,
      retryableErrors: err => err instanceof ContentionError,
      onRetry: (attempt, _err, delayMs) => {
        console.warn(`[${new Date().toISOString()}] WARN [store] write contention, retry ${attempt} in ${Math.round(delayMs)}ms`);
      },
    });
  }

  private mustGet<T>(db: SqliteDatabase, sql: string, id: string): T {
    const r = db.prepare<[string], T>(sql).get(id);
    if (r === undefined) throw new Error(`Row ${id} vanished inside its own transaction`);
    return r;
  }

  private assertSenderExists(db: SqliteDatabase, senderId: string): void {
    const r = db.prepare<[string], { id: string }>('SELECT id FROM senders WHERE id = ?').get(senderId);
    if (!r) throw new UnknownSenderError(senderId);
  }

  private findLiveGrant(db: SqliteDatabase, principalId: string, senderId: string): PermissionGrant | null {
    const r = db.prepare<[string, string], GrantRow>(
      `SELECT * FROM permission_grants
       WHERE principal_id = ? AND sender_id = ? AND status IN ('pending', 'active')
       ORDER BY CASE status WHEN 'active' THEN 0 ELSE 1 END, requested_at
       LIMIT 1`
    ).get(principalId, senderId);
    return r ? this.mapGrant(r) : null;
  }

  private expireEligible(db: SqliteDatabase, senderId: string, createdBefore: string, now: string): number {
    return db.prepare(
      `UPDATE queued_messages
       SET status = 'failed', error_detail = 'expired', terminal_at = @now, lease_token = NULL, lease_expires_at = NULL
       WHERE sender_id = @sender AND created_at < @cutoff
         AND (status = 'queued' OR (status = 'leased' AND lease_expires_at < @now))`
    ).run({ sender: senderId, cutoff: createdBefore, now }).changes;
  }

  // ─── Mappers ─────────────────────────────────────────────

  private mapSender(r: SenderRow): Sender {
    return {
      id: r.id, displayName: r.display_name, destinationAddress: r.destination_address,
      role: toRole(r.role), principalId: r.principal_id, isLocal: r.is_local === 1,
      lastHeartbeatAt: toDate(r.last_heartbeat_at), registeredAt: new Date(r.registered_at),
      disabledAt: toDate(r.disabled_at),
    };
  }

  private mapSenderRecord(r: SenderRow): SenderRecord {
    return { ...this.mapSender(r), secretHash: r.secret_hash };
  }

  private mapCode(r: CodeRow): RegistrationCode {
    return {
      id: r.id, principalId: r.principal_id, maxRole: toRole(r.max_role), isLocal: r.is_local === 1,
      issuedBy: r.issued_by, createdAt: new Date(r.created_at), expiresAt: new Date(r.expires_at),
      usedAt: toDate(r.used_at), usedBySenderId: r.used_by_sender_id,
    };
  }

  private mapGrant(r: GrantRow): PermissionGrant {
    return {
      id: r.id, principalId: r.principal_id, senderId: r.sender_id, status: toGrantStatus(r.status),
      reason: r.reason, requestedAt: new Date(r.requested_at), grantedBy: r.granted_by,
      grantedAt: toDate(r.granted_at), revokedAt: toDate(r.revoked_at),
    };
  }

  private mapMessage(r: MessageRow): QueuedMessage {
    return {
      id: r.id, senderId: r.sender_id, destination: r.destination, body: r.body,
      requestedBy: r.requested_by, idempotencyKey: r.idempotency_key, status: toMessageStatus(r.status),
      leaseToken: r.lease_token, leaseExpiresAt: toDate(r.lease_expires_at), notBefore: toDate(r.not_before),
      attemptCount: r.attempt_count, maxAttempts: r.max_attempts, createdAt: new Date(r.created_at),
      leasedAt: toDate(r.leased_at), terminalAt: toDate(r.terminal_at), errorDetail: r.error_detail,
      cancelRequestedAt: toDate(r.cancel_requested_at), retryOf: r.retry_of,
    };
  }
}

// ─── Helpers ─────────────────────────────────────────────────

function iso(d: Date): string {
  return d.toISOString();
}

function isoOrNull(d: Date | null): string | null {
  return d ? d.toISOString() : null;
}

function toDate(s: string | null): Date | null {
  return s ? new Date(s) : null;
}

function toRole(value: string): Role {
  if (!isRole(value)) throw new Error(`Corrupt role in store: ${value}`);
  return value;
}

function toGrantStatus(value: string): GrantStatus {
  if (value === 'pending' || value === 'active' || value === 'revoked') return value;
  throw new Error(`Corrupt grant status in store: ${value}`);
}

function toMessageStatus(value: string): MessageStatus {
  if (value === 'queued' || value === 'leased' || value === 'sent' || value === 'failed') return value;
  throw new Error(`Corrupt message status in store: ${value}`);
}

function sqliteCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return null;
}

function translateError(err: unknown): unknown {
  const code = sqliteCode(err);
  if (!code) return err;
  if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED')) {
    return new ContentionError();
  }
  if (code === 'SQLITE_CONSTRAINT_UNIQUE' && err instanceof Error && err.message.includes('senders.')) {
    return new InvalidStateError('This destination address is already registered as a local sender for the principal');
  }
  return err;
}
