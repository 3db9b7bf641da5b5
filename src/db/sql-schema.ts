/**
 * SQL schema for the store. Timestamps are ISO-8601 UTC strings written
 * by the caller's clock, so lexical order is time order.
 */

export const TABLES = {
  senders: `
    CREATE TABLE IF NOT EXISTS senders (
      id TEXT PRIMARY KEY,
      display_name TEXT NOT NULL,
      destination_address TEXT NOT NULL,
      role TEXT NOT NULL,
      principal_id TEXT NOT NULL,
      is_local INTEGER NOT NULL DEFAULT 0,
      secret_hash TEXT NOT NULL,
      last_heartbeat_at TEXT,
      registered_at TEXT NOT NULL,
      disabled_at TEXT
    )`,

  registration_codes: `
    CREATE TABLE IF NOT EXISTS registration_codes (
      id TEXT PRIMARY KEY,
      code_hash TEXT NOT NULL UNIQUE,
      principal_id TEXT NOT NULL,
      max_role TEXT NOT NULL,
      is_local INTEGER NOT NULL DEFAULT 0,
      issued_by TEXT NOT NULL,
      created_at TEXT NOT NULL,
      expires_at TEXT NOT NULL,
      used_at TEXT,
      used_by_sender_id TEXT REFERENCES senders(id)
    )`,

  permission_grants: `
    CREATE TABLE IF NOT EXISTS permission_grants (
      id TEXT PRIMARY KEY,
      principal_id TEXT NOT NULL,
      sender_id TEXT NOT NULL REFERENCES senders(id),
      status TEXT NOT NULL DEFAULT 'pending',
      reason TEXT,
      requested_at TEXT NOT NULL,
      granted_by TEXT,
      granted_at TEXT,
      revoked_at TEXT
    )`,

  queued_messages: `
    CREATE TABLE IF NOT EXISTS queued_messages (
      id TEXT PRIMARY KEY,
      sender_id TEXT NOT NULL REFERENCES senders(id),
      destination TEXT NOT NULL,
      body TEXT NOT NULL,
      requested_by TEXT NOT NULL,
      idempotency_key TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'queued',
      lease_token TEXT,
      lease_expires_at TEXT,
      not_before TEXT,
      attempt_count INTEGER NOT NULL DEFAULT 0,
      max_attempts INTEGER NOT NULL,
      created_at TEXT NOT NULL,
      leased_at TEXT,
      terminal_at TEXT,
      error_detail TEXT,
      cancel_requested_at TEXT,
      retry_of TEXT
    )`,

  indexes: [
    // One local line per address per principal; remote identities may share a line
    `CREATE UNIQUE INDEX IF NOT EXISTS idx_senders_local_destination
       ON senders(principal_id, destination_address) WHERE is_local = 1`,
    'CREATE INDEX IF NOT EXISTS idx_senders_principal ON senders(principal_id)',
    'CREATE INDEX IF NOT EXISTS idx_grants_principal_sender ON permission_grants(principal_id, sender_id)',
    'CREATE INDEX IF NOT EXISTS idx_grants_status ON permission_grants(status)',
    // Backstop for the dedupe check done inside the insert transaction
    `CREATE UNIQUE INDEX IF NOT EXISTS idx_messages_live_key
       ON queued_messages(sender_id, idempotency_key) WHERE status IN ('queued', 'leased')`,
    'CREATE INDEX IF NOT EXISTS idx_messages_sender_status ON queued_messages(sender_id, status, created_at)',
  ],
};

export function getAllCreateStatements(): string[] {
  return [
    TABLES.senders,
    TABLES.registration_codes,
    TABLES.permission_grants,
    TABLES.queued_messages,
    ...TABLES.indexes,
  ];
}
