/**
 * Server configuration from the environment.
 *
 * Every setting has a default except the JWT secret. Malformed values
 * fail startup with a ValidationError naming each bad variable.
 */

import { ValidationError } from './errors.js';
import { DEFAULT_QUEUE_POLICY, type QueuePolicy } from '../engine/queue.js';
import { DEFAULT_OFFLINE_THRESHOLD_MS } from '../engine/liveness.js';

export interface ServerSettings {
  port: number;
  dbPath: string;
  jwtSecret: string;
  queue: QueuePolicy;
  offlineThresholdMs: number;
  /** Requests per minute per IP */
  rateLimit: number;
  corsOrigins: string[] | undefined;
}

type Env = Record<string, string | undefined>;

export function loadServerConfig(env: Env = process.env): ServerSettings {
  const errors: Record<string, string> = {};

  const int = (name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number => {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n < min || n > max) {
      errors[name] = `Must be an integer between ${min} and ${max}`;
      return fallback;
    }
    return n;
  };

  const port = int('SENDRELAY_PORT', 8787, 0, 65535);
  const maxAttempts = int('SENDRELAY_MAX_ATTEMPTS', DEFAULT_QUEUE_POLICY.maxAttempts, 1, 100);
  const leaseSeconds = int('SENDRELAY_LEASE_SECONDS', DEFAULT_QUEUE_POLICY.defaultLeaseMs / 1000, 1, 3600);
  const offlineSeconds = int('SENDRELAY_OFFLINE_THRESHOLD_SECONDS', DEFAULT_OFFLINE_THRESHOLD_MS / 1000, 1);
  const dedupeSeconds = int('SENDRELAY_DEDUPE_WINDOW_SECONDS', DEFAULT_QUEUE_POLICY.dedupeWindowMs / 1000, 1);
  // 0 turns expiry at dequeue off
  const maxAgeHours = int('SENDRELAY_MESSAGE_MAX_AGE_HOURS', 0, 0);
  const rateLimit = int('SENDRELAY_RATE_LIMIT', 120, 1);

  const jwtSecret = env.SENDRELAY_JWT_SECRET ?? '';
  if (!jwtSecret) errors.SENDRELAY_JWT_SECRET = 'Required';

  const corsOrigins = env.SENDRELAY_CORS_ORIGINS
    ?.split(',')
    .map(o => o.trim())
    .filter(Boolean);

  if (Object.keys(errors).length > 0) throw new ValidationError(errors);

  return {
    port,
    dbPath: env.SENDRELAY_DB_PATH?.trim() || './sendrelay.db',
    jwtSecret,
    queue: {
      ...DEFAULT_QUEUE_POLICY,
      maxAttempts,
      defaultLeaseMs: leaseSeconds * 1000,
      dedupeWindowMs: dedupeSeconds * 1000,
      maxAgeMs: maxAgeHours > 0 ? maxAgeHours * 3_600_000 : null,
    },
    offlineThresholdMs: offlineSeconds * 1000,
    rateLimit,
    corsOrigins: corsOrigins && corsOrigins.length > 0 ? corsOrigins : undefined,
  };
}
