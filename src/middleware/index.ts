/**
 * Middleware Stack
 *
 * Rate limiting, request logging, error handling, validation,
 * request IDs, role gates and security headers.
 */

import type { Context, ErrorHandler, MiddlewareHandler, Next } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { CircuitOpenError, KeyedRateLimiter, requestId } from '../lib/resilience.js';
import { isRelayError, ValidationError, type ErrorStatus } from '../lib/errors.js';
import { ROLES, ROLE_RANK, isRole, type Role } from '../db/adapter.js';
import type { AppEnv } from '../types/hono-env.js';

export { ValidationError } from '../lib/errors.js';

// ─── Request ID ──────────────────────────────────────────

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const id = c.req.header('X-Request-Id') || requestId();
    c.set('requestId', id);
    c.header('X-Request-Id', id);
    await next();
  };
}

// ─── Request Logging ─────────────────────────────────────

export function requestLogger(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    const elapsed = Date.now() - start;
    const status = c.res.status;
    const reqId = c.get('requestId') || '-';

    const level = status >= 500 ? 'ERROR' : status >= 400 ? 'WARN' : 'INFO';
    console.log(
      `[${new Date().toISOString()}] ${level} ${method} ${path} ${status} ${elapsed}ms req=${reqId}`,
    );
  };
}

// ─── Rate Limiting ───────────────────────────────────────

interface RateLimitConfig {
  /** Requests per window */
  limit: number;
  /** Window in seconds */
  windowSec: number;
  /** Key extractor (default: IP) */
  keyFn?: (c: Context<AppEnv>) => string;
  /** Skip rate limiting for these paths */
  skipPaths?: string[];
}

export function rateLimiter(config: RateLimitConfig): MiddlewareHandler<AppEnv> {
  const limiter = new KeyedRateLimiter({
    maxTokens: config.limit,
    refillRate: config.limit / config.windowSec,
  });

  return async (c, next) => {
    if (config.skipPaths?.some(p => c.req.path.startsWith(p))) {
      return next();
    }

    const key = config.keyFn?.(c) ||
      c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ||
      c.req.header('x-real-ip') ||
      'unknown';

    if (!limiter.tryConsume(key)) {
      const retryAfter = Math.ceil(limiter.getRetryAfterMs(key) / 1000);
      c.header('Retry-After', String(retryAfter));
      c.header('X-RateLimit-Limit', String(config.limit));
      c.header('X-RateLimit-Remaining', '0');
      return c.json(
        { error: 'Too many requests', code: 'RATE_LIMITED', retryAfter },
        429,
      );
    }

    await next();
  };
}

// ─── Security Headers ────────────────────────────────────

export function securityHeaders(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    await next();

    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
    c.header('Cache-Control', 'no-store');

    if (c.req.url.startsWith('https://') || c.req.header('x-forwarded-proto') === 'https') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

// ─── Error Handler ───────────────────────────────────────

export interface ApiError {
  error: string;
  code?: string;
  details?: unknown;
  requestId?: string;
}

/**
 * Installed with `app.onError`. Relay errors keep their status and code;
 * anything unexpected is logged and reported as a bare 500.
 */
export function errorHandler(): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (err instanceof HTTPException) return err.getResponse();

    const reqId = c.get('requestId');
    let status: ErrorStatus = 500;
    let code = 'INTERNAL_ERROR';
    if (isRelayError(err)) {
      status = err.status;
      code = err.code;
    } else if (err instanceof CircuitOpenError) {
      status = err.status;
      code = err.code;
    }

    if (status >= 500) {
      console.error(`[${new Date().toISOString()}] ERROR req=${reqId}`, err);
    }

    const body: ApiError = {
      error: status === 500 ? 'Internal server error' : err.message,
      code,
      requestId: reqId,
    };
    if (isRelayError(err) && err.details) body.details = err.details;
    if (status === 503) c.header('Retry-After', '1');

    return c.json(body, status);
  };
}

// ─── Input Validation ────────────────────────────────────

export type Validator = {
  field: string;
  type: 'string' | 'integer' | 'boolean' | 'role';
  required?: boolean;
  minLength?: number;
  maxLength?: number;
  min?: number;
  max?: number;
  pattern?: RegExp;
};

export function validate(body: Record<string, unknown>, validators: Validator[]): void {
  const errors: Record<string, string> = {};

  for (const v of validators) {
    const value = body[v.field];

    if (value === undefined || value === null || value === '') {
      if (v.required) errors[v.field] = 'Required';
      continue;
    }

    switch (v.type) {
      case 'string':
        if (typeof value !== 'string') { errors[v.field] = 'Must be a string'; break; }
        if (v.minLength && value.length < v.minLength) errors[v.field] = `Min length: ${v.minLength}`;
        if (v.maxLength && value.length > v.maxLength) errors[v.field] = `Max length: ${v.maxLength}`;
        if (v.pattern && !v.pattern.test(value)) errors[v.field] = 'Invalid format';
        break;
      case 'integer':
        if (typeof value !== 'number' || !Number.isInteger(value)) { errors[v.field] = 'Must be an integer'; break; }
        if (v.min !== undefined && value < v.min) errors[v.field] = `Min: ${v.min}`;
        if (v.max !== undefined && value > v.max) errors[v.field] = `Max: ${v.max}`;
        break;
      case 'boolean':
        if (typeof value !== 'boolean') errors[v.field] = 'Must be a boolean';
        break;
      case 'role':
        if (!isRole(value)) errors[v.field] = `Must be one of: ${ROLES.join(', ')}`;
        break;
    }
  }

  if (Object.keys(errors).length > 0) {
    throw new ValidationError(errors);
  }
}

/**
 * Parses the JSON request body into a plain object. Malformed JSON and
 * non-object bodies are validation failures, not 500s.
 */
export async function readJson(c: Context<AppEnv>): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = await c.req.json();
  } catch {
    throw new ValidationError({ body: 'Malformed JSON' });
  }
  if (!isRecord(parsed)) throw new ValidationError({ body: 'Must be a JSON object' });
  return parsed;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── RBAC Middleware ─────────────────────────────────────

export function requireRole(minRole: Role): MiddlewareHandler<AppEnv> {
  return async (c: Context<AppEnv>, next: Next) => {
    const role = c.get('principalRole');

    if (!role || ROLE_RANK[role] < ROLE_RANK[minRole]) {
      return c.json({
        error: 'Insufficient permissions',
        code: 'FORBIDDEN',
        required: minRole,
        current: role || 'none',
      }, 403);
    }

    return next();
  };
}

// ─── Field Extraction ────────────────────────────────────

/** Reads a field `validate` has already checked; wrong types read as undefined. */
export function stringField(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  return typeof value === 'string' ? value : undefined;
}

export function numberField(body: Record<string, unknown>, field: string): number | undefined {
  const value = body[field];
  return typeof value === 'number' ? value : undefined;
}

export function booleanField(body: Record<string, unknown>, field: string): boolean | undefined {
  const value = body[field];
  return typeof value === 'boolean' ? value : undefined;
}
