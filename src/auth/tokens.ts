/**
 * Requester tokens.
 *
 * Requesters authenticate with an HS256 JWT minted out of band (the
 * `token` CLI command, or whatever login service fronts the API).
 * Claims: `sub` (principal id) and `role`.
 */

import type { JWTPayload } from 'jose';
import { UnauthorizedError } from '../lib/errors.js';
import { isRole } from '../db/adapter.js';
import type { Principal } from '../engine/authorization.js';

const DEFAULT_TTL = '24h';

function key(jwtSecret: string): Uint8Array {
  return new TextEncoder().encode(jwtSecret);
}

export async function signPrincipalToken(
  principal: Principal,
  jwtSecret: string,
  ttl: string = DEFAULT_TTL,
): Promise<string> {
  const { SignJWT } = await import('jose');
  return new SignJWT({ role: principal.role })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(principal.id)
    .setIssuedAt()
    .setExpirationTime(ttl)
    .sign(key(jwtSecret));
}

/** Throws UnauthorizedError for a bad signature, expiry or missing claims. */
export async function verifyPrincipalToken(token: string, jwtSecret: string): Promise<Principal> {
  const { jwtVerify } = await import('jose');
  let payload: JWTPayload;
  try {
    ({ payload } = await jwtVerify(token, key(jwtSecret), { algorithms: ['HS256'] }));
  } catch {
    throw new UnauthorizedError('Invalid or expired token');
  }
  if (!payload.sub || !isRole(payload.role)) {
    throw new UnauthorizedError('Token is missing the sub or role claim');
  }
  return { id: payload.sub, role: payload.role };
}
