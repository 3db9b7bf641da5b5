import type { Role } from '../db/adapter.js';

/**
 * Shared Hono environment type for the entire application.
 * Defines context variables set by auth middleware and consumed by route handlers.
 */
export type AppEnv = {
  Variables: {
    /** Requester routes: the authenticated principal */
    principalId: string;
    principalRole: Role;
    /** Agent routes: the authenticated sender */
    senderId: string;
    requestId: string;
  };
};
