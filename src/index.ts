/**
 * sendrelay
 *
 * Sender registry, leased message queue and delivery agents for
 * personalized outbound messaging.
 *
 * @example
 * ```ts
 * import { createAdapter, createServer } from 'sendrelay';
 *
 * const db = await createAdapter({ type: 'sqlite', connectionString: './relay.db' });
 * await db.migrate();
 *
 * const server = createServer({ port: 8787, db, jwtSecret: process.env.SENDRELAY_JWT_SECRET ?? '' });
 * await server.start();
 * ```
 */

// Database
export { DatabaseAdapter, ROLES, ROLE_RANK, isRole } from './db/adapter.js';
export type {
  DatabaseConfig, DatabaseType, Role,
  Sender, RegistrationCode, PermissionGrant, GrantStatus,
  QueuedMessage, MessageStatus, QueueStats, MessageFilters,
} from './db/adapter.js';
export { createAdapter } from './db/factory.js';

// Server
export { createServer, VERSION } from './server.js';
export type { ServerConfig, ServerInstance } from './server.js';
export { loadServerConfig } from './lib/config.js';
export type { ServerSettings } from './lib/config.js';

// Requester tokens
export { signPrincipalToken, verifyPrincipalToken } from './auth/tokens.js';

// Middleware (for extending the server)
export {
  requestIdMiddleware,
  requestLogger,
  rateLimiter,
  securityHeaders,
  errorHandler,
  requireRole,
  validate,
} from './middleware/index.js';

// Errors
export {
  RelayError, UnauthorizedError, ForbiddenError, UnknownSenderError, NotFoundError,
  InvalidLeaseError, InvalidStateError, ExpiredError, MessageTooLargeError,
  ContentionError, ValidationError, isRelayError,
} from './lib/errors.js';

// Engine
export * from './engine/index.js';

// Resilience (for custom integrations)
export {
  withRetry,
  CircuitBreaker,
  RateLimiter,
  KeyedRateLimiter,
  HealthMonitor,
  CircuitOpenError,
} from './lib/resilience.js';
export type { RetryOptions, CircuitBreakerOptions, RateLimiterOptions, HealthCheckOptions } from './lib/resilience.js';

// Delivery agent runtime
export * from './runtime/index.js';
