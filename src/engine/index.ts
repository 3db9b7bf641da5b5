/**
 * Engine: sender registry, authorization, message queue and the HTTP
 * routes that expose them.
 */

export { SenderRegistry, hashRegistrationCode, DEFAULT_CODE_TTL_MS } from './registry.js';
export type { SenderView, IssueCodeInput, IssuedCode, RegisterInput, RegistryOptions } from './registry.js';

export { AuthorizationEngine, ROLE_MATRIX, requireAdmin } from './authorization.js';
export type { Access, Principal, AccessDecision, AuthorizationOptions } from './authorization.js';

export {
  MessageQueue, DEFAULT_QUEUE_POLICY, OUTCOMES, isOutcome, ERROR_EXPIRED, ERROR_CANCELLED,
} from './queue.js';
export type {
  QueuePolicy, EnqueueInput, EnqueueResult, BatchItem, BatchItemResult,
  DequeueOptions, DequeueResult, Outcome, ReportInput, MessageQueueOptions,
} from './queue.js';

export { deriveIdempotencyKey, normalizeBody, timeBucket, DEFAULT_DEDUPE_WINDOW_MS } from './idempotency.js';
export { isOnline, livenessOf, DEFAULT_OFFLINE_THRESHOLD_MS } from './liveness.js';
export type { Liveness } from './liveness.js';

export { createRequesterRoutes } from './requester-routes.js';
export type { RequesterRouteDeps } from './requester-routes.js';
export { createAgentRoutes, senderAuth, parseBasicAuth } from './agent-routes.js';
export type { AgentRouteDeps } from './agent-routes.js';
