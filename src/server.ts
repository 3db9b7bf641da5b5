/**
 * sendrelay Server
 *
 * Hono-based API server: the requester API under /api (bearer tokens),
 * the agent API under /agent (sender credentials) and health checks.
 * Rate limiting, request ids, security headers and graceful shutdown.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { DatabaseAdapter } from './db/adapter.js';
import type { AppEnv } from './types/hono-env.js';
import {
  requestIdMiddleware,
  requestLogger,
  rateLimiter,
  securityHeaders,
  errorHandler,
} from './middleware/index.js';
import { HealthMonitor, CircuitBreaker } from './lib/resilience.js';
import { UnauthorizedError } from './lib/errors.js';
import { verifyPrincipalToken } from './auth/tokens.js';
import { SenderRegistry } from './engine/registry.js';
import { AuthorizationEngine } from './engine/authorization.js';
import { MessageQueue, type QueuePolicy } from './engine/queue.js';
import { createRequesterRoutes } from './engine/requester-routes.js';
import { createAgentRoutes, isStoreFailure } from './engine/agent-routes.js';

export const VERSION = '0.1.0';

export interface ServerConfig {
  port: number;
  db: DatabaseAdapter;
  jwtSecret: string;
  queue?: Partial<QueuePolicy>;
  offlineThresholdMs?: number;
  corsOrigins?: string[];
  /** Requests per minute per IP (default: 120) */
  rateLimit?: number;
  /** Enable request logging (default: true) */
  logging?: boolean;
  /** bcrypt cost for sender secrets (default: 12) */
  hashRounds?: number;
  clock?: () => Date;
}

export interface ServerInstance {
  app: Hono<AppEnv>;
  registry: SenderRegistry;
  authz: AuthorizationEngine;
  queue: MessageQueue;
  start: () => Promise<{ close: () => void }>;
  healthMonitor: HealthMonitor;
}

export function createServer(config: ServerConfig): ServerInstance {
  const app = new Hono<AppEnv>();
  const clock = config.clock;

  const registry = new SenderRegistry(config.db, {
    clock,
    offlineThresholdMs: config.offlineThresholdMs,
    hashRounds: config.hashRounds,
  });
  const authz = new AuthorizationEngine(config.db, { clock });
  const queue = new MessageQueue(config.db, { policy: config.queue, clock });

  // ─── DB Circuit Breaker ──────────────────────────────

  const dbBreaker = new CircuitBreaker({
    failureThreshold: 5,
    recoveryTimeMs: 30_000,
    timeout: 10_000,
    isFailure: isStoreFailure,
  });

  // ─── Health Monitor ──────────────────────────────────

  const healthMonitor = new HealthMonitor(
    () => config.db.ping(),
    { intervalMs: 30_000, timeoutMs: 5_000, unhealthyThreshold: 3 },
  );

  healthMonitor.onStatusChange((healthy) => {
    const level = healthy ? 'INFO' : 'ERROR';
    console.log(
      `[${new Date().toISOString()}] ${level} Database health: ${healthy ? 'healthy' : 'unhealthy'}`,
    );
  });

  // ─── Global Middleware ───────────────────────────────

  app.use('*', requestIdMiddleware());
  app.onError(errorHandler());
  app.use('*', securityHeaders());

  app.use('*', cors({
    origin: config.corsOrigins || '*',
    allowHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    exposeHeaders: ['X-Request-Id', 'X-RateLimit-Limit', 'X-RateLimit-Remaining', 'Retry-After'],
  }));

  app.use('*', rateLimiter({
    limit: config.rateLimit ?? 120,
    windowSec: 60,
    skipPaths: ['/health', '/ready'],
  }));

  if (config.logging !== false) {
    app.use('*', requestLogger());
  }

  // ─── Health Endpoints ────────────────────────────────

  app.get('/health', (c) => c.json({
    status: 'ok',
    version: VERSION,
    uptime: process.uptime(),
  }));

  app.get('/ready', (c) => {
    const dbHealthy = healthMonitor.isHealthy();
    return c.json({
      ready: dbHealthy,
      checks: {
        database: dbHealthy ? 'ok' : 'unhealthy',
        circuitBreaker: dbBreaker.getState(),
      },
    }, dbHealthy ? 200 : 503);
  });

  // ─── Agent API ───────────────────────────────────────

  app.route('/agent', createAgentRoutes({ registry, queue, breaker: dbBreaker }));

  // ─── Requester API ───────────────────────────────────

  const api = new Hono<AppEnv>();

  api.use('*', async (c, next) => {
    const authHeader = c.req.header('Authorization');
    const jwt = authHeader?.startsWith('Bearer ') ? authHeader.slice(7).trim() : null;
    if (!jwt) throw new UnauthorizedError('Authentication required');

    const principal = await verifyPrincipalToken(jwt, config.jwtSecret);
    c.set('principalId', principal.id);
    c.set('principalRole', principal.role);
    await next();
  });

  api.route('/', createRequesterRoutes({ registry, authz, queue }));
  app.route('/api', api);

  // ─── 404 Handler ─────────────────────────────────────

  app.notFound((c) => {
    return c.json({ error: 'Not found', code: 'NOT_FOUND', path: c.req.path }, 404);
  });

  // ─── Server Start ────────────────────────────────────

  return {
    app,
    registry,
    authz,
    queue,
    healthMonitor,
    start: () => {
      return new Promise((resolve) => {
        const server = serve(
          { fetch: app.fetch, port: config.port },
          (info) => {
            console.log(`\nsendrelay ${VERSION}`);
            console.log(`   Requester API: http://localhost:${info.port}/api`);
            console.log(`   Agent API:     http://localhost:${info.port}/agent`);
            console.log(`   Health:        http://localhost:${info.port}/health`);
            console.log('');

            healthMonitor.start();

            const shutdown = () => {
              console.log(`[${new Date().toISOString()}] INFO Shutting down gracefully...`);
              healthMonitor.stop();
              server.close(() => {
                config.db.disconnect().then(
                  () => {
                    console.log(`[${new Date().toISOString()}] INFO Shutdown complete`);
                    process.exit(0);
                  },
                  (err: unknown) => {
                    console.error(`[${new Date().toISOString()}] ERROR Closing database failed`, err);
                    process.exit(1);
                  },
                );
              });
              // Force exit after 10s
              setTimeout(() => { process.exit(1); }, 10_000).unref();
            };

            process.once('SIGINT', shutdown);
            process.once('SIGTERM', shutdown);

            resolve({
              close: () => {
                healthMonitor.stop();
                server.close();
              },
            });
          },
        );
      });
    },
  };
}
