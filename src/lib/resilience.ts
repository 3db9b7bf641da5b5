/**
 * Resilience Utilities
 *
 * Retry with backoff, timeouts, abortable sleeps, a circuit breaker
 * for database calls, per-key rate limiting and the health monitor
 * behind `/ready`.
 */

// ─── Retry with Exponential Backoff ──────────────────────

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Upper bound of the random jitter added to each delay */
  jitterMs: number;
  retryableErrors?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
  signal?: AbortSignal;
}

const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  jitterMs: 200,
};

/**
 * Delay before retry number `attempt` (1-based), without jitter.
 */
export function backoffDelay(
  attempt: number,
  opts: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>,
): number {
  return Math.min(
    opts.baseDelayMs * Math.pow(opts.backoffMultiplier, Math.max(0, attempt - 1)),
    opts.maxDelayMs,
  );
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: Partial<RetryOptions> = {},
): Promise<T> {
  const config = { ...DEFAULT_RETRY, ...opts };
  let lastError: unknown = new Error('No attempts made');

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;

      if (attempt === config.maxAttempts) break;
      if (config.retryableErrors && !config.retryableErrors(err)) break;
      if (config.signal?.aborted) break;

      const delay = Math.min(
        backoffDelay(attempt, config) + Math.random() * config.jitterMs,
        config.maxDelayMs,
      );

      config.onRetry?.(attempt, err, delay);
      await sleep(delay, config.signal);
    }
  }

  throw lastError;
}

// ─── Circuit Breaker ─────────────────────────────────────

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  failureThreshold: number;    // Failures before opening
  recoveryTimeMs: number;      // Time before half-open
  successThreshold: number;    // Successes in half-open to close
  timeout?: number;            // Per-call timeout in ms
  /** Errors that say nothing about the dependency's health (e.g. bad credentials) */
  isFailure?: (err: unknown) => boolean;
}

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failures = 0;
  private successes = 0;
  private lastFailureTime = 0;
  private readonly opts: CircuitBreakerOptions;

  constructor(opts: Partial<CircuitBreakerOptions> = {}) {
    this.opts = {
      failureThreshold: opts.failureThreshold ?? 5,
      recoveryTimeMs: opts.recoveryTimeMs ?? 30_000,
      successThreshold: opts.successThreshold ?? 2,
      timeout: opts.timeout,
      isFailure: opts.isFailure,
    };
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      if (Date.now() - this.lastFailureTime >= this.opts.recoveryTimeMs) {
        this.state = 'half-open';
        this.successes = 0;
      } else {
        throw new CircuitOpenError(
          `Circuit breaker is open. Retry after ${this.opts.recoveryTimeMs}ms`,
        );
      }
    }

    try {
      const result = this.opts.timeout
        ? await withTimeout(fn(), this.opts.timeout)
        : await fn();

      this.onSuccess();
      return result;
    } catch (err) {
      if (!this.opts.isFailure || this.opts.isFailure(err)) this.onFailure();
      throw err;
    }
  }

  private onSuccess(): void {
    if (this.state === 'half-open') {
      this.successes++;
      if (this.successes >= this.opts.successThreshold) {
        this.state = 'closed';
        this.failures = 0;
      }
    } else {
      this.failures = 0;
    }
  }

  private onFailure(): void {
    this.failures++;
    this.lastFailureTime = Date.now();
    if (this.state === 'half-open' || this.failures >= this.opts.failureThreshold) {
      this.state = 'open';
    }
  }

  getState(): CircuitState { return this.state; }
  reset(): void { this.state = 'closed'; this.failures = 0; this.successes = 0; }
}

export class CircuitOpenError extends Error {
  readonly status = 503;
  readonly code = 'CIRCUIT_OPEN';

  constructor(message: string) {
    super(message);
    this.name = 'CircuitOpenError';
  }
}

// ─── Rate Limiter (Token Bucket) ─────────────────────────

export interface RateLimiterOptions {
  maxTokens: number;           // Bucket capacity
  refillRate: number;          // Tokens per second
}

export class RateLimiter {
  private tokens: number;
  private lastRefill: number;

  constructor(private readonly opts: RateLimiterOptions) {
    this.tokens = opts.maxTokens;
    this.lastRefill = Date.now();
  }

  /**
   * Try to consume a token. Returns true if allowed, false if rate limited.
   */
  tryConsume(count = 1): boolean {
    this.refill();
    if (this.tokens >= count) {
      this.tokens -= count;
      return true;
    }
    return false;
  }

  /**
   * Time in ms until the next token is available.
   */
  getRetryAfterMs(): number {
    this.refill();
    if (this.tokens >= 1) return 0;
    const tokensNeeded = 1 - this.tokens;
    return Math.ceil((tokensNeeded / this.opts.refillRate) * 1000);
  }

  isFull(): boolean {
    this.refill();
    return this.tokens >= this.opts.maxTokens;
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefill;
    this.tokens = Math.min(this.opts.maxTokens, this.tokens + (elapsed / 1000) * this.opts.refillRate);
    this.lastRefill = now;
  }
}

// ─── Per-Key Rate Limiter (for API endpoints) ────────────

export class KeyedRateLimiter {
  private limiters = new Map<string, RateLimiter>();
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly opts: RateLimiterOptions) {
    // Drop idle buckets every 5 minutes
    this.cleanupTimer = setInterval(() => this.cleanup(), 5 * 60_000);
    this.cleanupTimer.unref();
  }

  tryConsume(key: string, count = 1): boolean {
    let limiter = this.limiters.get(key);
    if (!limiter) {
      limiter = new RateLimiter(this.opts);
      this.limiters.set(key, limiter);
    }
    return limiter.tryConsume(count);
  }

  getRetryAfterMs(key: string): number {
    const limiter = this.limiters.get(key);
    return limiter ? limiter.getRetryAfterMs() : 0;
  }

  private cleanup(): void {
    for (const [key, limiter] of this.limiters) {
      if (limiter.isFull()) this.limiters.delete(key);
    }
  }

  destroy(): void {
    if (this.cleanupTimer) clearInterval(this.cleanupTimer);
    this.limiters.clear();
  }
}

// ─── Connection Health Monitor ───────────────────────────

export interface HealthCheckOptions {
  intervalMs: number;
  timeoutMs: number;
  unhealthyThreshold: number; // Consecutive failures before unhealthy
  healthyThreshold: number;   // Consecutive successes before healthy
}

export class HealthMonitor {
  private healthy = true;
  private consecutiveFailures = 0;
  private consecutiveSuccesses = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly opts: HealthCheckOptions;
  private listeners: ((healthy: boolean) => void)[] = [];

  constructor(private readonly check: () => Promise<void>, opts: Partial<HealthCheckOptions> = {}) {
    this.opts = {
      intervalMs: opts.intervalMs ?? 30_000,
      timeoutMs: opts.timeoutMs ?? 5_000,
      unhealthyThreshold: opts.unhealthyThreshold ?? 3,
      healthyThreshold: opts.healthyThreshold ?? 2,
    };
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => { void this.runCheck(); }, this.opts.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) { clearInterval(this.timer); this.timer = null; }
  }

  isHealthy(): boolean { return this.healthy; }

  onStatusChange(fn: (healthy: boolean) => void): void {
    this.listeners.push(fn);
  }

  async runCheck(): Promise<void> {
    try {
      await withTimeout(this.check(), this.opts.timeoutMs);
      this.consecutiveFailures = 0;
      this.consecutiveSuccesses++;
      if (!this.healthy && this.consecutiveSuccesses >= this.opts.healthyThreshold) {
        this.healthy = true;
        this.listeners.forEach(fn => fn(true));
      }
    } catch {
      this.consecutiveSuccesses = 0;
      this.consecutiveFailures++;
      if (this.healthy && this.consecutiveFailures >= this.opts.unhealthyThreshold) {
        this.healthy = false;
        this.listeners.forEach(fn => fn(false));
      }
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────

/**
 * Resolves after `ms`, or early (without rejecting) once `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

export class TimeoutError extends Error {
  constructor(readonly ms: number) {
    super(`Operation timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(ms)), ms);
    promise
      .then(v => { clearTimeout(timer); resolve(v); })
      .catch(e => { clearTimeout(timer); reject(e); });
  });
}

// ─── Request ID Generator ────────────────────────────────

let counter = 0;
const prefix = Math.random().toString(36).substring(2, 8);

export function requestId(): string {
  return `${prefix}-${(++counter).toString(36)}-${Date.now().toString(36)}`;
}
