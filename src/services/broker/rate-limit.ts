/**
 * Rate Limit and Retry Utilities
 *
 * Rate limiting, retry logic and error classification for broker REST calls.
 * The backoff calculation is shared with the streaming client's reconnect loop.
 *
 * Features:
 * - Exponential backoff with jitter
 * - Sliding-window rate limiting
 * - Retry logic with configurable attempts
 * - Error classification (retryable vs non-retryable)
 */

// ============================================================================
// Configuration
// ============================================================================

export interface RetryConfig {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Base delay in ms for exponential backoff */
  baseDelayMs: number;
  /** Maximum delay in ms */
  maxDelayMs: number;
  /** Jitter factor (0-1) for randomization */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.3,
};

export interface RateLimitConfig {
  /** Maximum requests per window */
  maxRequests: number;
  /** Window duration in ms */
  windowMs: number;
}

export const DEFAULT_RATE_LIMIT_CONFIG: Readonly<RateLimitConfig> = {
  maxRequests: 10,
  windowMs: 1000,
};

// ============================================================================
// Error Classification
// ============================================================================

const RETRYABLE_ERROR_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ENOTFOUND",
  "ENETUNREACH",
  "EPIPE",
  "EAI_AGAIN",
  "ECONNABORTED",
]);

const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

function fieldOf(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

/**
 * HTTP status of an error, from an axios response or a `status` field
 */
export function statusOf(error: unknown): number | undefined {
  const candidates = [
    fieldOf(fieldOf(error, "response"), "status"),
    fieldOf(error, "statusCode"),
    fieldOf(error, "status"),
  ];
  const status = candidates.find((c): c is number => typeof c === "number");
  return status;
}

export function isRetryableError(error: unknown): boolean {
  if (!error) return false;

  const errorCode = fieldOf(error, "code");
  if (typeof errorCode === "string" && RETRYABLE_ERROR_CODES.has(errorCode)) {
    return true;
  }

  const statusCode = statusOf(error);
  if (statusCode !== undefined && RETRYABLE_STATUS_CODES.has(statusCode)) {
    return true;
  }

  const message = (
    error instanceof Error ? error.message : String(error)
  ).toLowerCase();
  return (
    message.includes("timeout") ||
    message.includes("econnreset") ||
    message.includes("network")
  );
}

// ============================================================================
// Retry Utilities
// ============================================================================

/**
 * Calculate delay for exponential backoff with jitter
 */
export function calculateBackoff(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  random: () => number = Math.random,
): number {
  const { baseDelayMs, maxDelayMs, jitterFactor } = config;

  // base * 2^attempt, capped
  const exponentialDelay = Math.min(
    baseDelayMs * Math.pow(2, attempt),
    maxDelayMs,
  );

  const jitter = exponentialDelay * jitterFactor * random();

  return Math.round(exponentialDelay + jitter);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type RetryResult<T> =
  | { success: true; data: T; attempts: number }
  | { success: false; error: Error; attempts: number };

export interface RetryOptions extends Partial<RetryConfig> {
  /** Delay function, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Execute a function with retry logic. Non-retryable errors return at once.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
  onRetry?: (attempt: number, error: Error, delayMs: number) => void,
): Promise<RetryResult<T>> {
  const { sleep: wait = sleep, ...overrides } = options;
  const fullConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...overrides };
  const { maxRetries } = fullConfig;

  let lastError = new Error("no attempt made");
  let attempts = 0;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    attempts++;

    try {
      const data = await fn();
      return { success: true, data, attempts };
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (!isRetryableError(err)) {
        return { success: false, error: lastError, attempts };
      }

      if (attempt >= maxRetries) {
        break;
      }

      const delayMs = calculateBackoff(attempt, fullConfig);
      onRetry?.(attempt + 1, lastError, delayMs);
      await wait(delayMs);
    }
  }

  return { success: false, error: lastError, attempts };
}

// ============================================================================
// Rate Limiter
// ============================================================================

export interface RateLimiterOptions extends Partial<RateLimitConfig> {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Sliding window rate limiter with concurrency-safe waitAndRecord
 */
export class RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly wait: (ms: number) => Promise<void>;
  private timestamps: number[] = [];
  // Serializes waitAndRecord callers
  private waitQueue: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? DEFAULT_RATE_LIMIT_CONFIG.maxRequests;
    this.windowMs = options.windowMs ?? DEFAULT_RATE_LIMIT_CONFIG.windowMs;
    this.now = options.now ?? Date.now;
    this.wait = options.sleep ?? sleep;
  }

  canMakeRequest(): boolean {
    this.pruneOldTimestamps();
    return this.timestamps.length < this.maxRequests;
  }

  recordRequest(): void {
    this.pruneOldTimestamps();
    this.timestamps.push(this.now());
  }

  /**
   * Wait until a request can be made, then record it.
   */
  async waitAndRecord(): Promise<void> {
    const run = async (): Promise<void> => {
      const waitTime = this.getWaitTime();
      if (waitTime > 0) {
        await this.wait(waitTime);
      }
      this.recordRequest();
    };

    const next = this.waitQueue.then(run, run);
    // A failed waiter must not block the ones queued behind it
    this.waitQueue = next.then(
      () => undefined,
      () => undefined,
    );

    return next;
  }

  getCurrentCount(): number {
    this.pruneOldTimestamps();
    return this.timestamps.length;
  }

  /**
   * Time until next request can be made (0 if it can be made now)
   */
  getWaitTime(): number {
    this.pruneOldTimestamps();

    if (this.timestamps.length < this.maxRequests) {
      return 0;
    }

    return Math.max(0, this.timestamps[0] + this.windowMs - this.now());
  }

  reset(): void {
    this.timestamps = [];
  }

  private pruneOldTimestamps(): void {
    const cutoff = this.now() - this.windowMs;
    this.timestamps = this.timestamps.filter((t) => t > cutoff);
  }
}

// ============================================================================
// Broker Rate Limiters
// ============================================================================

export interface BrokerRateLimiters {
  /** Quotes, history, option chain, positions, funds */
  data: RateLimiter;
  /** Order placement */
  orders: RateLimiter;
}

export function createBrokerRateLimiters(
  options: Omit<RateLimiterOptions, "maxRequests" | "windowMs"> = {},
): BrokerRateLimiters {
  return {
    data: new RateLimiter({ ...options, maxRequests: 10, windowMs: 1000 }),
    orders: new RateLimiter({ ...options, maxRequests: 10, windowMs: 1000 }),
  };
}

/**
 * Execute a function with both rate limiting and retry logic.
 * Every attempt, retries included, takes a rate-limit slot.
 */
export async function withRateLimitAndRetry<T>(
  fn: () => Promise<T>,
  limiter: RateLimiter,
  options: RetryOptions = {},
  onRetry?: (attempt: number, error: Error, delayMs: number) => void,
): Promise<RetryResult<T>> {
  const wrappedFn = async (): Promise<T> => {
    await limiter.waitAndRecord();
    return fn();
  };

  return withRetry(wrappedFn, options, onRetry);
}
