/**
 * Retry Infrastructure - Exponential backoff with jitter
 *
 * - Exponential backoff with configurable min/max delays
 * - Jitter to spread retries from many callers
 * - Custom retry predicates per error type
 * - Server-provided retry-after extraction
 * - Named retry policies
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('retry');

// =============================================================================
// TYPES
// =============================================================================

export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number;
  /** Minimum delay in ms (default: 1000) */
  minDelay?: number;
  /** Maximum delay in ms (default: 30000) */
  maxDelay?: number;
  /** Jitter factor 0-1 (default: 0.1 = +/-10%) */
  jitter?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Custom predicate to determine if error is retryable */
  retryPredicate?: (error: Error, attempt: number) => boolean;
  /** Callback on each failed attempt */
  onRetry?: (info: RetryInfo) => void;
  /** Timeout per attempt in ms */
  timeout?: number;
}

export interface RetryInfo {
  attempt: number;
  maxAttempts: number;
  delay: number;
  error: Error;
  willRetry: boolean;
}

export interface RetryPolicy {
  name: string;
  config: RetryOptions;
}

// =============================================================================
// ERROR TYPES
// =============================================================================

/**
 * An error that should be retried.
 */
export class RetryableError extends Error {
  readonly retryable = true;
  readonly retryAfter?: number;

  constructor(message: string, retryAfter?: number) {
    super(message);
    this.name = 'RetryableError';
    this.retryAfter = retryAfter;
  }
}

/**
 * Rate-limit error (HTTP 429). Always retryable with optional retry-after hint.
 */
export class RateLimitError extends RetryableError {
  readonly statusCode: number;

  constructor(message: string, statusCode = 429, retryAfter?: number) {
    super(message, retryAfter);
    this.name = 'RateLimitError';
    this.statusCode = statusCode;
  }
}

/**
 * An error that should NOT be retried (4xx client errors, validation errors).
 */
export class NonRetryableError extends Error {
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = 'NonRetryableError';
  }
}

/**
 * A transient/network error. Retryable by default.
 */
export class TransientError extends RetryableError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'TransientError';
    this.statusCode = statusCode;
  }
}

// =============================================================================
// TRANSIENT ERROR DETECTION
// =============================================================================

const TRANSIENT_PATTERNS = [
  'econnreset',
  'econnrefused',
  'etimedout',
  'econnaborted',
  'epipe',
  'enetunreach',
  'ehostunreach',
  'socket hang up',
  'network error',
  'fetch failed',
  'connection reset',
  'service unavailable',
  'bad gateway',
  'gateway timeout',
  'request timeout',
];

function readStatusCode(err: Error): number | undefined {
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  if ('status' in err && typeof err.status === 'number') return err.status;
  return undefined;
}

/**
 * Detect transient/network errors that are safe to retry.
 */
export function isTransientError(err: Error): boolean {
  if (err instanceof RetryableError) return true;
  if (err instanceof NonRetryableError) return false;

  if (err.name === 'FetchError' || err.name === 'AbortError' || err.name === 'TimeoutError') {
    return true;
  }

  const statusCode = readStatusCode(err);
  if (statusCode !== undefined) {
    return statusCode === 429 || (statusCode >= 500 && statusCode <= 504);
  }

  const message = err.message.toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => message.includes(p))) {
    return true;
  }

  return /\b(status\s*[:=]?\s*|http\s+)(429|50[0-4])\b/i.test(err.message);
}

// =============================================================================
// RETRY-AFTER PARSING
// =============================================================================

/**
 * Extract a retry-after hint (in milliseconds) from response headers.
 * Returns null if no header is present or it cannot be parsed.
 */
export function parseRetryAfter(headers: Headers, now = Date.now()): number | null {
  const header = headers.get('retry-after');
  if (!header) return null;

  const seconds = Number.parseInt(header, 10);
  if (!Number.isNaN(seconds)) {
    return seconds * 1000;
  }

  const dateMs = Date.parse(header);
  if (!Number.isNaN(dateMs)) {
    const delayMs = dateMs - now;
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

/**
 * Extract retry-after from an error (retryAfter property or message text).
 */
export function extractRetryAfterFromError(error: Error): number | null {
  if (error instanceof RetryableError && typeof error.retryAfter === 'number') {
    return error.retryAfter;
  }

  const retryMatch = error.message.match(/retry[_\s-]?after[:\s]+(\d+)/i);
  if (retryMatch) {
    const value = Number.parseInt(retryMatch[1], 10);
    // Seconds below 1000, milliseconds otherwise
    return value < 1000 ? value * 1000 : value;
  }

  return null;
}

// =============================================================================
// DELAY CALCULATION
// =============================================================================

/**
 * Calculate delay with exponential backoff and jitter.
 */
export function calculateDelay(
  attempt: number,
  config: Required<Pick<RetryOptions, 'minDelay' | 'maxDelay' | 'jitter' | 'backoffMultiplier'>>,
): number {
  const exponentialDelay = config.minDelay * Math.pow(config.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelay);

  const jitterRange = cappedDelay * config.jitter;
  const jitterValue = (Math.random() * 2 - 1) * jitterRange;

  return Math.round(Math.max(0, cappedDelay + jitterValue));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// withRetry - GENERIC RETRY WRAPPER
// =============================================================================

/**
 * Execute a function with automatic retry on transient errors.
 *
 * @example
 * ```ts
 * const page = await withRetry(() => client.fetchOrders(range, offset), RETRY_POLICIES.marketplace.config);
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = 3,
    minDelay = 1000,
    maxDelay = 30000,
    jitter = 0.1,
    backoffMultiplier = 2,
    retryPredicate = isTransientError,
    onRetry,
    timeout,
  } = options;

  let lastError = new Error('withRetry called with maxAttempts < 1');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      if (timeout) {
        return await withTimeout(fn(), timeout);
      }
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const willRetry = attempt < maxAttempts && retryPredicate(lastError, attempt);

      const serverRetryAfter = extractRetryAfterFromError(lastError);
      const delay =
        serverRetryAfter !== null
          ? Math.min(serverRetryAfter, maxDelay)
          : calculateDelay(attempt, { minDelay, maxDelay, jitter, backoffMultiplier });

      onRetry?.({ attempt, maxAttempts, delay, error: lastError, willRetry });

      logger.debug({ attempt, maxAttempts, delay, willRetry, error: lastError.message }, 'Retry attempt');

      if (!willRetry) {
        break;
      }

      await sleep(delay);
    }
  }

  throw lastError;
}

// =============================================================================
// withTimeout - PROMISE TIMEOUT WRAPPER
// =============================================================================

/**
 * Reject with TransientError if `promise` does not settle within `timeoutMs`.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TransientError(`Operation timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    promise
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

// =============================================================================
// PRE-BUILT RETRY POLICIES
// =============================================================================

export const RETRY_POLICIES = {
  /** Default policy for most calls */
  default: {
    name: 'default',
    config: {
      maxAttempts: 3,
      minDelay: 1000,
      maxDelay: 30000,
      jitter: 0.1,
      backoffMultiplier: 2,
    },
  },

  /** Marketplace REST calls: rate limited, occasionally flaky */
  marketplace: {
    name: 'marketplace',
    config: {
      maxAttempts: 4,
      minDelay: 2000,
      maxDelay: 60000,
      jitter: 0.2,
      backoffMultiplier: 2,
    },
  },

  /** Subscription teardown and renewal: few attempts, short waits */
  lifecycle: {
    name: 'lifecycle',
    config: {
      maxAttempts: 3,
      minDelay: 500,
      maxDelay: 5000,
      jitter: 0.1,
      backoffMultiplier: 2,
    },
  },
} satisfies Record<string, RetryPolicy>;
