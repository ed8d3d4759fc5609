/**
 * Retry logic with exponential backoff.
 */

import { getLogger } from '../logging/logger.js';
import {
  isBrokerError,
  isRetryable,
  wrapError,
  createTimingContext,
  type ErrorContext,
} from './types.js';

/**
 * Retry options.
 */
export interface RetryOptions {
  /** Maximum number of attempts, including the first (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 500) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 10000) */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Add jitter to delays (default: true) */
  jitter?: boolean;
  /** Custom retry condition (default: isRetryable) */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Callback on retry */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Operation name for logging */
  operation?: string;
  /** Additional context for errors */
  context?: ErrorContext;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'shouldRetry' | 'onRetry' | 'operation' | 'context'>> = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  jitter: true,
};

/**
 * Calculate delay with exponential backoff and optional jitter.
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number,
  jitter: boolean
): number {
  // delay = initial * multiplier^(attempt - 1)
  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt - 1);
  const clampedDelay = Math.min(exponentialDelay, maxDelayMs);

  if (jitter) {
    // +/-25% of the delay
    const jitterRange = clampedDelay * 0.25;
    const jitterAmount = Math.random() * jitterRange * 2 - jitterRange;
    return Math.max(0, clampedDelay + jitterAmount);
  }

  return clampedDelay;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic.
 *
 * Errors that are already a BrokerError are rethrown as-is once retries are
 * exhausted, so callers can still branch on their class.
 *
 * @example
 * ```typescript
 * const grant = await withRetry(
 *   () => postGrant(tokenUri, body),
 *   { maxAttempts: 3, operation: 'token exchange' }
 * );
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = DEFAULT_OPTIONS.maxAttempts,
    initialDelayMs = DEFAULT_OPTIONS.initialDelayMs,
    maxDelayMs = DEFAULT_OPTIONS.maxDelayMs,
    backoffMultiplier = DEFAULT_OPTIONS.backoffMultiplier,
    jitter = DEFAULT_OPTIONS.jitter,
    shouldRetry = isRetryable,
    onRetry,
    operation = 'operation',
    context,
  } = options;

  const logger = getLogger('retry');
  const startedAt = new Date();
  const attempts = Math.max(1, maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error, attempt)) {
        logger.warn(
          {
            operation,
            attempt,
            maxAttempts: attempts,
            error: error instanceof Error ? error.message : String(error),
          },
          `${operation} failed after ${attempt} attempt(s)`
        );

        if (isBrokerError(error)) {
          throw error;
        }
        throw wrapError(error, {
          ...context,
          operation,
          timing: createTimingContext(startedAt),
          retry: { attempt, maxAttempts: attempts },
        });
      }

      const delayMs = calculateDelay(attempt, initialDelayMs, maxDelayMs, backoffMultiplier, jitter);

      logger.debug(
        {
          operation,
          attempt,
          maxAttempts: attempts,
          delayMs: Math.round(delayMs),
          error: error instanceof Error ? error.message : String(error),
        },
        `Retrying ${operation} in ${Math.round(delayMs)}ms`
      );

      if (onRetry) {
        onRetry(error, attempt, delayMs);
      }

      await sleep(delayMs);
    }
  }
}

/**
 * Create a retry wrapper with fixed defaults.
 */
export function createRetryWrapper(
  defaultOptions: RetryOptions
): <T>(fn: () => Promise<T>, overrides?: RetryOptions) => Promise<T> {
  return <T>(fn: () => Promise<T>, overrides: RetryOptions = {}): Promise<T> => {
    return withRetry(fn, { ...defaultOptions, ...overrides });
  };
}

/**
 * Retry options for token endpoint grants. Only 5xx, 429 and network
 * failures are retried; 4xx answers such as invalid_grant are final.
 */
export const TOKEN_EXCHANGE_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  jitter: true,
  operation: 'token exchange',
};
