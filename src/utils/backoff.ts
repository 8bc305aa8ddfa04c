/**
 * Exponential Backoff with Jitter
 *
 * Base delay doubles each attempt: 1s, 2s, 4s, 8s, 16s (capped at 30s).
 * Jitter adds +/-25% randomness to prevent thundering herd.
 *
 * @module utils/backoff
 */

import { sleep } from './sleep.js';

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Maximum number of attempts, first one included (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25 = +/-25%) */
  jitterFraction: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 3,
  jitterFraction: 0.25,
};

export interface RetryOptions extends Partial<BackoffConfig> {
  /** Label used in log lines */
  label?: string;
  /** Abort between attempts */
  signal?: AbortSignal;
  /** Called before sleeping for the next attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Replaceable for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Calculate delay for a given attempt (0-indexed) with jitter.
 *
 * Formula: min(baseDelay * 2^attempt, maxDelay) +/- jitter
 *
 * @param attempt - Zero-indexed attempt number
 * @returns Delay in milliseconds (always >= 0)
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const exponentialDelay = cfg.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, cfg.maxDelayMs);

  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = (Math.random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Execute a function with automatic retry and exponential backoff.
 *
 * Retries on errors that pass the shouldRetry predicate, up to maxAttempts.
 * Non-retryable errors are re-thrown immediately. After the last attempt, or
 * when `signal` aborts during a backoff wait, the last error is re-thrown
 * unchanged; callers decide what exhaustion means.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  options: RetryOptions = {}
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...options };
  const wait = options.sleep ?? sleep;
  const label = options.label ?? 'Backoff';
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        const delay = calculateBackoffDelay(attempt, cfg);
        if (options.onRetry) {
          options.onRetry(error, attempt, delay);
        } else {
          console.error(
            `[${label}] Attempt ${attempt + 1}/${cfg.maxAttempts} failed: ` +
              `${error instanceof Error ? error.message : String(error)}. Retrying in ${delay}ms`
          );
        }
        await wait(delay, options.signal);
        if (options.signal?.aborted) throw lastError;
      }
    }
  }

  throw lastError;
}
