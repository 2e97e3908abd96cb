/**
 * Retry with exponential backoff
 *
 * Wraps an operation returning `ResultAsync` and re-runs it on failure:
 * delay before retry n (0-based) = min(baseDelayMs × multiplier^n, maxDelayMs).
 * The last error is carried in the final `RETRY_EXHAUSTED` error.
 */

import { ResultAsync, errAsync } from "neverthrow";

import { logger } from "./logger";

const log = logger.child("retry");

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RetryConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
};

export interface RetryOptions<E> {
  /** Operation name for logs */
  name: string;
  config?: Partial<RetryConfig>;
  /** Errors for which this returns false fail immediately */
  isRetryable?: (error: E) => boolean;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export type RetryError<E> = {
  type: "RETRY_EXHAUSTED";
  attempts: number;
  lastError: E;
  message: string;
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export function computeBackoffDelay(attempt: number, config: RetryConfig): number {
  return Math.min(config.baseDelayMs * config.backoffMultiplier ** attempt, config.maxDelayMs);
}

export function retryWithBackoff<T, E>(
  operation: (attempt: number) => ResultAsync<T, E>,
  options: RetryOptions<E>,
): ResultAsync<T, RetryError<E>> {
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.config };
  const maxAttempts = Math.max(1, config.maxAttempts);
  const sleep = options.sleep ?? defaultSleep;

  const attemptAt = (attempt: number): ResultAsync<T, RetryError<E>> =>
    operation(attempt).orElse((error): ResultAsync<T, RetryError<E>> => {
      const attempts = attempt + 1;
      const retryable = options.isRetryable?.(error) ?? true;

      if (attempts >= maxAttempts || !retryable) {
        return errAsync({
          type: "RETRY_EXHAUSTED",
          attempts,
          lastError: error,
          message: `${options.name} failed after ${attempts} attempt(s)`,
        });
      }

      const delayMs = computeBackoffDelay(attempt, config);
      log.warn(`${options.name} failed, retrying`, { attempt: attempts, maxAttempts, delayMs });
      return ResultAsync.fromSafePromise(sleep(delayMs)).andThen(() => attemptAt(attempt + 1));
    });

  return attemptAt(0);
}
