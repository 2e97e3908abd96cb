/**
 * packages/utils - Shared Utilities
 */

export { logger, LogLevel } from "./logger";
export type { LogRecord, LogSink, ScopedLogger } from "./logger";

export { retryWithBackoff, computeBackoffDelay, DEFAULT_RETRY_CONFIG } from "./retry";
export type { RetryConfig, RetryOptions, RetryError } from "./retry";
