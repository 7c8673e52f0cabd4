/**
 * Retry logic with exponential backoff for the releases API client
 *
 * Features:
 * - Exponential backoff with configurable base delay
 * - Jitter to prevent thundering herd
 * - Rate limit handling (HTTP 429, Retry-After)
 * - Configurable retry conditions
 */

import type { RetryConfig, RetryResult, ApiError } from './types.js';
import { logger, type ApiLogger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  retryableStatuses: [429, 500, 502, 503, 504],
};

export const RATE_LIMIT_STATUS = 429;
export const SERVER_ERROR_THRESHOLD = 500;

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a retry operation
 */
export interface RetryOptions extends RetryConfig {
  /** Custom logger instance */
  logger?: ApiLogger;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Custom function to determine if an error is retryable */
  isRetryable?: (error: Error) => boolean;
  /** Sleep implementation (tests replace it to avoid real delays) */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Error class for API errors with HTTP status
 */
export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly documentationUrl?: string;
  public readonly details?: Record<string, unknown>;
  public readonly retryAfter?: number;

  constructor(
    message: string,
    status: number,
    options?: {
      documentationUrl?: string;
      details?: Record<string, unknown>;
      retryAfter?: number;
      cause?: Error;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ApiRequestError';
    this.status = status;
    this.documentationUrl = options?.documentationUrl;
    this.details = options?.details;
    this.retryAfter = options?.retryAfter;
  }

  toApiError(): ApiError {
    return {
      status: this.status,
      message: this.message,
      documentationUrl: this.documentationUrl,
      details: this.details,
    };
  }

  isNotFound(): boolean {
    return this.status === 404;
  }

  isAuthError(): boolean {
    return this.status === 401 || this.status === 403;
  }

  isRateLimited(): boolean {
    return this.status === RATE_LIMIT_STATUS;
  }

  isServerError(): boolean {
    return this.status >= SERVER_ERROR_THRESHOLD;
  }
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay for a retry attempt using exponential backoff
 *
 * @param attempt - The current attempt number (1-indexed)
 * @param retryAfter - Optional Retry-After header value (seconds)
 * @returns Delay in milliseconds
 */
export function calculateDelay(
  attempt: number,
  config: Required<RetryConfig>,
  retryAfter?: number
): number {
  if (retryAfter !== undefined && retryAfter > 0) {
    const jitter = Math.random() * config.baseDelayMs * config.jitterFactor;
    return Math.min(retryAfter * 1000 + jitter, config.maxDelayMs);
  }

  // baseDelay * 2^(attempt-1)
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);

  const jitter =
    Math.random() * exponentialDelay * config.jitterFactor * 2 -
    exponentialDelay * config.jitterFactor;

  return Math.min(Math.max(exponentialDelay + jitter, 0), config.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Logic
// =============================================================================

const NETWORK_ERROR_PATTERNS = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'network',
  'socket hang up',
];

/**
 * Check if an error is retryable based on configuration
 */
export function isRetryableError(error: Error, config: Required<RetryConfig>): boolean {
  // undici reports transport failures as TypeError('fetch failed')
  if (error.name === 'TypeError' && error.message.includes('fetch')) {
    return true;
  }

  // Timeout
  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }

  if (error instanceof ApiRequestError) {
    return config.retryableStatuses.includes(error.status);
  }

  const message = error.message.toLowerCase();
  return NETWORK_ERROR_PATTERNS.some((pattern) => message.includes(pattern.toLowerCase()));
}

/**
 * Parse Retry-After header value
 *
 * @param value - Header value (seconds as number or HTTP-date)
 * @returns Delay in seconds, or undefined if not parseable
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;

  const seconds = parseInt(value, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds;
  }

  const date = new Date(value);
  const delayMs = date.getTime() - Date.now();
  if (!isNaN(delayMs) && delayMs > 0) {
    return Math.ceil(delayMs / 1000);
  }

  return undefined;
}

/**
 * Execute a function with retry logic
 *
 * @returns RetryResult with success/failure and metadata
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const config: Required<RetryConfig> = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
    retryableStatuses: options.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses,
  };

  const log = options.logger ?? logger;
  const wait = options.sleep ?? sleep;
  const startTime = Date.now();
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      const data = await fn();
      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.info(`Request succeeded after ${attempt} attempts`, { attempts: attempt, totalTimeMs });
      }
      return { success: true, data, attempts: attempt, totalTimeMs };
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));

      const retryable = options.isRetryable
        ? options.isRetryable(error)
        : isRetryableError(error, config);
      const isLastAttempt = attempt > config.maxRetries;

      if (!retryable || isLastAttempt) {
        const totalTimeMs = Date.now() - startTime;
        if (retryable && config.maxRetries > 0) {
          log.warn(`All ${config.maxRetries} retry attempts exhausted`, {
            error: error.message,
            attempts: attempt,
            totalTimeMs,
          });
        } else {
          log.debug('Error is not retryable', { error: error.message, attempts: attempt });
        }
        return { success: false, error, attempts: attempt, totalTimeMs };
      }

      const retryAfter = error instanceof ApiRequestError ? error.retryAfter : undefined;
      const delayMs = calculateDelay(attempt, config, retryAfter);

      log.info(`Retry attempt ${attempt}/${config.maxRetries} in ${Math.round(delayMs)}ms`, {
        error: error.message,
        status: error instanceof ApiRequestError ? error.status : undefined,
        delayMs: Math.round(delayMs),
      });

      options.onRetry?.(attempt, error, delayMs);
      await wait(delayMs);
    }
  }
}
