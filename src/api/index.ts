/**
 * GitHub releases API client module
 *
 * Provides:
 * - ReleasesClient with get-by-tag, delete and create
 * - Retry logic with exponential backoff
 * - JSON logging with secret redaction
 */

export {
  createReleasesClient,
  parseRelease,
  DEFAULT_BASE_URL,
  GITHUB_API_VERSION,
} from './client.js';
export type { ReleasesClient } from './client.js';

export {
  withRetry,
  ApiRequestError,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  sleep,
  DEFAULT_RETRY_CONFIG,
  RATE_LIMIT_STATUS,
  SERVER_ERROR_THRESHOLD,
} from './retry.js';
export type { RetryOptions } from './retry.js';

export {
  logger,
  createLogger,
  ApiLogger,
  redactString,
  redactPatterns,
  redactValue,
  redactRecord,
  redactHeaders,
} from './logger.js';
export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

export type {
  HttpMethod,
  RepositoryRef,
  ApiError,
  Release,
  CreateReleaseRequest,
  ReleasesClientConfig,
  RetryConfig,
  RetryResult,
} from './types.js';
