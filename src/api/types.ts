/**
 * Types for the GitHub releases API client
 */

// =============================================================================
// Common Types
// =============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/**
 * Repository coordinates on the release host (owner/name pair)
 */
export interface RepositoryRef {
  owner: string;
  name: string;
}

/**
 * API error payload as surfaced to callers
 */
export interface ApiError {
  status: number;
  message: string;
  /** GitHub documentation link, when the API returned one */
  documentationUrl?: string;
  details?: Record<string, unknown>;
}

// =============================================================================
// Releases
// =============================================================================

/**
 * A hosted release record
 */
export interface Release {
  id: number;
  tagName: string;
  name: string | null;
  body: string | null;
  draft: boolean;
  prerelease: boolean;
  htmlUrl?: string;
}

/**
 * Request body for creating a release
 */
export interface CreateReleaseRequest {
  tagName: string;
  name: string;
  body?: string;
  draft?: boolean;
  prerelease?: boolean;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Releases client configuration
 */
export interface ReleasesClientConfig {
  /** Token sent as a Bearer credential */
  token: string;
  /** API base URL (default: https://api.github.com) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Enable debug logging */
  debug?: boolean;
  /** Custom user agent suffix */
  userAgent?: string;
  /** Retry configuration for transient failures */
  retry?: RetryConfig;
}

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes to retry on (default: [429, 500, 502, 503, 504]) */
  retryableStatuses?: number[];
}

/**
 * Result of a retry operation
 */
export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number };
