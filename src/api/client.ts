/**
 * GitHub Releases API Client
 *
 * Provides a typed interface to the release endpoints of the GitHub REST API with:
 * - Retry with exponential backoff
 * - Rate limit handling (429 status, Retry-After)
 * - Per-request timeouts
 * - JSON logging with secret redaction
 */

import type {
  Release,
  CreateReleaseRequest,
  ReleasesClientConfig,
  RepositoryRef,
  HttpMethod,
} from './types.js';
import {
  withRetry,
  ApiRequestError,
  parseRetryAfter,
  DEFAULT_RETRY_CONFIG,
  RATE_LIMIT_STATUS,
  type RetryOptions,
} from './retry.js';
import { logger, ApiLogger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Release operations scoped by repository
 *
 * One client serves every target of a run; only the credential is shared.
 */
export interface ReleasesClient {
  /** Returns null when no release exists for the tag (HTTP 404) */
  getReleaseByTag(repo: RepositoryRef, tag: string): Promise<Release | null>;
  /** Throws ApiRequestError (status 404 when already gone) */
  deleteRelease(repo: RepositoryRef, releaseId: number): Promise<void>;
  createRelease(repo: RepositoryRef, request: CreateReleaseRequest): Promise<Release>;

  /** Get current configuration (with redacted secrets) */
  getConfig(): { baseUrl: string; hasToken: boolean };
}

export const DEFAULT_BASE_URL = 'https://api.github.com';
export const GITHUB_API_VERSION = '2022-11-28';
const DEFAULT_TIMEOUT_MS = 30000;

// =============================================================================
// Response Parsing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/**
 * Narrow a release payload from the API into a Release
 *
 * @throws ApiRequestError if the payload lacks an id or tag_name
 */
export function parseRelease(payload: unknown, status = 200): Release {
  if (!isRecord(payload) || typeof payload.id !== 'number' || typeof payload.tag_name !== 'string') {
    throw new ApiRequestError('Unexpected release payload from API', status, {
      details: isRecord(payload) ? payload : undefined,
    });
  }

  return {
    id: payload.id,
    tagName: payload.tag_name,
    name: optionalString(payload.name),
    body: optionalString(payload.body),
    draft: payload.draft === true,
    prerelease: payload.prerelease === true,
    htmlUrl: typeof payload.html_url === 'string' ? payload.html_url : undefined,
  };
}

/**
 * Build a readable error from a failed response body
 */
async function toRequestError(response: Response): Promise<ApiRequestError> {
  let message = `GitHub API error (${response.status})`;
  let details: Record<string, unknown> | undefined;
  let documentationUrl: string | undefined;

  const text = await response.text().catch(() => '');
  if (text) {
    try {
      const parsed: unknown = JSON.parse(text);
      if (isRecord(parsed)) {
        details = parsed;
        if (typeof parsed.message === 'string') {
          message = `${message}: ${parsed.message}`;
        }
        if (typeof parsed.documentation_url === 'string') {
          documentationUrl = parsed.documentation_url;
        }
      }
    } catch {
      message = `${message}: ${text.substring(0, 200)}`;
    }
  }

  return new ApiRequestError(message, response.status, {
    details,
    documentationUrl,
    retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
  });
}

function repoPath(repo: RepositoryRef): string {
  return `/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}`;
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a GitHub releases client with retry and logging
 */
export function createReleasesClient(config: ReleasesClientConfig): ReleasesClient {
  const baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  const timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
  const log = config.debug ? logger : new ApiLogger({ level: 'warn' });

  if (!config.token) {
    throw new Error(
      'Missing GitHub token. Configure authentication using:\n' +
        '  1. The --token option\n' +
        '  2. The GITHUB_TOKEN (or GH_TOKEN) environment variable'
    );
  }

  const defaultHeaders: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    Authorization: `Bearer ${config.token}`,
    'X-GitHub-Api-Version': GITHUB_API_VERSION,
    'User-Agent': config.userAgent ? `release-sync ${config.userAgent}` : 'release-sync',
  };

  /**
   * Make an API request with retry logic
   *
   * Non-idempotent requests are retried only when rate limited.
   */
  async function request(
    method: HttpMethod,
    path: string,
    options: { body?: unknown; idempotent?: boolean; expectedStatuses?: number[] } = {}
  ): Promise<unknown> {
    const url = `${baseUrl}${path}`;
    const headers: Record<string, string> = { ...defaultHeaders };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    log.request(method, url, { headers, body: options.body });

    const makeRequest = async (): Promise<unknown> => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const startTime = Date.now();
        const response = await fetch(url, {
          method,
          headers,
          body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
          signal: controller.signal,
        });

        log.response(response.status, url, {
          durationMs: Date.now() - startTime,
          expected: options.expectedStatuses?.includes(response.status),
        });

        if (!response.ok) {
          throw await toRequestError(response);
        }

        if (response.status === 204) {
          return undefined;
        }

        return await response.json();
      } finally {
        clearTimeout(timeoutId);
      }
    };

    const retryOptions: RetryOptions = {
      ...DEFAULT_RETRY_CONFIG,
      ...config.retry,
      logger: log,
    };
    if (options.idempotent === false) {
      retryOptions.isRetryable = (error) =>
        error instanceof ApiRequestError && error.status === RATE_LIMIT_STATUS;
    }

    const result = await withRetry(makeRequest, retryOptions);
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  return {
    async getReleaseByTag(repo: RepositoryRef, tag: string): Promise<Release | null> {
      try {
        const payload = await request(
          'GET',
          `${repoPath(repo)}/releases/tags/${encodeURIComponent(tag)}`,
          { expectedStatuses: [404] }
        );
        return parseRelease(payload);
      } catch (error) {
        if (error instanceof ApiRequestError && error.isNotFound()) {
          return null;
        }
        throw error;
      }
    },

    async deleteRelease(repo: RepositoryRef, releaseId: number): Promise<void> {
      await request('DELETE', `${repoPath(repo)}/releases/${releaseId}`);
    },

    async createRelease(repo: RepositoryRef, req: CreateReleaseRequest): Promise<Release> {
      const payload = await request('POST', `${repoPath(repo)}/releases`, {
        idempotent: false,
        body: {
          tag_name: req.tagName,
          name: req.name,
          body: req.body || `Release ${req.tagName}`,
          draft: req.draft ?? false,
          prerelease: req.prerelease ?? false,
        },
      });
      return parseRelease(payload, 201);
    },

    getConfig() {
      return { baseUrl, hasToken: true };
    },
  };
}
