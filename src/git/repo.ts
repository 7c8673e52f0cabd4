/**
 * Git repository detection utilities
 * Reads remotes and parses the GitHub coordinates behind them
 */

import { execFileSync } from 'node:child_process';
import type { RepositoryRef } from '../api/types.js';
import { GitNotAvailableError, GitCommandError } from './errors.js';
import { DEFAULT_GIT_TIMEOUT_MS } from './runner.js';

/**
 * Execute a git command and return stdout
 * @throws GitCommandError if the command fails
 * @throws GitNotAvailableError if git is not installed
 */
function execGit(args: string[], cwd?: string): string {
  try {
    const result = execFileSync('git', args, {
      cwd,
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
      timeout: DEFAULT_GIT_TIMEOUT_MS,
    });
    return result.trim();
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new GitNotAvailableError();
    }

    let stderr: string | undefined;
    let status: number | undefined;
    let timedOut = false;
    if (error instanceof Error) {
      timedOut = 'code' in error && error.code === 'ETIMEDOUT';
      if ('stderr' in error && (typeof error.stderr === 'string' || Buffer.isBuffer(error.stderr))) {
        stderr = error.stderr.toString().trim();
      }
      if ('status' in error && typeof error.status === 'number') {
        status = error.status;
      }
    }
    throw new GitCommandError(`git ${args.join(' ')}`, stderr, status, timedOut);
  }
}

/**
 * Get the URL of a remote, or undefined when it is not configured
 * @throws GitCommandError if git timed out
 */
export function getRemoteUrl(repoPath: string, remote = 'origin'): string | undefined {
  try {
    const url = execGit(['remote', 'get-url', remote], repoPath);
    return url || undefined;
  } catch (error) {
    if (error instanceof GitNotAvailableError || (error instanceof GitCommandError && error.timedOut)) {
      throw error;
    }
    return undefined;
  }
}

/**
 * Parse GitHub owner/repo from a remote URL
 *
 * Supports:
 * - https://github.com/owner/repo(.git)
 * - git@github.com:owner/repo.git
 * - ssh://git@github.com/owner/repo.git
 *
 * @returns Repository coordinates, or null for non-GitHub remotes
 */
export function parseGitHubRepo(url: string): RepositoryRef | null {
  const match = url.trim().match(/github\.com[:/]([^/]+)\/([^/]+?)(?:\.git)?\/?$/);
  if (!match) {
    return null;
  }
  return { owner: match[1], name: match[2] };
}

/**
 * Parse an `owner/name` slug
 *
 * @returns Repository coordinates, or null if the slug is malformed
 */
export function parseRepositorySlug(slug: string): RepositoryRef | null {
  const match = slug.trim().match(/^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/);
  if (!match) {
    return null;
  }
  return { owner: match[1], name: match[2] };
}

export function formatRepository(repo: RepositoryRef): string {
  return `${repo.owner}/${repo.name}`;
}
