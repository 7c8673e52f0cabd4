/**
 * Git access: a process-backed runner for tag operations and
 * synchronous helpers for repository discovery.
 *
 * @module git
 */

export {
  createGitRunner,
  execProcess,
  DEFAULT_GIT_TIMEOUT_MS,
  type GitRunner,
  type GitRunnerOptions,
  type GitResult,
  type ProcessExecutor,
  type ProcessResult,
} from './runner.js';
export {
  getRemoteUrl,
  parseGitHubRepo,
  parseRepositorySlug,
  formatRepository,
} from './repo.js';
export {
  GitError,
  NotInGitRepoError,
  GitNotAvailableError,
  GitCommandError,
  UnsupportedRemoteError,
  isAuthFailure,
} from './errors.js';
