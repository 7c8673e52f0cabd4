/**
 * Error classes for git operations
 * Carry a stable code and a suggestion for the console
 */

/**
 * Base error class for git failures
 */
export class GitError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'GitError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Error thrown when a directory is not inside a git repository
 */
export class NotInGitRepoError extends GitError {
  constructor(cwd: string) {
    super(
      `Not inside a git repository: ${cwd}`,
      'NOT_IN_GIT_REPO',
      'Run from a git checkout or point the target at one'
    );
    this.name = 'NotInGitRepoError';
  }
}

/**
 * Error thrown when git is not installed or not available
 */
export class GitNotAvailableError extends GitError {
  constructor() {
    super(
      'Git is not installed or not available in PATH',
      'GIT_NOT_AVAILABLE',
      'Install git from https://git-scm.com/downloads'
    );
    this.name = 'GitNotAvailableError';
  }
}

/**
 * Error thrown when a git command fails or times out
 */
export class GitCommandError extends GitError {
  constructor(
    public readonly command: string,
    public readonly output?: string,
    public readonly exitCode?: number,
    public readonly timedOut = false
  ) {
    const detail = timedOut
      ? 'timed out'
      : `exited with ${exitCode ?? 'unknown status'}${output ? `: ${output}` : ''}`;
    super(`Git command failed: ${command} (${detail})`, timedOut ? 'GIT_TIMEOUT' : 'GIT_COMMAND_FAILED');
    this.name = 'GitCommandError';
  }
}

/**
 * Error thrown when the origin remote does not point at a GitHub repository
 */
export class UnsupportedRemoteError extends GitError {
  constructor(public readonly remoteUrl: string) {
    super(
      `Failed to parse a GitHub repository from remote: ${remoteUrl}`,
      'UNSUPPORTED_REMOTE',
      'The origin remote must be a github.com URL (https or ssh)'
    );
    this.name = 'UnsupportedRemoteError';
  }
}

/**
 * Whether git output indicates an authentication or permission problem
 */
export function isAuthFailure(output: string): boolean {
  return /authentication failed|permission denied|could not read username|invalid username or password|access denied|\b403\b/i.test(
    output
  );
}
