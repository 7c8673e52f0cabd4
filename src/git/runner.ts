/**
 * Git tag operations scoped to one working directory
 *
 * Every call spawns `git` with an explicit timeout. Mutating calls report
 * failure as a value; queries throw GitCommandError when git cannot answer.
 */

import { execFile } from 'node:child_process';
import { realpath } from 'node:fs/promises';
import { resolve as resolvePath } from 'node:path';
import { GitCommandError, GitNotAvailableError } from './errors.js';
import { logger, type ApiLogger } from '../api/logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Outcome of a spawned process
 */
export interface ProcessResult {
  /** Exit code, null when the process was killed or failed to spawn */
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Spawns a process; resolves for any exit status
 * @throws GitNotAvailableError when the executable is missing
 */
export type ProcessExecutor = (
  file: string,
  args: string[],
  options: { cwd: string; timeoutMs: number }
) => Promise<ProcessResult>;

/**
 * Result of a mutating git call
 */
export interface GitResult {
  success: boolean;
  /** Combined stdout/stderr, trimmed */
  output: string;
  /** The resource was already gone (delete calls only) */
  absent?: boolean;
  timedOut?: boolean;
}

export interface GitRunner {
  readonly cwd: string;
  readonly remote: string;
  isRepository(): Promise<boolean>;
  localTagExists(tag: string): Promise<boolean>;
  remoteTagExists(tag: string): Promise<boolean>;
  /** Annotated when a message is given, lightweight otherwise */
  createTag(tag: string, message?: string): Promise<GitResult>;
  deleteLocalTag(tag: string): Promise<GitResult>;
  deleteRemoteTag(tag: string): Promise<GitResult>;
  pushTag(tag: string): Promise<GitResult>;
  hasUncommittedChanges(): Promise<boolean>;
  /** Stage and commit a single path */
  commitFile(path: string, message: string): Promise<GitResult>;
}

export interface GitRunnerOptions {
  cwd: string;
  /** Remote name (default: origin) */
  remote?: string;
  /** Per-command timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** Process executor (default: node:child_process execFile) */
  exec?: ProcessExecutor;
  logger?: ApiLogger;
}

export const DEFAULT_GIT_TIMEOUT_MS = 60000;

const LOCAL_TAG_MISSING = /tag '.*' not found/i;
const REMOTE_REF_MISSING = /remote ref does not exist/i;

// =============================================================================
// Process Execution
// =============================================================================

/**
 * Default executor backed by execFile
 *
 * Terminal prompts are disabled so a missing credential fails instead of hanging.
 */
export const execProcess: ProcessExecutor = (file, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        encoding: 'utf-8',
        maxBuffer: 10 * 1024 * 1024,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ code: 0, stdout, stderr, timedOut: false });
          return;
        }

        if (error.code === 'ENOENT') {
          reject(new GitNotAvailableError());
          return;
        }

        // git ran and exited: keep its own stderr, even when empty
        const code = typeof error.code === 'number' ? error.code : null;
        resolve({
          code,
          stdout,
          stderr: code !== null ? stderr : stderr || error.message,
          timedOut: error.killed === true && error.signal === 'SIGTERM',
        });
      }
    );
  });

function combineOutput(result: ProcessResult): string {
  return [result.stdout.trim(), result.stderr.trim()].filter(Boolean).join('\n');
}

// =============================================================================
// Runner
// =============================================================================

/**
 * Create a git runner for a working directory
 */
export function createGitRunner(options: GitRunnerOptions): GitRunner {
  const { cwd } = options;
  const remote = options.remote ?? 'origin';
  const timeoutMs = options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS;
  const exec = options.exec ?? execProcess;
  const log = (options.logger ?? logger).child({ cwd });

  async function git(args: string[]): Promise<ProcessResult> {
    log.debug('git', { args });
    const result = await exec('git', args, { cwd, timeoutMs });
    if (result.code !== 0) {
      log.debug('git exited non-zero', { args, code: result.code, timedOut: result.timedOut });
    }
    return result;
  }

  async function mutate(args: string[], absentPattern?: RegExp): Promise<GitResult> {
    const result = await git(args);
    const output = combineOutput(result);

    if (result.code === 0) {
      return { success: true, output };
    }

    if (result.timedOut) {
      return { success: false, output: `git ${args.join(' ')} timed out after ${timeoutMs}ms`, timedOut: true };
    }

    return {
      success: false,
      output,
      absent: absentPattern ? absentPattern.test(output) : undefined,
    };
  }

  function commandError(args: string[], result: ProcessResult): GitCommandError {
    return new GitCommandError(
      `git ${args.join(' ')}`,
      combineOutput(result),
      result.code ?? undefined,
      result.timedOut
    );
  }

  return {
    cwd,
    remote,

    /**
     * True only when cwd is the top of a work tree, not a directory nested in one
     */
    async isRepository(): Promise<boolean> {
      const result = await git(['rev-parse', '--show-toplevel']);
      if (result.code !== 0) {
        return false;
      }
      const topLevel = result.stdout.trim();
      const own = await realpath(cwd).catch(() => resolvePath(cwd));
      return topLevel === own || topLevel === resolvePath(cwd);
    },

    async localTagExists(tag: string): Promise<boolean> {
      const args = ['rev-parse', '-q', '--verify', `refs/tags/${tag}`];
      const result = await git(args);
      if (result.code === 0) return true;
      // --verify -q exits 1 silently when the ref is missing
      if (result.code === 1 && combineOutput(result) === '') return false;
      throw commandError(args, result);
    },

    async remoteTagExists(tag: string): Promise<boolean> {
      const args = ['ls-remote', '--tags', remote, `refs/tags/${tag}`];
      const result = await git(args);
      if (result.code !== 0) {
        throw commandError(args, result);
      }
      return result.stdout.trim().length > 0;
    },

    createTag(tag: string, message?: string): Promise<GitResult> {
      return mutate(message ? ['tag', '-a', tag, '-m', message] : ['tag', tag]);
    },

    deleteLocalTag(tag: string): Promise<GitResult> {
      return mutate(['tag', '-d', tag], LOCAL_TAG_MISSING);
    },

    deleteRemoteTag(tag: string): Promise<GitResult> {
      return mutate(['push', remote, '--delete', `refs/tags/${tag}`], REMOTE_REF_MISSING);
    },

    pushTag(tag: string): Promise<GitResult> {
      return mutate(['push', remote, `refs/tags/${tag}`]);
    },

    async hasUncommittedChanges(): Promise<boolean> {
      const args = ['status', '--porcelain', '--untracked-files=no'];
      const result = await git(args);
      if (result.code !== 0) {
        throw commandError(args, result);
      }
      return result.stdout.trim().length > 0;
    },

    async commitFile(path: string, message: string): Promise<GitResult> {
      const added = await mutate(['add', '--', path]);
      if (!added.success) {
        return added;
      }
      return mutate(['commit', '-m', message, '--', path]);
    },
  };
}
