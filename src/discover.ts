/**
 * Main project discovery
 *
 * Finds the repository the CLI is run from and the GitHub coordinates of
 * its remote:
 * 1. Walk up from the start directory until a .git entry exists
 * 2. Read the remote URL (default: origin)
 * 3. Parse it as a GitHub repository
 */

import { existsSync } from 'node:fs';
import { basename, dirname, join, parse } from 'node:path';
import { getRemoteUrl, parseGitHubRepo } from './git/repo.js';
import { NotInGitRepoError, UnsupportedRemoteError, GitError } from './git/errors.js';
import type { Target } from './reconcilers/release/types.js';

export interface DiscoverOptions {
  /** Remote to read (default: origin) */
  remote?: string;
  /** Remote URL lookup, replaceable in tests */
  readRemoteUrl?: (repoPath: string, remote: string) => string | undefined;
}

/**
 * Find the repository root by walking up from startDir
 *
 * A .git file (worktree or submodule) counts the same as a .git directory.
 *
 * @returns Absolute root path, or null if none is found
 */
export function findRepoRoot(startDir: string): string | null {
  let current = startDir;
  const root = parse(current).root;

  while (true) {
    if (existsSync(join(current, '.git'))) {
      return current;
    }

    if (current === root) {
      break;
    }

    const parent = dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  return null;
}

/**
 * Build the release target for the repository containing startDir
 *
 * @throws NotInGitRepoError if startDir is not inside a repository
 * @throws GitError if the remote is not configured
 * @throws UnsupportedRemoteError if the remote is not on GitHub
 */
export function discoverMainTarget(
  startDir: string = process.cwd(),
  options: DiscoverOptions = {}
): Target {
  const remote = options.remote ?? 'origin';
  const readRemoteUrl = options.readRemoteUrl ?? getRemoteUrl;

  const repoRoot = findRepoRoot(startDir);
  if (!repoRoot) {
    throw new NotInGitRepoError(startDir);
  }

  const remoteUrl = readRemoteUrl(repoRoot, remote);
  if (!remoteUrl) {
    throw new GitError(
      `Remote "${remote}" is not configured in ${repoRoot}`,
      'REMOTE_NOT_CONFIGURED',
      `Add it with: git remote add ${remote} git@github.com:<owner>/<repo>.git`
    );
  }

  const repository = parseGitHubRepo(remoteUrl);
  if (!repository) {
    throw new UnsupportedRemoteError(remoteUrl);
  }

  return {
    name: repository.name || basename(repoRoot),
    workingDirectory: repoRoot,
    repository,
  };
}
