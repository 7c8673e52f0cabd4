/**
 * Wiring shared by the release commands: collaborators, token handling and
 * report printing.
 */

import { createReleasesClient, type ReleasesClient } from '../api/client.js';
import { logger } from '../api/logger.js';
import { createGitRunner, type GitRunner } from '../git/runner.js';
import { formatRepository } from '../git/repo.js';
import { GitError } from '../git/errors.js';
import { resolveGitHubToken, type ResolvedToken } from '../config/auth.js';
import { TargetsConfigError } from '../config/targets.js';
import { ReleaseError } from '../reconcilers/release/errors.js';
import { formatRunReport } from '../reconcilers/release/report.js';
import type { ReleaseCollaborators, RunReport, Target } from '../reconcilers/release/types.js';
import type { CommandContext, CommandResult } from '../types.js';
import { error as printError, info, manualReleaseInstructions, verbose, warn } from '../utils/output.js';

/**
 * Factories the commands use to reach git and GitHub; replaced in tests
 */
export interface ReleaseDependencies {
  createGit?: (target: Target) => GitRunner;
  createReleases?: (token: string) => ReleasesClient;
}

export function defaultCreateGit(target: Target): GitRunner {
  return createGitRunner({ cwd: target.workingDirectory, logger });
}

export function resolveToken(ctx: CommandContext): ResolvedToken | null {
  const token = resolveGitHubToken({ cliToken: ctx.options.token });
  if (token) {
    verbose(`Using GitHub token from ${token.source}`, ctx.options.verbose);
  } else if (ctx.outputFormat === 'human') {
    warn('GitHub token not provided: tags will be created, GitHub releases skipped');
    info('Provide one with --token or the GITHUB_TOKEN environment variable');
  }
  return token;
}

/**
 * Assemble the collaborators for a run
 *
 * Destructive changes are confirmed per target unless running dry or with --yes.
 */
export function buildCollaborators(
  ctx: CommandContext,
  token: ResolvedToken | null,
  deps: ReleaseDependencies = {}
): ReleaseCollaborators {
  const createReleases =
    deps.createReleases ??
    ((value: string) => createReleasesClient({ token: value, debug: ctx.options.verbose }));
  const askBeforeDeleting = !ctx.options.dryRun && !ctx.options.yes;

  return {
    git: deps.createGit ?? defaultCreateGit,
    releases: token ? createReleases(token.token) : undefined,
    confirm: askBeforeDeleting
      ? (description) => ctx.confirm(`Delete and recreate? ${description}`)
      : undefined,
    logger,
  };
}

/**
 * Print a finished run in human mode and wrap it as a command result
 */
export function finishRun(
  ctx: CommandContext,
  report: RunReport,
  targets: readonly Target[],
  tagOnly: boolean
): CommandResult<RunReport> {
  if (ctx.outputFormat === 'human') {
    console.log(`\n${formatRunReport(report, 'human')}`);
    if (tagOnly && !report.dryRun) {
      for (const target of targets) {
        manualReleaseInstructions(formatRepository(target.repository), report.version);
      }
    }
  }

  const { succeeded, total } = report.counts;
  const failed = report.results
    .filter((result) => !result.success)
    .map((result) => `${result.target.name}: ${result.error?.message ?? result.status}`);

  return {
    success: report.success,
    message: report.success
      ? `Release ${report.version} completed for ${total} target(s)`
      : `Release ${report.version} failed for ${total - succeeded} of ${total} target(s)`,
    data: report,
    errors: failed.length > 0 ? failed : undefined,
  };
}

/**
 * Turn a fatal error into a failed command result
 *
 * Known error types carry a suggestion, anything else is rethrown.
 */
export function failureResult<T>(ctx: CommandContext, err: unknown): CommandResult<T> {
  if (err instanceof ReleaseError || err instanceof GitError || err instanceof TargetsConfigError) {
    if (ctx.outputFormat === 'human') {
      printError(err.message);
      if (err.suggestion) {
        info(err.suggestion);
      }
    }
    return {
      success: false,
      message: err.message,
      errors: err.suggestion ? [err.suggestion] : undefined,
    };
  }
  throw err;
}

export function cancelled<T>(ctx: CommandContext): CommandResult<T> {
  if (ctx.outputFormat === 'human') {
    info('Release cancelled');
  }
  return { success: false, message: 'Release cancelled' };
}
