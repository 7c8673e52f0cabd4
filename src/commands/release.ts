/**
 * release command - Tag and release the main repository
 *
 * Runs against the repository containing the working directory. Whatever
 * already exists for the version (release, remote tag, local tag) is
 * deleted and recreated. With --version-file, the version recorded in that
 * file is bumped and committed first so the tag points at the bump commit.
 */

import { resolve } from 'node:path';

import type { CommandContext, CommandResult } from '../types.js';
import { discoverMainTarget } from '../discover.js';
import { formatRepository } from '../git/repo.js';
import { GitError } from '../git/errors.js';
import { normalizeVersion } from '../reconcilers/release/version.js';
import { runRelease } from '../reconcilers/release/orchestrate.js';
import {
  compileVersionPattern,
  syncVersionFile,
  type VersionFileSyncResult,
} from '../reconcilers/release/version-file.js';
import type { RunReport, Target } from '../reconcilers/release/types.js';
import { dryRunNotice, header, info, success, verbose, warn } from '../utils/output.js';
import {
  buildCollaborators,
  cancelled,
  defaultCreateGit,
  failureResult,
  finishRun,
  resolveToken,
  type ReleaseDependencies,
} from './shared.js';

export interface ReleaseOptions {
  /** Version to release, with or without the leading "v" */
  version: string;
  /** File whose recorded version is bumped and committed before tagging */
  versionFile?: string;
  /** Regular expression for the version text in versionFile */
  versionPattern?: string;
}

export interface ReleaseCommandDependencies extends ReleaseDependencies {
  discover?: (cwd: string) => Target;
}

/**
 * Execute the release command
 */
export async function releaseCommand(
  ctx: CommandContext,
  options: ReleaseOptions,
  deps: ReleaseCommandDependencies = {}
): Promise<CommandResult<RunReport>> {
  const { options: globalOpts, outputFormat } = ctx;
  const human = outputFormat === 'human';
  const interactive = !globalOpts.dryRun && !globalOpts.yes;

  verbose('Executing release command', globalOpts.verbose);

  let target: Target;
  let tag: string;
  let versionPattern: RegExp | undefined;
  try {
    tag = normalizeVersion(options.version).tag;
    versionPattern = options.versionPattern ? compileVersionPattern(options.versionPattern) : undefined;
    const discovered = (deps.discover ?? discoverMainTarget)(ctx.cwd);
    target = { ...discovered, releaseBody: `Release ${tag} of ${discovered.repository.name}` };
  } catch (err) {
    return failureResult(ctx, err);
  }

  if (human) {
    header(`Release ${tag}`);
    info(`Repository: ${formatRepository(target.repository)}`);
  }

  const token = resolveToken(ctx);
  if (!token && interactive) {
    const proceed = await ctx.confirm('Continue without creating a GitHub release?');
    if (!proceed) {
      return cancelled(ctx);
    }
  }

  const git = (deps.createGit ?? defaultCreateGit)(target);
  try {
    if (await git.hasUncommittedChanges()) {
      if (human) {
        warn('You have uncommitted changes');
      }
      if (interactive && !(await ctx.confirm('Continue anyway?'))) {
        return cancelled(ctx);
      }
    }
  } catch (err) {
    // Not fatal here: the probe reports an unusable checkout as a target failure
    verbose(`Could not check for uncommitted changes: ${err instanceof Error ? err.message : String(err)}`, globalOpts.verbose);
  }

  if (options.versionFile) {
    const synced = await syncVersionFile(tag, {
      path: resolve(target.workingDirectory, options.versionFile),
      pattern: versionPattern,
      dryRun: globalOpts.dryRun,
    });
    if (human) {
      printVersionFileSync(synced, options.versionFile, tag);
    }

    if (synced.status === 'updated') {
      const commit = await git.commitFile(options.versionFile, `chore: bump version to ${tag}`);
      if (!commit.success) {
        return failureResult(
          ctx,
          new GitError(
            `Failed to commit ${options.versionFile}: ${commit.output}`,
            'VERSION_COMMIT_FAILED',
            `Commit ${options.versionFile} by hand, then run the release again`
          )
        );
      }
      if (human) {
        success(`Committed ${options.versionFile} (tag will point to this commit)`);
      }
    }
  }

  if (globalOpts.dryRun && human) {
    dryRunNotice();
  }

  const collaborators = buildCollaborators(ctx, token, {
    ...deps,
    createGit: () => git,
  });
  const report = await runRelease(tag, [target], collaborators, {
    dryRun: globalOpts.dryRun,
  });

  return finishRun(ctx, report, [target], token === null);
}

function printVersionFileSync(synced: VersionFileSyncResult, file: string, tag: string): void {
  switch (synced.status) {
    case 'missing':
      warn(`Version file not found: ${synced.path}, skipping version sync`);
      break;
    case 'no-match':
      warn(`No version found in ${file}, skipping version sync`);
      break;
    case 'unchanged':
      info(`${file} already records ${tag}`);
      break;
    case 'would-update':
      info(`Would update ${file} from ${synced.previous} to ${tag} and commit it`);
      break;
    case 'updated':
      success(`Updated ${file} from ${synced.previous} to ${tag}`);
      break;
  }
}
