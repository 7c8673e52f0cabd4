/**
 * Release plan execution
 *
 * Applies an action plan to one target via the git runner and the releases
 * client. Supports dry-run mode for previewing changes: the plan is the same,
 * every mutating action is recorded as a no-op instead of being dispatched.
 */

import { ApiRequestError } from '../../api/retry.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import type { GitResult, GitRunner } from '../../git/runner.js';
import { formatRepository } from '../../git/repo.js';
import type {
  ActionPlan,
  ActionResult,
  ReleaseAction,
  ReleaseCollaborators,
  Target,
} from './types.js';
import { ActionFailureError } from './errors.js';
import { describeAction, isMutatingAction, isRequiredAction } from './plan.js';

/**
 * Options for plan execution
 */
export interface ExecuteOptions {
  /** If true, record what would happen without mutating anything */
  dryRun?: boolean;
  logger?: ApiLogger;
}

/**
 * Result of executing a plan
 */
export interface ExecutionOutcome {
  /** Attempted actions in plan order */
  actions: ActionResult[];
  /** Actions after a failed required step */
  notAttempted: ReleaseAction[];
  /** True iff every action was attempted and succeeded */
  success: boolean;
  /** The halting failure, or else the first cleanup failure */
  failure?: ActionFailureError;
}

interface DispatchResult {
  success: boolean;
  message: string;
  suggestion?: string;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function fromGitResult(result: GitResult, done: string, alreadyAbsent?: string): DispatchResult {
  if (result.success) {
    return { success: true, message: done };
  }
  if (alreadyAbsent && result.absent) {
    return { success: true, message: alreadyAbsent };
  }
  return { success: false, message: result.output || 'git exited with an error' };
}

/**
 * Dispatch one action to its collaborator
 */
async function dispatch(
  action: ReleaseAction,
  target: Target,
  tag: string,
  git: () => GitRunner,
  collaborators: Pick<ReleaseCollaborators, 'releases'>
): Promise<DispatchResult> {
  const { releases } = collaborators;
  const repo = target.repository;

  switch (action.kind) {
    case 'delete-release': {
      if (!releases) {
        return { success: false, message: 'No releases client configured' };
      }
      try {
        await releases.deleteRelease(repo, action.handle.id);
        return { success: true, message: `Deleted release (ID: ${action.handle.id})` };
      } catch (error) {
        if (error instanceof ApiRequestError && error.isNotFound()) {
          return { success: true, message: `Release (ID: ${action.handle.id}) already absent` };
        }
        return { success: false, message: describeError(error) };
      }
    }

    case 'delete-remote-tag':
      return fromGitResult(
        await git().deleteRemoteTag(tag),
        `Deleted remote tag ${tag}`,
        `Remote tag ${tag} already absent`
      );

    case 'delete-local-tag':
      return fromGitResult(
        await git().deleteLocalTag(tag),
        `Deleted local tag ${tag}`,
        `Local tag ${tag} already absent`
      );

    case 'create-local-tag':
      return fromGitResult(await git().createTag(tag, action.message), `Created local tag ${tag}`);

    case 'push-tag':
      return fromGitResult(await git().pushTag(tag), `Pushed tag ${tag} to remote`);

    case 'create-release': {
      if (!releases) {
        return { success: false, message: 'No releases client configured' };
      }
      try {
        const release = await releases.createRelease(repo, {
          tagName: tag,
          name: action.name,
          body: action.body,
        });
        return {
          success: true,
          message: release.htmlUrl
            ? `Created release ${tag}: ${release.htmlUrl}`
            : `Created release ${tag}`,
        };
      } catch (error) {
        if (error instanceof ApiRequestError && error.status === 403) {
          return {
            success: false,
            message: describeError(error),
            suggestion: `Token needs the "repo" scope and access to ${formatRepository(repo)}`,
          };
        }
        return { success: false, message: describeError(error) };
      }
    }

    case 'noop':
      return { success: true, message: action.reason };
  }
}

/**
 * Execute an action plan against a target
 *
 * Stops at the first failed required step; cleanup failures are recorded
 * and execution continues.
 */
export async function executePlan(
  target: Target,
  plan: ActionPlan,
  collaborators: Pick<ReleaseCollaborators, 'git' | 'releases'>,
  options: ExecuteOptions = {}
): Promise<ExecutionOutcome> {
  const dryRun = options.dryRun ?? false;
  const log = (options.logger ?? defaultLogger).child({ target: target.name, tag: plan.tag });

  let runner: GitRunner | undefined;
  const git = (): GitRunner => {
    runner ??= collaborators.git(target);
    return runner;
  };

  const actions: ActionResult[] = [];
  let failure: ActionFailureError | undefined;

  for (let index = 0; index < plan.actions.length; index++) {
    const action = plan.actions[index];
    const description = describeAction(action, plan.tag);

    if (dryRun && isMutatingAction(action)) {
      log.debug('Dry run: skipping action', { action: action.kind });
      actions.push({ action, success: true, simulated: true, message: `Would ${description}` });
      continue;
    }

    let result: DispatchResult;
    try {
      result = await dispatch(action, target, plan.tag, git, collaborators);
    } catch (error) {
      // Collaborator threw instead of reporting (git missing, spawn failure)
      result = { success: false, message: describeError(error) };
    }

    actions.push({ action, success: result.success, simulated: false, message: result.message });

    if (result.success) {
      log.info(`Action succeeded: ${description}`);
      continue;
    }

    const actionFailure = new ActionFailureError(action.kind, result.message, result.suggestion);

    if (isRequiredAction(action)) {
      log.warn(`Required action failed, stopping plan: ${description}`, { reason: result.message });
      return {
        actions,
        notAttempted: plan.actions.slice(index + 1),
        success: false,
        failure: actionFailure,
      };
    }

    log.warn(`Cleanup action failed, continuing: ${description}`, { reason: result.message });
    failure ??= actionFailure;
  }

  return {
    actions,
    notAttempted: [],
    success: failure === undefined,
    failure,
  };
}
