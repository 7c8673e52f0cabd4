/**
 * Multi-target release orchestration
 *
 * Runs probe -> plan -> (confirm) -> execute for each target with:
 * - Sequential execution in caller order
 * - Failure isolation (a failed target never stops the run)
 * - No rollback of targets that already succeeded
 * - Aggregated run report
 *
 * @module reconcilers/release/orchestrate
 */

import { existsSync, statSync } from 'node:fs';
import { logger as defaultLogger } from '../../api/logger.js';
import { formatRepository } from '../../git/repo.js';
import type {
  ActionPlan,
  ExecutionResult,
  ObservedState,
  ReleaseAction,
  ReleaseCollaborators,
  RunReport,
  Target,
  TargetStatus,
  VersionTag,
} from './types.js';
import {
  ConfirmationDeclinedError,
  TargetNotFoundError,
  toTargetError,
  type TargetError,
} from './errors.js';
import { normalizeVersion } from './version.js';
import { probeTarget } from './probe.js';
import { describeAction, hasDestructiveActions, isCleanupAction, planRelease } from './plan.js';
import { executePlan } from './apply.js';
import { buildRunReport } from './report.js';

/**
 * Options for a release run
 */
export interface RunOptions {
  /** Probe and plan, but record every mutation as a no-op */
  dryRun?: boolean;
  /** Called before a target is processed */
  onTargetStart?: (target: Target, index: number, total: number) => void;
  /** Called with each target result as soon as it is known */
  onTargetComplete?: (result: ExecutionResult, index: number, total: number) => void;
}

/**
 * Generate a unique run ID
 */
function generateRunId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `run-${timestamp}-${random}`;
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

function statusFor(success: boolean, dryRun: boolean, error?: TargetError): TargetStatus {
  if (success) {
    return dryRun ? 'simulated' : 'released';
  }
  switch (error?.code) {
    case 'TARGET_NOT_FOUND':
      return 'not-found';
    case 'CONFIRMATION_DECLINED':
      return 'declined';
    default:
      return 'failed';
  }
}

function describeDestructive(target: Target, plan: ActionPlan): string {
  const steps = plan.actions
    .filter(isCleanupAction)
    .map((action) => describeAction(action, plan.tag));
  return `${target.name} (${formatRepository(target.repository)}): ${steps.join(', ')}`;
}

/**
 * Reconcile a single target; never throws
 */
export async function reconcileTarget(
  target: Target,
  version: VersionTag,
  collaborators: ReleaseCollaborators,
  options: Pick<RunOptions, 'dryRun'> = {}
): Promise<ExecutionResult> {
  const dryRun = options.dryRun ?? false;
  const log = (collaborators.logger ?? defaultLogger).child({ target: target.name });
  const startTime = Date.now();

  let observed: ObservedState | undefined;
  let plan: ActionPlan | undefined;

  const finish = (
    success: boolean,
    rest: { actions?: ExecutionResult['actions']; notAttempted?: ReleaseAction[]; error?: TargetError }
  ): ExecutionResult => ({
    target: {
      name: target.name,
      workingDirectory: target.workingDirectory,
      repository: formatRepository(target.repository),
    },
    status: statusFor(success, dryRun, rest.error),
    success,
    observed,
    plan,
    actions: rest.actions ?? [],
    notAttempted: rest.notAttempted ?? [],
    error: rest.error,
    durationMs: Date.now() - startTime,
  });

  try {
    if (!isDirectory(target.workingDirectory)) {
      throw new TargetNotFoundError(target.name, target.workingDirectory);
    }

    observed = await probeTarget(target, version, collaborators);
    log.debug('Observed state', {
      localTagExists: observed.localTagExists,
      remoteTagExists: observed.remoteTagExists,
      releaseId: observed.release?.id,
      releaseChecked: observed.releaseChecked,
    });

    plan = planRelease(observed, {
      releaseName: target.releaseName,
      releaseBody: target.releaseBody,
      lightweightTag: target.lightweightTag,
    });

    if (!dryRun && collaborators.confirm && hasDestructiveActions(plan)) {
      const confirmed = await collaborators.confirm(describeDestructive(target, plan));
      if (!confirmed) {
        throw new ConfirmationDeclinedError(target.name);
      }
    }

    const outcome = await executePlan(target, plan, collaborators, { dryRun, logger: log });
    return finish(outcome.success, {
      actions: outcome.actions,
      notAttempted: outcome.notAttempted,
      error: outcome.failure?.toTargetError(),
    });
  } catch (error) {
    const targetError = toTargetError(error);
    log.warn(`Target failed: ${targetError.message}`, { code: targetError.code });
    return finish(false, {
      notAttempted: plan ? [...plan.actions] : [],
      error: targetError,
    });
  }
}

/**
 * Reconcile every target to a version
 *
 * @param version - Raw or normalized version; invalid input throws before any target is touched
 * @throws InvalidVersionFormatError
 */
export async function runRelease(
  version: string | VersionTag,
  targets: readonly Target[],
  collaborators: ReleaseCollaborators,
  options: RunOptions = {}
): Promise<RunReport> {
  const versionTag = typeof version === 'string' ? normalizeVersion(version) : version;
  const dryRun = options.dryRun ?? false;
  const runId = generateRunId();
  const startedAt = new Date().toISOString();
  const log = (collaborators.logger ?? defaultLogger).child({ runId, tag: versionTag.tag });

  log.info(`Reconciling ${targets.length} target(s)`, { dryRun });

  const results: ExecutionResult[] = [];
  for (let index = 0; index < targets.length; index++) {
    const target = targets[index];
    options.onTargetStart?.(target, index, targets.length);

    const result = await reconcileTarget(target, versionTag, collaborators, { dryRun });
    results.push(result);

    options.onTargetComplete?.(result, index, targets.length);
  }

  const report = buildRunReport({
    runId,
    version: versionTag.tag,
    dryRun,
    startedAt,
    completedAt: new Date().toISOString(),
    results,
  });

  log.info('Run complete', { ...report.counts });
  return report;
}
