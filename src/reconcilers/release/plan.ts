/**
 * Release reconciler
 *
 * Computes the reset-to-fresh plan for one target: whatever exists is
 * deleted, then the tag and release are created again. Existing resources
 * are never reused, even when they already point at the right commit.
 *
 * Order is fixed:
 *   1. delete-release     (if a release exists)
 *   2. delete-remote-tag  (if the remote tag exists)
 *   3. delete-local-tag   (if the local tag exists)
 *   4. create-local-tag
 *   5. push-tag
 *   6. create-release
 *
 * Steps 1-3 are best-effort cleanup; 4-6 are required.
 */

import type { ActionKind, ActionPlan, ObservedState, ReleaseAction } from './types.js';

/**
 * Options for plan computation
 */
export interface PlanOptions {
  /** Release title (default: the tag) */
  releaseName?: string;
  /** Release notes (default: "Release <tag>") */
  releaseBody?: string;
  /** Annotated tag message (default: "Release <tag>") */
  tagMessage?: string;
  /** Skip the tag message and create a lightweight tag */
  lightweightTag?: boolean;
}

export const TAG_ONLY_REASON = 'Release skipped: no GitHub token configured';

const CLEANUP_ACTIONS: ReadonlySet<ActionKind> = new Set<ActionKind>([
  'delete-release',
  'delete-remote-tag',
  'delete-local-tag',
]);

const REQUIRED_ACTIONS: ReadonlySet<ActionKind> = new Set<ActionKind>([
  'create-local-tag',
  'push-tag',
  'create-release',
]);

/**
 * Compute the action plan for an observed state
 */
export function planRelease(observed: ObservedState, options: PlanOptions = {}): ActionPlan {
  const { tag } = observed;
  const actions: ReleaseAction[] = [];

  if (observed.release) {
    actions.push({ kind: 'delete-release', handle: observed.release });
  }
  if (observed.remoteTagExists) {
    actions.push({ kind: 'delete-remote-tag' });
  }
  if (observed.localTagExists) {
    actions.push({ kind: 'delete-local-tag' });
  }

  actions.push(
    options.lightweightTag
      ? { kind: 'create-local-tag' }
      : { kind: 'create-local-tag', message: options.tagMessage ?? `Release ${tag}` }
  );
  actions.push({ kind: 'push-tag' });

  if (observed.releaseChecked) {
    actions.push({
      kind: 'create-release',
      name: options.releaseName ?? tag,
      body: options.releaseBody ?? `Release ${tag}`,
    });
  } else {
    actions.push({ kind: 'noop', reason: TAG_ONLY_REASON });
  }

  return Object.freeze({ tag, actions: Object.freeze(actions) });
}

/**
 * Best-effort cleanup: failure does not stop the plan
 */
export function isCleanupAction(action: ReleaseAction): boolean {
  return CLEANUP_ACTIONS.has(action.kind);
}

/**
 * Required step: failure stops the plan
 */
export function isRequiredAction(action: ReleaseAction): boolean {
  return REQUIRED_ACTIONS.has(action.kind);
}

export function isMutatingAction(action: ReleaseAction): boolean {
  return action.kind !== 'noop';
}

export function hasDestructiveActions(plan: ActionPlan): boolean {
  return plan.actions.some(isCleanupAction);
}

/**
 * Human-readable description of an action
 */
export function describeAction(action: ReleaseAction, tag: string): string {
  switch (action.kind) {
    case 'delete-release':
      return `delete release ${tag} (ID: ${action.handle.id})`;
    case 'delete-remote-tag':
      return `delete remote tag ${tag}`;
    case 'delete-local-tag':
      return `delete local tag ${tag}`;
    case 'create-local-tag':
      return `create local tag ${tag}`;
    case 'push-tag':
      return `push tag ${tag} to remote`;
    case 'create-release':
      return `create release "${action.name}" for ${tag}`;
    case 'noop':
      return action.reason;
  }
}

/**
 * Format a plan as numbered lines
 */
export function formatPlan(plan: ActionPlan): string {
  return plan.actions
    .map((action, index) => `  ${index + 1}. ${describeAction(action, plan.tag)}`)
    .join('\n');
}
