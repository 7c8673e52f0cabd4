/**
 * Unit Tests: Release plan computation
 *
 * The plan always resets to fresh: existing resources are deleted in a
 * fixed order before the tag and release are created again.
 */

import { describe, it, expect } from 'vitest';
import {
  planRelease,
  describeAction,
  formatPlan,
  hasDestructiveActions,
  isCleanupAction,
  isRequiredAction,
  isMutatingAction,
  TAG_ONLY_REASON,
} from '../../src/reconcilers/release/plan.js';
import type { ObservedState } from '../../src/reconcilers/release/types.js';

function observed(overrides: Partial<ObservedState> = {}): ObservedState {
  return {
    tag: 'v1.2.3',
    localTagExists: false,
    remoteTagExists: false,
    release: null,
    releaseChecked: true,
    ...overrides,
  };
}

const kinds = (state: ObservedState) => planRelease(state).actions.map((action) => action.kind);

describe('planRelease', () => {
  it('creates tag, push and release when nothing exists', () => {
    expect(kinds(observed())).toEqual(['create-local-tag', 'push-tag', 'create-release']);
  });

  it('deletes everything first when everything exists', () => {
    const plan = planRelease(
      observed({ localTagExists: true, remoteTagExists: true, release: { id: 42 } })
    );
    expect(plan.actions.map((action) => action.kind)).toEqual([
      'delete-release',
      'delete-remote-tag',
      'delete-local-tag',
      'create-local-tag',
      'push-tag',
      'create-release',
    ]);
    expect(plan.actions[0]).toEqual({ kind: 'delete-release', handle: { id: 42 } });
  });

  it('only deletes what was observed', () => {
    expect(kinds(observed({ remoteTagExists: true }))).toEqual([
      'delete-remote-tag',
      'create-local-tag',
      'push-tag',
      'create-release',
    ]);
    expect(kinds(observed({ localTagExists: true }))).toEqual([
      'delete-local-tag',
      'create-local-tag',
      'push-tag',
      'create-release',
    ]);
  });

  it('resets even when the state already matches', () => {
    const plan = planRelease(observed({ localTagExists: true, remoteTagExists: true, release: { id: 7 } }));
    expect(plan.actions).toHaveLength(6);
  });

  it('uses default tag message, release name and body', () => {
    const plan = planRelease(observed());
    expect(plan.actions).toEqual([
      { kind: 'create-local-tag', message: 'Release v1.2.3' },
      { kind: 'push-tag' },
      { kind: 'create-release', name: 'v1.2.3', body: 'Release v1.2.3' },
    ]);
  });

  it('plans a lightweight tag when asked', () => {
    const plan = planRelease(observed(), { lightweightTag: true, tagMessage: 'ignored' });
    expect(plan.actions[0]).toEqual({ kind: 'create-local-tag' });
  });

  it('uses the given release name and body', () => {
    const plan = planRelease(observed(), { releaseName: 'Spring release', releaseBody: 'Notes' });
    expect(plan.actions[2]).toEqual({ kind: 'create-release', name: 'Spring release', body: 'Notes' });
  });

  it('replaces release creation with a noop in tag-only mode', () => {
    const plan = planRelease(observed({ releaseChecked: false, localTagExists: true }));
    expect(plan.actions).toEqual([
      { kind: 'delete-local-tag' },
      { kind: 'create-local-tag', message: 'Release v1.2.3' },
      { kind: 'push-tag' },
      { kind: 'noop', reason: TAG_ONLY_REASON },
    ]);
  });

  it('carries the tag and freezes the plan', () => {
    const plan = planRelease(observed());
    expect(plan.tag).toBe('v1.2.3');
    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.actions)).toBe(true);
  });

  it('is deterministic', () => {
    const state = observed({ remoteTagExists: true, release: { id: 3 } });
    expect(planRelease(state)).toEqual(planRelease(state));
  });
});

describe('action classification', () => {
  it('splits cleanup from required steps', () => {
    expect(isCleanupAction({ kind: 'delete-release', handle: { id: 1 } })).toBe(true);
    expect(isCleanupAction({ kind: 'delete-remote-tag' })).toBe(true);
    expect(isCleanupAction({ kind: 'delete-local-tag' })).toBe(true);
    expect(isRequiredAction({ kind: 'create-local-tag', message: 'm' })).toBe(true);
    expect(isRequiredAction({ kind: 'push-tag' })).toBe(true);
    expect(isRequiredAction({ kind: 'create-release', name: 'n', body: 'b' })).toBe(true);
  });

  it('treats noop as neither cleanup, required nor mutating', () => {
    const noop = { kind: 'noop', reason: 'skip' } as const;
    expect(isCleanupAction(noop)).toBe(false);
    expect(isRequiredAction(noop)).toBe(false);
    expect(isMutatingAction(noop)).toBe(false);
  });

  it('detects destructive plans', () => {
    expect(hasDestructiveActions(planRelease(observed()))).toBe(false);
    expect(hasDestructiveActions(planRelease(observed({ remoteTagExists: true })))).toBe(true);
  });
});

describe('describeAction / formatPlan', () => {
  it('describes each step', () => {
    expect(describeAction({ kind: 'delete-release', handle: { id: 9 } }, 'v1.0')).toBe(
      'delete release v1.0 (ID: 9)'
    );
    expect(describeAction({ kind: 'push-tag' }, 'v1.0')).toBe('push tag v1.0 to remote');
    expect(describeAction({ kind: 'create-release', name: 'v1.0', body: '' }, 'v1.0')).toBe(
      'create release "v1.0" for v1.0'
    );
    expect(describeAction({ kind: 'noop', reason: 'nothing to do' }, 'v1.0')).toBe('nothing to do');
  });

  it('numbers plan lines', () => {
    expect(formatPlan(planRelease(observed({ localTagExists: true })))).toBe(
      [
        '  1. delete local tag v1.2.3',
        '  2. create local tag v1.2.3',
        '  3. push tag v1.2.3 to remote',
        '  4. create release "v1.2.3" for v1.2.3',
      ].join('\n')
    );
  });
});
