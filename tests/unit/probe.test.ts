/**
 * Unit Tests: Release state probe
 */

import { describe, it, expect } from 'vitest';
import { probeTarget } from '../../src/reconcilers/release/probe.js';
import { ProbeError } from '../../src/reconcilers/release/errors.js';
import { normalizeVersion } from '../../src/reconcilers/release/version.js';
import { ApiRequestError } from '../../src/api/retry.js';
import { GitCommandError, GitNotAvailableError } from '../../src/git/errors.js';
import { createFakeGit, createFakeReleases, makeRelease, makeTarget } from '../helpers/fakes.js';

const version = normalizeVersion('1.2.3');
const target = makeTarget('project', '/work/project');

async function probeError(promise: Promise<unknown>): Promise<ProbeError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ProbeError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected probe to fail');
}

describe('probeTarget', () => {
  it('reports an all-absent state', async () => {
    const git = createFakeGit();
    const releases = createFakeReleases();

    const state = await probeTarget(target, version, { git: () => git, releases });

    expect(state).toEqual({
      tag: 'v1.2.3',
      localTagExists: false,
      remoteTagExists: false,
      release: null,
      releaseChecked: true,
    });
    expect(releases.getReleaseByTag).toHaveBeenCalledWith({ owner: 'example-org', name: 'project' }, 'v1.2.3');
  });

  it('reports every existing resource', async () => {
    const git = createFakeGit({ localTags: ['v1.2.3'], remoteTags: ['v1.2.3'] });
    const releases = createFakeReleases([
      { repo: 'example-org/project', release: makeRelease('v1.2.3', 55) },
    ]);

    const state = await probeTarget(target, version, { git: () => git, releases });

    expect(state.localTagExists).toBe(true);
    expect(state.remoteTagExists).toBe(true);
    expect(state.release).toEqual({
      id: 55,
      name: 'v1.2.3',
      htmlUrl: 'https://github.com/example-org/project/releases/tag/v1.2.3',
    });
    expect(Object.isFrozen(state)).toBe(true);
  });

  it('ignores tags for other versions', async () => {
    const git = createFakeGit({ localTags: ['v1.2.2'], remoteTags: ['v1.2.4'] });
    const state = await probeTarget(target, version, { git: () => git, releases: createFakeReleases() });
    expect(state.localTagExists).toBe(false);
    expect(state.remoteTagExists).toBe(false);
  });

  it('skips the release lookup in tag-only mode', async () => {
    const git = createFakeGit({ remoteTags: ['v1.2.3'] });
    const state = await probeTarget(target, version, { git: () => git });
    expect(state.release).toBeNull();
    expect(state.releaseChecked).toBe(false);
    expect(state.remoteTagExists).toBe(true);
  });

  it('makes no mutating calls', async () => {
    const git = createFakeGit({ localTags: ['v1.2.3'] });
    const releases = createFakeReleases();
    await probeTarget(target, version, { git: () => git, releases });
    expect(git.createTag).not.toHaveBeenCalled();
    expect(git.deleteLocalTag).not.toHaveBeenCalled();
    expect(git.deleteRemoteTag).not.toHaveBeenCalled();
    expect(git.pushTag).not.toHaveBeenCalled();
    expect(releases.deleteRelease).not.toHaveBeenCalled();
    expect(releases.createRelease).not.toHaveBeenCalled();
  });

  it('fails with local-vcs-unavailable outside a work tree', async () => {
    const git = createFakeGit({ repository: false });
    const err = await probeError(probeTarget(target, version, { git: () => git }));
    expect(err.kind).toBe('local-vcs-unavailable');
    expect(err.message).toBe('Not a git work tree: /work/project');
  });

  it('fails with local-vcs-unavailable when git is missing', async () => {
    const git = createFakeGit();
    git.isRepository.mockRejectedValueOnce(new GitNotAvailableError());
    const err = await probeError(probeTarget(target, version, { git: () => git }));
    expect(err.kind).toBe('local-vcs-unavailable');
    expect(err.toTargetError()).toMatchObject({ code: 'PROBE_FAILED', probeKind: 'local-vcs-unavailable' });
  });

  it('classifies a remote authentication failure as auth', async () => {
    const git = createFakeGit();
    git.remoteTagExists.mockRejectedValueOnce(
      new GitCommandError(
        'git ls-remote --tags origin refs/tags/v1.2.3',
        'fatal: Authentication failed for https://github.com/example-org/project.git',
        128
      )
    );
    const err = await probeError(probeTarget(target, version, { git: () => git }));
    expect(err.kind).toBe('auth');
  });

  it('classifies other remote failures as network', async () => {
    const git = createFakeGit();
    git.remoteTagExists.mockRejectedValueOnce(
      new GitCommandError('git ls-remote --tags origin refs/tags/v1.2.3', undefined, undefined, true)
    );
    const err = await probeError(probeTarget(target, version, { git: () => git }));
    expect(err.kind).toBe('network');
  });

  it('classifies 401 and 403 from the release lookup as auth', async () => {
    for (const status of [401, 403]) {
      const releases = createFakeReleases();
      releases.getReleaseByTag.mockRejectedValueOnce(new ApiRequestError('Bad credentials', status));
      const err = await probeError(probeTarget(target, version, { git: () => createFakeGit(), releases }));
      expect(err.kind).toBe('auth');
    }
  });

  it('classifies server errors from the release lookup as network', async () => {
    const releases = createFakeReleases();
    releases.getReleaseByTag.mockRejectedValueOnce(new ApiRequestError('Bad gateway', 502));
    const err = await probeError(probeTarget(target, version, { git: () => createFakeGit(), releases }));
    expect(err.kind).toBe('network');
    expect(err.message).toBe('Cannot look up release v1.2.3 in example-org/project: Bad gateway');
  });
});
