/**
 * Release state probe
 *
 * Reads the three observable resources of a target: local tag, remote tag
 * and hosted release. Read-only; safe in dry-run mode.
 */

import type { RepositoryRef } from '../../api/types.js';
import type { ReleasesClient } from '../../api/client.js';
import { ApiRequestError } from '../../api/retry.js';
import type { GitRunner } from '../../git/runner.js';
import { GitCommandError, GitNotAvailableError, isAuthFailure } from '../../git/errors.js';
import type {
  ObservedState,
  ReleaseCollaborators,
  ReleaseHandle,
  Target,
  VersionTag,
} from './types.js';
import { ProbeError } from './errors.js';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function probeLocalTag(git: GitRunner, tag: string): Promise<boolean> {
  try {
    return await git.localTagExists(tag);
  } catch (error) {
    throw new ProbeError(
      'local-vcs-unavailable',
      `Cannot read local tag ${tag} in ${git.cwd}: ${describe(error)}`,
      { cause: error }
    );
  }
}

async function probeRemoteTag(git: GitRunner, tag: string): Promise<boolean> {
  try {
    return await git.remoteTagExists(tag);
  } catch (error) {
    if (error instanceof GitNotAvailableError) {
      throw new ProbeError('local-vcs-unavailable', error.message, { cause: error });
    }
    const output = error instanceof GitCommandError ? error.output ?? '' : describe(error);
    const kind = isAuthFailure(output) ? 'auth' : 'network';
    throw new ProbeError(
      kind,
      `Cannot query remote "${git.remote}" for tag ${tag}: ${describe(error)}`,
      { cause: error }
    );
  }
}

/**
 * Look up the release for a tag; 404 means "no release", not an error
 */
async function probeRelease(
  releases: ReleasesClient,
  repo: RepositoryRef,
  tag: string
): Promise<ReleaseHandle | null> {
  try {
    const release = await releases.getReleaseByTag(repo, tag);
    if (!release) {
      return null;
    }
    return { id: release.id, name: release.name, htmlUrl: release.htmlUrl };
  } catch (error) {
    const kind = error instanceof ApiRequestError && error.isAuthError() ? 'auth' : 'network';
    throw new ProbeError(
      kind,
      `Cannot look up release ${tag} in ${repo.owner}/${repo.name}: ${describe(error)}`,
      { cause: error }
    );
  }
}

/**
 * Capture the observed release state of a target
 *
 * @throws ProbeError when git or the release host cannot answer
 */
export async function probeTarget(
  target: Target,
  version: VersionTag,
  collaborators: Pick<ReleaseCollaborators, 'git' | 'releases'>
): Promise<ObservedState> {
  const git = collaborators.git(target);
  const tag = version.tag;

  let isRepository: boolean;
  try {
    isRepository = await git.isRepository();
  } catch (error) {
    throw new ProbeError('local-vcs-unavailable', describe(error), { cause: error });
  }
  if (!isRepository) {
    throw new ProbeError(
      'local-vcs-unavailable',
      `Not a git work tree: ${target.workingDirectory}`
    );
  }

  const localTagExists = await probeLocalTag(git, tag);
  const remoteTagExists = await probeRemoteTag(git, tag);
  const release = collaborators.releases
    ? await probeRelease(collaborators.releases, target.repository, tag)
    : null;

  return Object.freeze({
    tag,
    localTagExists,
    remoteTagExists,
    release,
    releaseChecked: collaborators.releases !== undefined,
  });
}
