/**
 * In-memory stand-ins for git and the GitHub releases API
 *
 * Both keep their state in plain sets and maps so tests can seed a
 * starting point and inspect the result. Every method is a vi.fn, so calls
 * can be asserted and individual methods overridden per test.
 */

import { vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { ReleasesClient } from '../../src/api/client.js';
import type { Release, RepositoryRef } from '../../src/api/types.js';
import type { GitResult } from '../../src/git/runner.js';
import type { Target } from '../../src/reconcilers/release/types.js';

const ok = (output = ''): GitResult => ({ success: true, output });

export interface FakeGitState {
  repository: boolean;
  dirty: boolean;
  localTags: Set<string>;
  remoteTags: Set<string>;
  /** Annotated tag messages by tag */
  messages: Map<string, string | undefined>;
  commits: Array<{ path: string; message: string }>;
}

export function createFakeGit(
  seed: { localTags?: string[]; remoteTags?: string[]; repository?: boolean; dirty?: boolean } = {},
  cwd = '/work/project'
) {
  const state: FakeGitState = {
    repository: seed.repository ?? true,
    dirty: seed.dirty ?? false,
    localTags: new Set(seed.localTags ?? []),
    remoteTags: new Set(seed.remoteTags ?? []),
    messages: new Map(),
    commits: [],
  };

  const runner = {
    cwd,
    remote: 'origin',
    state,
    isRepository: vi.fn(async () => state.repository),
    localTagExists: vi.fn(async (tag: string) => state.localTags.has(tag)),
    remoteTagExists: vi.fn(async (tag: string) => state.remoteTags.has(tag)),
    createTag: vi.fn(async (tag: string, message?: string): Promise<GitResult> => {
      if (state.localTags.has(tag)) {
        return { success: false, output: `fatal: tag '${tag}' already exists` };
      }
      state.localTags.add(tag);
      state.messages.set(tag, message);
      return ok();
    }),
    deleteLocalTag: vi.fn(async (tag: string): Promise<GitResult> => {
      if (!state.localTags.delete(tag)) {
        return { success: false, output: `error: tag '${tag}' not found.`, absent: true };
      }
      return ok(`Deleted tag '${tag}'`);
    }),
    deleteRemoteTag: vi.fn(async (tag: string): Promise<GitResult> => {
      if (!state.remoteTags.delete(tag)) {
        return {
          success: false,
          output: `error: unable to delete '${tag}': remote ref does not exist`,
          absent: true,
        };
      }
      return ok(`- [deleted]         ${tag}`);
    }),
    pushTag: vi.fn(async (tag: string): Promise<GitResult> => {
      if (!state.localTags.has(tag)) {
        return { success: false, output: `error: src refspec refs/tags/${tag} does not match any` };
      }
      state.remoteTags.add(tag);
      return ok(`* [new tag]         ${tag} -> ${tag}`);
    }),
    hasUncommittedChanges: vi.fn(async () => state.dirty),
    commitFile: vi.fn(async (path: string, message: string): Promise<GitResult> => {
      state.commits.push({ path, message });
      return ok(`[main abc1234] ${message}`);
    }),
  };

  return runner;
}

export type FakeGit = ReturnType<typeof createFakeGit>;

const repoKey = (repo: RepositoryRef): string => `${repo.owner}/${repo.name}`;

export function createFakeReleases(seed: Array<{ repo: string; release: Release }> = []) {
  const releases = new Map<string, Map<string, Release>>();
  let nextId = 1000;

  const forRepo = (repo: RepositoryRef): Map<string, Release> => {
    const key = repoKey(repo);
    let entry = releases.get(key);
    if (!entry) {
      entry = new Map();
      releases.set(key, entry);
    }
    return entry;
  };

  for (const { repo, release } of seed) {
    const [owner, name] = repo.split('/');
    forRepo({ owner, name }).set(release.tagName, release);
  }

  const client = {
    releases,
    getReleaseByTag: vi.fn(async (repo: RepositoryRef, tag: string) => forRepo(repo).get(tag) ?? null),
    deleteRelease: vi.fn(async (repo: RepositoryRef, releaseId: number) => {
      const entry = forRepo(repo);
      for (const [tag, release] of entry) {
        if (release.id === releaseId) {
          entry.delete(tag);
        }
      }
    }),
    createRelease: vi.fn(async (repo: RepositoryRef, request: { tagName: string; name: string; body?: string }) => {
      const release: Release = {
        id: nextId++,
        tagName: request.tagName,
        name: request.name,
        body: request.body ?? null,
        draft: false,
        prerelease: false,
        htmlUrl: `https://github.com/${repoKey(repo)}/releases/tag/${request.tagName}`,
      };
      forRepo(repo).set(request.tagName, release);
      return release;
    }),
    getConfig: vi.fn(() => ({ baseUrl: 'https://api.github.test', hasToken: true })),
  } satisfies ReleasesClient & { releases: Map<string, Map<string, Release>> };

  return client;
}

export type FakeReleases = ReturnType<typeof createFakeReleases>;

export function makeRelease(tagName: string, id = 1): Release {
  return {
    id,
    tagName,
    name: tagName,
    body: `Release ${tagName}`,
    draft: false,
    prerelease: false,
    htmlUrl: `https://github.com/example-org/project/releases/tag/${tagName}`,
  };
}

export function makeTarget(name: string, workingDirectory: string, repo = `example-org/${name}`): Target {
  const [owner, repoName] = repo.split('/');
  return { name, workingDirectory, repository: { owner, name: repoName } };
}

export function createTempDir(prefix = 'release-sync-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
