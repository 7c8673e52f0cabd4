/**
 * Unit Tests: Repository coordinate parsing
 */

import { describe, it, expect } from 'vitest';
import { formatRepository, parseGitHubRepo, parseRepositorySlug } from '../../src/git/repo.js';

describe('parseGitHubRepo', () => {
  it.each([
    ['https://github.com/example-org/framework.git', 'example-org', 'framework'],
    ['https://github.com/example-org/framework', 'example-org', 'framework'],
    ['https://github.com/example-org/framework/', 'example-org', 'framework'],
    ['git@github.com:example-org/framework.git', 'example-org', 'framework'],
    ['ssh://git@github.com/example-org/framework.git', 'example-org', 'framework'],
    ['https://github.com/example-org/my.lib.git', 'example-org', 'my.lib'],
  ])('parses %s', (url, owner, name) => {
    expect(parseGitHubRepo(url)).toEqual({ owner, name });
  });

  it('returns null for other hosts', () => {
    expect(parseGitHubRepo('https://gitlab.example/group/project.git')).toBeNull();
    expect(parseGitHubRepo('')).toBeNull();
  });
});

describe('parseRepositorySlug / formatRepository', () => {
  it('round-trips owner/name', () => {
    const repo = parseRepositorySlug('example-org/redis-plugin');
    expect(repo).toEqual({ owner: 'example-org', name: 'redis-plugin' });
    expect(repo && formatRepository(repo)).toBe('example-org/redis-plugin');
  });

  it('rejects malformed slugs', () => {
    expect(parseRepositorySlug('redis-plugin')).toBeNull();
    expect(parseRepositorySlug('a/b/c')).toBeNull();
    expect(parseRepositorySlug('https://github.com/a/b')).toBeNull();
  });
});
