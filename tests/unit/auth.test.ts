/**
 * Unit Tests: GitHub token resolution
 */

import { describe, it, expect } from 'vitest';
import { resolveGitHubToken } from '../../src/config/auth.js';

describe('resolveGitHubToken', () => {
  const env = { GITHUB_TOKEN: 'test-secret-github', GH_TOKEN: 'test-secret-gh' };

  it('prefers the CLI flag', () => {
    expect(resolveGitHubToken({ cliToken: 'test-secret-cli', env })).toEqual({
      token: 'test-secret-cli',
      source: 'cli',
    });
  });

  it('falls back to GITHUB_TOKEN, then GH_TOKEN', () => {
    expect(resolveGitHubToken({ env })).toEqual({ token: 'test-secret-github', source: 'GITHUB_TOKEN' });
    expect(resolveGitHubToken({ env: { GH_TOKEN: 'test-secret-gh' } })).toEqual({
      token: 'test-secret-gh',
      source: 'GH_TOKEN',
    });
  });

  it('ignores blank values', () => {
    expect(resolveGitHubToken({ cliToken: '  ', env: { GITHUB_TOKEN: '', GH_TOKEN: 'test-secret-gh' } })?.source).toBe(
      'GH_TOKEN'
    );
  });

  it('returns null when nothing is set', () => {
    expect(resolveGitHubToken({ env: {} })).toBeNull();
  });
});
