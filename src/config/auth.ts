/**
 * GitHub token resolution
 *
 * Resolution order:
 * 1. --token CLI flag
 * 2. GITHUB_TOKEN environment variable
 * 3. GH_TOKEN environment variable
 *
 * No token is not an error: the release commands fall back to tag-only mode.
 */

export type TokenSource = 'cli' | 'GITHUB_TOKEN' | 'GH_TOKEN';

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}

export interface ResolveTokenOptions {
  cliToken?: string;
  env?: NodeJS.ProcessEnv;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function resolveGitHubToken(options: ResolveTokenOptions = {}): ResolvedToken | null {
  const env = options.env ?? process.env;

  const cliToken = nonEmpty(options.cliToken);
  if (cliToken) {
    return { token: cliToken, source: 'cli' };
  }
  const githubToken = nonEmpty(env.GITHUB_TOKEN);
  if (githubToken) {
    return { token: githubToken, source: 'GITHUB_TOKEN' };
  }
  const ghToken = nonEmpty(env.GH_TOKEN);
  if (ghToken) {
    return { token: ghToken, source: 'GH_TOKEN' };
  }
  return null;
}
