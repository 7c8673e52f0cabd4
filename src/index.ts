/**
 * release-sync library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the engine and its
 * collaborators for programmatic use.
 */

export * from './reconcilers/release/index.js';
export {
  createReleasesClient,
  ApiRequestError,
  ApiLogger,
  createLogger,
  logger,
  type ReleasesClient,
  type ReleasesClientConfig,
  type RepositoryRef,
  type Release,
  type CreateReleaseRequest,
} from './api/index.js';
export {
  createGitRunner,
  parseGitHubRepo,
  parseRepositorySlug,
  formatRepository,
  GitError,
  type GitRunner,
  type GitRunnerOptions,
  type GitResult,
  type ProcessExecutor,
} from './git/index.js';
export {
  loadTargetsConfig,
  selectTargets,
  resolveGitHubToken,
  TargetsConfigError,
  type LoadedTargets,
} from './config/index.js';
export { discoverMainTarget, findRepoRoot } from './discover.js';
export type { GlobalOptions, CommandContext, CommandResult, OutputFormat } from './types.js';
