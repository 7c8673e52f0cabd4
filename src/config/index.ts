/**
 * Configuration module exports
 */

export {
  loadTargetsConfig,
  validateTargetsConfig,
  resolveTargets,
  selectTargets,
  TargetsConfigError,
  DEFAULT_TARGETS_CONFIG,
  type TargetsConfig,
  type TargetsConfigErrorCode,
  type TargetsIssue,
  type TargetsIssueCode,
  type PluginEntry,
  type LoadedTargets,
} from './targets.js';
export {
  resolveGitHubToken,
  type ResolvedToken,
  type ResolveTokenOptions,
  type TokenSource,
} from './auth.js';
