/**
 * Release reconciler
 *
 * Brings one or more repositories to a clean release state for a version:
 * stale releases and tags are removed, then the tag is recreated, pushed,
 * and published as a release.
 *
 * @module reconcilers/release
 */

export * from './types.js';
export * from './errors.js';
export { normalizeVersion, isValidVersion, versionEquals } from './version.js';
export { probeTarget } from './probe.js';
export {
  syncVersionFile,
  replaceVersion,
  compileVersionPattern,
  DEFAULT_VERSION_PATTERN,
  type VersionFileStatus,
  type VersionFileSyncOptions,
  type VersionFileSyncResult,
} from './version-file.js';
export {
  planRelease,
  describeAction,
  formatPlan,
  isCleanupAction,
  isRequiredAction,
  isMutatingAction,
  hasDestructiveActions,
  TAG_ONLY_REASON,
  type PlanOptions,
} from './plan.js';
export { executePlan, type ExecuteOptions, type ExecutionOutcome } from './apply.js';
export { runRelease, reconcileTarget, type RunOptions } from './orchestrate.js';
export {
  buildRunReport,
  summarize,
  formatRunReport,
  getExitCode,
  type RunReportInput,
} from './report.js';
