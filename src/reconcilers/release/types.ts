/**
 * Types for release state reconciliation
 *
 * A target is reconciled to one version: a local tag, a remote tag and a
 * hosted release, all named by the same canonical tag string.
 */

import type { RepositoryRef } from '../../api/types.js';
import type { ReleasesClient } from '../../api/client.js';
import type { ApiLogger } from '../../api/logger.js';
import type { GitRunner } from '../../git/runner.js';
import type { TargetError } from './errors.js';

// =============================================================================
// Version
// =============================================================================

/** Marker prepended to every canonical tag */
export const VERSION_PREFIX = 'v';

/** Dotted-numeric body, e.g. 1.5.1 */
export const VERSION_BODY_PATTERN = /^\d+(?:\.\d+)*$/;

/**
 * Canonical version tag; construct with normalizeVersion
 */
export interface VersionTag {
  /** Canonical form, e.g. "v1.5.1" */
  readonly tag: string;
  /** Body without the marker, e.g. "1.5.1" */
  readonly body: string;
}

// =============================================================================
// Targets and Observed State
// =============================================================================

/**
 * One repository checkout to bring to the release state
 */
export interface Target {
  /** Display name */
  name: string;
  /** Path to the git checkout */
  workingDirectory: string;
  /** Repository on the release host */
  repository: RepositoryRef;
  /** Release title (default: the tag) */
  releaseName?: string;
  /** Release notes (default: "Release <tag>") */
  releaseBody?: string;
  /** Create a lightweight tag instead of an annotated one */
  lightweightTag?: boolean;
}

/**
 * Opaque reference to an existing hosted release
 */
export interface ReleaseHandle {
  id: number;
  name?: string | null;
  htmlUrl?: string;
}

/**
 * Snapshot of a target's release resources, captured once per attempt
 */
export interface ObservedState {
  readonly tag: string;
  readonly localTagExists: boolean;
  readonly remoteTagExists: boolean;
  readonly release: ReleaseHandle | null;
  /** False when no releases client was available (tag-only mode) */
  readonly releaseChecked: boolean;
}

// =============================================================================
// Actions and Plans
// =============================================================================

export type ReleaseAction =
  | { kind: 'delete-release'; handle: ReleaseHandle }
  | { kind: 'delete-remote-tag' }
  | { kind: 'delete-local-tag' }
  /** Lightweight tag when message is absent */
  | { kind: 'create-local-tag'; message?: string }
  | { kind: 'push-tag' }
  | { kind: 'create-release'; name: string; body: string }
  | { kind: 'noop'; reason: string };

export type ActionKind = ReleaseAction['kind'];

/**
 * Ordered actions for one target
 */
export interface ActionPlan {
  readonly tag: string;
  readonly actions: readonly ReleaseAction[];
}

/**
 * Outcome of one attempted action
 */
export interface ActionResult {
  action: ReleaseAction;
  success: boolean;
  /** Diagnostic or descriptive text */
  message?: string;
  /** Recorded as a no-op by a dry run */
  simulated: boolean;
}

// =============================================================================
// Results and Reports
// =============================================================================

export type TargetStatus = 'released' | 'simulated' | 'failed' | 'not-found' | 'declined';

/**
 * Per-target outcome
 */
export interface ExecutionResult {
  target: {
    name: string;
    workingDirectory: string;
    repository: string;
  };
  status: TargetStatus;
  /** True iff every planned action was attempted and succeeded */
  success: boolean;
  observed?: ObservedState;
  plan?: ActionPlan;
  /** Attempted actions in plan order */
  actions: ActionResult[];
  /** Actions skipped after a required step failed */
  notAttempted: ReleaseAction[];
  error?: TargetError;
  durationMs: number;
}

export interface RunCounts {
  total: number;
  succeeded: number;
  failed: number;
}

/**
 * Structured summary of one run
 */
export interface RunReport {
  runId: string;
  version: string;
  dryRun: boolean;
  startedAt: string;
  completedAt: string;
  results: ExecutionResult[];
  counts: RunCounts;
  /** True iff every target succeeded */
  success: boolean;
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * External capabilities the engine drives
 */
export interface ReleaseCollaborators {
  /** Git runner for a target's working directory */
  git: (target: Target) => GitRunner;
  /** Releases client; omitted in tag-only mode */
  releases?: ReleasesClient;
  /** Asked before destructive live changes (default: always yes) */
  confirm?: (description: string) => Promise<boolean>;
  logger?: ApiLogger;
}
