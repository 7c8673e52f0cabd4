/**
 * Error taxonomy for release reconciliation
 *
 * InvalidVersionFormatError is fatal to a run. Every other error is captured
 * at the target boundary and recorded in the run report.
 */

import type { ActionKind } from './types.js';

export type ReleaseErrorCode =
  | 'INVALID_VERSION_FORMAT'
  | 'INVALID_VERSION_PATTERN'
  | 'TARGET_NOT_FOUND'
  | 'PROBE_FAILED'
  | 'ACTION_FAILED'
  | 'CONFIRMATION_DECLINED'
  | 'UNEXPECTED_ERROR';

/**
 * Why the current state of a target could not be read
 */
export type ProbeErrorKind = 'local-vcs-unavailable' | 'network' | 'auth';

/**
 * Serializable per-target error as it appears in the run report
 */
export interface TargetError {
  code: ReleaseErrorCode;
  message: string;
  probeKind?: ProbeErrorKind;
  step?: ActionKind;
  suggestion?: string;
}

/**
 * Base error class for reconciliation errors
 */
export class ReleaseError extends Error {
  constructor(
    message: string,
    public readonly code: ReleaseErrorCode,
    public readonly suggestion?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ReleaseError';
  }

  toTargetError(): TargetError {
    return {
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
    };
  }
}

export class InvalidVersionFormatError extends ReleaseError {
  constructor(public readonly input: string) {
    super(
      `Invalid version format: "${input}"`,
      'INVALID_VERSION_FORMAT',
      'Use dotted numbers with an optional leading "v", e.g. v1.5.1'
    );
    this.name = 'InvalidVersionFormatError';
  }
}

export class InvalidVersionPatternError extends ReleaseError {
  constructor(
    public readonly pattern: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Invalid version pattern: ${pattern}`,
      'INVALID_VERSION_PATTERN',
      'Pass a regular expression whose match is the version to replace',
      options
    );
    this.name = 'InvalidVersionPatternError';
  }
}

export class TargetNotFoundError extends ReleaseError {
  constructor(
    public readonly targetName: string,
    public readonly workingDirectory: string
  ) {
    super(
      `Working directory for ${targetName} does not exist: ${workingDirectory}`,
      'TARGET_NOT_FOUND',
      'Clone the repository next to the main project or set its path in the targets config'
    );
    this.name = 'TargetNotFoundError';
  }
}

export class ProbeError extends ReleaseError {
  constructor(
    public readonly kind: ProbeErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'PROBE_FAILED', probeSuggestion(kind), options);
    this.name = 'ProbeError';
  }

  override toTargetError(): TargetError {
    return { ...super.toTargetError(), probeKind: this.kind };
  }
}

export class ActionFailureError extends ReleaseError {
  constructor(
    public readonly step: ActionKind,
    public readonly reason: string,
    suggestion?: string
  ) {
    super(`${step} failed: ${reason}`, 'ACTION_FAILED', suggestion);
    this.name = 'ActionFailureError';
  }

  override toTargetError(): TargetError {
    return { ...super.toTargetError(), step: this.step };
  }
}

export class ConfirmationDeclinedError extends ReleaseError {
  constructor(targetName: string) {
    super(`Destructive changes for ${targetName} were not confirmed`, 'CONFIRMATION_DECLINED');
    this.name = 'ConfirmationDeclinedError';
  }
}

function probeSuggestion(kind: ProbeErrorKind): string {
  switch (kind) {
    case 'local-vcs-unavailable':
      return 'Make sure git is installed and the working directory is a git checkout';
    case 'auth':
      return 'Check that the token has the "repo" scope and access to this repository';
    case 'network':
      return 'Check network connectivity to the git remote and the GitHub API, then re-run';
  }
}

/**
 * Convert anything thrown at the target boundary into a report entry
 */
export function toTargetError(error: unknown): TargetError {
  if (error instanceof ReleaseError) {
    return error.toTargetError();
  }
  return {
    code: 'UNEXPECTED_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}
