/**
 * Shared types and interfaces for the release-sync CLI
 */

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Don't apply changes, just show what would happen */
  dryRun: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Answer yes to every confirmation prompt */
  yes: boolean;
  /** GitHub token (falls back to GITHUB_TOKEN, then GH_TOKEN) */
  token?: string;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * Interactive yes/no prompt
 */
export type ConfirmFn = (question: string) => Promise<boolean>;

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Working directory the CLI was started from */
  cwd: string;
  /** Prompt used for confirmations; replaced in tests */
  confirm: ConfirmFn;
}
