/**
 * Run report aggregation and formatting
 */

import chalk from 'chalk';
import type { OutputFormat } from '../../types.js';
import type { ActionResult, ExecutionResult, RunCounts, RunReport } from './types.js';
import { describeAction } from './plan.js';

/**
 * Report fields known before counts are derived
 */
export interface RunReportInput {
  runId: string;
  version: string;
  dryRun: boolean;
  startedAt: string;
  completedAt: string;
  results: ExecutionResult[];
}

/**
 * Count results by their success flag
 */
export function summarize(results: readonly ExecutionResult[]): RunCounts {
  const succeeded = results.filter((result) => result.success).length;
  return {
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
  };
}

export function buildRunReport(input: RunReportInput): RunReport {
  const counts = summarize(input.results);
  return {
    ...input,
    counts,
    success: counts.failed === 0,
  };
}

/**
 * Exit code for a finished run: 0 only if every target succeeded
 */
export function getExitCode(report: RunReport): number {
  return report.success ? 0 : 1;
}

function statusIcon(result: ExecutionResult): string {
  switch (result.status) {
    case 'released':
      return chalk.green('✓');
    case 'simulated':
      return chalk.cyan('○');
    case 'declined':
      return chalk.yellow('⊘');
    case 'not-found':
      return chalk.yellow('?');
    case 'failed':
      return chalk.red('✗');
  }
}

function actionIcon(action: ActionResult): string {
  if (action.simulated) {
    return chalk.gray('~');
  }
  return action.success ? chalk.green('✓') : chalk.red('✗');
}

function formatResult(result: ExecutionResult, tag: string): string[] {
  const lines: string[] = [];
  lines.push(
    `${statusIcon(result)} ${chalk.bold(result.target.name)} ${chalk.gray(`(${result.target.repository})`)} ${chalk.gray(`${result.durationMs}ms`)}`
  );

  for (const action of result.actions) {
    const text = action.message ?? describeAction(action.action, tag);
    lines.push(`    ${actionIcon(action)} ${text}`);
  }
  for (const action of result.notAttempted) {
    lines.push(`    ${chalk.gray('-')} ${chalk.gray(`not attempted: ${describeAction(action, tag)}`)}`);
  }

  if (result.error) {
    lines.push(`    ${chalk.red(result.error.message)}`);
    if (result.error.suggestion) {
      lines.push(`    ${chalk.gray(`Hint: ${result.error.suggestion}`)}`);
    }
  }
  return lines;
}

/**
 * Render a run report for the terminal or as JSON
 */
export function formatRunReport(report: RunReport, format: OutputFormat = 'human'): string {
  if (format === 'json') {
    return JSON.stringify(report, null, 2);
  }

  const lines: string[] = [];
  const heading = report.dryRun
    ? `Release ${report.version} (dry run)`
    : `Release ${report.version}`;
  lines.push(chalk.bold.underline(heading), '');

  for (const result of report.results) {
    lines.push(...formatResult(result, report.version));
  }

  const { total, succeeded, failed } = report.counts;
  const summary = `${succeeded}/${total} succeeded, ${failed} failed`;
  lines.push('', failed === 0 ? chalk.green(summary) : chalk.red(summary));
  return lines.join('\n');
}
