/**
 * Targets configuration
 *
 * Loads the list of plugin repositories to release from a YAML or JSON file:
 *
 * ```yaml
 * root: ..            # optional, relative to the config file
 * plugins:
 *   - name: redis
 *     repo: example-org/redis-plugin
 *   - name: kafka
 *     repo: example-org/kafka-plugin
 *     path: ../mq/kafka
 *     enabled: false
 * ```
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, extname, isAbsolute, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { parseRepositorySlug } from '../git/repo.js';
import type { Target } from '../reconcilers/release/types.js';

export const DEFAULT_TARGETS_CONFIG = 'plugins.json';

export type TargetsConfigErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE_ERROR'
  | 'CONFIG_INVALID'
  | 'TARGET_NOT_CONFIGURED';

export type TargetsIssueCode =
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_REPOSITORY'
  | 'DUPLICATE_TARGET_NAME'
  | 'NO_ENABLED_TARGETS';

export interface TargetsIssue {
  code: TargetsIssueCode;
  message: string;
  /** Path to the offending entry, e.g. plugins[2].repo */
  path?: string;
}

export class TargetsConfigError extends Error {
  constructor(
    message: string,
    public readonly code: TargetsConfigErrorCode,
    public readonly issues: TargetsIssue[] = [],
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'TargetsConfigError';
  }
}

/**
 * One plugin entry as written in the file
 */
export interface PluginEntry {
  name: string;
  /** owner/name on GitHub */
  repo: string;
  enabled?: boolean;
  /** Checkout path, relative to root (default: <root>/<name>) */
  path?: string;
  releaseBody?: string;
}

export interface TargetsConfig {
  root?: string;
  plugins: PluginEntry[];
}

export interface LoadedTargets {
  /** Enabled targets in file order */
  targets: Target[];
  /** Resolved root directory for plugin checkouts */
  root: string;
  /** Absolute path of the config file */
  configPath: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

/**
 * Validate raw parsed content into a config plus any issues found
 */
export function validateTargetsConfig(data: unknown): {
  config: TargetsConfig;
  issues: TargetsIssue[];
} {
  const issues: TargetsIssue[] = [];
  const plugins: PluginEntry[] = [];

  if (!isRecord(data) || !Array.isArray(data.plugins)) {
    issues.push({
      code: 'MISSING_REQUIRED_FIELD',
      message: 'Config must contain a "plugins" list',
      path: 'plugins',
    });
    return { config: { plugins }, issues };
  }

  const seen = new Set<string>();
  data.plugins.forEach((entry: unknown, index: number) => {
    const path = `plugins[${index}]`;
    if (!isRecord(entry)) {
      issues.push({ code: 'MISSING_REQUIRED_FIELD', message: 'Entry must be an object', path });
      return;
    }

    const name = optionalString(entry.name);
    const repo = optionalString(entry.repo);
    if (!name) {
      issues.push({ code: 'MISSING_REQUIRED_FIELD', message: 'Missing "name"', path: `${path}.name` });
    }
    if (!repo) {
      issues.push({ code: 'MISSING_REQUIRED_FIELD', message: 'Missing "repo"', path: `${path}.repo` });
    } else if (!parseRepositorySlug(repo)) {
      issues.push({
        code: 'INVALID_REPOSITORY',
        message: `Repository must be "owner/name", got "${repo}"`,
        path: `${path}.repo`,
      });
    }
    if (!name || !repo) {
      return;
    }

    if (seen.has(name)) {
      issues.push({
        code: 'DUPLICATE_TARGET_NAME',
        message: `Plugin "${name}" is listed more than once`,
        path: `${path}.name`,
      });
      return;
    }
    seen.add(name);

    plugins.push({
      name,
      repo,
      enabled: entry.enabled !== false,
      path: optionalString(entry.path),
      releaseBody: optionalString(entry.releaseBody),
    });
  });

  if (issues.length === 0 && !plugins.some((plugin) => plugin.enabled !== false)) {
    issues.push({ code: 'NO_ENABLED_TARGETS', message: 'No enabled plugins configured' });
  }

  return { config: { root: optionalString(data.root), plugins }, issues };
}

/**
 * Turn a validated config into release targets
 *
 * @param baseDir - Directory that relative `root` is resolved against
 */
export function resolveTargets(config: TargetsConfig, baseDir: string): { root: string; targets: Target[] } {
  const root = config.root ? resolve(baseDir, config.root) : dirname(baseDir);
  const targets: Target[] = [];

  for (const plugin of config.plugins) {
    if (plugin.enabled === false) {
      continue;
    }
    const repository = parseRepositorySlug(plugin.repo);
    if (!repository) {
      continue;
    }
    const workingDirectory = plugin.path
      ? isAbsolute(plugin.path) ? plugin.path : resolve(root, plugin.path)
      : resolve(root, plugin.name);

    targets.push({
      name: plugin.name,
      workingDirectory,
      repository,
      releaseBody: plugin.releaseBody,
    });
  }

  return { root, targets };
}

function parseContent(content: string, filePath: string): unknown {
  try {
    return extname(filePath).toLowerCase() === '.json'
      ? JSON.parse(content)
      : parseYaml(content);
  } catch (err) {
    throw new TargetsConfigError(
      `Failed to parse targets config ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_PARSE_ERROR'
    );
  }
}

/**
 * Load and validate a targets config file
 *
 * @throws TargetsConfigError when the file is missing, unparsable or invalid
 */
export async function loadTargetsConfig(configPath: string, cwd = process.cwd()): Promise<LoadedTargets> {
  const absolutePath = isAbsolute(configPath) ? configPath : resolve(cwd, configPath);

  if (!existsSync(absolutePath)) {
    throw new TargetsConfigError(
      `Targets config not found: ${absolutePath}`,
      'CONFIG_NOT_FOUND',
      [],
      `Create ${DEFAULT_TARGETS_CONFIG} or pass --config <path>`
    );
  }

  const content = await readFile(absolutePath, 'utf-8');
  const { config, issues } = validateTargetsConfig(parseContent(content, absolutePath));

  if (issues.length > 0) {
    const details = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message));
    throw new TargetsConfigError(
      `Invalid targets config ${absolutePath}:\n  ${details.join('\n  ')}`,
      'CONFIG_INVALID',
      issues
    );
  }

  const { root, targets } = resolveTargets(config, dirname(absolutePath));
  return { targets, root, configPath: absolutePath };
}

/**
 * Narrow targets to a single name, or return all of them
 *
 * @throws TargetsConfigError listing the available names on a miss
 */
export function selectTargets(targets: readonly Target[], name?: string): Target[] {
  if (name === undefined) {
    return [...targets];
  }
  const match = targets.find((target) => target.name === name);
  if (!match) {
    const available = targets.map((target) => target.name).join(', ');
    throw new TargetsConfigError(
      `Plugin "${name}" is not configured`,
      'TARGET_NOT_CONFIGURED',
      [],
      `Available plugins: ${available || '(none)'}`
    );
  }
  return [match];
}
