/**
 * Version file sync
 *
 * Rewrites the version recorded in a tracked file (a startup banner, for
 * example) so the release tag can point at a commit that carries it. By
 * default the last `v<digits>` token at the end of the file is replaced.
 */

import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { InvalidVersionPatternError } from './errors.js';

/** Trailing version token, e.g. the "v1.5.0" in "... v1.5.0\n" */
export const DEFAULT_VERSION_PATTERN = /v\d+(?:\.\d+)*(?=\s*$)/;

export type VersionFileStatus = 'missing' | 'no-match' | 'unchanged' | 'updated' | 'would-update';

export interface VersionFileSyncResult {
  status: VersionFileStatus;
  path: string;
  /** Version text found in the file */
  previous?: string;
}

export interface VersionFileSyncOptions {
  /** Absolute path of the file */
  path: string;
  /** The first match is replaced with the tag */
  pattern?: RegExp;
  dryRun?: boolean;
}

/**
 * Compile a user-supplied pattern
 * @throws InvalidVersionPatternError if the source is not a valid expression
 */
export function compileVersionPattern(source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    throw new InvalidVersionPatternError(source, { cause: error });
  }
}

/**
 * Replace the first pattern match in content with the tag
 *
 * @returns The new content and the replaced text, or null without a match
 */
export function replaceVersion(
  content: string,
  tag: string,
  pattern: RegExp = DEFAULT_VERSION_PATTERN
): { content: string; previous: string } | null {
  const match = pattern.exec(content);
  if (!match) {
    return null;
  }
  const previous = match[0];
  return {
    content: content.slice(0, match.index) + tag + content.slice(match.index + previous.length),
    previous,
  };
}

/**
 * Bring the version in a file to the tag; dry runs leave the file untouched
 */
export async function syncVersionFile(
  tag: string,
  options: VersionFileSyncOptions
): Promise<VersionFileSyncResult> {
  const { path } = options;
  if (!existsSync(path)) {
    return { status: 'missing', path };
  }

  const content = await readFile(path, 'utf-8');
  const replaced = replaceVersion(content, tag, options.pattern);
  if (!replaced) {
    return { status: 'no-match', path };
  }
  if (replaced.content === content) {
    return { status: 'unchanged', path, previous: replaced.previous };
  }
  if (options.dryRun) {
    return { status: 'would-update', path, previous: replaced.previous };
  }

  await writeFile(path, replaced.content, 'utf-8');
  return { status: 'updated', path, previous: replaced.previous };
}
