/**
 * Version normalization
 *
 * Only shape is checked: there is no ordering or history, so a run cannot
 * tell whether a version goes backwards.
 */

import { VERSION_PREFIX, VERSION_BODY_PATTERN, type VersionTag } from './types.js';
import { InvalidVersionFormatError } from './errors.js';

/**
 * Normalize user input into a canonical tag
 *
 * @example
 * normalizeVersion('1.2.3').tag  // 'v1.2.3'
 * normalizeVersion('v1.2.3').tag // 'v1.2.3'
 *
 * @throws InvalidVersionFormatError if the body is not dotted-numeric
 */
export function normalizeVersion(input: string): VersionTag {
  const trimmed = input.trim();
  const body = trimmed.startsWith(VERSION_PREFIX)
    ? trimmed.slice(VERSION_PREFIX.length)
    : trimmed;

  if (!VERSION_BODY_PATTERN.test(body)) {
    throw new InvalidVersionFormatError(input);
  }

  return Object.freeze({ tag: `${VERSION_PREFIX}${body}`, body });
}

export function isValidVersion(input: string): boolean {
  try {
    normalizeVersion(input);
    return true;
  } catch {
    return false;
  }
}

export function versionEquals(a: VersionTag, b: VersionTag): boolean {
  return a.tag === b.tag;
}
