/**
 * Dataset Name Sanitization
 * Layer: Infrastructure (storage)
 *
 * Collection and kind names end up as directory and file names under the
 * data lake root, and some of them arrive straight from a URL
 * (`GET /funds/:collection`). Two gates keep them inside the root:
 *
 *   1. `sanitize()` — an allow-list: starts with a letter or digit, then
 *      letters, digits, space, hyphen, underscore. `..`, `/` and `\` are
 *      rejected outright even before the pattern runs.
 *   2. `resolveWithin()` — the joined path, once resolved, must still be a
 *      descendant of the root.
 *
 * Names are trimmed and lower-cased, so "iShares" and "ishares " are the same
 * dataset. The segment (`_part<N>`) and manifest (`_metadata`) suffixes are
 * reserved: a kind called "listing_part0" would otherwise share a file with
 * segment 0 of "listing".
 */
import path from 'path';

import { InvalidNameError } from '@shared/errors/AppError';
import { MAX_NAME_LENGTH } from '@shared/constants';

const SAFE_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_ -]*$/;
const RESERVED_SUFFIX_PATTERN = /(_part\d+|_metadata)$/;

export function sanitize(name: string): string {
  if (!name) {
    throw new InvalidNameError(name, 'must not be empty');
  }
  if (name.length > MAX_NAME_LENGTH) {
    throw new InvalidNameError(name, `must be at most ${MAX_NAME_LENGTH} characters`);
  }
  if (name.includes('..') || name.includes('/') || name.includes('\\')) {
    throw new InvalidNameError(name, 'must not contain "..", "/" or "\\"');
  }
  if (!SAFE_NAME_PATTERN.test(name)) {
    throw new InvalidNameError(name, 'contains disallowed characters');
  }

  const safe = name.trim().toLowerCase();
  if (RESERVED_SUFFIX_PATTERN.test(safe)) {
    throw new InvalidNameError(name, 'ends with a reserved suffix');
  }
  return safe;
}

/** Joins `segments` onto `root` and refuses any result that escapes it. */
export function resolveWithin(root: string, ...segments: string[]): string {
  const resolvedRoot = path.resolve(root);
  const target = path.resolve(resolvedRoot, ...segments);
  const relative = path.relative(resolvedRoot, target);

  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new InvalidNameError(segments.join('/'), 'resolves outside the data directory');
  }
  return target;
}
