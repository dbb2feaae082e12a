import * as semver from 'semver';
import { ValidationError } from '../../utils/errors.js';

/**
 * A version selector as consumed by the installer: an opaque predicate over
 * versions. The range grammar itself belongs to `semver`.
 */
export interface VersionSelector {
  readonly raw: string;
  test(version: string): boolean;
  toString(): string;
}

export function parseSelector(raw: string): VersionSelector {
  const trimmed = raw.trim() || '*';
  const range = semver.validRange(trimmed);
  if (range === null) {
    throw new ValidationError(`Invalid version selector '${raw}'`);
  }

  return {
    raw: trimmed,
    test(version: string): boolean {
      return semver.satisfies(version, range, { includePrerelease: false });
    },
    toString(): string {
      return trimmed;
    }
  };
}

export function isValidSelector(raw: string): boolean {
  return semver.validRange(raw.trim() || '*') !== null;
}

/**
 * Highest version in `versions` accepted by `selector`, or null.
 */
export function selectVersion(versions: string[], selector: VersionSelector): string | null {
  const candidates = versions.filter(v => semver.valid(v) !== null && selector.test(v));
  if (candidates.length === 0) {
    return null;
  }
  return semver.rsort(candidates)[0];
}
