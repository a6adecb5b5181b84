import semver from 'semver';
import type { SemVer } from 'semver';
import { MIN_VERSION, VERSION_PATTERNS } from '../constants/index.js';

/**
 * First `major.minor[.patch]` token in `text`, or null.
 */
export function extractVersionToken(text: string): string | null {
  const match = VERSION_PATTERNS.RELEASE.exec(text);
  return match ? match[0] : null;
}

/**
 * Version token of a descriptor entry name such as `requests-2.25.1.dist-info`,
 * falling back to `0.0.0` when the name carries none.
 */
export function versionFromEntryName(entryName: string): string {
  const separator = entryName.indexOf('-');
  const tail = separator === -1 ? '' : entryName.slice(separator + 1);
  return extractVersionToken(tail) ?? MIN_VERSION;
}

export function coerceVersion(text: string): SemVer | null {
  return semver.coerce(text);
}

/** A bare release token like `2.25` or `2.25.1` */
export function isVersionLike(text: string): boolean {
  return /^\d+\.\d+(\.\d+)?$/.test(text.trim());
}

/**
 * Order two version strings. Both sides are coerced to semver; strings that
 * cannot be coerced sort after those that can, and among themselves
 * lexically.
 */
export function compareVersionStrings(a: string, b: string): number {
  const left = coerceVersion(a);
  const right = coerceVersion(b);
  if (left && right) {
    const byVersion = semver.compare(left, right);
    if (byVersion !== 0) {
      return byVersion;
    }
    // 2.0 and 2.0.0 coerce alike; keep the order total
    return a.length - b.length;
  }
  if (left) {
    return -1;
  }
  if (right) {
    return 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Two version strings name the same release once coerced (`2.0` equals `2.0.0`).
 */
export function sameVersion(a: string, b: string): boolean {
  const left = coerceVersion(a);
  const right = coerceVersion(b);
  if (left && right) {
    return semver.eq(left, right);
  }
  return a === b;
}
