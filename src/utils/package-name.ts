import { basename } from 'path';
import { PACKAGE_SUFFIXES } from '../constants/index.js';
import type { PackageDirectoryKind } from '../types/index.js';

/**
 * Comparison key for package names: lowercase with every run of `-`, `_`
 * and `.` collapsed to a single underscore.
 */
export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '_');
}

/**
 * Classify a site directory entry. Anything that is neither a descriptor
 * directory nor a single-file module is not a package entry.
 */
export function entryKind(entryName: string): PackageDirectoryKind | null {
  if (entryName.endsWith(PACKAGE_SUFFIXES.DESCRIPTOR)) {
    return 'descriptor';
  }
  if (entryName.endsWith(PACKAGE_SUFFIXES.MODULE)) {
    return 'module';
  }
  return null;
}

/**
 * Package name encoded in an entry: everything before the first `-` for
 * descriptors (`requests-2.25.1.dist-info` → `requests`, `legacy.dist-info` →
 * `legacy`), the stem for
 * modules (`six.py` → `six`).
 */
export function packageNameFromEntry(entryPath: string): string {
  const entryName = basename(entryPath);
  if (entryName.endsWith(PACKAGE_SUFFIXES.MODULE)) {
    return entryName.slice(0, -PACKAGE_SUFFIXES.MODULE.length);
  }
  const stem = entryName.endsWith(PACKAGE_SUFFIXES.DESCRIPTOR)
    ? entryName.slice(0, -PACKAGE_SUFFIXES.DESCRIPTOR.length)
    : entryName;
  return stem.split('-')[0];
}
