import type { ByteSize } from '../types/index.js';
import { formatReleaseRecord, isReleaseRecord, serializeReleaseRecord } from '../core/compare/release-record.js';

/**
 * Formatting utilities for consistent display across commands
 */

function isByteSize(value: unknown): value is ByteSize {
  return (
    typeof value === 'object' &&
    value !== null &&
    'symbolic' in value &&
    'bytesSize' in value &&
    typeof value.symbolic === 'string'
  );
}

function isPair(value: unknown): value is readonly [unknown, unknown] {
  return Array.isArray(value) && value.length === 2 && value.every(item => typeof item === 'string');
}

/**
 * Single-line rendering of a list item or map value. Two-string tuples
 * (name and version, label and path) are shown side by side.
 */
export function formatScalar(value: unknown): string {
  if (value === null || value === undefined) {
    return '(none)';
  }
  if (isReleaseRecord(value)) {
    return formatReleaseRecord(value);
  }
  if (isByteSize(value)) {
    return value.symbolic;
  }
  if (isPair(value)) {
    return `${String(value[0])}  ${String(value[1])}`;
  }
  if (typeof value === 'object') {
    return JSON.stringify(toJsonValue(value));
  }
  return String(value);
}

/**
 * Human-readable lines for an inspected value. Lists get one item per line,
 * maps one `key: value` per line, with nested lists indented below the key.
 *
 * @example
 * formatValue(['3.11', '3.12']) // => ['3.11', '3.12']
 * formatValue({ License: 'MIT' }) // => ['License: MIT']
 */
export function formatValue(value: unknown, indent = ''): string[] {
  if (Array.isArray(value)) {
    return value.length === 0 ? [`${indent}(empty)`] : value.map(item => `${indent}${formatScalar(item)}`);
  }

  if (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !isReleaseRecord(value) &&
    !isByteSize(value)
  ) {
    const lines: string[] = [];
    for (const [key, item] of Object.entries(value)) {
      if (Array.isArray(item)) {
        lines.push(`${indent}${key}:`);
        lines.push(...formatValue(item, `${indent}  `));
      } else {
        lines.push(`${indent}${key}: ${formatScalar(item)}`);
      }
    }
    return lines.length === 0 ? [`${indent}(empty)`] : lines;
  }

  return [`${indent}${formatScalar(value)}`];
}

/**
 * Plain JSON-ready form of an inspected value: release dates become
 * `YYYY-MM-DD` strings, everything else is copied through.
 */
export function toJsonValue(value: unknown): unknown {
  if (isReleaseRecord(value)) {
    return serializeReleaseRecord(value);
  }
  if (Array.isArray(value)) {
    return value.map(item => toJsonValue(item));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toJsonValue(item)]));
  }
  return value;
}
