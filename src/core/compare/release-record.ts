import type { ReleaseRecord } from '../../types/index.js';
import { formatReleaseDate, parseReleaseDate } from '../../utils/dates.js';

/**
 * Build a record from page tokens. A date string that does not parse
 * becomes a null date.
 */
export function createReleaseRecord(date: Date | string | null, version: string | null): ReleaseRecord {
  const parsed = typeof date === 'string' ? parseReleaseDate(date) : date;
  return { date: parsed, version: version === null ? null : version.trim() || null };
}

export function isReleaseRecord(value: unknown): value is ReleaseRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'date' in value &&
    'version' in value &&
    (value.date === null || value.date instanceof Date) &&
    (value.version === null || typeof value.version === 'string')
  );
}

/** `2.25.1 (Dec 16, 2020)` */
export function formatReleaseRecord(record: ReleaseRecord): string {
  const version = record.version ?? 'unknown version';
  return record.date ? `${version} (${formatReleaseDate(record.date)})` : version;
}

/**
 * JSON-friendly form used by `--json` output: dates as `YYYY-MM-DD`.
 */
export function serializeReleaseRecord(record: ReleaseRecord): { date: string | null; version: string | null } {
  return {
    date: record.date ? record.date.toISOString().slice(0, 10) : null,
    version: record.version
  };
}
