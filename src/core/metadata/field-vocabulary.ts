import { METADATA_FIELDS, MULTI_VALUED_FIELDS, STATISTIC_KEYS } from '../../constants/index.js';
import { search } from 'fast-fuzzy';
import { similarity } from '../../utils/fuzzy.js';

/**
 * Which part of the system answers a field.
 *
 * - `package`: resolver facts about the bound package
 * - `runtime`: facts about the bound runtime
 * - `session`: discovery-wide listings, no package needed
 * - `remote`: release history and statistics pages
 * - `derived`: read from the package's importable module
 * - `descriptor`: read from the package's descriptor files
 */
export type FieldGroup = 'package' | 'runtime' | 'session' | 'remote' | 'derived' | 'descriptor';

export interface FieldEntry {
  readonly group: FieldGroup;
  readonly fields: readonly string[];
}

export const SESSION_FIELDS = [
  'installed_runtimes',
  'runtime_paths',
  'site_packages',
  'package_paths',
  'package_versions'
] as const;

export type SessionField = (typeof SESSION_FIELDS)[number];

export const REMOTE_FIELDS = [
  'version_history',
  'initial_version',
  'latest_version',
  'total_versions',
  'package_url',
  'stats_url',
  'ecosystem_stats'
] as const;

export const DERIVED_FIELDS = ['documentation', 'source_file', 'source_code'] as const;

/**
 * Dispatch table. A query resolves to the field with the highest similarity
 * across every entry; on equal scores the earlier entry wins.
 */
export const FIELD_TABLE: readonly FieldEntry[] = [
  {
    group: 'package',
    fields: ['installed_version', 'is_installed', 'is_latest', 'available_updates', 'site_path']
  },
  { group: 'runtime', fields: ['version_packages'] },
  { group: 'session', fields: SESSION_FIELDS },
  { group: 'remote', fields: [...REMOTE_FIELDS, ...STATISTIC_KEYS] },
  { group: 'derived', fields: DERIVED_FIELDS },
  {
    group: 'descriptor',
    fields: [
      'short_metadata',
      'short_license',
      ...METADATA_FIELDS,
      ...MULTI_VALUED_FIELDS.map(field => `${field}s`)
    ]
  }
];

export interface ResolvedField {
  readonly field: string;
  readonly group: FieldGroup;
  readonly score: number;
}

/**
 * Every recognized field name, sorted and without duplicates.
 */
export function fieldNames(): string[] {
  return [...new Set(FIELD_TABLE.flatMap(entry => entry.fields))].sort();
}

/**
 * Field names loosely matching a search term, best match first. Unlike
 * `resolveField` this is for browsing: substrings and typos both match.
 */
export function searchFields(term: string, threshold = 0.6): string[] {
  const names = fieldNames();
  if (term.trim() === '') {
    return names;
  }
  return search(term, names, { threshold, ignoreCase: true });
}

/**
 * Canonical field for `query`, or null when no field reaches `minRatio`.
 */
export function resolveField(query: string, minRatio: number): ResolvedField | null {
  let best: ResolvedField | null = null;
  for (const entry of FIELD_TABLE) {
    for (const field of entry.fields) {
      const score = similarity(query, field);
      if (best === null || score > best.score) {
        best = { field, group: entry.group, score };
      }
    }
  }
  return best !== null && best.score >= minRatio ? best : null;
}

export function isSessionField(field: string): field is SessionField {
  return SESSION_FIELDS.some(name => name === field);
}
