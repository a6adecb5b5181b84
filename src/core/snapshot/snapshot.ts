import type { InspectValue } from '../../types/index.js';
import { MATCH_RATIOS } from '../../constants/index.js';
import { InvalidArgumentError } from '../../utils/errors.js';
import { closestMatch } from '../../utils/fuzzy.js';
import { SESSION_FIELDS, type SessionField } from '../metadata/field-vocabulary.js';

export const SNAPSHOT_OPTIONS = ['all', ...SESSION_FIELDS] as const;

export type SnapshotOption = (typeof SNAPSHOT_OPTIONS)[number];

export interface Snapshot {
  readonly option: SnapshotOption;
  /** ISO-8601 time the snapshot was taken */
  readonly takenAt: string;
  readonly data: Readonly<Record<string, InspectValue>>;
}

/**
 * Options must be spelled exactly; a near miss is reported with the
 * closest valid option.
 */
export function validateSnapshotOption(option: string): SnapshotOption {
  const exact = SNAPSHOT_OPTIONS.find(candidate => candidate === option);
  if (exact) {
    return exact;
  }

  const closest = closestMatch(option, SNAPSHOT_OPTIONS);
  const suggestion = closest && closest.score >= MATCH_RATIOS.DEFAULT ? closest.candidate : null;
  const hint = suggestion ? ` Did you mean '${suggestion}'?` : ` Valid options: ${SNAPSHOT_OPTIONS.join(', ')}`;
  throw new InvalidArgumentError(`'${option}' is not a valid snapshot option.${hint}`, { option, suggestion });
}

/**
 * Collect the session listings named by `option` (every listing for `all`).
 */
export async function takeSnapshot(
  option: string,
  read: (field: SessionField) => Promise<InspectValue>,
  now: () => Date = () => new Date()
): Promise<Snapshot> {
  const valid = validateSnapshotOption(option);
  const fields: readonly SessionField[] = valid === 'all' ? SESSION_FIELDS : [valid];

  const data: Record<string, InspectValue> = {};
  for (const field of fields) {
    data[field] = await read(field);
  }
  return { option: valid, takenAt: now().toISOString(), data };
}
