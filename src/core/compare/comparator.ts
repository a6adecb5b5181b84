import type { ByteSize, InspectValue, ReleaseRecord, VersionHistory } from '../../types/index.js';
import { InvalidArgumentError, NotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { compareVersionStrings, isVersionLike, sameVersion } from '../../utils/version.js';
import { isReleaseRecord } from './release-record.js';

export enum CompareOp {
  EQ = '==',
  NE = '!=',
  GT = '>',
  GE = '>=',
  LT = '<',
  LE = '<='
}

const OP_ALIASES = new Map<string, CompareOp>([
  ['==', CompareOp.EQ],
  ['=', CompareOp.EQ],
  ['eq', CompareOp.EQ],
  ['!=', CompareOp.NE],
  ['ne', CompareOp.NE],
  ['>', CompareOp.GT],
  ['gt', CompareOp.GT],
  ['>=', CompareOp.GE],
  ['ge', CompareOp.GE],
  ['<', CompareOp.LT],
  ['lt', CompareOp.LT],
  ['<=', CompareOp.LE],
  ['le', CompareOp.LE]
]);

/**
 * Accepts the operator symbols or their two-letter names (`eq`, `ne`, `gt`,
 * `ge`, `lt`, `le`), case-insensitively.
 */
export function parseCompareOp(input: string): CompareOp {
  const op = OP_ALIASES.get(input.trim().toLowerCase());
  if (!op) {
    throw new InvalidArgumentError(
      `Unknown comparison operator '${input}'. Expected one of: ${Object.values(CompareOp).join(', ')}`,
      { input }
    );
  }
  return op;
}

/**
 * Apply `op` to the sign of an ordering result.
 */
export function applyOp(order: number, op: CompareOp): boolean {
  switch (op) {
    case CompareOp.EQ:
      return order === 0;
    case CompareOp.NE:
      return order !== 0;
    case CompareOp.GT:
      return order > 0;
    case CompareOp.GE:
      return order >= 0;
    case CompareOp.LT:
      return order < 0;
    case CompareOp.LE:
      return order <= 0;
  }
}

function sign(n: number): number {
  return n > 0 ? 1 : n < 0 ? -1 : 0;
}

function orderDates(a: Date, b: Date): number {
  return sign(a.getTime() - b.getTime());
}

/**
 * Total order over release records: release date first, version on equal
 * dates. A record missing one component is compared on the other alone.
 */
export function compareRecords(a: ReleaseRecord, b: ReleaseRecord): number {
  const bothVersions = a.version !== null && b.version !== null;

  if (a.date !== null && b.date !== null) {
    const byDate = orderDates(a.date, b.date);
    if (byDate !== 0 || !bothVersions) {
      return byDate;
    }
  }
  if (a.version !== null && b.version !== null) {
    return sign(compareVersionStrings(a.version, b.version));
  }
  throw new InvalidArgumentError('Release records share no comparable component', { a, b });
}

export function compare(a: ReleaseRecord, b: ReleaseRecord, op: CompareOp): boolean {
  return applyOp(compareRecords(a, b), op);
}

export function compareVersions(a: string, b: string, op: CompareOp): boolean {
  return applyOp(sign(compareVersionStrings(a, b)), op);
}

export function compareDates(a: Date, b: Date, op: CompareOp): boolean {
  return applyOp(orderDates(a, b), op);
}

function extreme(history: VersionHistory, pick: (order: number) => boolean): ReleaseRecord {
  if (history.length === 0) {
    throw new NotFoundError('Version history is empty');
  }
  return history.reduce((best, record) => (pick(compareRecords(record, best)) ? record : best));
}

/** Newest record; the first of equals wins */
export function latest(history: VersionHistory): ReleaseRecord {
  return extreme(history, order => order > 0);
}

/** Oldest record; the first of equals wins */
export function initial(history: VersionHistory): ReleaseRecord {
  return extreme(history, order => order < 0);
}

export function isLatest(history: VersionHistory, version: string): boolean {
  const newest = latest(history).version;
  return newest !== null && sameVersion(newest, version);
}

export interface UpdateOptions {
  includePrereleases?: boolean;
}

/**
 * Distinct versions released after `current`, oldest first, or null when
 * `current` is already the newest.
 */
export function updatesAfter(
  history: VersionHistory,
  current: string,
  options: UpdateOptions = {}
): string[] | null {
  if (options.includePrereleases) {
    throw new InvalidArgumentError('Listing pre-release updates is not supported');
  }

  const versions = history
    .map(record => record.version)
    .filter((version): version is string => version !== null)
    .sort(compareVersionStrings);

  const wanted = current.trim();
  const position = versions.lastIndexOf(wanted);
  if (position === -1) {
    throw new NotFoundError(`Version '${current}' does not appear in the release history`, { current });
  }

  const pending = [...new Set(versions.slice(position + 1))];
  if (pending.length === 0) {
    logger.info(`No updates available after ${wanted}`);
    return null;
  }
  return pending;
}

function isByteSize(value: InspectValue): value is ByteSize {
  return typeof value === 'object' && value !== null && 'bytesSize' in value;
}

function orderValues(a: InspectValue, b: InspectValue): number {
  if (a === null || b === null) {
    if (a === b) {
      return 0;
    }
    throw new InvalidArgumentError('Cannot compare a missing value with a present one', { a, b });
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return sign(a - b);
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return sign(Number(a) - Number(b));
  }
  if (typeof a === 'string' && typeof b === 'string') {
    if (isVersionLike(a) && isVersionLike(b)) {
      return sign(compareVersionStrings(a.trim(), b.trim()));
    }
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return sign(a.length - b.length);
  }
  if (isReleaseRecord(a) && isReleaseRecord(b)) {
    return compareRecords(a, b);
  }
  if (isByteSize(a) && isByteSize(b)) {
    return sign(a.bytesSize - b.bytesSize);
  }
  if (typeof a === 'object' && typeof b === 'object' && !Array.isArray(a) && !Array.isArray(b)) {
    return sign(Object.keys(a).length - Object.keys(b).length);
  }
  throw new InvalidArgumentError(`Cannot compare a ${typeof a} with a ${typeof b}`, { a, b });
}

/**
 * Compare two inspected field values: numbers numerically, version-like
 * strings as versions, other strings lexically, lists and maps by size.
 */
export function compareValues(a: InspectValue, b: InspectValue, op: CompareOp): boolean {
  return applyOp(orderValues(a, b), op);
}
