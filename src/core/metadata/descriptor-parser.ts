import { join } from 'path';
import type { DescriptorFields, DescriptorValue } from '../../types/index.js';
import { FILE_PATTERNS, METADATA_FIELDS, MULTI_VALUED_FIELDS } from '../../constants/index.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { MemoCache } from '../../utils/memo.js';

const HEADER_LINE = /^([A-Za-z][A-Za-z0-9-]*):[ \t]?(.*)$/;
const CONTINUATION_LINE = /^[ \t]/;

const HEADER_FIELDS: ReadonlySet<string> = new Set(
  METADATA_FIELDS.filter(field => /^[A-Z]/.test(field))
);

function isMultiValued(field: string): boolean {
  return MULTI_VALUED_FIELDS.some(name => name === field);
}

/**
 * Parse the header block of a descriptor `METADATA` document.
 *
 * Only fields of the known header vocabulary are kept; a repeated
 * single-valued field keeps its last value. `Classifier` and `Platform`
 * collect every value: with more than one distinct value they appear as a
 * sorted list under `Classifiers` / `Platforms`, with exactly one as the
 * plain singular field.
 */
export function parseDescriptor(text: string): DescriptorFields {
  const single = new Map<string, string>();
  const multi = new Map<string, Set<string>>();
  let current: { field: string; value: string } | null = null;

  const commit = (): void => {
    if (!current) {
      return;
    }
    const { field, value } = current;
    if (isMultiValued(field)) {
      const values = multi.get(field) ?? new Set<string>();
      values.add(value);
      multi.set(field, values);
    } else {
      single.set(field, value);
    }
    current = null;
  };

  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === '') {
      // The body (long description) follows the first blank line
      break;
    }
    if (CONTINUATION_LINE.test(line)) {
      if (current) {
        current.value = `${current.value}\n${line.trim()}`;
      }
      continue;
    }
    commit();
    const match = HEADER_LINE.exec(line);
    if (match && HEADER_FIELDS.has(match[1])) {
      current = { field: match[1], value: match[2].trim() };
    }
  }
  commit();

  const fields: Record<string, DescriptorValue> = Object.fromEntries(single);
  for (const [field, values] of multi) {
    const sorted = [...values].sort();
    if (sorted.length > 1) {
      fields[`${field}s`] = sorted;
    } else if (sorted.length === 1) {
      fields[field] = sorted[0];
    }
  }
  return fields;
}

/**
 * Reads and caches the parsed `METADATA` of descriptor directories, one
 * parse per directory for the lifetime of the store.
 */
export class DescriptorStore {
  private readonly cache = new MemoCache<string, DescriptorFields>();

  read(descriptorDir: string): Promise<DescriptorFields> {
    return this.cache.get(descriptorDir, async () => {
      const metadataPath = join(descriptorDir, FILE_PATTERNS.METADATA);
      if (!(await exists(metadataPath))) {
        logger.debug(`No ${FILE_PATTERNS.METADATA} in ${descriptorDir}`);
        return {};
      }
      return parseDescriptor(await readTextFile(metadataPath));
    });
  }
}
