import { basename } from 'path';
import type { InspectValue, PackageDirectory } from '../../types/index.js';
import { readTextFile, walkFiles } from '../../utils/fs.js';
import { bestMatch } from '../../utils/fuzzy.js';
import { logger } from '../../utils/logger.js';
import type { DescriptorStore } from './descriptor-parser.js';
import { DERIVED_FIELDS } from './field-vocabulary.js';
import { extractDocstring, locateModuleSource } from './module-introspection.js';

export type DerivedField = (typeof DERIVED_FIELDS)[number];

export function isDerivedField(field: string): field is DerivedField {
  return DERIVED_FIELDS.some(name => name === field);
}

/**
 * Answers local metadata fields of one installed package from its
 * descriptor directory and its importable module.
 */
export class MetadataExtractor {
  constructor(
    private readonly descriptors: DescriptorStore,
    private readonly matchRatio: number
  ) {}

  /**
   * `documentation`, `source_file` or `source_code` of the package's module.
   * Null when no module source is found.
   */
  async derived(directory: PackageDirectory, field: DerivedField): Promise<string | null> {
    const sourcePath = await locateModuleSource(directory);
    if (!sourcePath) {
      logger.debug(`No module source found for ${directory.name}`);
      return null;
    }
    if (field === 'source_file') {
      return sourcePath;
    }
    const source = await readTextFile(sourcePath);
    return field === 'source_code' ? source : extractDocstring(source);
  }

  /**
   * First file in the descriptor directory (recursive, name order) whose
   * name contains `needle`, case-insensitively.
   */
  private async findFile(directory: PackageDirectory, needle: string): Promise<string | null> {
    const wanted = needle.toLowerCase();
    for await (const file of walkFiles(directory.path)) {
      if (basename(file).toLowerCase().includes(wanted)) {
        return file;
      }
    }
    return null;
  }

  /**
   * Descriptor lookup. A matching file's text wins; otherwise the field is
   * read from the parsed `METADATA` header. `field` is the canonical field
   * name, null when the query matched none, in which case the raw query is
   * used for the file search.
   */
  async descriptor(directory: PackageDirectory, field: string | null, query: string): Promise<InspectValue> {
    if (directory.kind !== 'descriptor') {
      return null;
    }

    const needle = field ?? query;
    if (needle !== '' && field !== 'short_metadata' && field !== 'short_license') {
      const file = await this.findFile(directory, needle);
      if (file) {
        return readTextFile(file);
      }
    }
    if (field === null) {
      return null;
    }

    const fields = await this.descriptors.read(directory.path);
    if (field === 'short_metadata') {
      return fields;
    }
    if (field === 'short_license') {
      return fields.License ?? null;
    }
    const key = bestMatch(field, Object.keys(fields), this.matchRatio);
    return key === null ? null : fields[key];
  }
}
