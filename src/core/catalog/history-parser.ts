import * as cheerio from 'cheerio';
import type { ReleaseRecord, VersionHistory } from '../../types/index.js';
import { HTML_MARKERS, VERSION_PATTERNS } from '../../constants/index.js';
import { RemoteNotFoundError } from '../../utils/errors.js';
import { mapConcurrent } from '../../utils/concurrency.js';
import { logger } from '../../utils/logger.js';
import { createReleaseRecord } from '../compare/release-record.js';

export interface HistoryParseOptions {
  workers: number;
  timeoutMs: number;
  /** Reported when a release block is malformed */
  urls: readonly string[];
}

interface ReleaseBlock {
  text: string;
  flaggedPrerelease: boolean;
}

/**
 * Text of each release block with a space between element boundaries, so
 * tokens in sibling elements never run together.
 */
function readBlocks(html: string): ReleaseBlock[] {
  const $ = cheerio.load(html);
  return $(HTML_MARKERS.RELEASE_BLOCK)
    .toArray()
    .map(element => {
      const block = $(element);
      const text = block
        .find('*')
        .addBack()
        .contents()
        .toArray()
        .filter(node => node.type === 'text')
        .map(node => $(node).text())
        .join(' ')
        .replace(/\s+/g, ' ')
        .trim();
      return { text, flaggedPrerelease: block.find(HTML_MARKERS.PRERELEASE_BADGE).length > 0 };
    });
}

function isPrereleaseBlock(block: ReleaseBlock): boolean {
  return (
    block.flaggedPrerelease ||
    VERSION_PATTERNS.PRERELEASE_SUFFIX.test(block.text) ||
    VERSION_PATTERNS.PRERELEASE_LABEL.test(block.text)
  );
}

/**
 * Parse a release history page into one record per final release, in page
 * order. Blocks without a version token and pre-release blocks are dropped.
 * The date and version of a record always come from the same block.
 */
export async function parseHistory(html: string, options: HistoryParseOptions): Promise<VersionHistory> {
  const blocks = readBlocks(html).filter(block => VERSION_PATTERNS.RELEASE.test(block.text));
  const finals = blocks.filter(block => !isPrereleaseBlock(block));
  logger.debug(`Release blocks: ${blocks.length} with versions, ${blocks.length - finals.length} pre-release`);

  const records = await mapConcurrent(
    finals,
    async (block): Promise<ReleaseRecord> => {
      const date = VERSION_PATTERNS.DATE.exec(block.text);
      const withoutDate = date ? block.text.replace(date[0], ' ') : block.text;
      const version = VERSION_PATTERNS.RELEASE.exec(withoutDate);
      if (!version) {
        throw new RemoteNotFoundError(`Release block has no version: '${block.text}'`, options.urls);
      }
      if (!date) {
        throw new RemoteNotFoundError(`Release ${version[0]} has no release date on the history page.`, options.urls);
      }
      return createReleaseRecord(date[0], version[0]);
    },
    { workers: options.workers, timeoutMs: options.timeoutMs }
  );
  return records;
}
