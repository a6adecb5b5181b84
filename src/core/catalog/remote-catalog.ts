import type { ReleaseRecord, StatisticValue, StatisticsSnapshot, VersionHistory } from '../../types/index.js';
import {
  DEFAULT_ECOSYSTEM,
  MATCH_RATIOS,
  PACKAGE_MANAGERS,
  REMOTE_URLS,
  STATISTIC_KEYS
} from '../../constants/index.js';
import { InvalidArgumentError } from '../../utils/errors.js';
import { bestMatch } from '../../utils/fuzzy.js';
import { logger } from '../../utils/logger.js';
import { MemoCache } from '../../utils/memo.js';
import { initial, latest } from '../compare/comparator.js';
import { defaultFetcher, fetchText, type HttpFetcher } from './http-fetcher.js';
import { parseHistory } from './history-parser.js';
import { parseStatistics } from './statistics-parser.js';

export interface RemoteCatalogOptions {
  fetcher?: HttpFetcher;
  requestTimeoutMs: number;
  longTimeoutMs: number;
  retryDelayMs: number;
  maxWorkers: number;
}

/**
 * Statistics-site ecosystem name for `input`, fuzzily matched against the
 * supported package managers. Unrecognized or missing input means `pypi`.
 */
export function resolveEcosystem(input?: string | null): string {
  if (!input) {
    return DEFAULT_ECOSYSTEM;
  }
  const match = bestMatch(input, PACKAGE_MANAGERS, MATCH_RATIOS.STRICT);
  if (!match) {
    logger.debug(`Unknown ecosystem '${input}', using ${DEFAULT_ECOSYSTEM}`);
    return DEFAULT_ECOSYSTEM;
  }
  return match.toLowerCase();
}

/**
 * Release history and ecosystem statistics of one published package.
 * Each document is fetched at most once per instance.
 */
export class RemoteCatalog {
  readonly ecosystem: string;
  private readonly fetcher: HttpFetcher;
  private readonly history = new MemoCache<'history', VersionHistory>();
  private readonly statistics = new MemoCache<'statistics', StatisticsSnapshot>();

  constructor(readonly packageName: string, private readonly options: RemoteCatalogOptions, ecosystem?: string) {
    if (typeof packageName !== 'string' || packageName.trim() === '') {
      throw new InvalidArgumentError('A package name is required for remote lookups');
    }
    this.packageName = packageName.trim();
    this.ecosystem = resolveEcosystem(ecosystem);
    this.fetcher = options.fetcher ?? defaultFetcher;
  }

  get historyUrl(): string {
    return REMOTE_URLS.HISTORY.replace('{package}', this.packageName);
  }

  /** Project page: the history URL without its fragment */
  get packageUrl(): string {
    return this.historyUrl.replace(/#.*$/, '');
  }

  get statsUrl(): string {
    return REMOTE_URLS.STATISTICS.replace('{ecosystem}', this.ecosystem).replace('{package}', this.packageName);
  }

  private get urls(): readonly string[] {
    return [this.historyUrl, this.statsUrl];
  }

  private fetchDocument(url: string): Promise<string> {
    return fetchText(url, {
      fetcher: this.fetcher,
      requestTimeoutMs: this.options.requestTimeoutMs,
      longTimeoutMs: this.options.longTimeoutMs,
      retryDelayMs: this.options.retryDelayMs,
      urls: this.urls
    });
  }

  fetchHistory(): Promise<VersionHistory> {
    return this.history.get('history', async () => {
      const html = await this.fetchDocument(this.historyUrl);
      const records = await parseHistory(html, {
        workers: this.options.maxWorkers,
        timeoutMs: this.options.longTimeoutMs,
        urls: this.urls
      });
      logger.debug(`Parsed ${records.length} release(s) for ${this.packageName}`);
      return records;
    });
  }

  fetchStatistics(): Promise<StatisticsSnapshot> {
    return this.statistics.get('statistics', async () => parseStatistics(await this.fetchDocument(this.statsUrl)));
  }

  async totalVersions(): Promise<number> {
    return (await this.fetchHistory()).length;
  }

  async initialVersion(): Promise<ReleaseRecord> {
    return initial(await this.fetchHistory());
  }

  async latestVersion(): Promise<ReleaseRecord> {
    return latest(await this.fetchHistory());
  }

  /**
   * One statistic by fuzzy key, or null when the page does not report it.
   */
  async statistic(key: string): Promise<StatisticValue | null> {
    const canonical = bestMatch(key, STATISTIC_KEYS, MATCH_RATIOS.STRICT);
    if (!canonical) {
      throw new InvalidArgumentError(`Unknown statistic '${key}'. Known: ${STATISTIC_KEYS.join(', ')}`, { key });
    }
    const stats = await this.fetchStatistics();
    return stats[canonical] ?? null;
  }
}

/**
 * Hands out one catalog per (package, ecosystem) for a session.
 */
export class CatalogRegistry {
  private readonly catalogs = new Map<string, RemoteCatalog>();

  constructor(private readonly options: RemoteCatalogOptions) {}

  get(packageName: string, ecosystem?: string): RemoteCatalog {
    const resolved = resolveEcosystem(ecosystem);
    const key = `${packageName.trim().toLowerCase()}\u0000${resolved}`;
    let catalog = this.catalogs.get(key);
    if (!catalog) {
      catalog = new RemoteCatalog(packageName, this.options, resolved);
      this.catalogs.set(key, catalog);
    }
    return catalog;
  }
}
