import { join } from 'path';
import semver from 'semver';
import type { PackageDirectory, RuntimeVersion, SiteDirectory } from '../../types/index.js';
import { VERSION_PATTERNS } from '../../constants/index.js';
import { findDirectoriesNamed, isDirectory, listDirectories, listEntries } from '../../utils/fs.js';
import { DiscoveryError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { MemoCache } from '../../utils/memo.js';
import { entryKind, normalizePackageName, packageNameFromEntry } from '../../utils/package-name.js';
import { coerceVersion } from '../../utils/version.js';

export interface EnvironmentDiscoveryOptions {
  runtimeRoot: string;
  siteDirectory: string;
  ignorePatterns: readonly string[];
}

/**
 * Finds installed runtimes below a root directory and the package entries
 * inside each runtime's site directories.
 *
 * Runtime lists, site directories and per-runtime package lists are memoized
 * for the lifetime of the instance.
 */
export class EnvironmentDiscovery {
  private readonly runtimes = new MemoCache<string, RuntimeVersion[]>();
  private readonly siteDirs = new MemoCache<string, string[]>();
  private readonly packages = new MemoCache<string, PackageDirectory[]>();
  private readonly ignore: RegExp[];

  constructor(private readonly options: EnvironmentDiscoveryOptions) {
    this.ignore = options.ignorePatterns.map(pattern => new RegExp(pattern, 'i'));
  }

  get runtimeRoot(): string {
    return this.options.runtimeRoot;
  }

  /**
   * Installed runtimes, ascending by version. One runtime per version label;
   * when two directories carry the same label the first in name order wins.
   */
  listRuntimes(): Promise<RuntimeVersion[]> {
    return this.runtimes.get(this.options.runtimeRoot, () => this.scanRuntimes());
  }

  private async scanRuntimes(): Promise<RuntimeVersion[]> {
    const root = this.options.runtimeRoot;
    if (!(await isDirectory(root))) {
      throw new DiscoveryError(`Runtime root is not a readable directory: ${root}`, { root });
    }

    let names: string[];
    try {
      names = await listDirectories(root);
    } catch (error) {
      throw new DiscoveryError(`Failed to read runtime root: ${root}`, { root, error });
    }

    const byLabel = new Map<string, RuntimeVersion>();
    for (const name of names) {
      const match = VERSION_PATTERNS.RUNTIME.exec(name);
      const version = match ? coerceVersion(match[0]) : null;
      if (!match || !version || byLabel.has(match[0])) {
        continue;
      }
      byLabel.set(match[0], { label: match[0], version, path: join(root, name) });
    }

    if (byLabel.size === 0) {
      throw new DiscoveryError(`No runtime directories found under ${root}`, { root });
    }

    const found = [...byLabel.values()].sort((a, b) => semver.compare(a.version, b.version));
    logger.debug(`Discovered ${found.length} runtime(s)`, { runtimes: found.map(r => r.label) });
    return found;
  }

  /**
   * Site directories nested anywhere below the runtime's directory.
   */
  siteDirectoriesFor(runtime: RuntimeVersion): Promise<string[]> {
    return this.siteDirs.get(runtime.path, async () => {
      const found: string[] = [];
      for await (const dir of findDirectoriesNamed(runtime.path, this.options.siteDirectory)) {
        found.push(dir);
      }
      return found;
    });
  }

  /** Site directories of every runtime, in ascending runtime order */
  async sitePackageDirs(): Promise<SiteDirectory[]> {
    const runtimes = await this.listRuntimes();
    const result: SiteDirectory[] = [];
    for (const runtime of runtimes) {
      for (const path of await this.siteDirectoriesFor(runtime)) {
        result.push({ runtime, path });
      }
    }
    return result;
  }

  private isIgnored(entryName: string): boolean {
    return this.ignore.some(pattern => pattern.test(entryName));
  }

  /**
   * Lazily yield every package entry of `runtime`, in site-directory then
   * entry-name order. Not deduplicated and not memoized.
   */
  async *walkPackages(runtime: RuntimeVersion): AsyncGenerator<PackageDirectory> {
    for (const siteDir of await this.siteDirectoriesFor(runtime)) {
      let entries: string[];
      try {
        entries = await listEntries(siteDir);
      } catch (error) {
        logger.debug(`Skipping unreadable site directory: ${siteDir}`, { error });
        continue;
      }

      for (const entryName of entries) {
        const kind = entryKind(entryName);
        if (kind === null || this.isIgnored(entryName)) {
          continue;
        }
        const name = packageNameFromEntry(entryName);
        if (!name) {
          continue;
        }
        yield { name, normalizedName: normalizePackageName(name), path: join(siteDir, entryName), kind, runtime };
      }
    }
  }

  /**
   * Every package of `runtime`, one per normalized name, sorted by name.
   * A descriptor directory supersedes a single-file module of the same name.
   */
  packagesFor(runtime: RuntimeVersion): Promise<PackageDirectory[]> {
    return this.packages.get(runtime.path, async () => {
      const byName = new Map<string, PackageDirectory>();
      for await (const entry of this.walkPackages(runtime)) {
        const existing = byName.get(entry.normalizedName);
        if (!existing || (existing.kind === 'module' && entry.kind === 'descriptor')) {
          byName.set(entry.normalizedName, entry);
        }
      }
      return [...byName.values()].sort((a, b) =>
        a.normalizedName < b.normalizedName ? -1 : a.normalizedName > b.normalizedName ? 1 : 0
      );
    });
  }
}
