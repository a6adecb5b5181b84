import { basename } from 'path';
import semver from 'semver';
import type { PackageDirectory, PackageRecord, RuntimeVersion } from '../../types/index.js';
import { MIN_VERSION } from '../../constants/index.js';
import { AmbiguousMatchError, InvalidArgumentError, NotFoundError } from '../../utils/errors.js';
import { closestMatch } from '../../utils/fuzzy.js';
import { mapConcurrent } from '../../utils/concurrency.js';
import { logger } from '../../utils/logger.js';
import { MemoCache } from '../../utils/memo.js';
import { coerceVersion, extractVersionToken, versionFromEntryName } from '../../utils/version.js';
import type { EnvironmentDiscovery } from '../discovery/environment-discovery.js';
import type { DescriptorStore } from '../metadata/descriptor-parser.js';

export interface PackageResolverOptions {
  /** Minimum similarity (0-100) for a package-name match */
  packageMatchRatio: number;
  maxWorkers: number;
}

/**
 * Maps user-supplied runtime versions and package names onto what
 * discovery found on disk.
 */
export class PackageResolver {
  private readonly sitePaths = new MemoCache<string, PackageDirectory>();
  private readonly records = new MemoCache<string, PackageRecord>();

  constructor(
    private readonly discovery: EnvironmentDiscovery,
    private readonly descriptors: DescriptorStore,
    private readonly options: PackageResolverOptions
  ) {}

  /**
   * The discovered runtime whose version equals `input` once both are parsed
   * (`3.12` matches `3.12.0`).
   */
  async resolveVersion(input: string): Promise<RuntimeVersion> {
    const wanted = coerceVersion(String(input));
    if (!wanted) {
      throw new InvalidArgumentError(`Not a runtime version: '${input}'`, { input });
    }

    const runtimes = await this.discovery.listRuntimes();
    const runtime = runtimes.find(candidate => semver.eq(candidate.version, wanted));
    if (!runtime) {
      throw new NotFoundError(
        `Runtime version '${input}' is not installed. Installed: ${runtimes.map(r => r.label).join(', ')}`,
        { input, installed: runtimes.map(r => r.label) }
      );
    }
    return runtime;
  }

  private async matchPackage(runtime: RuntimeVersion, name: string): Promise<PackageDirectory> {
    const packages = await this.discovery.packagesFor(runtime);
    const best = closestMatch(name, packages.map(pkg => pkg.name));

    if (!best || best.score < this.options.packageMatchRatio) {
      throw new AmbiguousMatchError(
        `Package '${name}' is not installed for runtime ${runtime.label}.`,
        name,
        best?.candidate ?? null,
        best?.score ?? 0
      );
    }

    const matched = packages.find(pkg => pkg.name === best.candidate);
    if (!matched) {
      throw new NotFoundError(`Package '${name}' is not installed for runtime ${runtime.label}.`, { name });
    }
    if (matched.name.toLowerCase() !== name.toLowerCase()) {
      logger.debug(`Resolved '${name}' to '${matched.name}' (score ${best.score.toFixed(1)})`);
    }
    return matched;
  }

  /**
   * Installed package name closest to `name` for `runtime`.
   */
  async resolvePackage(runtime: RuntimeVersion, name: string): Promise<string> {
    return (await this.getSitePath(runtime, name)).name;
  }

  /**
   * Package directory for `name` in `runtime`. Concurrent callers with the
   * same arguments share one resolution.
   */
  getSitePath(runtime: RuntimeVersion, name: string): Promise<PackageDirectory> {
    if (typeof name !== 'string' || name.trim() === '') {
      return Promise.reject(new InvalidArgumentError('A package name is required'));
    }
    const key = `${runtime.path}\u0000${name.trim().toLowerCase()}`;
    return this.sitePaths.get(key, () => this.matchPackage(runtime, name.trim()));
  }

  async isInstalled(runtime: RuntimeVersion, name: string): Promise<boolean> {
    try {
      await this.getSitePath(runtime, name);
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Version of an installed package: the token in its descriptor directory
   * name, then the descriptor's `Version` field, then `0.0.0`.
   */
  async installedVersionOf(directory: PackageDirectory): Promise<string> {
    if (directory.kind !== 'descriptor') {
      return MIN_VERSION;
    }
    const fromName = versionFromEntryName(basename(directory.path));
    if (fromName !== MIN_VERSION) {
      return fromName;
    }
    const fields = await this.descriptors.read(directory.path);
    const declared = fields.Version;
    if (typeof declared === 'string') {
      return extractVersionToken(declared) ?? MIN_VERSION;
    }
    return MIN_VERSION;
  }

  getRecord(runtime: RuntimeVersion, name: string): Promise<PackageRecord> {
    return this.getSitePath(runtime, name).then(directory =>
      this.records.get(directory.path, async () => ({
        name: directory.name,
        runtime,
        directory,
        installedVersion: await this.installedVersionOf(directory)
      }))
    );
  }

  /**
   * Every package of `runtime` paired with its installed version, in
   * package-name order.
   */
  async installedVersions(runtime: RuntimeVersion): Promise<Array<[string, string]>> {
    const packages = await this.discovery.packagesFor(runtime);
    return mapConcurrent(
      packages,
      async (pkg): Promise<[string, string]> => [pkg.name, await this.installedVersionOf(pkg)],
      { workers: this.options.maxWorkers }
    );
  }
}
