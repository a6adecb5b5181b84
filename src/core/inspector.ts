import type {
  InspectValue,
  PackageRecord,
  PackageVersionPair,
  ResolvedConfig,
  RuntimeVersion
} from '../types/index.js';
import { STATISTIC_KEYS } from '../constants/index.js';
import { InvalidArgumentError, NotFoundError, PreconditionFailedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { CatalogRegistry } from './catalog/remote-catalog.js';
import type { HttpFetcher } from './catalog/http-fetcher.js';
import { compareValues, isLatest, parseCompareOp, updatesAfter } from './compare/comparator.js';
import { EnvironmentDiscovery } from './discovery/environment-discovery.js';
import { remoteField } from './inspect/remote-fields.js';
import { sessionField } from './inspect/session-fields.js';
import { DescriptorStore } from './metadata/descriptor-parser.js';
import {
  fieldNames,
  isSessionField,
  REMOTE_FIELDS,
  resolveField,
  type ResolvedField
} from './metadata/field-vocabulary.js';
import { isDerivedField, MetadataExtractor } from './metadata/metadata-extractor.js';
import { PackageResolver } from './resolver/package-resolver.js';
import { takeSnapshot, type Snapshot } from './snapshot/snapshot.js';

export interface PkgInspectorOptions {
  /** Replaces the network fetcher, e.g. with an in-process fake */
  fetcher?: HttpFetcher;
}

/**
 * What a field query is asked about. Session fields need neither part;
 * package fields need both.
 */
export interface InspectTarget {
  readonly runtime: RuntimeVersion | null;
  readonly packageName: string | null;
}

export interface RuntimeComparison {
  readonly packageName: string;
  readonly field: string;
  readonly runtimes: readonly [string, string];
  readonly values: readonly [InspectValue, InspectValue];
  /** Outcome of the requested operator, null when none was given */
  readonly result: boolean | null;
}

export interface UpdateQueryOptions {
  includeBetas?: boolean;
}

/**
 * Inspection session: owns discovery, resolution and remote catalogs, and
 * answers field queries against them. Everything fetched or parsed is cached
 * for the lifetime of the instance.
 */
export class PkgInspector {
  readonly discovery: EnvironmentDiscovery;
  readonly resolver: PackageResolver;
  readonly catalogs: CatalogRegistry;
  private readonly extractor: MetadataExtractor;

  constructor(readonly config: ResolvedConfig, options: PkgInspectorOptions = {}) {
    const descriptors = new DescriptorStore();
    this.discovery = new EnvironmentDiscovery({
      runtimeRoot: config.runtimeRoot,
      siteDirectory: config.siteDirectory,
      ignorePatterns: config.ignorePatterns
    });
    this.resolver = new PackageResolver(this.discovery, descriptors, {
      packageMatchRatio: config.packageMatchRatio,
      maxWorkers: config.maxWorkers
    });
    this.catalogs = new CatalogRegistry({
      fetcher: options.fetcher,
      requestTimeoutMs: config.requestTimeoutMs,
      longTimeoutMs: config.longTimeoutMs,
      retryDelayMs: config.retryDelayMs,
      maxWorkers: config.maxWorkers
    });
    this.extractor = new MetadataExtractor(descriptors, config.matchRatio);
  }

  /** Installed runtime labels, ascending */
  async listRuntimes(): Promise<string[]> {
    return (await this.discovery.listRuntimes()).map(runtime => runtime.label);
  }

  fieldNames(): string[] {
    return fieldNames();
  }

  /**
   * Answer `field` for `packageName` installed under `runtime`.
   */
  async inspect(packageName: string, runtime: string, field: unknown): Promise<InspectValue> {
    const resolvedRuntime = await this.resolver.resolveVersion(runtime);
    return this.inspectTarget(field, { runtime: resolvedRuntime, packageName });
  }

  /**
   * Answer a remote field for any published package, installed or not.
   */
  async inspectRemote(packageName: string, field: unknown, ecosystem?: string): Promise<InspectValue> {
    const query = this.requireQuery(field);
    const remoteNames: readonly string[] = [...REMOTE_FIELDS, ...STATISTIC_KEYS];
    if (query === '') {
      return [...remoteNames].sort();
    }
    const resolved = resolveField(query, this.config.matchRatio);
    if (!resolved || resolved.group !== 'remote') {
      throw new InvalidArgumentError(`'${query}' is not a remote field. Remote fields: ${remoteNames.join(', ')}`, {
        field: query
      });
    }
    return remoteField(resolved.field, this.catalogs.get(packageName, ecosystem ?? this.config.ecosystem));
  }

  /**
   * Every package installed under `runtime` with its version.
   */
  async getVersionPackages(runtime: string): Promise<PackageVersionPair[]> {
    return this.resolver.installedVersions(await this.resolver.resolveVersion(runtime));
  }

  private requireQuery(field: unknown): string {
    if (typeof field !== 'string') {
      throw new InvalidArgumentError(`Field must be a string, got ${field === null ? 'null' : typeof field}`);
    }
    return field.trim();
  }

  private async requireRecord(target: InspectTarget, field: string): Promise<PackageRecord> {
    if (!target.runtime || !target.packageName) {
      throw new PreconditionFailedError(`Field '${field}' needs a package and a runtime version`, { field });
    }
    return this.resolver.getRecord(target.runtime, target.packageName);
  }

  /**
   * Resolve `field` against the vocabulary and dispatch it to the component
   * that owns it.
   */
  async inspectTarget(field: unknown, target: InspectTarget): Promise<InspectValue> {
    const query = this.requireQuery(field);
    if (query === '') {
      return this.fieldNames();
    }

    const resolved = resolveField(query, this.config.matchRatio);
    if (!resolved) {
      // Unknown names may still match a descriptor file
      const record = await this.requireRecord(target, query);
      return this.extractor.descriptor(record.directory, null, query);
    }
    logger.debug(`Field '${query}' resolved to '${resolved.field}' (${resolved.group})`);
    return this.dispatch(resolved, query, target);
  }

  private async dispatch(resolved: ResolvedField, query: string, target: InspectTarget): Promise<InspectValue> {
    const { field } = resolved;

    switch (resolved.group) {
      case 'session':
        if (!isSessionField(field)) {
          break;
        }
        return sessionField(field, this.discovery, this.resolver);

      case 'runtime':
        if (!target.runtime) {
          throw new PreconditionFailedError(`Field '${field}' needs a runtime version`, { field });
        }
        return this.resolver.installedVersions(target.runtime);

      case 'package':
        return this.packageField(field, target);

      case 'remote': {
        const record = await this.requireRecord(target, field);
        return remoteField(field, this.catalogs.get(record.name, this.config.ecosystem));
      }

      case 'derived': {
        if (!isDerivedField(field)) {
          break;
        }
        const record = await this.requireRecord(target, field);
        return this.extractor.derived(record.directory, field);
      }

      case 'descriptor': {
        const record = await this.requireRecord(target, field);
        return this.extractor.descriptor(record.directory, field, query);
      }
    }
    throw new InvalidArgumentError(`Field '${field}' has no handler`, { field });
  }

  private async packageField(field: string, target: InspectTarget): Promise<InspectValue> {
    if (field === 'is_installed') {
      if (!target.runtime || !target.packageName) {
        throw new PreconditionFailedError(`Field '${field}' needs a package and a runtime version`, { field });
      }
      return this.resolver.isInstalled(target.runtime, target.packageName);
    }

    const record = await this.requireRecord(target, field);
    switch (field) {
      case 'installed_version':
        return record.installedVersion;
      case 'site_path':
        return record.directory.path;
      case 'is_latest': {
        const history = await this.catalogs.get(record.name, this.config.ecosystem).fetchHistory();
        return isLatest(history, record.installedVersion);
      }
      case 'available_updates': {
        const history = await this.catalogs.get(record.name, this.config.ecosystem).fetchHistory();
        return updatesAfter(history, record.installedVersion);
      }
      default:
        throw new InvalidArgumentError(`Field '${field}' has no handler`, { field });
    }
  }

  /**
   * Inspect the same field of one package under two runtimes and optionally
   * compare the values.
   */
  async compareAcrossRuntimes(
    packageName: string,
    runtimeA: string,
    runtimeB: string,
    field: string,
    op?: string
  ): Promise<RuntimeComparison> {
    const [first, second] = await Promise.all([
      this.resolver.resolveVersion(runtimeA),
      this.resolver.resolveVersion(runtimeB)
    ]);
    if (first.path === second.path) {
      throw new InvalidArgumentError(`Both operands name runtime ${first.label}; pick two different runtimes`, {
        runtimeA,
        runtimeB
      });
    }
    const operator = op === undefined ? null : parseCompareOp(op);

    const [valueA, valueB] = await Promise.all([
      this.inspectTarget(field, { runtime: first, packageName }),
      this.inspectTarget(field, { runtime: second, packageName })
    ]);

    return {
      packageName,
      field: resolveField(field.trim(), this.config.matchRatio)?.field ?? field,
      runtimes: [first.label, second.label],
      values: [valueA, valueB],
      result: operator === null ? null : compareValues(valueA, valueB, operator)
    };
  }

  /**
   * Versions published after `currentVersion`, or null when it is the
   * newest. Without a version, the one installed in the newest runtime that
   * holds the package is used.
   */
  async listUpdates(
    packageName: string,
    currentVersion?: string,
    options: UpdateQueryOptions = {}
  ): Promise<string[] | null> {
    let remoteName = packageName;
    let current = currentVersion;

    if (current === undefined) {
      const record = await this.newestInstall(packageName);
      remoteName = record.name;
      current = record.installedVersion;
      logger.debug(`Using ${record.name} ${current} from runtime ${record.runtime.label}`);
    }

    const history = await this.catalogs.get(remoteName, this.config.ecosystem).fetchHistory();
    return updatesAfter(history, current, { includePrereleases: options.includeBetas });
  }

  private async newestInstall(packageName: string): Promise<PackageRecord> {
    const runtimes = await this.discovery.listRuntimes();
    for (const runtime of [...runtimes].reverse()) {
      if (await this.resolver.isInstalled(runtime, packageName)) {
        return this.resolver.getRecord(runtime, packageName);
      }
    }
    throw new NotFoundError(`Package '${packageName}' is not installed in any runtime`, { packageName });
  }

  snapshot(option: string): Promise<Snapshot> {
    return takeSnapshot(option, field => sessionField(field, this.discovery, this.resolver));
  }
}
