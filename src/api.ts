/**
 * Library entry point.
 *
 * ```ts
 * const inspector = await createPkgInspector({ runtimeRoot: '/opt/runtimes' });
 * await inspector.inspect('requests', '3.12', 'installed_version');
 * ```
 */

import type { PkgsightConfig } from './types/index.js';
import { ConfigManager } from './core/config.js';
import { PkgInspector, type PkgInspectorOptions } from './core/inspector.js';

export interface CreateInspectorOptions extends PkgInspectorOptions {
  /** Directory holding config.jsonc; defaults to ~/.pkgsight */
  configDir?: string;
}

/**
 * Build an inspection session from the user's configuration with
 * `overrides` applied on top.
 */
export async function createPkgInspector(
  overrides: PkgsightConfig = {},
  options: CreateInspectorOptions = {}
): Promise<PkgInspector> {
  const config = await new ConfigManager(options.configDir).resolve(overrides);
  return new PkgInspector(config, { fetcher: options.fetcher });
}

export { PkgInspector };
export type { InspectTarget, RuntimeComparison, UpdateQueryOptions, PkgInspectorOptions } from './core/inspector.js';
export { CompareOp, parseCompareOp } from './core/compare/comparator.js';
export type { HttpFetcher, HttpResponse } from './core/catalog/http-fetcher.js';
export type { Snapshot, SnapshotOption } from './core/snapshot/snapshot.js';
export * from './utils/errors.js';
export { PkgsightError, ErrorCodes } from './types/index.js';
export type {
  ByteSize,
  InspectValue,
  PackageDirectory,
  PackageRecord,
  PackageVersionPair,
  PkgsightConfig,
  ReleaseRecord,
  ResolvedConfig,
  RuntimeListing,
  RuntimeVersion,
  StatisticValue,
  StatisticsSnapshot,
  VersionHistory
} from './types/index.js';
