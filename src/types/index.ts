/**
 * Common types and interfaces for the pkgsight CLI and library
 */

import type { SemVer } from 'semver';

// Core application types
export interface PkgsightDirectories {
  config: string;
}

export interface PkgsightConfig {
  /** Directory holding one subdirectory per installed runtime version */
  runtimeRoot?: string;
  /** Name of the nested directories that hold installed packages */
  siteDirectory?: string;
  /** Entry names matching any of these patterns are never reported as packages */
  ignorePatterns?: string[];
  maxWorkers?: number;
  /** Minimum similarity (0-100) for fuzzy field-name matches */
  matchRatio?: number;
  /** Minimum similarity (0-100) for fuzzy package-name matches */
  packageMatchRatio?: number;
  /** Default ecosystem used for statistics lookups */
  ecosystem?: string;
  requestTimeoutMs?: number;
  longTimeoutMs?: number;
  retryDelayMs?: number;
}

export type ResolvedConfig = Required<PkgsightConfig>;

// Discovery types

/**
 * One installed runtime, identified by the version token found in its path
 * (e.g. `3.12` for `/Library/Frameworks/Python.framework/Versions/3.12`).
 */
export interface RuntimeVersion {
  /** Version token as it appears on disk */
  readonly label: string;
  readonly version: SemVer;
  readonly path: string;
}

export type PackageDirectoryKind = 'descriptor' | 'module';

export interface PackageDirectory {
  /** Package name as encoded in the entry name (`requests` for `requests-2.25.1.dist-info`) */
  readonly name: string;
  readonly normalizedName: string;
  readonly path: string;
  readonly kind: PackageDirectoryKind;
  readonly runtime: RuntimeVersion;
}

export interface SiteDirectory {
  readonly runtime: RuntimeVersion;
  readonly path: string;
}

export interface PackageRecord {
  readonly name: string;
  readonly runtime: RuntimeVersion;
  readonly directory: PackageDirectory;
  readonly installedVersion: string;
}

// Catalog types

export interface ReleaseRecord {
  /** Release date at UTC midnight, null when the source carried none */
  readonly date: Date | null;
  readonly version: string | null;
}

export type VersionHistory = readonly ReleaseRecord[];

export interface ByteSize {
  /** e.g. `657.000 KB (Kilobytes)` */
  readonly symbolic: string;
  readonly calculatedSize: number;
  readonly bytesSize: number;
}

export type StatisticValue = number | string | ByteSize;

export type StatisticsSnapshot = Readonly<Record<string, StatisticValue>>;

// Metadata types

export type DescriptorValue = string | readonly string[];

export type DescriptorFields = Readonly<Record<string, DescriptorValue>>;

// Session-wide listings, keyed by runtime label

export type PackageVersionPair = readonly [string, string];

export type RuntimeListing = Readonly<Record<string, readonly string[] | readonly PackageVersionPair[]>>;

export type InspectValue =
  | string
  | number
  | boolean
  | null
  | ByteSize
  | ReleaseRecord
  | VersionHistory
  | StatisticsSnapshot
  | DescriptorFields
  | RuntimeListing
  | readonly string[]
  | readonly PackageVersionPair[];

// Command types

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

export interface GlobalOptions {
  root?: string;
  workers?: string;
  verbose?: boolean;
  json?: boolean;
}

// Error types
export class PkgsightError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PkgsightError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  NOT_FOUND = 'NOT_FOUND',
  REMOTE_NOT_FOUND = 'REMOTE_NOT_FOUND',
  PRECONDITION_FAILED = 'PRECONDITION_FAILED',
  TRANSIENT_NETWORK = 'TRANSIENT_NETWORK',
  DISCOVERY_ERROR = 'DISCOVERY_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  TIMEOUT = 'TIMEOUT',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
