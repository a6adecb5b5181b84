/**
 * Shared constants for pkgsight.
 * Single source of truth for directory names, file patterns, remote URL
 * templates and the fixed vocabularies used by fuzzy matching.
 */

export const DIR_PATTERNS = {
  PKGSIGHT: '.pkgsight',
  SITE_PACKAGES: 'site-packages'
} as const;

export const FILE_PATTERNS = {
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json',
  METADATA: 'METADATA',
  TOP_LEVEL: 'top_level.txt',
  INIT_MODULE: '__init__.py',
  MODULE_SUFFIX: '.py'
} as const;

export const DEFAULT_RUNTIME_ROOTS = {
  darwin: '/Library/Frameworks/Python.framework/Versions',
  fallback: '/usr/lib'
} as const;

/**
 * Suffixes identifying an installed package entry inside a site directory.
 * Descriptor directories take precedence over bare modules.
 */
export const PACKAGE_SUFFIXES = {
  DESCRIPTOR: '.dist-info',
  MODULE: '.py'
} as const;

export const DEFAULT_IGNORE_PATTERNS = ['pyobjc'] as const;

export const VERSION_PATTERNS = {
  /** A runtime directory carries a `major.minor` token somewhere in its path */
  RUNTIME: /\d+\.\d+/,
  RELEASE: /\d+\.\d+(\.\d+)?/,
  /** `Jan 1, 2021` as rendered on the release history page */
  DATE: /[A-Z][a-z]{2}\s\d{1,2},\s\d{4}/,
  /** Badge text marking a release block */
  PRERELEASE_LABEL: /\bpre[-_ ]?release\b/i,
  /**
   * A release token directly followed by a pre/dev segment that does not run
   * on into a word: `2.0.0rc1` matches, `2.0.0Apr` does not
   */
  PRERELEASE_SUFFIX: /\d+\.\d+(?:\.\d+)?[-_.]?(?:a|b|c|rc|alpha|beta|pre|preview|dev)\d*(?![a-z])/i
} as const;

export const MIN_VERSION = '0.0.0';

export const REMOTE_URLS = {
  HISTORY: 'https://pypi.org/project/{package}/#history',
  STATISTICS: 'https://libraries.io/{ecosystem}/{package}'
} as const;

export const HTML_MARKERS = {
  RELEASE_BLOCK: 'div.release',
  PRERELEASE_BADGE: '.badge--warning',
  STATISTICS_CARD: 'dl.row.detail-card'
} as const;

export const DEFAULT_ECOSYSTEM = 'pypi';

/** Ecosystems served by the statistics site */
export const PACKAGE_MANAGERS = [
  'npm',
  'Maven',
  'PyPI',
  'NuGet',
  'Go',
  'Packagist',
  'Rubygems',
  'Cargo',
  'CocoaPods',
  'Bower',
  'Pub',
  'CPAN',
  'CRAN',
  'Clojars',
  'conda',
  'Hackage',
  'Hex',
  'Meteor',
  'Homebrew',
  'Puppet',
  'Carthage',
  'SwiftPM',
  'Julia',
  'Elm',
  'Dub',
  'Racket',
  'Nimble',
  'Haxelib',
  'PureScript',
  'Alcatraz',
  'Inqlude'
] as const;

export const STATISTIC_KEYS = [
  'Contributors',
  'Dependencies',
  'Dependent packages',
  'Dependent repositories',
  'Forks',
  'Repository size',
  'SourceRank',
  'Stars',
  'Total releases',
  'Watchers'
] as const;

/**
 * Header fields read from a descriptor's METADATA file, followed by the file
 * names a descriptor directory may hold.
 */
export const METADATA_FIELDS = [
  'Author',
  'Author-email',
  'Classifier',
  'Description-Content-Type',
  'Download-URL',
  'Home-page',
  'License',
  'Metadata-Version',
  'Name',
  'Platform',
  'Requires-Python',
  'Summary',
  'Version',
  'entry_points',
  'installer',
  'license',
  'metadata',
  'record',
  'requested',
  'top_level',
  'wheel'
] as const;

export const MULTI_VALUED_FIELDS = ['Classifier', 'Platform'] as const;

export const MATCH_RATIOS = {
  DEFAULT: 85,
  STRICT: 95
} as const;

export const TIMEOUTS = {
  /** Default request timeout (5 minutes) */
  DEFAULT_MS: 300_000,
  /** Bulk token extraction and the retry envelope (15 minutes) */
  LONG_MS: 900_000,
  RETRY_DELAY_MS: 250
} as const;

export const DEFAULT_MAX_WORKERS = 8;

export const BYTES_BASE = 1024;

export const BYTE_UNITS = [
  'KB (Kilobytes)',
  'MB (Megabytes)',
  'GB (Gigabytes)',
  'TB (Terabytes)'
] as const;
