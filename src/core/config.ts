import { join } from 'path';
import { PkgsightConfig, PkgsightDirectories, ResolvedConfig } from '../types/index.js';
import { readJsonOrJsoncFile, writeJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError, wrapError } from '../utils/errors.js';
import { getDefaultRuntimeRoot, getPkgsightDirectories } from './directory.js';
import {
  DEFAULT_ECOSYSTEM,
  DEFAULT_IGNORE_PATTERNS,
  DEFAULT_MAX_WORKERS,
  DIR_PATTERNS,
  FILE_PATTERNS,
  MATCH_RATIOS,
  TIMEOUTS
} from '../constants/index.js';

/**
 * Configuration management for pkgsight
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];
const DEFAULT_CONFIG_FILE = FILE_PATTERNS.CONFIG_JSONC;

export function getDefaultConfig(): ResolvedConfig {
  return {
    runtimeRoot: getDefaultRuntimeRoot(),
    siteDirectory: DIR_PATTERNS.SITE_PACKAGES,
    ignorePatterns: [...DEFAULT_IGNORE_PATTERNS],
    maxWorkers: DEFAULT_MAX_WORKERS,
    matchRatio: MATCH_RATIOS.DEFAULT,
    packageMatchRatio: MATCH_RATIOS.DEFAULT,
    ecosystem: DEFAULT_ECOSYSTEM,
    requestTimeoutMs: TIMEOUTS.DEFAULT_MS,
    longTimeoutMs: TIMEOUTS.LONG_MS,
    retryDelayMs: TIMEOUTS.RETRY_DELAY_MS
  };
}

type ConfigKind = 'string' | 'positiveInteger' | 'ratio' | 'stringList';

const CONFIG_SCHEMA: Record<keyof PkgsightConfig, ConfigKind> = {
  runtimeRoot: 'string',
  siteDirectory: 'string',
  ignorePatterns: 'stringList',
  maxWorkers: 'positiveInteger',
  matchRatio: 'ratio',
  packageMatchRatio: 'ratio',
  ecosystem: 'string',
  requestTimeoutMs: 'positiveInteger',
  longTimeoutMs: 'positiveInteger',
  retryDelayMs: 'positiveInteger'
};

export const CONFIG_KEYS = Object.keys(CONFIG_SCHEMA).sort();

export function isConfigKey(key: string): key is keyof PkgsightConfig {
  return Object.prototype.hasOwnProperty.call(CONFIG_SCHEMA, key);
}

function checkValue(key: keyof PkgsightConfig, value: unknown): void {
  const kind = CONFIG_SCHEMA[key];
  const valid =
    kind === 'string' ? typeof value === 'string' && value.length > 0
    : kind === 'stringList' ? Array.isArray(value) && value.every(item => typeof item === 'string')
    : kind === 'ratio' ? typeof value === 'number' && value >= 0 && value <= 100
    : typeof value === 'number' && Number.isInteger(value) && value > 0;
  if (!valid) {
    throw new ConfigError(`Invalid value for '${key}': expected ${kind}, got ${JSON.stringify(value)}`, { key, value });
  }
}

/**
 * Validate a parsed config document. Unknown keys are ignored with a warning.
 */
export function parseConfig(raw: unknown): PkgsightConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Invalid configuration structure: expected an object');
  }

  const config: PkgsightConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) {
      logger.warn(`Ignoring unknown configuration key: ${key}`);
      continue;
    }
    checkValue(key, value);
    Object.assign(config, { [key]: value });
  }
  return config;
}

/**
 * Convert a command-line string to the value type `key` takes.
 * Lists are comma separated.
 */
export function coerceConfigValue<K extends keyof PkgsightConfig>(key: K, text: string): PkgsightConfig[K] {
  const kind = CONFIG_SCHEMA[key];
  const value: unknown =
    kind === 'stringList' ? text.split(',').map(item => item.trim()).filter(Boolean)
    : kind === 'string' ? text
    : Number(text);
  checkValue(key, value);
  return parseConfig({ [key]: value })[key];
}

class ConfigManager {
  private config: PkgsightConfig | null = null;
  private configPath: string | null = null;
  private readonly pkgsightDirs: PkgsightDirectories;

  constructor(configDir?: string) {
    this.pkgsightDirs = configDir ? { config: configDir } : getPkgsightDirectories();
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.pkgsightDirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  private async getConfigPath(): Promise<string> {
    if (this.configPath) {
      return this.configPath;
    }
    this.configPath = (await this.findConfigFile()) ?? join(this.pkgsightDirs.config, DEFAULT_CONFIG_FILE);
    return this.configPath;
  }

  /**
   * Load the user's configuration file. A missing file means an empty
   * configuration; nothing is written until a value is set.
   */
  async load(): Promise<PkgsightConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = {};
      return this.config;
    }

    try {
      logger.debug(`Loading config from: ${configPath}`);
      this.config = parseConfig(await readJsonOrJsoncFile(configPath));
      this.configPath = configPath;
      return this.config;
    } catch (error) {
      logger.debug('Failed to load configuration', { error, configPath });
      throw wrapError(error, `Failed to load configuration from ${configPath}`, ConfigError);
    }
  }

  /**
   * Defaults, then the config file, then `PKGSIGHT_RUNTIME_ROOT`, then
   * explicit overrides (CLI flags).
   */
  async resolve(overrides: PkgsightConfig = {}): Promise<ResolvedConfig> {
    const fileConfig = await this.load();
    const envRoot = process.env.PKGSIGHT_RUNTIME_ROOT;
    const definedOverrides = Object.fromEntries(
      Object.entries(overrides).filter(([, value]) => value !== undefined)
    );
    return {
      ...getDefaultConfig(),
      ...fileConfig,
      ...(envRoot ? { runtimeRoot: envRoot } : {}),
      ...parseConfig(definedOverrides)
    };
  }

  async save(): Promise<void> {
    if (!this.config) {
      throw new ConfigError('No configuration loaded to save');
    }

    const configPath = await this.getConfigPath();
    try {
      logger.debug(`Saving config to: ${configPath}`);
      await writeJsoncFile(configPath, this.config);
    } catch (error) {
      logger.debug('Failed to save configuration', { error, configPath });
      throw wrapError(error, `Failed to save configuration to ${configPath}`, ConfigError);
    }
  }

  async get<K extends keyof PkgsightConfig>(key: K): Promise<ResolvedConfig[K]> {
    const config = await this.resolve();
    return config[key];
  }

  async set<K extends keyof PkgsightConfig>(key: K, value: PkgsightConfig[K]): Promise<void> {
    checkValue(key, value);
    const config = await this.load();
    this.config = Object.assign({}, config, { [key]: value });
    await this.save();
    logger.info(`Configuration updated: ${key} = ${JSON.stringify(value)}`);
  }

  async getConfigFilePath(): Promise<string> {
    return await this.getConfigPath();
  }

  getDirectories(): PkgsightDirectories {
    return this.pkgsightDirs;
  }
}

// Create and export a singleton instance
export const configManager = new ConfigManager();

// Export the class for testing purposes
export { ConfigManager };
