import { Logger, LogLevel } from '../types/index.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

const LEVEL_PREFIX: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🐛 [DEBUG]',
  [LogLevel.INFO]: 'ℹ️  [INFO] ',
  [LogLevel.WARN]: '⚠️  [WARN] ',
  [LogLevel.ERROR]: '❌ [ERROR]'
};

// Nested errors (e.g. `{ error }` meta) serialize to {} without this
function metaReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  if (value instanceof Set) {
    return [...value];
  }
  return value;
}

/**
 * Diagnostic logger. Everything goes to stderr so stdout carries only
 * command results, which keeps `--json` output parseable with logging on.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private level: LogLevel = LogLevel.INFO,
    private readonly write: (line: string) => void = line => console.error(line)
  ) {}

  private emit(level: LogLevel, message: string, meta?: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return;
    }
    let line = `${new Date().toISOString()} ${LEVEL_PREFIX[level]} ${message}`;
    if (meta instanceof Error) {
      line += `\n${JSON.stringify({ name: meta.name, message: meta.message, stack: meta.stack }, null, 2)}`;
    } else if (meta && typeof meta === 'object') {
      line += `\n${JSON.stringify(meta, metaReplacer, 2)}`;
    } else if (meta !== undefined && meta !== null) {
      line += ` ${String(meta)}`;
    }
    this.write(line);
  }

  debug(message: string, meta?: unknown): void {
    this.emit(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.emit(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.emit(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.emit(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/** Level from the environment: PKGSIGHT_VERBOSE=1 wins over NODE_ENV */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.PKGSIGHT_VERBOSE === '1') {
    return LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

export const logger = new ConsoleLogger(levelFromEnv());
