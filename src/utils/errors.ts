import { PkgsightError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the failure kinds pkgsight reports
 */

export class InvalidArgumentError extends PkgsightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_ARGUMENT, details);
    this.name = 'InvalidArgumentError';
  }
}

export class NotFoundError extends PkgsightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.NOT_FOUND, details);
    this.name = 'NotFoundError';
  }
}

/**
 * No candidate cleared the similarity threshold. Surfaces as a NotFoundError
 * with the closest candidate attached.
 */
export class AmbiguousMatchError extends NotFoundError {
  readonly query: string;
  readonly suggestion: string | null;
  readonly score: number;

  constructor(message: string, query: string, suggestion: string | null, score: number) {
    const hint = suggestion ? ` Did you mean '${suggestion}'?` : '';
    super(`${message}${hint}`, { query, suggestion, score });
    this.name = 'AmbiguousMatchError';
    this.query = query;
    this.suggestion = suggestion;
    this.score = score;
  }
}

export class RemoteNotFoundError extends PkgsightError {
  readonly urls: readonly string[];

  constructor(message: string, urls: readonly string[], details?: Record<string, unknown>) {
    const listing = urls.map(url => `\n  - ${url}`).join('');
    super(
      `${message}\nPlease ensure the package name and ecosystem are correct and available at:${listing}`,
      ErrorCodes.REMOTE_NOT_FOUND,
      { urls, ...details }
    );
    this.name = 'RemoteNotFoundError';
    this.urls = urls;
  }
}

export class PreconditionFailedError extends PkgsightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.PRECONDITION_FAILED, details);
    this.name = 'PreconditionFailedError';
  }
}

export class TransientNetworkError extends PkgsightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.TRANSIENT_NETWORK, details);
    this.name = 'TransientNetworkError';
  }
}

export class DiscoveryError extends PkgsightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Discovery error: ${message}`, ErrorCodes.DISCOVERY_ERROR, details);
    this.name = 'DiscoveryError';
  }
}

export class FileSystemError extends PkgsightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class TimeoutError extends PkgsightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.TIMEOUT, details);
    this.name = 'TimeoutError';
  }
}

export class ConfigError extends PkgsightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

type ErrorClass = new (message: string, details?: Record<string, unknown>) => PkgsightError;

/**
 * Re-raise a failure as `kind`, prefixed with the attempted operation.
 * Errors already of that kind pass through untouched.
 */
export function wrapError(error: unknown, operation: string, kind: ErrorClass = FileSystemError): PkgsightError {
  if (error instanceof kind) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new kind(`${operation}: ${reason}`, { cause: error });
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof PkgsightError) {
    // Details only surface in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
