import { RemoteNotFoundError, TransientNetworkError } from '../../utils/errors.js';
import { delay } from '../../utils/concurrency.js';
import { logger } from '../../utils/logger.js';

/**
 * The subset of a fetch Response the catalog reads.
 */
export interface HttpResponse {
  readonly ok: boolean;
  readonly status: number;
  text(): Promise<string>;
}

/**
 * Injectable document fetcher. Tests pass an in-process fake; the default
 * uses Node's global fetch.
 */
export type HttpFetcher = (url: string, init: { signal: AbortSignal }) => Promise<HttpResponse>;

export const defaultFetcher: HttpFetcher = (url, init) => fetch(url, init);

export interface FetchTextOptions {
  fetcher: HttpFetcher;
  /** Limit for a single attempt */
  requestTimeoutMs: number;
  /** Limit across all retry attempts */
  longTimeoutMs: number;
  retryDelayMs: number;
  /** Both catalog URLs, reported when the document cannot be found */
  urls: readonly string[];
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNABORTED',
  'EPIPE',
  'ETIMEDOUT',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT'
]);

const TRANSIENT_MESSAGES = /socket hang up|other side closed|connection reset/i;

/**
 * Connection resets, closed sockets and timed-out attempts. fetch wraps the
 * underlying socket error in `cause`, so the chain is walked.
 */
export function isTransientNetworkError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current.name === 'TimeoutError' || TRANSIENT_MESSAGES.test(current.message)) {
      return true;
    }
    const code = 'code' in current ? current.code : undefined;
    if (typeof code === 'string' && TRANSIENT_CODES.has(code)) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fetch `url` as text, retrying transient failures after a fixed delay until
 * the long timeout elapses.
 */
export async function fetchText(url: string, options: FetchTextOptions): Promise<string> {
  try {
    new URL(url);
  } catch {
    throw new RemoteNotFoundError(`Invalid URL: ${url}`, options.urls);
  }

  const deadline = Date.now() + options.longTimeoutMs;
  let attempt = 0;

  for (;;) {
    attempt++;
    let response: HttpResponse;
    let body: string;
    try {
      response = await options.fetcher(url, { signal: AbortSignal.timeout(options.requestTimeoutMs) });
      body = await response.text();
    } catch (error) {
      if (!isTransientNetworkError(error)) {
        throw new RemoteNotFoundError(`Request to ${url} failed: ${describe(error)}`, options.urls, { cause: error });
      }
      if (Date.now() + options.retryDelayMs >= deadline) {
        throw new TransientNetworkError(
          `Request to ${url} kept failing for ${options.longTimeoutMs}ms (${attempt} attempt(s)): ${describe(error)}`,
          { url, attempts: attempt, cause: error }
        );
      }
      logger.debug(`Transient failure fetching ${url}, retrying`, { attempt, error });
      await delay(options.retryDelayMs);
      continue;
    }

    if (!response.ok) {
      throw new RemoteNotFoundError(`Request to ${url} returned HTTP ${response.status}.`, options.urls, {
        status: response.status
      });
    }
    logger.debug(`Fetched ${url} (${body.length} chars, attempt ${attempt})`);
    return body;
  }
}
