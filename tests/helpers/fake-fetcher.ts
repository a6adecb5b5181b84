import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import type { HttpFetcher, HttpResponse } from '../../src/core/catalog/http-fetcher.js';

const fixturesDir = join(dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');

export function readFixture(name: string): string {
  return readFileSync(join(fixturesDir, name), 'utf8');
}

export const HISTORY_URL = 'https://pypi.org/project/requests/#history';
export const STATS_URL = 'https://libraries.io/pypi/requests';

/** A page body, an HTTP status, or a handler for scripted failures */
export type Route = string | number | (() => Promise<HttpResponse>);

export function response(status: number, body = ''): HttpResponse {
  return { ok: status >= 200 && status < 300, status, text: async () => body };
}

export interface FakeFetcher {
  readonly fetcher: HttpFetcher;
  /** Every requested URL, in request order */
  readonly calls: string[];
}

/**
 * In-process stand-in for the network. Unrouted URLs answer 404.
 */
export function createFakeFetcher(routes: Record<string, Route>): FakeFetcher {
  const calls: string[] = [];
  const fetcher: HttpFetcher = async url => {
    calls.push(url);
    const route = routes[url];
    if (route === undefined) {
      return response(404);
    }
    if (typeof route === 'string') {
      return response(200, route);
    }
    if (typeof route === 'number') {
      return response(route);
    }
    return route();
  };
  return { fetcher, calls };
}

export function requestsPages(): FakeFetcher {
  return createFakeFetcher({
    [HISTORY_URL]: readFixture('history.html'),
    [STATS_URL]: readFixture('stats.html')
  });
}
