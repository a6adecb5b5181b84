import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { fetchText, isTransientNetworkError } from '../../src/core/catalog/http-fetcher.js';
import { CatalogRegistry, RemoteCatalog, resolveEcosystem } from '../../src/core/catalog/remote-catalog.js';
import { serializeReleaseRecord } from '../../src/core/compare/release-record.js';
import { InvalidArgumentError, RemoteNotFoundError, TransientNetworkError } from '../../src/utils/errors.js';
import { createFakeFetcher, HISTORY_URL, requestsPages, response, STATS_URL } from '../helpers/fake-fetcher.js';

function resetError(): Error {
  const cause = Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
  return new Error('fetch failed', { cause });
}

const catalogOptions = { requestTimeoutMs: 1_000, longTimeoutMs: 2_000, retryDelayMs: 1, maxWorkers: 4 };

describe('fetchText', () => {
  const urls = ['https://example.test/a', 'https://example.test/b'];

  it('returns the body of a successful response', async () => {
    const { fetcher } = createFakeFetcher({ 'https://example.test/a': 'hello' });
    const body = await fetchText('https://example.test/a', {
      fetcher, requestTimeoutMs: 100, longTimeoutMs: 100, retryDelayMs: 1, urls
    });
    assert.equal(body, 'hello');
  });

  it('reports HTTP errors with the catalog URLs', async () => {
    const { fetcher } = createFakeFetcher({});
    await assert.rejects(
      fetchText('https://example.test/a', { fetcher, requestTimeoutMs: 100, longTimeoutMs: 100, retryDelayMs: 1, urls }),
      (error: unknown) => {
        assert.ok(error instanceof RemoteNotFoundError);
        assert.equal(
          error.message,
          'Request to https://example.test/a returned HTTP 404.\n' +
            'Please ensure the package name and ecosystem are correct and available at:\n' +
            '  - https://example.test/a\n' +
            '  - https://example.test/b'
        );
        return true;
      }
    );
  });

  it('rejects malformed URLs without fetching', async () => {
    const { fetcher, calls } = createFakeFetcher({});
    await assert.rejects(
      fetchText('not a url', { fetcher, requestTimeoutMs: 100, longTimeoutMs: 100, retryDelayMs: 1, urls }),
      RemoteNotFoundError
    );
    assert.deepEqual(calls, []);
  });

  it('retries transient failures', async () => {
    let failures = 1;
    const { fetcher, calls } = createFakeFetcher({
      'https://example.test/a': async () => {
        if (failures-- > 0) {
          throw resetError();
        }
        return response(200, 'recovered');
      }
    });
    const body = await fetchText('https://example.test/a', {
      fetcher, requestTimeoutMs: 100, longTimeoutMs: 1_000, retryDelayMs: 1, urls
    });
    assert.equal(body, 'recovered');
    assert.equal(calls.length, 2);
  });

  it('gives up on transient failures after the long timeout', async () => {
    const { fetcher } = createFakeFetcher({
      'https://example.test/a': async () => {
        throw resetError();
      }
    });
    await assert.rejects(
      fetchText('https://example.test/a', { fetcher, requestTimeoutMs: 100, longTimeoutMs: 20, retryDelayMs: 5, urls }),
      TransientNetworkError
    );
  });

  it('does not retry other failures', async () => {
    const { fetcher, calls } = createFakeFetcher({
      'https://example.test/a': async () => {
        throw new Error('getaddrinfo ENOTFOUND example.test');
      }
    });
    await assert.rejects(
      fetchText('https://example.test/a', { fetcher, requestTimeoutMs: 100, longTimeoutMs: 1_000, retryDelayMs: 1, urls }),
      RemoteNotFoundError
    );
    assert.equal(calls.length, 1);
  });

  it('classifies transient errors through the cause chain', () => {
    assert.equal(isTransientNetworkError(resetError()), true);
    assert.equal(isTransientNetworkError(Object.assign(new Error('aborted'), { name: 'TimeoutError' })), true);
    assert.equal(isTransientNetworkError(new Error('socket hang up')), true);
    assert.equal(isTransientNetworkError(new Error('certificate has expired')), false);
    assert.equal(isTransientNetworkError('ECONNRESET'), false);
  });
});

describe('resolveEcosystem', () => {
  it('matches supported package managers', () => {
    assert.equal(resolveEcosystem('NPM'), 'npm');
    assert.equal(resolveEcosystem('pypi'), 'pypi');
    assert.equal(resolveEcosystem('cargo'), 'cargo');
  });

  it('falls back to pypi', () => {
    assert.equal(resolveEcosystem(), 'pypi');
    assert.equal(resolveEcosystem('nonsense'), 'pypi');
  });
});

describe('RemoteCatalog', () => {
  it('builds catalog URLs', () => {
    const catalog = new RemoteCatalog('requests', catalogOptions);
    assert.equal(catalog.historyUrl, HISTORY_URL);
    assert.equal(catalog.packageUrl, 'https://pypi.org/project/requests/');
    assert.equal(catalog.statsUrl, STATS_URL);
    assert.equal(new RemoteCatalog('left-pad', catalogOptions, 'NPM').statsUrl, 'https://libraries.io/npm/left-pad');
  });

  it('rejects an empty package name', () => {
    assert.throws(() => new RemoteCatalog(' ', catalogOptions), InvalidArgumentError);
  });

  it('fetches the history once and answers history queries', async () => {
    const { fetcher, calls } = requestsPages();
    const catalog = new RemoteCatalog('requests', { ...catalogOptions, fetcher });

    const [total, latest, initial] = await Promise.all([
      catalog.totalVersions(),
      catalog.latestVersion(),
      catalog.initialVersion()
    ]);
    assert.equal(total, 4);
    assert.deepEqual(serializeReleaseRecord(latest), { date: '2020-12-16', version: '2.25.1' });
    assert.deepEqual(serializeReleaseRecord(initial), { date: '2019-01-01', version: '2.21.0' });
    assert.deepEqual(calls, [HISTORY_URL]);
  });

  it('reads statistics by fuzzy key', async () => {
    const { fetcher, calls } = requestsPages();
    const catalog = new RemoteCatalog('requests', { ...catalogOptions, fetcher });

    assert.equal(await catalog.statistic('stars'), 47102);
    assert.equal(await catalog.statistic('Contributors'), 621);
    assert.deepEqual(calls, [STATS_URL]);
  });

  it('returns null for statistics the page omits', async () => {
    const { fetcher } = createFakeFetcher({ [STATS_URL]: '<dl class="row detail-card"><dt>Stars</dt></dl>' });
    const catalog = new RemoteCatalog('requests', { ...catalogOptions, fetcher });
    assert.equal(await catalog.statistic('Forks'), null);
  });

  it('rejects unknown statistics', async () => {
    const catalog = new RemoteCatalog('requests', catalogOptions);
    await assert.rejects(catalog.statistic('popularity'), InvalidArgumentError);
  });

  it('reports a missing package with both URLs', async () => {
    const { fetcher } = createFakeFetcher({ [HISTORY_URL]: 404 });
    const catalog = new RemoteCatalog('requests', { ...catalogOptions, fetcher });
    await assert.rejects(catalog.fetchHistory(), (error: unknown) => {
      assert.ok(error instanceof RemoteNotFoundError);
      assert.deepEqual(error.urls, [HISTORY_URL, STATS_URL]);
      return true;
    });
  });
});

describe('CatalogRegistry', () => {
  it('shares one catalog per package and ecosystem', () => {
    const registry = new CatalogRegistry(catalogOptions);
    assert.equal(registry.get('requests'), registry.get('Requests', 'PyPI'));
    assert.notEqual(registry.get('requests'), registry.get('requests', 'npm'));
  });
});
