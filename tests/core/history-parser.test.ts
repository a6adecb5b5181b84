import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { parseHistory } from '../../src/core/catalog/history-parser.js';
import { serializeReleaseRecord } from '../../src/core/compare/release-record.js';
import { RemoteNotFoundError } from '../../src/utils/errors.js';
import { readFixture } from '../helpers/fake-fetcher.js';

const options = { workers: 4, timeoutMs: 5_000, urls: ['https://example.test/history'] };

describe('parseHistory', () => {
  it('reads final releases in page order', async () => {
    const history = await parseHistory(readFixture('history.html'), options);
    assert.deepEqual(history.map(serializeReleaseRecord), [
      { date: '2020-12-16', version: '2.25.1' },
      { date: '2020-11-11', version: '2.25.0' },
      { date: '2020-06-17', version: '2.24.0' },
      { date: '2019-01-01', version: '2.21.0' }
    ]);
  });

  it('drops pre-releases flagged by text alone', async () => {
    const html = [
      '<div class="release"><p>1.1.0.dev3</p><time>Mar 2, 2021</time></div>',
      '<div class="release"><p>1.0.0</p><time>Mar 1, 2021</time><span>source</span></div>',
      '<div class="release"><p>0.9.0</p><span>Pre-release</span><time>Feb 1, 2021</time></div>'
    ].join('');
    const history = await parseHistory(html, options);
    assert.deepEqual(history.map(serializeReleaseRecord), [{ date: '2021-03-01', version: '1.0.0' }]);
  });

  it('keeps the version and date of each block together', async () => {
    const html = '<div class="release"><time>May 5, 2021</time><p>4.2</p></div>';
    const [record] = await parseHistory(html, options);
    assert.deepEqual(serializeReleaseRecord(record), { date: '2021-05-05', version: '4.2' });
  });

  it('fails loudly when a release has no date', async () => {
    const html = '<div class="release"><p>1.0.0</p></div>';
    await assert.rejects(parseHistory(html, options), (error: unknown) => {
      assert.ok(error instanceof RemoteNotFoundError);
      assert.ok(error.message.startsWith('Release 1.0.0 has no release date on the history page.'));
      assert.deepEqual(error.urls, ['https://example.test/history']);
      return true;
    });
  });

  it('returns an empty history for a page without releases', async () => {
    assert.deepEqual(await parseHistory('<html><body><p>Not found</p></body></html>', options), []);
  });
});
