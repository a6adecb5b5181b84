import assert from 'node:assert/strict';
import { after, before, describe, it } from 'node:test';
import { join } from 'path';
import type { ResolvedConfig } from '../../src/types/index.js';
import { PkgInspector } from '../../src/core/inspector.js';
import { serializeReleaseRecord, isReleaseRecord } from '../../src/core/compare/release-record.js';
import { fieldNames, REMOTE_FIELDS } from '../../src/core/metadata/field-vocabulary.js';
import { STATISTIC_KEYS } from '../../src/constants/index.js';
import {
  InvalidArgumentError,
  NotFoundError,
  PreconditionFailedError
} from '../../src/utils/errors.js';
import { createFakeEnvironment, type FakeEnvironment } from '../helpers/fake-environment.js';
import { requestsPages, type FakeFetcher } from '../helpers/fake-fetcher.js';

describe('PkgInspector', () => {
  let env: FakeEnvironment;
  let pages: FakeFetcher;
  let inspector: PkgInspector;

  before(async () => {
    env = await createFakeEnvironment();
    pages = requestsPages();
    const config: ResolvedConfig = {
      runtimeRoot: env.root,
      siteDirectory: 'site-packages',
      ignorePatterns: ['pyobjc'],
      maxWorkers: 4,
      matchRatio: 85,
      packageMatchRatio: 85,
      ecosystem: 'pypi',
      requestTimeoutMs: 1_000,
      longTimeoutMs: 2_000,
      retryDelayMs: 1
    };
    inspector = new PkgInspector(config, { fetcher: pages.fetcher });
  });

  after(async () => {
    await env.cleanup();
  });

  describe('local fields', () => {
    it('lists runtimes', async () => {
      assert.deepEqual(await inspector.listRuntimes(), ['3.11', '3.12']);
    });

    it('answers package fields through fuzzy names', async () => {
      assert.equal(await inspector.inspect('reqeusts', '3.12', 'instaled_version'), '2.25.1');
      assert.equal(await inspector.inspect('requests', '3.11', 'installed_version'), '2.24.0');
      assert.equal(
        await inspector.inspect('requests', '3.12', 'site_path'),
        join(env.siteDir('3.12'), 'requests-2.25.1.dist-info')
      );
    });

    it('reports installation state', async () => {
      assert.equal(await inspector.inspect('six', '3.11', 'is_installed'), true);
      assert.equal(await inspector.inspect('numpy', '3.11', 'is_installed'), false);
    });

    it('lists fields for an empty query', async () => {
      assert.deepEqual(await inspector.inspect('requests', '3.12', ''), fieldNames());
    });

    it('answers descriptor and derived fields', async () => {
      assert.equal(await inspector.inspect('requests', '3.12', 'Summary'), 'Python HTTP for Humans.');
      assert.equal(await inspector.inspect('requests', '3.12', 'short_license'), 'Apache 2.0');
      assert.equal(
        await inspector.inspect('requests', '3.12', 'documentation'),
        'Requests HTTP library.\n\nSends requests.'
      );
    });

    it('reads descriptor files by name', async () => {
      assert.equal(await inspector.inspect('requests', '3.12', 'RECORD'), null);
      assert.equal(await inspector.inspect('Flask-Login', '3.12', 'RECORD'), 'flask_login/__init__.py,,\n');
    });

    it('searches descriptor files for names outside the vocabulary', async () => {
      assert.equal(await inspector.inspect('Flask-Login', '3.12', 'RECO'), 'flask_login/__init__.py,,\n');
    });

    it('answers runtime and session fields', async () => {
      assert.deepEqual(await inspector.inspect('requests', '3.11', 'version_packages'), [
        ['requests', '2.24.0'],
        ['six', '0.0.0']
      ]);
      assert.deepEqual(await inspector.inspect('requests', '3.12', 'installed_runtimes'), ['3.11', '3.12']);
      assert.deepEqual(await inspector.inspectTarget('site_packages', { runtime: null, packageName: null }), {
        '3.11': [env.siteDir('3.11')],
        '3.12': [env.siteDir('3.12')]
      });
    });

    it('lists versions per runtime', async () => {
      assert.deepEqual(await inspector.getVersionPackages('3.11'), [['requests', '2.24.0'], ['six', '0.0.0']]);
    });

    it('rejects missing packages and runtimes', async () => {
      await assert.rejects(inspector.inspect('numpy', '3.12', 'installed_version'), NotFoundError);
      await assert.rejects(inspector.inspect('requests', '3.9', 'installed_version'), NotFoundError);
    });

    it('rejects fields that are not strings', async () => {
      await assert.rejects(inspector.inspect('requests', '3.12', 42), {
        name: 'InvalidArgumentError',
        message: 'Field must be a string, got number'
      });
    });

    it('requires a bound package for package fields', async () => {
      await assert.rejects(
        inspector.inspectTarget('installed_version', { runtime: null, packageName: null }),
        PreconditionFailedError
      );
    });
  });

  describe('remote fields', () => {
    it('compares the installed version with the release history', async () => {
      assert.equal(await inspector.inspect('requests', '3.12', 'is_latest'), true);
      assert.equal(await inspector.inspect('requests', '3.11', 'is_latest'), false);
      assert.deepEqual(await inspector.inspect('requests', '3.11', 'available_updates'), ['2.25.0', '2.25.1']);
    });

    it('reads statistics for an installed package', async () => {
      assert.equal(await inspector.inspect('requests', '3.12', 'Stars'), 47102);
    });

    it('answers remote fields without an installation', async () => {
      const latest = await inspector.inspectRemote('requests', 'latest_version');
      assert.ok(isReleaseRecord(latest));
      assert.deepEqual(serializeReleaseRecord(latest), { date: '2020-12-16', version: '2.25.1' });
      assert.equal(await inspector.inspectRemote('requests', 'package_url'), 'https://pypi.org/project/requests/');
    });

    it('lists remote fields for an empty query', async () => {
      const names = await inspector.inspectRemote('requests', '');
      assert.deepEqual(names, [...REMOTE_FIELDS, ...STATISTIC_KEYS].sort());
    });

    it('rejects local fields as remote queries', async () => {
      await assert.rejects(inspector.inspectRemote('requests', 'installed_version'), InvalidArgumentError);
    });

    it('fetches each page once per session', () => {
      assert.equal(pages.calls.filter(url => url.includes('pypi.org')).length, 1);
      assert.equal(pages.calls.filter(url => url.includes('libraries.io')).length, 1);
    });
  });

  describe('comparisons and updates', () => {
    it('compares a field across runtimes', async () => {
      assert.deepEqual(await inspector.compareAcrossRuntimes('requests', '3.11', '3.12', 'installed_version', '<'), {
        packageName: 'requests',
        field: 'installed_version',
        runtimes: ['3.11', '3.12'],
        values: ['2.24.0', '2.25.1'],
        result: true
      });
    });

    it('leaves the result empty without an operator', async () => {
      const comparison = await inspector.compareAcrossRuntimes('six', '3.11', '3.12', 'installed_version');
      assert.deepEqual(comparison.values, ['0.0.0', '1.16.0']);
      assert.equal(comparison.result, null);
    });

    it('rejects comparing a runtime with itself', async () => {
      await assert.rejects(
        inspector.compareAcrossRuntimes('requests', '3.12', '3.12.0', 'installed_version'),
        InvalidArgumentError
      );
    });

    it('lists updates for the newest installation by default', async () => {
      assert.equal(await inspector.listUpdates('requests'), null);
      assert.deepEqual(await inspector.listUpdates('requests', '2.24.0'), ['2.25.0', '2.25.1']);
    });

    it('rejects packages installed nowhere', async () => {
      await assert.rejects(inspector.listUpdates('numpy'), {
        name: 'NotFoundError',
        message: "Package 'numpy' is not installed in any runtime"
      });
    });
  });

  describe('snapshot', () => {
    it('captures session listings', async () => {
      const snapshot = await inspector.snapshot('installed_runtimes');
      assert.equal(snapshot.option, 'installed_runtimes');
      assert.deepEqual(snapshot.data, { installed_runtimes: ['3.11', '3.12'] });
    });
  });
});
