import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { fieldNames, isSessionField, resolveField, searchFields } from '../../src/core/metadata/field-vocabulary.js';

describe('field vocabulary', () => {
  it('resolves exact names to their group', () => {
    assert.deepEqual(resolveField('installed_version', 85), {
      field: 'installed_version',
      group: 'package',
      score: 100
    });
    assert.equal(resolveField('Stars', 85)?.group, 'remote');
    assert.equal(resolveField('package_versions', 85)?.group, 'session');
  });

  it('resolves near misses', () => {
    const resolved = resolveField('instaled_version', 85);
    assert.equal(resolved?.field, 'installed_version');
    assert.equal(resolved?.group, 'package');
  });

  it('keeps the earliest entry on equal scores', () => {
    // 'License' and 'license' both score 100 ignoring case
    assert.equal(resolveField('license', 85)?.field, 'License');
  });

  it('returns null below the ratio', () => {
    assert.equal(resolveField('xyzzy', 85), null);
  });

  it('lists names sorted without duplicates', () => {
    const names = fieldNames();
    assert.deepEqual(names, [...new Set(names)].sort());
    assert.ok(names.includes('Classifiers'));
    assert.ok(names.includes('documentation'));
  });

  it('recognizes session fields', () => {
    assert.equal(isSessionField('site_packages'), true);
    assert.equal(isSessionField('site_path'), false);
  });

  it('searches names by substring', () => {
    const found = searchFields('licen');
    assert.ok(found.includes('short_license'));
    assert.ok(found.includes('License'));
  });

  it('returns every name for an empty search and nothing for noise', () => {
    assert.deepEqual(searchFields('  '), fieldNames());
    assert.deepEqual(searchFields('qqqqqqq'), []);
  });
});
