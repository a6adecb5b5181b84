import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { bestMatch, closestMatch, similarity } from '../../src/utils/fuzzy.js';

describe('similarity', () => {
  it('scores a transposition by longest common subsequence', () => {
    // LCS of 7 over 16 characters
    assert.equal(similarity('reqeusts', 'requests'), 87.5);
  });

  it('ignores case', () => {
    assert.equal(similarity('Django', 'django'), 100);
  });

  it('handles empty strings', () => {
    assert.equal(similarity('', ''), 100);
    assert.equal(similarity('abc', ''), 0);
  });
});

describe('closestMatch', () => {
  it('returns the best candidate with its score', () => {
    assert.deepEqual(closestMatch('reqeusts', ['urllib3', 'requests', 'six']), {
      candidate: 'requests',
      score: 87.5
    });
  });

  it('keeps the earliest candidate on ties', () => {
    assert.equal(closestMatch('ab', ['ax', 'xb'])?.candidate, 'ax');
  });

  it('returns null without candidates', () => {
    assert.equal(closestMatch('anything', []), null);
  });
});

describe('bestMatch', () => {
  it('applies the strict ratio by default', () => {
    assert.equal(bestMatch('reqeusts', ['requests']), null);
  });

  it('accepts a lower ratio', () => {
    assert.equal(bestMatch('reqeusts', ['requests'], 85), 'requests');
  });

  it('preserves candidate casing', () => {
    assert.equal(bestMatch('version', ['Version', 'License']), 'Version');
  });
});
