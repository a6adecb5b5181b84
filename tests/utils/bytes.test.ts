import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { bytesToSize, parseByteSize } from '../../src/utils/bytes.js';
import { InvalidArgumentError } from '../../src/utils/errors.js';

describe('bytesToSize', () => {
  it('stays in kilobytes below a megabyte', () => {
    assert.deepEqual(bytesToSize(672768), {
      symbolic: '657.000 KB (Kilobytes)',
      calculatedSize: 657,
      bytesSize: 672768
    });
  });

  it('reports zero as kilobytes', () => {
    assert.equal(bytesToSize(0).symbolic, '0.000 KB (Kilobytes)');
  });

  it('clamps to terabytes', () => {
    const size = bytesToSize(1024 ** 6);
    assert.equal(size.symbolic, '1048576.000 TB (Terabytes)');
    assert.equal(size.calculatedSize, 1048576);
  });

  it('rejects negative counts', () => {
    assert.throws(() => bytesToSize(-1), InvalidArgumentError);
  });
});

describe('parseByteSize', () => {
  it('converts a megabyte figure', () => {
    const size = parseByteSize('12.4 MB');
    assert.ok(size);
    assert.equal(size.symbolic, '12.400 MB (Megabytes)');
    assert.equal(size.bytesSize, 12.4 * 1024 ** 2);
  });

  it('accepts lowercase units', () => {
    assert.equal(parseByteSize('2 gb')?.symbolic, '2.000 GB (Gigabytes)');
  });

  it('returns null for text without a unit', () => {
    assert.equal(parseByteSize('1,234'), null);
    assert.equal(parseByteSize('abc KB'), null);
    assert.equal(parseByteSize('12 parsecs'), null);
  });
});
