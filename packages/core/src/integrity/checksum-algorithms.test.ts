import { resolveChecksumAlgorithm } from './checksum-algorithms.js';

describe('resolveChecksumAlgorithm', () => {
  it('accepts md5 in any case', () => {
    expect(resolveChecksumAlgorithm('md5')).toBe('md5');
    expect(resolveChecksumAlgorithm(' MD5 ')).toBe('md5');
  });

  it('rejects anything else', () => {
    expect(resolveChecksumAlgorithm('sha256')).toBeUndefined();
    expect(resolveChecksumAlgorithm('toString')).toBeUndefined();
    expect(resolveChecksumAlgorithm('')).toBeUndefined();
  });
});
