import { describe, expect, it } from 'vitest';
import { contentHash, sha256 } from '@/utils/hash';

describe('hash utilities', () => {
  it('computes sha256 digests', () => {
    expect(sha256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('ignores key order in content hashes', () => {
    expect(contentHash({ b: 1, a: { d: [1, 2], c: null } })).toBe(
      contentHash({ a: { c: null, d: [1, 2] }, b: 1 })
    );
    expect(contentHash({ a: [1, 2] })).not.toBe(contentHash({ a: [2, 1] }));
  });
});
