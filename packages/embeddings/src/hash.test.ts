import { describe, it, expect } from 'vitest';
import { bucketOf, stableHash } from './hash';

describe('stableHash', () => {
  it('matches the polynomial hash for short strings', () => {
    expect(stableHash('')).toBe(0);
    expect(stableHash('a')).toBe(97);
    expect(stableHash('ab')).toBe(97 * 31 + 98);
    expect(stableHash('abc')).toBe(96354);
  });

  it('wraps to signed 32-bit values', () => {
    // 31-bit overflow makes this one negative.
    expect(stableHash('polygenelubricants')).toBe(-2147483648);
  });

  it('is deterministic', () => {
    expect(stableHash('budget')).toBe(stableHash('budget'));
  });
});

describe('bucketOf', () => {
  it('is always within [0, buckets)', () => {
    for (const word of ['gate', 'code', 'roof', 'repair', 'polygenelubricants', 'dinner']) {
      const bucket = bucketOf(word, 384);
      expect(bucket).toBeGreaterThanOrEqual(0);
      expect(bucket).toBeLessThan(384);
      expect(Number.isInteger(bucket)).toBe(true);
    }
  });

  it('maps negative hashes with a floor modulus', () => {
    // -2147483648 mod 384 = 128 (since 2147483648 = 384 * 5592405 + 128)
    expect(bucketOf('polygenelubricants', 384)).toBe(384 - 128);
  });

  it('maps positive hashes with a plain modulus', () => {
    expect(bucketOf('abc', 384)).toBe(96354 % 384);
  });
});
