/**
 * 32-bit polynomial string hash (`h = 31 * h + charCode`) over UTF-16 code
 * units. Depends only on the string contents, so buckets are identical
 * across processes and platforms.
 */
export function stableHash(value: string): number {
  let h = 0;
  for (let i = 0; i < value.length; i++) {
    h = (Math.imul(31, h) + value.charCodeAt(i)) | 0;
  }
  return h;
}

/** Non-negative bucket index for `value` in a vector of `buckets` slots. */
export function bucketOf(value: string, buckets: number): number {
  const remainder = stableHash(value) % buckets;
  return remainder < 0 ? remainder + buckets : remainder;
}
