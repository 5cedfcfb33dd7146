import { cosineSimilarity, isZeroVector, l2Norm } from './similarity';

describe('cosineSimilarity', () => {
  it('scores identical vectors as 1', () => {
    expect(cosineSimilarity([0.6, 0.8], [0.6, 0.8])).toBe(1);
  });

  it('scores orthogonal vectors as 0', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('clamps opposite vectors to 0', () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(0);
  });

  it('returns 0 when either side has zero norm', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], new Float32Array(3))).toBe(0);
  });

  it('is symmetric', () => {
    const a = [1, 2, 3];
    const b = [4, 5, 6];
    expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
    expect(cosineSimilarity(a, b)).toBeCloseTo(32 / (Math.sqrt(14) * Math.sqrt(77)), 10);
  });

  it('rejects vectors of different widths', () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow(
      'Embedding dimension mismatch: 2 vs 3',
    );
  });
});

describe('vector helpers', () => {
  it('computes the euclidean norm', () => {
    expect(l2Norm([3, 4])).toBe(5);
    expect(l2Norm([])).toBe(0);
  });

  it('detects the zero vector', () => {
    expect(isZeroVector(new Float32Array(384))).toBe(true);
    expect(isZeroVector([0, 0, 1e-12])).toBe(false);
  });
});
