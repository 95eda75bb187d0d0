import { describe, it, expect } from 'vitest';
import { cosineSimilarity, magnitude, normalize } from '../utils/math.js';

describe('cosineSimilarity', () => {
  it('returns 1 for identical vectors', () => {
    expect(cosineSimilarity([1, 2, 3], [1, 2, 3])).toBeCloseTo(1, 10);
  });

  it('returns 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('returns -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 2], [-1, -2])).toBeCloseTo(-1, 10);
  });

  it('handles known values', () => {
    expect(cosineSimilarity([1, 2, 3], [4, 5, 6])).toBeCloseTo(0.9746, 4);
  });

  it('returns 0 for mismatched lengths or zero vectors', () => {
    expect(cosineSimilarity([1, 2], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe('normalize', () => {
  it('scales to unit length', () => {
    expect(normalize([3, 4])).toEqual([0.6, 0.8]);
    expect(magnitude(normalize([2, 7, 1]))).toBeCloseTo(1, 10);
  });

  it('returns zero vectors unchanged', () => {
    expect(normalize([0, 0])).toEqual([0, 0]);
  });
});
