import { describe, expect, it } from 'vitest';
import { cosineSimilarity } from '@studyhall/tutor-core';
import { createDeterministicEmbeddingProvider } from '../providers/deterministic.js';

describe('createDeterministicEmbeddingProvider', () => {
  const provider = createDeterministicEmbeddingProvider({ dimension: 128 });

  it('produces unit vectors of the configured dimension', async () => {
    const [vector] = await provider.embed(['Explain quadratic equations']);
    expect(vector?.dim).toBe(128);
    expect(vector?.values).toHaveLength(128);
    const norm = Math.sqrt((vector?.values ?? []).reduce((acc, v) => acc + v * v, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it('is stable and ignores case and punctuation', async () => {
    const [a, b] = await provider.embed(['Explain quadratic equations', '  explain QUADRATIC equations?']);
    expect(a?.values).toEqual(b?.values);
  });

  it('places texts sharing words closer than unrelated texts', async () => {
    const [base, related, unrelated] = await provider.embed([
      'Explain quadratic equations',
      'Explain quadratic equation roots',
      'Photosynthesis in green plants',
    ]);
    const close = cosineSimilarity(base?.values ?? [], related?.values ?? []);
    const far = cosineSimilarity(base?.values ?? [], unrelated?.values ?? []);
    expect(close).toBeGreaterThan(far);
    expect(close).toBeGreaterThan(0.5);
  });

  it('returns a zero vector for empty text', async () => {
    const [vector] = await provider.embed(['   ']);
    expect(vector?.values.every(v => v === 0)).toBe(true);
  });
});
