import { createHash } from 'node:crypto';
import { normalize, tokenize, type EmbeddingVector } from '@studyhall/tutor-core';
import type { EmbeddingProvider } from '../types.js';

const DEFAULT_DIMENSION = 256;
const TRIGRAM_WEIGHT = 0.5;

export interface DeterministicEmbeddingProviderOptions {
  dimension?: number;
}

/**
 * Deterministic embedding provider used for local development and tests.
 *
 * Signed feature hashing over word tokens and their character trigrams:
 * texts that share words land close together, identical normalized text
 * produces identical vectors, and results are stable between runs.
 */
export function createDeterministicEmbeddingProvider(
  options: DeterministicEmbeddingProviderOptions = {},
): EmbeddingProvider {
  const dimension = options.dimension ?? DEFAULT_DIMENSION;

  return {
    id: 'deterministic',
    dimension,
    async embed(texts: string[]) {
      return texts.map(text => createDeterministicVector(text, dimension));
    },
  };
}

function addFeature(values: number[], feature: string, weight: number): void {
  const hash = createHash('sha256').update(feature).digest();
  const index = hash.readUInt32BE(0) % values.length;
  const sign = (hash[4] ?? 0) & 1 ? 1 : -1;
  values[index] = (values[index] ?? 0) + sign * weight;
}

export function createDeterministicVector(text: string, dim: number): EmbeddingVector {
  const values = new Array<number>(dim).fill(0);

  for (const token of tokenize(text)) {
    addFeature(values, `w:${token}`, 1);
    const padded = `^${token}$`;
    for (let i = 0; i + 3 <= padded.length; i++) {
      addFeature(values, `c:${padded.slice(i, i + 3)}`, TRIGRAM_WEIGHT);
    }
  }

  return { dim, values: normalize(values) };
}
