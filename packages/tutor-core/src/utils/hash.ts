/**
 * Hashing utilities
 */

import { createHash } from 'node:crypto';

/**
 * Compute SHA256 hash for string content
 */
export function sha256(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * First 16 hex chars of the SHA256, enough for cache keys and point ids
 */
export function shortHash(content: string): string {
  return sha256(content).substring(0, 16);
}

/**
 * Hash of a JSON-like value with object keys sorted, so that
 * `{a, b}` and `{b, a}` produce the same fingerprint.
 */
export function fingerprint(value: unknown): string {
  return shortHash(stableStringify(value));
}

function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'undefined';
  }
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
}
