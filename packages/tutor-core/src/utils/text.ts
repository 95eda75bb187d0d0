/**
 * Query text normalization shared by the cache key builder and the
 * local embedding provider.
 */

/**
 * Lowercase, collapse whitespace, strip surrounding punctuation.
 *
 * @example
 * normalizeQueryText('  Explain   Quadratic equations?! ') // 'explain quadratic equations'
 */
export function normalizeQueryText(text: string): string {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^[\p{P}\s]+|[\p{P}\s]+$/gu, '');
}

/**
 * Split normalized text into word tokens (letters and digits, any script)
 */
export function tokenize(text: string): string[] {
  return normalizeQueryText(text).match(/[\p{L}\p{N}]+/gu) ?? [];
}
