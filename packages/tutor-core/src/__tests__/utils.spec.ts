import { describe, it, expect } from 'vitest';
import { sha256, shortHash, fingerprint } from '../utils/hash.js';
import { normalizeQueryText, tokenize } from '../utils/text.js';

describe('Hash Utilities', () => {
  it('should compute SHA256 for string', () => {
    const hash = sha256('Hello world');
    expect(hash).toHaveLength(64);
    expect(hash).toMatch(/^[a-f0-9]+$/);
  });

  it('should shorten to 16 chars', () => {
    expect(shortHash('abc')).toBe(sha256('abc').substring(0, 16));
  });

  it('should fingerprint objects independent of key order', () => {
    expect(fingerprint({ tenantId: 't1', subject: 'algebra', grade: 8 }))
      .toBe(fingerprint({ grade: 8, subject: 'algebra', tenantId: 't1' }));
    expect(fingerprint({ tenantId: 't1', grade: 8 }))
      .not.toBe(fingerprint({ tenantId: 't1', grade: 9 }));
  });

  it('should ignore undefined fields', () => {
    expect(fingerprint({ a: 1, revision: undefined })).toBe(fingerprint({ a: 1 }));
  });
});

describe('Text Utilities', () => {
  it('should normalize case, whitespace and surrounding punctuation', () => {
    expect(normalizeQueryText('  Explain   Quadratic equations?! ')).toBe('explain quadratic equations');
  });

  it('should keep inner punctuation', () => {
    expect(normalizeQueryText('Solve x^2 = 4.')).toBe('solve x^2 = 4');
  });

  it('should tokenize letters and digits', () => {
    expect(tokenize('Solve x^2 = 4')).toEqual(['solve', 'x', '2', '4']);
    expect(tokenize('Поясни дроби')).toEqual(['поясни', 'дроби']);
  });
});
