import { describe, expect, it } from 'vitest';
import { extractJSON } from '../json.js';

describe('extractJSON', () => {
  it('parses raw JSON', () => {
    expect(extractJSON('{"a": 1}')).toEqual({ a: 1 });
  });

  it('parses a fenced code block', () => {
    expect(extractJSON('Here you go:\n```json\n{"a": [1, 2]}\n```\nThanks')).toEqual({ a: [1, 2] });
  });

  it('parses the outermost object inside prose', () => {
    expect(extractJSON('Result: {"a": {"b": true}} done')).toEqual({ a: { b: true } });
  });

  it('throws when nothing parses', () => {
    expect(() => extractJSON('no json here')).toThrow('Failed to parse JSON from LLM response: no json here...');
  });
});
