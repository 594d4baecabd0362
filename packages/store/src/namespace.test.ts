import { describe, it, expect } from 'vitest';
import { ConfigError } from '@embedcache/shared';
import { assertValidNamespace, chunk, quoteIdentifier } from './namespace';

describe('assertValidNamespace', () => {
  it.each(['emb_a', '_x', 'emb_local_hash_8_0123456789abcdef', 'a'.repeat(63)])(
    'accepts %s',
    (name) => {
      expect(() => assertValidNamespace(name)).not.toThrow();
    },
  );

  it.each(['', '1abc', 'emb-a', 'emb a', 'emb";drop', 'a'.repeat(64)])('rejects "%s"', (name) => {
    expect(() => assertValidNamespace(name)).toThrow(ConfigError);
  });
});

describe('quoteIdentifier', () => {
  it('wraps the name in double quotes and escapes embedded quotes', () => {
    expect(quoteIdentifier('emb_a')).toBe('"emb_a"');
    expect(quoteIdentifier('a"b')).toBe('"a""b"');
  });
});

describe('chunk', () => {
  it('splits into slices of at most the given size', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('returns no slices for an empty list', () => {
    expect(chunk([], 3)).toEqual([]);
  });
});
