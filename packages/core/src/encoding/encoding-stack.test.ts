import { describe, it, expect } from 'vitest';
import { parseEncodingStack, decodeOrder, isEmptyStack } from './encoding-stack.js';

describe('parseEncodingStack', () => {
  it('returns an empty stack for a missing header', () => {
    expect(parseEncodingStack(undefined).tokens).toEqual([]);
    expect(parseEncodingStack(null).tokens).toEqual([]);
    expect(parseEncodingStack('').tokens).toEqual([]);
  });

  it('parses a single token', () => {
    expect(parseEncodingStack('gzip').tokens).toEqual(['gzip']);
  });

  it('trims whitespace and lowercases tokens', () => {
    expect(parseEncodingStack('  GZip ,  BR').tokens).toEqual(['gzip', 'br']);
  });

  it('drops identity tokens', () => {
    expect(parseEncodingStack('gzip, identity').tokens).toEqual(['gzip']);
    expect(parseEncodingStack('Identity').tokens).toEqual([]);
  });

  it('skips empty tokens from doubled commas', () => {
    expect(parseEncodingStack('deflate,, ,gzip').tokens).toEqual(['deflate', 'gzip']);
  });

  it('can be empty even though a header was present', () => {
    const stack = parseEncodingStack(' , identity ,');
    expect(isEmptyStack(stack)).toBe(true);
  });

  it('normalizes x-gzip to gzip', () => {
    expect(parseEncodingStack('x-gzip').tokens).toEqual(['gzip']);
  });

  it('joins repeated header lines in order', () => {
    expect(parseEncodingStack(['deflate', 'gzip']).tokens).toEqual(['deflate', 'gzip']);
  });

  it('keeps unknown tokens so the caller can refuse the stack', () => {
    expect(parseEncodingStack('gzip, compress').tokens).toEqual(['gzip', 'compress']);
  });

  it('returns a frozen token list', () => {
    expect(Object.isFrozen(parseEncodingStack('gzip').tokens)).toBe(true);
  });
});

describe('decodeOrder', () => {
  it('reverses declaration order', () => {
    expect(decodeOrder(parseEncodingStack('deflate, gzip, br'))).toEqual(['br', 'gzip', 'deflate']);
  });

  it('does not mutate the stack', () => {
    const stack = parseEncodingStack('deflate, gzip');
    decodeOrder(stack);
    expect(stack.tokens).toEqual(['deflate', 'gzip']);
  });
});
