/**
 * Tests for the token stream.
 */
import { describe, it, expect } from 'vitest';
import { TokenStream } from '../../../../src/core/tokens/token-stream.js';

describe('TokenStream', () => {
  it('should peek without consuming', () => {
    const stream = new TokenStream(['a', 'b', 'c']);

    expect(stream.peek()).toEqual({ index: 0, value: 'a' });
    expect(stream.peek(2)).toEqual({ index: 2, value: 'c' });
    expect(stream.peek(3)).toBeUndefined();
    expect(stream.unclaimed()).toHaveLength(3);
  });

  it('should consume in order and report the end', () => {
    const stream = new TokenStream(['a', 'b']);

    expect(stream.consume()?.value).toBe('a');
    expect(stream.consume()?.value).toBe('b');
    expect(stream.atEnd).toBe(true);
    expect(stream.consume()).toBeUndefined();
  });

  it('should only consume when the predicate holds', () => {
    const stream = new TokenStream(['--x', 'y']);

    expect(stream.consumeIf((token) => !token.value.startsWith('-'))).toBeUndefined();
    expect(stream.peek()?.value).toBe('--x');
    expect(stream.consumeIf((token) => token.value.startsWith('-'))?.value).toBe('--x');
  });

  it('should skip a token without claiming it', () => {
    const stream = new TokenStream(['keep', 'next']);

    stream.skip();

    expect(stream.peek()?.value).toBe('next');
    expect(stream.unclaimed().map((token) => token.value)).toEqual(['keep', 'next']);
  });

  it('should claim a token away from the cursor and keep the order of the rest', () => {
    const stream = new TokenStream(['a', 'b', 'c', 'd']);
    const third = stream.peek(2);
    expect(third?.value).toBe('c');

    expect(third && stream.claim(third)).toBe(true);

    expect(stream.unclaimed().map((token) => token.value)).toEqual(['a', 'b', 'd']);
    expect(stream.peek(2)?.value).toBe('d');
  });

  it('should refuse to claim the same token twice', () => {
    const stream = new TokenStream(['a']);
    const token = stream.consume();

    expect(token && stream.claim(token)).toBe(false);
  });

  it('should move the cursor over tokens claimed from under it', () => {
    const stream = new TokenStream(['a', 'b']);
    const first = stream.peek();
    if (first) stream.claim(first);

    expect(stream.peek()?.value).toBe('b');
  });

  it('should find the first match and stop at the stop token', () => {
    const stream = new TokenStream(['-x', 'v1', '--', 'v2']);

    expect(stream.find((token) => !token.value.startsWith('-'))?.value).toBe('v1');
    expect(
      stream.find(
        (token) => token.value === 'v2',
        (token) => token.value === '--'
      )
    ).toBeUndefined();
  });

  it('should drain everything from the cursor', () => {
    const stream = new TokenStream(['skip', 'x', 'y']);
    stream.skip();

    expect(stream.drain().map((token) => token.value)).toEqual(['x', 'y']);
    expect(stream.unclaimed().map((token) => token.value)).toEqual(['skip']);
    expect(stream.atEnd).toBe(true);
  });
});
