import { describe, it, expect } from 'vitest';
import { murmur3, hash64 } from '../src/hashing';

describe('murmur3', () => {
  it('matches the reference x86_32 vectors', () => {
    expect(murmur3('')).toBe(0);
    expect(murmur3('', 1)).toBe(0x514e28b7);
    expect(murmur3('foo')).toBe(4138058784);
    expect(murmur3('hello')).toBe(613153351);
  });

  it('gives different values for different seeds', () => {
    expect(murmur3('foo', 42)).toBe(2972666014);
    expect(murmur3('foo', 42)).not.toBe(murmur3('foo', 0));
  });

  it('always returns an unsigned 32-bit integer', () => {
    for (const key of ['a', 'ab', 'abc', 'abcd', 'abcde', 'пароль', '密码']) {
      const h = murmur3(key, 7);
      expect(Number.isInteger(h)).toBe(true);
      expect(h).toBeGreaterThanOrEqual(0);
      expect(h).toBeLessThan(2 ** 32);
    }
  });
});

describe('hash64', () => {
  it('takes the first 8 bytes of the SHA-256 digest', () => {
    expect(hash64('abc')).toEqual({ hi: 0xba7816bf, lo: 0x8f01cfea });
    expect(hash64('')).toEqual({ hi: 0xe3b0c442, lo: 0x98fc1c14 });
  });
});
