import { createHash } from 'crypto';

/**
 * A 64-bit hash as two unsigned 32-bit words, so that bit manipulation
 * stays in plain number arithmetic.
 */
export interface Hash64 {
  readonly hi: number;
  readonly lo: number;
}

/**
 * First 8 bytes (big-endian) of the SHA-256 digest of the UTF-8 bytes of `key`.
 */
export function hash64(key: string): Hash64 {
  const digest = createHash('sha256').update(key, 'utf8').digest();
  return {
    hi: digest.readUInt32BE(0),
    lo: digest.readUInt32BE(4),
  };
}
