const C1 = 0xcc9e2d51;
const C2 = 0x1b873593;

function rotl32(x: number, r: number): number {
  return (x << r) | (x >>> (32 - r));
}

function mixKey(k: number): number {
  k = Math.imul(k, C1);
  k = rotl32(k, 15);
  return Math.imul(k, C2);
}

/**
 * MurmurHash3 x86_32 over the UTF-8 bytes of `key`.
 * Returns an unsigned 32-bit integer.
 */
export function murmur3(key: string, seed: number = 0): number {
  const data = Buffer.from(key, 'utf8');
  const length = data.length;
  const blockCount = length >>> 2;
  let h = seed >>> 0;

  for (let i = 0; i < blockCount; i++) {
    h ^= mixKey(data.readUInt32LE(i * 4));
    h = rotl32(h, 13);
    h = (Math.imul(h, 5) + 0xe6546b64) | 0;
  }

  const tail = blockCount * 4;
  const remaining = length & 3;
  if (remaining > 0) {
    let k = 0;
    if (remaining === 3) {
      k ^= data.readUInt8(tail + 2) << 16;
    }
    if (remaining >= 2) {
      k ^= data.readUInt8(tail + 1) << 8;
    }
    k ^= data.readUInt8(tail);
    h ^= mixKey(k);
  }

  // Finalization mix
  h ^= length;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;

  return h >>> 0;
}
