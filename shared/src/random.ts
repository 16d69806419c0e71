import { randomBytes, randomInt } from 'crypto';
import { sha256 } from '@noble/hashes/sha256';

export interface RandomSource {
  bytes(length: number): Uint8Array;
  /** Uniform integer in [0, maxExclusive). */
  int(maxExclusive: number): number;
}

export const systemRandom: RandomSource = {
  bytes: (length) => new Uint8Array(randomBytes(length)),
  int: (maxExclusive) => (maxExclusive <= 1 ? 0 : randomInt(maxExclusive)),
};

/**
 * Deterministic source for reproducible fixtures: SHA-256 over seed || counter.
 * Never use it for credentials that leave a test.
 */
export function seededRandom(seed: string | number): RandomSource {
  const seedBytes = new TextEncoder().encode(String(seed));
  let counter = 0;
  let pool = new Uint8Array(0);

  function refill() {
    const block = new Uint8Array(seedBytes.length + 4);
    block.set(seedBytes, 0);
    new DataView(block.buffer).setUint32(seedBytes.length, counter++);
    const next = new Uint8Array(pool.length + 32);
    next.set(pool, 0);
    next.set(sha256(block), pool.length);
    pool = next;
  }

  function bytes(length: number): Uint8Array {
    while (pool.length < length) refill();
    const out = pool.slice(0, length);
    pool = pool.slice(length);
    return out;
  }

  return {
    bytes,
    int(maxExclusive) {
      if (maxExclusive <= 1) return 0;
      const word = new DataView(bytes(4).buffer).getUint32(0);
      return word % maxExclusive;
    },
  };
}
