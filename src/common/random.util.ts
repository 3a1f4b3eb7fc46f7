import { createHash } from 'crypto';

/** Returns floats in [0, 1). */
export type RandomSource = () => number;

// sha256(seed:counter) -> first 32 bits; same seed, same sequence.
export function seededRandom(seed: number): RandomSource {
  let counter = 0;
  return () => {
    const h = createHash('sha256').update(`${seed}:${counter++}`).digest();
    return h.readUInt32BE(0) / 0x1_0000_0000;
  };
}

export function createRandom(seed?: number): RandomSource {
  return seed === undefined ? Math.random : seededRandom(seed);
}

/**
 * Uniform sample of `k` items without replacement (partial Fisher-Yates).
 * Takes everything when fewer than `k` items are available.
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  k: number,
  random: RandomSource,
): T[] {
  const pool = items.slice();
  const n = Math.min(Math.max(0, Math.floor(k)), pool.length);
  for (let i = 0; i < n; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, n);
}
