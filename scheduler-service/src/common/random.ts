/**
 * Seedable pseudo-random source.
 *
 * Everything in the engine that needs randomness (schedule jitter, random
 * account sampling, backoff jitter) takes a `RandomSource` so tests can pin
 * the sequence with a seed.
 */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

export type RandomFactory = (seed: string | number) => RandomSource;

// xmur3 string hash, used to turn arbitrary seeds into a 32-bit state.
function hashSeed(seed: string): number {
  let h = 1779033703 ^ seed.length;
  for (let i = 0; i < seed.length; i++) {
    h = Math.imul(h ^ seed.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  h = Math.imul(h ^ (h >>> 16), 2246822507);
  h = Math.imul(h ^ (h >>> 13), 3266489909);
  return (h ^= h >>> 16) >>> 0;
}

/** mulberry32 generator. */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: string | number) {
    this.state = hashSeed(String(seed));
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export const createSeededRandom: RandomFactory = (seed) => new SeededRandom(seed);

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random.next();
}

/** Sample `count` items without replacement (partial Fisher-Yates). */
export function sampleWithoutReplacement<T>(
  random: RandomSource,
  items: readonly T[],
  count: number,
): T[] {
  const pool = [...items];
  const take = Math.min(count, pool.length);
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random.next() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
}
