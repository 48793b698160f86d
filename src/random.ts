// =============================================================================
// Random Source
// Seedable generator so synthetic data can be reproduced in tests
// =============================================================================

export interface RandomSource {
  /** Uniform draw in [0, 1) */
  next(): number;
}

/**
 * Mulberry32: small, fast, good enough for mock data
 */
export function mulberry32(seed: number): RandomSource {
  let t = seed >>> 0;
  return {
    next() {
      t += 0x6d2b79f5;
      let x = Math.imul(t ^ (t >>> 15), 1 | t);
      x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
      return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Create a random source. Without a seed the wall clock is used,
 * so every process sees a different stream.
 */
export function createRandomSource(seed?: number): RandomSource {
  return mulberry32(seed ?? Date.now());
}

export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + (max - min) * rng.next();
}

/**
 * Integer in [min, max], both ends inclusive
 */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min + 1));
}

export function pick<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return items[Math.floor(rng.next() * items.length)];
}

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
