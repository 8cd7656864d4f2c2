/**
 * Randomness helpers shared by the resolvers.
 *
 * Every function takes a generator with the same contract as
 * Math.random (a value in [0, 1)) so tests can inject a seeded one.
 */

export type Rng = () => number;

/**
 * Create a deterministic RNG from a numeric seed.
 * Uses a simple linear congruential generator (LCG).
 */
export function createSeededRng(seed: number): Rng {
  let s = Math.floor(seed) >>> 0;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}

/**
 * Uniform integer in [min, max] (both inclusive).
 */
export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

/**
 * Shuffle an array in place using the Fisher-Yates algorithm.
 *
 * @returns The same array reference (mutated).
 */
export function shuffleInPlace<T>(items: T[], rng: Rng = Math.random): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}
