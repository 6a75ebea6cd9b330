/**
 * Random sources. All randomness in deck building and layout goes through
 * the Rng interface so that seeded runs are reproducible.
 */

export interface Rng {
  /** Uniform value in [0, 1) */
  random(): number;
}

export const defaultRng: Rng = {
  random: () => Math.random(),
};

/** Seeds are 32-bit: valid seeds lie in [0, SEED_LIMIT) */
export const SEED_LIMIT = 2 ** 32;

// Seeded random number generator (mulberry32) - same seed, same sequence
export function createSeededRng(seed: number): Rng {
  let state = seed >>> 0;
  return {
    random: () => {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Independent seed for the index-th item of a seeded run, so that each card
 * can be laid out on its own stream (and in any order).
 */
export function deriveSeed(seed: number, index: number): number {
  let h = (seed ^ Math.imul(index + 1, 0x9e3779b1)) >>> 0;
  h = Math.imul(h ^ (h >>> 16), 0x85ebca6b) >>> 0;
  h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35) >>> 0;
  return (h ^ (h >>> 16)) >>> 0;
}

/** Uniform value in [min, max) */
export const uniform = (rng: Rng, min: number, max: number): number =>
  min + rng.random() * (max - min);

/** Uniform integer in [0, maxExclusive) */
export const randInt = (rng: Rng, maxExclusive: number): number =>
  Math.floor(rng.random() * maxExclusive);
