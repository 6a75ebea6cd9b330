import { describe, it, expect } from 'vitest';
import { createSeededRng, deriveSeed, randInt, uniform } from '../../shared/rng';

const draw = (seed: number, count: number): number[] => {
  const rng = createSeededRng(seed);
  return Array.from({ length: count }, () => rng.random());
};

describe('createSeededRng', () => {
  it('should repeat the same sequence for the same seed', () => {
    expect(draw(42, 10)).toEqual(draw(42, 10));
  });

  it('should give different sequences for different seeds', () => {
    expect(draw(1, 5)).not.toEqual(draw(2, 5));
  });

  it('should stay within [0, 1)', () => {
    for (const value of draw(7, 1000)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('deriveSeed', () => {
  it('should be deterministic and vary with the index', () => {
    expect(deriveSeed(42, 3)).toBe(deriveSeed(42, 3));
    const seeds = new Set(Array.from({ length: 100 }, (_, i) => deriveSeed(42, i)));
    expect(seeds.size).toBe(100);
  });

  it('should return unsigned 32-bit integers', () => {
    const seed = deriveSeed(-5, 0);
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThan(2 ** 32);
  });
});

describe('uniform / randInt', () => {
  const fixed = (value: number) => ({ random: () => value });

  it('should map the unit interval onto the range', () => {
    expect(uniform(fixed(0), 0.7, 1)).toBe(0.7);
    expect(uniform(fixed(0.5), 2, 4)).toBe(3);
  });

  it('should floor to an index below the bound', () => {
    expect(randInt(fixed(0), 5)).toBe(0);
    expect(randInt(fixed(0.99), 5)).toBe(4);
  });
});
