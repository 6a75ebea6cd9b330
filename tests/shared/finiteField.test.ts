import { describe, it, expect } from 'vitest';
import { GaloisField, getField } from '../../shared/finiteField';

const elements = (q: number): number[] => Array.from({ length: q }, (_, i) => i);

describe('GaloisField', () => {
  it('should do modular arithmetic for prime orders', () => {
    const field = new GaloisField(7);
    expect(field.degree).toBe(1);
    expect(field.add(5, 4)).toBe(2);
    expect(field.mul(3, 5)).toBe(1);
    expect(field.mul(6, 6)).toBe(1);
  });

  it('should build GF(4) over x^2 + x + 1', () => {
    const field = new GaloisField(4);
    expect(field.prime).toBe(2);
    expect(field.degree).toBe(2);
    expect(field.modulus).toEqual([1, 1, 1]);
    expect(field.add(2, 3)).toBe(1);
    expect(field.mul(2, 2)).toBe(3);
    expect(field.mul(2, 3)).toBe(1);
  });

  it.each([4, 8, 9, 16, 25])('should give every non-zero element of GF(%i) an inverse', q => {
    const field = getField(q);
    for (const a of elements(q).slice(1)) {
      const inverses = elements(q).filter(b => field.mul(a, b) === 1);
      expect(inverses).toHaveLength(1);
    }
  });

  it.each([8, 9])('should distribute multiplication over addition in GF(%i)', q => {
    const field = getField(q);
    for (const a of elements(q)) {
      for (const b of elements(q)) {
        for (const c of elements(q)) {
          expect(field.mul(a, field.add(b, c))).toBe(field.add(field.mul(a, b), field.mul(a, c)));
        }
      }
    }
  });

  it('should reject orders that are not prime powers', () => {
    expect(() => new GaloisField(6)).toThrow(RangeError);
    expect(() => new GaloisField(1)).toThrow(RangeError);
  });

  it('should cache fields by order', () => {
    expect(getField(9)).toBe(getField(9));
  });
});
