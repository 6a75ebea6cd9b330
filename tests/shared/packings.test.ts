import { describe, it, expect } from 'vitest';
import {
  availableSizes,
  getPacking,
  hasPacking,
  isPackingType,
  relativeRadii,
} from '../../shared/packings';
import { UnsupportedSymbolCountError } from '../../shared/errors';
import { PACKING_TYPES } from '../../shared/types';

const SIZES = Array.from({ length: 24 }, (_, i) => i + 1);

describe('packing table', () => {
  it.each(PACKING_TYPES)('should cover 1 to 24 circles for %s', type => {
    expect(availableSizes(type)).toEqual(SIZES);
  });

  it.each(PACKING_TYPES)('should keep every %s circle inside the disk and apart', type => {
    for (const size of SIZES) {
      const { circles } = getPacking(size, type);
      expect(circles).toHaveLength(size);

      for (const c of circles) {
        expect(Math.hypot(c.x, c.y) + c.r).toBeLessThanOrEqual(1 + 1e-9);
      }
      for (let i = 0; i < circles.length; i++) {
        for (let j = i + 1; j < circles.length; j++) {
          const dist = Math.hypot(circles[i].x - circles[j].x, circles[i].y - circles[j].y);
          expect(dist + 1e-9).toBeGreaterThanOrEqual(circles[i].r + circles[j].r);
        }
      }
    }
  });

  it.each(PACKING_TYPES)('should list %s circles by increasing radius in profile proportions', type => {
    for (const size of SIZES) {
      const radii = getPacking(size, type).circles.map(c => c.r);
      const largest = radii[radii.length - 1];
      expect([...radii].sort((a, b) => a - b)).toEqual(radii);
      relativeRadii(type, size).forEach((expected, i) => {
        expect(radii[i] / largest).toBeCloseTo(expected, 3);
      });
    }
  });

  it('should place a single circle over the whole card', () => {
    expect(getPacking(1).circles).toEqual([{ x: 0, y: 0, r: 1 }]);
  });

  it('should return the stored cci entry for 3 circles', () => {
    expect(getPacking(3, 'cci').circles[0]).toEqual({ x: 0.238307, y: 0.479028, r: 0.46297 });
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(getPacking(5, 'ccir').circles)).toBe(true);
  });
});

describe('getPacking', () => {
  it('should throw for counts outside the table', () => {
    expect(() => getPacking(25)).toThrow(UnsupportedSymbolCountError);
    expect(() => getPacking(0, 'ccib')).toThrow("No 'ccib' packing available for 0 symbols");
  });

  it('should report availability', () => {
    expect(hasPacking(24, 'ccis')).toBe(true);
    expect(hasPacking(25, 'ccis')).toBe(false);
  });
});

describe('relativeRadii', () => {
  it('should normalise the largest radius to 1', () => {
    expect(relativeRadii('cci', 3)).toEqual([1, 1, 1]);
    const radii = relativeRadii('ccir', 4);
    [0.5, Math.SQRT1_2, Math.sqrt(3) / 2, 1].forEach((expected, i) => {
      expect(radii[i]).toBeCloseTo(expected, 12);
    });
  });

  it('should sort decreasing profiles ascending', () => {
    const radii = relativeRadii('ccis', 4);
    expect(radii[0]).toBeCloseTo(0.5, 12);
    expect(radii[3]).toBe(1);
  });
});

describe('isPackingType', () => {
  it('should accept the known types only', () => {
    expect(PACKING_TYPES.every(isPackingType)).toBe(true);
    expect(isPackingType('random')).toBe(false);
    expect(isPackingType('ccx')).toBe(false);
  });
});
