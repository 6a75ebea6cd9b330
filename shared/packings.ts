/**
 * Circle packing tables.
 *
 * data/packings.json holds, for every packing type and circle count, the
 * centres and radii of circles packed into the unit disk (see
 * scripts/generate-packings.ts). The table is parsed and frozen once at
 * module load and only read afterwards.
 */

import packingData from '../data/packings.json';
import { InvalidConfigError, UnsupportedSymbolCountError } from './errors';
import { CirclePacking, PACKING_TYPES, PackedCircle, PackingType } from './types';

// ============================================
// RADIUS PROFILES
// ============================================

interface RadiusProfile {
  /** Unnormalised radius of the i-th circle (i starts at 1) */
  radius: (i: number) => number;
  monotonicity: 'increasing' | 'decreasing';
}

export const RADIUS_PROFILES: Readonly<Record<PackingType, RadiusProfile>> = {
  cci: { radius: () => 1, monotonicity: 'increasing' },
  ccib: { radius: i => i ** (-1 / 5), monotonicity: 'decreasing' },
  ccic: { radius: i => i ** (-2 / 3), monotonicity: 'decreasing' },
  ccir: { radius: i => i ** (1 / 2), monotonicity: 'increasing' },
  ccis: { radius: i => i ** (-1 / 2), monotonicity: 'decreasing' },
};

/**
 * Radii of an n-circle packing relative to its largest circle, in
 * increasing order (the order the tables list circles in).
 */
export function relativeRadii(type: PackingType, n: number): number[] {
  const values = Array.from({ length: n }, (_, i) => RADIUS_PROFILES[type].radius(i + 1));
  values.sort((a, b) => a - b);
  const largest = values[values.length - 1];
  return values.map(v => v / largest);
}

// ============================================
// TABLE LOADING
// ============================================

export function isPackingType(value: string): value is PackingType {
  return PACKING_TYPES.some(type => type === value);
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isCircleTuple = (value: unknown): value is [number, number, number] =>
  Array.isArray(value) &&
  value.length === 3 &&
  value.every(v => typeof v === 'number' && Number.isFinite(v));

function parseTable(raw: unknown): Map<PackingType, Map<number, CirclePacking>> {
  if (!isRecord(raw)) {
    throw new Error('Packing table must be an object keyed by packing type');
  }

  const table = new Map<PackingType, Map<number, CirclePacking>>();
  for (const [type, entries] of Object.entries(raw)) {
    if (!isPackingType(type)) {
      throw new Error(`Packing table contains unknown packing type '${type}'`);
    }
    if (!isRecord(entries)) {
      throw new Error(`Packing table entry '${type}' must be an object`);
    }

    const bySize = new Map<number, CirclePacking>();
    for (const [key, circles] of Object.entries(entries)) {
      const size = Number(key);
      if (!Number.isInteger(size) || size < 1 || !Array.isArray(circles) || circles.length !== size) {
        throw new Error(`Malformed '${type}' packing for ${key} circles`);
      }
      const parsed: PackedCircle[] = circles.map(circle => {
        if (!isCircleTuple(circle)) {
          throw new Error(`Malformed circle in '${type}' packing for ${key} circles`);
        }
        const [x, y, r] = circle;
        return Object.freeze({ x, y, r });
      });
      bySize.set(size, Object.freeze({ type, size, circles: Object.freeze(parsed) }));
    }
    table.set(type, bySize);
  }
  return table;
}

const PACKINGS = parseTable(packingData);

// ============================================
// LOOKUP
// ============================================

/**
 * Get the packing of `size` circles of the given type.
 * Throws UnsupportedSymbolCountError when the table has no such entry.
 */
export function getPacking(size: number, type: PackingType = 'cci'): CirclePacking {
  if (!isPackingType(type)) {
    throw new InvalidConfigError(`Unknown packing type '${String(type)}'`);
  }
  const packing = PACKINGS.get(type)?.get(size);
  if (!packing) {
    throw new UnsupportedSymbolCountError(size, type);
  }
  return packing;
}

export function hasPacking(size: number, type: PackingType = 'cci'): boolean {
  return PACKINGS.get(type)?.has(size) ?? false;
}

/** Circle counts the table covers for a packing type, ascending */
export function availableSizes(type: PackingType = 'cci'): number[] {
  return [...(PACKINGS.get(type)?.keys() ?? [])].sort((a, b) => a - b);
}
