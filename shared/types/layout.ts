// ============================================
// LAYOUT TYPES (circle packings and card layouts)
// ============================================

import type { SymbolItem } from './core';

export const PACKING_TYPES = ['cci', 'ccib', 'ccic', 'ccir', 'ccis'] as const;

/**
 * Circle packing families:
 * - cci: congruent circles
 * - ccib: radii proportional to i^(-1/5)
 * - ccic: radii proportional to i^(-2/3)
 * - ccir: radii proportional to sqrt(i)
 * - ccis: radii proportional to i^(-1/2)
 */
export type PackingType = (typeof PACKING_TYPES)[number];

/** 'random' picks one packing type per card */
export type PackingChoice = PackingType | 'random';

export interface PackedCircle {
  x: number;
  y: number;
  r: number;
}

/** n circles inside the unit disk, listed by increasing radius */
export interface CirclePacking {
  type: PackingType;
  size: number;
  circles: readonly PackedCircle[];
}

export interface LayoutConfig {
  /** Lower bound of the per-symbol radius factor (relative to its slot) */
  minRadiusScale: number;
  /** Upper bound of the per-symbol radius factor (relative to its slot) */
  maxRadiusScale: number;
  /** Fraction of a slot's free space a symbol may drift by, in [0, 1] */
  jitter: number;
  /** Rotation range in degrees, in [0, 360] */
  rotationRange: number;
  /** Seed for reproducible layouts; Math.random is used when absent */
  randomSeed?: number;
  /** Shuffle which symbol lands in which slot */
  shuffle: boolean;
  packing: PackingChoice;
}

export interface SymbolPlacement {
  symbol: SymbolItem;
  /** Centre in card-local coordinates (unit disk centred at the origin) */
  x: number;
  y: number;
  radius: number;
  /** Counterclockwise rotation of the symbol in degrees */
  rotation: number;
  /** Index of the packing slot the symbol occupies */
  slot: number;
  slotRadius: number;
  scale: number;
}

export interface CardLayout {
  cardId: number;
  packing: PackingType;
  size: number;
  /** Rotation applied to the whole packing, in degrees */
  rotation: number;
  placements: SymbolPlacement[];
}

export interface PixelPlacement {
  symbol: SymbolItem;
  cx: number;
  cy: number;
  radius: number;
  rotation: number;
}
