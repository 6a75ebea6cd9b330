/**
 * Layout Packer
 *
 * Places a card's symbols on the card: every symbol takes one circle of a
 * precomputed packing, shrinks by a random factor, drifts inside the room it
 * freed and gets a random rotation. The whole packing is also rotated about
 * the card centre so cards with the same symbol count look different.
 *
 * Coordinates are card-local: the card is the unit disk centred at the origin.
 */

import { DEFAULT_LAYOUT_CONFIG, LAYOUT_TOLERANCE } from '../constants';
import { InvalidCardError, InvalidConfigError, LayoutOverlapError } from './errors';
import { shuffle } from './gameLogic';
import { getPacking, isPackingType } from './packings';
import { Rng, SEED_LIMIT, createSeededRng, defaultRng, deriveSeed, randInt } from './rng';
import {
  CardData,
  CardLayout,
  LayoutConfig,
  PACKING_TYPES,
  PackingType,
  PixelPlacement,
  SymbolPlacement,
} from './types';

// ============================================
// CONFIGURATION
// ============================================

const requireFinite = (name: string, value: number): void => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidConfigError(`${name} must be a finite number, got ${String(value)}`);
  }
};

/**
 * Merge a partial config over the defaults and validate it.
 * Throws InvalidConfigError on malformed values.
 */
export function resolveLayoutConfig(config: Partial<LayoutConfig> = {}): LayoutConfig {
  const resolved: LayoutConfig = { ...DEFAULT_LAYOUT_CONFIG, ...config };
  const { minRadiusScale, maxRadiusScale, jitter, rotationRange, randomSeed, packing } = resolved;

  requireFinite('minRadiusScale', minRadiusScale);
  requireFinite('maxRadiusScale', maxRadiusScale);
  requireFinite('jitter', jitter);
  requireFinite('rotationRange', rotationRange);

  if (minRadiusScale <= 0) {
    throw new InvalidConfigError(`minRadiusScale must be positive, got ${minRadiusScale}`);
  }
  if (minRadiusScale > maxRadiusScale) {
    throw new InvalidConfigError(
      `minRadiusScale (${minRadiusScale}) must not exceed maxRadiusScale (${maxRadiusScale})`
    );
  }
  if (jitter < 0 || jitter > 1) {
    throw new InvalidConfigError(`jitter must be in [0, 1], got ${jitter}`);
  }
  if (rotationRange < 0 || rotationRange > 360) {
    throw new InvalidConfigError(`rotationRange must be in [0, 360], got ${rotationRange}`);
  }
  if (
    randomSeed !== undefined &&
    !(Number.isInteger(randomSeed) && randomSeed >= 0 && randomSeed < SEED_LIMIT)
  ) {
    throw new InvalidConfigError(
      `randomSeed must be an integer in [0, ${SEED_LIMIT}), got ${String(randomSeed)}`
    );
  }
  if (packing !== 'random' && !isPackingType(packing)) {
    throw new InvalidConfigError(
      `Unknown packing '${String(packing)}' (available: ${PACKING_TYPES.join(', ')}, random)`
    );
  }

  return resolved;
}

// ============================================
// VERIFICATION
// ============================================

/**
 * Check that every circle lies inside the unit disk and that no two circles
 * overlap. Throws LayoutOverlapError on the first violation found.
 */
export function verifyLayout(layout: CardLayout): void {
  const { placements, cardId } = layout;

  for (const p of placements) {
    const reach = Math.hypot(p.x, p.y) + p.radius;
    if (reach > 1 + LAYOUT_TOLERANCE) {
      throw new LayoutOverlapError(
        cardId,
        `symbol ${p.symbol.id} extends past the card edge (reach ${reach.toFixed(6)})`
      );
    }
  }

  for (let a = 0; a < placements.length; a++) {
    for (let b = a + 1; b < placements.length; b++) {
      const pa = placements[a];
      const pb = placements[b];
      const dist = Math.hypot(pa.x - pb.x, pa.y - pb.y);
      if (dist + LAYOUT_TOLERANCE < pa.radius + pb.radius) {
        throw new LayoutOverlapError(
          cardId,
          `symbols ${pa.symbol.id} and ${pb.symbol.id} overlap ` +
            `(distance ${dist.toFixed(6)} < ${(pa.radius + pb.radius).toFixed(6)})`
        );
      }
    }
  }
}

// ============================================
// LAYOUT
// ============================================

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

const pickPacking = (config: LayoutConfig, rng: Rng): PackingType =>
  config.packing === 'random' ? PACKING_TYPES[randInt(rng, PACKING_TYPES.length)] : config.packing;

/**
 * Compute the layout of one card.
 *
 * Randomness comes from `rng` when given, else from a generator seeded with
 * `config.randomSeed`, else from Math.random. Values are drawn in a fixed
 * order, so the same seed always yields the same layout.
 *
 * @throws InvalidConfigError for a malformed config
 * @throws InvalidCardError when the card repeats a symbol
 * @throws UnsupportedSymbolCountError when no packing exists for the card's symbol count
 * @throws LayoutOverlapError when the scaled circles do not fit
 */
export function layoutCard(card: CardData, config: Partial<LayoutConfig> = {}, rng?: Rng): CardLayout {
  const resolved = resolveLayoutConfig(config);
  const random =
    rng ?? (resolved.randomSeed !== undefined ? createSeededRng(resolved.randomSeed) : defaultRng);

  const ids = new Set(card.symbols.map(s => s.id));
  if (ids.size !== card.symbols.length) {
    throw new InvalidCardError(card.id, 'symbols must be distinct');
  }

  const packingType = pickPacking(resolved, random);
  const packing = getPacking(card.symbols.length, packingType);

  // Stable assignment by symbol id unless shuffling was requested
  const ordered = [...card.symbols].sort((a, b) => a.id - b.id);
  const slots = packing.circles.map((_, index) => index);
  const assignment = resolved.shuffle ? shuffle(slots, random) : slots;

  const rotation = random.random() * resolved.rotationRange;
  const cos = Math.cos(toRadians(rotation));
  const sin = Math.sin(toRadians(rotation));

  const placements: SymbolPlacement[] = ordered.map((symbol, index) => {
    const slot = assignment[index];
    const circle = packing.circles[slot];

    const scale =
      resolved.minRadiusScale + random.random() * (resolved.maxRadiusScale - resolved.minRadiusScale);
    const radius = circle.r * scale;

    // Drift within the slot: the circle never leaves the space its slot owns
    const drift = resolved.jitter * Math.max(0, circle.r - radius) * random.random();
    const heading = random.random() * 2 * Math.PI;

    return {
      symbol,
      x: circle.x * cos - circle.y * sin + drift * Math.cos(heading),
      y: circle.x * sin + circle.y * cos + drift * Math.sin(heading),
      radius,
      rotation: random.random() * resolved.rotationRange,
      slot,
      slotRadius: circle.r,
      scale,
    };
  });

  const layout: CardLayout = {
    cardId: card.id,
    packing: packingType,
    size: packing.size,
    rotation,
    placements,
  };

  verifyLayout(layout);
  return layout;
}

/**
 * Lay out every card of a deck. With a seed, card i uses its own stream
 * seeded by deriveSeed(seed, i), so any card can be recomputed on its own.
 */
export function layoutDeck(cards: readonly CardData[], config: Partial<LayoutConfig> = {}): CardLayout[] {
  const resolved = resolveLayoutConfig(config);
  const { randomSeed } = resolved;

  return cards.map((card, index) =>
    layoutCard(
      card,
      randomSeed === undefined ? resolved : { ...resolved, randomSeed: deriveSeed(randomSeed, index) }
    )
  );
}

/**
 * Convert card-local placements to pixel positions on a square image of
 * `imageSize` pixels (origin top-left).
 */
export function toPixelPlacements(layout: CardLayout, imageSize: number): PixelPlacement[] {
  if (!Number.isInteger(imageSize) || imageSize < 1) {
    throw new InvalidConfigError(`Image size must be a positive integer, got ${imageSize}`);
  }

  return layout.placements.map(p => ({
    symbol: p.symbol,
    cx: Math.floor((p.x / 2 + 0.5) * imageSize),
    cy: Math.floor((p.y / 2 + 0.5) * imageSize),
    radius: Math.floor((p.radius / 2) * imageSize),
    rotation: p.rotation,
  }));
}
