import { LayoutConfig } from './shared/types';

// Default layout parameters: symbols keep 70-100% of their slot, drift by up
// to half of the freed space, and take any rotation
export const DEFAULT_LAYOUT_CONFIG: Readonly<LayoutConfig> = {
  minRadiusScale: 0.7,
  maxRadiusScale: 1,
  jitter: 0.5,
  rotationRange: 360,
  shuffle: false,
  packing: 'cci',
};

// Default card image parameters
export const DEFAULT_CARD_PARAMS = {
  /** Width and height of the square card image in pixels */
  size: 1024,
  /** Share of each slot left empty around its symbol, in [0, 1) */
  padding: 0.1,
} as const;

// Default deck parameters (8 symbols per card = order-7 plane, 57 cards)
export const DEFAULT_DECK_PARAMS = {
  name: 'my-dobble-deck',
  symbolsPerCard: 8,
  cardSetId: 'classic',
} as const;

/** Slack allowed when checking placed circles for overlap */
export const LAYOUT_TOLERANCE = 1e-9;
