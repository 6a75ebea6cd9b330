// Public API

export * from './types';
export * from './shared/errors';

export {
  generateDeck,
  deckSize,
  requiredSymbolCount,
  buildDeck,
  shuffle,
  checkMatch,
  findMatch,
  validateDeckIntegrity,
} from './shared/gameLogic';
export type { BuildDeckOptions } from './shared/gameLogic';

export { layoutCard, layoutDeck, resolveLayoutConfig, verifyLayout, toPixelPlacements } from './shared/layout';
export { getPacking, hasPacking, availableSizes, relativeRadii, RADIUS_PROFILES } from './shared/packings';
export { solvePacking } from './shared/packingSolver';

export {
  BUILT_IN_CARD_SETS,
  DEFAULT_CARD_SET_ID,
  createEmojiSymbols,
  createImageSymbols,
  getCardSetById,
  getSymbolsForCardSet,
  parseEmojiList,
} from './shared/cardSets';

export { SEED_LIMIT, createSeededRng, defaultRng, deriveSeed } from './shared/rng';
export type { Rng } from './shared/rng';

export { isPrimePower, primePowerOf, largestPrimePowerBelow } from './shared/primes';
export { GaloisField, getField } from './shared/finiteField';

export { renderCardSvg, defaultAssetProvider } from './utils/renderCard';
export type { AssetProvider, SymbolAsset, RenderCardOptions } from './utils/renderCard';
export { default as Card } from './components/Card';

export { DEFAULT_LAYOUT_CONFIG, DEFAULT_CARD_PARAMS, DEFAULT_DECK_PARAMS } from './constants';
