// Core types
export type {
  SymbolItem,
  DesignCard,
  Deck,
  CardData,
  CardSet,
  DeckIntegrityViolation,
  DeckIntegrityReport,
} from './core';

export { DeckConstruction } from './core';

// Layout types
export type {
  PackingType,
  PackingChoice,
  PackedCircle,
  CirclePacking,
  LayoutConfig,
  SymbolPlacement,
  CardLayout,
  PixelPlacement,
} from './layout';

export { PACKING_TYPES } from './layout';
