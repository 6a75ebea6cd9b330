// Re-export all types from shared/types for top-level imports
export {
  type SymbolItem,
  type DesignCard,
  type Deck,
  type CardData,
  type CardSet,
  type DeckIntegrityViolation,
  type DeckIntegrityReport,
  DeckConstruction,
  type PackingType,
  type PackingChoice,
  type PackedCircle,
  type CirclePacking,
  type LayoutConfig,
  type SymbolPlacement,
  type CardLayout,
  type PixelPlacement,
  PACKING_TYPES,
} from './shared/types';
