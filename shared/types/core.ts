// ============================================
// CORE TYPES (deck design and symbol sets)
// ============================================

export interface SymbolItem {
  id: number; // Symbol identifier (index within its set)
  char: string; // Emoji character (empty string for image-only sets)
  name: string; // Human-readable name (used for alt text and CSV output)
  imageUrl?: string; // Optional image path or data URI
}

/** A design-level card: ascending, distinct symbol indices */
export type DesignCard = readonly number[];

// How a deck design was obtained
export enum DeckConstruction {
  PROJECTIVE_PLANE = 'projective-plane', // order n = k - 1 is a prime power
  TRIANGLE = 'triangle', // degenerate plane of order 1 (k = 2)
  PADDED_PLANE = 'padded-plane', // smaller plane plus private symbols per card
}

export interface Deck {
  /** Order of the projective plane the cards come from */
  order: number;
  symbolsPerCard: number;
  /** Number of distinct symbols used across the deck */
  symbolCount: number;
  construction: DeckConstruction;
  cards: readonly DesignCard[];
}

/** A card whose symbol indices have been mapped onto a symbol set */
export interface CardData {
  id: number;
  symbols: SymbolItem[];
}

// Symbol set definition
export interface CardSet {
  id: string; // Unique identifier (e.g., 'classic', 'animals')
  name: string; // Display name
  description: string; // Short description for listings
  symbols: readonly SymbolItem[];
  isBuiltIn: boolean; // true for bundled sets, false for custom
}

export interface DeckIntegrityViolation {
  /** Index of the first card in the checked array */
  a: number;
  /** Index of the second card in the checked array */
  b: number;
  /** Symbol ids the two cards have in common */
  common: number[];
}

export interface DeckIntegrityReport {
  valid: boolean;
  cardCount: number;
  pairsChecked: number;
  violations: DeckIntegrityViolation[];
}
