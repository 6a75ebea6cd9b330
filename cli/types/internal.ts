/**
 * Internal types for the deck generator CLI
 * These are not shared with library consumers
 */

import { CardLayout, LayoutConfig, SymbolItem } from '../../shared/types';

// ============================================
// CONFIGURATION
// ============================================

/** Where the deck's symbols come from */
export type SymbolSource =
  | { kind: 'set'; id: string }
  | { kind: 'emojis'; file: string }
  | { kind: 'images'; dir: string };

export interface CliConfig {
  /** Deck name, used for the output directory and card file names */
  name: string;
  /** Directory the deck directory is created in */
  outDir: string;
  symbolsPerCard: number;
  source: SymbolSource;
  /** Card image size in pixels */
  size: number;
  padding: number;
  layout: LayoutConfig;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'generate'; config: CliConfig };

// ============================================
// OUTPUT
// ============================================

export interface RenderedCard {
  /** 1-based position of the card in the deck */
  number: number;
  layout: CardLayout;
  svg: string;
}

export interface DeckFiles {
  deckDir: string;
  cardFiles: string[];
  deckCsv: string;
  symbolsCsv: string;
}

export interface DeckSummary extends DeckFiles {
  cardCount: number;
  symbolCount: number;
  /** Symbols of the source set left out of the deck */
  unusedSymbols: SymbolItem[];
}
