import {
  CardData,
  Deck,
  DeckConstruction,
  DeckIntegrityReport,
  DeckIntegrityViolation,
  DesignCard,
  SymbolItem,
} from './types';
import { InsufficientSymbolsError, InvalidConfigError, UnsupportedOrderError } from './errors';
import { getField } from './finiteField';
import { isPrimePower, largestPrimePowerBelow } from './primes';
import { Rng, defaultRng } from './rng';

const planeSize = (n: number): number => n * n + n + 1;

const assertSymbolsPerCard = (symbolsPerCard: number): void => {
  if (!Number.isInteger(symbolsPerCard) || symbolsPerCard < 2) {
    throw new UnsupportedOrderError(symbolsPerCard);
  }
};

// Projective plane of order N (N a prime power)
// Number of symbols per card = N + 1
// Total cards = N^2 + N + 1
// Total symbols needed = N^2 + N + 1
const buildPlane = (n: number): number[][] => {
  const field = getField(n);
  const cards: number[][] = [];

  // 1. Generate the first N+1 cards (the lines through symbol 0)
  for (let i = 0; i <= n; i++) {
    const card: number[] = [0];
    for (let j = 0; j < n; j++) {
      card.push((j + 1) + (i * n));
    }
    cards.push(card);
  }

  // 2. Generate the remaining N^2 cards (slope i, intercept j)
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      const card: number[] = [i + 1];
      for (let t = 0; t < n; t++) {
        card.push(n + 1 + n * t + field.add(field.mul(i, t), j));
      }
      cards.push(card);
    }
  }

  return cards;
};

/**
 * Build the deck design for the given number of symbols per card.
 *
 * When k - 1 is a prime power the result is the full projective plane of
 * that order. k = 2 gives the three-card triangle. Any other k falls back to
 * the plane of the largest prime power order q < k - 1, with k - q - 1
 * private symbols appended to every card.
 *
 * Cards and their symbols are produced in a fixed order, so repeated calls
 * return identical decks.
 */
export const generateDeck = (symbolsPerCard: number): Deck => {
  assertSymbolsPerCard(symbolsPerCard);
  const n = symbolsPerCard - 1;

  if (n === 1) {
    return {
      order: 1,
      symbolsPerCard,
      symbolCount: 3,
      construction: DeckConstruction.TRIANGLE,
      cards: [[0, 1], [0, 2], [1, 2]],
    };
  }

  if (isPrimePower(n)) {
    return {
      order: n,
      symbolsPerCard,
      symbolCount: planeSize(n),
      construction: DeckConstruction.PROJECTIVE_PLANE,
      cards: buildPlane(n),
    };
  }

  const q = largestPrimePowerBelow(n);
  if (q === null) {
    throw new UnsupportedOrderError(symbolsPerCard);
  }

  const plane = buildPlane(q);
  const base = planeSize(q);
  const extra = symbolsPerCard - (q + 1);
  const cards = plane.map((card, index) => {
    const padded = [...card];
    for (let t = 0; t < extra; t++) {
      padded.push(base + index * extra + t);
    }
    return padded;
  });

  return {
    order: q,
    symbolsPerCard,
    symbolCount: base + plane.length * extra,
    construction: DeckConstruction.PADDED_PLANE,
    cards,
  };
};

/** Number of cards generateDeck(symbolsPerCard) produces */
export const deckSize = (symbolsPerCard: number): number => {
  assertSymbolsPerCard(symbolsPerCard);
  const n = symbolsPerCard - 1;
  if (n === 1 || isPrimePower(n)) return planeSize(n);
  const q = largestPrimePowerBelow(n);
  if (q === null) throw new UnsupportedOrderError(symbolsPerCard);
  return planeSize(q);
};

/** Number of distinct symbols generateDeck(symbolsPerCard) uses */
export const requiredSymbolCount = (symbolsPerCard: number): number => {
  assertSymbolsPerCard(symbolsPerCard);
  const n = symbolsPerCard - 1;
  if (n === 1 || isPrimePower(n)) return planeSize(n);
  const q = largestPrimePowerBelow(n);
  if (q === null) throw new UnsupportedOrderError(symbolsPerCard);
  return planeSize(q) * (symbolsPerCard - q);
};

export const shuffle = <T,>(array: readonly T[], rng: Rng = defaultRng): T[] => {
  const newArray = [...array];
  for (let i = newArray.length - 1; i > 0; i--) {
    const j = Math.floor(rng.random() * (i + 1));
    [newArray[i], newArray[j]] = [newArray[j], newArray[i]];
  }
  return newArray;
};

// Random subset of `count` items, in their original order
const sample = <T,>(items: readonly T[], count: number, rng: Rng): T[] => {
  const picked = new Set(shuffle(items.map((_, index) => index), rng).slice(0, count));
  return items.filter((_, index) => picked.has(index));
};

export interface BuildDeckOptions {
  /** Random source for symbol sampling and card shuffling */
  rng?: Rng;
  /** Shuffle the order of the cards */
  shuffle?: boolean;
}

/**
 * Build a playable deck: generate the design and map its symbol indices
 * onto the given symbol set.
 *
 * Surplus symbols are dropped. Without an rng the first ones are used; with
 * an rng a random subset is drawn. Throws InsufficientSymbolsError when the
 * set is too small and InvalidConfigError when two symbols share an id.
 */
export const buildDeck = (
  symbolsPerCard: number,
  symbols: readonly SymbolItem[],
  options: BuildDeckOptions = {}
): CardData[] => {
  const design = generateDeck(symbolsPerCard);

  // Matching is by id, so ids must be unique across the set
  if (new Set(symbols.map(s => s.id)).size !== symbols.length) {
    throw new InvalidConfigError('symbol ids must be unique within a symbol set');
  }

  if (symbols.length < design.symbolCount) {
    throw new InsufficientSymbolsError(design.symbolCount, symbols.length);
  }

  const used = options.rng
    ? sample(symbols, design.symbolCount, options.rng)
    : symbols.slice(0, design.symbolCount);

  // Map indices to actual SymbolItems
  const deck: CardData[] = design.cards.map((cardIndices: DesignCard, index) => ({
    id: index,
    symbols: cardIndices.map(idx => used[idx]),
  }));

  return options.shuffle ? shuffle(deck, options.rng) : deck;
};

// Check if two cards match on a specific symbol ID
export const checkMatch = (cardA: CardData, cardB: CardData, symbolId: number): boolean => {
  const hasInA = cardA.symbols.some(s => s.id === symbolId);
  const hasInB = cardB.symbols.some(s => s.id === symbolId);
  return hasInA && hasInB;
};

// Find the matching symbol between two cards
export const findMatch = (cardA: CardData, cardB: CardData): SymbolItem | undefined => {
  for (const symA of cardA.symbols) {
    if (cardB.symbols.some(symB => symB.id === symA.id)) {
      return symA;
    }
  }
  return undefined;
};

/**
 * Verify the deck satisfies the Dobble property:
 * every pair of cards must match on EXACTLY ONE symbol.
 */
export const validateDeckIntegrity = (deck: readonly CardData[]): DeckIntegrityReport => {
  const violations: DeckIntegrityViolation[] = [];
  const idSets = deck.map(card => new Set(card.symbols.map(s => s.id)));
  let pairsChecked = 0;

  for (let i = 0; i < deck.length; i++) {
    for (let j = i + 1; j < deck.length; j++) {
      const common = deck[j].symbols
        .map(s => s.id)
        .filter(id => idSets[i].has(id));

      if (common.length !== 1) {
        violations.push({ a: i, b: j, common });
      }
      pairsChecked++;
    }
  }

  return {
    valid: violations.length === 0,
    cardCount: deck.length,
    pairsChecked,
    violations,
  };
};
