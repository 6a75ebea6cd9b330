import { describe, it, expect } from 'vitest';
import {
  buildDeck,
  checkMatch,
  deckSize,
  findMatch,
  generateDeck,
  requiredSymbolCount,
  shuffle,
  validateDeckIntegrity,
} from '../../shared/gameLogic';
import { InsufficientSymbolsError, InvalidConfigError, UnsupportedOrderError } from '../../shared/errors';
import { getSymbolsForCardSet } from '../../shared/cardSets';
import { createSeededRng } from '../../shared/rng';
import { CardData, DeckConstruction, DesignCard, SymbolItem } from '../../shared/types';

// ── Helpers ─────────────────────────────────────────────────

const makeSymbols = (count: number): SymbolItem[] =>
  Array.from({ length: count }, (_, id) => ({ id, char: `s${id}`, name: `Symbol ${id + 1}` }));

const intersection = (a: DesignCard, b: DesignCard): number[] => a.filter(x => b.includes(x));

function expectDobbleProperty(cards: readonly DesignCard[]): void {
  for (let i = 0; i < cards.length; i++) {
    for (let j = i + 1; j < cards.length; j++) {
      expect(intersection(cards[i], cards[j])).toHaveLength(1);
    }
  }
}

// ── Design generator ────────────────────────────────────────

describe('generateDeck', () => {
  it('should produce the Fano plane for 3 symbols per card', () => {
    const deck = generateDeck(3);
    expect(deck.cards).toEqual([
      [0, 1, 2],
      [0, 3, 4],
      [0, 5, 6],
      [1, 3, 5],
      [1, 4, 6],
      [2, 3, 6],
      [2, 4, 5],
    ]);
    expect(deck.symbolCount).toBe(7);
    expect(deck.order).toBe(2);
    expect(deck.construction).toBe(DeckConstruction.PROJECTIVE_PLANE);
  });

  it.each([
    [3, 7],
    [4, 13],
    [5, 21],
    [6, 31],
    [8, 57],
    [9, 73],
    [10, 91],
  ])('should build a full plane for %i symbols per card (%i cards)', (k, expectedCards) => {
    const deck = generateDeck(k);
    expect(deck.cards).toHaveLength(expectedCards);
    expect(deck.symbolCount).toBe(expectedCards);
    for (const card of deck.cards) {
      expect(card).toHaveLength(k);
      expect(new Set(card).size).toBe(k);
      expect([...card].sort((a, b) => a - b)).toEqual(card);
      expect(Math.max(...card)).toBeLessThan(deck.symbolCount);
    }
    expectDobbleProperty(deck.cards);
  });

  it('should use every symbol exactly k times in a full plane', () => {
    const deck = generateDeck(5);
    const counts = new Array<number>(deck.symbolCount).fill(0);
    deck.cards.forEach(card => card.forEach(s => counts[s]++));
    expect(counts.every(c => c === 5)).toBe(true);
  });

  it('should give the triangle for 2 symbols per card', () => {
    const deck = generateDeck(2);
    expect(deck.cards).toEqual([[0, 1], [0, 2], [1, 2]]);
    expect(deck.symbolCount).toBe(3);
    expect(deck.construction).toBe(DeckConstruction.TRIANGLE);
  });

  it('should pad the order-5 plane for 7 symbols per card', () => {
    const deck = generateDeck(7);
    expect(deck.construction).toBe(DeckConstruction.PADDED_PLANE);
    expect(deck.order).toBe(5);
    expect(deck.cards).toHaveLength(31);
    expect(deck.symbolCount).toBe(62);
    expect(deck.cards[0]).toEqual([0, 1, 2, 3, 4, 5, 31]);
    expect(deck.cards[30]).toHaveLength(7);
    expect(deck.cards[30][6]).toBe(61);
    expectDobbleProperty(deck.cards);
  });

  it('should pad the order-9 plane for 11 symbols per card', () => {
    const deck = generateDeck(11);
    expect(deck.order).toBe(9);
    expect(deck.cards).toHaveLength(91);
    expect(deck.symbolCount).toBe(182);
    deck.cards.forEach(card => expect(card).toHaveLength(11));
    expectDobbleProperty(deck.cards);
  });

  it('should be deterministic', () => {
    expect(generateDeck(8)).toEqual(generateDeck(8));
  });

  it.each([1, 0, -3, 2.5, Number.NaN])('should reject %s symbols per card', k => {
    expect(() => generateDeck(k)).toThrow(UnsupportedOrderError);
  });
});

describe('deckSize / requiredSymbolCount', () => {
  it('should agree with generateDeck', () => {
    for (const k of [2, 3, 4, 7, 8, 11, 12]) {
      const deck = generateDeck(k);
      expect(deckSize(k)).toBe(deck.cards.length);
      expect(requiredSymbolCount(k)).toBe(deck.symbolCount);
    }
  });

  it('should reject unsupported sizes', () => {
    expect(() => deckSize(1)).toThrow(UnsupportedOrderError);
    expect(() => requiredSymbolCount(1.5)).toThrow(UnsupportedOrderError);
  });
});

// ── Deck building ───────────────────────────────────────────

describe('buildDeck', () => {
  it('should map design indices to the first symbols', () => {
    const deck = buildDeck(3, makeSymbols(10));
    expect(deck).toHaveLength(7);
    expect(deck[0]).toEqual({ id: 0, symbols: makeSymbols(3) });
    expect(deck[6].symbols.map(s => s.id)).toEqual([2, 4, 5]);
  });

  it('should sample a random subset of surplus symbols with an rng', () => {
    const deck = buildDeck(3, makeSymbols(20), { rng: createSeededRng(5) });
    const used = new Set(deck.flatMap(card => card.symbols.map(s => s.id)));
    expect(used.size).toBe(7);
    expect(validateDeckIntegrity(deck).valid).toBe(true);
  });

  it('should be reproducible with a seeded rng', () => {
    const a = buildDeck(4, makeSymbols(30), { rng: createSeededRng(9), shuffle: true });
    const b = buildDeck(4, makeSymbols(30), { rng: createSeededRng(9), shuffle: true });
    expect(a).toEqual(b);
  });

  it('should keep card ids when shuffling', () => {
    const deck = buildDeck(3, makeSymbols(7), { rng: createSeededRng(1), shuffle: true });
    expect(deck.map(card => card.id).sort()).toEqual([0, 1, 2, 3, 4, 5, 6]);
  });

  it('should throw when there are not enough symbols', () => {
    expect(() => buildDeck(3, makeSymbols(6))).toThrow(InsufficientSymbolsError);
    expect(() => buildDeck(8, makeSymbols(56))).toThrow('need 57, have 56');
  });

  it('should reject symbol sets with repeated ids', () => {
    const merged = [...getSymbolsForCardSet('classic'), ...getSymbolsForCardSet('animals')];
    expect(() => buildDeck(9, merged)).toThrow(InvalidConfigError);
    expect(() => buildDeck(3, [...makeSymbols(7), makeSymbols(1)[0]])).toThrow(
      'symbol ids must be unique within a symbol set'
    );
  });
});

describe('shuffle', () => {
  it('should return a permutation without touching the input', () => {
    const input = [1, 2, 3, 4, 5];
    const result = shuffle(input, createSeededRng(3));
    expect(input).toEqual([1, 2, 3, 4, 5]);
    expect([...result].sort()).toEqual(input);
  });

  it('should swap each position with the head when the rng returns 0', () => {
    expect(shuffle([1, 2, 3], { random: () => 0 })).toEqual([2, 3, 1]);
  });
});

// ── Matching ────────────────────────────────────────────────

describe('findMatch / checkMatch', () => {
  const [a, b] = buildDeck(3, makeSymbols(7));

  it('should find the one shared symbol', () => {
    expect(findMatch(a, b)?.id).toBe(0);
    expect(checkMatch(a, b, 0)).toBe(true);
    expect(checkMatch(a, b, 1)).toBe(false);
  });

  it('should return undefined when cards share nothing', () => {
    const other: CardData = { id: 99, symbols: makeSymbols(10).slice(7) };
    expect(findMatch(a, other)).toBeUndefined();
  });
});

describe('validateDeckIntegrity', () => {
  it('should accept a generated deck', () => {
    const report = validateDeckIntegrity(buildDeck(4, makeSymbols(13)));
    expect(report).toEqual({ valid: true, cardCount: 13, pairsChecked: 78, violations: [] });
  });

  it('should report pairs that do not share exactly one symbol', () => {
    const symbols = makeSymbols(5);
    const deck: CardData[] = [
      { id: 0, symbols: [symbols[0], symbols[1]] },
      { id: 1, symbols: [symbols[2], symbols[3]] },
      { id: 2, symbols: [symbols[0], symbols[1], symbols[4]] },
    ];
    const report = validateDeckIntegrity(deck);
    expect(report.valid).toBe(false);
    expect(report.violations).toEqual([
      { a: 0, b: 1, common: [] },
      { a: 0, b: 2, common: [0, 1] },
      { a: 1, b: 2, common: [] },
    ]);
  });
});
