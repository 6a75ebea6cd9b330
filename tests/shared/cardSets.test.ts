import { describe, it, expect } from 'vitest';
import {
  BUILT_IN_CARD_SETS,
  DEFAULT_CARD_SET_ID,
  createEmojiSymbols,
  createImageSymbols,
  getCardSetById,
  getSymbolsForCardSet,
  parseEmojiList,
} from '../../shared/cardSets';
import { InvalidConfigError } from '../../shared/errors';
import { requiredSymbolCount } from '../../shared/gameLogic';

describe('built-in card sets', () => {
  it('should include the default set', () => {
    expect(getCardSetById(DEFAULT_CARD_SET_ID)?.name).toBe('Classic');
  });

  it('should hold exactly enough classic symbols for the 8-per-card deck', () => {
    expect(getSymbolsForCardSet('classic')).toHaveLength(requiredSymbolCount(8));
  });

  it('should start the classic set with the anchor', () => {
    expect(getSymbolsForCardSet('classic')[0]).toEqual({ id: 0, char: '⚓', name: 'anchor' });
  });

  it('should give every set unique characters and sequential ids', () => {
    for (const set of BUILT_IN_CARD_SETS) {
      expect(set.isBuiltIn).toBe(true);
      expect(new Set(set.symbols.map(s => s.char)).size).toBe(set.symbols.length);
      expect(set.symbols.map(s => s.id)).toEqual(set.symbols.map((_, i) => i));
    }
  });

  it('should reject unknown set ids', () => {
    expect(getCardSetById('nope')).toBeUndefined();
    expect(() => getSymbolsForCardSet('nope')).toThrow(InvalidConfigError);
  });
});

describe('createEmojiSymbols', () => {
  it('should number symbols and default their names', () => {
    expect(createEmojiSymbols(['🐶', '🐱'], ['dog'])).toEqual([
      { id: 0, char: '🐶', name: 'dog' },
      { id: 1, char: '🐱', name: 'Symbol 2' },
    ]);
  });

  it('should reject duplicates', () => {
    expect(() => createEmojiSymbols(['🐶', '🐶'])).toThrow("Duplicate emoji '🐶' in symbol set");
  });
});

describe('createImageSymbols', () => {
  it('should derive names from file names', () => {
    expect(createImageSymbols('sets/animals', ['polar-bear.png', 'cat.JPG'])).toEqual([
      { id: 0, char: '', name: 'polar bear', imageUrl: 'sets/animals/polar-bear.png' },
      { id: 1, char: '', name: 'cat', imageUrl: 'sets/animals/cat.JPG' },
    ]);
  });

  it('should reject duplicate file names', () => {
    expect(() => createImageSymbols('dir', ['a.png', 'a.png'])).toThrow(InvalidConfigError);
  });
});

describe('parseEmojiList', () => {
  it('should read one emoji per line, skipping blanks and comments', () => {
    expect(parseEmojiList('# animals\n🐶\n\n  🐱  \r\n🦊\n')).toEqual(['🐶', '🐱', '🦊']);
  });

  it('should read a JSON array', () => {
    expect(parseEmojiList(' ["🍎", " 🍌 ", ""] ')).toEqual(['🍎', '🍌']);
  });

  it('should reject malformed JSON', () => {
    expect(() => parseEmojiList('["🍎",')).toThrow(InvalidConfigError);
    expect(() => parseEmojiList('[1, 2]')).toThrow('Emoji list JSON must be an array of strings');
  });
});
