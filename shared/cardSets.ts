import emojiData from '../data/emojis.json';
import { InvalidConfigError } from './errors';
import { CardSet, SymbolItem } from './types';

interface StoredEmoji {
  char: string;
  name: string;
}

interface StoredCardSet {
  id: string;
  name: string;
  description: string;
  emojis: StoredEmoji[];
}

// Helper to create emoji-based SymbolItem array
export function createEmojiSymbols(chars: readonly string[], names?: readonly string[]): SymbolItem[] {
  const seen = new Set<string>();
  for (const char of chars) {
    if (seen.has(char)) {
      throw new InvalidConfigError(`Duplicate emoji '${char}' in symbol set`);
    }
    seen.add(char);
  }

  return chars.map((char, index) => ({
    id: index,
    char,
    name: names?.[index] ?? `Symbol ${index + 1}`,
  }));
}

// Helper to create image-based SymbolItem array
export function createImageSymbols(setFolder: string, imageNames: readonly string[]): SymbolItem[] {
  if (new Set(imageNames).size !== imageNames.length) {
    throw new InvalidConfigError(`Duplicate image names in '${setFolder}'`);
  }

  return imageNames.map((name, index) => ({
    id: index,
    char: '', // No emoji fallback for image sets
    name: name.replace(/-/g, ' ').replace(/\.(png|jpe?g|svg|webp)$/i, ''), // "polar-bear.png" -> "polar bear"
    imageUrl: `${setFolder}/${name}`,
  }));
}

/**
 * Parse a custom emoji list: either a JSON array of strings or plain text
 * with one emoji per line (blank lines and lines starting with # skipped).
 */
export function parseEmojiList(text: string): string[] {
  const trimmed = text.trim();

  if (trimmed.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigError(`Emoji list is not valid JSON: ${reason}`);
    }
    if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === 'string')) {
      throw new InvalidConfigError('Emoji list JSON must be an array of strings');
    }
    return parsed.map(item => item.trim()).filter(item => item.length > 0);
  }

  return trimmed
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

function storedToCardSet(stored: StoredCardSet): CardSet {
  return {
    id: stored.id,
    name: stored.name,
    description: stored.description,
    symbols: Object.freeze(
      createEmojiSymbols(
        stored.emojis.map(e => e.char),
        stored.emojis.map(e => e.name)
      )
    ),
    isBuiltIn: true,
  };
}

// Built-in card sets (non-editable)
export const BUILT_IN_CARD_SETS: readonly CardSet[] = Object.freeze(
  (emojiData satisfies StoredCardSet[]).map(storedToCardSet)
);

// Default card set ID
export const DEFAULT_CARD_SET_ID = 'classic';

// Helper to get a built-in card set by ID
export function getCardSetById(id: string): CardSet | undefined {
  return BUILT_IN_CARD_SETS.find(set => set.id === id);
}

// Get symbols for a built-in card set
export function getSymbolsForCardSet(cardSetId: string): readonly SymbolItem[] {
  const cardSet = getCardSetById(cardSetId);
  if (!cardSet) {
    const known = BUILT_IN_CARD_SETS.map(set => set.id).join(', ');
    throw new InvalidConfigError(`Unknown card set '${cardSetId}' (available: ${known})`);
  }
  return cardSet.symbols;
}
