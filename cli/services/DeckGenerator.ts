/**
 * DeckGenerator - Builds, lays out, renders and writes a whole deck
 *
 * Everything is computed before the deck directory is created, so a deck
 * that cannot be built leaves nothing behind on disk.
 */

import {
  buildDeck,
  requiredSymbolCount,
  validateDeckIntegrity,
} from '../../shared/gameLogic';
import { layoutDeck } from '../../shared/layout';
import { createSeededRng, defaultRng } from '../../shared/rng';
import { CardData, SymbolItem } from '../../shared/types';
import { AssetProvider, defaultAssetProvider, renderCardSvg } from '../../utils/renderCard';
import { CliConfig, DeckSummary, RenderedCard } from '../types/internal';
import { logger } from '../utils/logger';
import { DeckWriter } from './DeckWriter';
import { FileAssetProvider } from './FileAssetProvider';
import { loadSymbols } from './SymbolLoader';

// Symbols used by the deck, ordered by id
const collectSymbols = (cards: readonly CardData[]): SymbolItem[] => {
  const byId = new Map<number, SymbolItem>();
  for (const card of cards) {
    for (const symbol of card.symbols) byId.set(symbol.id, symbol);
  }
  return [...byId.values()].sort((a, b) => a.id - b.id);
};

export async function generateDeckFiles(config: CliConfig): Promise<DeckSummary> {
  const scope = `Deck ${config.name}`;
  const { symbolsPerCard, layout } = config;

  const symbols = await loadSymbols(config.source);
  const required = requiredSymbolCount(symbolsPerCard);
  logger.debug(scope, `Loaded ${symbols.length} symbols, deck needs ${required}`);

  if (symbols.length > required) {
    logger.warn(
      scope,
      `More symbols provided than needed. Randomly choosing a subset of ${required} symbols.`
    );
  }

  const rng = layout.randomSeed === undefined ? defaultRng : createSeededRng(layout.randomSeed);
  const cards = buildDeck(symbolsPerCard, symbols, { rng });

  const integrity = validateDeckIntegrity(cards);
  if (!integrity.valid) {
    const [first] = integrity.violations;
    throw new Error(
      `Deck failed integrity check: cards ${first.a} and ${first.b} share ${first.common.length} symbols`
    );
  }
  logger.debug(scope, `Integrity verified over ${integrity.pairsChecked} card pairs`);

  const assets: AssetProvider =
    config.source.kind === 'images' ? await FileAssetProvider.load(symbols) : defaultAssetProvider;

  const rendered: RenderedCard[] = layoutDeck(cards, layout).map((cardLayout, index) => {
    logger.debug(
      scope,
      `Card ${index + 1}: packing ${cardLayout.packing}, rotation ${cardLayout.rotation.toFixed(1)}°`
    );
    return {
      number: index + 1,
      layout: cardLayout,
      svg: renderCardSvg(cardLayout, { size: config.size, padding: config.padding, assets }),
    };
  });

  const used = collectSymbols(cards);
  const usedIds = new Set(used.map(symbol => symbol.id));

  const writer = new DeckWriter(config.outDir, config.name);
  await writer.create();
  const files = await writer.writeAll(rendered, used);

  logger.info(scope, `Wrote ${rendered.length} cards to ${files.deckDir}`);

  return {
    ...files,
    cardCount: rendered.length,
    symbolCount: used.length,
    unusedSymbols: symbols.filter(symbol => !usedIds.has(symbol.id)),
  };
}
