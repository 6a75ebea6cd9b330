/**
 * Service exports
 */

export { DeckWriter } from './DeckWriter';
export { FileAssetProvider } from './FileAssetProvider';
export { loadSymbols } from './SymbolLoader';
export { generateDeckFiles } from './DeckGenerator';
