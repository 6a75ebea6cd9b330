import { SymbolItem } from '../types';

// What gets drawn for a symbol: an emoji/text glyph or an image reference
export type SymbolAsset =
  | { kind: 'glyph'; char: string }
  | { kind: 'image'; href: string };

export interface AssetProvider {
  getAsset(symbol: SymbolItem): SymbolAsset;
}

// Image sets use their URL as-is; everything else is drawn as text
export const defaultAssetProvider: AssetProvider = {
  getAsset: symbol =>
    symbol.imageUrl ? { kind: 'image', href: symbol.imageUrl } : { kind: 'glyph', char: symbol.char },
};
