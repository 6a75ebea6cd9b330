/**
 * FileAssetProvider - Embeds image symbols into the card SVGs
 *
 * Image files are read once and inlined as data URIs so every card file
 * stands on its own. Symbols without an image fall back to their glyph.
 */

import { readFile } from 'node:fs/promises';
import { SymbolItem } from '../../shared/types';
import { AssetProvider, SymbolAsset, defaultAssetProvider } from '../../utils/assets';
import { imageMimeType } from '../utils/files';

export class FileAssetProvider implements AssetProvider {
  private constructor(private readonly dataUris: ReadonlyMap<string, string>) {}

  static async load(symbols: readonly SymbolItem[]): Promise<FileAssetProvider> {
    const files = symbols.flatMap(symbol => (symbol.imageUrl ? [symbol.imageUrl] : []));

    const entries = await Promise.all(
      files.map(async (file): Promise<[string, string]> => {
        const mime = imageMimeType(file) ?? 'application/octet-stream';
        const data = await readFile(file);
        return [file, `data:${mime};base64,${data.toString('base64')}`];
      })
    );

    return new FileAssetProvider(new Map(entries));
  }

  getAsset(symbol: SymbolItem): SymbolAsset {
    const href = symbol.imageUrl ? this.dataUris.get(symbol.imageUrl) : undefined;
    return href ? { kind: 'image', href } : defaultAssetProvider.getAsset(symbol);
  }
}
