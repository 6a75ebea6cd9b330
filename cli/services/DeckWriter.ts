/**
 * DeckWriter - Writes a rendered deck to disk
 *
 * A failed create or write removes the deck directory again.
 *
 * Layout:
 *   <outDir>/<name>/<name>_001.svg ...
 *   <outDir>/<name>/info/deck.csv     FilePath,Symbol1..Symbolk (slot order)
 *   <outDir>/<name>/info/symbols.csv  Symbol,Name,Label
 */

import { mkdir, rm, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { DeckExistsError, InvalidConfigError } from '../../shared/errors';
import { SymbolItem } from '../../shared/types';
import { DeckFiles, RenderedCard } from '../types/internal';
import { hasErrorCode, settleAll, symbolKey, toCsv } from '../utils/files';

export class DeckWriter {
  readonly deckDir: string;
  readonly infoDir: string;

  constructor(
    private readonly outDir: string,
    private readonly name: string
  ) {
    this.deckDir = path.join(outDir, name);
    this.infoDir = path.join(this.deckDir, 'info');
  }

  cardFileName(cardNumber: number): string {
    return `${this.name}_${String(cardNumber).padStart(3, '0')}.svg`;
  }

  cardPath(cardNumber: number): string {
    return path.join(this.deckDir, this.cardFileName(cardNumber));
  }

  // ============================================
  // DIRECTORIES
  // ============================================

  /**
   * Create the deck directory. The output directory must already exist and
   * the deck directory must not.
   */
  async create(): Promise<void> {
    let isDirectory = false;
    try {
      isDirectory = (await stat(this.outDir)).isDirectory();
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) throw error;
    }
    if (!isDirectory) {
      throw new InvalidConfigError(`Output directory does not exist or is not a directory: ${this.outDir}`);
    }

    try {
      await mkdir(this.deckDir);
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        throw new DeckExistsError(this.deckDir);
      }
      throw error;
    }
    await this.removeOnFailure(mkdir(this.infoDir));
  }

  /** Delete the deck directory and everything in it */
  async remove(): Promise<void> {
    await rm(this.deckDir, { recursive: true, force: true });
  }

  private async removeOnFailure<T>(work: Promise<T>): Promise<T> {
    try {
      return await work;
    } catch (error) {
      await this.remove();
      throw error;
    }
  }

  // ============================================
  // FILES
  // ============================================

  async writeCards(cards: readonly RenderedCard[]): Promise<string[]> {
    return settleAll(
      cards.map(async card => {
        const file = this.cardPath(card.number);
        await writeFile(file, card.svg, 'utf8');
        return file;
      })
    );
  }

  async writeDeckCsv(cards: readonly RenderedCard[]): Promise<string> {
    const symbolsPerCard = Math.max(0, ...cards.map(card => card.layout.placements.length));
    const header = ['FilePath', ...Array.from({ length: symbolsPerCard }, (_, i) => `Symbol${i + 1}`)];

    const rows = cards.map(card => {
      const bySlot = [...card.layout.placements].sort((a, b) => a.slot - b.slot);
      return [this.cardPath(card.number), ...bySlot.map(p => symbolKey(p.symbol))];
    });

    const file = path.join(this.infoDir, 'deck.csv');
    await writeFile(file, toCsv([header, ...rows]), 'utf8');
    return file;
  }

  async writeSymbolsCsv(symbols: readonly SymbolItem[]): Promise<string> {
    const rows = symbols.map((symbol, index) => [symbolKey(symbol), symbol.name, index + 1]);

    const file = path.join(this.infoDir, 'symbols.csv');
    await writeFile(file, toCsv([['Symbol', 'Name', 'Label'], ...rows]), 'utf8');
    return file;
  }

  async writeAll(cards: readonly RenderedCard[], symbols: readonly SymbolItem[]): Promise<DeckFiles> {
    return this.removeOnFailure(this.writeFiles(cards, symbols));
  }

  private async writeFiles(cards: readonly RenderedCard[], symbols: readonly SymbolItem[]): Promise<DeckFiles> {
    const cardFiles = await this.writeCards(cards);
    const [deckCsv, symbolsCsv] = await settleAll([
      this.writeDeckCsv(cards),
      this.writeSymbolsCsv(symbols),
    ]);
    return { deckDir: this.deckDir, cardFiles, deckCsv, symbolsCsv };
  }
}
