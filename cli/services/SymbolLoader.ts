/**
 * SymbolLoader - Resolves a SymbolSource to the symbols of a deck
 *
 * Handles:
 * - Built-in emoji sets
 * - Emoji list files
 * - Image directories
 */

import { readFile, readdir } from 'node:fs/promises';
import {
  createEmojiSymbols,
  createImageSymbols,
  getSymbolsForCardSet,
  parseEmojiList,
} from '../../shared/cardSets';
import { InvalidConfigError } from '../../shared/errors';
import { SymbolItem } from '../../shared/types';
import { SymbolSource } from '../types/internal';
import { hasErrorCode, imageMimeType } from '../utils/files';

async function readEmojiFile(file: string): Promise<string> {
  try {
    return await readFile(file, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new InvalidConfigError(`Emoji list not found: ${file}`);
    }
    throw error;
  }
}

async function listImages(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
      throw new InvalidConfigError(`Image directory not found: ${dir}`);
    }
    throw error;
  }
  return entries.filter(name => imageMimeType(name) !== undefined).sort();
}

export async function loadSymbols(source: SymbolSource): Promise<readonly SymbolItem[]> {
  switch (source.kind) {
    case 'set':
      return getSymbolsForCardSet(source.id);
    case 'emojis':
      return createEmojiSymbols(parseEmojiList(await readEmojiFile(source.file)));
    case 'images':
      return createImageSymbols(source.dir, await listImages(source.dir));
  }
}
