import * as path from 'node:path';
import { SymbolItem } from '../../shared/types';

export const IMAGE_EXTENSIONS: Readonly<Record<string, string>> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.svg': 'image/svg+xml',
  '.webp': 'image/webp',
};

export const imageMimeType = (file: string): string | undefined =>
  IMAGE_EXTENSIONS[path.extname(file).toLowerCase()];

/** Node filesystem errors carry a string code such as ENOENT */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

// How a symbol is identified in the CSV files: its glyph, or its image file name
export const symbolKey = (symbol: SymbolItem): string =>
  symbol.imageUrl ? path.basename(symbol.imageUrl) : symbol.char;

const escapeCsvField = (field: string | number): string => {
  const text = String(field);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export const toCsvRow = (fields: readonly (string | number)[]): string =>
  fields.map(escapeCsvField).join(',');

export const toCsv = (rows: readonly (readonly (string | number)[])[]): string =>
  rows.map(toCsvRow).join('\n') + '\n';

/**
 * Like Promise.all, but waits for every promise to settle before rejecting
 * with the first failure, so no write is still pending afterwards.
 */
export async function settleAll<T>(promises: readonly Promise<T>[]): Promise<T[]> {
  const results = await Promise.allSettled(promises);
  const failed = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
  if (failed) throw failed.reason;
  return results.flatMap(result => (result.status === 'fulfilled' ? [result.value] : []));
}
