#!/usr/bin/env node
/**
 * Packing table generator -- rebuilds data/packings.json.
 *
 * Usage:
 *   npm run generate:packings -- [--max <n>] [--types cci,ccir] [--output <file>]
 *
 * Every (type, size) entry is solved with its own seeded random stream, so
 * a run can be repeated exactly. Takes a few minutes for the full table.
 */

import { writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { logger } from '../cli/utils/logger';
import { isPackingType } from '../shared/packings';
import { solvePacking } from '../shared/packingSolver';
import { createSeededRng } from '../shared/rng';
import { PACKING_TYPES, PackingType } from '../shared/types';

const SCOPE = 'packings';

interface Options {
  max: number;
  types: PackingType[];
  output: string;
}

function parseArgs(): Options {
  const args = process.argv.slice(2);
  const options: Options = {
    max: 24,
    types: [...PACKING_TYPES],
    output: path.join(__dirname, '..', 'data', 'packings.json'),
  };

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1] ?? '';
    if (args[i] === '--max') {
      options.max = Number(value);
      i++;
    } else if (args[i] === '--types') {
      const types = value.split(',');
      options.types = types.filter(isPackingType);
      if (options.types.length !== types.length) {
        throw new Error(`Unknown packing type in '${value}'`);
      }
      i++;
    } else if (args[i] === '--output') {
      options.output = path.resolve(value);
      i++;
    } else {
      throw new Error(`Unknown argument '${args[i]}'`);
    }
  }

  if (!Number.isInteger(options.max) || options.max < 1) {
    throw new Error(`--max must be a positive integer`);
  }
  return options;
}

// One line per entry keeps the file diffable
function formatTable(table: Record<string, Record<string, [number, number, number][]>>): string {
  const blocks = Object.entries(table).map(([type, entries]) => {
    const lines = Object.entries(entries).map(
      ([size, circles]) =>
        `    "${size}": [${circles.map(([x, y, r]) => `[${x}, ${y}, ${r}]`).join(', ')}]`
    );
    return `  "${type}": {\n${lines.join(',\n')}\n  }`;
  });
  return `{\n${blocks.join(',\n')}\n}\n`;
}

async function main(): Promise<void> {
  const { max, types, output } = parseArgs();
  const table: Record<string, Record<string, [number, number, number][]>> = {};

  for (const type of types) {
    table[type] = {};
    for (let n = 1; n <= max; n++) {
      const rng = createSeededRng(1000 * n + type.length);
      const circles = solvePacking(type, n, { rng });
      table[type][String(n)] = circles;
      logger.info(SCOPE, `${type} ${n}: largest radius ${Math.max(...circles.map(c => c[2]))}`);
    }
  }

  await writeFile(output, formatTable(table), 'utf8');
  logger.info(SCOPE, `Wrote ${output}`);
}

main().catch(error => {
  logger.error(SCOPE, 'Packing generation failed:', error);
  process.exitCode = 1;
});
