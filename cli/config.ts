import * as path from 'node:path';
import { DEFAULT_CARD_PARAMS, DEFAULT_DECK_PARAMS } from '../constants';
import { InvalidConfigError } from '../shared/errors';
import { resolveLayoutConfig } from '../shared/layout';
import { isPackingType } from '../shared/packings';
import { LayoutConfig, PACKING_TYPES, PackingChoice } from '../shared/types';
import { CliCommand, SymbolSource } from './types/internal';

export const HELP_TEXT = `
Usage: dobble-deck [options]

Generates a deck of Dobble-style cards (one SVG per card) plus CSV files
describing the deck in <out>/<name>/info/.

Deck:
  --symbols-per-card <k>    Symbols on each card (default: ${DEFAULT_DECK_PARAMS.symbolsPerCard})
  --name <deck>             Deck name (default: ${DEFAULT_DECK_PARAMS.name})
  --out <dir>               Directory to create the deck in (default: current directory)

Symbols (pick one):
  --set <id>                Built-in emoji set (default: ${DEFAULT_DECK_PARAMS.cardSetId})
  --emojis <file>           Emoji list: one per line, or a JSON array of strings
  --images <dir>            Directory of PNG, JPEG, SVG or WebP images, in name order

Card:
  --size <px>               Card image size (default: ${DEFAULT_CARD_PARAMS.size})
  --padding <0..1>          Empty share of each symbol's circle (default: ${DEFAULT_CARD_PARAMS.padding})
  --packing <type>          ${PACKING_TYPES.join(', ')} or random (default: cci)
  --seed <int>              Seed for a reproducible deck (0 to 4294967295)
  --min-scale <f>           Smallest symbol size relative to its slot
  --max-scale <f>           Largest symbol size relative to its slot
  --jitter <0..1>           How far symbols drift inside their slot
  --rotation-range <deg>    Symbol rotation range, 0 to 360
  --no-shuffle              Assign symbols to slots in id order

  -h, --help                Show this help

Set LOG_LEVEL=debug for per-card details.
`;

const VALUE_FLAGS = [
  '--symbols-per-card',
  '--name',
  '--out',
  '--set',
  '--emojis',
  '--images',
  '--size',
  '--padding',
  '--packing',
  '--seed',
  '--min-scale',
  '--max-scale',
  '--jitter',
  '--rotation-range',
] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];

const isValueFlag = (arg: string): arg is ValueFlag => VALUE_FLAGS.some(flag => flag === arg);

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new InvalidConfigError(`${flag} expects a number, got '${raw}'`);
  }
  return value;
}

function parseInteger(flag: string, raw: string): number {
  const value = parseNumber(flag, raw);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidConfigError(`${flag} expects an integer, got '${raw}'`);
  }
  return value;
}

function parsePacking(raw: string): PackingChoice {
  if (raw === 'random' || isPackingType(raw)) return raw;
  throw new InvalidConfigError(
    `--packing must be one of ${PACKING_TYPES.join(', ')}, random (got '${raw}')`
  );
}

function validateName(name: string): string {
  if (name.trim() === '' || name === '.' || name === '..' || /[\\/]/.test(name)) {
    throw new InvalidConfigError(`Invalid deck name '${name}'`);
  }
  return name;
}

function pickSource(values: Map<ValueFlag, string>, cwd: string): SymbolSource {
  const set = values.get('--set');
  const emojis = values.get('--emojis');
  const images = values.get('--images');

  const given = [set, emojis, images].filter(v => v !== undefined).length;
  if (given > 1) {
    throw new InvalidConfigError('Use only one of --set, --emojis and --images');
  }

  if (emojis !== undefined) return { kind: 'emojis', file: path.resolve(cwd, emojis) };
  if (images !== undefined) return { kind: 'images', dir: path.resolve(cwd, images) };
  return { kind: 'set', id: set ?? DEFAULT_DECK_PARAMS.cardSetId };
}

/**
 * Parse command-line arguments (without the node and script entries).
 * Throws InvalidConfigError for unknown flags or malformed values.
 */
export function parseCliArgs(argv: readonly string[], cwd: string = process.cwd()): CliCommand {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { kind: 'help' };
  }

  const values = new Map<ValueFlag, string>();
  let shuffle = true;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--no-shuffle') {
      shuffle = false;
    } else if (isValueFlag(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new InvalidConfigError(`Missing value for ${arg}`);
      }
      if (values.has(arg)) {
        throw new InvalidConfigError(`${arg} given more than once`);
      }
      values.set(arg, value);
      i++;
    } else {
      throw new InvalidConfigError(`Unknown argument '${arg}' (see --help)`);
    }
  }

  const layout: Partial<LayoutConfig> = { shuffle };
  const withValue = (flag: ValueFlag, assign: (value: string) => void): void => {
    const raw = values.get(flag);
    if (raw !== undefined) assign(raw);
  };

  withValue('--min-scale', raw => { layout.minRadiusScale = parseNumber('--min-scale', raw); });
  withValue('--max-scale', raw => { layout.maxRadiusScale = parseNumber('--max-scale', raw); });
  withValue('--jitter', raw => { layout.jitter = parseNumber('--jitter', raw); });
  withValue('--rotation-range', raw => { layout.rotationRange = parseNumber('--rotation-range', raw); });
  withValue('--seed', raw => { layout.randomSeed = parseInteger('--seed', raw); });
  withValue('--packing', raw => { layout.packing = parsePacking(raw); });

  const rawSize = values.get('--size');
  const size = rawSize === undefined ? DEFAULT_CARD_PARAMS.size : parseInteger('--size', rawSize);
  if (size < 1) {
    throw new InvalidConfigError(`--size must be positive, got ${size}`);
  }

  const rawPadding = values.get('--padding');
  const padding =
    rawPadding === undefined ? DEFAULT_CARD_PARAMS.padding : parseNumber('--padding', rawPadding);
  if (padding < 0 || padding >= 1) {
    throw new InvalidConfigError(`--padding must be in [0, 1), got ${padding}`);
  }

  const rawK = values.get('--symbols-per-card');

  return {
    kind: 'generate',
    config: {
      name: validateName(values.get('--name') ?? DEFAULT_DECK_PARAMS.name),
      outDir: path.resolve(cwd, values.get('--out') ?? '.'),
      symbolsPerCard:
        rawK === undefined ? DEFAULT_DECK_PARAMS.symbolsPerCard : parseNumber('--symbols-per-card', rawK),
      source: pickSource(values, cwd),
      size,
      padding,
      layout: resolveLayoutConfig(layout),
    },
  };
}
