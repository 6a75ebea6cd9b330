import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import Card from '../components/Card';
import { DEFAULT_CARD_PARAMS } from '../constants';
import { InvalidConfigError } from '../shared/errors';
import { CardLayout } from '../types';
import { AssetProvider, defaultAssetProvider } from './assets';

export type { AssetProvider, SymbolAsset } from './assets';
export { defaultAssetProvider } from './assets';

export interface RenderCardOptions {
  /** Width and height of the image in pixels */
  size?: number;
  padding?: number;
  assets?: AssetProvider;
  label?: string;
  showSlots?: boolean;
}

const XML_HEADER = '<?xml version="1.0" encoding="UTF-8"?>\n';

/**
 * Render a laid-out card as a standalone SVG document.
 * Throws InvalidConfigError for a bad size or padding.
 */
export function renderCardSvg(layout: CardLayout, options: RenderCardOptions = {}): string {
  const {
    size = DEFAULT_CARD_PARAMS.size,
    padding = DEFAULT_CARD_PARAMS.padding,
    assets = defaultAssetProvider,
    label,
    showSlots = false,
  } = options;

  if (!Number.isInteger(size) || size < 1) {
    throw new InvalidConfigError(`Card size must be a positive integer, got ${size}`);
  }
  if (!(padding >= 0 && padding < 1)) {
    throw new InvalidConfigError(`Padding must be in [0, 1), got ${padding}`);
  }

  const markup = renderToStaticMarkup(
    createElement(Card, { layout, size, padding, assets, label, showSlots })
  );
  return `${XML_HEADER}${markup}\n`;
}
