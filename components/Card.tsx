import React from 'react';
import { CardLayout } from '../types';
import { toPixelPlacements } from '../shared/layout';
import { AssetProvider, defaultAssetProvider } from '../utils/assets';

interface CardProps {
  layout: CardLayout;
  size: number;
  /** Share of each symbol's circle left empty around the drawing, in [0, 1) */
  padding?: number;
  assets?: AssetProvider;
  label?: string; // Curved text on card circumference
  showSlots?: boolean; // Outline each symbol's circle (debugging aid)
}

// The drawing is a square whose corners touch the padded circle
const boxSide = (radius: number, padding: number): number => Math.SQRT2 * (1 - padding) * radius;

const Card: React.FC<CardProps> = ({
  layout,
  size,
  padding = 0,
  assets = defaultAssetProvider,
  label,
  showSlots = false
}) => {
  const center = size / 2;
  const borderWidth = Math.max(1, Math.round(size * 0.008));
  const placements = toPixelPlacements(layout, size);
  const curveId = `label-curve-${layout.cardId}`;

  return (
    <svg xmlns="http://www.w3.org/2000/svg" width={size} height={size} viewBox={`0 0 ${size} ${size}`}>

      {/* The Actual Card Circle */}
      <circle
        cx={center}
        cy={center}
        r={center - borderWidth / 2}
        fill="white"
        stroke="#c7d2fe"
        strokeWidth={borderWidth}
      />

      {placements.map(item => {
        const side = boxSide(item.radius, padding);
        const asset = assets.getAsset(item.symbol);

        return (
          <g
            key={`${layout.cardId}-${item.symbol.id}`}
            transform={`translate(${item.cx} ${item.cy}) rotate(${-item.rotation})`}
          >
            {showSlots && (
              <circle r={item.radius} fill="none" stroke="#ef4444" strokeWidth={1} />
            )}
            {asset.kind === 'image' ? (
              <image
                href={asset.href}
                x={-side / 2}
                y={-side / 2}
                width={side}
                height={side}
                preserveAspectRatio="xMidYMid meet"
              />
            ) : (
              <text
                fontSize={side}
                textAnchor="middle"
                dominantBaseline="central"
              >
                {asset.char}
              </text>
            )}
          </g>
        );
      })}

      {/* Curved Label on card circumference */}
      {label && (
        <g pointerEvents="none">
          <defs>
            <path
              id={curveId}
              d={`M ${size * 0.06},${center} A ${center * 0.88},${center * 0.88} 0 0 1 ${size * 0.94},${center}`}
            />
          </defs>
          {/* White stroke behind text for contrast */}
          <text
            fontSize={size * 0.038}
            fill="none"
            stroke="white"
            strokeWidth={size * 0.008}
            fontFamily="Fredoka, sans-serif"
            fontWeight={800}
            textAnchor="middle"
            letterSpacing="0.15em"
          >
            <textPath href={`#${curveId}`} startOffset="50%">
              {label}
            </textPath>
          </text>
          {/* Main text */}
          <text
            fontSize={size * 0.038}
            fill="#1e1b4b"
            fontFamily="Fredoka, sans-serif"
            fontWeight={800}
            textAnchor="middle"
            letterSpacing="0.15em"
          >
            <textPath href={`#${curveId}`} startOffset="50%">
              {label}
            </textPath>
          </text>
        </g>
      )}

    </svg>
  );
};

export default Card;
