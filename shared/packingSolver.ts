/**
 * Circle packing solver used to build data/packings.json.
 *
 * Relax-and-inflate: circles start at random points inside the disk with
 * radii proportional to the packing's radius profile. Each iteration pushes
 * overlapping pairs apart and pulls escaped circles back inside; the common
 * scale grows while the arrangement is overlap-free and shrinks otherwise.
 * The best of several restarts wins, and the final radii are cut down to
 * the largest scale the rounded centres allow.
 */

import { relativeRadii } from './packings';
import { Rng, defaultRng } from './rng';
import { PackingType } from './types';

export interface SolveOptions {
  restarts?: number;
  iterations?: number;
  rng?: Rng;
}

type Point = [number, number];

const DECIMALS = 1e6;
const round6 = (value: number): number => Math.round(value * DECIMALS) / DECIMALS;

/** Largest common scale at which circles of relative radii `weights` fit at `points` */
export function feasibleScale(points: readonly Point[], weights: readonly number[]): number {
  let scale = Infinity;
  points.forEach(([x, y], i) => {
    scale = Math.min(scale, (1 - Math.hypot(x, y)) / weights[i]);
  });
  for (let i = 0; i < points.length; i++) {
    for (let j = i + 1; j < points.length; j++) {
      const dist = Math.hypot(points[i][0] - points[j][0], points[i][1] - points[j][1]);
      scale = Math.min(scale, dist / (weights[i] + weights[j]));
    }
  }
  return scale;
}

function relax(weights: readonly number[], rng: Rng, iterations: number): Point[] {
  const n = weights.length;
  const points: Point[] = weights.map(() => {
    const angle = rng.random() * 2 * Math.PI;
    const r = Math.sqrt(rng.random()) * 0.8;
    return [r * Math.cos(angle), r * Math.sin(angle)];
  });
  let scale = 0.5 / Math.sqrt(weights.reduce((sum, w) => sum + w * w, 0));

  for (let iter = 0; iter < iterations; iter++) {
    let moved = 0;
    const radii = weights.map(w => w * scale);

    // A. Repulsion (resolve overlaps, the smaller circle moves further)
    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        let dx = points[i][0] - points[j][0];
        let dy = points[i][1] - points[j][1];
        let dist = Math.hypot(dx, dy);
        const minDist = radii[i] + radii[j];

        if (dist < minDist) {
          if (dist === 0) {
            dx = 1e-3;
            dy = 1e-3 * (i + 1);
            dist = Math.hypot(dx, dy);
          }
          const overlap = minDist - dist;
          moved = Math.max(moved, overlap);
          const shareI = radii[j] / minDist;
          const shareJ = radii[i] / minDist;
          points[i][0] += (dx / dist) * overlap * shareI;
          points[i][1] += (dy / dist) * overlap * shareI;
          points[j][0] -= (dx / dist) * overlap * shareJ;
          points[j][1] -= (dy / dist) * overlap * shareJ;
        }
      }
    }

    // B. Boundary constraint (keep in circle)
    points.forEach((point, i) => {
      const dist = Math.hypot(point[0], point[1]);
      const limit = 1 - radii[i];
      if (dist > limit) {
        moved = Math.max(moved, dist - limit);
        if (limit <= 0) {
          point[0] = 0;
          point[1] = 0;
        } else {
          point[0] *= limit / dist;
          point[1] *= limit / dist;
        }
      }
    });

    scale *= moved < 1e-7 ? 1.004 : 0.9995;
  }

  return points;
}

/**
 * Pack `n` circles of the given type into the unit disk.
 * @returns `[x, y, r]` triples rounded to six decimals, by increasing radius
 */
export function solvePacking(
  type: PackingType,
  n: number,
  options: SolveOptions = {}
): [number, number, number][] {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`Circle count must be a positive integer, got ${n}`);
  }
  if (n === 1) {
    return [[0, 0, 1]];
  }

  const { restarts = n < 10 ? 12 : 6, iterations = n < 12 ? 3000 : 2000, rng = defaultRng } = options;
  const weights = relativeRadii(type, n);

  let best: { scale: number; points: Point[] } | null = null;
  for (let attempt = 0; attempt < restarts; attempt++) {
    const points = relax(weights, rng, iterations);
    const scale = feasibleScale(points, weights);
    if (!best || scale > best.scale) {
      best = { scale, points };
    }
  }
  if (!best) {
    throw new RangeError(`At least one restart is required, got ${restarts}`);
  }

  const rounded: Point[] = best.points.map(([x, y]) => [round6(x), round6(y)]);
  const scale = feasibleScale(rounded, weights);

  return rounded.map(([x, y], i) => [
    x,
    y,
    round6(Math.floor(scale * weights[i] * DECIMALS) / DECIMALS - 1e-6),
  ]);
}
