/**
 * Split geometry - cutting one rectangle into two with a gap between them.
 */

import { MIN_REGION_SIZE, Rect, aspectRatio } from '../core/geometry.js';
import { chance, float, type Draw, type Seed } from '../core/random.js';
import type { Axis, SplitResult } from './types.js';

/**
 * Aspect ratio beyond which the longer side is always the one cut.
 */
export const ELONGATED_RATIO = 1.5;

/**
 * Split positions are drawn from this fraction range of the usable extent.
 */
export const SPLIT_MIN_FRACTION = 1 / 3;
export const SPLIT_MAX_FRACTION = 2 / 3;

/**
 * Choose the axis to cut along.
 *
 * A 'vertical' cut divides the width (children side by side); a 'horizontal'
 * cut divides the height (children stacked). Elongated rectangles are cut
 * across their longer side; near-square ones by a fair coin.
 */
export function chooseAxis(rect: Rect, seed: Seed): Draw<Axis> {
  const ratio = aspectRatio(rect);
  if (ratio > ELONGATED_RATIO) {
    return ['vertical', seed];
  }
  if (ratio < 1 / ELONGATED_RATIO) {
    return ['horizontal', seed];
  }
  const [vertical, next] = chance(0.5, seed);
  return [vertical ? 'vertical' : 'horizontal', next];
}

/**
 * Cut `rect` along `axis` at `fraction` of the space left after removing
 * `separation`.
 *
 * The children and the seam exactly tile the parent:
 * first + separation + second = parent extent along the axis.
 * Returns 'degenerate' when either child would be thinner than
 * MIN_REGION_SIZE.
 */
export function splitRect(rect: Rect, axis: Axis, fraction: number, separation: number): SplitResult {
  const extent = axis === 'vertical' ? rect.width : rect.height;
  const usable = extent - separation;

  if (usable < 2 * MIN_REGION_SIZE) {
    return { type: 'degenerate' };
  }

  const firstExtent = Math.min(
    usable - MIN_REGION_SIZE,
    Math.max(MIN_REGION_SIZE, usable * fraction)
  );
  const secondExtent = extent - firstExtent - separation;

  if (axis === 'vertical') {
    return {
      type: 'split',
      first: Rect(rect.x, rect.y, firstExtent, rect.height),
      seam: Rect(rect.x + firstExtent, rect.y, separation, rect.height),
      second: Rect(rect.x + firstExtent + separation, rect.y, secondExtent, rect.height),
    };
  }

  return {
    type: 'split',
    first: Rect(rect.x, rect.y, rect.width, firstExtent),
    seam: Rect(rect.x, rect.y + firstExtent, rect.width, separation),
    second: Rect(rect.x, rect.y + firstExtent + separation, rect.width, secondExtent),
  };
}

/**
 * Draw an axis and position, then split.
 */
export function randomSplit(rect: Rect, separation: number, seed: Seed): Draw<SplitResult> {
  const [axis, afterAxis] = chooseAxis(rect, seed);
  const [fraction, next] = float(SPLIT_MIN_FRACTION, SPLIT_MAX_FRACTION, afterAxis);
  return [splitRect(rect, axis, fraction, separation), next];
}
