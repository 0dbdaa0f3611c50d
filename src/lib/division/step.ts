/**
 * Incremental subdivision - one decision per call.
 *
 * The pending regions form an explicit FIFO work list. Each step takes the
 * oldest pending region and either finalizes it as a leaf or replaces it with
 * two children appended to the back of the queue.
 */

import { area } from '../core/geometry.js';
import { chance, type Seed } from '../core/random.js';
import type { Settings } from '../core/settings.js';
import { createRegion, done } from './model.js';
import { randomSplit } from './split.js';
import type { QuadDivision, Region } from './types.js';

/**
 * Probability that a region is split rather than finalized.
 *
 * The remaining leaf budget (target minus leaves so far) is shared among the
 * pending regions in proportion to their area. A region whose share is one
 * leaf or less is finalized; a share of two or more always splits; in between
 * the probability rises linearly.
 *
 * @param regionArea - Area of the region being decided
 * @param pendingArea - Summed area of all pending regions (including this one)
 * @param leafCount - Leaves finalized so far
 */
export function splitProbability(
  settings: Settings,
  regionArea: number,
  pendingArea: number,
  leafCount: number
): number {
  const budget = settings.quantity.count - leafCount;
  if (budget <= 0 || regionArea <= 0) {
    return 0;
  }
  const share = (budget * regionArea) / Math.max(pendingArea, regionArea);
  return Math.min(1, Math.max(0, share - 1));
}

/**
 * Perform one unit of work.
 *
 * Returns the same model object when the division is already done.
 */
export function subdivideStep(model: QuadDivision): QuadDivision {
  if (done(model)) {
    return model;
  }

  const [region, ...rest] = model.pending;
  const regionArea = area(region.rect);
  const probability = splitProbability(
    model.settings,
    regionArea,
    model.pendingArea,
    model.leaves.length
  );

  const [shouldSplit, afterDecision] = chance(probability, model.seed);
  if (!shouldSplit) {
    return finalize(model, region, rest, afterDecision);
  }

  const [result, afterSplit] = randomSplit(region.rect, model.settings.separation, afterDecision);
  if (result.type === 'degenerate') {
    return finalize(model, region, rest, afterSplit);
  }

  const [first, afterFirst] = createRegion(result.first, region.depth + 1, model.nextId, afterSplit);
  const [second, afterSecond] = createRegion(result.second, region.depth + 1, model.nextId + 1, afterFirst);
  const seams = result.seam.width > 0 && result.seam.height > 0
    ? Object.freeze([...model.seams, result.seam])
    : model.seams;

  return Object.freeze({
    ...model,
    seed: afterSecond,
    pending: Object.freeze([...rest, first, second]),
    seams,
    pendingArea: model.pendingArea - regionArea + area(first.rect) + area(second.rect),
    nextId: model.nextId + 2,
    steps: model.steps + 1,
  });
}

function finalize(
  model: QuadDivision,
  region: Region,
  rest: Region[],
  seed: Seed
): QuadDivision {
  return Object.freeze({
    ...model,
    seed,
    pending: Object.freeze(rest),
    leaves: Object.freeze([...model.leaves, region]),
    pendingArea: rest.length === 0 ? 0 : model.pendingArea - area(region.rect),
    steps: model.steps + 1,
  });
}

/**
 * Step until done, up to `maxSteps` steps.
 */
export function runToCompletion(model: QuadDivision, maxSteps: number = 100_000): QuadDivision {
  let current = model;
  for (let i = 0; i < maxSteps && !done(current); i++) {
    current = subdivideStep(current);
  }
  return current;
}
