/**
 * Division lifecycle: creating, restarting and reconfiguring a QuadDivision.
 *
 * Every function returns a new frozen model; the input is never modified.
 */

import { Viewport, area, viewportRect, type Rect } from '../core/geometry.js';
import { independentSeed, initialSeed, type Draw, type Seed } from '../core/random.js';
import {
  applySettingChange,
  createSettings,
  type Settings,
  type SettingChange,
} from '../core/settings.js';
import { drawRegionColor } from '../renderer/colors.js';
import type { QuadDivision, Region } from './types.js';

/**
 * Seed used before real randomness is available, so the first frame is
 * deterministic.
 */
export const PLACEHOLDER_SEED = 0;

/**
 * Create a fresh region with the next id and a newly drawn color.
 */
export function createRegion(
  rect: Rect,
  depth: number,
  nextId: number,
  seed: Seed
): Draw<Region> {
  const [color, next] = drawRegionColor(depth, seed);
  const region: Region = Object.freeze({
    id: `region-${nextId}`,
    rect,
    depth,
    color,
  });
  return [region, next];
}

/**
 * Start a division: a single pending region covering the whole viewport.
 *
 * Out-of-range inputs are clamped (viewport sides to at least 1px, separation
 * to at least 0, quantity to at least 1).
 *
 * @example
 * ```typescript
 * const model = initialize(42, Viewport(800, 600), createSettings(5, About(50)));
 * // model.pending.length === 1, done(model) === false
 * ```
 */
export function initialize(seed: number, viewport: Viewport, settings: Settings): QuadDivision {
  const bounds = Viewport(viewport.width, viewport.height);
  const random = initialSeed(seed);
  const rect = viewportRect(bounds);
  const [root, next] = createRegion(rect, 0, 0, random);

  return Object.freeze({
    viewport: bounds,
    settings: createSettings(settings.separation, settings.quantity),
    seed: next,
    generation: random.state,
    pending: Object.freeze([root]),
    leaves: Object.freeze([]),
    seams: Object.freeze([]),
    pendingArea: area(rect),
    nextId: 1,
    steps: 0,
  });
}

/**
 * True when no regions are left to decide on.
 */
export function done(model: QuadDivision): boolean {
  return model.pending.length === 0;
}

/**
 * Discard all regions and start again from a seed drawn from the current
 * random state. Viewport and settings are kept.
 */
export function restart(model: QuadDivision): QuadDivision {
  const [seed] = independentSeed(model.seed);
  return initialize(seed, model.viewport, model.settings);
}

/**
 * Restart within a new viewport. Uses the same reseeding as `restart`.
 */
export function resize(viewport: Viewport, model: QuadDivision): QuadDivision {
  const [seed] = independentSeed(model.seed);
  return initialize(seed, viewport, model.settings);
}

/**
 * Install a fresh random source and start the division over from it.
 */
export function setSeed(seed: number, model: QuadDivision): QuadDivision {
  return initialize(seed, model.viewport, model.settings);
}

/**
 * Update settings. Existing regions keep their rectangles; only decisions
 * made after this call see the new values. A finished division stays
 * finished until it is restarted.
 */
export function changeSetting(change: SettingChange, model: QuadDivision): QuadDivision {
  return Object.freeze({
    ...model,
    settings: applySettingChange(model.settings, change),
  });
}

/**
 * Total number of regions currently tracked (pending and finalized).
 */
export function regionCount(model: QuadDivision): number {
  return model.pending.length + model.leaves.length;
}
