/**
 * Data structures for a quad division.
 *
 * A division is kept as flat collections rather than a tree: a FIFO queue of
 * regions still awaiting a decision and the list of finalized leaves. A
 * region's ancestry is not needed once it exists.
 */

import type { Rect, Viewport } from '../core/geometry.js';
import type { Seed } from '../core/random.js';
import type { Settings } from '../core/settings.js';

/**
 * A rectangle tracked by the engine.
 *
 * @property id - Stable per-division identity, e.g. "region-7"
 * @property depth - Number of splits between the viewport and this region
 * @property color - Fill chosen when the region was created; never changes
 */
export interface Region {
  readonly id: string;
  readonly rect: Rect;
  readonly depth: number;
  readonly color: string;
}

/**
 * The complete state of one division.
 */
export interface QuadDivision {
  readonly viewport: Viewport;
  readonly settings: Settings;
  /** Current random state, advanced by every draw */
  readonly seed: Seed;
  /** Integer seed this division was started from */
  readonly generation: number;
  /** Regions awaiting a split-or-finalize decision, in FIFO order */
  readonly pending: ReadonlyArray<Region>;
  /** Finalized regions, in the order they were finalized */
  readonly leaves: ReadonlyArray<Region>;
  /** Gaps left between split children */
  readonly seams: ReadonlyArray<Rect>;
  /** Summed area of `pending` */
  readonly pendingArea: number;
  readonly nextId: number;
  /** Number of steps that did work */
  readonly steps: number;
}

/**
 * Outcome of a split attempt.
 */
export type SplitResult =
  | { readonly type: 'split'; readonly first: Rect; readonly second: Rect; readonly seam: Rect }
  | { readonly type: 'degenerate' };

export type Axis = 'vertical' | 'horizontal';
