/**
 * Projection of a division into drawable geometry.
 */

import type { QuadDivision, Region } from '../division/types.js';
import { BACKGROUND_COLOR } from './colors.js';

/**
 * Opacity of regions that may still be split.
 */
export const PENDING_OPACITY = 0.35;

export interface DrawingElement {
  readonly id: string;
  readonly kind: 'leaf' | 'pending';
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly fill: string;
  readonly opacity: number;
}

/**
 * Everything needed to render or export one division.
 *
 * @property id - Identity of the whole drawing; doubles as the export file name base
 */
export interface Drawing {
  readonly id: string;
  readonly width: number;
  readonly height: number;
  readonly background: string;
  readonly elements: ReadonlyArray<DrawingElement>;
}

/**
 * Identity of the drawing produced by a division.
 */
export function drawingId(model: QuadDivision): string {
  return `quad-division-${model.generation >>> 0}`;
}

function toElement(region: Region, kind: DrawingElement['kind']): DrawingElement {
  return {
    id: region.id,
    kind,
    x: region.rect.x,
    y: region.rect.y,
    width: region.rect.width,
    height: region.rect.height,
    fill: region.color,
    opacity: kind === 'leaf' ? 1 : PENDING_OPACITY,
  };
}

/**
 * Project every region of the division: leaves first (in finalization order),
 * then pending regions (in queue order).
 */
export function view(model: QuadDivision): Drawing {
  return {
    id: drawingId(model),
    width: model.viewport.width,
    height: model.viewport.height,
    background: BACKGROUND_COLOR,
    elements: [
      ...model.leaves.map(region => toElement(region, 'leaf')),
      ...model.pending.map(region => toElement(region, 'pending')),
    ],
  };
}
