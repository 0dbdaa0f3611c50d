/**
 * Division Validator - checks the geometric invariants of a QuadDivision.
 *
 * Used by tests and, on request, by the app after every step, so a broken
 * partition is reported at the step that produced it rather than noticed
 * later in the rendering.
 */

import {
  area,
  containsRect,
  overlapArea,
  viewportRect,
  type Rect,
} from '../core/geometry.js';
import type { QuadDivision } from './types.js';

/**
 * Validation error details.
 */
export interface ValidationError {
  /** Human-readable error message */
  readonly message: string;
  /** The region that caused the error (if applicable) */
  readonly regionId?: string;
}

/**
 * Result of division validation.
 */
export interface ValidationResult {
  readonly valid: boolean;
  readonly error?: ValidationError;
}

interface Piece {
  readonly label: string;
  readonly regionId?: string;
  readonly rect: Rect;
}

const VALID: ValidationResult = { valid: true };

function invalid(message: string, regionId?: string): ValidationResult {
  return { valid: false, error: regionId === undefined ? { message } : { message, regionId } };
}

/**
 * Validate a division.
 *
 * Checks that:
 * 1. Every region has positive width and height
 * 2. Every region and seam lies inside the viewport
 * 3. No two pieces (regions or seams) overlap
 * 4. Regions and seams together cover the viewport area
 *
 * @example
 * ```typescript
 * const result = validateDivision(model);
 * if (!result.valid) {
 *   console.error(`Invalid division: ${result.error?.message}`);
 * }
 * ```
 */
export function validateDivision(model: QuadDivision, tolerance: number = 1e-6): ValidationResult {
  const bounds = viewportRect(model.viewport);
  const pieces: Piece[] = [
    ...[...model.leaves, ...model.pending].map(region => ({
      label: `Region '${region.id}'`,
      regionId: region.id,
      rect: region.rect,
    })),
    ...model.seams.map((rect, i) => ({ label: `Seam ${i}`, rect })),
  ];

  for (const region of [...model.leaves, ...model.pending]) {
    if (!(region.rect.width > 0 && region.rect.height > 0)) {
      return invalid(
        `Region '${region.id}' has non-positive size ${region.rect.width}x${region.rect.height}`,
        region.id
      );
    }
  }

  for (const piece of pieces) {
    if (!containsRect(bounds, piece.rect)) {
      return invalid(`${piece.label} lies outside the viewport`, piece.regionId);
    }
  }

  const boundsArea = area(bounds);
  const overlapTolerance = boundsArea * tolerance;
  for (let i = 0; i < pieces.length; i++) {
    for (let j = i + 1; j < pieces.length; j++) {
      if (overlapArea(pieces[i].rect, pieces[j].rect) > overlapTolerance) {
        return invalid(
          `${pieces[i].label} overlaps ${pieces[j].label}`,
          pieces[i].regionId ?? pieces[j].regionId
        );
      }
    }
  }

  const covered = pieces.reduce((sum, piece) => sum + area(piece.rect), 0);
  if (Math.abs(covered - boundsArea) > boundsArea * tolerance) {
    return invalid(`Pieces cover ${covered} of ${boundsArea} viewport area`);
  }

  return VALID;
}

/**
 * Validate a division and throw if invalid.
 *
 * @param context - Where the division came from, included in the error message
 * @throws Error if validation fails
 */
export function assertValidDivision(model: QuadDivision, context?: string): void {
  const result = validateDivision(model);
  if (!result.valid) {
    const prefix = context ? `[${context}] ` : '';
    throw new Error(`${prefix}Invalid division: ${result.error?.message ?? 'unknown error'}`);
  }
}

/**
 * Wrap a step function so each result is validated before it is returned.
 */
export function validatingStep(
  step: (model: QuadDivision) => QuadDivision
): (model: QuadDivision) => QuadDivision {
  return (model) => {
    const next = step(model);
    assertValidDivision(next, `${step.name || 'step'} #${next.steps}`);
    return next;
  };
}
