/**
 * Geometry primitives for the division engine.
 */

// =============================================================================
// Viewport
// =============================================================================

/**
 * The bounding area of a whole division, in pixels.
 */
export interface Viewport {
  readonly width: number;
  readonly height: number;
}

/**
 * Smallest side length a region may have.
 */
export const MIN_REGION_SIZE = 1;

/**
 * Create a Viewport, clamping each dimension to at least MIN_REGION_SIZE.
 * Non-finite values are treated as the minimum.
 */
export function Viewport(width: number, height: number): Viewport {
  return Object.freeze({
    width: clampDimension(width),
    height: clampDimension(height),
  });
}

function clampDimension(value: number): number {
  return Number.isFinite(value) ? Math.max(MIN_REGION_SIZE, value) : MIN_REGION_SIZE;
}

// =============================================================================
// Rectangles
// =============================================================================

/**
 * An axis-aligned rectangle with its origin at the top-left corner.
 */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export function Rect(x: number, y: number, width: number, height: number): Rect {
  return Object.freeze({ x, y, width, height });
}

/**
 * The rectangle covering a whole viewport.
 */
export function viewportRect(viewport: Viewport): Rect {
  return Rect(0, 0, viewport.width, viewport.height);
}

export function area(rect: Rect): number {
  return rect.width * rect.height;
}

/**
 * Area of the intersection of two rectangles (0 when they only touch).
 */
export function overlapArea(a: Rect, b: Rect): number {
  const w = Math.min(a.x + a.width, b.x + b.width) - Math.max(a.x, b.x);
  const h = Math.min(a.y + a.height, b.y + b.height) - Math.max(a.y, b.y);
  return w > 0 && h > 0 ? w * h : 0;
}

/**
 * Whether `inner` lies within `outer`, allowing for floating point drift.
 */
export function containsRect(outer: Rect, inner: Rect, epsilon: number = 1e-9): boolean {
  return (
    inner.x >= outer.x - epsilon &&
    inner.y >= outer.y - epsilon &&
    inner.x + inner.width <= outer.x + outer.width + epsilon &&
    inner.y + inner.height <= outer.y + outer.height + epsilon
  );
}

/**
 * Width divided by height.
 */
export function aspectRatio(rect: Rect): number {
  return rect.width / rect.height;
}
