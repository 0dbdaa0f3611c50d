/**
 * Rendering pipeline:
 * 1. View: QuadDivision -> Drawing (plain rectangles with fills)
 * 2. Serialize: Drawing -> SVG document string
 */

export { view, drawingId, PENDING_OPACITY } from './drawing.js';
export type { Drawing, DrawingElement } from './drawing.js';
export { toSvg, formatNumber, escapeAttribute } from './svg.js';
export { hslToHex, drawRegionColor, BACKGROUND_COLOR } from './colors.js';
