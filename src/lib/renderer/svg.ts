/**
 * SVG serialization of a Drawing.
 */

import type { Drawing, DrawingElement } from './drawing.js';

const SVG_NS = 'http://www.w3.org/2000/svg';

/**
 * Format a coordinate with at most two decimals and no trailing zeros.
 */
export function formatNumber(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

/**
 * Escape a string for use inside a double-quoted XML attribute.
 */
export function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function elementToSvg(element: DrawingElement): string {
  const opacity = element.opacity < 1 ? ` fill-opacity="${formatNumber(element.opacity)}"` : '';
  return `  <rect id="${escapeAttribute(element.id)}" x="${formatNumber(element.x)}" y="${formatNumber(element.y)}" ` +
    `width="${formatNumber(element.width)}" height="${formatNumber(element.height)}" ` +
    `fill="${escapeAttribute(element.fill)}"${opacity} />`;
}

/**
 * Serialize a drawing to a standalone SVG 1.1 document.
 *
 * @example
 * ```typescript
 * const svg = toSvg(view(model));
 * // '<?xml version="1.0" encoding="UTF-8"?>\n<svg id="quad-division-42" ...'
 * ```
 */
export function toSvg(drawing: Drawing): string {
  const width = formatNumber(drawing.width);
  const height = formatNumber(drawing.height);
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<svg id="${escapeAttribute(drawing.id)}" xmlns="${SVG_NS}" version="1.1" ` +
      `width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `  <rect x="0" y="0" width="${width}" height="${height}" fill="${escapeAttribute(drawing.background)}" />`,
    ...drawing.elements.map(elementToSvg),
    '</svg>',
  ];
  return lines.join('\n') + '\n';
}
