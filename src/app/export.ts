/**
 * SVG export for the Quad Division app.
 */

import type { Drawing } from '../lib/renderer/drawing.js';
import { toSvg } from '../lib/renderer/svg.js';
import type { OperationResult } from './types.js';

/**
 * Encode an SVG document as a data URL.
 */
export function svgDataUrl(svg: string): string {
  return 'data:image/svg+xml,' + encodeURIComponent(svg);
}

/**
 * File name used when downloading a drawing.
 */
export function exportFileName(drawing: Drawing): string {
  return `${drawing.id}.svg`;
}

/**
 * Serialize the drawing and trigger a browser download.
 */
export function downloadSvg(drawing: Drawing): OperationResult {
  try {
    const link = document.createElement('a');
    link.setAttribute('href', svgDataUrl(toSvg(drawing)));
    link.setAttribute('download', exportFileName(drawing));
    // Firefox only follows links that are in the document
    document.body.appendChild(link);
    link.click();
    link.remove();

    console.log(`📥 Exported ${exportFileName(drawing)}`);
    return { success: true };
  } catch (error) {
    console.error('Failed to export SVG:', error);
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
