/**
 * Color utilities for rendering.
 */

import { float, type Draw, type Seed } from '../core/random.js';

/**
 * Convert HSL color values to hex RGB format.
 *
 * @param h - Hue (0-360)
 * @param s - Saturation (0-1)
 * @param l - Lightness (0-1)
 * @returns Hex color string (e.g., "#rrggbb")
 */
export function hslToHex(h: number, s: number, l: number): string {
  const c = (1 - Math.abs(2 * l - 1)) * s;
  const x = c * (1 - Math.abs(((h / 60) % 2) - 1));
  const m = l - c / 2;

  let r = 0, g = 0, b = 0;
  if (h < 60) { r = c; g = x; b = 0; }
  else if (h < 120) { r = x; g = c; b = 0; }
  else if (h < 180) { r = 0; g = c; b = x; }
  else if (h < 240) { r = 0; g = x; b = c; }
  else if (h < 300) { r = x; g = 0; b = c; }
  else { r = c; g = 0; b = x; }

  const toHex = (n: number) => Math.round((n + m) * 255).toString(16).padStart(2, '0');
  return `#${toHex(r)}${toHex(g)}${toHex(b)}`;
}

/**
 * Background behind the regions; the seams show through as borders.
 */
export const BACKGROUND_COLOR = '#1d1d1f';

/**
 * Draw a fill color for a new region.
 *
 * Hue is uniform; lightness drifts slightly darker with depth so deeply
 * nested regions read as smaller.
 */
export function drawRegionColor(depth: number, seed: Seed): Draw<string> {
  const [hue, afterHue] = float(0, 360, seed);
  const [saturation, next] = float(0.45, 0.75, afterHue);
  const lightness = Math.max(0.4, 0.68 - depth * 0.015);
  return [hslToHex(hue, saturation, lightness), next];
}
