/**
 * Defaults and option sets for the Quad Division app.
 */

import { About, type Quantity } from '../lib/core/settings.js';

/**
 * Separation (border width) choices in pixels.
 */
export const SEPARATION_OPTIONS: ReadonlyArray<number> = [1, 2, 5, 10];

/**
 * Quantity targets offered in the settings panel.
 */
export const QUANTITY_OPTIONS: ReadonlyArray<Quantity> = [About(20), About(50), About(100), About(200)];

/**
 * Tick interval choices in milliseconds, labelled by speed.
 */
export const TICK_INTERVAL_OPTIONS: ReadonlyArray<{ readonly label: string; readonly ms: number }> = [
  { label: 'Fast', ms: 25 },
  { label: 'Normal', ms: 100 },
  { label: 'Slow', ms: 500 },
];

export const DEFAULT_SEPARATION = 5;
export const DEFAULT_QUANTITY: Quantity = About(50);
export const DEFAULT_TICK_INTERVAL = 100;

/**
 * localStorage key for persisted settings.
 */
export const SETTINGS_STORAGE_KEY = 'quad-division-settings';

/**
 * Options read from the page URL at startup.
 *
 * @property fixedSeed - `?seed=<int>`: use this seed instead of real randomness
 * @property validate - `?validate`: check the partition after every step
 */
export interface LaunchOptions {
  readonly fixedSeed: number | null;
  readonly validate: boolean;
}

/**
 * Parse launch options from a query string such as `?seed=42&validate`.
 */
export function parseLaunchOptions(search: string): LaunchOptions {
  const params = new URLSearchParams(search);
  const rawSeed = params.get('seed')?.trim() ?? '';
  const parsed = rawSeed === '' ? NaN : Number(rawSeed);

  return {
    fixedSeed: Number.isInteger(parsed) ? parsed : null,
    validate: params.has('validate'),
  };
}
