/**
 * Type definitions for the Quad Division app.
 */

import type { Quantity } from '../lib/core/settings.js';
import type { QuadDivision } from '../lib/division/types.js';

/**
 * Settings the user can change and that survive a reload.
 */
export interface StoredSettings {
  separation: number;
  quantity: Quantity;
  tickInterval: number; // ms between steps
}

export interface AppState {
  division: QuadDivision;
  tickInterval: number;
  paused: boolean;
  /** Settings changed after the division finished; a restart applies them */
  settingsChangedWhileDone: boolean;
}

/**
 * Result of an operation that can fail without throwing.
 */
export interface OperationResult {
  success: boolean;
  error?: string;
}
