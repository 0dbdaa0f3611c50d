/**
 * Engine-facing settings.
 */

// =============================================================================
// Quantity
// =============================================================================

/**
 * Soft target for the number of leaf regions in a finished division.
 */
export interface Quantity {
  readonly type: 'about';
  readonly count: number;
}

/**
 * Create a Quantity aiming for roughly `count` regions (at least 1).
 */
export function About(count: number): Quantity {
  const clamped = Number.isFinite(count) ? Math.max(1, Math.round(count)) : 1;
  return Object.freeze({ type: 'about', count: clamped });
}

export function quantityLabel(quantity: Quantity): string {
  return `About ${quantity.count}`;
}

// =============================================================================
// Settings
// =============================================================================

export interface Settings {
  /** Gap in pixels between the two children of a split */
  readonly separation: number;
  readonly quantity: Quantity;
}

/**
 * Create Settings, clamping separation to a non-negative finite number.
 */
export function createSettings(separation: number, quantity: Quantity): Settings {
  return Object.freeze({
    separation: Number.isFinite(separation) ? Math.max(0, separation) : 0,
    quantity: About(quantity.count),
  });
}

// =============================================================================
// Setting Changes
// =============================================================================

export interface SeparationChange {
  readonly type: 'separation';
  readonly value: number;
}

export interface QuantityChange {
  readonly type: 'quantity';
  readonly value: Quantity;
}

export type SettingChange = SeparationChange | QuantityChange;

export function SeparationChange(value: number): SeparationChange {
  return Object.freeze({ type: 'separation', value });
}

export function QuantityChange(value: Quantity): QuantityChange {
  return Object.freeze({ type: 'quantity', value });
}

/**
 * Apply a change, returning new Settings.
 */
export function applySettingChange(settings: Settings, change: SettingChange): Settings {
  switch (change.type) {
    case 'separation':
      return createSettings(change.value, settings.quantity);
    case 'quantity':
      return createSettings(settings.separation, change.value);
  }
}
