/**
 * Persistence of user settings for the Quad Division app.
 */

import JSON5 from 'json5';
import { About } from '../lib/core/settings.js';
import {
  DEFAULT_QUANTITY,
  DEFAULT_SEPARATION,
  DEFAULT_TICK_INTERVAL,
  SETTINGS_STORAGE_KEY,
} from './config.js';
import type { OperationResult, StoredSettings } from './types.js';

/**
 * Storage interface for saving/loading settings
 */
export interface StorageAdapter {
  save(settings: StoredSettings): OperationResult;
  load(): { success: boolean; settings: StoredSettings; error?: string };
}

export function defaultSettings(): StoredSettings {
  return {
    separation: DEFAULT_SEPARATION,
    quantity: DEFAULT_QUANTITY,
    tickInterval: DEFAULT_TICK_INTERVAL,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build StoredSettings from parsed data, keeping each valid field and
 * falling back to the default for the rest.
 *
 * @returns The settings and the names of fields that were rejected
 */
export function readSettings(data: unknown): { settings: StoredSettings; rejected: string[] } {
  const settings = defaultSettings();
  const rejected: string[] = [];

  if (!isRecord(data)) {
    return { settings, rejected: ['settings'] };
  }

  const { separation, quantity, tickInterval } = data;

  if (typeof separation === 'number' && Number.isFinite(separation) && separation >= 0) {
    settings.separation = separation;
  } else if (separation !== undefined) {
    rejected.push('separation');
  }

  const count = isRecord(quantity) ? quantity.count : quantity;
  if (typeof count === 'number' && Number.isFinite(count) && count >= 1) {
    settings.quantity = About(count);
  } else if (quantity !== undefined) {
    rejected.push('quantity');
  }

  if (typeof tickInterval === 'number' && Number.isFinite(tickInterval) && tickInterval > 0) {
    settings.tickInterval = tickInterval;
  } else if (tickInterval !== undefined) {
    rejected.push('tickInterval');
  }

  return { settings, rejected };
}

/**
 * Web Storage adapter (localStorage in the browser).
 * Stored text is parsed with JSON5 so hand-edited values are accepted.
 */
export class LocalStorageAdapter implements StorageAdapter {
  constructor(
    private readonly storage: Storage,
    private readonly key: string = SETTINGS_STORAGE_KEY
  ) {}

  /**
   * Save settings to storage
   */
  save(settings: StoredSettings): OperationResult {
    try {
      this.storage.setItem(this.key, JSON.stringify({
        separation: settings.separation,
        quantity: settings.quantity.count,
        tickInterval: settings.tickInterval,
      }));
      console.log('💾 Saved settings');
      return { success: true };
    } catch (error) {
      console.error('Failed to save settings:', error);
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /**
   * Load settings from storage. Missing settings are not an error.
   */
  load(): { success: boolean; settings: StoredSettings; error?: string } {
    try {
      const stored = this.storage.getItem(this.key);
      if (stored === null) {
        return { success: true, settings: defaultSettings() };
      }

      const { settings, rejected } = readSettings(JSON5.parse(stored));
      if (rejected.length > 0) {
        console.warn(`⚠️ Ignoring invalid stored settings: ${rejected.join(', ')}`);
      }
      console.log('📦 Loaded settings');
      return { success: true, settings };
    } catch (error) {
      console.error('Failed to load settings:', error);
      return {
        success: false,
        settings: defaultSettings(),
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

/**
 * Adapter used when no Web Storage is available (e.g. blocked by privacy
 * settings). Keeps settings for the current page only.
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private settings: StoredSettings = defaultSettings();

  save(settings: StoredSettings): OperationResult {
    this.settings = { ...settings };
    return { success: true };
  }

  load(): { success: boolean; settings: StoredSettings } {
    return { success: true, settings: { ...this.settings } };
  }
}

/**
 * Create the storage adapter for this environment.
 */
export function createStorageAdapter(): StorageAdapter {
  try {
    if (typeof localStorage !== 'undefined') {
      return new LocalStorageAdapter(localStorage);
    }
  } catch (error) {
    console.warn('localStorage unavailable, settings will not persist:', error);
  }
  return new MemoryStorageAdapter();
}
