/**
 * Tests for settings persistence.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { About } from '../../src/lib/core/settings.js';
import { SETTINGS_STORAGE_KEY } from '../../src/app/config.js';
import {
  LocalStorageAdapter,
  MemoryStorageAdapter,
  defaultSettings,
  readSettings,
} from '../../src/app/storage.js';
import { createMemoryStorage } from '../helpers/memory-storage.js';

describe('readSettings', () => {
  it('falls back to defaults for non-objects', () => {
    expect(readSettings(null)).toEqual({ settings: defaultSettings(), rejected: ['settings'] });
    expect(readSettings([1, 2])).toEqual({ settings: defaultSettings(), rejected: ['settings'] });
  });

  it('keeps valid fields', () => {
    expect(readSettings({ separation: 0, quantity: 200, tickInterval: 500 })).toEqual({
      settings: { separation: 0, quantity: About(200), tickInterval: 500 },
      rejected: [],
    });
  });

  it('accepts quantity written as an object', () => {
    expect(readSettings({ quantity: { type: 'about', count: 100 } }).settings.quantity).toEqual(About(100));
  });

  it('uses defaults for missing fields without rejecting them', () => {
    expect(readSettings({ separation: 2 })).toEqual({
      settings: { ...defaultSettings(), separation: 2 },
      rejected: [],
    });
  });

  it('rejects out-of-range fields', () => {
    expect(readSettings({ separation: -1, quantity: 'many', tickInterval: 0 })).toEqual({
      settings: defaultSettings(),
      rejected: ['separation', 'quantity', 'tickInterval'],
    });
  });
});

describe('LocalStorageAdapter', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('loads defaults when nothing is stored', () => {
    const adapter = new LocalStorageAdapter(createMemoryStorage());

    expect(adapter.load()).toEqual({
      success: true,
      settings: { separation: 5, quantity: About(50), tickInterval: 100 },
    });
  });

  it('round trips saved settings', () => {
    const storage = createMemoryStorage();
    const adapter = new LocalStorageAdapter(storage);
    const settings = { separation: 10, quantity: About(200), tickInterval: 25 };

    expect(adapter.save(settings)).toEqual({ success: true });
    expect(storage.getItem(SETTINGS_STORAGE_KEY)).toBe('{"separation":10,"quantity":200,"tickInterval":25}');
    expect(new LocalStorageAdapter(storage).load()).toEqual({ success: true, settings });
  });

  it('reads hand-written JSON5', () => {
    const storage = createMemoryStorage({
      [SETTINGS_STORAGE_KEY]: "{ separation: 2, quantity: 20, tickInterval: 500, // slow\n }",
    });

    expect(new LocalStorageAdapter(storage).load().settings).toEqual({
      separation: 2,
      quantity: About(20),
      tickInterval: 500,
    });
  });

  it('warns about and replaces invalid stored fields', () => {
    const storage = createMemoryStorage({
      [SETTINGS_STORAGE_KEY]: '{"separation": -1, "quantity": "many", "tickInterval": 25}',
    });
    const result = new LocalStorageAdapter(storage).load();

    expect(result.success).toBe(true);
    expect(result.settings).toEqual({ separation: 5, quantity: About(50), tickInterval: 25 });
    expect(console.warn).toHaveBeenCalledWith('⚠️ Ignoring invalid stored settings: separation, quantity');
  });

  it('reports malformed data and returns defaults', () => {
    const storage = createMemoryStorage({ [SETTINGS_STORAGE_KEY]: 'not json{' });
    const result = new LocalStorageAdapter(storage).load();

    expect(result.success).toBe(false);
    expect(result.settings).toEqual(defaultSettings());
    expect(result.error).toBeDefined();
  });

  it('reports storage write failures', () => {
    const storage = createMemoryStorage();
    storage.setItem = () => {
      throw new Error('quota exceeded');
    };

    expect(new LocalStorageAdapter(storage).save(defaultSettings())).toEqual({
      success: false,
      error: 'quota exceeded',
    });
  });

  it('uses a custom key', () => {
    const storage = createMemoryStorage();
    new LocalStorageAdapter(storage, 'other-key').save(defaultSettings());

    expect(storage.getItem('other-key')).not.toBeNull();
    expect(storage.getItem(SETTINGS_STORAGE_KEY)).toBeNull();
  });
});

describe('MemoryStorageAdapter', () => {
  it('keeps settings for the session', () => {
    const adapter = new MemoryStorageAdapter();
    adapter.save({ separation: 1, quantity: About(20), tickInterval: 500 });

    expect(adapter.load()).toEqual({
      success: true,
      settings: { separation: 1, quantity: About(20), tickInterval: 500 },
    });
  });
});
