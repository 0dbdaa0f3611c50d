/**
 * State management for the Quad Division app.
 *
 * Holds the current division, drives it with a step timer and notifies
 * listeners after every change.
 */

import { Viewport } from '../lib/core/geometry.js';
import { About, createSettings, type SettingChange } from '../lib/core/settings.js';
import {
  PLACEHOLDER_SEED,
  changeSetting,
  done,
  initialize,
  regionCount,
  resize,
  restart,
  setSeed,
  subdivideStep,
  validatingStep,
} from '../lib/division/index.js';
import type { QuadDivision } from '../lib/division/types.js';
import { MemoryStorageAdapter, type StorageAdapter } from './storage.js';
import type { AppState, StoredSettings } from './types.js';

export interface StateOptions {
  /** Seed for the first frame */
  seed?: number;
  /** Validate the partition after every step */
  validate?: boolean;
  storage?: StorageAdapter;
}

let state: AppState = createState(Viewport(1, 1), {
  separation: 0,
  quantity: About(1),
  tickInterval: 100,
}, PLACEHOLDER_SEED);
let stateChangeCallbacks: Array<(state: AppState) => void> = [];
let storage: StorageAdapter = new MemoryStorageAdapter();
let step: (model: QuadDivision) => QuadDivision = subdivideStep;

/**
 * Step timer
 */
let tickTimer: ReturnType<typeof setInterval> | null = null;

function createState(viewport: Viewport, settings: StoredSettings, seed: number): AppState {
  return {
    division: initialize(seed, viewport, createSettings(settings.separation, settings.quantity)),
    tickInterval: settings.tickInterval,
    paused: false,
    settingsChangedWhileDone: false,
  };
}

/**
 * Set up the division for the given viewport and start stepping.
 */
export function initializeState(
  viewport: Viewport,
  settings: StoredSettings,
  options: StateOptions = {}
): void {
  stopTimer();
  storage = options.storage ?? new MemoryStorageAdapter();
  step = options.validate ? validatingStep(subdivideStep) : subdivideStep;
  state = createState(viewport, settings, options.seed ?? PLACEHOLDER_SEED);
  syncTimer();
  notifyStateChange();
}

/**
 * Register a callback to be called when state changes
 */
export function onStateChange(callback: (state: AppState) => void): void {
  stateChangeCallbacks.push(callback);
}

/**
 * Notify all listeners that state has changed
 */
function notifyStateChange(): void {
  stateChangeCallbacks.forEach(cb => cb(state));
}

/**
 * Get the current state
 */
export function getState(): AppState {
  return state;
}

/**
 * Whether the step timer is currently running.
 */
export function isTicking(): boolean {
  return tickTimer !== null;
}

function startTimer(): void {
  stopTimer();
  tickTimer = setInterval(tick, state.tickInterval);
}

function stopTimer(): void {
  if (tickTimer !== null) {
    clearInterval(tickTimer);
    tickTimer = null;
  }
}

/**
 * Run the timer exactly when there is work to do and the user has not paused.
 */
function syncTimer(): void {
  if (state.paused || done(state.division)) {
    stopTimer();
  } else if (tickTimer === null) {
    startTimer();
  }
}

function replaceDivision(division: QuadDivision): void {
  state = { ...state, division, settingsChangedWhileDone: false };
  syncTimer();
  notifyStateChange();
}

function currentSettings(): StoredSettings {
  return {
    separation: state.division.settings.separation,
    quantity: state.division.settings.quantity,
    tickInterval: state.tickInterval,
  };
}

/**
 * Advance the division by one step. A tick that arrives after the division
 * finished does nothing.
 */
export function tick(): void {
  const before = state.division;
  let division: QuadDivision;
  try {
    division = step(before);
  } catch (error) {
    stopTimer();
    console.error('Step failed, stopping:', error);
    throw error;
  }
  if (division === before) {
    syncTimer();
    return;
  }

  state = { ...state, division };
  if (done(division)) {
    console.log(`✅ Division complete: ${regionCount(division)} regions in ${division.steps} steps`);
  }
  syncTimer();
  notifyStateChange();
}

/**
 * Stop stepping until resumed.
 */
export function pause(): void {
  if (state.paused) return;
  state = { ...state, paused: true };
  syncTimer();
  console.log('⏸️  Paused');
  notifyStateChange();
}

export function resume(): void {
  if (!state.paused) return;
  state = { ...state, paused: false };
  syncTimer();
  console.log('▶️  Resumed');
  notifyStateChange();
}

export function togglePause(): void {
  if (state.paused) {
    resume();
  } else {
    pause();
  }
}

/**
 * Start a new division with the current settings.
 */
export function restartDivision(): void {
  replaceDivision(restart(state.division));
  console.log('🔁 Restarted');
}

/**
 * Start a new division filling the new viewport.
 */
export function resizeViewport(viewport: Viewport): void {
  const current = state.division.viewport;
  if (current.width === viewport.width && current.height === viewport.height) {
    return;
  }
  replaceDivision(resize(viewport, state.division));
}

/**
 * Install a seed from real randomness. Called once at startup.
 */
export function deliverSeed(seed: number): void {
  replaceDivision(setSeed(seed, state.division));
  console.log(`🌱 Seeded with ${seed >>> 0}`);
}

/**
 * Change separation or quantity. Applies to splits decided from now on; a
 * finished division keeps its regions until restarted.
 */
export function updateSetting(change: SettingChange): void {
  const wasDone = done(state.division);
  state = {
    ...state,
    division: changeSetting(change, state.division),
    settingsChangedWhileDone: wasDone || state.settingsChangedWhileDone,
  };
  storage.save(currentSettings());
  notifyStateChange();
}

/**
 * Change the time between steps. Takes effect immediately if running.
 */
export function setTickInterval(ms: number): void {
  if (!(ms > 0) || ms === state.tickInterval) return;
  state = { ...state, tickInterval: ms };
  if (tickTimer !== null) {
    startTimer();
  }
  storage.save(currentSettings());
  notifyStateChange();
}

/**
 * Stop the timer and drop all listeners.
 */
export function disposeState(): void {
  stopTimer();
  stateChangeCallbacks = [];
}
