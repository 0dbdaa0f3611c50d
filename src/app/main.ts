/**
 * Main entry point for the Quad Division app
 */

import { parseLaunchOptions } from './config.js';
import { deliverSeed, initializeState, onStateChange } from './state.js';
import { createStorageAdapter } from './storage.js';
import { initializeUI, renderDrawing, updateControls, windowViewport } from './ui.js';

const launch = parseLaunchOptions(window.location.search);

/**
 * One 32-bit value from the platform's cryptographic random source.
 */
function trueRandomSeed(): number {
  return crypto.getRandomValues(new Uint32Array(1))[0] | 0;
}

/**
 * Initialize the app
 */
function init(): void {
  const storage = createStorageAdapter();
  const { settings } = storage.load();

  onStateChange(() => {
    renderDrawing();
    updateControls();
  });

  // First frame uses the placeholder seed (or the pinned one)
  initializeState(windowViewport(), settings, {
    seed: launch.fixedSeed ?? undefined,
    validate: launch.validate,
    storage,
  });

  initializeUI();
  renderDrawing();
  updateControls();

  if (launch.fixedSeed === null) {
    deliverSeed(trueRandomSeed());
  } else {
    console.log(`📌 Using fixed seed ${launch.fixedSeed}`);
  }

  if (launch.validate) {
    console.log('🔍 Validating the partition after every step');
  }
  console.log('🚀 Quad Division initialized');
}

// Start when DOM is ready
if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', init);
} else {
  init();
}
