/**
 * UI rendering and interaction for the Quad Division app
 */

import { Viewport } from '../lib/core/geometry.js';
import { QuantityChange, SeparationChange, quantityLabel } from '../lib/core/settings.js';
import { done, regionCount } from '../lib/division/index.js';
import { view, type Drawing } from '../lib/renderer/drawing.js';
import { formatNumber } from '../lib/renderer/svg.js';
import { QUANTITY_OPTIONS, SEPARATION_OPTIONS, TICK_INTERVAL_OPTIONS } from './config.js';
import { downloadSvg } from './export.js';
import {
  getState,
  restartDivision,
  resizeViewport,
  setTickInterval,
  togglePause,
  updateSetting,
} from './state.js';

const SVG_NS = 'http://www.w3.org/2000/svg';

/**
 * Current size of the browser window as a viewport.
 */
export function windowViewport(): Viewport {
  return Viewport(window.innerWidth, window.innerHeight);
}

/**
 * Render the current division into the drawing container
 */
export function renderDrawing(): void {
  const container = document.getElementById('drawing');
  if (!container) return;

  const drawing = view(getState().division);
  container.replaceChildren(createSvgElement(drawing));
}

function createSvgElement(drawing: Drawing): SVGSVGElement {
  const svg = document.createElementNS(SVG_NS, 'svg');
  svg.setAttribute('id', drawing.id);
  svg.setAttribute('width', formatNumber(drawing.width));
  svg.setAttribute('height', formatNumber(drawing.height));
  svg.setAttribute('viewBox', `0 0 ${formatNumber(drawing.width)} ${formatNumber(drawing.height)}`);

  const background = document.createElementNS(SVG_NS, 'rect');
  background.setAttribute('width', '100%');
  background.setAttribute('height', '100%');
  background.setAttribute('fill', drawing.background);
  svg.appendChild(background);

  for (const element of drawing.elements) {
    const rect = document.createElementNS(SVG_NS, 'rect');
    rect.setAttribute('id', element.id);
    rect.setAttribute('x', formatNumber(element.x));
    rect.setAttribute('y', formatNumber(element.y));
    rect.setAttribute('width', formatNumber(element.width));
    rect.setAttribute('height', formatNumber(element.height));
    rect.setAttribute('fill', element.fill);
    if (element.opacity < 1) {
      rect.setAttribute('fill-opacity', formatNumber(element.opacity));
    }
    svg.appendChild(rect);
  }

  return svg;
}

/**
 * Update the status line and buttons to match the state
 */
export function updateControls(): void {
  const state = getState();
  const division = state.division;

  const status = document.getElementById('status');
  if (status) {
    const phase = done(division) ? 'Done' : state.paused ? 'Paused' : 'Dividing';
    status.textContent = `${phase} · ${regionCount(division)} regions · ${division.steps} steps`;
  }

  const hint = document.getElementById('restart-hint');
  if (hint) {
    hint.hidden = !state.settingsChangedWhileDone;
  }

  const pauseBtn = document.getElementById('pause-btn');
  if (pauseBtn instanceof HTMLButtonElement) {
    pauseBtn.textContent = state.paused ? 'Resume' : 'Pause';
    pauseBtn.disabled = done(division);
  }
}

/**
 * Create a labelled <select> whose options map to values of type T.
 */
function createSelect<T>(
  id: string,
  label: string,
  options: ReadonlyArray<{ label: string; value: T }>,
  selected: (value: T) => boolean,
  onChange: (value: T) => void
): HTMLElement {
  const wrapper = document.createElement('label');
  wrapper.className = 'setting';
  wrapper.textContent = label;

  const select = document.createElement('select');
  select.id = id;
  options.forEach((option, index) => {
    const el = document.createElement('option');
    el.value = String(index);
    el.textContent = option.label;
    el.selected = selected(option.value);
    select.appendChild(el);
  });

  select.addEventListener('change', () => {
    const option = options[Number(select.value)];
    if (option) {
      onChange(option.value);
    }
  });

  wrapper.appendChild(select);
  return wrapper;
}

function createButton(id: string, text: string, onClick: () => void): HTMLButtonElement {
  const button = document.createElement('button');
  button.id = id;
  button.type = 'button';
  button.textContent = text;
  button.addEventListener('click', onClick);
  return button;
}

/**
 * Build the settings panel from the current state
 */
function buildSettingsPanel(panel: HTMLElement): void {
  const state = getState();
  const settings = state.division.settings;

  panel.replaceChildren(
    createSelect(
      'separation-select',
      'Border',
      SEPARATION_OPTIONS.map(px => ({ label: `${px}px`, value: px })),
      px => px === settings.separation,
      px => updateSetting(SeparationChange(px))
    ),
    createSelect(
      'quantity-select',
      'Regions',
      QUANTITY_OPTIONS.map(quantity => ({ label: quantityLabel(quantity), value: quantity })),
      quantity => quantity.count === settings.quantity.count,
      quantity => updateSetting(QuantityChange(quantity))
    ),
    createSelect(
      'speed-select',
      'Speed',
      TICK_INTERVAL_OPTIONS.map(option => ({ label: option.label, value: option.ms })),
      ms => ms === state.tickInterval,
      ms => setTickInterval(ms)
    ),
    createButton('pause-btn', 'Pause', togglePause),
    createButton('restart-btn', 'Restart', restartDivision),
    createButton('download-btn', 'Download SVG', downloadCurrent),
    createButton('fullscreen-btn', 'Full screen', () => {
      toggleFullscreen().catch(error => console.error('Failed to toggle full screen:', error));
    }),
  );

  const status = document.createElement('div');
  status.id = 'status';
  panel.appendChild(status);

  const hint = document.createElement('div');
  hint.id = 'restart-hint';
  hint.textContent = 'Restart to apply the new settings';
  hint.hidden = true;
  panel.appendChild(hint);
}

function downloadCurrent(): void {
  downloadSvg(view(getState().division));
}

/**
 * Enter or leave full screen for the whole page.
 */
export async function toggleFullscreen(): Promise<void> {
  if (document.fullscreenElement) {
    await document.exitFullscreen();
  } else {
    await document.documentElement.requestFullscreen();
  }
}

function toggleSettingsPanel(): void {
  const panel = document.getElementById('settings-panel');
  if (panel) {
    panel.hidden = !panel.hidden;
  }
}

/**
 * Initialize UI event listeners
 */
export function initializeUI(): void {
  const panel = document.getElementById('settings-panel');
  if (panel) {
    buildSettingsPanel(panel);
  }

  window.addEventListener('resize', () => {
    resizeViewport(windowViewport());
  });

  document.addEventListener('keydown', (e) => {
    // Leave shortcuts alone while a control has focus or a modifier is held
    if (e.ctrlKey || e.metaKey || e.altKey) return;
    if (e.target instanceof HTMLSelectElement) return;

    switch (e.key) {
      case ' ':
        e.preventDefault();
        togglePause();
        return;
      case 'r':
        restartDivision();
        return;
      case 's':
        downloadCurrent();
        return;
      case 'f':
        toggleFullscreen().catch(error => console.error('Failed to toggle full screen:', error));
        return;
      case 'h':
        toggleSettingsPanel();
        return;
    }
  });
}
