/**
 * Tests for drawing projection and SVG serialization.
 */

import { describe, it, expect } from 'vitest';
import { Viewport } from '../core/geometry.js';
import { About, createSettings } from '../core/settings.js';
import { initialize } from '../division/model.js';
import { runToCompletion, subdivideStep } from '../division/step.js';
import { BACKGROUND_COLOR, hslToHex } from './colors.js';
import { PENDING_OPACITY, drawingId, view, type Drawing } from './drawing.js';
import { escapeAttribute, formatNumber, toSvg } from './svg.js';

describe('colors', () => {
  it('converts primary hues', () => {
    expect(hslToHex(0, 1, 0.5)).toBe('#ff0000');
    expect(hslToHex(120, 1, 0.5)).toBe('#00ff00');
    expect(hslToHex(240, 1, 0.5)).toBe('#0000ff');
  });

  it('converts greys', () => {
    expect(hslToHex(0, 0, 0)).toBe('#000000');
    expect(hslToHex(200, 0, 1)).toBe('#ffffff');
  });
});

describe('view', () => {
  const settings = createSettings(5, About(50));

  it('projects a fresh division as one pending element covering the viewport', () => {
    const model = initialize(42, Viewport(800, 600), settings);
    const drawing = view(model);

    expect(drawing.id).toBe('quad-division-42');
    expect(drawing.width).toBe(800);
    expect(drawing.height).toBe(600);
    expect(drawing.background).toBe(BACKGROUND_COLOR);
    expect(drawing.elements).toHaveLength(1);
    expect(drawing.elements[0]).toMatchObject({
      id: 'region-0',
      kind: 'pending',
      x: 0,
      y: 0,
      width: 800,
      height: 600,
      opacity: PENDING_OPACITY,
    });
    expect(drawing.elements[0].fill).toMatch(/^#[0-9a-f]{6}$/);
  });

  it('lists leaves before pending regions', () => {
    let model = initialize(42, Viewport(800, 600), settings);
    while (model.leaves.length === 0) {
      model = subdivideStep(model);
    }
    const drawing = view(model);
    const kinds = drawing.elements.map(element => element.kind);

    expect(kinds.indexOf('pending')).toBe(model.leaves.length);
    expect(drawing.elements.map(element => element.id)).toEqual([
      ...model.leaves.map(region => region.id),
      ...model.pending.map(region => region.id),
    ]);
  });

  it('gives every element of a finished division a unique id and full opacity', () => {
    const model = runToCompletion(initialize(7, Viewport(400, 300), settings));
    const drawing = view(model);
    const ids = drawing.elements.map(element => element.id);

    expect(new Set(ids).size).toBe(ids.length);
    expect(drawing.elements.every(element => element.kind === 'leaf' && element.opacity === 1)).toBe(true);
  });

  it('derives the drawing id from the unsigned generation seed', () => {
    const model = initialize(-1, Viewport(10, 10), settings);
    expect(drawingId(model)).toBe('quad-division-4294967295');
  });

  it('keeps colors fixed as the division proceeds', () => {
    const model = initialize(3, Viewport(300, 300), settings);
    const stepped = subdivideStep(subdivideStep(model));
    const colors = new Map(view(stepped).elements.map(element => [element.id, element.fill]));

    for (const region of [...stepped.leaves, ...stepped.pending]) {
      expect(colors.get(region.id)).toBe(region.color);
    }
  });
});

describe('svg', () => {
  it('formats numbers with at most two decimals', () => {
    expect(formatNumber(10)).toBe('10');
    expect(formatNumber(47.5)).toBe('47.5');
    expect(formatNumber(1 / 3)).toBe('0.33');
    expect(formatNumber(2.005001)).toBe('2.01');
    expect(formatNumber(-0.001)).toBe('0');
  });

  it('escapes attribute values', () => {
    expect(escapeAttribute('a"<b>&')).toBe('a&quot;&lt;b&gt;&amp;');
  });

  it('serializes a drawing to a standalone document', () => {
    const drawing: Drawing = {
      id: 'quad-division-7',
      width: 100,
      height: 50,
      background: '#000000',
      elements: [
        { id: 'region-1', kind: 'leaf', x: 0, y: 0, width: 47.5, height: 50, fill: '#ff0000', opacity: 1 },
        { id: 'region-2', kind: 'pending', x: 52.5, y: 0, width: 47.5, height: 50, fill: '#00ff00', opacity: 0.35 },
      ],
    };

    expect(toSvg(drawing)).toBe([
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<svg id="quad-division-7" xmlns="http://www.w3.org/2000/svg" version="1.1" width="100" height="50" viewBox="0 0 100 50">',
      '  <rect x="0" y="0" width="100" height="50" fill="#000000" />',
      '  <rect id="region-1" x="0" y="0" width="47.5" height="50" fill="#ff0000" />',
      '  <rect id="region-2" x="52.5" y="0" width="47.5" height="50" fill="#00ff00" fill-opacity="0.35" />',
      '</svg>',
      '',
    ].join('\n'));
  });

  it('writes one rect per region plus the background', () => {
    const model = runToCompletion(initialize(42, Viewport(800, 600), createSettings(5, About(50))));
    const svg = toSvg(view(model));

    expect(svg.match(/<rect /g)).toHaveLength(model.leaves.length + 1);
    expect(svg).toContain('<svg id="quad-division-42" ');
  });
});
