/**
 * Tests for geometry primitives and settings values.
 */

import { describe, it, expect } from 'vitest';
import {
  MIN_REGION_SIZE,
  Rect,
  Viewport,
  area,
  aspectRatio,
  containsRect,
  overlapArea,
  viewportRect,
} from './geometry.js';
import {
  About,
  QuantityChange,
  SeparationChange,
  applySettingChange,
  createSettings,
  quantityLabel,
} from './settings.js';

describe('geometry', () => {
  it('clamps viewport dimensions to the minimum region size', () => {
    expect(Viewport(800, 600)).toEqual({ width: 800, height: 600 });
    expect(Viewport(0, -20)).toEqual({ width: MIN_REGION_SIZE, height: MIN_REGION_SIZE });
    expect(Viewport(NaN, 10)).toEqual({ width: MIN_REGION_SIZE, height: 10 });
  });

  it('creates frozen values', () => {
    expect(Object.isFrozen(Viewport(10, 10))).toBe(true);
    expect(Object.isFrozen(Rect(0, 0, 1, 1))).toBe(true);
  });

  it('covers the viewport from the origin', () => {
    expect(viewportRect(Viewport(320, 200))).toEqual(Rect(0, 0, 320, 200));
  });

  it('computes area and aspect ratio', () => {
    expect(area(Rect(5, 5, 4, 3))).toBe(12);
    expect(aspectRatio(Rect(0, 0, 300, 100))).toBe(3);
  });

  describe('overlapArea', () => {
    it('measures the shared area', () => {
      expect(overlapArea(Rect(0, 0, 10, 10), Rect(5, 5, 10, 10))).toBe(25);
    });

    it('is zero for rectangles that only touch', () => {
      expect(overlapArea(Rect(0, 0, 10, 10), Rect(10, 0, 10, 10))).toBe(0);
    });

    it('is zero for disjoint rectangles', () => {
      expect(overlapArea(Rect(0, 0, 10, 10), Rect(20, 20, 5, 5))).toBe(0);
    });
  });

  describe('containsRect', () => {
    const outer = Rect(0, 0, 100, 50);

    it('accepts rectangles on the boundary', () => {
      expect(containsRect(outer, Rect(0, 0, 100, 50))).toBe(true);
      expect(containsRect(outer, Rect(60, 10, 40, 40))).toBe(true);
    });

    it('rejects rectangles that stick out', () => {
      expect(containsRect(outer, Rect(60, 10, 41, 40))).toBe(false);
      expect(containsRect(outer, Rect(-1, 0, 10, 10))).toBe(false);
    });
  });
});

describe('settings', () => {
  it('About rounds and clamps the count', () => {
    expect(About(50)).toEqual({ type: 'about', count: 50 });
    expect(About(0).count).toBe(1);
    expect(About(19.6).count).toBe(20);
    expect(About(NaN).count).toBe(1);
  });

  it('labels quantities', () => {
    expect(quantityLabel(About(200))).toBe('About 200');
  });

  it('clamps separation to be non-negative', () => {
    expect(createSettings(-3, About(20)).separation).toBe(0);
    expect(createSettings(Infinity, About(20)).separation).toBe(0);
  });

  it('applies one change at a time', () => {
    const settings = createSettings(5, About(50));

    expect(applySettingChange(settings, SeparationChange(10))).toEqual({
      separation: 10,
      quantity: About(50),
    });
    expect(applySettingChange(settings, QuantityChange(About(100)))).toEqual({
      separation: 5,
      quantity: About(100),
    });
    expect(settings.separation).toBe(5);
  });
});
