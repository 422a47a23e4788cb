// ============================================
// Shared Math, Color & Recipe Tests
// ============================================

import { describe, it, expect } from 'vitest';
import {
  add,
  clampMagnitude,
  clampVec,
  colorFromHex,
  countIngredients,
  distance,
  dot,
  magnitude,
  normalize,
  resolveRecipe,
  rotate,
  scale,
  sub,
  withAlpha,
} from '../index';

describe('vector math', () => {
  it('adds, subtracts and scales component-wise', () => {
    expect(add({ x: 1, y: 2 }, { x: 3, y: -5 })).toEqual({ x: 4, y: -3 });
    expect(sub({ x: 1, y: 2 }, { x: 3, y: -5 })).toEqual({ x: -2, y: 7 });
    expect(scale({ x: 1.5, y: -2 }, 4)).toEqual({ x: 6, y: -8 });
  });

  it('computes dot products, lengths and distances', () => {
    expect(dot({ x: 2, y: 3 }, { x: 4, y: -1 })).toBe(5);
    expect(magnitude({ x: 3, y: 4 })).toBe(5);
    expect(distance({ x: 1, y: 1 }, { x: 4, y: 5 })).toBe(5);
  });

  it('normalizes to unit length', () => {
    expect(normalize({ x: 0, y: -8 })).toEqual({ x: 0, y: -1 });
    const n = normalize({ x: 3, y: 4 });
    expect(n.x).toBeCloseTo(0.6);
    expect(n.y).toBeCloseTo(0.8);
  });

  it('normalizes the zero vector to zero', () => {
    expect(normalize({ x: 0, y: 0 })).toEqual({ x: 0, y: 0 });
  });

  it('rotates counter-clockwise', () => {
    const r = rotate({ x: 1, y: 0 }, Math.PI / 2);
    expect(r.x).toBeCloseTo(0);
    expect(r.y).toBeCloseTo(1);
  });

  it('clamps each component between bounds', () => {
    expect(clampVec({ x: -5, y: 50 }, { x: 0, y: 0 }, { x: 10, y: 20 })).toEqual({ x: 0, y: 20 });
    expect(clampVec({ x: 3, y: 4 }, { x: 0, y: 0 }, { x: 10, y: 20 })).toEqual({ x: 3, y: 4 });
  });

  it('clamps length but keeps direction', () => {
    expect(clampMagnitude({ x: 30, y: 40 }, 10)).toEqual({ x: 6, y: 8 });
    expect(clampMagnitude({ x: 3, y: 4 }, 10)).toEqual({ x: 3, y: 4 });
  });
});

describe('colors', () => {
  it('splits a hex literal into unit channels', () => {
    expect(colorFromHex(0xff0000)).toEqual({ r: 1, g: 0, b: 0, a: 1 });
    expect(colorFromHex(0x00ff00, 0.5)).toEqual({ r: 0, g: 1, b: 0, a: 0.5 });
    expect(colorFromHex(0x000033).b).toBeCloseTo(0.2);
  });

  it('replaces alpha without touching the source', () => {
    const base = colorFromHex(0xffffff);
    expect(withAlpha(base, 0.25)).toEqual({ r: 1, g: 1, b: 1, a: 0.25 });
    expect(base.a).toBe(1);
  });
});

describe('recipes', () => {
  it('counts ingredient colors', () => {
    expect(countIngredients(['red', 'blue', 'red'])).toEqual({ red: 2, green: 0, blue: 1, purple: 0 });
  });

  it('matches exact ingredient counts', () => {
    expect(resolveRecipe(['red', 'green'])).toBe('salad');
    expect(resolveRecipe(['blue', 'blue'])).toBe('soup');
    expect(resolveRecipe(['red', 'red', 'purple'])).toBe('curry');
    expect(resolveRecipe(['green', 'blue', 'purple'])).toBe('pie');
  });

  it('ignores ingredient order', () => {
    expect(resolveRecipe(['purple', 'red', 'red'])).toBe('curry');
    expect(resolveRecipe(['red', 'purple', 'red'])).toBe('curry');
    expect(resolveRecipe(['purple', 'blue', 'green'])).toBe('pie');
  });

  it('burns anything that is not an exact recipe', () => {
    expect(resolveRecipe([])).toBe('burnt');
    expect(resolveRecipe(['red'])).toBe('burnt');
    expect(resolveRecipe(['red', 'green', 'green'])).toBe('burnt');
    expect(resolveRecipe(['blue', 'blue', 'blue'])).toBe('burnt');
  });
});
