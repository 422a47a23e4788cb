// ============================================
// Shared Math Helpers
// Pure 2D vector functions used by every system
// ============================================

/**
 * 2D vector in world units.
 * World space is y-up with the origin at the bottom-left of the playfield.
 */
export interface Vec2 {
  x: number;
  y: number;
}

export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

export function splat(value: number): Vec2 {
  return { x: value, y: value };
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, s: number): Vec2 {
  return { x: v.x * s, y: v.y * s };
}

export function dot(a: Vec2, b: Vec2): number {
  return a.x * b.x + a.y * b.y;
}

/**
 * Length of a vector
 */
export function magnitude(v: Vec2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y);
}

/**
 * Calculate distance between two positions
 */
export function distance(a: Vec2, b: Vec2): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Normalize a vector to unit length.
 * Returns the zero vector for a zero-length input.
 */
export function normalize(v: Vec2): Vec2 {
  const mag = magnitude(v);
  if (mag === 0) {
    return { x: 0, y: 0 };
  }
  return { x: v.x / mag, y: v.y / mag };
}

/**
 * Rotate counter-clockwise by `radians`
 */
export function rotate(v: Vec2, radians: number): Vec2 {
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  return {
    x: v.x * cos - v.y * sin,
    y: v.x * sin + v.y * cos,
  };
}

/**
 * Component-wise clamp between `lower` and `upper`
 */
export function clampVec(v: Vec2, lower: Vec2, upper: Vec2): Vec2 {
  return {
    x: Math.max(Math.min(v.x, upper.x), lower.x),
    y: Math.max(Math.min(v.y, upper.y), lower.y),
  };
}

/**
 * Shorten `v` to at most `max` length, keeping its direction
 */
export function clampMagnitude(v: Vec2, max: number): Vec2 {
  const mag = magnitude(v);
  if (mag <= max || mag === 0) {
    return { x: v.x, y: v.y };
  }
  return scale(v, max / mag);
}

/**
 * Unit vector pointing at `radians` from +x
 */
export function fromAngle(radians: number): Vec2 {
  return { x: Math.cos(radians), y: Math.sin(radians) };
}
