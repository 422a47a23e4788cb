// ============================================
// Collision Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { ColliderMasks, type ColliderShape, type Entity, type Vec2 } from '#shared';
import { checkCollision, resolvePenetration } from '../collision';
import { EntityRegistry } from '../EntityRegistry';

const registry = new EntityRegistry(16);

/**
 * Fresh entity with a collider at `pos`
 */
function body(pos: Vec2, shape: ColliderShape | null): Entity {
  registry.clear();
  const result = registry.allocate({
    pos,
    collider: shape ? { shape, mask: ColliderMasks.Terrain } : null,
  });
  if (!result.ok) throw new Error('allocation failed');
  // Detach from the shared registry so several bodies can coexist
  return { ...registry.get(result.id) };
}

const circle = (radius: number): ColliderShape => ({ type: 'circle', radius });
const box = (hx: number, hy: number): ColliderShape => ({ type: 'aabb', halfExtents: { x: hx, y: hy } });

describe('checkCollision', () => {
  it('returns null when either side has no collider', () => {
    expect(checkCollision(body({ x: 0, y: 0 }, null), body({ x: 0, y: 0 }, circle(5)))).toBeNull();
    expect(checkCollision(body({ x: 0, y: 0 }, circle(5)), body({ x: 0, y: 0 }, null))).toBeNull();
  });

  describe('circle vs circle', () => {
    it('overlapping radius-64 circles 100 apart penetrate by 28', () => {
      const a = body({ x: 100, y: 0 }, circle(64));
      const b = body({ x: 0, y: 0 }, circle(64));
      expect(checkCollision(a, b)).toEqual({ normal: { x: 1, y: 0 }, penetration: 28 });
    });

    it('points the normal at the first argument', () => {
      const a = body({ x: 0, y: 0 }, circle(64));
      const b = body({ x: 100, y: 0 }, circle(64));
      expect(checkCollision(a, b)).toEqual({ normal: { x: -1, y: 0 }, penetration: 28 });
    });

    it('treats touching circles as separate', () => {
      expect(checkCollision(body({ x: 10, y: 0 }, circle(5)), body({ x: 0, y: 0 }, circle(5)))).toBeNull();
    });

    it('separates concentric circles along +x', () => {
      const a = body({ x: 3, y: 3 }, circle(4));
      const b = body({ x: 3, y: 3 }, circle(6));
      expect(checkCollision(a, b)).toEqual({ normal: { x: 1, y: 0 }, penetration: 10 });
    });
  });

  describe('circle vs box', () => {
    it('pushes out along the closest point', () => {
      // Box spans x in [-10, 10]; circle center 4 past the right face
      const c = body({ x: 14, y: 0 }, circle(5));
      const b = body({ x: 0, y: 0 }, box(10, 10));
      expect(checkCollision(c, b)).toEqual({ normal: { x: 1, y: 0 }, penetration: 1 });
    });

    it('handles corners', () => {
      const c = body({ x: 13, y: 14 }, circle(6));
      const b = body({ x: 0, y: 0 }, box(10, 10));
      // Closest point (10, 10), offset (3, 4), distance 5
      const contact = checkCollision(c, b);
      expect(contact?.normal.x).toBeCloseTo(0.6);
      expect(contact?.normal.y).toBeCloseTo(0.8);
      expect(contact?.penetration).toBe(1);
    });

    it('misses when the circle is clear of the box', () => {
      expect(checkCollision(body({ x: 20, y: 0 }, circle(5)), body({ x: 0, y: 0 }, box(10, 10)))).toBeNull();
    });

    it('pushes a center inside the box through the nearest face', () => {
      // 2 from the top face, 18 from the bottom, 7 and 13 from the sides
      const c = body({ x: 3, y: 8 }, circle(5));
      const b = body({ x: 0, y: 0 }, box(10, 10));
      expect(checkCollision(c, b)).toEqual({ normal: { x: 0, y: 1 }, penetration: 7 });
    });

    it('prefers +x when the center sits exactly on the box center', () => {
      const c = body({ x: 0, y: 0 }, circle(5));
      const b = body({ x: 0, y: 0 }, box(10, 10));
      expect(checkCollision(c, b)).toEqual({ normal: { x: 1, y: 0 }, penetration: 15 });
    });
  });

  describe('box vs circle', () => {
    it('mirrors circle vs box with the normal flipped', () => {
      const b = body({ x: 0, y: 0 }, box(10, 10));
      const c = body({ x: 14, y: 0 }, circle(5));
      const contact = checkCollision(b, c);
      expect(contact?.normal.x).toBe(-1);
      expect(contact?.normal.y).toBeCloseTo(0);
      expect(contact?.penetration).toBe(1);
    });
  });

  describe('box vs box', () => {
    it('separates along the shallower axis', () => {
      const a = body({ x: 15, y: 2 }, box(10, 10));
      const b = body({ x: 0, y: 0 }, box(10, 10));
      // x overlap 5, y overlap 18
      expect(checkCollision(a, b)).toEqual({ normal: { x: 1, y: 0 }, penetration: 5 });
    });

    it('points down when the first box is below', () => {
      const a = body({ x: 1, y: -16 }, box(10, 10));
      const b = body({ x: 0, y: 0 }, box(10, 10));
      expect(checkCollision(a, b)).toEqual({ normal: { x: 0, y: -1 }, penetration: 4 });
    });

    it('takes the y axis on a tie', () => {
      const a = body({ x: 15, y: 15 }, box(10, 10));
      const b = body({ x: 0, y: 0 }, box(10, 10));
      expect(checkCollision(a, b)).toEqual({ normal: { x: 0, y: 1 }, penetration: 5 });
    });

    it('treats touching edges as separate', () => {
      expect(checkCollision(body({ x: 20, y: 0 }, box(10, 10)), body({ x: 0, y: 0 }, box(10, 10)))).toBeNull();
    });

    it('negates the normal and keeps the penetration when the arguments swap', () => {
      const cases: Array<[Vec2, Vec2]> = [
        [{ x: 15, y: 2 }, { x: 0, y: 0 }], // x axis
        [{ x: 1, y: -16 }, { x: 0, y: 0 }], // y axis
      ];
      for (const [aPos, bPos] of cases) {
        const a = body(aPos, box(10, 10));
        const b = body(bPos, box(10, 10));
        const forward = checkCollision(a, b);
        const backward = checkCollision(b, a);
        if (!forward || !backward) throw new Error('expected contact both ways');

        expect(backward.normal.x).toBeCloseTo(-forward.normal.x);
        expect(backward.normal.y).toBeCloseTo(-forward.normal.y);
        expect(backward.penetration).toBe(forward.penetration);
      }
    });

    it('pushes coincident boxes down whichever comes first', () => {
      // Nothing tells the two apart, so the swap rule cannot hold here
      const a = body({ x: 0, y: 0 }, box(10, 10));
      const b = body({ x: 0, y: 0 }, box(10, 10));
      expect(checkCollision(a, b)).toEqual({ normal: { x: 0, y: -1 }, penetration: 20 });
      expect(checkCollision(b, a)).toEqual({ normal: { x: 0, y: -1 }, penetration: 20 });
    });
  });
});

describe('resolvePenetration', () => {
  it('moves the entity out and removes velocity into the surface', () => {
    const entity = body({ x: 14, y: 0 }, circle(5));
    entity.vel = { x: -30, y: 12 };
    resolvePenetration(entity, { normal: { x: 1, y: 0 }, penetration: 1 });

    expect(entity.pos).toEqual({ x: 15, y: 0 });
    expect(entity.vel).toEqual({ x: 0, y: 12 });
  });
});
