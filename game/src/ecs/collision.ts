// ============================================
// Narrow-Phase Collision
// Circle / axis-aligned box contact tests
// ============================================

import { add, clampVec, dot, magnitude, scale, sub, type Entity, type Vec2 } from '#shared';

/**
 * Contact between two colliders.
 * `normal` is a unit vector pointing toward the first argument of the
 * test; moving that entity by `normal * penetration` separates the pair.
 */
export interface Contact {
  normal: Vec2;
  penetration: number;
}

/**
 * Test two entities' colliders against each other.
 * Returns null when either has no collider or the shapes don't overlap.
 */
export function checkCollision(self: Entity, other: Entity): Contact | null {
  const selfCollider = self.collider;
  const otherCollider = other.collider;
  if (!selfCollider || !otherCollider) return null;

  const a = selfCollider.shape;
  const b = otherCollider.shape;

  if (a.type === 'circle' && b.type === 'circle') {
    return circleToCircle(self.pos, a.radius, other.pos, b.radius);
  }
  if (a.type === 'circle' && b.type === 'aabb') {
    return circleToAabb(self.pos, a.radius, other.pos, b.halfExtents);
  }
  if (a.type === 'aabb' && b.type === 'circle') {
    // Reuse the circle-first test, then flip so the normal points at `self`
    const contact = circleToAabb(other.pos, b.radius, self.pos, a.halfExtents);
    if (!contact) return null;
    return {
      normal: { x: -contact.normal.x, y: -contact.normal.y },
      penetration: contact.penetration,
    };
  }
  if (a.type === 'aabb' && b.type === 'aabb') {
    return aabbToAabb(self.pos, a.halfExtents, other.pos, b.halfExtents);
  }

  return null;
}

/**
 * Circle vs circle
 */
export function circleToCircle(
  selfPos: Vec2,
  selfRadius: number,
  otherPos: Vec2,
  otherRadius: number
): Contact | null {
  const diff = sub(selfPos, otherPos);
  const diffMag = magnitude(diff);
  const radii = selfRadius + otherRadius;
  if (diffMag >= radii) return null;

  if (diffMag === 0) {
    // Concentric - any direction separates them
    return { normal: { x: 1, y: 0 }, penetration: radii };
  }

  return {
    normal: scale(diff, 1 / diffMag),
    penetration: radii - diffMag,
  };
}

/**
 * Circle vs box: closest point on the box, then a point-in-circle test
 */
export function circleToAabb(
  circlePos: Vec2,
  circleRadius: number,
  rectPos: Vec2,
  halfExtents: Vec2
): Contact | null {
  const centerDiff = sub(circlePos, rectPos);
  const clamped = clampVec(centerDiff, { x: -halfExtents.x, y: -halfExtents.y }, halfExtents);
  const closest = add(clamped, rectPos);
  const diff = sub(circlePos, closest);
  const diffMag = magnitude(diff);

  if (diffMag > 0) {
    if (diffMag >= circleRadius) return null;
    return {
      normal: scale(diff, 1 / diffMag),
      penetration: circleRadius - diffMag,
    };
  }

  // Center on or inside the box: push out through the nearest face
  const faces: Array<{ depth: number; normal: Vec2 }> = [
    { depth: halfExtents.x - centerDiff.x, normal: { x: 1, y: 0 } },
    { depth: halfExtents.x + centerDiff.x, normal: { x: -1, y: 0 } },
    { depth: halfExtents.y - centerDiff.y, normal: { x: 0, y: 1 } },
    { depth: halfExtents.y + centerDiff.y, normal: { x: 0, y: -1 } },
  ];
  let nearest = faces[0];
  for (const face of faces) {
    if (face.depth < nearest.depth) nearest = face;
  }

  return {
    normal: nearest.normal,
    penetration: nearest.depth + circleRadius,
  };
}

/**
 * Box vs box: minimum-translation axis, ties go to y
 */
export function aabbToAabb(
  selfPos: Vec2,
  selfHalf: Vec2,
  otherPos: Vec2,
  otherHalf: Vec2
): Contact | null {
  const selfLeft = selfPos.x - selfHalf.x;
  const selfRight = selfPos.x + selfHalf.x;
  const selfTop = selfPos.y + selfHalf.y;
  const selfBottom = selfPos.y - selfHalf.y;

  const otherLeft = otherPos.x - otherHalf.x;
  const otherRight = otherPos.x + otherHalf.x;
  const otherTop = otherPos.y + otherHalf.y;
  const otherBottom = otherPos.y - otherHalf.y;

  const overlapping =
    selfLeft < otherRight && otherLeft < selfRight && otherBottom < selfTop && selfBottom < otherTop;
  if (!overlapping) return null;

  const xPen = selfPos.x > otherPos.x ? otherRight - selfLeft : selfRight - otherLeft;
  const yPen = selfPos.y > otherPos.y ? otherTop - selfBottom : selfTop - otherBottom;

  if (xPen < yPen) {
    return {
      normal: selfPos.x > otherPos.x ? { x: 1, y: 0 } : { x: -1, y: 0 },
      penetration: xPen,
    };
  }

  return {
    normal: selfPos.y > otherPos.y ? { x: 0, y: 1 } : { x: 0, y: -1 },
    penetration: yPen,
  };
}

/**
 * Arcade response: push `entity` out along the normal and drop the
 * velocity component going into the surface.
 */
export function resolvePenetration(entity: Entity, contact: Contact): void {
  entity.pos = add(entity.pos, scale(contact.normal, contact.penetration));
  entity.vel = sub(entity.vel, scale(contact.normal, dot(entity.vel, contact.normal)));
}
