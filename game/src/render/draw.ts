// ============================================
// Rendering Helpers
// Build commands and push them onto the frame's queue
// ============================================

import { Palette, withAlpha, type Color, type Entity, type TextureHandle, type Vec2 } from '#shared';
import type { RenderQueue } from './RenderQueue';

// Commands are replayed at the end of the frame, after entities have
// kept moving, so they take copies of the transform
function copy(v: Vec2): Vec2 {
  return { x: v.x, y: v.y };
}

export function drawSprite(
  queue: RenderQueue,
  pos: Vec2,
  size: Vec2,
  zIndex: number,
  texture: TextureHandle,
  rotation: number = 0,
  alpha: number = 1
): void {
  queue.push({ type: 'sprite', zIndex, pos: copy(pos), size: copy(size), texture, rotation, alpha });
}

export function drawRect(queue: RenderQueue, pos: Vec2, size: Vec2, zIndex: number, color: Color): void {
  queue.push({ type: 'rect', zIndex, pos: copy(pos), size: copy(size), color });
}

export function drawBorderRect(
  queue: RenderQueue,
  pos: Vec2,
  size: Vec2,
  border: number,
  zIndex: number,
  color: Color
): void {
  queue.push({ type: 'borderRect', zIndex, pos: copy(pos), size: copy(size), border, color });
}

export function drawCircle(queue: RenderQueue, pos: Vec2, size: Vec2, zIndex: number, color: Color): void {
  queue.push({ type: 'circle', zIndex, pos: copy(pos), size: copy(size), color });
}

/**
 * Draw an entity the default way: its sprite if it has one, otherwise
 * its shape filled with its color (white when unset). The entity's
 * alpha multiplies into the color.
 */
export function drawEntity(queue: RenderQueue, entity: Entity): void {
  if (entity.sprite !== null) {
    drawSprite(queue, entity.pos, entity.size, entity.zIndex, entity.sprite, entity.rotation, entity.alpha);
    return;
  }
  if (entity.shape === null) return;

  const base = entity.color ?? Palette.white;
  const color = entity.alpha === 1 ? base : withAlpha(base, base.a * entity.alpha);

  switch (entity.shape) {
    case 'rect':
      drawRect(queue, entity.pos, entity.size, entity.zIndex, color);
      break;
    case 'circle':
      drawCircle(queue, entity.pos, entity.size, entity.zIndex, color);
      break;
  }
}
