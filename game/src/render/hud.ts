// ============================================
// HUD & Overlays
// Health, score, and the pause / game-over screens
// ============================================

import { EntityKinds, GAME_CONFIG, Palette, splat, vec2, withAlpha, type Color, type Vec2 } from '#shared';
import type { GameState } from '../GameState';
import { renderImmediate, type RenderCommand } from './commands';
import { drawSprite } from './draw';

// Seven-segment layout:
//    a
//  f   b
//    g
//  e   c
//    d
type Segment = 'a' | 'b' | 'c' | 'd' | 'e' | 'f' | 'g';

const DIGIT_SEGMENTS: readonly (readonly Segment[])[] = [
  ['a', 'b', 'c', 'd', 'e', 'f'],
  ['b', 'c'],
  ['a', 'b', 'd', 'e', 'g'],
  ['a', 'b', 'c', 'd', 'g'],
  ['b', 'c', 'f', 'g'],
  ['a', 'c', 'd', 'f', 'g'],
  ['a', 'c', 'd', 'e', 'f', 'g'],
  ['a', 'b', 'c'],
  ['a', 'b', 'c', 'd', 'e', 'f', 'g'],
  ['a', 'b', 'c', 'd', 'f', 'g'],
];

/**
 * Center offset and size of one segment inside a digit cell
 */
function segmentRect(segment: Segment, w: number, h: number, stroke: number): { offset: Vec2; size: Vec2 } {
  const horizontal = vec2(w, stroke);
  const vertical = vec2(stroke, h / 2);
  const side = w / 2 - stroke / 2;

  switch (segment) {
    case 'a':
      return { offset: vec2(0, h / 2 - stroke / 2), size: horizontal };
    case 'g':
      return { offset: vec2(0, 0), size: horizontal };
    case 'd':
      return { offset: vec2(0, -h / 2 + stroke / 2), size: horizontal };
    case 'f':
      return { offset: vec2(-side, h / 4), size: vertical };
    case 'b':
      return { offset: vec2(side, h / 4), size: vertical };
    case 'e':
      return { offset: vec2(-side, -h / 4), size: vertical };
    case 'c':
      return { offset: vec2(side, -h / 4), size: vertical };
  }
}

/**
 * Rect commands spelling a non-negative integer, left-aligned with the
 * first digit centered on `pos`.
 */
export function numberCommands(pos: Vec2, value: number, zIndex: number, color: Color): RenderCommand[] {
  const w = GAME_CONFIG.HUD_DIGIT_WIDTH;
  const h = GAME_CONFIG.HUD_DIGIT_HEIGHT;
  const stroke = GAME_CONFIG.HUD_DIGIT_STROKE;
  const commands: RenderCommand[] = [];

  const digits = String(Math.max(0, Math.floor(value)));
  for (let i = 0; i < digits.length; i++) {
    const x = pos.x + i * (w + GAME_CONFIG.HUD_DIGIT_SPACING);
    for (const segment of DIGIT_SEGMENTS[Number(digits[i])]) {
      const { offset, size } = segmentRect(segment, w, h, stroke);
      commands.push({ type: 'rect', zIndex, pos: vec2(x + offset.x, pos.y + offset.y), size, color });
    }
  }
  return commands;
}

/**
 * Queue the in-game HUD: hearts from the top-right, score at the top-left
 */
export function drawHud(state: GameState): void {
  const z = GAME_CONFIG.HUD_Z_INDEX;
  const offset = GAME_CONFIG.HUD_HEALTH_OFFSET;
  const heartSize = GAME_CONFIG.HUD_HEART_SIZE;

  const player = state.registry.resolve(state.player, EntityKinds.Player);
  const health = player?.health ?? 0;
  for (let i = 0; i < health; i++) {
    const pos = vec2(state.width - offset - i * (GAME_CONFIG.HUD_HEALTH_SPACING + heartSize), state.height - offset);
    drawSprite(state.queue, pos, splat(heartSize), z, state.sprites.heart, GAME_CONFIG.HUD_HEART_TILT);
  }

  const scorePos = vec2(GAME_CONFIG.HUD_DIGIT_OFFSET, state.height - GAME_CONFIG.HUD_DIGIT_OFFSET);
  for (const command of numberCommands(scorePos, state.score, z, Palette.white)) {
    state.queue.push(command);
  }
}

/**
 * Draw the pause or game-over screen straight to the backend, above
 * everything the queue produced this frame.
 */
export function drawOverlays(state: GameState): void {
  if (!state.gameOver && !state.paused) return;

  const backend = state.backend;
  const center = vec2(state.width / 2, state.height / 2);
  const tint = state.gameOver ? Palette.red : Palette.darkGrey;

  renderImmediate(backend, {
    type: 'rect',
    zIndex: 0,
    pos: center,
    size: vec2(state.width, state.height),
    color: withAlpha(tint, GAME_CONFIG.OVERLAY_ALPHA),
  });

  if (state.gameOver) {
    // Final score, centered
    const digits = String(state.score).length;
    const width = digits * GAME_CONFIG.HUD_DIGIT_WIDTH + (digits - 1) * GAME_CONFIG.HUD_DIGIT_SPACING;
    const start = vec2(center.x - width / 2 + GAME_CONFIG.HUD_DIGIT_WIDTH / 2, center.y);
    for (const command of numberCommands(start, state.score, 0, Palette.white)) {
      renderImmediate(backend, command);
    }
    return;
  }

  // Pause bars
  const barSize = vec2(16, 64);
  renderImmediate(backend, { type: 'rect', zIndex: 0, pos: vec2(center.x - 16, center.y), size: barSize, color: Palette.white });
  renderImmediate(backend, { type: 'rect', zIndex: 0, pos: vec2(center.x + 16, center.y), size: barSize, color: Palette.white });
}
