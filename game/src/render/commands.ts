// ============================================
// Render Commands
// Deferred draw calls and their replay against the backend
// ============================================

import type { Color, TextureHandle, Vec2 } from '#shared';
import type { RenderBackend } from '../host';

interface BaseCommand {
  zIndex: number;
  pos: Vec2;  // Center
  size: Vec2; // Full width / height
}

export interface SpriteCommand extends BaseCommand {
  type: 'sprite';
  texture: TextureHandle;
  rotation: number;
  alpha: number;
}

export interface RectCommand extends BaseCommand {
  type: 'rect';
  color: Color;
}

export interface BorderRectCommand extends BaseCommand {
  type: 'borderRect';
  border: number;
  color: Color;
}

export interface CircleCommand extends BaseCommand {
  type: 'circle';
  color: Color;
}

export type RenderCommand = SpriteCommand | RectCommand | BorderRectCommand | CircleCommand;

/**
 * Replay one command. Converts center + size to the corner the backend takes.
 */
export function executeRenderCommand(command: RenderCommand, backend: RenderBackend): void {
  const x = command.pos.x - command.size.x / 2;
  const y = command.pos.y - command.size.y / 2;
  const w = command.size.x;
  const h = command.size.y;

  switch (command.type) {
    case 'sprite':
      backend.drawTexturedQuad(x, y, command.rotation, w, h, command.alpha, command.texture);
      break;
    case 'rect': {
      const { r, g, b, a } = command.color;
      backend.drawColoredQuad(x, y, w, h, r, g, b, a);
      break;
    }
    case 'borderRect': {
      const { r, g, b, a } = command.color;
      backend.drawBorderedQuad(x, y, w, h, command.border, r, g, b, a);
      break;
    }
    case 'circle': {
      const { r, g, b, a } = command.color;
      backend.drawFilledCircle(x, y, w, h, r, g, b, a);
      break;
    }
  }
}

/**
 * Overlay bypass: draw right now, outside the z-ordered queue.
 * Used for UI that must sit on top of everything the queue produced.
 */
export function renderImmediate(backend: RenderBackend, command: RenderCommand): void {
  executeRenderCommand(command, backend);
}
