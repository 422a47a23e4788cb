// ============================================
// Host Interfaces
// Everything the core calls out to
// ============================================

import type { SoundId, TextureHandle } from '#shared';

/**
 * Draw backend. Rectangles arrive as corner (x, y) + full size in the
 * same y-up pixel space the simulation uses; flipping is the host's job.
 */
export interface RenderBackend {
  clearFrame(): void;
  drawTexturedQuad(
    x: number,
    y: number,
    rotation: number,
    w: number,
    h: number,
    alpha: number,
    texture: TextureHandle
  ): void;
  drawColoredQuad(x: number, y: number, w: number, h: number, r: number, g: number, b: number, a: number): void;
  drawBorderedQuad(
    x: number,
    y: number,
    w: number,
    h: number,
    border: number,
    r: number,
    g: number,
    b: number,
    a: number
  ): void;
  drawFilledCircle(x: number, y: number, w: number, h: number, r: number, g: number, b: number, a: number): void;
}

/**
 * Texture loader - returns a stable handle per path
 */
export interface TextureLoader {
  loadTexture(path: string): TextureHandle;
}

/**
 * Fire-and-forget sound trigger
 */
export interface AudioSink {
  play(sound: SoundId): void;
}

/**
 * Host collaborators handed to the core at init
 */
export interface HostBindings {
  backend: RenderBackend;
  textures: TextureLoader;
  audio?: AudioSink;
}

export const silentAudio: AudioSink = {
  play: () => {},
};
