// ============================================
// Frame Driver
// Entry points the host calls: init, per-frame update and input
// ============================================

import { GAME_CONFIG } from '#shared';
import type { HostBindings } from './host';
import { createGameState, resetGameState, type GameState } from './GameState';
import { BehaviorDispatcher, spawnCustomers } from './ecs/behaviors';
import { EventType, KeyCode, applyButton, applyMouseDelta, consumeLeftClick, tickInput } from './input';
import { drawHud, drawOverlays } from './render/hud';
import { logger } from './logger';

const dispatcher = new BehaviorDispatcher();

/**
 * Build a new game for a playfield of `width` x `height` pixels.
 * Loads every sprite through the host before returning.
 */
export function init(width: number, height: number, seed: number, host: HostBindings): GameState {
  return createGameState(width, height, seed, host);
}

/**
 * Frame delta in seconds: (timestamp - previous) / 1000, 0 on the first
 * frame. The host's timestamps are taken as given except that the
 * delta is held to [0, MAX_FRAME_DELTA], so a long stall (hidden tab,
 * debugger) or a clock step backwards does not teleport anything.
 */
export function frameDelta(previous: number | null, timestampMs: number): number {
  if (previous === null) return 0;
  const delta = (timestampMs - previous) / 1000;
  return Math.min(Math.max(delta, 0), GAME_CONFIG.MAX_FRAME_DELTA);
}

/**
 * Run one animation frame. Never throws.
 */
export function onFrame(state: GameState, timestampMs: number): void {
  const delta = frameDelta(state.previousTimestamp, timestampMs);

  try {
    tickInput(state.input);
    state.queue.reset();

    if (state.gameOver && consumeLeftClick(state.input)) {
      resetGameState(state);
    }

    if (state.paused || state.gameOver) {
      dispatcher.draw(state);
    } else {
      spawnCustomers(state, delta);
      state.elapsed += delta;
      dispatcher.update(state, delta);
    }
    drawHud(state);

    state.backend.clearFrame();
    state.queue.flush(state.backend);
    drawOverlays(state);
  } catch (error) {
    logger.error(
      {
        event: 'frame_error',
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
      'Frame threw an error'
    );
    state.queue.reset();
  }

  state.previousTimestamp = timestampMs;
}

/**
 * Button transition from the host. Pause toggles on press.
 */
export function onInputEvent(state: GameState, type: EventType, code: KeyCode): void {
  const pressed = applyButton(state.input, type, code);
  if (code === KeyCode.Pause && pressed && !state.gameOver) {
    state.paused = !state.paused;
    logger.info({ paused: state.paused, event: 'pause_toggled' }, state.paused ? 'Game paused' : 'Game resumed');
  }
}

/**
 * Relative mouse motion from the host, in screen pixels
 */
export function onMouseDelta(state: GameState, dx: number, dy: number): void {
  applyMouseDelta(state.input, dx, dy);
}

export { EventType, KeyCode } from './input';
export type { GameState } from './GameState';
export type { AudioSink, HostBindings, RenderBackend, TextureLoader } from './host';
