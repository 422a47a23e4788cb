// ============================================
// Input State
// Button snapshot, click latches and the tethered cursor
// ============================================

import { GAME_CONFIG, clampVec, distance, type Entity, type Vec2 } from '#shared';

export enum EventType {
  ButtonDown = 0,
  ButtonUp = 1,
}

export enum KeyCode {
  W = 0,
  A = 1,
  S = 2,
  D = 3,
  MouseLeft = 4,
  MouseRight = 5,
  Pause = 6,
}

/**
 * Input snapshot owned by the game state.
 *
 * Clicks are latched for a few frames so a press that lands between two
 * frames is still seen by the behavior that consumes it.
 */
export interface InputState {
  forwardsDown: boolean;
  backwardsDown: boolean;
  leftDown: boolean;
  rightDown: boolean;
  pauseDown: boolean;

  mouseLeftClickedFrames: number;
  mouseRightClickedFrames: number;
  mouseMovingFrames: number;

  // World-space cursor, kept inside the playfield
  mousePos: Vec2;
  bounds: Vec2;
}

export function createInputState(width: number, height: number): InputState {
  return {
    forwardsDown: false,
    backwardsDown: false,
    leftDown: false,
    rightDown: false,
    pauseDown: false,
    mouseLeftClickedFrames: 0,
    mouseRightClickedFrames: 0,
    mouseMovingFrames: 0,
    mousePos: { x: width / 2, y: height / 2 },
    bounds: { x: width, y: height },
  };
}

// ============================================
// Event Application
// ============================================

/**
 * Apply one button transition. Returns true when the transition was a
 * fresh press (the button was up before), which is what toggles use.
 */
export function applyButton(input: InputState, type: EventType, code: KeyCode): boolean {
  const down = type === EventType.ButtonDown;

  switch (code) {
    case KeyCode.W:
      input.forwardsDown = down;
      return down;
    case KeyCode.A:
      input.leftDown = down;
      return down;
    case KeyCode.S:
      input.backwardsDown = down;
      return down;
    case KeyCode.D:
      input.rightDown = down;
      return down;
    case KeyCode.MouseLeft:
      if (down) input.mouseLeftClickedFrames = GAME_CONFIG.MOUSE_CLICKED_FRAMES;
      return down;
    case KeyCode.MouseRight:
      if (down) input.mouseRightClickedFrames = GAME_CONFIG.MOUSE_CLICKED_FRAMES;
      return down;
    case KeyCode.Pause: {
      // Key repeat sends several downs; only the first one counts
      const fresh = down && !input.pauseDown;
      input.pauseDown = down;
      return fresh;
    }
  }
}

/**
 * Accumulate a relative mouse motion in screen pixels.
 * Screen y grows downward, world y grows upward.
 */
export function applyMouseDelta(input: InputState, dx: number, dy: number): void {
  input.mouseMovingFrames = GAME_CONFIG.MOUSE_MOVING_FRAMES;
  input.mousePos = clampVec({ x: input.mousePos.x + dx, y: input.mousePos.y - dy }, { x: 0, y: 0 }, input.bounds);
}

/**
 * Age the latches by one frame
 */
export function tickInput(input: InputState): void {
  if (input.mouseLeftClickedFrames > 0) input.mouseLeftClickedFrames--;
  if (input.mouseRightClickedFrames > 0) input.mouseRightClickedFrames--;
  if (input.mouseMovingFrames > 0) input.mouseMovingFrames--;
}

export function isMouseMoving(input: InputState): boolean {
  return input.mouseMovingFrames > 0;
}

/**
 * Read and clear the left click latch
 */
export function consumeLeftClick(input: InputState): boolean {
  const clicked = input.mouseLeftClickedFrames > 0;
  input.mouseLeftClickedFrames = 0;
  return clicked;
}

/**
 * Read and clear the right click latch
 */
export function consumeRightClick(input: InputState): boolean {
  const clicked = input.mouseRightClickedFrames > 0;
  input.mouseRightClickedFrames = 0;
  return clicked;
}

// ============================================
// Hover Tests
// ============================================

export function isHoveringCircle(point: Vec2, center: Vec2, radius: number): boolean {
  return distance(point, center) < radius;
}

export function isHoveringRect(point: Vec2, center: Vec2, size: Vec2): boolean {
  return (
    Math.abs(point.x - center.x) < size.x / 2 &&
    Math.abs(point.y - center.y) < size.y / 2
  );
}

/**
 * Hover test against an entity's drawn footprint (circle or rect)
 */
export function isHoveringEntity(point: Vec2, entity: Entity): boolean {
  if (entity.shape === 'circle') {
    return isHoveringCircle(point, entity.pos, entity.size.x / 2);
  }
  return isHoveringRect(point, entity.pos, entity.size);
}
