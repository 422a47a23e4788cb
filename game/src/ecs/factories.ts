// ============================================
// Entity Factories
// Templates for every kind, plus the kitchen layout
// ============================================

import {
  ColliderMasks,
  EntityKinds,
  GAME_CONFIG,
  INGREDIENT_COLORS,
  INGREDIENT_COLOR_VALUES,
  DISH_COLORS,
  Palette,
  scale,
  splat,
  vec2,
  type Color,
  type CustomerArchetype,
  type DishKind,
  type EntityId,
  type EntityInit,
  type IngredientColor,
  type Vec2,
} from '#shared';
import type { GameState } from '../GameState';
import type { AllocationResult } from './EntityRegistry';

/**
 * Registry failures are already logged; callers only need to know
 * whether they got an entity.
 */
function idOf(result: AllocationResult): EntityId | null {
  return result.ok ? result.id : null;
}

function spawn(state: GameState, template: EntityInit): EntityId | null {
  return idOf(state.registry.allocate(template));
}

// ============================================
// Actors
// ============================================

/**
 * Create the player at the left edge of the kitchen.
 */
export function createPlayer(state: GameState): EntityId | null {
  return spawn(state, {
    kind: EntityKinds.Player,
    pos: vec2(GAME_CONFIG.PLAYER_START_X, state.height / 2),
    size: splat(GAME_CONFIG.PLAYER_SIZE),
    zIndex: GAME_CONFIG.PLAYER_Z_INDEX,
    sprite: state.sprites.player,
    speed: GAME_CONFIG.PLAYER_SPEED,
    acceleration: GAME_CONFIG.PLAYER_ACCELERATION,
    health: GAME_CONFIG.PLAYER_HEALTH,
    collider: {
      shape: { type: 'circle', radius: GAME_CONFIG.PLAYER_COLLIDER_RADIUS },
      mask: ColliderMasks.Player,
    },
  });
}

/**
 * Seat a customer. The seat keeps a weak reference back; the caller
 * marks the seat occupied.
 */
export function createCustomer(
  state: GameState,
  seatId: EntityId,
  seatPos: Vec2,
  archetype: CustomerArchetype,
  order: DishKind
): EntityId | null {
  return spawn(state, {
    kind: EntityKinds.Customer,
    pos: seatPos,
    size: splat(GAME_CONFIG.CUSTOMER_SIZE),
    zIndex: GAME_CONFIG.CUSTOMER_Z_INDEX,
    sprite: state.sprites[archetype],
    customer: {
      seat: seatId,
      archetype,
      order,
      state: 'ordering',
      waitTimer: GAME_CONFIG.CUSTOMER_WAIT_TIME,
      eatTimer: 0,
      fireTimer: 0,
      barragePhase: 0,
    },
  });
}

/**
 * Fire a projectile from `origin` along the unit vector `direction`.
 */
export function createProjectile(state: GameState, origin: Vec2, direction: Vec2): EntityId | null {
  return spawn(state, {
    kind: EntityKinds.Projectile,
    pos: origin,
    size: splat(GAME_CONFIG.PROJECTILE_SIZE),
    zIndex: GAME_CONFIG.PROJECTILE_Z_INDEX,
    shape: 'circle',
    color: Palette.orange,
    vel: scale(direction, GAME_CONFIG.PROJECTILE_SPEED),
    speed: GAME_CONFIG.PROJECTILE_SPEED,
    collider: {
      shape: { type: 'circle', radius: GAME_CONFIG.PROJECTILE_SIZE / 2 },
      mask: ColliderMasks.Projectile,
    },
    projectile: { travelled: 0 },
  });
}

// ============================================
// Items
// ============================================

export function createIngredient(state: GameState, color: IngredientColor, pos: Vec2): EntityId | null {
  return spawn(state, {
    kind: EntityKinds.Ingredient,
    pos,
    size: splat(GAME_CONFIG.INGREDIENT_SIZE),
    zIndex: GAME_CONFIG.INGREDIENT_Z_INDEX,
    shape: 'circle',
    color: INGREDIENT_COLOR_VALUES[color],
    ingredient: { color },
  });
}

export function createDish(state: GameState, kind: DishKind, pos: Vec2): EntityId | null {
  return spawn(state, {
    kind: EntityKinds.Dish,
    pos,
    size: splat(GAME_CONFIG.DISH_SIZE),
    zIndex: GAME_CONFIG.DISH_Z_INDEX,
    shape: 'circle',
    color: DISH_COLORS[kind],
    dish: { kind },
  });
}

// ============================================
// Fixtures
// ============================================

export function createIngredientBin(state: GameState, color: IngredientColor, pos: Vec2): EntityId | null {
  return spawn(state, {
    kind: EntityKinds.IngredientBin,
    pos,
    size: splat(GAME_CONFIG.INGREDIENT_BIN_SIZE),
    zIndex: GAME_CONFIG.STOVE_Z_INDEX,
    shape: 'rect',
    color: INGREDIENT_COLOR_VALUES[color],
    bin: { color },
  });
}

export function createStove(state: GameState, pos: Vec2): EntityId | null {
  return spawn(state, {
    kind: EntityKinds.Stove,
    pos,
    size: splat(GAME_CONFIG.STOVE_SIZE),
    zIndex: GAME_CONFIG.STOVE_Z_INDEX,
    shape: 'rect',
    color: Palette.lightGrey,
    stove: {
      state: 'idle',
      ingredients: [],
      cookTimer: 0,
      spinPhase: 0,
      flamePhase: 0,
      result: null,
    },
  });
}

/**
 * Seat beside a table. `dishTargetOffset` points from the seat to where
 * its dish goes on the table top.
 */
export function createSeat(state: GameState, pos: Vec2, dishTargetOffset: Vec2): EntityId | null {
  return spawn(state, {
    kind: EntityKinds.Seat,
    pos,
    size: splat(GAME_CONFIG.SEAT_SIZE),
    zIndex: GAME_CONFIG.SEAT_Z_INDEX,
    shape: 'rect',
    color: Palette.brown,
    seat: {
      occupied: false,
      customer: null,
      dish: null,
      dishTargetOffset,
    },
  });
}

/**
 * Static collidable scenery (counter, tables, pillars, walls)
 */
export function createTerrain(
  state: GameState,
  pos: Vec2,
  size: Vec2,
  shape: 'rect' | 'circle',
  color: Color
): EntityId | null {
  return spawn(state, {
    kind: EntityKinds.Generic,
    pos,
    size,
    shape,
    color,
    collider: {
      shape:
        shape === 'circle'
          ? { type: 'circle', radius: size.x / 2 }
          : { type: 'aabb', halfExtents: scale(size, 0.5) },
      mask: ColliderMasks.Terrain,
    },
  });
}

// ============================================
// Kitchen Layout
// ============================================

const COUNTER_X = 200;
const COUNTER_SIZE = vec2(80, 400);
const COUNTER_COLLIDER_WIDTH = 75;
const BIN_X = 40;
const BIN_SPACING = 80;
const STOVE_SPACING = 76;
const TABLE_X = 425;
const TABLE_SIZE = vec2(100, 300);
const PILLAR_SIZE = 150;
const WALL_THICKNESS = 120;
const WALL_OFFSET = 50;

/**
 * Build the fixed kitchen: counter with stoves, ingredient bins, one
 * table with six seats, three pillars and the four boundary walls.
 */
export function createKitchen(state: GameState): void {
  const w = state.width;
  const h = state.height;

  // Counter - drawn a little wider than it collides so the player can lean on it
  state.registry.allocate({
    kind: EntityKinds.Generic,
    pos: vec2(COUNTER_X, h / 2),
    size: COUNTER_SIZE,
    shape: 'rect',
    color: Palette.brown,
    collider: {
      shape: { type: 'aabb', halfExtents: vec2(COUNTER_COLLIDER_WIDTH / 2, COUNTER_SIZE.y / 2) },
      mask: ColliderMasks.Terrain,
    },
  });

  INGREDIENT_COLORS.forEach((color, i) => {
    const offset = (i - (INGREDIENT_COLORS.length - 1) / 2) * BIN_SPACING;
    createIngredientBin(state, color, vec2(BIN_X, h / 2 + offset));
  });

  for (let i = 0; i < GAME_CONFIG.MAX_STOVES; i++) {
    const offset = (i - (GAME_CONFIG.MAX_STOVES - 1) / 2) * STOVE_SPACING;
    createStove(state, vec2(COUNTER_X, h / 2 + offset));
  }

  // Table and its seats: three on each long side
  const tablePos = vec2(TABLE_X, h / 2);
  createTerrain(state, tablePos, TABLE_SIZE, 'rect', Palette.brown);

  const leftX = tablePos.x - TABLE_SIZE.x / 2 - GAME_CONFIG.SEAT_OFFSET_X;
  const rightX = tablePos.x + TABLE_SIZE.x / 2 + GAME_CONFIG.SEAT_OFFSET_X;
  const rows = [
    tablePos.y + TABLE_SIZE.y / 2 - GAME_CONFIG.SEAT_OFFSET_Y,
    tablePos.y,
    tablePos.y - TABLE_SIZE.y / 2 + GAME_CONFIG.SEAT_OFFSET_Y,
  ];
  for (const y of rows) {
    createSeat(state, vec2(leftX, y), vec2(GAME_CONFIG.SEAT_DISH_TARGET_OFFSET, 0));
  }
  for (const y of rows) {
    createSeat(state, vec2(rightX, y), vec2(-GAME_CONFIG.SEAT_DISH_TARGET_OFFSET, 0));
  }

  // Pillars
  const pillar = splat(PILLAR_SIZE);
  createTerrain(state, vec2(900, 175), pillar, 'circle', Palette.lightGrey);
  createTerrain(state, vec2(900, h - 175), pillar, 'circle', Palette.lightGrey);
  createTerrain(state, vec2(670, h / 2), pillar, 'circle', Palette.lightGrey);

  // Walls sit mostly outside the playfield
  createTerrain(state, vec2(-WALL_OFFSET, h / 2), vec2(WALL_THICKNESS, h), 'rect', Palette.darkGrey);
  createTerrain(state, vec2(w + WALL_OFFSET, h / 2), vec2(WALL_THICKNESS, h), 'rect', Palette.darkGrey);
  createTerrain(state, vec2(w / 2, -WALL_OFFSET), vec2(w, WALL_THICKNESS), 'rect', Palette.darkGrey);
  createTerrain(state, vec2(w / 2, h + WALL_OFFSET), vec2(w, WALL_THICKNESS), 'rect', Palette.darkGrey);
}
