// ============================================
// ECS Component Interfaces
// The entity record and its kind-specific payloads
// ============================================

import type { Vec2 } from '../math';
import type { Color } from '../color';
import type {
  CustomerArchetype,
  CustomerState,
  DishKind,
  EntityShape,
  IngredientColor,
  StoveState,
} from '../types';
import type { ColliderMask, EntityId, EntityKind, TextureHandle } from './types';

// ============================================
// Collision
// ============================================

export interface CircleShape {
  type: 'circle';
  radius: number;
}

export interface AabbShape {
  type: 'aabb';
  halfExtents: Vec2;
}

export type ColliderShape = CircleShape | AabbShape;

/**
 * Collider - shape plus the mask list it is registered in.
 * Owned by the entity that carries it.
 */
export interface Collider {
  shape: ColliderShape;
  mask: ColliderMask;
}

// ============================================
// Kind Payloads
// ============================================

export interface IngredientComponent {
  color: IngredientColor;
}

/**
 * Ingredient bin - hands out a fresh ingredient on click.
 */
export interface IngredientBinComponent {
  color: IngredientColor;
}

export interface DishComponent {
  kind: DishKind;
}

/**
 * Stove - accumulates ingredients while idle, cooks them into a dish.
 */
export interface StoveComponent {
  state: StoveState;
  ingredients: IngredientColor[];
  cookTimer: number;   // Seconds left while cooking
  spinPhase: number;   // Radians, ingredient orbit animation
  flamePhase: number;  // Radians, flame flicker animation
  result: DishKind | null; // Set while 'dish-ready'
}

/**
 * Seat - where customers sit and dishes get served.
 * `customer` and `dish` are weak references.
 */
export interface SeatComponent {
  occupied: boolean;
  customer: EntityId | null;
  dish: EntityId | null;
  dishTargetOffset: Vec2; // Offset from the seat to the serving spot on the table
}

/**
 * Customer - ordering → angry → eating state machine.
 * `seat` is a weak reference.
 */
export interface CustomerComponent {
  seat: EntityId;
  archetype: CustomerArchetype;
  order: DishKind;
  state: CustomerState;
  waitTimer: number;    // Seconds of patience left while ordering
  eatTimer: number;     // Seconds left while eating
  fireTimer: number;    // Seconds until the next volley while angry
  barragePhase: number; // Radians, spinner ring rotation
}

/**
 * Projectile - thrown food. Arcs over terrain until it has flown
 * PROJECTILE_LOB_DISTANCE.
 */
export interface ProjectileComponent {
  travelled: number; // Pixels flown since launch
}

// ============================================
// Entity Record
// ============================================

/**
 * Entity - one record type for every kind.
 *
 * Inactive entities are logically nonexistent; their slot is inert until
 * the registry hands it out again. Payload fields are null unless the
 * kind uses them.
 */
export interface Entity {
  active: boolean;
  id: EntityId;
  kind: EntityKind;

  // Transform (center position, full size)
  pos: Vec2;
  size: Vec2;
  rotation: number;
  zIndex: number;

  // Graphics - sprite wins over shape
  sprite: TextureHandle | null;
  shape: EntityShape | null;
  color: Color | null;
  alpha: number;

  // Movement
  vel: Vec2;
  acceleration: number;
  speed: number; // Speed cap

  health: number;

  collider: Collider | null;
  holding: EntityId | null;      // Weak reference, the holder does not own it
  droppedTimer: number | null;   // Seconds until a dropped item despawns

  ingredient: IngredientComponent | null;
  bin: IngredientBinComponent | null;
  dish: DishComponent | null;
  stove: StoveComponent | null;
  seat: SeatComponent | null;
  customer: CustomerComponent | null;
  projectile: ProjectileComponent | null;
}

/**
 * Template accepted by the registry's allocate; everything not given
 * falls back to the registry defaults.
 */
export type EntityInit = Partial<Omit<Entity, 'active' | 'id'>>;
