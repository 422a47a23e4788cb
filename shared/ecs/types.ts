// ============================================
// ECS Core Types
// ============================================

/**
 * Entity ID - the slot index inside the fixed-capacity registry.
 * Ids are reused once a slot is freed, so any id held by another
 * entity is a weak reference and must be resolved before use.
 */
export type EntityId = number;

/**
 * Opaque texture handle returned by the host's texture loader.
 */
export type TextureHandle = number;

/**
 * Entity kinds - closed tag selecting behavior and payload shape.
 * Using const object for type safety while keeping string values.
 */
export const EntityKinds = {
  Player: 'player',
  Ingredient: 'ingredient',
  IngredientBin: 'ingredient-bin',
  Stove: 'stove',
  Dish: 'dish',
  Seat: 'seat',
  Customer: 'customer',
  Projectile: 'projectile',
  Generic: 'generic',
} as const;

export type EntityKind = (typeof EntityKinds)[keyof typeof EntityKinds];

/**
 * Collider masks - which registry list a collider is tracked in.
 */
export const ColliderMasks = {
  Player: 'player',
  Terrain: 'terrain',
  Projectile: 'projectile',
} as const;

export type ColliderMask = (typeof ColliderMasks)[keyof typeof ColliderMasks];

export const COLLIDER_MASKS: readonly ColliderMask[] = Object.values(ColliderMasks);
