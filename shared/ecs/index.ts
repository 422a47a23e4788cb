// ============================================
// ECS Package Exports
// ============================================

// Types and constants
export { EntityKinds, ColliderMasks, COLLIDER_MASKS } from './types';
export type { EntityId, EntityKind, ColliderMask, TextureHandle } from './types';

// Component interfaces
export type {
  // Collision
  CircleShape,
  AabbShape,
  ColliderShape,
  Collider,
  // Kind payloads
  IngredientComponent,
  IngredientBinComponent,
  DishComponent,
  StoveComponent,
  SeatComponent,
  CustomerComponent,
  ProjectileComponent,
  // Entity record
  Entity,
  EntityInit,
} from './components';
