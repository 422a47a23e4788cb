// ============================================
// Shared Types & Constants
// Pure leaf code used by the simulation core
// ============================================

// ECS Module - entity record, kinds, masks
export * from './ecs';

// Math utilities - 2D vectors
export * from './math';

// Colors and palette
export * from './color';

// Game constants (GAME_CONFIG, ASSET_PATHS)
export * from './constants';

// Type definitions (IngredientColor, DishKind, ...)
export * from './types';

// Recipe table and order weights
export * from './recipes';
