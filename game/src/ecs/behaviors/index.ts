// ============================================
// Behaviors - Export all behaviors
// ============================================

export type { Behavior, BehaviorTable } from './types';
export { BehaviorDispatcher, createBehaviorTable } from './BehaviorDispatcher';

export { PlayerBehavior, accelerateAxis } from './PlayerBehavior';
export { StoveBehavior, addIngredient, beginCooking, takeDish } from './StoveBehavior';
export { CustomerBehavior, fireVolley, spawnCustomers } from './CustomerBehavior';
export { ProjectileBehavior } from './ProjectileBehavior';
export { SeatBehavior } from './SeatBehavior';
export { ItemBehavior } from './ItemBehavior';
export { IngredientBinBehavior } from './IngredientBinBehavior';
