// ============================================
// Shared Types & Interfaces
// Kitchen vocabulary and closed tag types
// ============================================

// Ingredient colors handed out by the bins
export type IngredientColor = 'red' | 'green' | 'blue' | 'purple';

export const INGREDIENT_COLORS: readonly IngredientColor[] = ['red', 'green', 'blue', 'purple'];

// Dishes a stove can produce ('burnt' is what an unknown mix turns into)
export type DishKind = 'salad' | 'soup' | 'curry' | 'pie' | 'burnt';

// Stove lifecycle
export type StoveState = 'idle' | 'cooking' | 'dish-ready';

// Customer lifecycle - never returns to 'ordering' once it has left it
export type CustomerState = 'ordering' | 'angry' | 'eating';

// Customer sub-variant: picks the sprite and the attack pattern
//   lobber   - single aimed shot
//   spreader - three shots fanned around the aim direction
//   spinner  - ring of shots, rotated a little every volley
export type CustomerArchetype = 'lobber' | 'spreader' | 'spinner';

export const CUSTOMER_ARCHETYPES: readonly CustomerArchetype[] = ['lobber', 'spreader', 'spinner'];

// Sounds the core asks the host to play
export type SoundId =
  | 'pickup'
  | 'drop'
  | 'cook-start'
  | 'cook-done'
  | 'served'
  | 'angry'
  | 'throw'
  | 'hit';

// Drawable primitive used when an entity has no sprite
export type EntityShape = 'rect' | 'circle';
